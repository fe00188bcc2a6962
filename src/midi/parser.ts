// ─── MIDI Parser ─────────────────────────────────────────────────────────────
//
// Decodes a standard MIDI file into tick-based key presses and releases,
// plus the metadata the roll needs: resolution, tempo, track and channel
// names. Decoding itself is done by midi-file.
// ─────────────────────────────────────────────────────────────────────────────

import { readFile } from "node:fs/promises";
import { parseMidi, type MidiData } from "midi-file";
import { ParseError } from "../errors.js";
import type { NoteEvent } from "../types.js";
import type { ChannelInfo, ParsedPerformance, TrackInfo } from "./types.js";

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULT_MICROSECONDS_PER_BEAT = 500_000; // 120 BPM

// ─── Public API ──────────────────────────────────────────────────────────────

/** Read and decode a MIDI file from disk. */
export async function readPerformance(path: string): Promise<ParsedPerformance> {
  let bytes: Uint8Array;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw new ParseError(
      `failed to read MIDI file ${path}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }
  return parsePerformance(bytes);
}

/**
 * Decode a MIDI buffer.
 *
 * Throws ParseError when the bytes are not a standard MIDI file, or when the
 * file uses SMPTE timecode instead of ticks per beat.
 */
export function parsePerformance(bytes: Uint8Array): ParsedPerformance {
  let midi: MidiData;
  try {
    midi = parseMidi(bytes);
  } catch (err) {
    throw new ParseError(
      `failed to parse MIDI file: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  const ticksPerBeat = midi.header.ticksPerBeat;
  if (ticksPerBeat === undefined || ticksPerBeat <= 0) {
    throw new ParseError("unsupported timecode-based MIDI file");
  }

  const collector = new TrackCollector();
  midi.tracks.forEach((events, track) => {
    let tick = 0;
    for (const event of events) {
      tick += event.deltaTime;
      collector.onEvent(track, tick, event);
    }
  });

  const warnings = [...collector.warnings];
  const microsecondsPerBeat = resolveTempo(collector.tempos, warnings);

  return {
    format: midi.header.format,
    trackCount: midi.tracks.length,
    ticksPerBeat,
    microsecondsPerBeat,
    bpm: Math.round(60_000_000 / microsecondsPerBeat),
    events: sortEvents(collector.events),
    tracks: collector.trackInfo(),
    channels: collector.channelInfo(),
    texts: collector.texts,
    warnings,
  };
}

// ─── Internal: Event Order ───────────────────────────────────────────────────

/**
 * Tick order, releases before presses on the same tick. A re-struck key is
 * often written noteOn-then-noteOff at the shared tick; releasing first
 * keeps both notes. Otherwise file order is kept (the sort is stable).
 */
function sortEvents(events: readonly NoteEvent[]): NoteEvent[] {
  const rank = (e: NoteEvent): number => (e.kind === "release" ? 0 : 1);
  return [...events].sort((a, b) => a.tick - b.tick || rank(a) - rank(b));
}

// ─── Internal: Event Collection ──────────────────────────────────────────────

type TrackEvent = MidiData["tracks"][number][number];

interface TempoMark {
  tick: number;
  microsecondsPerBeat: number;
}

class TrackCollector {
  readonly events: NoteEvent[] = [];
  readonly tempos: TempoMark[] = [];
  readonly texts: string[] = [];
  readonly warnings: string[] = [];
  private readonly tracks = new Map<number, TrackInfo>();
  private readonly channels = new Map<string, ChannelInfo>();

  onEvent(track: number, tick: number, event: TrackEvent): void {
    switch (event.type) {
      case "noteOn":
        this.channel(track, event.channel);
        this.events.push({
          source: { track, channel: event.channel },
          pitch: event.noteNumber,
          // noteOn with zero velocity stands in for noteOff in many files
          kind: event.velocity === 0 ? "release" : "press",
          tick,
          velocity: event.velocity,
        });
        break;
      case "noteOff":
        this.events.push({
          source: { track, channel: event.channel },
          pitch: event.noteNumber,
          kind: "release",
          tick,
          velocity: event.velocity,
        });
        break;
      case "controller":
        if (event.controllerType === 0) {
          const info = this.channel(track, event.channel);
          if (info.bank === undefined) {
            info.bank = event.value;
          } else {
            this.warnings.push(`track ${track} channel ${event.channel} set to another bank (${event.value}) mid-song`);
          }
        }
        break;
      case "programChange": {
        const info = this.channel(track, event.channel);
        if (info.program === undefined) {
          info.program = event.programNumber;
        } else {
          this.warnings.push(`track ${track} channel ${event.channel} set to another program (${event.programNumber}) mid-song`);
        }
        break;
      }
      case "setTempo":
        this.tempos.push({ tick, microsecondsPerBeat: event.microsecondsPerBeat });
        break;
      case "trackName": {
        const info = this.track(track);
        if (info.name === undefined) {
          info.name = event.text;
        } else {
          this.warnings.push(`track ${track} given multiple names: "${event.text}"`);
        }
        break;
      }
      case "instrumentName": {
        const info = this.track(track);
        if (info.instrument === undefined) {
          info.instrument = event.text;
        } else {
          this.warnings.push(`track ${track} given multiple instrument names: "${event.text}"`);
        }
        break;
      }
      case "copyrightNotice":
        this.texts.push(`Copyright: ${event.text}`);
        break;
      case "marker":
        this.texts.push(`Marker: ${event.text}`);
        break;
      case "text":
        this.texts.push(`Text: ${event.text}`);
        break;
      default:
        break;
    }
  }

  trackInfo(): TrackInfo[] {
    return [...this.tracks.values()].sort((a, b) => a.track - b.track);
  }

  channelInfo(): ChannelInfo[] {
    return [...this.channels.values()].sort((a, b) => a.track - b.track || a.channel - b.channel);
  }

  private track(track: number): TrackInfo {
    let info = this.tracks.get(track);
    if (!info) {
      info = { track };
      this.tracks.set(track, info);
    }
    return info;
  }

  private channel(track: number, channel: number): ChannelInfo {
    const key = `${track}:${channel}`;
    let info = this.channels.get(key);
    if (!info) {
      info = { track, channel };
      this.channels.set(key, info);
    }
    return info;
  }
}

// ─── Internal: Tempo ─────────────────────────────────────────────────────────

/**
 * The roll runs at one speed, so only one tempo can apply. When the file
 * changes tempo, the last change wins.
 */
function resolveTempo(tempos: TempoMark[], warnings: string[]): number {
  if (tempos.length === 0) return DEFAULT_MICROSECONDS_PER_BEAT;

  const sorted = [...tempos].sort((a, b) => a.tick - b.tick);
  const last = sorted[sorted.length - 1].microsecondsPerBeat;
  const distinct = new Set(sorted.map(t => t.microsecondsPerBeat));
  if (distinct.size > 1) {
    warnings.push(
      `tempo changes are not supported; using the last tempo (${Math.round(60_000_000 / last)} BPM)`,
    );
  }
  return last;
}
