// ─── MIDI Test Fixtures ──────────────────────────────────────────────────────
//
// Builds small standard MIDI files in memory with midi-file's writer, so
// tests never touch the disk for input.
// ─────────────────────────────────────────────────────────────────────────────

import { writeMidi, type MidiEvent } from "midi-file";

export interface FixtureNote {
  channel: number;
  pitch: number;
  start: number;
  end: number;
  velocity?: number;
}

export interface FixtureTrack {
  name?: string;
  instrument?: string;
  /** Program changes at tick 0. */
  programs?: Array<{ channel: number; program: number }>;
  /** Tempo changes on this track, in BPM. */
  tempos?: Array<{ tick: number; bpm: number }>;
  notes?: FixtureNote[];
  /** Write releases as noteOn with velocity 0. */
  zeroVelocityOff?: boolean;
}

export interface FixtureFile {
  ticksPerBeat: number;
  tracks: FixtureTrack[];
}

/** Encode a fixture as MIDI bytes (format 1, or 0 for a single track). */
export function buildMidi(fixture: FixtureFile): Uint8Array {
  const tracks = fixture.tracks.map(buildTrack);
  return new Uint8Array(writeMidi({
    header: {
      format: tracks.length === 1 ? 0 : 1,
      numTracks: tracks.length,
      ticksPerBeat: fixture.ticksPerBeat,
    },
    tracks,
  }));
}

function buildTrack(track: FixtureTrack): MidiEvent[] {
  const head: MidiEvent[] = [];
  if (track.name !== undefined) {
    head.push({ deltaTime: 0, meta: true, type: "trackName", text: track.name });
  }
  if (track.instrument !== undefined) {
    head.push({ deltaTime: 0, meta: true, type: "instrumentName", text: track.instrument });
  }
  for (const p of track.programs ?? []) {
    head.push({ deltaTime: 0, type: "programChange", channel: p.channel, programNumber: p.program });
  }

  // order: 0 = tempo, 1 = release, 2 = press, so a key can be re-struck on the tick it is let go
  const timed: Array<{ tick: number; order: number; event: MidiEvent }> = [];
  for (const t of track.tempos ?? []) {
    timed.push({
      tick: t.tick,
      order: 0,
      event: { deltaTime: 0, meta: true, type: "setTempo", microsecondsPerBeat: Math.round(60_000_000 / t.bpm) },
    });
  }
  for (const n of track.notes ?? []) {
    timed.push({
      tick: n.start,
      order: 2,
      event: { deltaTime: 0, type: "noteOn", channel: n.channel, noteNumber: n.pitch, velocity: n.velocity ?? 80 },
    });
    timed.push({
      tick: n.end,
      order: 1,
      event: track.zeroVelocityOff
        ? { deltaTime: 0, type: "noteOn", channel: n.channel, noteNumber: n.pitch, velocity: 0 }
        : { deltaTime: 0, type: "noteOff", channel: n.channel, noteNumber: n.pitch, velocity: 0 },
    });
  }
  timed.sort((a, b) => a.tick - b.tick || a.order - b.order);

  const events = [...head];
  let prevTick = 0;
  for (const t of timed) {
    events.push({ ...t.event, deltaTime: t.tick - prevTick });
    prevTick = t.tick;
  }
  events.push({ deltaTime: 0, meta: true, type: "endOfTrack" });
  return events;
}
