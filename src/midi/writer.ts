// ─── Merged MIDI Writer ──────────────────────────────────────────────────────
//
// Writes the accepted timeline back out as a format-1 file: a tempo track
// and a single piano track on channel 0. The file holds exactly the presses
// and releases the roll plays, nothing more.
// ─────────────────────────────────────────────────────────────────────────────

import { writeMidi, type MidiData, type MidiEvent } from "midi-file";
import { DEFAULT_ROLL_CONFIG } from "../config/schema.js";
import type { NoteEvent } from "../types.js";

const OUTPUT_CHANNEL = 0;

export interface MidiWriteOptions {
  ticksPerBeat: number;
  microsecondsPerBeat: number;
  /** Velocity for every note. Default: 90 */
  velocity?: number;
  /** General MIDI program for the piano track. Default: 0 (Acoustic Grand) */
  program?: number;
}

/** Encode a tick-ordered timeline as standard MIDI file bytes. */
export function writeTimelineMidi(
  timeline: readonly NoteEvent[],
  options: MidiWriteOptions,
): Uint8Array {
  const velocity = options.velocity ?? DEFAULT_ROLL_CONFIG.outputVelocity;
  const program = options.program ?? DEFAULT_ROLL_CONFIG.outputProgram;

  const tempoTrack: MidiEvent[] = [
    { deltaTime: 0, meta: true, type: "setTempo", microsecondsPerBeat: Math.round(options.microsecondsPerBeat) },
    { deltaTime: 0, meta: true, type: "endOfTrack" },
  ];

  const noteTrack: MidiEvent[] = [
    { deltaTime: 0, type: "controller", channel: OUTPUT_CHANNEL, controllerType: 0, value: 0 },
    { deltaTime: 0, type: "programChange", channel: OUTPUT_CHANNEL, programNumber: program },
  ];

  let lastTick = 0;
  for (const event of timeline) {
    if (event.tick < lastTick) {
      throw new Error(`Timeline is not in tick order at tick ${event.tick}`);
    }
    const deltaTime = event.tick - lastTick;
    lastTick = event.tick;
    noteTrack.push(
      event.kind === "press"
        ? { deltaTime, type: "noteOn", channel: OUTPUT_CHANNEL, noteNumber: event.pitch, velocity }
        : { deltaTime, type: "noteOff", channel: OUTPUT_CHANNEL, noteNumber: event.pitch, velocity },
    );
  }
  noteTrack.push({ deltaTime: 0, meta: true, type: "endOfTrack" });

  const data: MidiData = {
    header: { format: 1, numTracks: 2, ticksPerBeat: options.ticksPerBeat },
    tracks: [tempoTrack, noteTrack],
  };
  return new Uint8Array(writeMidi(data));
}
