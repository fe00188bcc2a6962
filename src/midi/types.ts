// ─── MIDI File Types ────────────────────────────────────────────────────────
//
// Types for a decoded standard MIDI file. Everything stays tick-based: the
// roll is laid out from ticks, and the merged file is written back in the
// source's own resolution.
// ─────────────────────────────────────────────────────────────────────────────

import type { NoteEvent } from "../types.js";

/** Name meta events found on one track. */
export interface TrackInfo {
  track: number;
  /** From the first track name meta event. */
  name?: string;
  /** From the first instrument name meta event. */
  instrument?: string;
}

/** Bank and program settings seen on one (track, channel). */
export interface ChannelInfo {
  track: number;
  channel: number;
  /** Bank select (controller 0) value, if the file sets one. */
  bank?: number;
  /** Program change value (0-127), if the file sets one. */
  program?: number;
}

/** Result of decoding a standard MIDI file. */
export interface ParsedPerformance {
  /** MIDI format (0 = single track, 1 = multi-track, 2 = multi-song). */
  format: number;
  /** Total number of tracks in the file. */
  trackCount: number;
  /** Ticks per quarter note (MIDI timing resolution). */
  ticksPerBeat: number;
  /** Tempo in effect for the roll. 500000 (120 BPM) when the file sets none. */
  microsecondsPerBeat: number;
  /** Tempo rounded to whole beats per minute, for display. */
  bpm: number;
  /** Every key press and release, sorted by tick (file order within a tick). */
  events: NoteEvent[];
  tracks: TrackInfo[];
  channels: ChannelInfo[];
  /** Copyright, marker and text meta events, in file order. */
  texts: string[];
  /** Non-fatal oddities noticed while decoding. */
  warnings: string[];
}
