// ─── Range Validator ─────────────────────────────────────────────────────────
//
// The roll has one column per key from C1 to G7. Runs after the merge, so
// dropping an event here never changes who held a key.
// ─────────────────────────────────────────────────────────────────────────────

import type { NoteEvent, OutOfRange } from "../types.js";

export const LOWEST_PITCH = 24; // C1
export const HIGHEST_PITCH = 103; // G7
export const ROW_COUNT = HIGHEST_PITCH - LOWEST_PITCH + 1;

export interface RangeResult {
  timeline: readonly NoteEvent[];
  violations: readonly OutOfRange[];
}

export function inRollRange(pitch: number): boolean {
  return pitch >= LOWEST_PITCH && pitch <= HIGHEST_PITCH;
}

/** Row index of an in-range pitch; C1 is row 0. */
export function pitchRow(pitch: number): number {
  if (!inRollRange(pitch)) {
    throw new Error(`Pitch ${pitch} has no row on the roll`);
  }
  return pitch - LOWEST_PITCH;
}

/** Split a merged timeline into playable events and out-of-range reports. */
export function validateRange(timeline: readonly NoteEvent[]): RangeResult {
  const kept: NoteEvent[] = [];
  const violations: OutOfRange[] = [];

  for (const event of timeline) {
    if (inRollRange(event.pitch)) {
      kept.push(event);
    } else {
      violations.push({ kind: "out-of-range", pitch: event.pitch, tick: event.tick, source: event.source });
    }
  }

  return { timeline: kept, violations };
}
