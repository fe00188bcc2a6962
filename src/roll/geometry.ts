// ─── Roll Geometry Calculator ────────────────────────────────────────────────
//
// Maps a validated timeline onto page coordinates. Columns come from pitch;
// the vertical axis is time, scaled by how far the roll advances per tick
// and shrunk by the operator's compression divisor. Lengths are in inches.
// ─────────────────────────────────────────────────────────────────────────────

import { DEFAULT_ROLL_CONFIG } from "../config/schema.js";
import type { LengthWarning, NoteEvent, UnreleasedNote } from "../types.js";
import { pitchRow, ROW_COUNT } from "./range.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface GeometryOptions {
  ticksPerBeat: number;
  microsecondsPerBeat: number;
  /** Compression divisor; must be positive. Default: 1 */
  divisor?: number;
  /** Inches of roll per second of playback. Default: 1 */
  rollSpeed?: number;
  /** Horizontal distance between adjacent key columns. Default: 0.125 */
  columnSpacing?: number;
  /** Length above which a LengthWarning is raised. Default: 200 */
  lengthLimit?: number;
}

/** One held key, as a vertical slot on the roll. */
export interface RollSegment {
  pitch: number;
  /** Key column, 0 for the lowest key. */
  row: number;
  startTick: number;
  endTick: number;
  /** Horizontal offset of the column. */
  x: number;
  /** Vertical start, after compression. */
  top: number;
  /** Vertical end, after compression. */
  bottom: number;
}

export interface RollGeometry {
  /** Sorted by start tick, then pitch. */
  segments: RollSegment[];
  /** Lowest point of any segment; 0 for an empty roll. */
  totalLength: number;
  /** Width spanned by all key columns. */
  width: number;
  /** Roll advance per tick before compression. */
  lengthPerTick: number;
  divisor: number;
  warning?: LengthWarning;
  unreleased: UnreleasedNote[];
}

// ─── Public API ─────────────────────────────────────────────────────────────

/** Roll advance per beat, before compression. */
export function lengthPerBeat(microsecondsPerBeat: number, rollSpeed: number = DEFAULT_ROLL_CONFIG.rollSpeed): number {
  return rollSpeed * (microsecondsPerBeat / 1_000_000);
}

/**
 * Compute the roll layout for a single-holder timeline.
 *
 * Each press is paired with the next release of the same key. Presses that
 * are never released produce no segment and are listed in `unreleased`.
 * Throws if the divisor is not positive, or if the timeline presses a key
 * that is already down or releases one that is up.
 */
export function computeRollGeometry(
  timeline: readonly NoteEvent[],
  options: GeometryOptions,
): RollGeometry {
  const divisor = options.divisor ?? 1;
  const rollSpeed = options.rollSpeed ?? DEFAULT_ROLL_CONFIG.rollSpeed;
  const columnSpacing = options.columnSpacing ?? DEFAULT_ROLL_CONFIG.columnSpacing;
  const lengthLimit = options.lengthLimit ?? DEFAULT_ROLL_CONFIG.lengthLimit;

  if (!(divisor > 0) || !Number.isFinite(divisor)) {
    throw new Error(`Compression divisor must be a positive number: got ${divisor}`);
  }
  if (!(options.ticksPerBeat > 0)) {
    throw new Error(`Ticks per beat must be positive: got ${options.ticksPerBeat}`);
  }

  const lengthPerTick = lengthPerBeat(options.microsecondsPerBeat, rollSpeed) / options.ticksPerBeat;
  const scale = lengthPerTick / divisor;

  const open = new Map<number, NoteEvent>();
  const segments: RollSegment[] = [];

  for (const event of timeline) {
    const pressed = open.get(event.pitch);
    if (event.kind === "press") {
      if (pressed) {
        throw new Error(`Key ${event.pitch} pressed at ${event.tick} while held since ${pressed.tick}`);
      }
      open.set(event.pitch, event);
      continue;
    }

    if (!pressed) {
      throw new Error(`Key ${event.pitch} released at ${event.tick} without a press`);
    }
    open.delete(event.pitch);
    const row = pitchRow(event.pitch);
    segments.push({
      pitch: event.pitch,
      row,
      startTick: pressed.tick,
      endTick: event.tick,
      x: row * columnSpacing,
      top: pressed.tick * scale,
      bottom: event.tick * scale,
    });
  }

  segments.sort((a, b) => a.startTick - b.startTick || a.pitch - b.pitch);

  const unreleased: UnreleasedNote[] = [...open.values()]
    .sort((a, b) => a.tick - b.tick || a.pitch - b.pitch)
    .map((e): UnreleasedNote => ({ kind: "unreleased", pitch: e.pitch, tick: e.tick, source: e.source }));

  const totalLength = segments.reduce((max, s) => Math.max(max, s.bottom), 0);

  const geometry: RollGeometry = {
    segments,
    totalLength,
    width: ROW_COUNT * columnSpacing,
    lengthPerTick,
    divisor,
    unreleased,
  };
  if (totalLength > lengthLimit) {
    geometry.warning = { kind: "length", length: totalLength, limit: lengthLimit };
  }
  return geometry;
}
