// ─── Timeline Merger & Conflict Detector ─────────────────────────────────────
//
// Folds several per-part event streams into one press/release timeline in
// which every key has at most one holder. A piano roll has one hole column
// per key, so two parts can never hold the same key at once: the first
// press owns the key until a release frees it, and later presses on a held
// key are absorbed.
//
// Presses landing within the fudge window of the owner's press are treated
// as the same attack played by two parts and are not reported. Later ones
// are reported as "already-pressed". Releases of keys nobody holds are
// reported as "not-pressed", unless they pair with an absorbed press.
// ─────────────────────────────────────────────────────────────────────────────

import { samePart } from "../types.js";
import type { Conflict, NoteEvent, Owner } from "../types.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface MergeOptions {
  /** Largest press-to-press gap, in ticks, that is not reported. */
  fudgeTicks: number;
}

export interface MergeResult {
  /** Accepted presses and releases, tick-ordered, one holder per key. */
  timeline: readonly NoteEvent[];
  /** Every conflict met along the way, in timeline order. */
  conflicts: readonly Conflict[];
}

/** Per-key bookkeeping for one merge. Never escapes mergeStreams. */
interface KeyboardState {
  owners: Map<number, Owner>;
  /** Presses absorbed by an existing owner whose release is still to come. */
  absorbed: Map<number, number>;
  fudgeTicks: number;
  timeline: NoteEvent[];
  conflicts: Conflict[];
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Fudge window for a file: a third of a beat by default.
 */
export function fudgeWindowTicks(ticksPerBeat: number, fudgeBeatDivisor = 3): number {
  if (!(ticksPerBeat > 0)) {
    throw new Error(`Ticks per beat must be positive: got ${ticksPerBeat}`);
  }
  if (!(fudgeBeatDivisor >= 1)) {
    throw new Error(`Fudge divisor must be at least 1: got ${fudgeBeatDivisor}`);
  }
  return Math.floor(ticksPerBeat / fudgeBeatDivisor);
}

/**
 * Merge tick-ordered streams into one single-holder timeline.
 *
 * Pure: the input streams are only read, and the result is built fresh.
 * Conflicts are collected, never thrown.
 */
export function mergeStreams(
  streams: readonly (readonly NoteEvent[])[],
  options: MergeOptions,
): MergeResult {
  const initial: KeyboardState = {
    owners: new Map(),
    absorbed: new Map(),
    fudgeTicks: options.fudgeTicks,
    timeline: [],
    conflicts: [],
  };
  const final = mergeInOrder(streams).reduce(applyEvent, initial);
  return { timeline: final.timeline, conflicts: final.conflicts };
}

/**
 * Stable k-way merge by tick. Ties go to the earlier stream, then to the
 * earlier event within that stream, so the same input always merges the
 * same way.
 */
export function mergeInOrder(streams: readonly (readonly NoteEvent[])[]): NoteEvent[] {
  streams.forEach((stream, s) => {
    for (let i = 1; i < stream.length; i++) {
      if (stream[i].tick < stream[i - 1].tick) {
        throw new Error(`Stream ${s} is not in tick order at index ${i}`);
      }
    }
  });

  const heads = streams.map(() => 0);
  const merged: NoteEvent[] = [];

  for (;;) {
    let best = -1;
    let bestTick = Infinity;
    for (let s = 0; s < streams.length; s++) {
      const event = streams[s][heads[s]];
      if (event !== undefined && event.tick < bestTick) {
        best = s;
        bestTick = event.tick;
      }
    }
    if (best === -1) break;
    merged.push(streams[best][heads[best]]);
    heads[best] += 1;
  }

  return merged;
}

// ─── Internal: Fold Step ────────────────────────────────────────────────────

function applyEvent(state: KeyboardState, event: NoteEvent): KeyboardState {
  if (event.kind === "press") {
    applyPress(state, event);
  } else {
    applyRelease(state, event);
  }
  return state;
}

function applyPress(state: KeyboardState, event: NoteEvent): void {
  const owner = state.owners.get(event.pitch);
  if (!owner) {
    state.owners.set(event.pitch, { source: event.source, pressTick: event.tick });
    state.timeline.push(event);
    return;
  }

  // The key stays with its owner whatever happens below.
  const gap = event.tick - owner.pressTick;
  if (!samePart(owner.source, event.source) && gap > state.fudgeTicks) {
    state.conflicts.push({
      kind: "already-pressed",
      pitch: event.pitch,
      tick: event.tick,
      source: event.source,
      owner: owner.source,
      ownerTick: owner.pressTick,
    });
  }
  state.absorbed.set(event.pitch, (state.absorbed.get(event.pitch) ?? 0) + 1);
}

function applyRelease(state: KeyboardState, event: NoteEvent): void {
  // Any release frees a held key, whichever part pressed it.
  if (state.owners.delete(event.pitch)) {
    state.timeline.push(event);
    return;
  }

  const pending = state.absorbed.get(event.pitch) ?? 0;
  if (pending > 0) {
    state.absorbed.set(event.pitch, pending - 1);
    return;
  }

  state.conflicts.push({
    kind: "not-pressed",
    pitch: event.pitch,
    tick: event.tick,
    source: event.source,
  });
}
