import { describe, it, expect } from "vitest";
import { fudgeWindowTicks, mergeInOrder, mergeStreams } from "./merge.js";
import type { NoteEvent, Part } from "../types.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────

const A: Part = { track: 1, channel: 0 };
const B: Part = { track: 2, channel: 0 };
const C: Part = { track: 3, channel: 1 };

function press(source: Part, pitch: number, tick: number): NoteEvent {
  return { source, pitch, kind: "press", tick, velocity: 80 };
}

function release(source: Part, pitch: number, tick: number): NoteEvent {
  return { source, pitch, kind: "release", tick, velocity: 0 };
}

/** Walk a timeline and return the largest number of holders any key ever had. */
function maxHolders(timeline: readonly NoteEvent[]): number {
  const held = new Map<number, number>();
  let max = 0;
  for (const e of timeline) {
    const n = (held.get(e.pitch) ?? 0) + (e.kind === "press" ? 1 : -1);
    held.set(e.pitch, n);
    max = Math.max(max, n);
  }
  return max;
}

const FUDGE = 32; // 96 ticks per beat / 3

// ─── fudgeWindowTicks ───────────────────────────────────────────────────────

describe("fudgeWindowTicks", () => {
  it("is a third of a beat by default, rounded down", () => {
    expect(fudgeWindowTicks(96)).toBe(32);
    expect(fudgeWindowTicks(480)).toBe(160);
    expect(fudgeWindowTicks(100)).toBe(33);
  });

  it("follows the divisor", () => {
    expect(fudgeWindowTicks(96, 4)).toBe(24);
    expect(fudgeWindowTicks(96, 1)).toBe(96);
  });

  it("rejects a non-positive resolution", () => {
    expect(() => fudgeWindowTicks(0)).toThrow("Ticks per beat must be positive");
  });
});

// ─── mergeInOrder ───────────────────────────────────────────────────────────

describe("mergeInOrder", () => {
  it("merges by tick and breaks ties by stream order", () => {
    const s0 = [press(A, 60, 0), release(A, 60, 96)];
    const s1 = [press(B, 64, 0), release(B, 64, 48)];
    const merged = mergeInOrder([s0, s1]);
    expect(merged.map(e => [e.source.track, e.tick])).toEqual([
      [1, 0],
      [2, 0],
      [2, 48],
      [1, 96],
    ]);
  });

  it("keeps same-tick events of one stream in their original order", () => {
    const s0 = [press(A, 60, 0), release(A, 60, 10), press(A, 60, 10)];
    const merged = mergeInOrder([s0]);
    expect(merged.map(e => e.kind)).toEqual(["press", "release", "press"]);
  });

  it("rejects a stream that is out of tick order", () => {
    expect(() => mergeInOrder([[press(A, 60, 10), press(A, 62, 5)]]))
      .toThrow("Stream 0 is not in tick order at index 1");
  });

  it("returns nothing for no streams", () => {
    expect(mergeInOrder([])).toEqual([]);
  });
});

// ─── mergeStreams ───────────────────────────────────────────────────────────

describe("mergeStreams", () => {
  it("passes a single clean stream through unchanged", () => {
    const stream = [press(A, 60, 0), press(A, 64, 0), release(A, 60, 96), release(A, 64, 96)];
    const result = mergeStreams([stream], { fudgeTicks: FUDGE });
    expect(result.conflicts).toEqual([]);
    expect(result.timeline).toEqual(stream);
  });

  it("yields an empty timeline for no streams", () => {
    const result = mergeStreams([], { fudgeTicks: FUDGE });
    expect(result.timeline).toEqual([]);
    expect(result.conflicts).toEqual([]);
  });

  it("suppresses a second press within the fudge window and keeps the first owner", () => {
    const result = mergeStreams(
      [
        [press(A, 60, 0), release(A, 60, 96)],
        [press(B, 60, FUDGE), release(B, 60, 100)],
      ],
      { fudgeTicks: FUDGE },
    );
    expect(result.conflicts).toEqual([]);
    expect(result.timeline).toEqual([press(A, 60, 0), release(A, 60, 96)]);
  });

  it("reports a press just past the fudge window, and still keeps the first owner", () => {
    const result = mergeStreams(
      [
        [press(A, 60, 0), release(A, 60, 96)],
        [press(B, 60, FUDGE + 1), release(B, 60, 100)],
      ],
      { fudgeTicks: FUDGE },
    );
    expect(result.conflicts).toEqual([
      { kind: "already-pressed", pitch: 60, tick: 33, source: B, owner: A, ownerTick: 0 },
    ]);
    expect(result.timeline).toEqual([press(A, 60, 0), release(A, 60, 96)]);
  });

  it("does not report a repress by the owning part", () => {
    const result = mergeStreams(
      [[press(A, 60, 0), press(A, 60, 200), release(A, 60, 300), release(A, 60, 310)]],
      { fudgeTicks: FUDGE },
    );
    expect(result.conflicts).toEqual([]);
    expect(result.timeline).toEqual([press(A, 60, 0), release(A, 60, 300)]);
  });

  it("reports a release with no press and drops it", () => {
    const result = mergeStreams([[release(A, 62, 10), press(A, 60, 20), release(A, 60, 40)]], { fudgeTicks: FUDGE });
    expect(result.conflicts).toEqual([
      { kind: "not-pressed", pitch: 62, tick: 10, source: A },
    ]);
    expect(result.timeline).toEqual([press(A, 60, 20), release(A, 60, 40)]);
  });

  it("lets any part release a held key", () => {
    const result = mergeStreams(
      [
        [press(A, 60, 0), release(A, 60, 96)],
        [press(B, 60, 10), release(B, 60, 50)],
      ],
      { fudgeTicks: FUDGE },
    );
    expect(result.conflicts).toEqual([]);
    // B's release frees the key A pressed; A's later release pairs with B's absorbed press.
    expect(result.timeline).toEqual([press(A, 60, 0), release(B, 60, 50)]);
  });

  it("frees the key for a new owner after release", () => {
    const result = mergeStreams(
      [
        [press(A, 60, 0), release(A, 60, 96)],
        [press(B, 60, 96), release(B, 60, 192)],
      ],
      { fudgeTicks: FUDGE },
    );
    expect(result.conflicts).toEqual([]);
    expect(result.timeline).toEqual([
      press(A, 60, 0),
      release(A, 60, 96),
      press(B, 60, 96),
      release(B, 60, 192),
    ]);
  });

  it("reports a same-tick hand-over when the later stream presses first", () => {
    // Stream order puts B's press ahead of A's release at tick 96.
    const result = mergeStreams(
      [
        [press(B, 60, 96), release(B, 60, 192)],
        [press(A, 60, 0), release(A, 60, 96)],
      ],
      { fudgeTicks: FUDGE },
    );
    expect(result.conflicts).toEqual([
      { kind: "already-pressed", pitch: 60, tick: 96, source: B, owner: A, ownerTick: 0 },
    ]);
    expect(result.timeline).toEqual([press(A, 60, 0), release(A, 60, 96)]);
  });

  it("keeps different keys independent", () => {
    const result = mergeStreams(
      [
        [press(A, 60, 0), release(A, 60, 96)],
        [press(B, 62, 50), release(B, 62, 96)],
      ],
      { fudgeTicks: FUDGE },
    );
    expect(result.conflicts).toEqual([]);
    expect(result.timeline).toHaveLength(4);
  });

  it("never gives a key two holders across three overlapping parts", () => {
    const result = mergeStreams(
      [
        [press(A, 60, 0), release(A, 60, 100), press(A, 60, 200), release(A, 60, 300)],
        [press(B, 60, 10), release(B, 60, 150), press(B, 60, 250), release(B, 60, 260)],
        [press(C, 60, 90), release(C, 60, 210)],
      ],
      { fudgeTicks: FUDGE },
    );
    expect(maxHolders(result.timeline)).toBe(1);
    const ticks = result.timeline.map(e => e.tick);
    expect(ticks).toEqual([...ticks].sort((a, b) => a - b));
  });

  it("yields zero conflicts when re-run on its own output", () => {
    const first = mergeStreams(
      [
        [press(A, 60, 0), release(A, 60, 100), release(A, 61, 120), press(A, 62, 130), release(A, 62, 140)],
        [press(B, 60, 50), release(B, 60, 150), press(B, 61, 160), release(B, 61, 170)],
      ],
      { fudgeTicks: FUDGE },
    );
    expect(first.conflicts.length).toBeGreaterThan(0);

    const second = mergeStreams([first.timeline], { fudgeTicks: FUDGE });
    expect(second.conflicts).toEqual([]);
    expect(second.timeline).toEqual(first.timeline);
  });

  it("does not modify its input streams", () => {
    const stream = [press(A, 60, 0), press(A, 60, 10), release(A, 60, 20)];
    const copy = stream.map(e => ({ ...e }));
    mergeStreams([stream], { fudgeTicks: FUDGE });
    expect(stream).toEqual(copy);
  });
});
