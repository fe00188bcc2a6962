import { describe, it, expect } from "vitest";
import { writeMidi } from "midi-file";
import { arrangeRoll, buildArtifacts } from "./arrange.js";
import { formatArrangementReport } from "./report.js";
import { parsePerformance } from "./midi/parser.js";
import { SelectionError } from "./errors.js";
import { DEFAULT_ROLL_CONFIG } from "./config/schema.js";
import { buildMidi } from "./test-support/midi-fixtures.js";
import type { Part, PartSelection } from "./types.js";

// ─── Fixture ────────────────────────────────────────────────────────────────
//
// Three parts at 120 BPM, 96 ticks per beat (fudge window 32 ticks):
//   1,0  C4 then E4, one beat each
//   2,0  doubles C4 ten ticks late (inside the window) and E4 54 ticks late
//   3,1  a long C3 under a G#0 that is below the roll

const MELODY: Part = { track: 1, channel: 0 };
const HARMONY: Part = { track: 2, channel: 0 };
const BASS: Part = { track: 3, channel: 1 };

const perf = parsePerformance(buildMidi({
  ticksPerBeat: 96,
  tracks: [
    { name: "Conductor" },
    {
      name: "Melody",
      notes: [
        { channel: 0, pitch: 60, start: 0, end: 96 },
        { channel: 0, pitch: 64, start: 96, end: 192 },
      ],
    },
    {
      name: "Harmony",
      notes: [
        { channel: 0, pitch: 60, start: 10, end: 96 },
        { channel: 0, pitch: 64, start: 150, end: 192 },
      ],
    },
    {
      name: "Bass",
      notes: [
        { channel: 1, pitch: 48, start: 0, end: 192 },
        { channel: 1, pitch: 20, start: 0, end: 96 },
      ],
    },
  ],
}));

const ALL: PartSelection[] = [
  { ...MELODY, shift: 0 },
  { ...HARMONY, shift: 0 },
  { ...BASS, shift: 0 },
];

// ─── arrangeRoll ────────────────────────────────────────────────────────────

describe("arrangeRoll", () => {
  it("lists every part and the selected press counts", () => {
    const arrangement = arrangeRoll(perf, { selections: ALL });
    expect(arrangement.parts.map(p => `${p.track},${p.channel} ${p.name}`)).toEqual([
      "1,0 Melody",
      "2,0 Harmony",
      "3,1 Bass",
    ]);
    expect(arrangement.selected.map(s => s.noteCount)).toEqual([2, 2, 2]);
    expect(arrangement.fudgeTicks).toBe(32);
  });

  it("reports only the late doubling and the notes below the roll", () => {
    const arrangement = arrangeRoll(perf, { selections: ALL });
    expect(arrangement.diagnostics).toEqual([
      { kind: "already-pressed", pitch: 64, tick: 150, source: HARMONY, owner: MELODY, ownerTick: 96 },
      { kind: "out-of-range", pitch: 20, tick: 0, source: BASS },
      { kind: "out-of-range", pitch: 20, tick: 96, source: BASS },
    ]);
  });

  it("keeps one holder per key and drops out-of-range events", () => {
    const arrangement = arrangeRoll(perf, { selections: ALL });
    expect(arrangement.merged).toHaveLength(8);
    expect(arrangement.timeline.map(e => `${e.kind} ${e.pitch}@${e.tick}`)).toEqual([
      "press 60@0",
      "press 48@0",
      "release 60@96",
      "press 64@96",
      "release 64@192",
      "release 48@192",
    ]);
  });

  it("lays out segments and halves the length at divisor 2", () => {
    const full = arrangeRoll(perf, { selections: ALL });
    const half = arrangeRoll(perf, { selections: ALL, divisor: 2 });
    expect(half.geometry.segments.map(s => [s.pitch, s.startTick, s.endTick])).toEqual([
      [48, 0, 192],
      [60, 0, 96],
      [64, 96, 192],
    ]);
    expect(full.geometry.totalLength).toBeCloseTo(1, 10);
    expect(half.geometry.totalLength).toBeCloseTo(0.5, 10);
  });

  it("brings a low part into range by transposing it", () => {
    const arrangement = arrangeRoll(perf, { selections: [{ ...BASS, shift: 12 }] });
    expect(arrangement.diagnostics).toEqual([]);
    expect(arrangement.geometry.segments.map(s => s.pitch)).toEqual([32, 60]);
  });

  it("warns when the roll does not fit the page", () => {
    const config = { ...DEFAULT_ROLL_CONFIG, lengthLimit: 0.5 };
    const arrangement = arrangeRoll(perf, { selections: ALL, config });
    expect(arrangement.diagnostics.at(-1)).toEqual({
      kind: "length",
      length: arrangement.geometry.totalLength,
      limit: 0.5,
    });
  });

  it("gives an empty roll for no selections", () => {
    const arrangement = arrangeRoll(perf, { selections: [] });
    expect(arrangement.timeline).toEqual([]);
    expect(arrangement.diagnostics).toEqual([]);
    expect(arrangement.geometry.totalLength).toBe(0);
  });

  it("keeps both notes when a part re-strikes a key on the tick it lets go", () => {
    const restruck = parsePerformance(new Uint8Array(writeMidi({
      header: { format: 0, numTracks: 1, ticksPerBeat: 96 },
      tracks: [[
        { deltaTime: 0, type: "noteOn", channel: 0, noteNumber: 60, velocity: 80 },
        { deltaTime: 96, type: "noteOn", channel: 0, noteNumber: 60, velocity: 80 },
        { deltaTime: 0, type: "noteOff", channel: 0, noteNumber: 60, velocity: 0 },
        { deltaTime: 96, type: "noteOff", channel: 0, noteNumber: 60, velocity: 0 },
        { deltaTime: 0, meta: true, type: "endOfTrack" },
      ]],
    })));
    const arrangement = arrangeRoll(restruck, { selections: [{ track: 0, channel: 0, shift: 0 }] });
    expect(arrangement.diagnostics).toEqual([]);
    expect(arrangement.geometry.segments.map(s => [s.startTick, s.endTick])).toEqual([
      [0, 96],
      [96, 192],
    ]);
  });

  it("fails on an unknown part", () => {
    expect(() => arrangeRoll(perf, { selections: [{ track: 9, channel: 0, shift: 0 }] }))
      .toThrow(SelectionError);
  });
});

// ─── Report & Artifacts ─────────────────────────────────────────────────────

describe("end to end", () => {
  it("prints the diagnostics and the roll length", () => {
    const arrangement = arrangeRoll(perf, { selections: ALL, divisor: 2 });
    expect(formatArrangementReport(arrangement)).toEqual([
      "ERROR: at 150, note E4 on track 2 channel 0 already pressed at 96 by 1,0",
      "ERROR: at 0, note G#0 on track 3 channel 1 is outside of piano roll range",
      "ERROR: at 96, note G#0 on track 3 channel 1 is outside of piano roll range",
      "Roll length: 0.50 in",
    ]);
  });

  it("writes a merged file holding only the accepted events", () => {
    const arrangement = arrangeRoll(perf, { selections: ALL, divisor: 2 });
    const { midi } = buildArtifacts(perf, arrangement);
    const merged = parsePerformance(midi);
    expect(merged.ticksPerBeat).toBe(96);
    expect(merged.bpm).toBe(120);
    expect(merged.events.map(e => `${e.kind} ${e.pitch}@${e.tick}`)).toEqual(
      arrangement.timeline.map(e => `${e.kind} ${e.pitch}@${e.tick}`),
    );
    expect(arrangeRoll(merged, { selections: [{ track: 1, channel: 0, shift: 0 }] }).diagnostics).toEqual([]);
  });

  it("renders a page with one slot per segment and the run facts", () => {
    const arrangement = arrangeRoll(perf, { selections: ALL, divisor: 2 });
    const { page } = buildArtifacts(perf, arrangement, { title: "Three parts" });
    expect(page.split(`fill="#1c1c1c"`)).toHaveLength(4);
    expect(page).toContain(">Three parts</text>");
    expect(page).toContain(">120 BPM | 96 ticks/beat | divisor 2 | 0.50 in</text>");
  });
});
