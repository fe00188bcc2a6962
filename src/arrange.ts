// ─── Roll Arrangement Pipeline ───────────────────────────────────────────────
//
// selection → merge → range check → geometry, then the two artifacts:
// the SVG page and the merged MIDI file. Only SelectionError escapes;
// every other problem comes back as a Diagnostic next to the output.
// ─────────────────────────────────────────────────────────────────────────────

import { DEFAULT_ROLL_CONFIG, type RollConfig } from "./config/schema.js";
import { summarizeParts } from "./midi/parts.js";
import type { ParsedPerformance } from "./midi/types.js";
import { writeTimelineMidi } from "./midi/writer.js";
import { computeRollGeometry, type RollGeometry } from "./roll/geometry.js";
import { fudgeWindowTicks, mergeStreams } from "./roll/merge.js";
import { validateRange } from "./roll/range.js";
import { renderRollPage } from "./roll/render.js";
import { selectParts } from "./selection.js";
import type {
  Conflict,
  Diagnostic,
  NoteEvent,
  OutOfRange,
  PartSelection,
  PartSummary,
} from "./types.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface ArrangeOptions {
  selections: readonly PartSelection[];
  /** Compression divisor. Default: 1 */
  divisor?: number;
  config?: RollConfig;
}

export interface Arrangement {
  parts: PartSummary[];
  /** Press count of each selected stream, in selection order. */
  selected: { selection: PartSelection; noteCount: number }[];
  fudgeTicks: number;
  /** Merged timeline, before the range check. */
  merged: readonly NoteEvent[];
  /** What goes on the roll and into the merged file. */
  timeline: readonly NoteEvent[];
  conflicts: readonly Conflict[];
  violations: readonly OutOfRange[];
  geometry: RollGeometry;
  /** Conflicts, then range violations, unreleased notes, length warning. */
  diagnostics: Diagnostic[];
}

export interface RollArtifacts {
  page: string;
  midi: Uint8Array;
}

// ─── Public API ─────────────────────────────────────────────────────────────

/** Run the whole reduction for one performance and selection list. */
export function arrangeRoll(performance: ParsedPerformance, options: ArrangeOptions): Arrangement {
  const config = options.config ?? DEFAULT_ROLL_CONFIG;
  const streams = selectParts(performance, options.selections);

  const fudgeTicks = fudgeWindowTicks(performance.ticksPerBeat, config.fudgeBeatDivisor);
  const merged = mergeStreams(streams.map(s => s.events), { fudgeTicks });
  const ranged = validateRange(merged.timeline);

  const geometry = computeRollGeometry(ranged.timeline, {
    ticksPerBeat: performance.ticksPerBeat,
    microsecondsPerBeat: performance.microsecondsPerBeat,
    divisor: options.divisor ?? 1,
    rollSpeed: config.rollSpeed,
    columnSpacing: config.columnSpacing,
    lengthLimit: config.lengthLimit,
  });

  const diagnostics: Diagnostic[] = [
    ...merged.conflicts,
    ...ranged.violations,
    ...geometry.unreleased,
  ];
  if (geometry.warning) diagnostics.push(geometry.warning);

  return {
    parts: summarizeParts(performance),
    selected: streams.map(s => ({
      selection: s.selection,
      noteCount: s.events.filter(e => e.kind === "press").length,
    })),
    fudgeTicks,
    merged: merged.timeline,
    timeline: ranged.timeline,
    conflicts: merged.conflicts,
    violations: ranged.violations,
    geometry,
    diagnostics,
  };
}

/** Render the page and encode the merged MIDI for an arrangement. */
export function buildArtifacts(
  performance: ParsedPerformance,
  arrangement: Arrangement,
  options?: { title?: string; config?: RollConfig },
): RollArtifacts {
  const config = options?.config ?? DEFAULT_ROLL_CONFIG;
  const { geometry } = arrangement;

  const page = renderRollPage(geometry, {
    title: options?.title,
    subtitle: `${performance.bpm} BPM | ${performance.ticksPerBeat} ticks/beat | divisor ${geometry.divisor} | ${geometry.totalLength.toFixed(2)} in`,
    margin: config.margin,
    holeWidth: config.holeWidth,
  });

  const midi = writeTimelineMidi(arrangement.timeline, {
    ticksPerBeat: performance.ticksPerBeat,
    microsecondsPerBeat: performance.microsecondsPerBeat,
    velocity: config.outputVelocity,
    program: config.outputProgram,
  });

  return { page, midi };
}
