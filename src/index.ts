// ─── rollpunch ──────────────────────────────────────────────────────────────
//
// Merge instrument parts of a MIDI file into one playable piano roll:
// a single-holder press/release timeline, its page geometry, and a merged
// MIDI file.
//
// Usage:
//   import { readPerformance, arrangeRoll, buildArtifacts } from "rollpunch";
// ─────────────────────────────────────────────────────────────────────────────

// Pipeline
export { arrangeRoll, buildArtifacts } from "./arrange.js";
export type { Arrangement, ArrangeOptions, RollArtifacts } from "./arrange.js";

// MIDI in and out
export { parsePerformance, readPerformance, DEFAULT_MICROSECONDS_PER_BEAT } from "./midi/parser.js";
export { summarizeParts, programName } from "./midi/parts.js";
export { writeTimelineMidi } from "./midi/writer.js";
export type { MidiWriteOptions } from "./midi/writer.js";
export type { ParsedPerformance, TrackInfo, ChannelInfo } from "./midi/types.js";

// Selection
export { parseSelector, parseDivisor, selectParts } from "./selection.js";
export type { PartStream } from "./selection.js";

// Roll engine
export { mergeStreams, mergeInOrder, fudgeWindowTicks } from "./roll/merge.js";
export type { MergeOptions, MergeResult } from "./roll/merge.js";
export { validateRange, inRollRange, pitchRow, LOWEST_PITCH, HIGHEST_PITCH, ROW_COUNT } from "./roll/range.js";
export type { RangeResult } from "./roll/range.js";
export { computeRollGeometry, lengthPerBeat } from "./roll/geometry.js";
export type { GeometryOptions, RollGeometry, RollSegment } from "./roll/geometry.js";
export { renderRollPage } from "./roll/render.js";
export type { RollPageOptions } from "./roll/render.js";

// Report
export {
  formatDiagnostic,
  formatPerformanceSummary,
  formatPartTable,
  formatArrangementReport,
} from "./report.js";

// Config
export { RollConfigSchema, DEFAULT_ROLL_CONFIG, validateConfig } from "./config/schema.js";
export type { RollConfig, ConfigError } from "./config/schema.js";
export { loadRollConfig } from "./config/loader.js";

// Errors, names, types
export { ParseError, SelectionError } from "./errors.js";
export { midiToNoteName, isBlackKey } from "./note-names.js";
export { samePart, partKey } from "./types.js";
export type {
  Part,
  PartSelection,
  PartSummary,
  NoteKind,
  NoteEvent,
  Owner,
  Conflict,
  AlreadyPressedConflict,
  NotPressedConflict,
  OutOfRange,
  UnreleasedNote,
  LengthWarning,
  Diagnostic,
} from "./types.js";
