// ─── Console Report ──────────────────────────────────────────────────────────
//
// Turns performances, part lists and diagnostics into report lines. Pure:
// callers print the lines wherever they like.
// ─────────────────────────────────────────────────────────────────────────────

import type { Arrangement } from "./arrange.js";
import type { ParsedPerformance } from "./midi/types.js";
import { midiToNoteName } from "./note-names.js";
import type { Diagnostic, Part, PartSummary } from "./types.js";

function where(part: Part): string {
  return `track ${part.track} channel ${part.channel}`;
}

function formatLength(length: number): string {
  return length.toFixed(2);
}

/** One report line per diagnostic. */
export function formatDiagnostic(d: Diagnostic): string {
  switch (d.kind) {
    case "already-pressed":
      return `ERROR: at ${d.tick}, note ${midiToNoteName(d.pitch)} on ${where(d.source)} already pressed at ${d.ownerTick} by ${d.owner.track},${d.owner.channel}`;
    case "not-pressed":
      return `ERROR: at ${d.tick} on ${where(d.source)}, note ${midiToNoteName(d.pitch)} is not pressed yet`;
    case "out-of-range":
      return `ERROR: at ${d.tick}, note ${midiToNoteName(d.pitch)} on ${where(d.source)} is outside of piano roll range`;
    case "unreleased":
      return `WARNING: note ${midiToNoteName(d.pitch)} pressed at ${d.tick} on ${where(d.source)} is never released`;
    case "length":
      return `WARNING: roll length ${formatLength(d.length)} in exceeds page limit of ${d.limit} in`;
  }
}

/** File-level facts, then any decode warnings. */
export function formatPerformanceSummary(performance: ParsedPerformance): string[] {
  const formatName =
    performance.format === 0 ? "single track" :
    performance.format === 1 ? `multiple track (${performance.trackCount})` :
    performance.format === 2 ? `multiple song (${performance.trackCount})` :
    "unknown";

  return [
    `MIDI file format: ${formatName}`,
    `${performance.ticksPerBeat} MIDI ticks per metronome beat`,
    `Tempo: ${performance.bpm} beats per minute`,
    ...performance.texts,
    ...performance.warnings.map(w => `WARNING: ${w}`),
  ];
}

/** One line per part: name and press count. */
export function formatPartTable(parts: readonly PartSummary[]): string[] {
  if (parts.length === 0) return ["No parts with notes in this file."];
  return parts.map(p => `track ${p.track}, channel ${p.channel} (${p.name}): ${p.noteCount} notes`);
}

/**
 * Diagnostics in pipeline order, then the roll length, then the length
 * warning if the roll does not fit the page.
 */
export function formatArrangementReport(arrangement: Arrangement): string[] {
  const lines: string[] = [];
  for (const d of arrangement.diagnostics) {
    if (d.kind !== "length") lines.push(formatDiagnostic(d));
  }
  lines.push(`Roll length: ${formatLength(arrangement.geometry.totalLength)} in`);
  if (arrangement.geometry.warning) {
    lines.push(formatDiagnostic(arrangement.geometry.warning));
  }
  return lines;
}
