// ─── Roll Page Renderer ──────────────────────────────────────────────────────
//
// Pure SVG string generator for the punch/print page. One page holds the
// whole roll: the page is sized in inches to fit every column across and
// the full roll length down.
//
// Layout:
//   X-axis = key column (C1 at left, G7 at right)
//   Y-axis = time (start of the piece at top)
//   Dark slots = held keys, one per segment
//   Shaded lanes under black-key columns
//   Thin vertical guides on every C column
//   Title and tempo/length line in the header
// ─────────────────────────────────────────────────────────────────────────────

import { isBlackKey, midiToNoteName } from "../note-names.js";
import { DEFAULT_ROLL_CONFIG } from "../config/schema.js";
import type { RollGeometry } from "./geometry.js";
import { LOWEST_PITCH, ROW_COUNT } from "./range.js";

// ─── Types ──────────────────────────────────────────────────────────────────

export interface RollPageOptions {
  /** First header line. Default: "Piano roll" */
  title?: string;
  /** Second header line, e.g. tempo and divisor. Default: none */
  subtitle?: string;
  /** Blank border on every side, in inches. Default: 0.5 */
  margin?: number;
  /** Drawn width of each slot, in inches. Default: 0.09 */
  holeWidth?: number;
}

// ─── Theme ──────────────────────────────────────────────────────────────────

const COLORS = {
  paper: "#f6f1e4",
  hole: "#1c1c1c",
  guide: "#d8ccb0",
  blackKeyLane: "#ece4d0",
  text: "#555555",
  headerText: "#222222",
};

const POINTS_PER_INCH = 72;
const HEADER_HEIGHT = 0.5; // inches

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Inches → SVG user units, rounded to hundredths. */
function pt(n: number): number {
  return Math.round(n * POINTS_PER_INCH * 100) / 100;
}

/** Page dimension in inches, to a thousandth. */
function inches(n: number): number {
  return Math.round(n * 1000) / 1000;
}

/** XML-escape a string for SVG text content. */
function esc(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Render roll geometry as a single-page SVG document string.
 *
 * No file I/O; the caller decides where the page goes.
 */
export function renderRollPage(geometry: RollGeometry, options?: RollPageOptions): string {
  const opts = {
    title: options?.title ?? "Piano roll",
    subtitle: options?.subtitle,
    margin: options?.margin ?? DEFAULT_ROLL_CONFIG.margin,
    holeWidth: options?.holeWidth ?? DEFAULT_ROLL_CONFIG.holeWidth,
  };

  const columnSpacing = geometry.width / ROW_COUNT;
  const pageWidth = geometry.width + opts.margin * 2;
  const pageHeight = geometry.totalLength + HEADER_HEIGHT + opts.margin * 2;
  const gridX = opts.margin;
  const gridY = opts.margin + HEADER_HEIGHT;

  const lines: string[] = [];
  lines.push(`<svg xmlns="http://www.w3.org/2000/svg" width="${inches(pageWidth)}in" height="${inches(pageHeight)}in" viewBox="0 0 ${pt(pageWidth)} ${pt(pageHeight)}">`);
  lines.push(`<rect width="${pt(pageWidth)}" height="${pt(pageHeight)}" fill="${COLORS.paper}"/>`);

  // ── Header ──
  lines.push(`<text x="${pt(gridX)}" y="${pt(opts.margin + 0.2)}" fill="${COLORS.headerText}" font-family="monospace" font-size="12" font-weight="bold">${esc(opts.title)}</text>`);
  if (opts.subtitle) {
    lines.push(`<text x="${pt(gridX)}" y="${pt(opts.margin + 0.4)}" fill="${COLORS.text}" font-family="monospace" font-size="9">${esc(opts.subtitle)}</text>`);
  }

  // ── Black key lanes ──
  for (let row = 0; row < ROW_COUNT; row++) {
    if (!isBlackKey(LOWEST_PITCH + row)) continue;
    lines.push(`<rect x="${pt(gridX + row * columnSpacing)}" y="${pt(gridY)}" width="${pt(columnSpacing)}" height="${pt(geometry.totalLength)}" fill="${COLORS.blackKeyLane}"/>`);
  }

  // ── Octave guides ──
  for (let row = 0; row < ROW_COUNT; row++) {
    if ((LOWEST_PITCH + row) % 12 !== 0) continue;
    const x = pt(gridX + row * columnSpacing + columnSpacing / 2);
    lines.push(`<line x1="${x}" y1="${pt(gridY)}" x2="${x}" y2="${pt(gridY + geometry.totalLength)}" stroke="${COLORS.guide}" stroke-width="0.5"/>`);
  }

  if (geometry.segments.length === 0) {
    lines.push(`<text x="${pt(pageWidth / 2)}" y="${pt(gridY + 0.2)}" text-anchor="middle" fill="${COLORS.text}" font-family="monospace" font-size="10">No notes on the roll</text>`);
  }

  // ── Slots ──
  const inset = (columnSpacing - opts.holeWidth) / 2;
  for (const seg of geometry.segments) {
    const x = pt(gridX + seg.x + inset);
    const y = pt(gridY + seg.top);
    const h = pt(seg.bottom - seg.top);
    lines.push(`<rect x="${x}" y="${y}" width="${pt(opts.holeWidth)}" height="${h}" fill="${COLORS.hole}">`);
    lines.push(`  <title>${midiToNoteName(seg.pitch)}: ticks ${seg.startTick}–${seg.endTick}</title>`);
    lines.push(`</rect>`);
  }

  lines.push(`</svg>`);
  return lines.join("\n");
}
