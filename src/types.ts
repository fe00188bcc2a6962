// ─── rollpunch: Core Types ───────────────────────────────────────────────────
//
// Parts, note events, key ownership, and the diagnostics produced while
// reducing several instrument lines to one playable roll.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Parts ──────────────────────────────────────────────────────────────────

/** One selectable instrument line: a (track, channel) pair. */
export interface Part {
  /** Zero-based track index in the source file. */
  track: number;
  /** MIDI channel (0-15). */
  channel: number;
}

/** A part picked for the mix, with its transposition. */
export interface PartSelection extends Part {
  /** Semitone shift applied to every pitch of the part. Default 0. */
  shift: number;
}

/** Display info for one part found in the source file. */
export interface PartSummary extends Part {
  name: string;
  /** Number of key presses the part plays. */
  noteCount: number;
}

// ─── Note Events ────────────────────────────────────────────────────────────

export type NoteKind = "press" | "release";

/** A key press or release with absolute timing. Never mutated after creation. */
export interface NoteEvent {
  readonly source: Part;
  /** MIDI note number, after transposition. */
  readonly pitch: number;
  readonly kind: NoteKind;
  /** Absolute tick from the start of the file. */
  readonly tick: number;
  readonly velocity: number;
}

/** The part currently holding a pressed key. */
export interface Owner {
  source: Part;
  pressTick: number;
}

// ─── Diagnostics ────────────────────────────────────────────────────────────

/** A press on a key another part was already holding. */
export interface AlreadyPressedConflict {
  kind: "already-pressed";
  pitch: number;
  tick: number;
  source: Part;
  owner: Part;
  ownerTick: number;
}

/** A release on a key nobody was holding. */
export interface NotPressedConflict {
  kind: "not-pressed";
  pitch: number;
  tick: number;
  source: Part;
}

export type Conflict = AlreadyPressedConflict | NotPressedConflict;

/** An accepted event whose pitch falls outside the roll's key range. */
export interface OutOfRange {
  kind: "out-of-range";
  pitch: number;
  tick: number;
  source: Part;
}

/** An accepted press that the timeline never releases. */
export interface UnreleasedNote {
  kind: "unreleased";
  pitch: number;
  tick: number;
  source: Part;
}

/** The roll is longer than a single page allows. */
export interface LengthWarning {
  kind: "length";
  length: number;
  limit: number;
}

export type Diagnostic =
  | Conflict
  | OutOfRange
  | UnreleasedNote
  | LengthWarning;

// ─── Helpers ────────────────────────────────────────────────────────────────

/** True when both refer to the same (track, channel). */
export function samePart(a: Part, b: Part): boolean {
  return a.track === b.track && a.channel === b.channel;
}

/** Stable map key for a part, e.g. "2:0". */
export function partKey(part: Part): string {
  return `${part.track}:${part.channel}`;
}
