// ─── rollpunch: Note Names ───────────────────────────────────────────────────
//
// MIDI note numbers as scientific pitch names, for reports and the page.
// ─────────────────────────────────────────────────────────────────────────────

const NOTE_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"] as const;

/**
 * Convert a MIDI note number to a note name (for display).
 *
 * 60 → "C4", 69 → "A4", 78 → "F#5". Transposition can push a pitch below 0,
 * so negative numbers get a negative octave too: -1 → "B-2".
 */
export function midiToNoteName(midi: number): string {
  const octave = Math.floor(midi / 12) - 1;
  const noteIndex = ((midi % 12) + 12) % 12;
  return `${NOTE_NAMES[noteIndex]}${octave}`;
}

/** Check if a MIDI note is a black key. */
export function isBlackKey(midi: number): boolean {
  const pc = ((midi % 12) + 12) % 12;
  return [1, 3, 6, 8, 10].includes(pc); // C#, D#, F#, G#, A#
}
