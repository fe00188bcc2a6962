// ─── Part Selection & Transposition ──────────────────────────────────────────
//
// Parses operator selectors like "2,0" or "1,3-12" and cuts the decoded
// performance into one transposed event stream per selection.
// ─────────────────────────────────────────────────────────────────────────────

import { ParseError, SelectionError } from "./errors.js";
import { partKey, samePart } from "./types.js";
import type { NoteEvent, PartSelection } from "./types.js";
import type { ParsedPerformance } from "./midi/types.js";

const MAX_CHANNEL = 15;
const MAX_SHIFT = 127;

/** One selected part's events, already transposed. */
export interface PartStream {
  selection: PartSelection;
  events: NoteEvent[];
}

// ─── Parsing ────────────────────────────────────────────────────────────────

/**
 * Parse a `track,channel[+shift|-shift]` selector.
 *
 *   "2,0"    → track 2, channel 0, no shift
 *   "1,3+12" → track 1, channel 3, up an octave
 *   "1,3-5"  → track 1, channel 3, down a fourth
 */
export function parseSelector(arg: string): PartSelection {
  function fail(reason: string): never {
    throw new ParseError(`malformed track selector "${arg}": ${reason}`);
  }

  const comma = arg.indexOf(",");
  if (comma === -1) fail("expected a ','");

  const trackStr = arg.slice(0, comma);
  const rest = arg.slice(comma + 1);
  const signAt = rest.search(/[+-]/);
  const channelStr = signAt === -1 ? rest : rest.slice(0, signAt);
  const shiftStr = signAt === -1 ? undefined : rest.slice(signAt);

  if (!/^\d+$/.test(trackStr)) fail(`bad track number "${trackStr}"`);
  if (!/^\d+$/.test(channelStr)) fail(`bad channel number "${channelStr}"`);

  const track = parseInt(trackStr, 10);
  const channel = parseInt(channelStr, 10);
  if (channel > MAX_CHANNEL) fail(`channel ${channel} is above ${MAX_CHANNEL}`);

  let shift = 0;
  if (shiftStr !== undefined) {
    if (!/^[+-]\d+$/.test(shiftStr)) fail(`bad offset number "${shiftStr}"`);
    shift = parseInt(shiftStr, 10);
    if (Math.abs(shift) > MAX_SHIFT) fail(`offset ${shift} is beyond ±${MAX_SHIFT}`);
  }

  return { track, channel, shift };
}

/** Parse a `/N` compression divisor. N must be a positive number. */
export function parseDivisor(arg: string): number {
  const match = arg.match(/^\/(\d+(?:\.\d+)?)$/);
  const divisor = match ? parseFloat(match[1]) : NaN;
  if (!(divisor > 0)) {
    throw new ParseError(`time divisor parse error: "${arg}" is not a positive number after '/'`);
  }
  return divisor;
}

// ─── Selection ──────────────────────────────────────────────────────────────

/**
 * Build one event stream per selection, in selection order, with every
 * pitch shifted by the selection's offset. The source events are not
 * touched; each stream holds fresh event objects.
 *
 * An empty selection list gives no streams. Selecting a part the file does
 * not contain throws SelectionError.
 */
export function selectParts(
  performance: ParsedPerformance,
  selections: readonly PartSelection[],
): PartStream[] {
  const known = new Set(performance.channels.map(partKey));

  return selections.map(selection => {
    if (!known.has(partKey(selection))) {
      throw new SelectionError(selection.track, selection.channel);
    }
    const events = performance.events
      .filter(e => samePart(e.source, selection))
      .map((e): NoteEvent => ({ ...e, pitch: e.pitch + selection.shift }));
    return { selection, events };
  });
}
