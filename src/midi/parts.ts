// ─── Part Summaries ──────────────────────────────────────────────────────────
//
// Names each (track, channel) in a decoded file and counts its presses, so
// an operator can decide which parts to put on the roll.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { partKey, type PartSummary } from "../types.js";
import type { ParsedPerformance } from "./types.js";

const PERCUSSION_CHANNEL = 9;

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROGRAM_NAMES_PATH = join(__dirname, "..", "..", "data", "gm-programs.json");

const ProgramNamesSchema = z.array(z.string().min(1)).length(128);

let programNames: string[] | null = null;

/** General MIDI name for a program number (0-127). */
export function programName(program: number): string | undefined {
  if (programNames === null) {
    programNames = ProgramNamesSchema.parse(JSON.parse(readFileSync(PROGRAM_NAMES_PATH, "utf8")));
  }
  return programNames[program];
}

/**
 * List every part of the file, in (track, channel) order.
 *
 * Display name: the track's instrument name, else its track name, else the
 * General MIDI name of the channel's program. Channel 10 (index 9) with no
 * names is "Percussion".
 */
export function summarizeParts(performance: ParsedPerformance): PartSummary[] {
  const counts = new Map<string, number>();
  for (const event of performance.events) {
    if (event.kind !== "press") continue;
    const key = partKey(event.source);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  const tracks = new Map(performance.tracks.map(t => [t.track, t]));

  return performance.channels.map(ch => {
    const info = tracks.get(ch.track);
    let name = info?.instrument ?? info?.name;
    if (name === undefined) {
      if (ch.channel === PERCUSSION_CHANNEL) {
        name = "Percussion";
      } else if (ch.program !== undefined) {
        name = programName(ch.program);
      }
    }
    return {
      track: ch.track,
      channel: ch.channel,
      name: name ?? "unnamed",
      noteCount: counts.get(partKey(ch)) ?? 0,
    };
  });
}
