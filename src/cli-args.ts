// ─── Roll Command Arguments ──────────────────────────────────────────────────
//
//   rollpunch roll <file.mid> [t,c[+s|-s] ...] [/divisor] [-o page.svg]
//                  [--midi-out merged.mid] [--config roll.json]
// ─────────────────────────────────────────────────────────────────────────────

import { join, parse } from "node:path";
import { ParseError } from "./errors.js";
import { parseDivisor, parseSelector } from "./selection.js";
import type { PartSelection } from "./types.js";

export interface RollCommand {
  input: string;
  /** SVG page path. */
  output: string;
  /** Merged MIDI path. */
  midiOutput: string;
  configPath?: string;
  selections: PartSelection[];
  divisor: number;
}

const VALUE_FLAGS = ["-o", "--output", "--midi-out", "--config"] as const;
type ValueFlag = typeof VALUE_FLAGS[number];

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAGS.some(flag => flag === arg);
}

/** `song.mid` → `song.svg`, in the same directory. */
export function defaultPagePath(input: string): string {
  const p = parse(input);
  return join(p.dir, `${p.name}.svg`);
}

/** `song.svg` → `song.merged.mid`, so the source file is never overwritten. */
export function defaultMidiPath(pagePath: string): string {
  const p = parse(pagePath);
  return join(p.dir, `${p.name}.merged.mid`);
}

/** Parse the arguments after `roll`. Throws ParseError on bad syntax. */
export function parseRollArgs(args: readonly string[]): RollCommand {
  let input: string | undefined;
  let divisor: number | undefined;
  const values = new Map<ValueFlag, string>();
  const selections: PartSelection[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (isValueFlag(arg)) {
      const value = args[i + 1];
      if (value === undefined) {
        throw new ParseError(`${arg} must be followed by another argument`);
      }
      values.set(arg, value);
      i += 1;
    } else if (arg.startsWith("--")) {
      throw new ParseError(`unknown option "${arg}"`);
    } else if (input === undefined) {
      input = arg;
    } else if (arg.startsWith("/")) {
      if (divisor !== undefined) {
        throw new ParseError(`time divisor given twice ("${arg}")`);
      }
      divisor = parseDivisor(arg);
    } else {
      selections.push(parseSelector(arg));
    }
  }

  if (input === undefined) {
    throw new ParseError("missing input argument");
  }

  const output = values.get("-o") ?? values.get("--output") ?? defaultPagePath(input);
  return {
    input,
    output,
    midiOutput: values.get("--midi-out") ?? defaultMidiPath(output),
    configPath: values.get("--config"),
    selections,
    divisor: divisor ?? 1,
  };
}
