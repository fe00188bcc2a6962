#!/usr/bin/env node
// ─── rollpunch: CLI Entry Point ──────────────────────────────────────────────
//
// Usage:
//   rollpunch                          # Show help
//   rollpunch parts <file.mid>         # List tracks/channels with names and note counts
//   rollpunch roll <file.mid> 1,0 2,0+12 /2
//                                      # Merge parts onto one roll, compress by 2
//   rollpunch roll <file.mid> 1,0 -o page.svg --midi-out merged.mid --config roll.json
// ─────────────────────────────────────────────────────────────────────────────

import { writeFileSync } from "node:fs";
import { basename } from "node:path";
import { arrangeRoll, buildArtifacts } from "./arrange.js";
import { parseRollArgs } from "./cli-args.js";
import { loadRollConfig } from "./config/loader.js";
import { ParseError, SelectionError } from "./errors.js";
import { readPerformance } from "./midi/parser.js";
import { summarizeParts } from "./midi/parts.js";
import {
  formatArrangementReport,
  formatPartTable,
  formatPerformanceSummary,
} from "./report.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function printLines(lines: readonly string[]): void {
  for (const line of lines) console.log(line);
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

// ─── Commands ───────────────────────────────────────────────────────────────

async function cmdParts(args: string[]): Promise<void> {
  const input = args[0];
  if (!input) fail("Usage: rollpunch parts <file.mid>");

  const performance = await readPerformance(input);
  printLines(formatPerformanceSummary(performance));
  console.log();
  printLines(formatPartTable(summarizeParts(performance)));
}

async function cmdRoll(args: string[]): Promise<void> {
  const command = parseRollArgs(args);
  const config = loadRollConfig(command.configPath);
  const performance = await readPerformance(command.input);

  printLines(formatPerformanceSummary(performance));
  console.log();
  printLines(formatPartTable(summarizeParts(performance)));
  console.log();

  const arrangement = arrangeRoll(performance, {
    selections: command.selections,
    divisor: command.divisor,
    config,
  });
  if (command.selections.length === 0) {
    console.log("No parts selected; the roll will be empty.");
  }
  printLines(formatArrangementReport(arrangement));

  const { page, midi } = buildArtifacts(performance, arrangement, {
    title: basename(command.input),
    config,
  });
  writeFileSync(command.output, page, "utf8");
  writeFileSync(command.midiOutput, midi);
  console.error(`Wrote ${command.output} and ${command.midiOutput}`);
}

function cmdHelp(): void {
  console.log(`
rollpunch: merge MIDI parts into one playable piano roll

Commands:
  parts <file.mid>                  List every track/channel with its name and note count
  roll <file.mid> [selectors] [/N]  Merge the selected parts onto one roll
  help                              Show this help

Selectors:
  track,channel                     e.g. 1,0
  track,channel+shift               transpose up, e.g. 2,0+12
  track,channel-shift               transpose down, e.g. 3,1-5

Options for roll:
  /N                                Compression divisor (default 1)
  -o, --output <page.svg>           Page output (default: <input>.svg)
  --midi-out <file.mid>             Merged MIDI output (default: <page>.merged.mid)
  --config <roll.json>              Roll settings (fudge window, speed, page layout)
`);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";

  switch (command) {
    case "parts":
      await cmdParts(args.slice(1));
      break;
    case "roll":
      await cmdRoll(args.slice(1));
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      fail(`Unknown command: "${command}". Run 'rollpunch help' for usage.`);
  }
}

main().catch((err) => {
  if (err instanceof ParseError || err instanceof SelectionError) {
    fail(`${err.name}: ${err.message}`);
  }
  console.error(err);
  process.exit(1);
});
