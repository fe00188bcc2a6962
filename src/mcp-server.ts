#!/usr/bin/env node
// ─── rollpunch: MCP Server ───────────────────────────────────────────────────
//
// Exposes the roll pipeline as MCP tools, so an assistant can inspect a MIDI
// file's parts, try mixes, and read back the conflict report.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   list_parts    : tracks/channels of a MIDI file with names and note counts
//   arrange_roll  : merge selected parts, write the page + merged MIDI, report
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { writeFileSync } from "node:fs";
import { basename } from "node:path";
import { arrangeRoll, buildArtifacts } from "./arrange.js";
import { defaultMidiPath, defaultPagePath } from "./cli-args.js";
import { loadRollConfig } from "./config/loader.js";
import { readPerformance } from "./midi/parser.js";
import { summarizeParts } from "./midi/parts.js";
import { formatArrangementReport, formatPartTable, formatPerformanceSummary } from "./report.js";
import { parseSelector } from "./selection.js";

const server = new McpServer({
  name: "rollpunch",
  version: "0.1.0",
});

function errorResult(err: unknown) {
  return {
    content: [{ type: "text" as const, text: err instanceof Error ? `${err.name}: ${err.message}` : String(err) }],
    isError: true,
  };
}

// ─── Tool: list_parts ───────────────────────────────────────────────────────

server.tool(
  "list_parts",
  "List every track/channel of a MIDI file with its instrument name and note count. Use the track,channel pairs as selectors for arrange_roll.",
  {
    path: z.string().describe("Path to a .mid file"),
  },
  async ({ path }) => {
    try {
      const performance = await readPerformance(path);
      const text = [
        ...formatPerformanceSummary(performance),
        "",
        ...formatPartTable(summarizeParts(performance)),
      ].join("\n");
      return { content: [{ type: "text", text }] };
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Tool: arrange_roll ─────────────────────────────────────────────────────

server.tool(
  "arrange_roll",
  "Merge selected parts of a MIDI file onto one piano roll. Writes an SVG page and a merged MIDI file, and returns the conflict report and roll length.",
  {
    path: z.string().describe("Path to a .mid file"),
    selections: z.array(z.string()).describe("Part selectors like \"1,0\", \"2,0+12\" or \"3,1-5\""),
    divisor: z.number().positive().optional().describe("Compression divisor (default 1)"),
    output: z.string().optional().describe("SVG page path (default: next to the input)"),
    config_path: z.string().optional().describe("Roll config JSON file"),
  },
  async ({ path, selections, divisor, output, config_path }) => {
    try {
      const config = loadRollConfig(config_path);
      const parsedSelections = selections.map(parseSelector);
      const performance = await readPerformance(path);

      const arrangement = arrangeRoll(performance, {
        selections: parsedSelections,
        divisor: divisor ?? 1,
        config,
      });
      const { page, midi } = buildArtifacts(performance, arrangement, { title: basename(path), config });

      const pagePath = output ?? defaultPagePath(path);
      const midiPath = defaultMidiPath(pagePath);
      writeFileSync(pagePath, page, "utf8");
      writeFileSync(midiPath, midi);

      const text = [
        ...formatArrangementReport(arrangement),
        "",
        `${arrangement.timeline.length} events on the roll, ${arrangement.conflicts.length} conflict(s).`,
        `Page: ${pagePath}`,
        `Merged MIDI: ${midiPath}`,
      ].join("\n");
      return { content: [{ type: "text", text }] };
    } catch (err) {
      return errorResult(err);
    }
  }
);

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("rollpunch MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
