// ─── Roll Config Loader ──────────────────────────────────────────────────────
//
// Reads an optional .json config file and validates it with Zod.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync, existsSync } from "node:fs";
import { basename } from "node:path";
import { ParseError } from "../errors.js";
import { RollConfigSchema, DEFAULT_ROLL_CONFIG, validateConfig, type RollConfig } from "./schema.js";

/**
 * Load and validate a roll config. With no path, returns the defaults.
 * A missing, unreadable or invalid file throws ParseError.
 */
export function loadRollConfig(filePath?: string): RollConfig {
  if (filePath === undefined) return DEFAULT_ROLL_CONFIG;
  if (!existsSync(filePath)) {
    throw new ParseError(`Config not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ParseError(
      `Invalid config ${basename(filePath)}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err },
    );
  }

  const errors = validateConfig(raw);
  if (errors.length > 0) {
    const issues = errors.map(e => `  ${e.field}: ${e.message}`).join("\n");
    throw new ParseError(`Invalid config ${basename(filePath)}:\n${issues}`);
  }
  return RollConfigSchema.parse(raw);
}
