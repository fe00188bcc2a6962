// ─── Roll Config Schema ──────────────────────────────────────────────────────
//
// Operator-tunable settings for the merge, the page layout, and the merged
// MIDI output. Every field has a default, so an empty object is valid.
// Lengths are in inches.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

export const RollConfigSchema = z.object({
  /** Fudge window = ticksPerBeat / fudgeBeatDivisor (rounded down). */
  fudgeBeatDivisor: z.number().int().min(1).default(3),
  /** Inches of roll per second of playback. */
  rollSpeed: z.number().positive().default(1),
  /** Soft limit on total roll length. */
  lengthLimit: z.number().positive().default(200),
  columnSpacing: z.number().positive().default(0.125),
  holeWidth: z.number().positive().default(0.09),
  margin: z.number().min(0).default(0.5),
  outputVelocity: z.number().int().min(1).max(127).default(90),
  outputProgram: z.number().int().min(0).max(127).default(0),
}).strict();

// ─── Derived Types ───────────────────────────────────────────────────────────

export type RollConfig = z.infer<typeof RollConfigSchema>;

/** Settings used when no config file is given. */
export const DEFAULT_ROLL_CONFIG: RollConfig = RollConfigSchema.parse({});

// ─── Validation ──────────────────────────────────────────────────────────────

export interface ConfigError {
  field: string;
  message: string;
}

/**
 * Validate a RollConfig object using the zod schema.
 * Returns an empty array if valid.
 */
export function validateConfig(config: unknown): ConfigError[] {
  const result = RollConfigSchema.safeParse(config);
  if (result.success) return [];

  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "root",
    message: issue.message,
  }));
}
