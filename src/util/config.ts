import { z } from "zod";
import { Logger } from "./logger.js";

export const DEFAULT_BREAK_COLUMN = 20;

export type MatchingMode = "prefix" | "exact-first";

export const ParserSettingsSchema = z.object({
  // Column where option descriptions start in usage output
  breakColumn: z.number().int().positive().default(DEFAULT_BREAK_COLUMN),
  // "prefix": first registered option whose name starts with the candidate wins.
  // "exact-first": an exact name match is preferred over earlier prefix matches.
  matching: z.enum(["prefix", "exact-first"]).default("prefix"),
  logger: z.instanceof(Logger).optional(),
});

export type ParserSettingsInput = z.input<typeof ParserSettingsSchema>;

export interface ParserSettings {
  breakColumn: number;
  matching: MatchingMode;
  logger: Logger;
}

/**
 * Validates user-supplied settings and fills in defaults.
 * Throws a ZodError on invalid input.
 */
export function resolveSettings(input: ParserSettingsInput = {}): ParserSettings {
  const parsed = ParserSettingsSchema.parse(input);
  return {
    breakColumn: parsed.breakColumn,
    matching: parsed.matching,
    logger: parsed.logger ?? new Logger("silent"),
  };
}
