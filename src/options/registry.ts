import { z } from "zod";
import type { Logger } from "../util/logger.js";
import type { MatchingMode } from "../util/config.js";
import { OptionError, OK, fail, zodIssues, type Result } from "../util/errors.js";
import { createOptionRecord, matches } from "./record.js";
import type { OptionBinding, OptionRecord } from "./types.js";

export const OptionNameSchema = z
  .string()
  .min(1, "name must not be empty")
  .refine((name) => !name.startsWith("-"), "name must not start with a dash");

export interface RegistryOptions {
  matching: MatchingMode;
  logger: Logger;
}

/**
 * Insertion-ordered list of option records.
 * Names are not required to be unique; lookup returns the first match.
 */
export class OptionRegistry {
  private records: OptionRecord[] = [];

  constructor(private opts: RegistryOptions) {}

  add(name: string, description: string, binding: OptionBinding): Result<void> {
    const checked = OptionNameSchema.safeParse(name);
    if (!checked.success) {
      return fail(new OptionError("InvalidOption", { option: name, issues: zodIssues(checked.error) }));
    }
    this.records.push(createOptionRecord(name, description, binding));
    this.opts.logger.debug(`Registered option --${name} (${binding.kind})`);
    return OK;
  }

  /** Resolves a candidate name (dashes already stripped) to a record. */
  find(candidate: string): OptionRecord | undefined {
    if (this.opts.matching === "exact-first") {
      const exact = this.records.find((r) => r.name === candidate);
      if (exact) return exact;
    }
    return this.records.find((r) => matches(r, candidate));
  }

  list(): readonly OptionRecord[] {
    return this.records;
  }
}
