import { coerce } from "./options/record.js";
import { OptionRegistry } from "./options/registry.js";
import type { OptionBinding, OptionInfo } from "./options/types.js";
import { formatUsage } from "./usage.js";
import { resolveSettings, type ParserSettings, type ParserSettingsInput } from "./util/config.js";
import { OptionError, OK, fail, type Result } from "./util/errors.js";

/** Strips one leading dash, and a second if present. */
function candidateName(token: string): string {
  return token.startsWith("--") ? token.slice(2) : token.slice(1);
}

export class OptionParser {
  private settings: ParserSettings;
  private registry: OptionRegistry;
  private positional: string[] = [];

  constructor(private description: string = "", settings?: ParserSettingsInput) {
    this.settings = resolveSettings(settings);
    this.registry = new OptionRegistry({ matching: this.settings.matching, logger: this.settings.logger });
  }

  add(name: string, description: string, binding: OptionBinding): Result<void> {
    return this.registry.add(name, description, binding);
  }

  /**
   * Walks `argv[1..argc)`; element 0 is the program name. Stops at the first
   * error; destinations written before it keep their new values.
   */
  parse(argv: readonly string[], argc: number = argv.length): Result<void> {
    const { logger } = this.settings;
    const end = Math.min(argc, argv.length);
    this.positional = [];

    for (let i = 1; i < end; i++) {
      const token = argv[i];
      if (token.length === 0) continue;

      if (!token.startsWith("-")) {
        this.positional.push(token);
        continue;
      }

      const record = this.registry.find(candidateName(token));
      if (!record) {
        const error = new OptionError("UnrecognizedOption", { option: token });
        logger.debug(`Unrecognized option ${token}`);
        return fail(error);
      }

      let raw: string | undefined;
      if (record.requiresParameter && i + 1 < end) {
        i += 1;
        raw = argv[i];
      }
      logger.debug(`Matched ${token} -> --${record.name}${raw === undefined ? "" : ` "${raw}"`}`);

      const res = coerce(record, raw);
      if (!res.ok) {
        logger.debug(`Option --${record.name} failed: ${res.error.kind}`);
        return res;
      }
    }

    logger.debug(`Parsed ${this.positional.length} positional argument(s)`);
    return OK;
  }

  /** Same as `parse`, but throws the OptionError instead of returning it. */
  parseOrThrow(argv: readonly string[], argc?: number): void {
    const res = this.parse(argv, argc);
    if (!res.ok) throw res.error;
  }

  /** Positional arguments collected by the most recent parse. */
  nonOptionArgs(): string[] {
    return [...this.positional];
  }

  options(): OptionInfo[] {
    return this.registry.list().map((r) => ({
      name: r.name,
      description: r.description,
      requiresParameter: r.requiresParameter,
      kind: r.binding.kind,
    }));
  }

  usage(): string {
    return formatUsage(this.description, this.registry.list(), this.settings.breakColumn);
  }
}
