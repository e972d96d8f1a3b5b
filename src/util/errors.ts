/**
 * Error taxonomy for option parsing.
 * Failures are reported as data: `add`, `parse` and `coerce` return a
 * `Result`, and `parseOrThrow` rethrows the same `OptionError`.
 */

import { ZodError } from "zod";

export type OptionErrorKind =
  | "MissingArgument"
  | "EmptyValue"
  | "TooManyArguments"
  | "ParseFailure"
  | "UnrecognizedOption"
  | "InvalidOption";

const KIND_TEXT: Record<OptionErrorKind, string> = {
  MissingArgument: "missing argument",
  EmptyValue: "empty value string",
  TooManyArguments: "too many arguments",
  ParseFailure: "parsing parameter failed",
  UnrecognizedOption: "unrecognized option",
  InvalidOption: "invalid option name",
};

export interface OptionErrorDetails {
  /** Registered option name, or the raw argv token for unrecognized options. */
  option: string;
  value?: string;
  issues?: string[];
}

export class OptionError extends Error {
  public readonly option: string;
  public readonly value?: string;
  public readonly issues: string[];

  constructor(public readonly kind: OptionErrorKind, details: OptionErrorDetails) {
    super(formatMessage(kind, details));
    this.name = "OptionError";
    this.option = details.option;
    this.value = details.value;
    this.issues = details.issues ?? [];
  }
}

function formatMessage(kind: OptionErrorKind, { option, value, issues }: OptionErrorDetails): string {
  const lines = [`Error: ${KIND_TEXT[kind]}`];
  lines.push(kind === "UnrecognizedOption" ? `  option: ${option}` : `  parameter: ${option}`);
  if (value) lines.push(`  value: "${value}"`);
  for (const issue of issues ?? []) lines.push(`  issue: ${issue}`);
  return lines.join("\n") + "\n";
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: OptionError };

export const OK: Result<void> = { ok: true, value: undefined };

export function fail<T = void>(error: OptionError): Result<T> {
  return { ok: false, error };
}

/**
 * Type guard to check if an error is an OptionError.
 */
export function isOptionError(error: unknown): error is OptionError {
  return error instanceof OptionError;
}

/**
 * Flattens zod issues into `path: message` lines ("(root)" for top-level issues).
 */
export function zodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}
