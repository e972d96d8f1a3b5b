import type { ZodType, ZodTypeDef } from "zod";
import { OptionError, OK, fail, zodIssues, type Result } from "../util/errors.js";
import { parseFloatStrict, parseInteger, scanOne, type PieceParser } from "./scan.js";
import type {
  Destination,
  FloatBinding,
  IntegerBinding,
  OptionBinding,
  OptionRecord,
  Ref,
  StringBinding,
  SwitchBinding,
  ValueBinding,
} from "./types.js";

/** Creates a standalone destination cell. */
export function ref<T>(initial: T): Ref<T> {
  return { value: initial };
}

/**
 * Binds a property of a caller-owned object, so an options struct can be
 * filled in field by field.
 */
export function field<O extends object, K extends keyof O>(target: O, key: K): Ref<O[K]> {
  return {
    get value() {
      return target[key];
    },
    set value(v: O[K]) {
      target[key] = v;
    },
  };
}

/** Binds a switch; `null` accepts the flag and ignores it. */
export function switchOption(destination: Destination<boolean>): SwitchBinding {
  return { kind: "switch", destination };
}

/** Binds an integer value. */
export function integerOption(destination: Destination<number>): IntegerBinding {
  return { kind: "integer", destination };
}

/** Binds a floating point value. */
export function floatOption(destination: Destination<number>): FloatBinding {
  return { kind: "float", destination };
}

/** Binds a string value, stored as given. */
export function stringOption(destination: Destination<string>): StringBinding {
  return { kind: "string", destination };
}

/** Binds a value parsed by `schema`. */
export function valueOption<T>(schema: ZodType<T, ZodTypeDef, unknown>, destination: Destination<T>): ValueBinding<T> {
  return { kind: "value", destination, schema };
}

/** Builds a record; only switches take no parameter. */
export function createOptionRecord(name: string, description: string, binding: OptionBinding): OptionRecord {
  return {
    name,
    description,
    requiresParameter: binding.kind !== "switch",
    binding,
  };
}

/** True when `candidate` is a prefix of the option name (the empty string included). */
export function matches(record: OptionRecord, candidate: string): boolean {
  return record.name.startsWith(candidate);
}

function store<T>(destination: Destination<T>, value: T) {
  if (destination) destination.value = value;
}

const integerPiece: PieceParser<number> = (piece) => {
  const value = parseInteger(piece);
  return value === undefined ? { ok: false, issues: [] } : { ok: true, value };
};

const floatPiece: PieceParser<number> = (piece) => {
  const value = parseFloatStrict(piece);
  return value === undefined ? { ok: false, issues: [] } : { ok: true, value };
};

function schemaPiece<T>(schema: ZodType<T, ZodTypeDef, unknown>): PieceParser<T> {
  return (piece) => {
    const res = schema.safeParse(piece);
    return res.success ? { ok: true, value: res.data } : { ok: false, issues: zodIssues(res.error) };
  };
}

function coerceScanned<T>(
  record: OptionRecord,
  raw: string,
  parsePiece: PieceParser<T>,
  destination: Destination<T>,
): Result<void> {
  const scanned = scanOne(raw, parsePiece);
  switch (scanned.status) {
    case "empty":
      return fail(new OptionError("EmptyValue", { option: record.name, value: raw }));
    case "invalid":
      return fail(new OptionError("ParseFailure", { option: record.name, value: raw, issues: scanned.issues }));
    case "too_many":
      return fail(new OptionError("TooManyArguments", { option: record.name, value: raw }));
    case "one":
      store(destination, scanned.value);
      return OK;
  }
}

/**
 * Applies one occurrence of an option. `raw` is the following argv slot, or
 * undefined when none was consumed.
 */
export function coerce(record: OptionRecord, raw: string | undefined): Result<void> {
  const { binding } = record;
  if (binding.kind === "switch") {
    store(binding.destination, true);
    return OK;
  }
  if (raw === undefined) {
    return fail(new OptionError("MissingArgument", { option: record.name }));
  }

  switch (binding.kind) {
    case "string":
      store(binding.destination, raw);
      return OK;
    case "integer":
      return coerceScanned(record, raw, integerPiece, binding.destination);
    case "float":
      return coerceScanned(record, raw, floatPiece, binding.destination);
    case "value":
      return coerceScanned(record, raw, schemaPiece(binding.schema), binding.destination);
  }
}
