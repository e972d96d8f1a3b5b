import type { ZodType, ZodTypeDef } from "zod";

/** Caller-owned storage cell an option writes its parsed value into. */
export interface Ref<T> {
  value: T;
}

/** `null` consumes and validates the value, then discards it. */
export type Destination<T> = Ref<T> | null;

/** Boolean flag that takes no value; its presence sets `true`. */
export interface SwitchBinding {
  kind: "switch";
  destination: Destination<boolean>;
}

/** Option taking one safe integer. */
export interface IntegerBinding {
  kind: "integer";
  destination: Destination<number>;
}

/** Option taking one finite decimal number. */
export interface FloatBinding {
  kind: "float";
  destination: Destination<number>;
}

/** Option taking the following argv slot verbatim. */
export interface StringBinding {
  kind: "string";
  destination: Destination<string>;
}

/** Option whose single token is parsed by a zod schema. */
export interface ValueBinding<T> {
  kind: "value";
  destination: Destination<T>;
  schema: ZodType<T, ZodTypeDef, unknown>;
}

export type OptionBinding =
  | SwitchBinding
  | IntegerBinding
  | FloatBinding
  | StringBinding
  | ValueBinding<unknown>;

export type OptionKind = OptionBinding["kind"];

/** A registered option, owned by the registry. */
export interface OptionRecord {
  readonly name: string;
  readonly description: string;
  readonly requiresParameter: boolean;
  readonly binding: OptionBinding;
}

/** Public, read-only view of a registered option. */
export interface OptionInfo {
  name: string;
  description: string;
  requiresParameter: boolean;
  kind: OptionKind;
}
