export { OptionParser } from "./parser.js";
export { formatUsage } from "./usage.js";
export {
  ref,
  field,
  switchOption,
  integerOption,
  floatOption,
  stringOption,
  valueOption,
  matches,
  coerce,
  createOptionRecord,
} from "./options/record.js";
export { OptionRegistry, OptionNameSchema } from "./options/registry.js";
export type {
  Ref,
  Destination,
  OptionBinding,
  OptionKind,
  OptionRecord,
  OptionInfo,
  SwitchBinding,
  IntegerBinding,
  FloatBinding,
  StringBinding,
  ValueBinding,
} from "./options/types.js";
export { OptionError, OK, fail, isOptionError, zodIssues } from "./util/errors.js";
export type { OptionErrorKind, OptionErrorDetails, Result } from "./util/errors.js";
export { Logger } from "./util/logger.js";
export type { LogLevel, LogSink } from "./util/logger.js";
export { ParserSettingsSchema, DEFAULT_BREAK_COLUMN, resolveSettings } from "./util/config.js";
export type { ParserSettings, ParserSettingsInput, MatchingMode } from "./util/config.js";
