export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogFormat, LogContext, LoggerOptions, LogSink } from "./logger/index.js";

export { validateInput, formatZodError } from "./utils/validation.js";
export type { ValidationResult } from "./utils/validation.js";

export {
  RunnerConfigSchema,
  LogLevelSchema,
  LogFormatSchema,
  TextEncodingSchema,
} from "./utils/config-schema.js";
export type { RunnerConfig, TextEncoding } from "./utils/config-schema.js";

export { splitWords, countMatches, distinct } from "./utils/text.js";
export { flagTag, formatList } from "./utils/format.js";
