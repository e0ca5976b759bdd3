// Types
export type { Flag, Instruction } from "./types/flag.js";
export type { Operations } from "./types/operations.js";
export type { FlagCommand } from "./types/command.js";
export type { FileAccess } from "./types/files.js";
export type { OutputStatus } from "./types/output.js";

export { Output, isErr, isReportable } from "./types/output.js";

// Errors
export {
  TextScopeError,
  EngineError,
  FlagValidationError,
  CommandExecutionError,
  FileAccessError,
  ConfigError,
  errorMessage,
} from "./errors/base.js";
