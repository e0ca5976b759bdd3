/**
 * Error hierarchy for textscope.
 */

export class TextScopeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TextScopeError";
  }
}

/** Engine-level failure: unknown flag, unresolved source, malformed input redirection. */
export class EngineError extends TextScopeError {
  static readonly TAG = "<ENGINE>";

  constructor(message: string) {
    super(`${EngineError.TAG} ${message}`, "ENGINE_ERROR");
    this.name = "EngineError";
  }
}

/** A command's validate phase failed. Fatal to the run. */
export class FlagValidationError extends TextScopeError {
  constructor(
    public readonly flagName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`<${flagName}> ${message}`, "FLAG_VALIDATION_ERROR", options);
    this.name = "FlagValidationError";
  }
}

/** A command's execute phase failed. Recorded, never fatal. */
export class CommandExecutionError extends TextScopeError {
  constructor(
    public readonly flagName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`<${flagName}> ${message}`, "COMMAND_EXECUTION_ERROR", options);
    this.name = "CommandExecutionError";
  }
}

export class FileAccessError extends TextScopeError {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`File "${path}" error: ${message}`, "FILE_ACCESS_ERROR", options);
    this.name = "FileAccessError";
  }
}

export class ConfigError extends TextScopeError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? "CONFIG_ERROR", options);
    this.name = "ConfigError";
  }
}

/** Extract a message from anything that was thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
