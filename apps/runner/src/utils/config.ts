/**
 * Runner configuration from environment variables.
 *
 *   LOG_LEVEL           debug | info | warn | error
 *   LOG_FORMAT          text | json (default: text)
 *   TEXTSCOPE_ENCODING  utf-8 | utf8 | latin1 | ascii | utf16le (default: utf-8)
 */

import { ConfigError } from "@textscope/sdk";
import { RunnerConfigSchema, validateInput } from "@textscope/shared";
import type { RunnerConfig } from "@textscope/shared";

/** Empty variables count as unset. */
function read(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value === undefined || value === "" ? undefined : value.toLowerCase();
}

/**
 * Validate the runner config found in `env`.
 * @throws ConfigError listing every invalid variable.
 */
export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const result = validateInput(RunnerConfigSchema, {
    logLevel: read(env, "LOG_LEVEL"),
    logFormat: read(env, "LOG_FORMAT"),
    encoding: read(env, "TEXTSCOPE_ENCODING"),
  });

  if (!result.success) {
    throw new ConfigError(`Invalid runner configuration: ${result.error}`);
  }

  return result.data;
}
