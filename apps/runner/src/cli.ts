/**
 * CLI flow shared by bin.ts and the tests.
 *
 *   textscope -h | --help          → usage text, exit 0
 *   textscope <flags...>           → report on stdout, exit 0
 *   invalid environment config     → message on stderr, exit 1
 *
 * Log lines go through io.stderr as well.
 */

import { createNodeFileAccess } from "@textscope/core";
import type { FileAccess } from "@textscope/sdk";
import { errorMessage } from "@textscope/sdk";
import { createLogger } from "@textscope/shared";
import type { RunnerConfig } from "@textscope/shared";
import { createTextEngine } from "./create-engine.js";
import { loadRunnerConfig } from "./utils/config.js";
import { formatHelp, isHelpRequest } from "./utils/help.js";

export interface CliIO {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;

  /** Defaults to the Node.js file system with the configured encoding. */
  files?: FileAccess;
}

export function runCli(argv: readonly string[], io: CliIO): number {
  if (isHelpRequest(argv)) {
    const engine = createTextEngine({ files: io.files ?? createNodeFileAccess() });
    io.stdout(formatHelp(engine.commands()));
    return 0;
  }

  let config: RunnerConfig;
  try {
    config = loadRunnerConfig(io.env);
  } catch (err) {
    io.stderr(`${errorMessage(err)}\n`);
    return 1;
  }

  const logger = createLogger("Runner", {
    minLevel: config.logLevel,
    format: config.logFormat,
    sink: (line) => io.stderr(`${line}\n`),
  });
  const files = io.files ?? createNodeFileAccess({ encoding: config.encoding });
  const engine = createTextEngine({ files, logger: logger.child("Engine") });

  io.stdout(engine.run(argv));
  return 0;
}
