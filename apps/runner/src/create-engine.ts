import { createEngine } from "@textscope/core";
import type { Engine } from "@textscope/core";
import { createAnalysisCommands } from "@textscope/commands";
import type { FileAccess } from "@textscope/sdk";
import type { Logger } from "@textscope/shared";

export interface TextEngineOptions {
  files: FileAccess;
  logger?: Logger;
}

/** Engine with the identity flags and every analysis command registered. */
export function createTextEngine(options: TextEngineOptions): Engine {
  const engine = createEngine(options);
  for (const command of createAnalysisCommands(options.files)) {
    engine.add(command);
  }
  return engine;
}
