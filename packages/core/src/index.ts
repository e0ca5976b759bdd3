// Engine
export { createEngine } from "./engine/engine.js";
export type { Engine, EngineOptions } from "./engine/engine.js";
export { createOperations } from "./engine/operations.js";

// Instruction
export { parseInstruction, createInstruction, isFlagToken } from "./instruction/parser.js";

// Infrastructure
export { createCommandRegistry } from "./infrastructure/command-registry.js";
export type { CommandRegistry } from "./infrastructure/command-registry.js";

// Identity commands
export {
  SourceFileCommand,
  InputFileCommand,
  OutputFileCommand,
  loadSource,
} from "./commands/base.js";

// I/O
export { createNodeFileAccess } from "./io/node-files.js";
export type { NodeFileAccessOptions } from "./io/node-files.js";
