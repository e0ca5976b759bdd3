/**
 * Engine — the flag-dispatch loop.
 *
 * One run goes through:
 *   1. input redirection  (-i <file> replaces the flags with the file's words)
 *   2. validation         (every flag, in position order; first failure panics)
 *   3. source check       (some text must have been resolved)
 *   4. execution          (only when nothing panicked; failures are recorded)
 *   5. reporting          (returned, or written to the -o destination)
 *
 * Nothing thrown by a command escapes run(): throws are turned into error
 * outputs for the phase they happened in.
 */

import { randomUUID } from "node:crypto";
import {
  CommandExecutionError,
  EngineError,
  FlagValidationError,
  Output,
  errorMessage,
  isErr,
  isReportable,
} from "@textscope/sdk";
import type { FileAccess, Flag, FlagCommand, Instruction, Operations } from "@textscope/sdk";
import { createLogger, splitWords } from "@textscope/shared";
import type { Logger } from "@textscope/shared";
import { createCommandRegistry } from "../infrastructure/command-registry.js";
import { parseInstruction } from "../instruction/parser.js";
import { InputFileCommand, OutputFileCommand, SourceFileCommand } from "../commands/base.js";
import { createOperations } from "./operations.js";

export interface EngineOptions {
  files: FileAccess;
  logger?: Logger;
}

export interface Engine {
  /** Register a command. Chainable; a duplicate caller/alias pair is ignored. */
  add(command: FlagCommand): Engine;

  /** Registered commands, identity commands first. */
  commands(): FlagCommand[];

  /**
   * Parse, validate and execute `tokens`, returning the rendered report.
   * Returns "" when the report was written to an output file.
   */
  run(tokens: readonly string[]): string;
}

interface QueuedCommand {
  command: FlagCommand;
  flag: Flag;
}

type Phase = "validate" | "execute";

export function createEngine(options: EngineOptions): Engine {
  const { files } = options;
  const logger = options.logger ?? createLogger("Engine");
  const registry = createCommandRegistry();

  let outputs: Output[] = [];
  let operations: Operations = createOperations();

  function reset(): void {
    outputs = [];
    operations = createOperations();
  }

  function panic(message: string): void {
    outputs.push(Output.err(new EngineError(message).message));
    operations.panicked = true;
  }

  /** Run one command phase, turning a throw into an error output. */
  function contain(phase: Phase, flag: Flag, call: () => Output): Output {
    try {
      return call();
    } catch (err) {
      const error =
        phase === "validate"
          ? new FlagValidationError(flag.name, errorMessage(err), { cause: err })
          : new CommandExecutionError(flag.name, errorMessage(err), { cause: err });
      logger.error(`Command ${phase} threw`, { flag: flag.name, error: errorMessage(err) });
      return Output.err(error.message);
    }
  }

  /**
   * Replace the instruction with the flags stored in the -i file.
   * Returns undefined (after recording the engine error) when the redirection is malformed.
   */
  function redirectInput(instruction: Instruction): Instruction | undefined {
    if (!instruction.has(InputFileCommand.CALLER, InputFileCommand.ALIAS)) {
      return instruction;
    }

    if (instruction.size() !== 1) {
      panic("Input file flag should be the only one!");
      return undefined;
    }

    const flag = instruction.getByPosition(0);
    if (!flag || flag.argument === "") {
      panic("Input file flag requires an argument!");
      return undefined;
    }

    if (!files.exists(flag.argument)) {
      panic("Input file flag has invalid file as an argument!");
      return undefined;
    }

    let content: string;
    try {
      content = files.read(flag.argument);
    } catch (err) {
      logger.error("Failed to read input file", { path: flag.argument, error: errorMessage(err) });
      panic("Input file flag has invalid file as an argument!");
      return undefined;
    }

    const replayed = parseInstruction(splitWords(content));
    logger.debug("Replaying flags from input file", { path: flag.argument, flags: replayed.size() });
    return replayed;
  }

  function validateAll(instruction: Instruction): QueuedCommand[] {
    const queue: QueuedCommand[] = [];

    for (const flag of instruction.flags()) {
      const command = registry.findByCaller(flag.name) ?? registry.findByAlias(flag.name);

      if (!command) {
        panic(`Invalid flag: [${flag.name}]`);
        break;
      }

      const output = contain("validate", flag, () => command.validate(flag, instruction, operations));
      if (isErr(output)) {
        outputs.push(output);
        operations.panicked = true;
        logger.debug("Validation failed", { flag: flag.name, position: flag.position });
        break;
      }

      if (isReportable(output)) {
        outputs.push(output);
      }
      queue.push({ command, flag });
    }

    return queue;
  }

  function executeAll(queue: readonly QueuedCommand[]): void {
    for (const { command, flag } of queue) {
      const output = contain("execute", flag, () => command.execute(flag, operations));
      if (isReportable(output)) {
        outputs.push(output);
      }
    }
  }

  function render(): string {
    return outputs
      .filter(isReportable)
      .map((output) => `${output.status === "ok" ? "[SUCCESS]" : "[ERROR]"}: ${output.message}\n`)
      .join("");
  }

  /** Render the collected outputs, deliver them and reset for the next run. */
  function report(): string {
    const text = render();
    const destination = operations.fileOut;
    reset();

    if (destination === "") {
      return text;
    }

    try {
      files.write(destination, text);
      return "";
    } catch (err) {
      logger.error("Failed to write report, returning it instead", {
        path: destination,
        error: errorMessage(err),
      });
      return text;
    }
  }

  const engine: Engine = {
    add(command: FlagCommand): Engine {
      registry.register(command);
      return engine;
    },

    commands(): FlagCommand[] {
      return registry.list();
    },

    run(tokens: readonly string[]): string {
      logger.setContext({ runId: randomUUID() });
      const stop = logger.time("run");

      const instruction = redirectInput(parseInstruction(tokens));
      if (instruction) {
        logger.debug("Run started", { flags: instruction.size() });
        const queue = validateAll(instruction);

        if (operations.source === "" && operations.fileIn === "") {
          panic("Source file is invalid!");
        }

        if (operations.panicked) {
          logger.debug("Run aborted before execution", { outputs: outputs.length });
        } else {
          executeAll(queue);
        }
      }

      const result = report();
      stop();
      return result;
    },
  };

  engine
    .add(new SourceFileCommand(files))
    .add(new InputFileCommand())
    .add(new OutputFileCommand());

  return engine;
}
