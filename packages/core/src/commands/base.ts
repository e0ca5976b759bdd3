/**
 * Identity commands every engine carries.
 *
 * They are registered first, in this order, by createEngine() and cannot be
 * replaced: a later command with the same caller/alias pair is ignored.
 */

import { Output } from "@textscope/sdk";
import type { FileAccess, Flag, FlagCommand, Instruction, Operations } from "@textscope/sdk";
import { flagTag } from "@textscope/shared";

/**
 * Text as the engine sees it: every line of `content` followed by "\n".
 * The result is always one "\n" longer than the raw content.
 */
export function loadSource(content: string): string {
  return content
    .split("\n")
    .map((line) => `${line}\n`)
    .join("");
}

/** -f / --file: selects the source file and loads its text. */
export class SourceFileCommand implements FlagCommand {
  static readonly CALLER = "-f";
  static readonly ALIAS = "--file";

  readonly caller = SourceFileCommand.CALLER;
  readonly alias = SourceFileCommand.ALIAS;
  readonly description = "Source text file to analyze";

  constructor(private readonly files: FileAccess) {}

  validate(flag: Flag, _instruction: Instruction, operations: Operations): Output {
    if (flag.argument === "") {
      return Output.err(`${flagTag(flag.name)}This flag requires an argument!`);
    }

    if (!this.files.exists(flag.argument)) {
      return Output.err(`${flagTag(flag.name)}Provided file doesn't exists!`);
    }

    operations.fileIn = flag.argument;
    operations.source = loadSource(this.files.read(flag.argument));

    return Output.ok();
  }

  execute(): Output {
    return Output.ok();
  }
}

/**
 * -i / --input: replays the flags written in a file.
 * Only its names matter; the engine handles the redirection before validation.
 */
export class InputFileCommand implements FlagCommand {
  static readonly CALLER = "-i";
  static readonly ALIAS = "--input";

  readonly caller = InputFileCommand.CALLER;
  readonly alias = InputFileCommand.ALIAS;
  readonly description = "Read the flags from a file (must be the only flag)";

  validate(): Output {
    return Output.ok();
  }

  execute(): Output {
    return Output.ok();
  }
}

/** -o / --output: writes the report to a file instead of returning it. */
export class OutputFileCommand implements FlagCommand {
  static readonly CALLER = "-o";
  static readonly ALIAS = "--output";

  readonly caller = OutputFileCommand.CALLER;
  readonly alias = OutputFileCommand.ALIAS;
  readonly description = "Write the report to a file";

  validate(flag: Flag, _instruction: Instruction, operations: Operations): Output {
    if (flag.argument === "") {
      return Output.err(`${flagTag(flag.name)}This flag requires an argument!`);
    }

    operations.fileOut = flag.argument;
    return Output.ok();
  }

  execute(): Output {
    return Output.ok();
  }
}
