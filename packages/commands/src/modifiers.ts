/**
 * Commands that change how another flag executes.
 */

import { Output } from "@textscope/sdk";
import type { Flag, FlagCommand, Instruction } from "@textscope/sdk";
import { flagTag } from "@textscope/shared";
import { ReverseSortedWordsCommand, SORT_BY_LENGTH, SortedWordsCommand } from "./words.js";

const SORT_FLAGS: readonly string[] = [
  SortedWordsCommand.CALLER,
  SortedWordsCommand.ALIAS,
  ReverseSortedWordsCommand.CALLER,
  ReverseSortedWordsCommand.ALIAS,
];

/**
 * -l / --by-length: the sort flag right after this one compares word lengths.
 *
 * Repeating the flag (`-l -l -s`) is allowed; the last one does the work.
 */
export class ByLengthCommand implements FlagCommand {
  static readonly CALLER = "-l";
  static readonly ALIAS = "--by-length";

  readonly caller = ByLengthCommand.CALLER;
  readonly alias = ByLengthCommand.ALIAS;
  readonly description = "Sort the following -s/-rs flag by word length";

  validate(flag: Flag, instruction: Instruction): Output {
    const next = instruction.getByPosition(flag.position + 1);

    if (!next) {
      return Output.err(`${flagTag(flag.name)}This flag can't be the last one!`);
    }

    if (next.name === ByLengthCommand.CALLER || next.name === ByLengthCommand.ALIAS) {
      return Output.ok();
    }

    if (!SORT_FLAGS.includes(next.name)) {
      return Output.err(`${flagTag(flag.name)}Missing required flag after this one!`);
    }

    next.modifier = SORT_BY_LENGTH;
    return Output.ok();
  }

  execute(): Output {
    return Output.ok();
  }
}
