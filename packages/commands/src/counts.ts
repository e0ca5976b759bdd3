/**
 * Counting commands: newlines, digits, numbers, characters, words.
 */

import { Output } from "@textscope/sdk";
import type { Flag, Operations } from "@textscope/sdk";
import { countMatches, flagTag, splitWords } from "@textscope/shared";
import { AnalysisCommand } from "./base.js";

const DIGITS = new Set("0123456789");

/** A run of digits at the start of the text or after whitespace, not followed by a word character. */
const NUMBER_PATTERN = /(^|\s)[0-9]+(?!\w)/g;

/** -n / --newlines */
export class CountLinesCommand extends AnalysisCommand {
  readonly caller = "-n";
  readonly alias = "--newlines";
  readonly description = "Count newline characters";

  execute(flag: Flag, operations: Operations): Output {
    const count = operations.source.split("\n").length - 1;
    return Output.ok(`${flagTag(flag.name)}New lines: ${count}`);
  }
}

/** -d / --digits: every ASCII digit character, wherever it appears. */
export class CountDigitsCommand extends AnalysisCommand {
  readonly caller = "-d";
  readonly alias = "--digits";
  readonly description = "Count digit characters";

  execute(flag: Flag, operations: Operations): Output {
    let count = 0;
    for (const ch of operations.source) {
      if (DIGITS.has(ch)) count++;
    }
    return Output.ok(`${flagTag(flag.name)}Digits: ${count}`);
  }
}

/** -dd / --numbers: standalone numeric tokens. */
export class CountNumbersCommand extends AnalysisCommand {
  readonly caller = "-dd";
  readonly alias = "--numbers";
  readonly description = "Count standalone numbers";

  execute(flag: Flag, operations: Operations): Output {
    const count = countMatches(operations.source, NUMBER_PATTERN);
    return Output.ok(`${flagTag(flag.name)}Numbers: ${count}`);
  }
}

/**
 * -c / --chars
 *
 * The loaded source carries one synthetic trailing newline, which is not counted.
 */
export class CountCharsCommand extends AnalysisCommand {
  readonly caller = "-c";
  readonly alias = "--chars";
  readonly description = "Count characters";

  execute(flag: Flag, operations: Operations): Output {
    return Output.ok(`${flagTag(flag.name)}Chars: ${operations.source.length - 1}`);
  }
}

/** -w / --words */
export class CountWordsCommand extends AnalysisCommand {
  readonly caller = "-w";
  readonly alias = "--words";
  readonly description = "Count whitespace-delimited words";

  execute(flag: Flag, operations: Operations): Output {
    return Output.ok(`${flagTag(flag.name)}Words: ${splitWords(operations.source).length}`);
  }
}
