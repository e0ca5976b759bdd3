/**
 * Sorted word listings.
 *
 * A flag's modifier switches the comparator from value to length;
 * see ByLengthCommand.
 */

import { Output } from "@textscope/sdk";
import type { Flag, Operations } from "@textscope/sdk";
import { formatList, splitWords } from "@textscope/shared";
import { AnalysisCommand } from "./base.js";

/** Modifier value that makes the sort commands compare word lengths. */
export const SORT_BY_LENGTH = 1;

export type WordComparator = (left: string, right: string) => number;

export function ascending(byLength: boolean): WordComparator {
  if (byLength) {
    return (left, right) => left.length - right.length;
  }
  return (left, right) => (left < right ? -1 : left > right ? 1 : 0);
}

export function descending(byLength: boolean): WordComparator {
  const compare = ascending(byLength);
  return (left, right) => compare(right, left);
}

/** -s / --sorted */
export class SortedWordsCommand extends AnalysisCommand {
  static readonly CALLER = "-s";
  static readonly ALIAS = "--sorted";

  readonly caller = SortedWordsCommand.CALLER;
  readonly alias = SortedWordsCommand.ALIAS;
  readonly description = "List words in ascending order";

  execute(flag: Flag, operations: Operations): Output {
    const words = splitWords(operations.source).sort(ascending(flag.modifier === SORT_BY_LENGTH));
    return Output.ok(formatList(flag.name, words));
  }
}

/** -rs / --reverse-sorted */
export class ReverseSortedWordsCommand extends AnalysisCommand {
  static readonly CALLER = "-rs";
  static readonly ALIAS = "--reverse-sorted";

  readonly caller = ReverseSortedWordsCommand.CALLER;
  readonly alias = ReverseSortedWordsCommand.ALIAS;
  readonly description = "List words in descending order";

  execute(flag: Flag, operations: Operations): Output {
    const words = splitWords(operations.source).sort(descending(flag.modifier === SORT_BY_LENGTH));
    return Output.ok(formatList(flag.name, words));
  }
}
