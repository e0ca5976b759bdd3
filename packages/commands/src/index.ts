import type { FileAccess, FlagCommand } from "@textscope/sdk";
import {
  CountCharsCommand,
  CountDigitsCommand,
  CountLinesCommand,
  CountNumbersCommand,
  CountWordsCommand,
} from "./counts.js";
import { AnagramsCommand, PalindromesCommand } from "./matching.js";
import { ReverseSortedWordsCommand, SortedWordsCommand } from "./words.js";
import { FileSizeCommand } from "./size.js";
import { ByLengthCommand } from "./modifiers.js";

export { AnalysisCommand } from "./base.js";
export {
  CountCharsCommand,
  CountDigitsCommand,
  CountLinesCommand,
  CountNumbersCommand,
  CountWordsCommand,
} from "./counts.js";
export {
  AnagramsCommand,
  PalindromesCommand,
  areAnagrams,
  arePalindromes,
  matchWords,
  ReferenceMatchCommand,
} from "./matching.js";
export type { WordMatcher } from "./matching.js";
export {
  SortedWordsCommand,
  ReverseSortedWordsCommand,
  SORT_BY_LENGTH,
  ascending,
  descending,
} from "./words.js";
export type { WordComparator } from "./words.js";
export { FileSizeCommand, formatSize } from "./size.js";
export { ByLengthCommand } from "./modifiers.js";

/** Every analysis command, in help-text order. */
export function createAnalysisCommands(files: FileAccess): FlagCommand[] {
  return [
    new CountLinesCommand(),
    new CountDigitsCommand(),
    new CountNumbersCommand(),
    new CountCharsCommand(),
    new CountWordsCommand(),
    new AnagramsCommand(),
    new PalindromesCommand(),
    new SortedWordsCommand(),
    new ReverseSortedWordsCommand(),
    new FileSizeCommand(files),
    new ByLengthCommand(),
  ];
}
