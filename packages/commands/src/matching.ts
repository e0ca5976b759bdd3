/**
 * Reference-word matching: anagrams and palindromes.
 *
 * Both flags take the reference words as their argument and must be the
 * last flag, since everything after them would be swallowed as reference text.
 */

import { Output } from "@textscope/sdk";
import type { Flag, FlagCommand, Instruction, Operations } from "@textscope/sdk";
import { distinct, flagTag, formatList, splitWords } from "@textscope/shared";

export function areAnagrams(first: string, second: string): boolean {
  if (first.length !== second.length) return false;
  const sorted = (word: string): string => [...word].sort().join("");
  return sorted(first) === sorted(second);
}

/** Whether `first` reads as `second` reversed. */
export function arePalindromes(first: string, second: string): boolean {
  if (first.length !== second.length) return false;
  return first === [...second].reverse().join("");
}

export type WordMatcher = (sourceWord: string, referenceWord: string) => boolean;

/** Distinct source words matching any reference word, in first-match order. */
export function matchWords(source: string, reference: string, matches: WordMatcher): string[] {
  const references = splitWords(reference);
  const found = splitWords(source).filter((word) =>
    references.some((candidate) => matches(word, candidate)),
  );
  return distinct(found);
}

export abstract class ReferenceMatchCommand implements FlagCommand {
  abstract readonly caller: string;
  abstract readonly alias: string;
  abstract readonly description: string;

  protected abstract matches(sourceWord: string, referenceWord: string): boolean;

  validate(flag: Flag, instruction: Instruction): Output {
    if (instruction.getByPosition(flag.position + 1)) {
      return Output.err(`${flagTag(flag.name)}This flag should be the last one`);
    }

    if (flag.argument === "") {
      return Output.err(`${flagTag(flag.name)}This flag requires an argument!`);
    }

    return Output.ok();
  }

  execute(flag: Flag, operations: Operations): Output {
    const words = matchWords(operations.source, flag.argument, (a, b) => this.matches(a, b));
    return Output.ok(formatList(flag.name, words));
  }
}

/** -a / --anagrams <reference words...> */
export class AnagramsCommand extends ReferenceMatchCommand {
  readonly caller = "-a";
  readonly alias = "--anagrams";
  readonly description = "List source words that are anagrams of the given words (must be last)";

  protected matches(sourceWord: string, referenceWord: string): boolean {
    return areAnagrams(sourceWord, referenceWord);
  }
}

/** -p / --palindromes <reference words...> */
export class PalindromesCommand extends ReferenceMatchCommand {
  readonly caller = "-p";
  readonly alias = "--palindromes";
  readonly description = "List source words that are the given words reversed (must be last)";

  protected matches(sourceWord: string, referenceWord: string): boolean {
    return arePalindromes(sourceWord, referenceWord);
  }
}
