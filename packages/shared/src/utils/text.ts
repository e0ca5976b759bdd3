/**
 * Word and pattern helpers shared by the engine and the analysis commands.
 */

const WORD_PATTERN = /\S+/g;

/** Maximal runs of non-whitespace characters, in order. */
export function splitWords(text: string): string[] {
  return text.match(WORD_PATTERN) ?? [];
}

/** Number of non-overlapping matches of `pattern` in `text`. */
export function countMatches(text: string, pattern: RegExp): number {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  return Array.from(text.matchAll(new RegExp(pattern.source, flags))).length;
}

/** Elements in first-seen order, duplicates dropped. */
export function distinct<T>(items: Iterable<T>): T[] {
  return [...new Set(items)];
}
