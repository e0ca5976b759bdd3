/**
 * Report message formatting.
 *
 * Every command message starts with the flag's tag, the literal token the
 * user typed in angle brackets: `<-s> `.
 */

/** Tag prefix for messages about the flag given as `name`. */
export function flagTag(name: string): string {
  return `<${name}> `;
}

/**
 * Brace block listing `items`, one quoted item per indented line.
 *
 * ```
 * <-s> {
 *     "alpha",
 *     "beta",
 * }
 * ```
 *
 * An empty list renders as `<-s> { }`.
 */
export function formatList(name: string, items: readonly string[]): string {
  if (items.length === 0) {
    return `${flagTag(name)}{ }`;
  }
  const lines = items.map((item) => `    "${item}",`);
  return [`${flagTag(name)}{`, ...lines, "}"].join("\n");
}
