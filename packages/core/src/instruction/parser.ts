/**
 * Instruction parser.
 *
 * Turns raw argument tokens into positioned flags:
 *   - a token starting with "-" opens a new flag
 *   - following tokens are appended to that flag's argument, space-separated
 *   - tokens before the first flag and empty tokens are dropped
 *
 * Examples:
 *   parseInstruction(["-f", "notes.txt", "-w"])
 *     → [{ name: "-f", argument: "notes.txt", position: 0 }, { name: "-w", argument: "", position: 1 }]
 *   parseInstruction(["stray", "-a", "rat", "tar"])
 *     → [{ name: "-a", argument: "rat tar", position: 0 }]
 */

import type { Flag, Instruction } from "@textscope/sdk";

interface OpenFlag {
  name: string;
  position: number;
  argument: string;
}

export function isFlagToken(token: string): boolean {
  return token.startsWith("-");
}

export function parseInstruction(tokens: readonly string[]): Instruction {
  const flags: Flag[] = [];
  let open: OpenFlag | undefined;
  let position = 0;

  const close = (): void => {
    if (!open) return;
    const argument = open.argument.endsWith(" ") ? open.argument.slice(0, -1) : open.argument;
    flags.push({ name: open.name, argument, position: open.position, modifier: 0 });
    open = undefined;
  };

  for (const token of tokens) {
    if (token === "") continue;

    if (isFlagToken(token)) {
      close();
      open = { name: token, position: position++, argument: "" };
      continue;
    }

    if (open) {
      open.argument += `${token} `;
    }
  }
  close();

  return createInstruction(flags);
}

/** Wrap already-built flags. The records are shared, not copied. */
export function createInstruction(flags: Flag[]): Instruction {
  return {
    flags: () => flags,
    size: () => flags.length,
    getByName: (name) => flags.find((flag) => flag.name === name),
    getByPosition: (position) => flags.find((flag) => flag.position === position),
    has: (caller, alias) => flags.some((flag) => flag.name === caller || flag.name === alias),
  };
}
