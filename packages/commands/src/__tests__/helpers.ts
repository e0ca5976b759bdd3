import type { Flag, Instruction, Operations } from "@textscope/sdk";
import { parseInstruction } from "@textscope/core";

export function operationsFor(source: string, fileIn = "notes.txt"): Operations {
  return { source, fileIn, fileOut: "", panicked: false };
}

/** Parse `tokens` and return the flag at `position` along with its instruction. */
export function flagAt(tokens: string[], position = 0): { flag: Flag; instruction: Instruction } {
  const instruction = parseInstruction(tokens);
  const flag = instruction.getByPosition(position);
  if (!flag) {
    throw new Error(`no flag at position ${position} in ${tokens.join(" ")}`);
  }
  return { flag, instruction };
}
