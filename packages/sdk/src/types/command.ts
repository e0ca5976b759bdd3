import type { Flag, Instruction } from "./flag.js";
import type { Operations } from "./operations.js";
import type { Output } from "./output.js";

/**
 * A handler bound to exactly one flag identity.
 *
 * The engine runs `validate` for every flag (in position order) before any
 * `execute`. An `err` from validate aborts the whole run; an `err` from
 * execute is recorded and the run continues.
 */
export interface FlagCommand {
  /** Short name (e.g. "-s") */
  readonly caller: string;

  /** Long name (e.g. "--sorted") */
  readonly alias: string;

  /** One-line description for help text */
  readonly description: string;

  /**
   * Check the flag and prepare the shared context.
   * May set `modifier` on a different flag through `instruction.getByPosition`.
   */
  validate(flag: Flag, instruction: Instruction, operations: Operations): Output;

  /** Produce the reportable result. Should not mutate `operations`. */
  execute(flag: Flag, operations: Operations): Output;
}
