/**
 * Flag and Instruction types shared by the engine and every command.
 */

/** One recognized unit of user input: a flag token plus its trailing arguments. */
export interface Flag {
  /** Literal token used on the command line (e.g. "-s" or "--sorted") */
  readonly name: string;

  /** Trailing non-flag tokens joined by single spaces. Empty when none were given. */
  readonly argument: string;

  /** 0-based index among flags only, in encounter order */
  readonly position: number;

  /**
   * Behavior switch written by another command's validate phase.
   * 0 means default behavior.
   */
  modifier: number;
}

/** Ordered collection of the flags parsed from one input batch. */
export interface Instruction {
  /** All flags in position order. */
  flags(): readonly Flag[];

  size(): number;

  /** First flag whose name equals `name`. */
  getByName(name: string): Flag | undefined;

  /**
   * Live flag record at `position`. Its `modifier` may be written during a
   * validate phase to change how that flag executes later.
   */
  getByPosition(position: number): Flag | undefined;

  /** True when any flag was given by either of the two names. */
  has(caller: string, alias: string): boolean;
}
