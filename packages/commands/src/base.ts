import { Output } from "@textscope/sdk";
import type { Flag, FlagCommand, Operations } from "@textscope/sdk";

/**
 * Base for commands that only report on the loaded source.
 * Validation always passes; subclasses supply execute().
 */
export abstract class AnalysisCommand implements FlagCommand {
  abstract readonly caller: string;
  abstract readonly alias: string;
  abstract readonly description: string;

  validate(): Output {
    return Output.ok();
  }

  abstract execute(flag: Flag, operations: Operations): Output;
}
