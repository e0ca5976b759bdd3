/**
 * CommandRegistry — holds the flag commands an engine dispatches to.
 *
 * Commands are kept in registration order and found by either of their two
 * names. Registering a second command with the same caller/alias pair is a
 * no-op, so engines can chain `add()` calls without guarding for duplicates.
 */

import type { FlagCommand } from "@textscope/sdk";
import { createLogger } from "@textscope/shared";

const logger = createLogger("CommandRegistry");

export interface CommandRegistry {
  register(command: FlagCommand): void;
  findByCaller(caller: string): FlagCommand | undefined;
  findByAlias(alias: string): FlagCommand | undefined;
  exists(caller: string, alias: string): boolean;
  list(): FlagCommand[];
}

export function createCommandRegistry(): CommandRegistry {
  const commands: FlagCommand[] = [];

  function exists(caller: string, alias: string): boolean {
    return commands.some((command) => command.caller === caller && command.alias === alias);
  }

  return {
    register(command: FlagCommand): void {
      if (exists(command.caller, command.alias)) {
        logger.debug(`Skipping duplicate command: ${command.caller} / ${command.alias}`);
        return;
      }
      logger.debug(`Registering command: ${command.caller} / ${command.alias}`);
      commands.push(command);
    },

    findByCaller(caller: string): FlagCommand | undefined {
      return commands.find((command) => command.caller === caller);
    },

    findByAlias(alias: string): FlagCommand | undefined {
      return commands.find((command) => command.alias === alias);
    },

    exists,

    list(): FlagCommand[] {
      return [...commands];
    },
  };
}
