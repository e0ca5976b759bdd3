import type { FlagCommand } from "@textscope/sdk";

const LABEL_WIDTH = 24;

export function isHelpRequest(argv: readonly string[]): boolean {
  return argv.length === 1 && (argv[0] === "-h" || argv[0] === "--help");
}

/** Usage text listing `commands` in registration order. */
export function formatHelp(commands: readonly FlagCommand[]): string {
  const lines = [
    "TextScope - text file analysis",
    "",
    "Usage: textscope -f <file> [flags...] [-o <file>]",
    "       textscope -i <file>",
    "",
    "Flags:",
    ...commands.map(
      (command) => `  ${`${command.caller}, ${command.alias}`.padEnd(LABEL_WIDTH)}${command.description}`,
    ),
    `  ${"-h, --help".padEnd(LABEL_WIDTH)}Show this help message`,
  ];
  return `${lines.join("\n")}\n`;
}
