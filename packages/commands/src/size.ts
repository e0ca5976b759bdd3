/**
 * -si / --size: source file size in B, KB, MB or GB.
 */

import { Output, errorMessage } from "@textscope/sdk";
import type { FileAccess, Flag, Operations } from "@textscope/sdk";
import { flagTag } from "@textscope/shared";
import { AnalysisCommand } from "./base.js";

const UNITS = ["B", "KB", "MB", "GB"] as const;

/** Decimal (1000-based) scaling, rounded to two places; stops at GB. */
export function formatSize(bytes: number): string {
  let size = bytes;
  let unit = 0;
  while (size >= 1000 && unit < UNITS.length - 1) {
    size /= 1000;
    unit++;
  }
  const rounded = Math.round(size * 100) / 100;
  return `${rounded} ${UNITS[unit]}`;
}

export class FileSizeCommand extends AnalysisCommand {
  readonly caller = "-si";
  readonly alias = "--size";
  readonly description = "Show the source file size";

  constructor(private readonly files: FileAccess) {
    super();
  }

  execute(flag: Flag, operations: Operations): Output {
    if (operations.fileIn === "") {
      return Output.err(`${flagTag(flag.name)}Source file size is unavailable!`);
    }

    let bytes: number;
    try {
      bytes = this.files.size(operations.fileIn);
    } catch (err) {
      return Output.err(`${flagTag(flag.name)}${errorMessage(err)}`);
    }

    return Output.ok(`${flagTag(flag.name)}${formatSize(bytes)}`);
  }
}
