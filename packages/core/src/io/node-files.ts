/**
 * FileAccess backed by node:fs. Whole-file, synchronous.
 */

import { readFileSync, statSync, writeFileSync } from "node:fs";
import { FileAccessError, errorMessage } from "@textscope/sdk";
import type { FileAccess } from "@textscope/sdk";
import type { TextEncoding } from "@textscope/shared";

export interface NodeFileAccessOptions {
  /** Text encoding for read() and write(). Default: "utf-8" */
  encoding?: TextEncoding;
}

export function createNodeFileAccess(options: NodeFileAccessOptions = {}): FileAccess {
  const encoding = options.encoding ?? "utf-8";

  function wrap<T>(path: string, action: () => T): T {
    try {
      return action();
    } catch (err) {
      throw new FileAccessError(path, errorMessage(err), { cause: err });
    }
  }

  return {
    exists(path: string): boolean {
      try {
        return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
      } catch {
        // unreadable parent directory and similar: not a usable file
        return false;
      }
    },

    read(path: string): string {
      return wrap(path, () => readFileSync(path, { encoding }));
    },

    write(path: string, content: string): void {
      wrap(path, () => writeFileSync(path, content, { encoding }));
    },

    size(path: string): number {
      return wrap(path, () => statSync(path).size);
    },
  };
}
