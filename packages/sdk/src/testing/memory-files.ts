/**
 * MemoryFileAccess - in-memory FileAccess for engine and command unit tests.
 *
 * @example
 * ```typescript
 * import { createMemoryFileAccess } from "@textscope/sdk/testing";
 *
 * const files = createMemoryFileAccess({ files: { "notes.txt": "alpha beta" } });
 * const engine = createEngine({ files });
 * engine.run(["-f", "notes.txt", "-w"]);
 * ```
 */

import { Buffer } from "node:buffer";
import type { FileAccess } from "../types/files.js";
import { FileAccessError } from "../errors/base.js";

export interface MemoryFileAccessOptions {
  /** Initial files keyed by path. Default: {} */
  files?: Record<string, string>;

  /** Reported byte sizes that override the UTF-8 length of the content. */
  sizes?: Record<string, number>;
}

export class MemoryFileAccess implements FileAccess {
  private files = new Map<string, string>();
  private sizes = new Map<string, number>();
  private writes: Array<{ path: string; content: string }> = [];

  constructor(options: MemoryFileAccessOptions = {}) {
    for (const [path, content] of Object.entries(options.files ?? {})) {
      this.files.set(path, content);
    }
    for (const [path, bytes] of Object.entries(options.sizes ?? {})) {
      this.sizes.set(path, bytes);
    }
  }

  exists(path: string): boolean {
    return this.files.has(path);
  }

  read(path: string): string {
    const content = this.files.get(path);
    if (content === undefined) {
      throw new FileAccessError(path, "no such file");
    }
    return content;
  }

  write(path: string, content: string): void {
    this.files.set(path, content);
    this.sizes.delete(path);
    this.writes.push({ path, content });
  }

  size(path: string): number {
    const override = this.sizes.get(path);
    if (override !== undefined && this.files.has(path)) return override;
    return Buffer.byteLength(this.read(path), "utf-8");
  }

  // ─── Test helpers ───

  /** Add or replace a file. */
  set(path: string, content: string, bytes?: number): void {
    this.files.set(path, content);
    if (bytes === undefined) {
      this.sizes.delete(path);
    } else {
      this.sizes.set(path, bytes);
    }
  }

  remove(path: string): void {
    this.files.delete(path);
    this.sizes.delete(path);
  }

  /** Content of a file, or undefined when it does not exist. */
  get(path: string): string | undefined {
    return this.files.get(path);
  }

  /** Every write() call in order. */
  getWrites(): ReadonlyArray<{ path: string; content: string }> {
    return [...this.writes];
  }
}

export function createMemoryFileAccess(options?: MemoryFileAccessOptions): MemoryFileAccess {
  return new MemoryFileAccess(options);
}
