/**
 * Whole-file I/O used by the engine and by commands that touch the disk.
 *
 * Implementations are synchronous. `exists` never throws; the other methods
 * throw FileAccessError when the operation fails.
 */
export interface FileAccess {
  exists(path: string): boolean;

  /** Entire file contents as text. */
  read(path: string): string;

  /** Truncate (or create) the file and write `content`. */
  write(path: string, content: string): void;

  /** Size on disk in bytes. */
  size(path: string): number;
}
