import { describe, it, expect } from "vitest";
import { createMemoryFileAccess } from "@textscope/sdk/testing";
import { FileSizeCommand, formatSize } from "../size.js";
import { flagAt, operationsFor } from "./helpers.js";

describe("formatSize", () => {
  it("keeps small sizes in bytes", () => {
    expect(formatSize(0)).toBe("0 B");
    expect(formatSize(999)).toBe("999 B");
  });

  it("divides by 1000 per unit", () => {
    expect(formatSize(1000)).toBe("1 KB");
    expect(formatSize(2_500_000)).toBe("2.5 MB");
    expect(formatSize(3_000_000_000)).toBe("3 GB");
  });

  it("rounds to two decimals", () => {
    expect(formatSize(1536)).toBe("1.54 KB");
    expect(formatSize(999_999)).toBe("1000 KB");
  });

  it("stays in GB for huge sizes", () => {
    expect(formatSize(5_000_000_000_000)).toBe("5000 GB");
  });
});

describe("FileSizeCommand", () => {
  const files = createMemoryFileAccess({
    files: { "big.txt": "x" },
    sizes: { "big.txt": 2_500_000 },
  });
  const command = new FileSizeCommand(files);
  const { flag } = flagAt(["-si"]);

  it("reports the size of the source file", () => {
    expect(command.execute(flag, operationsFor("x\n", "big.txt"))).toEqual({
      status: "ok",
      message: "<-si> 2.5 MB",
    });
  });

  it("fails without a source file path", () => {
    expect(command.execute(flag, operationsFor("x\n", ""))).toEqual({
      status: "err",
      message: "<-si> Source file size is unavailable!",
    });
  });

  it("fails when the size cannot be read", () => {
    expect(command.execute(flag, operationsFor("x\n", "gone.txt")).message).toBe(
      '<-si> File "gone.txt" error: no such file',
    );
  });
});
