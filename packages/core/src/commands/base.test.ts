import { describe, it, expect } from "vitest";
import type { FlagCommand } from "@textscope/sdk";
import { createMemoryFileAccess } from "@textscope/sdk/testing";
import { SourceFileCommand, InputFileCommand, OutputFileCommand, loadSource } from "./base.js";
import { parseInstruction } from "../instruction/parser.js";
import { createOperations } from "../engine/operations.js";

function flagOf(tokens: string[]) {
  const instruction = parseInstruction(tokens);
  const flag = instruction.getByPosition(0);
  if (!flag) throw new Error("no flag parsed");
  return { instruction, flag };
}

describe("loadSource", () => {
  it("appends a newline to every line", () => {
    expect(loadSource("abc")).toBe("abc\n");
    expect(loadSource("a\nb")).toBe("a\nb\n");
  });

  it("adds one newline after a trailing line break", () => {
    expect(loadSource("abc\n")).toBe("abc\n\n");
  });

  it("turns an empty file into a single newline", () => {
    expect(loadSource("")).toBe("\n");
  });
});

describe("SourceFileCommand", () => {
  const files = createMemoryFileAccess({ files: { "notes.txt": "alpha beta" } });
  const command: FlagCommand = new SourceFileCommand(files);

  it("is bound to -f / --file", () => {
    expect(command.caller).toBe("-f");
    expect(command.alias).toBe("--file");
  });

  it("loads the file into the context", () => {
    const { flag, instruction } = flagOf(["-f", "notes.txt"]);
    const operations = createOperations();

    const output = command.validate(flag, instruction, operations);

    expect(output).toEqual({ status: "ok", message: "" });
    expect(operations.fileIn).toBe("notes.txt");
    expect(operations.source).toBe("alpha beta\n");
  });

  it("requires an argument", () => {
    const { flag, instruction } = flagOf(["--file"]);
    const operations = createOperations();

    expect(command.validate(flag, instruction, operations)).toEqual({
      status: "err",
      message: "<--file> This flag requires an argument!",
    });
    expect(operations.source).toBe("");
  });

  it("rejects missing files", () => {
    const { flag, instruction } = flagOf(["-f", "missing.txt"]);
    const operations = createOperations();

    expect(command.validate(flag, instruction, operations).message).toBe(
      "<-f> Provided file doesn't exists!",
    );
    expect(operations.fileIn).toBe("");
  });

  it("has nothing to report on execute", () => {
    const { flag } = flagOf(["-f", "notes.txt"]);
    expect(command.execute(flag, createOperations()).message).toBe("");
  });
});

describe("InputFileCommand", () => {
  it("is a no-op in both phases", () => {
    const command: FlagCommand = new InputFileCommand();
    const { flag, instruction } = flagOf(["-i", "flags.txt"]);
    const operations = createOperations();

    expect(command.validate(flag, instruction, operations).status).toBe("ok");
    expect(command.execute(flag, operations).status).toBe("ok");
    expect(operations).toEqual(createOperations());
  });
});

describe("OutputFileCommand", () => {
  const command = new OutputFileCommand();

  it("records the destination", () => {
    const { flag, instruction } = flagOf(["-o", "report.txt"]);
    const operations = createOperations();

    expect(command.validate(flag, instruction, operations).status).toBe("ok");
    expect(operations.fileOut).toBe("report.txt");
  });

  it("requires an argument", () => {
    const { flag, instruction } = flagOf(["-o"]);
    expect(command.validate(flag, instruction, createOperations()).message).toBe(
      "<-o> This flag requires an argument!",
    );
  });
});
