import { describe, it, expect } from "vitest";
import { ByLengthCommand } from "../modifiers.js";
import { flagAt } from "./helpers.js";

describe("ByLengthCommand", () => {
  const command = new ByLengthCommand();

  it("marks the following sort flag", () => {
    const { flag, instruction } = flagAt(["-l", "-s"]);

    expect(command.validate(flag, instruction).status).toBe("ok");
    expect(instruction.getByPosition(1)?.modifier).toBe(1);
  });

  it("accepts long names", () => {
    const { flag, instruction } = flagAt(["--by-length", "--reverse-sorted"]);

    expect(command.validate(flag, instruction).status).toBe("ok");
    expect(instruction.getByName("--reverse-sorted")?.modifier).toBe(1);
  });

  it("lets a repeated flag pass the marking on", () => {
    const { flag, instruction } = flagAt(["-l", "-l", "-rs"]);

    expect(command.validate(flag, instruction).status).toBe("ok");
    expect(instruction.getByPosition(1)?.modifier).toBe(0);
    expect(instruction.getByPosition(2)?.modifier).toBe(0);

    const second = instruction.getByPosition(1);
    if (!second) throw new Error("missing second flag");
    command.validate(second, instruction);
    expect(instruction.getByPosition(2)?.modifier).toBe(1);
  });

  it("can't be the last flag", () => {
    const { flag, instruction } = flagAt(["-s", "-l"], 1);
    expect(command.validate(flag, instruction)).toEqual({
      status: "err",
      message: "<-l> This flag can't be the last one!",
    });
  });

  it("must be followed by a sort flag", () => {
    const { flag, instruction } = flagAt(["-l", "-w"]);

    expect(command.validate(flag, instruction).message).toBe("<-l> Missing required flag after this one!");
    expect(instruction.getByPosition(1)?.modifier).toBe(0);
  });

  it("has nothing to report on execute", () => {
    expect(command.execute().message).toBe("");
  });
});
