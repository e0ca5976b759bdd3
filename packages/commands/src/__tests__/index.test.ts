import { describe, it, expect } from "vitest";
import { createMemoryFileAccess } from "@textscope/sdk/testing";
import { createAnalysisCommands } from "../index.js";

describe("createAnalysisCommands", () => {
  it("lists every analysis flag in help order", () => {
    const commands = createAnalysisCommands(createMemoryFileAccess());

    expect(commands.map((command) => [command.caller, command.alias])).toEqual([
      ["-n", "--newlines"],
      ["-d", "--digits"],
      ["-dd", "--numbers"],
      ["-c", "--chars"],
      ["-w", "--words"],
      ["-a", "--anagrams"],
      ["-p", "--palindromes"],
      ["-s", "--sorted"],
      ["-rs", "--reverse-sorted"],
      ["-si", "--size"],
      ["-l", "--by-length"],
    ]);
  });

  it("gives every command a description", () => {
    for (const command of createAnalysisCommands(createMemoryFileAccess())) {
      expect(command.description.length).toBeGreaterThan(0);
    }
  });
});
