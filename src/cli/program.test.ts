/**
 * Tests for CLI program
 */

import { describe, it, expect } from "vitest";
import { createProgram } from "./program.js";
import { VERSION } from "../version.js";

describe("createProgram", () => {
  it("should be named mcpsw", () => {
    const program = createProgram();

    expect(program.name()).toBe("mcpsw");
    expect(program.version()).toBe(VERSION);
  });

  it("should register every command", () => {
    const program = createProgram();

    expect(program.commands.map((c) => c.name())).toEqual([
      "servers",
      "tools",
      "call",
      "resources",
      "read",
      "prompt",
    ]);
  });

  it("should accept a global config option", () => {
    const program = createProgram();

    expect(program.options.map((o) => o.long)).toEqual(["--version", "--config"]);
  });
});
