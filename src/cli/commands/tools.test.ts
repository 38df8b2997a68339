/**
 * Tests for tools and call commands
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("@clack/prompts", () => ({
  outro: vi.fn(),
  log: {
    message: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

import * as p from "@clack/prompts";
import chalk from "chalk";
import { Command } from "commander";
import { registerToolsCommands } from "./tools.js";
import { MCPDataError, MCPServerNotFoundError, MCPToolExecutionError } from "../../mcp/errors.js";
import { createLogger, setLogger } from "../../utils/logger.js";
import { createCLIFixture, type CLIFixture } from "../../../test/mocks/cli.js";

chalk.level = 0;

function messages(): unknown[] {
  return vi.mocked(p.log.message).mock.calls.map(([line]) => line);
}

describe("tools commands", () => {
  let fixture: CLIFixture;

  beforeEach(async () => {
    vi.clearAllMocks();
    setLogger(createLogger({ level: "fatal" }));
    fixture = await createCLIFixture();
  });

  afterEach(async () => {
    await fixture.cleanup();
  });

  it("should register tools and call", () => {
    const program = new Command();
    registerToolsCommands(program);

    expect(program.commands.map((c) => c.name())).toEqual(["tools", "call"]);
    const call = program.commands.find((c) => c.name() === "call");
    expect(call?.options.map((o) => o.long)).toEqual(["--raw"]);
  });

  describe("tools", () => {
    it("should list the tools of one server and close it", async () => {
      await fixture.run("tools", "calc");

      expect(messages()).toEqual(["  calc_add  Add two numbers", "  calc_multiply  Multiply two numbers"]);
      expect(p.outro).toHaveBeenCalledWith("Total: 2 tools");
      expect(fixture.transports).toHaveLength(1);
      expect(fixture.transports[0]?.isConnected()).toBe(false);
    });

    it("should list tools of every server and skip failures", async () => {
      await fixture.run("tools");

      expect(p.log.warn).toHaveBeenCalledWith(
        "Skipped 'broken': Failed to spawn 'broken-server': ENOENT",
      );
      expect(messages()).toEqual([
        "  calc_add  Add two numbers",
        "  calc_multiply  Multiply two numbers",
        "  notes_add  Add two numbers",
        "  notes_multiply  Multiply two numbers",
        "  remote_add  Add two numbers",
        "  remote_multiply  Multiply two numbers",
      ]);
      expect(p.outro).toHaveBeenCalledWith("Total: 6 tools");
      expect(fixture.transports.every((t) => !t.isConnected())).toBe(true);
    });

    it("should reject an unknown server", async () => {
      await expect(fixture.run("tools", "staging")).rejects.toThrow(MCPServerNotFoundError);
    });
  });

  describe("call", () => {
    it("should print the tool result as text", async () => {
      await fixture.run("call", "calc", "add", '{"a":5,"b":7}');

      expect(messages()).toEqual(["12"]);
      expect(fixture.transports[0]?.server.requests("tools/call")[0]?.params).toEqual({
        name: "add",
        arguments: { a: 5, b: 7 },
      });
    });

    it("should print the raw result with --raw", async () => {
      await fixture.run("call", "calc", "multiply", '{"a":6,"b":7}', "--raw");

      expect(messages()).toEqual([
        JSON.stringify({ content: [{ type: "text", text: "42" }] }, null, 2),
      ]);
    });

    it("should raise when the tool reports an error", async () => {
      await expect(fixture.run("call", "calc", "add", '{"a":"five","b":7}')).rejects.toThrow(
        new MCPToolExecutionError("add", "a and b must be numbers"),
      );
    });

    it("should reject invalid JSON without connecting", async () => {
      await expect(fixture.run("call", "calc", "add", "{a: 5}")).rejects.toThrow(
        new MCPDataError("Tool arguments must be valid JSON"),
      );
      expect(fixture.transports).toHaveLength(0);
    });

    it("should reject JSON that is not an object", async () => {
      await expect(fixture.run("call", "calc", "add", "[5, 7]")).rejects.toThrow(
        "Tool arguments must be a JSON object",
      );
    });
  });
});
