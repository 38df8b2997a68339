/**
 * Tests for CLI shared helpers
 */

import { describe, it, expect } from "vitest";
import { Command } from "commander";
import { getConfigPath, parseJSONObject, parsePromptArgs } from "./shared.js";
import { MCPDataError } from "../mcp/errors.js";

describe("parseJSONObject", () => {
  it("should treat missing or blank text as an empty object", () => {
    expect(parseJSONObject(undefined, "Tool arguments")).toEqual({});
    expect(parseJSONObject("   ", "Tool arguments")).toEqual({});
  });

  it("should parse nested objects", () => {
    expect(parseJSONObject('{"path":"/tmp/a.txt","opts":{"lines":[1,2]}}', "Tool arguments")).toEqual({
      path: "/tmp/a.txt",
      opts: { lines: [1, 2] },
    });
  });

  it("should name the value in errors", () => {
    expect(() => parseJSONObject("{", "Headers")).toThrow(new MCPDataError("Headers must be valid JSON"));
    expect(() => parseJSONObject('"text"', "Headers")).toThrow(new MCPDataError("Headers must be a JSON object"));
    expect(() => parseJSONObject("null", "Headers")).toThrow("Headers must be a JSON object");
  });
});

describe("parsePromptArgs", () => {
  it("should accept string values", () => {
    expect(parsePromptArgs('{"expression":"2 + 2","style":"short"}')).toEqual({
      expression: "2 + 2",
      style: "short",
    });
  });

  it("should reject other values", () => {
    expect(() => parsePromptArgs('{"count":3}')).toThrow(
      new MCPDataError("Prompt arguments must map names to strings"),
    );
  });
});

describe("getConfigPath", () => {
  it("should read --config from the root program", async () => {
    const program = new Command().option("-c, --config <path>");
    let seen: string | undefined = "unset";
    program
      .command("servers")
      .action((_options: unknown, command: Command) => {
        seen = getConfigPath(command);
      });

    await program.parseAsync(["node", "mcpsw", "--config", "servers.json", "servers"]);

    expect(seen).toBe("servers.json");
  });

  it("should be undefined without --config", async () => {
    const program = new Command().option("-c, --config <path>");
    let seen: string | undefined = "unset";
    program
      .command("servers")
      .action((_options: unknown, command: Command) => {
        seen = getConfigPath(command);
      });

    await program.parseAsync(["node", "mcpsw", "servers"]);

    expect(seen).toBeUndefined();
  });
});
