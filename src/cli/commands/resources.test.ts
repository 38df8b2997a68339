/**
 * Tests for resources and read commands
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
import { MCPAPIError } from "../../mcp/errors.js";
import { createLogger, setLogger } from "../../utils/logger.js";
import { createCLIFixture, type CLIFixture } from "../../../test/mocks/cli.js";

chalk.level = 0;

function messages(): unknown[] {
  return vi.mocked(p.log.message).mock.calls.map(([line]) => line);
}

describe("resources commands", () => {
  let fixture: CLIFixture;

  beforeEach(async () => {
    vi.clearAllMocks();
    setLogger(createLogger({ level: "fatal" }));
    fixture = await createCLIFixture();
  });

  afterEach(async () => {
    await fixture.cleanup();
  });

  it("should list resources and templates", async () => {
    await fixture.run("resources", "calc");

    expect(messages()).toEqual([
      "  calc://current  Current value",
      "  calc://history  History",
      "  calc://timestamp/{time}  Timestamp (template)",
    ]);
    expect(p.outro).toHaveBeenCalledWith("Total: 2 resources, 1 templates");
  });

  it("should print text resources", async () => {
    await fixture.run("read", "calc", "calc://timestamp/1700000000");

    expect(messages()).toEqual(["Timestamp: 1700000000"]);
  });

  it("should summarize binary resources", async () => {
    await fixture.run("read", "calc", "calc://logo.png");

    expect(messages()).toEqual(["[Binary: image/png, 8 bytes]"]);
  });

  it("should surface unknown resources", async () => {
    await expect(fixture.run("read", "calc", "calc://missing")).rejects.toThrow(MCPAPIError);
    expect(fixture.transports[0]?.isConnected()).toBe(false);
  });
});
