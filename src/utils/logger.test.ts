/**
 * Tests for logger utilities
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("tslog", () => ({
  Logger: vi.fn().mockImplementation(() => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    getSubLogger: vi.fn().mockReturnValue({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  })),
}));

describe("createLogger", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should create a logger with default config", async () => {
    const { createLogger } = await import("./logger.js");
    const { Logger } = await import("tslog");

    createLogger();

    expect(Logger).toHaveBeenCalledWith(
      expect.objectContaining({
        name: "mcpsw",
        minLevel: 3,
        stylePrettyLogs: true,
      }),
    );
  });

  it("should create a logger with custom config", async () => {
    const { createLogger } = await import("./logger.js");
    const { Logger } = await import("tslog");

    createLogger({
      name: "custom",
      level: "debug",
      prettyPrint: false,
    });

    expect(Logger).toHaveBeenCalledWith(
      expect.objectContaining({
        name: "custom",
        minLevel: 2,
        prettyLogTemplate: undefined,
        stylePrettyLogs: false,
      }),
    );
  });
});

describe("createChildLogger", () => {
  it("should create a named sub logger", async () => {
    const { createLogger, createChildLogger } = await import("./logger.js");

    const parent = createLogger();
    createChildLogger(parent, "mcp:calc");

    expect(parent.getSubLogger).toHaveBeenCalledWith({ name: "mcp:calc" });
  });
});

describe("global logger", () => {
  it("should create the global logger once and allow replacing it", async () => {
    const { createLogger, getLogger, setLogger } = await import("./logger.js");

    const first = getLogger();
    expect(getLogger()).toBe(first);

    const replacement = createLogger({ name: "replacement" });
    setLogger(replacement);
    expect(getLogger()).toBe(replacement);
  });

  it("should derive scoped loggers from the global logger", async () => {
    const { createLogger, scopedLogger, setLogger } = await import("./logger.js");

    const root = createLogger();
    setLogger(root);
    scopedLogger("mcp:registry");

    expect(root.getSubLogger).toHaveBeenCalledWith({ name: "mcp:registry" });
  });
});

describe("parseLogLevel", () => {
  it("should accept known levels in any case", async () => {
    const { parseLogLevel } = await import("./logger.js");

    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("warn", "error")).toBe("warn");
  });

  it("should fall back for unknown or missing values", async () => {
    const { parseLogLevel } = await import("./logger.js");

    expect(parseLogLevel("loud")).toBe("info");
    expect(parseLogLevel(undefined, "warn")).toBe("warn");
  });
});
