/**
 * Tests for connection parameters
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_TIMEOUT_SECONDS,
  MAX_TIMEOUT_SECONDS,
  createConnectionParams,
  entryToConnectionInput,
  resolveApiKey,
} from "./config.js";
import { MCPConfigurationError } from "./errors.js";

describe("resolveApiKey", () => {
  const env = { MCP_TEST_API_KEY: "test-secret", EMPTY: "" };

  it("should pass literal keys through", () => {
    expect(resolveApiKey("test-secret", env)).toBe("test-secret");
  });

  it("should resolve env references", () => {
    expect(resolveApiKey("env:MCP_TEST_API_KEY", env)).toBe("test-secret");
  });

  it("should treat unset or empty variables as no credential", () => {
    expect(resolveApiKey("env:MISSING", env)).toBeUndefined();
    expect(resolveApiKey("env:EMPTY", env)).toBeUndefined();
    expect(resolveApiKey("env:", env)).toBeUndefined();
  });

  it("should return undefined for null and empty keys", () => {
    expect(resolveApiKey(null, env)).toBeUndefined();
    expect(resolveApiKey(undefined, env)).toBeUndefined();
    expect(resolveApiKey("", env)).toBeUndefined();
  });
});

describe("createConnectionParams", () => {
  it("should build sse params with defaults", () => {
    const params = createConnectionParams({ transport: "sse", baseUrl: "http://localhost:8000/sse" }, {});

    expect(params).toEqual({
      transport: "sse",
      baseUrl: "http://localhost:8000/sse",
      timeoutSeconds: DEFAULT_TIMEOUT_SECONDS,
    });
    expect(Object.isFrozen(params)).toBe(true);
  });

  it("should build stdio params", () => {
    const params = createConnectionParams(
      { transport: "stdio", command: "calculator-server", args: ["--verbose"], env: { MODE: "test" }, cwd: "/tmp" },
      {},
    );

    expect(params).toEqual({
      transport: "stdio",
      command: "calculator-server",
      args: ["--verbose"],
      env: { MODE: "test" },
      cwd: "/tmp",
      timeoutSeconds: 60,
    });
  });

  it("should infer the transport from command or baseUrl", () => {
    expect(createConnectionParams({ command: "server" }, {}).transport).toBe("stdio");
    expect(createConnectionParams({ baseUrl: "http://localhost:8000/sse" }, {}).transport).toBe("sse");
  });

  it("should resolve the api key against the given environment", () => {
    const params = createConnectionParams(
      { baseUrl: "http://localhost:8000/sse", apiKey: "env:MCP_TEST_API_KEY" },
      { MCP_TEST_API_KEY: "test-secret" },
    );

    expect(params.apiKey).toBe("test-secret");
  });

  it("should omit an api key whose variable is unset", () => {
    const params = createConnectionParams(
      { baseUrl: "http://localhost:8000/sse", apiKey: "env:MCP_TEST_API_KEY" },
      {},
    );

    expect(params).not.toHaveProperty("apiKey");
  });

  it("should keep an empty baseUrl for the transport to reject", () => {
    const params = createConnectionParams({ transport: "sse" }, {});

    expect(params).toMatchObject({ transport: "sse", baseUrl: "" });
  });

  it("should reject unsupported transports", () => {
    expect(() => createConnectionParams({ transport: "websocket", baseUrl: "ws://x" }, {})).toThrow(
      new MCPConfigurationError(`Transport 'websocket' is not supported; use "stdio" or "sse"`),
    );
  });

  it("should reject stdio without a command", () => {
    expect(() => createConnectionParams({ transport: "stdio", command: " " }, {})).toThrow(
      "Command is required for stdio transport",
    );
  });

  it("should reject fields of the other transport", () => {
    expect(() =>
      createConnectionParams({ transport: "stdio", command: "server", baseUrl: "http://x" }, {}),
    ).toThrow("stdio transport does not accept baseUrl or headers");
    expect(() =>
      createConnectionParams({ transport: "sse", baseUrl: "http://x", command: "server" }, {}),
    ).toThrow("sse transport does not accept command, args, env or cwd");
  });

  it("should reject input without any transport hint", () => {
    expect(() => createConnectionParams({}, {})).toThrow(MCPConfigurationError);
  });

  it("should reject a non-positive timeout", () => {
    expect(() => createConnectionParams({ command: "server", timeoutSeconds: 0 }, {})).toThrow(
      /^Invalid connection parameters: timeoutSeconds: /,
    );
  });

  it("should reject a timeout longer than one timer can wait", () => {
    expect(MAX_TIMEOUT_SECONDS).toBe(2147483);
    expect(createConnectionParams({ command: "server", timeoutSeconds: MAX_TIMEOUT_SECONDS }, {}).timeoutSeconds).toBe(
      2147483,
    );
    expect(() => createConnectionParams({ command: "server", timeoutSeconds: 30 * 24 * 3600 }, {})).toThrow(
      MCPConfigurationError,
    );
  });
});

describe("entryToConnectionInput", () => {
  it("should map snake_case config fields", () => {
    expect(
      entryToConnectionInput({
        transport: "sse",
        base_url: "http://localhost:8000/sse",
        timeout: 30,
        api_key: null,
      }),
    ).toEqual({
      transport: "sse",
      baseUrl: "http://localhost:8000/sse",
      timeoutSeconds: 30,
      apiKey: null,
    });
  });
});
