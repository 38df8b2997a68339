/**
 * Tests for MCP module index
 */

import { describe, it, expect } from "vitest";

import {
  MCPErrorCode,
  MCPError,
  MCPConnectionError,
  MCPStateError,
  StdioTransport,
  SSETransport,
  createMCPClient,
  MCPClientImpl,
  createMCPServerRegistry,
  MCPServerRegistry,
  createConnectionParams,
  resolveServerParams,
  expandResourceTemplate,
  bindTools,
  PROTOCOL_VERSION,
} from "./index.js";

describe("MCP Module Exports", () => {
  it("should export MCPErrorCode enum", () => {
    expect(MCPErrorCode.INTERNAL_ERROR).toBe(-32603);
    expect(MCPErrorCode.METHOD_NOT_FOUND).toBe(-32601);
  });

  it("should export error classes", () => {
    expect(new MCPConnectionError("down")).toBeInstanceOf(MCPError);
    expect(new MCPStateError("close", "closed")).toBeInstanceOf(MCPError);
  });

  it("should export transports, client and registry", () => {
    expect(StdioTransport).toBeTypeOf("function");
    expect(SSETransport).toBeTypeOf("function");
    expect(createMCPClient(createConnectionParams({ command: "calc-server" }, {}))).toBeInstanceOf(
      MCPClientImpl,
    );
    expect(createMCPServerRegistry()).toBeInstanceOf(MCPServerRegistry);
  });

  it("should export helpers", () => {
    expect(resolveServerParams).toBeTypeOf("function");
    expect(expandResourceTemplate).toBeTypeOf("function");
    expect(bindTools).toBeTypeOf("function");
    expect(PROTOCOL_VERSION).toBe("2024-11-05");
  });
});
