/**
 * MCP (Model Context Protocol) Errors
 */

import { MCPErrorCode } from "./types.js";

/**
 * Options shared by every MCP error
 */
export interface MCPErrorOptions {
  cause?: unknown;
  /** Hint shown by the CLI next to the message */
  suggestion?: string;
}

/**
 * Base MCP Error class
 */
export class MCPError extends Error {
  public readonly code: number;
  public readonly suggestion?: string;

  constructor(code: number, message: string, options: MCPErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "MCPError";
    this.code = code;
    this.suggestion = options.suggestion;
  }
}

/**
 * Configuration error - invalid parameters, unsupported transport, duplicate server name
 */
export class MCPConfigurationError extends MCPError {
  constructor(message: string, options?: MCPErrorOptions) {
    super(MCPErrorCode.CONFIGURATION_ERROR, message, options);
    this.name = "MCPConfigurationError";
  }
}

/**
 * No configuration file at the requested or searched locations
 */
export class MCPConfigNotFoundError extends MCPConfigurationError {
  public readonly searchedPaths: readonly string[];

  constructor(message: string, searchedPaths: readonly string[] = []) {
    super(message);
    this.name = "MCPConfigNotFoundError";
    this.searchedPaths = searchedPaths;
  }
}

/**
 * Unknown server name, in a config file or in a registry
 */
export class MCPServerNotFoundError extends MCPConfigurationError {
  public readonly serverName: string;

  constructor(serverName: string, available: readonly string[] = []) {
    const known = available.length > 0 ? ` (available: ${available.join(", ")})` : "";
    super(`Server '${serverName}' not found${known}`);
    this.name = "MCPServerNotFoundError";
    this.serverName = serverName;
  }
}

/**
 * Transport error - occurs during I/O on an open transport
 */
export class MCPTransportError extends MCPError {
  constructor(message: string, options?: MCPErrorOptions) {
    super(MCPErrorCode.TRANSPORT_ERROR, message, options);
    this.name = "MCPTransportError";
  }
}

/**
 * Connection error - the transport could not be opened or was lost
 */
export class MCPConnectionError extends MCPError {
  constructor(message: string, options?: MCPErrorOptions) {
    super(MCPErrorCode.CONNECTION_ERROR, message, options);
    this.name = "MCPConnectionError";
  }
}

/**
 * Timeout error - occurs when the handshake or a request times out
 */
export class MCPTimeoutError extends MCPError {
  constructor(message: string = "Request timed out") {
    super(MCPErrorCode.TIMEOUT_ERROR, message);
    this.name = "MCPTimeoutError";
  }
}

/**
 * The caller aborted an in-flight request
 */
export class MCPCancelledError extends MCPError {
  constructor(message: string = "Request cancelled", options?: MCPErrorOptions) {
    super(MCPErrorCode.CANCELLED, message, options);
    this.name = "MCPCancelledError";
  }
}

/**
 * The server answered with a JSON-RPC error
 */
export class MCPAPIError extends MCPError {
  public readonly data: unknown;
  public readonly method?: string;

  constructor(code: number, message: string, data?: unknown, method?: string) {
    super(code, message);
    this.name = "MCPAPIError";
    this.data = data;
    this.method = method;
  }
}

/**
 * Malformed config or response payload, or an invalid argument value
 */
export class MCPDataError extends MCPError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: MCPErrorOptions) {
    super(MCPErrorCode.DATA_ERROR, message, options);
    this.name = "MCPDataError";
    this.issues = issues;
  }
}

/**
 * Operation attempted in the wrong lifecycle state
 */
export class MCPStateError extends MCPError {
  public readonly state: string;

  constructor(operation: string, state: string) {
    super(MCPErrorCode.STATE_ERROR, `Cannot ${operation}: client is ${state}`);
    this.name = "MCPStateError";
    this.state = state;
  }
}

/**
 * A tool call completed but the tool reported an error
 */
export class MCPToolExecutionError extends MCPError {
  public readonly toolName: string;

  constructor(toolName: string, message: string) {
    super(MCPErrorCode.TOOL_ERROR, message);
    this.name = "MCPToolExecutionError";
    this.toolName = toolName;
  }
}
