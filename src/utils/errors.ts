/**
 * Error helpers shared by the library and the CLI
 */

import { MCPAPIError, MCPError } from "../mcp/errors.js";

/**
 * Default suggestions per error class, used when an error carries none of its own
 */
export const ERROR_SUGGESTIONS: Record<string, string> = {
  MCPConfigurationError: "Check the server entry in your mcp.json.",
  MCPConfigNotFoundError:
    "Create mcp.json in the current directory, ~/.mcp.json or ~/.config/mcp/mcp.json, or pass --config.",
  MCPServerNotFoundError: "Run 'mcpsw servers' to list the configured servers.",
  MCPConnectionError: "Check that the server is running and reachable, or that its command exists.",
  MCPTransportError: "The connection to the server failed mid-request. Retry the operation.",
  MCPTimeoutError: "Increase the server's timeout in mcp.json or retry later.",
  MCPCancelledError: "The operation was cancelled before the server answered.",
  MCPAPIError: "The server rejected the request. Check the method arguments.",
  MCPDataError: "The data did not have the expected shape. Check the input or the server version.",
  MCPStateError: "Initialize the client before use and do not reuse a closed client.",
  MCPToolExecutionError: "The tool reported an error. Check its arguments.",
};

/**
 * Normalize a thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Message of a thrown value
 */
export function errorMessage(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof MCPError) {
    const code = error instanceof MCPAPIError ? `${error.name} ${error.code}` : error.name;
    let message = `[${code}] ${error.message}`;
    const suggestion = error.suggestion ?? ERROR_SUGGESTIONS[error.name];
    if (suggestion) {
      message += `\n  Suggestion: ${suggestion}`;
    }
    return message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
