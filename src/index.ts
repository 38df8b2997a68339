/**
 * mcp-switchboard: Model Context Protocol client
 *
 * Sessions over stdio and SSE, a registry that multiplexes named servers,
 * and connection setup from mcp.json.
 *
 * @packageDocumentation
 */

// Version
export { VERSION } from "./version.js";

// MCP client, registry, transports, config and errors
export * from "./mcp/index.js";

// Logging
export {
  createLogger,
  createChildLogger,
  getLogger,
  setLogger,
  parseLogLevel,
} from "./utils/logger.js";
export type { LogLevel, LoggerConfig, MCPLogger } from "./utils/logger.js";

// Error formatting
export { formatError, ERROR_SUGGESTIONS } from "./utils/errors.js";
