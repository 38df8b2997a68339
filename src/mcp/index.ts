/**
 * MCP (Model Context Protocol) Module
 *
 * Client sessions over stdio and SSE, a registry of named servers, and
 * config-file driven connection setup.
 *
 * @example
 * ```typescript
 * import { createMCPServerRegistry, resolveServerParams } from './mcp/index.js';
 *
 * const registry = createMCPServerRegistry();
 * await registry.use(async (servers) => {
 *   await servers.connectToServer('math', await resolveServerParams({ serverName: 'math' }));
 *   const tools = await servers.getTools();
 *   const result = await servers.callTool('math', 'add', { a: 5, b: 7 });
 *   console.log(tools.map((t) => t.qualifiedName), result.content);
 * });
 * ```
 */

// Types
export type {
  JSONValue,
  JSONObject,
  JSONRPCMessage,
  JSONRPCRequest,
  JSONRPCNotification,
  JSONRPCResponse,
  JSONRPCError,
  MCPClient,
  MCPClientState,
  MCPTransport,
  MCPTransportFactory,
  MCPTransportKind,
  MCPConnectionParams,
  MCPStdioConnectionParams,
  MCPSSEConnectionParams,
  MCPConnectionInput,
  MCPRequestOptions,
  MCPInitializeParams,
  MCPInitializeResult,
  MCPImplementationInfo,
  MCPServerCapabilities,
  MCPServerMetadata,
  MCPCallToolResult,
  MCPContentItem,
  MCPTool,
  MCPToolInputSchema,
  MCPResource,
  MCPResourceTemplate,
  MCPResourceListing,
  MCPResourceContent,
  MCPTextResourceContent,
  MCPBlobResourceContent,
  MCPPrompt,
  MCPPromptMessage,
} from "./types.js";

export { MCPErrorCode } from "./types.js";

// Errors
export {
  MCPError,
  MCPConfigurationError,
  MCPConfigNotFoundError,
  MCPServerNotFoundError,
  MCPTransportError,
  MCPConnectionError,
  MCPTimeoutError,
  MCPCancelledError,
  MCPAPIError,
  MCPDataError,
  MCPStateError,
  MCPToolExecutionError,
} from "./errors.js";
export type { MCPErrorOptions } from "./errors.js";

// Transports
export { StdioTransport, SSETransport, openTransport } from "./transport/index.js";
export type { StdioTransportConfig, SSETransportConfig } from "./transport/index.js";

// Client
export { createMCPClient, withMCPClient, MCPClientImpl, CLIENT_INFO } from "./client.js";
export type { MCPClientOptions } from "./client.js";

// Registry
export { createMCPServerRegistry, MCPServerRegistry } from "./registry.js";
export type { MCPClientFactory, MCPServerRegistryOptions, ConnectAllResult } from "./registry.js";

// Resources
export { expandResourceTemplate } from "./resources.js";
export type { ExpandTemplateOptions } from "./resources.js";

// Config
export {
  createConnectionParams,
  resolveApiKey,
  DEFAULT_TIMEOUT_SECONDS,
  MAX_TIMEOUT_SECONDS,
  CONFIG_FILE_NAME,
} from "./config.js";
export type { EnvSource, MCPServerEntry } from "./config.js";

// Config loader
export {
  createConfigContext,
  findConfigFile,
  getConfigSearchPaths,
  loadConfigFile,
  loadServersFromConfig,
  resolveServerParams,
} from "./config-loader.js";
export type {
  MCPConfigContext,
  MCPConfigFile,
  MCPConnectionOverrides,
  ResolveServerOptions,
} from "./config-loader.js";

// Tool binding
export { bindTool, bindTools, createToolName, formatToolResult, jsonSchemaToZod } from "./tools.js";
export type { MCPBoundTool } from "./tools.js";

export { PROTOCOL_VERSION } from "./protocol.js";
