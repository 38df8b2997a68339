/**
 * MCP (Model Context Protocol) Types
 *
 * Wire shapes for JSON-RPC 2.0 and the MCP methods this client speaks,
 * plus the connection parameters and client contracts built on top of them.
 */

/**
 * Recursive JSON value, used for tool arguments and structured results
 */
export type JSONValue = string | number | boolean | null | JSONValue[] | { [key: string]: JSONValue };

/**
 * JSON object with string keys
 */
export type JSONObject = { [key: string]: JSONValue };

/**
 * JSON-RPC 2.0 Request
 */
export interface JSONRPCRequest {
  jsonrpc: "2.0";
  id: string | number;
  method: string;
  params?: Record<string, unknown>;
}

/**
 * JSON-RPC 2.0 Notification (a request without an id)
 */
export interface JSONRPCNotification {
  jsonrpc: "2.0";
  method: string;
  params?: Record<string, unknown>;
}

/**
 * JSON-RPC 2.0 Response
 */
export interface JSONRPCResponse {
  jsonrpc: "2.0";
  id: string | number | null;
  result?: unknown;
  error?: JSONRPCError;
}

/**
 * JSON-RPC 2.0 Error
 */
export interface JSONRPCError {
  code: number;
  message: string;
  data?: unknown;
}

/**
 * Any message that can travel over an MCP transport
 */
export type JSONRPCMessage = JSONRPCRequest | JSONRPCNotification | JSONRPCResponse;

/**
 * MCP Server capabilities
 */
export interface MCPServerCapabilities {
  tools?: {
    listChanged?: boolean;
  };
  resources?: {
    subscribe?: boolean;
    listChanged?: boolean;
  };
  prompts?: {
    listChanged?: boolean;
  };
  logging?: Record<string, unknown>;
  [key: string]: unknown;
}

/**
 * Name and version of either end of a session
 */
export interface MCPImplementationInfo {
  name: string;
  version: string;
}

/**
 * Server description assembled from the handshake
 */
export interface MCPServerMetadata {
  readonly name: string;
  readonly version: string;
  readonly protocolVersion: string;
  readonly description?: string;
  readonly capabilities: MCPServerCapabilities;
}

/**
 * JSON schema describing a tool's arguments
 */
export interface MCPToolInputSchema {
  type: "object";
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}

/**
 * MCP Tool definition
 */
export interface MCPTool {
  name: string;
  description?: string;
  inputSchema: MCPToolInputSchema;
}

/**
 * MCP Resource definition
 */
export interface MCPResource {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

/**
 * Parameterised resource URI, e.g. `calc://timestamp/{time}`
 */
export interface MCPResourceTemplate {
  uriTemplate: string;
  name: string;
  description?: string;
  mimeType?: string;
}

/**
 * Concrete resources and templates advertised by one server
 */
export interface MCPResourceListing {
  resources: MCPResource[];
  templates: MCPResourceTemplate[];
}

export interface MCPTextResourceContent {
  uri: string;
  mimeType?: string;
  text: string;
}

export interface MCPBlobResourceContent {
  uri: string;
  mimeType?: string;
  /** Base64 encoded bytes */
  blob: string;
}

/**
 * One item returned by `resources/read`; exactly one of text or blob
 */
export type MCPResourceContent = MCPTextResourceContent | MCPBlobResourceContent;

/**
 * MCP Prompt definition
 */
export interface MCPPrompt {
  name: string;
  description?: string;
  arguments?: Array<{
    name: string;
    description?: string;
    required?: boolean;
  }>;
}

/**
 * Content block inside a tool result or prompt message
 */
export interface MCPContentItem {
  type: string;
  text?: string;
  data?: string;
  mimeType?: string;
  resource?: {
    uri: string;
    mimeType?: string;
    text?: string;
    blob?: string;
  };
}

/**
 * Role-tagged message produced by `prompts/get`
 */
export interface MCPPromptMessage {
  role: "user" | "assistant";
  content: MCPContentItem;
}

/**
 * MCP Initialize request parameters
 */
export interface MCPInitializeParams {
  protocolVersion: string;
  capabilities: Record<string, unknown>;
  clientInfo: MCPImplementationInfo;
  [key: string]: unknown;
}

/**
 * MCP Initialize result
 */
export interface MCPInitializeResult {
  protocolVersion: string;
  capabilities: MCPServerCapabilities;
  serverInfo: MCPImplementationInfo;
  instructions?: string;
}

/**
 * MCP Call Tool result
 */
export interface MCPCallToolResult {
  content: MCPContentItem[];
  structuredContent?: JSONObject;
  isError?: boolean;
}

/**
 * Transport interface for MCP communication
 */
export interface MCPTransport {
  /** Connect to the transport */
  connect(): Promise<void>;

  /** Disconnect from the transport; safe to call more than once */
  disconnect(): Promise<void>;

  /** Send a message through the transport */
  send(message: JSONRPCMessage): Promise<void>;

  /** Set callback for received messages */
  onMessage(callback: (message: JSONRPCMessage) => void): void;

  /** Set callback for errors that do not end the connection */
  onError(callback: (error: Error) => void): void;

  /** Set callback for connection close */
  onClose(callback: () => void): void;

  /** Check if transport is connected */
  isConnected(): boolean;
}

/**
 * Builds the transport for a set of connection parameters
 */
export type MCPTransportFactory = (params: MCPConnectionParams) => MCPTransport;

/**
 * Supported transport keywords
 */
export type MCPTransportKind = "stdio" | "sse";

interface MCPConnectionParamsBase {
  readonly timeoutSeconds: number;
  /** Resolved bearer credential; absent when none was configured or the env var is unset */
  readonly apiKey?: string;
  readonly description?: string;
}

export interface MCPStdioConnectionParams extends MCPConnectionParamsBase {
  readonly transport: "stdio";
  readonly command: string;
  readonly args: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
  readonly cwd?: string;
}

export interface MCPSSEConnectionParams extends MCPConnectionParamsBase {
  readonly transport: "sse";
  /** May be empty; the session then fails to connect before any network I/O */
  readonly baseUrl: string;
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * Validated, immutable description of how to reach one server
 */
export type MCPConnectionParams = MCPStdioConnectionParams | MCPSSEConnectionParams;

/**
 * Loose input accepted by `createConnectionParams`
 */
export interface MCPConnectionInput {
  transport?: string;
  baseUrl?: string;
  command?: string;
  args?: readonly string[];
  env?: Readonly<Record<string, string>>;
  cwd?: string;
  headers?: Readonly<Record<string, string>>;
  timeoutSeconds?: number;
  /** Literal key or `env:NAME` reference */
  apiKey?: string | null;
  description?: string;
}

/**
 * Lifecycle of a single-server session
 */
export type MCPClientState = "uninitialized" | "initializing" | "ready" | "closed" | "failed";

/**
 * Per-call options
 */
export interface MCPRequestOptions {
  /** Overrides the session's timeout for this call only */
  timeoutMs?: number;
  /** Aborting rejects the call with MCPCancelledError */
  signal?: AbortSignal;
}

/**
 * MCP Client interface
 */
export interface MCPClient {
  readonly params: MCPConnectionParams;
  readonly state: MCPClientState;

  /** Open the transport and perform the handshake */
  initialize(): Promise<MCPInitializeResult>;

  /** Close the session; idempotent */
  close(): Promise<void>;

  getServerMetadata(options?: MCPRequestOptions): Promise<MCPServerMetadata>;

  listTools(options?: MCPRequestOptions): Promise<MCPTool[]>;

  callTool(name: string, args?: JSONObject, options?: MCPRequestOptions): Promise<MCPCallToolResult>;

  listPrompts(options?: MCPRequestOptions): Promise<MCPPrompt[]>;

  getPrompt(
    name: string,
    args?: Record<string, string>,
    options?: MCPRequestOptions,
  ): Promise<MCPPromptMessage[]>;

  listResources(options?: MCPRequestOptions): Promise<MCPResourceListing>;

  readResource(uri: string, options?: MCPRequestOptions): Promise<MCPResourceContent[]>;

  subscribeToResource(uri: string, options?: MCPRequestOptions): Promise<void>;

  unsubscribeFromResource(uri: string, options?: MCPRequestOptions): Promise<void>;

  /** Register a listener for `notifications/resources/updated`; returns an unsubscribe function */
  onResourceUpdated(listener: (uri: string) => void): () => void;
}

/**
 * MCP Error codes
 */
export enum MCPErrorCode {
  // JSON-RPC standard errors
  PARSE_ERROR = -32700,
  INVALID_REQUEST = -32600,
  METHOD_NOT_FOUND = -32601,
  INVALID_PARAMS = -32602,
  INTERNAL_ERROR = -32603,

  // Client side errors
  INITIALIZATION_ERROR = -32000,
  TRANSPORT_ERROR = -32001,
  TIMEOUT_ERROR = -32002,
  CONNECTION_ERROR = -32003,
  CONFIGURATION_ERROR = -32004,
  DATA_ERROR = -32005,
  STATE_ERROR = -32006,
  CANCELLED = -32007,
  TOOL_ERROR = -32008,
}
