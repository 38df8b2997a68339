/**
 * MCP Client Implementation
 *
 * One session with one MCP server: owns its transport, performs the
 * handshake and correlates requests with responses by JSON-RPC id.
 */

import type { z } from "zod";
import type {
  JSONObject,
  JSONRPCMessage,
  JSONRPCRequest,
  JSONRPCResponse,
  MCPCallToolResult,
  MCPClient,
  MCPClientState,
  MCPConnectionParams,
  MCPImplementationInfo,
  MCPInitializeParams,
  MCPInitializeResult,
  MCPPrompt,
  MCPPromptMessage,
  MCPRequestOptions,
  MCPResourceContent,
  MCPResourceListing,
  MCPResourceTemplate,
  MCPServerMetadata,
  MCPTool,
  MCPTransport,
  MCPTransportFactory,
} from "./types.js";
import { MCPErrorCode } from "./types.js";
import {
  MCPAPIError,
  MCPCancelledError,
  MCPConnectionError,
  MCPDataError,
  MCPStateError,
  MCPTimeoutError,
} from "./errors.js";
import {
  CallToolResultSchema,
  EmptyResultSchema,
  GetPromptResultSchema,
  InitializeResultSchema,
  PROTOCOL_VERSION,
  PromptsPageSchema,
  ReadResourceResultSchema,
  ResourceTemplatesPageSchema,
  ResourceUpdatedParamsSchema,
  ResourcesPageSchema,
  ToolsPageSchema,
  isNotification,
  isRequest,
  parsePayload,
} from "./protocol.js";
import { MAX_TIMER_DELAY_MS } from "./config.js";
import { openTransport } from "./transport/index.js";
import { scoped, timeout } from "../utils/async.js";
import { errorMessage, toError } from "../utils/errors.js";
import { scopedLogger, type MCPLogger } from "../utils/logger.js";
import { VERSION } from "../version.js";

/**
 * Identity sent in the `initialize` request
 */
export const CLIENT_INFO: MCPImplementationInfo = {
  name: "mcp-switchboard",
  version: VERSION,
};

const URI_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]*:\S*$/;

export interface MCPClientOptions {
  /** Label used in log lines, e.g. the registry name of the server */
  name?: string;
  clientInfo?: MCPImplementationInfo;
  /** Replaces the transport selected from `params.transport` */
  transportFactory?: MCPTransportFactory;
  logger?: MCPLogger;
}

interface PendingRequest {
  method: string;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timeout: ReturnType<typeof setTimeout>;
  dispose: () => void;
}

interface Page {
  nextCursor?: string;
}

/**
 * MCP Client implementation
 */
export class MCPClientImpl implements MCPClient {
  readonly params: MCPConnectionParams;

  private requestId = 0;
  private pendingRequests = new Map<string | number, PendingRequest>();
  private currentState: MCPClientState = "uninitialized";
  private transport: MCPTransport | null = null;
  private initializeResult: MCPInitializeResult | null = null;
  private closePromise: Promise<void> | null = null;
  private readonly resourceListeners = new Set<(uri: string) => void>();
  private readonly name: string;
  private readonly clientInfo: MCPImplementationInfo;
  private readonly transportFactory: MCPTransportFactory;
  private readonly logger: MCPLogger;

  constructor(params: MCPConnectionParams, options: MCPClientOptions = {}) {
    this.params = params;
    this.name =
      options.name ?? (params.transport === "stdio" ? params.command : params.baseUrl || "sse");
    this.clientInfo = options.clientInfo ?? CLIENT_INFO;
    this.logger = options.logger ?? scopedLogger("mcp:client");
    this.transportFactory =
      options.transportFactory ?? ((p) => openTransport(p, { logger: this.logger }));
  }

  get state(): MCPClientState {
    return this.currentState;
  }

  private get timeoutMs(): number {
    return this.params.timeoutSeconds * 1000;
  }

  /**
   * Open the transport and perform the handshake, bounded by the session timeout
   */
  async initialize(): Promise<MCPInitializeResult> {
    if (this.currentState !== "uninitialized") {
      throw new MCPStateError("initialize", this.currentState);
    }
    this.currentState = "initializing";
    this.logger.info(`Connecting to '${this.name}' over ${this.params.transport}`);

    try {
      const transport = this.transportFactory(this.params);
      this.transport = transport;
      this.setupTransportHandlers(transport);

      const result = await timeout(
        this.handshake(transport),
        this.timeoutMs,
        () =>
          new MCPTimeoutError(
            `Initialization of '${this.name}' timed out after ${this.timeoutMs}ms`,
          ),
      );

      if (this.currentState !== "initializing") {
        throw new MCPConnectionError(`Client for '${this.name}' was closed during initialization`);
      }

      this.initializeResult = result;
      this.currentState = "ready";
      this.logger.info(
        `Connected to '${this.name}' (${result.serverInfo.name} ${result.serverInfo.version})`,
      );
      return result;
    } catch (error) {
      if (this.currentState === "initializing") {
        this.currentState = "failed";
      }
      this.logger.warn(`Failed to initialize '${this.name}': ${errorMessage(error)}`);
      try {
        await this.teardown();
      } catch (teardownError) {
        this.logger.warn(
          `Error while tearing down '${this.name}' after a failed handshake: ${errorMessage(teardownError)}`,
        );
      }
      throw error;
    }
  }

  private async handshake(transport: MCPTransport): Promise<MCPInitializeResult> {
    if (!transport.isConnected()) {
      await transport.connect();
    }

    const params: MCPInitializeParams = {
      protocolVersion: PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: this.clientInfo,
    };
    const raw = await this.sendRequest("initialize", params);
    const result = parsePayload(InitializeResultSchema, raw, "initialize");

    await transport.send({ jsonrpc: "2.0", method: "notifications/initialized" });

    return result;
  }

  /**
   * Close the session. Concurrent and repeated calls share one teardown.
   */
  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.shutdown();
    }
    return this.closePromise;
  }

  private async shutdown(): Promise<void> {
    const previous = this.currentState;
    this.currentState = "closed";
    this.rejectAllPending(new MCPConnectionError("Connection closed"));
    await this.teardown();
    if (previous === "ready") {
      this.logger.info(`Closed connection to '${this.name}'`);
    }
  }

  private async teardown(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    if (transport) {
      await transport.disconnect();
    }
  }

  /**
   * Initialize, run `fn`, and close on every exit path
   */
  async use<T>(fn: (client: this) => Promise<T>): Promise<T> {
    return scoped(
      async () => {
        await this.initialize();
        return fn(this);
      },
      () => this.close(),
      (error) =>
        this.logger.error(`Error while closing '${this.name}': ${errorMessage(error)}`),
    );
  }

  /**
   * Setup transport message handlers
   */
  private setupTransportHandlers(transport: MCPTransport): void {
    transport.onMessage((message) => {
      this.handleMessage(message);
    });

    transport.onError((error) => {
      this.logger.warn(`Transport error from '${this.name}': ${error.message}`);
    });

    transport.onClose(() => {
      if (this.currentState === "ready") {
        this.logger.warn(`Connection to '${this.name}' closed unexpectedly`);
      }
      this.rejectAllPending(new MCPConnectionError("Connection closed"));
    });
  }

  /**
   * Handle incoming messages from transport
   */
  private handleMessage(message: JSONRPCMessage): void {
    if (isRequest(message)) {
      this.answerServerRequest(message);
      return;
    }

    if (isNotification(message)) {
      if (message.method === "notifications/resources/updated") {
        const params = ResourceUpdatedParamsSchema.safeParse(message.params);
        if (params.success) {
          for (const listener of this.resourceListeners) listener(params.data.uri);
        }
      } else {
        this.logger.debug(`Notification from '${this.name}': ${message.method}`);
      }
      return;
    }

    if (message.id === null) {
      this.logger.warn(`Error from '${this.name}': ${message.error?.message ?? "unknown"}`);
      return;
    }

    const pending = this.takePending(message.id);
    if (!pending) return;

    if (message.error) {
      pending.reject(
        new MCPAPIError(message.error.code, message.error.message, message.error.data, pending.method),
      );
    } else {
      pending.resolve(message.result);
    }
  }

  private answerServerRequest(request: JSONRPCRequest): void {
    const response: JSONRPCResponse =
      request.method === "ping"
        ? { jsonrpc: "2.0", id: request.id, result: {} }
        : {
            jsonrpc: "2.0",
            id: request.id,
            error: {
              code: MCPErrorCode.METHOD_NOT_FOUND,
              message: `Method not found: ${request.method}`,
            },
          };
    this.sendQuietly(response);
  }

  private sendQuietly(message: JSONRPCMessage): void {
    const transport = this.transport;
    if (!transport?.isConnected()) return;
    transport.send(message).catch((error: unknown) => {
      this.logger.debug(`Failed to send to '${this.name}': ${errorMessage(error)}`);
    });
  }

  private takePending(id: string | number): PendingRequest | undefined {
    const pending = this.pendingRequests.get(id);
    if (!pending) return undefined;
    this.pendingRequests.delete(id);
    clearTimeout(pending.timeout);
    pending.dispose();
    return pending;
  }

  /**
   * Reject all pending requests
   */
  private rejectAllPending(error: Error): void {
    for (const id of Array.from(this.pendingRequests.keys())) {
      this.takePending(id)?.reject(error);
    }
  }

  /**
   * Send a request and wait for response
   */
  private sendRequest(
    method: string,
    params?: Record<string, unknown>,
    options: MCPRequestOptions = {},
  ): Promise<unknown> {
    const transport = this.transport;
    if (!transport || !transport.isConnected()) {
      return Promise.reject(new MCPConnectionError("Transport not connected"));
    }

    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new MCPCancelledError(`Request '${method}' was cancelled`));
    }

    const id = ++this.requestId;
    const timeoutMs = Math.min(options.timeoutMs ?? this.timeoutMs, MAX_TIMER_DELAY_MS);
    const request: JSONRPCRequest = {
      jsonrpc: "2.0",
      id,
      method,
      ...(params !== undefined && { params }),
    };

    return new Promise<unknown>((resolve, reject) => {
      const cancel = (reason: string): void => {
        this.sendQuietly({
          jsonrpc: "2.0",
          method: "notifications/cancelled",
          params: { requestId: id, reason },
        });
      };

      const onAbort = (): void => {
        if (this.takePending(id)) {
          cancel("Request aborted by the client");
          reject(new MCPCancelledError(`Request '${method}' was cancelled`));
        }
      };

      const timer = setTimeout(() => {
        if (this.takePending(id)) {
          cancel(`Timed out after ${timeoutMs}ms`);
          reject(new MCPTimeoutError(`Request '${method}' timed out after ${timeoutMs}ms`));
        }
      }, timeoutMs);

      this.pendingRequests.set(id, {
        method,
        resolve,
        reject,
        timeout: timer,
        dispose: () => signal?.removeEventListener("abort", onAbort),
      });
      signal?.addEventListener("abort", onAbort, { once: true });

      transport.send(request).catch((error: unknown) => {
        if (this.takePending(id)) {
          reject(toError(error));
        }
      });
    });
  }

  /**
   * Ensure client is ready; returns the handshake result
   */
  private ensureReady(operation: string): MCPInitializeResult {
    if (this.currentState !== "ready" || !this.initializeResult) {
      throw new MCPStateError(operation, this.currentState);
    }
    return this.initializeResult;
  }

  private async collectPages<P extends Page, T>(
    method: string,
    schema: z.ZodType<P, z.ZodTypeDef, unknown>,
    pick: (page: P) => T[],
    options?: MCPRequestOptions,
  ): Promise<T[]> {
    const items: T[] = [];
    const seen = new Set<string>();
    let cursor: string | undefined;

    do {
      const raw = await this.sendRequest(method, cursor ? { cursor } : undefined, options);
      const page = parsePayload(schema, raw, method);
      items.push(...pick(page));
      cursor = page.nextCursor;
      if (cursor !== undefined) {
        if (seen.has(cursor)) {
          throw new MCPDataError(`Server repeated pagination cursor for '${method}'`);
        }
        seen.add(cursor);
      }
    } while (cursor);

    return items;
  }

  /**
   * Ping the server and describe it from the handshake
   */
  async getServerMetadata(options?: MCPRequestOptions): Promise<MCPServerMetadata> {
    const init = this.ensureReady("getServerMetadata");
    await this.sendRequest("ping", undefined, options);

    return Object.freeze({
      name: init.serverInfo.name,
      version: init.serverInfo.version,
      protocolVersion: init.protocolVersion,
      ...(init.instructions !== undefined && { description: init.instructions }),
      capabilities: init.capabilities,
    });
  }

  /**
   * List available tools, following pagination
   */
  async listTools(options?: MCPRequestOptions): Promise<MCPTool[]> {
    this.ensureReady("listTools");
    return this.collectPages("tools/list", ToolsPageSchema, (page) => page.tools, options);
  }

  /**
   * Call a tool on the MCP server. Arguments are passed through unvalidated.
   */
  async callTool(
    name: string,
    args: JSONObject = {},
    options?: MCPRequestOptions,
  ): Promise<MCPCallToolResult> {
    this.ensureReady("callTool");
    if (!name.trim()) {
      throw new MCPDataError("Tool name must be a non-empty string");
    }

    const raw = await this.sendRequest("tools/call", { name, arguments: args }, options);
    return parsePayload(CallToolResultSchema, raw, "tools/call");
  }

  /**
   * List available prompts
   */
  async listPrompts(options?: MCPRequestOptions): Promise<MCPPrompt[]> {
    this.ensureReady("listPrompts");
    return this.collectPages("prompts/list", PromptsPageSchema, (page) => page.prompts, options);
  }

  /**
   * Render a prompt into role-tagged messages
   */
  async getPrompt(
    name: string,
    args: Record<string, string> = {},
    options?: MCPRequestOptions,
  ): Promise<MCPPromptMessage[]> {
    this.ensureReady("getPrompt");
    if (!name.trim()) {
      throw new MCPDataError("Prompt name must be a non-empty string");
    }

    const raw = await this.sendRequest("prompts/get", { name, arguments: args }, options);
    return parsePayload(GetPromptResultSchema, raw, "prompts/get").messages;
  }

  /**
   * List concrete resources and resource templates
   */
  async listResources(options?: MCPRequestOptions): Promise<MCPResourceListing> {
    this.ensureReady("listResources");

    const resources = await this.collectPages(
      "resources/list",
      ResourcesPageSchema,
      (page) => page.resources,
      options,
    );

    let templates: MCPResourceTemplate[];
    try {
      templates = await this.collectPages(
        "resources/templates/list",
        ResourceTemplatesPageSchema,
        (page) => page.resourceTemplates,
        options,
      );
    } catch (error) {
      if (!(error instanceof MCPAPIError) || error.code !== MCPErrorCode.METHOD_NOT_FOUND) {
        throw error;
      }
      templates = [];
    }

    return { resources, templates };
  }

  /**
   * Read a resource by URI
   */
  async readResource(uri: string, options?: MCPRequestOptions): Promise<MCPResourceContent[]> {
    this.ensureReady("readResource");
    assertURI(uri);

    const raw = await this.sendRequest("resources/read", { uri }, options);
    return parsePayload(ReadResourceResultSchema, raw, "resources/read").contents;
  }

  /**
   * Ask the server for change notifications on a resource
   */
  async subscribeToResource(uri: string, options?: MCPRequestOptions): Promise<void> {
    this.ensureReady("subscribeToResource");
    assertURI(uri);

    const raw = await this.sendRequest("resources/subscribe", { uri }, options);
    parsePayload(EmptyResultSchema, raw ?? {}, "resources/subscribe");
  }

  async unsubscribeFromResource(uri: string, options?: MCPRequestOptions): Promise<void> {
    this.ensureReady("unsubscribeFromResource");
    assertURI(uri);

    const raw = await this.sendRequest("resources/unsubscribe", { uri }, options);
    parsePayload(EmptyResultSchema, raw ?? {}, "resources/unsubscribe");
  }

  onResourceUpdated(listener: (uri: string) => void): () => void {
    this.resourceListeners.add(listener);
    return () => {
      this.resourceListeners.delete(listener);
    };
  }
}

function assertURI(uri: string): void {
  if (!URI_PATTERN.test(uri)) {
    throw new MCPDataError(`Invalid resource URI: '${uri}'`);
  }
}

/**
 * Create a new MCP client
 */
export function createMCPClient(
  params: MCPConnectionParams,
  options?: MCPClientOptions,
): MCPClientImpl {
  return new MCPClientImpl(params, options);
}

/**
 * Connect, run `fn` with the ready client, and always close
 */
export async function withMCPClient<T>(
  params: MCPConnectionParams,
  fn: (client: MCPClientImpl) => Promise<T>,
  options?: MCPClientOptions,
): Promise<T> {
  return new MCPClientImpl(params, options).use(fn);
}
