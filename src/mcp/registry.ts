/**
 * MCP Server Registry
 * Named connections to many servers: connect, fan out tool discovery,
 * route calls by server name and close everything together.
 */

import type {
  JSONObject,
  MCPCallToolResult,
  MCPClient,
  MCPConnectionParams,
  MCPPromptMessage,
  MCPPrompt,
  MCPRequestOptions,
  MCPResourceContent,
  MCPResourceListing,
  MCPServerMetadata,
  MCPTransportFactory,
} from "./types.js";
import { MCPClientImpl } from "./client.js";
import { MCPConfigurationError, MCPServerNotFoundError, MCPStateError } from "./errors.js";
import { bindTools, type MCPBoundTool } from "./tools.js";
import { scoped } from "../utils/async.js";
import { errorMessage, toError } from "../utils/errors.js";
import { createChildLogger, scopedLogger, type MCPLogger } from "../utils/logger.js";

/**
 * Builds the (uninitialized) client for a named server
 */
export type MCPClientFactory = (name: string, params: MCPConnectionParams) => MCPClient;

export interface MCPServerRegistryOptions {
  clientFactory?: MCPClientFactory;
  /** Used by the default client factory */
  transportFactory?: MCPTransportFactory;
  logger?: MCPLogger;
}

/**
 * Outcome of connecting several servers
 */
export interface ConnectAllResult {
  connected: string[];
  failed: Array<{ name: string; error: Error }>;
}

/**
 * MCP Server Registry
 */
export class MCPServerRegistry {
  private clients = new Map<string, MCPClient>();
  private connecting = new Set<string>();
  private closed = false;
  private closePromise: Promise<void> | null = null;
  private readonly logger: MCPLogger;
  private readonly clientFactory: MCPClientFactory;

  constructor(options: MCPServerRegistryOptions = {}) {
    this.logger = options.logger ?? scopedLogger("mcp:registry");
    this.clientFactory =
      options.clientFactory ??
      ((name, params) =>
        new MCPClientImpl(params, {
          name,
          transportFactory: options.transportFactory,
          logger: createChildLogger(this.logger, `mcp:${name}`),
        }));
  }

  /**
   * Connect a server and register it under `name` once it is ready
   */
  async connectToServer(name: string, params: MCPConnectionParams): Promise<MCPClient> {
    if (this.closed) {
      throw new MCPStateError("connectToServer", "closed");
    }
    if (!name.trim()) {
      throw new MCPConfigurationError("Server name must be a non-empty string");
    }
    if (this.clients.has(name) || this.connecting.has(name)) {
      throw new MCPConfigurationError(`Server '${name}' is already connected`);
    }

    this.connecting.add(name);
    try {
      const client = this.clientFactory(name, params);
      await client.initialize();

      if (this.closed) {
        await client.close();
        throw new MCPStateError("connectToServer", "closed");
      }

      this.clients.set(name, client);
      this.logger.info(`Server '${name}' registered`);
      return client;
    } finally {
      this.connecting.delete(name);
    }
  }

  /**
   * Connect servers one after another; individual failures are collected
   */
  async connectAll(servers: Record<string, MCPConnectionParams>): Promise<ConnectAllResult> {
    const result: ConnectAllResult = { connected: [], failed: [] };

    for (const [name, params] of Object.entries(servers)) {
      try {
        await this.connectToServer(name, params);
        result.connected.push(name);
      } catch (error) {
        this.logger.error(`Failed to connect server '${name}': ${errorMessage(error)}`);
        result.failed.push({ name, error: toError(error) });
      }
    }

    return result;
  }

  /**
   * Tools of every ready server in registration order. Servers that are
   * not ready or fail to list their tools are skipped.
   */
  async getTools(options?: MCPRequestOptions): Promise<MCPBoundTool[]> {
    const entries = Array.from(this.clients.entries());

    const perServer = await Promise.all(
      entries.map(async ([name, client]): Promise<MCPBoundTool[]> => {
        if (client.state !== "ready") {
          this.logger.warn(`Skipping tools from '${name}': client is ${client.state}`);
          return [];
        }
        try {
          return bindTools(await client.listTools(options), name, client);
        } catch (error) {
          this.logger.warn(`Skipping tools from '${name}': ${errorMessage(error)}`);
          return [];
        }
      }),
    );

    return perServer.flat();
  }

  async callTool(
    serverName: string,
    toolName: string,
    args: JSONObject = {},
    options?: MCPRequestOptions,
  ): Promise<MCPCallToolResult> {
    return this.require(serverName).callTool(toolName, args, options);
  }

  async listPrompts(serverName: string, options?: MCPRequestOptions): Promise<MCPPrompt[]> {
    return this.require(serverName).listPrompts(options);
  }

  async getPrompt(
    serverName: string,
    promptName: string,
    args?: Record<string, string>,
    options?: MCPRequestOptions,
  ): Promise<MCPPromptMessage[]> {
    return this.require(serverName).getPrompt(promptName, args, options);
  }

  async listResources(serverName: string, options?: MCPRequestOptions): Promise<MCPResourceListing> {
    return this.require(serverName).listResources(options);
  }

  async readResource(
    serverName: string,
    uri: string,
    options?: MCPRequestOptions,
  ): Promise<MCPResourceContent[]> {
    return this.require(serverName).readResource(uri, options);
  }

  async subscribeToResource(
    serverName: string,
    uri: string,
    options?: MCPRequestOptions,
  ): Promise<void> {
    return this.require(serverName).subscribeToResource(uri, options);
  }

  async unsubscribeFromResource(
    serverName: string,
    uri: string,
    options?: MCPRequestOptions,
  ): Promise<void> {
    return this.require(serverName).unsubscribeFromResource(uri, options);
  }

  async getServerMetadata(
    serverName: string,
    options?: MCPRequestOptions,
  ): Promise<MCPServerMetadata> {
    return this.require(serverName).getServerMetadata(options);
  }

  /**
   * Get the client for a server
   */
  getClient(name: string): MCPClient | undefined {
    return this.clients.get(name);
  }

  /**
   * Registered server names in registration order
   */
  getServerNames(): string[] {
    return Array.from(this.clients.keys());
  }

  hasServer(name: string): boolean {
    return this.clients.has(name);
  }

  private require(name: string): MCPClient {
    const client = this.clients.get(name);
    if (!client) {
      throw new MCPServerNotFoundError(name, this.getServerNames());
    }
    return client;
  }

  /**
   * Close every session in registration order. All sessions are attempted;
   * the first failure is thrown afterwards.
   */
  close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.closeAll();
    }
    return this.closePromise;
  }

  private async closeAll(): Promise<void> {
    this.closed = true;
    const entries = Array.from(this.clients.entries());
    this.clients.clear();

    let firstError: Error | null = null;
    for (const [name, client] of entries) {
      try {
        await client.close();
      } catch (error) {
        this.logger.error(`Error closing server '${name}': ${errorMessage(error)}`);
        firstError ??= toError(error);
      }
    }

    if (firstError) {
      throw firstError;
    }
  }

  /**
   * Run `fn` with this registry and close it on every exit path
   */
  async use<T>(fn: (registry: this) => Promise<T>): Promise<T> {
    return scoped(
      () => fn(this),
      () => this.close(),
      (error) => this.logger.error(`Error while closing registry: ${errorMessage(error)}`),
    );
  }
}

/**
 * Create a new registry
 */
export function createMCPServerRegistry(options?: MCPServerRegistryOptions): MCPServerRegistry {
  return new MCPServerRegistry(options);
}
