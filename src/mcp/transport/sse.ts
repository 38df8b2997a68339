/**
 * SSE (Server-Sent Events) Transport for MCP
 * Receives messages on an event stream and sends them with HTTP POST to the
 * endpoint the server announces in its first `endpoint` event.
 */

import type { JSONRPCMessage, MCPTransport } from "../types.js";
import { MCPConnectionError, MCPTransportError } from "../errors.js";
import { decodeJSONRPCMessage } from "../protocol.js";
import { sleep } from "../../utils/async.js";
import { errorMessage, toError } from "../../utils/errors.js";
import { scopedLogger, type MCPLogger } from "../../utils/logger.js";

/**
 * SSE transport configuration
 */
export interface SSETransportConfig {
  /** URL of the server's event stream */
  url: string;
  /** Extra headers sent with every request */
  headers?: Readonly<Record<string, string>>;
  /** Bearer credential; no Authorization header when absent */
  apiKey?: string;
  /** Reconnect delay in ms (default: 1000) */
  initialReconnectDelay?: number;
  /** Maximum reconnect delay in ms (default: 30000) */
  maxReconnectDelay?: number;
  /** Maximum reconnect attempts (default: 10) */
  maxReconnectAttempts?: number;
  logger?: MCPLogger;
}

const DEFAULT_CONFIG = {
  initialReconnectDelay: 1000,
  maxReconnectDelay: 30000,
  maxReconnectAttempts: 10,
};

type SSEBody = NonNullable<Response["body"]>;

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * SSE Transport implementation
 */
export class SSETransport implements MCPTransport {
  private readonly url: string;
  private readonly headers: Record<string, string>;
  private readonly maxReconnectDelay: number;
  private readonly maxReconnectAttempts: number;
  private readonly logger: MCPLogger;
  private reconnectDelay: number;

  private connected = false;
  private closeNotified = false;
  private abortController: AbortController | null = null;
  private reconnectAttempts = 0;
  private lastEventId: string | null = null;
  private messageEndpoint: string | null = null;
  private endpointWaiter: {
    resolve: (endpoint: string) => void;
    reject: (error: Error) => void;
  } | null = null;

  private messageHandler: ((message: JSONRPCMessage) => void) | null = null;
  private errorHandler: ((error: Error) => void) | null = null;
  private closeHandler: (() => void) | null = null;

  constructor(config: SSETransportConfig) {
    this.url = config.url;
    this.headers = {
      ...config.headers,
      ...(config.apiKey ? { Authorization: `Bearer ${config.apiKey}` } : {}),
    };
    this.reconnectDelay = config.initialReconnectDelay ?? DEFAULT_CONFIG.initialReconnectDelay;
    this.maxReconnectDelay = config.maxReconnectDelay ?? DEFAULT_CONFIG.maxReconnectDelay;
    this.maxReconnectAttempts = config.maxReconnectAttempts ?? DEFAULT_CONFIG.maxReconnectAttempts;
    this.logger = config.logger ?? scopedLogger("mcp:sse");
  }

  /**
   * Open the event stream and wait for the server's message endpoint
   */
  async connect(): Promise<void> {
    if (this.connected) return;

    if (!this.url) {
      throw new MCPConnectionError("Base URL is required for SSE transport");
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.reconnectAttempts = 0;
    this.closeNotified = false;

    // Set connected before startListening so processStream's while(this.connected) loop works
    this.connected = true;

    const endpointReady = new Promise<string>((resolve, reject) => {
      this.endpointWaiter = { resolve, reject };
    });

    try {
      const [endpoint] = await Promise.all([endpointReady, this.startListening()]);
      this.messageEndpoint = endpoint;
      this.logger.debug(`SSE session established, posting to ${endpoint}`);
    } catch (error) {
      this.connected = false;
      this.endpointWaiter = null;
      controller.abort();
      throw error;
    }
  }

  /**
   * Disconnect from the SSE endpoint
   */
  async disconnect(): Promise<void> {
    this.connected = false;
    this.abortController?.abort();
    this.abortController = null;
    this.messageEndpoint = null;

    if (this.endpointWaiter) {
      this.endpointWaiter.reject(
        new MCPConnectionError("Transport closed before the server announced its message endpoint"),
      );
      this.endpointWaiter = null;
    }

    this.notifyClose();
  }

  /**
   * Send a JSON-RPC message via HTTP POST
   */
  async send(message: JSONRPCMessage): Promise<void> {
    const endpoint = this.messageEndpoint;
    if (!this.connected || !endpoint) {
      throw new MCPConnectionError("Not connected to SSE endpoint");
    }

    let response: Response;
    try {
      response = await fetch(endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...this.headers,
        },
        body: JSON.stringify(message),
        signal: this.abortController?.signal,
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw new MCPConnectionError("Transport closed while sending", { cause: error });
      }
      throw new MCPConnectionError(`Failed to send message: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    await response.body?.cancel();

    if (!response.ok) {
      throw new MCPTransportError(`HTTP POST failed: ${response.status} ${response.statusText}`);
    }
  }

  /**
   * Register message handler
   */
  onMessage(handler: (message: JSONRPCMessage) => void): void {
    this.messageHandler = handler;
  }

  /**
   * Register error handler
   */
  onError(handler: (error: Error) => void): void {
    this.errorHandler = handler;
  }

  /**
   * Register close handler
   */
  onClose(handler: () => void): void {
    this.closeHandler = handler;
  }

  /**
   * Check if connected
   */
  isConnected(): boolean {
    return this.connected;
  }

  private notifyClose(): void {
    if (this.closeNotified) return;
    this.closeNotified = true;
    this.closeHandler?.();
  }

  /**
   * Start listening to the SSE stream
   */
  private async startListening(): Promise<void> {
    const headers: Record<string, string> = {
      Accept: "text/event-stream",
      "Cache-Control": "no-cache",
      ...this.headers,
    };

    // Include Last-Event-ID for reconnection
    if (this.lastEventId) {
      headers["Last-Event-ID"] = this.lastEventId;
    }

    let response: Response;
    try {
      response = await fetch(this.url, {
        method: "GET",
        headers,
        signal: this.abortController?.signal,
      });
    } catch (error) {
      if (isAbortError(error)) return;
      throw new MCPConnectionError(`Failed to connect to SSE: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new MCPConnectionError(
        `SSE connection failed: ${response.status} ${response.statusText}`,
      );
    }

    if (!response.body) {
      throw new MCPConnectionError("SSE response has no body");
    }

    void this.processStream(response.body);
  }

  /**
   * Read events until the stream ends; never rejects
   */
  private async processStream(body: SSEBody): Promise<void> {
    const reader = body.getReader();
    const decoder = new TextDecoder();
    let buffer = "";
    let eventType = "";
    let eventData = "";
    let eventId = "";

    try {
      while (this.connected) {
        const { done, value } = await reader.read();

        if (done) {
          await this.handleStreamEnd();
          return;
        }

        buffer += decoder.decode(value, { stream: true });

        const lines = buffer.split("\n");
        buffer = lines.pop() ?? "";

        for (const rawLine of lines) {
          const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;

          if (line === "") {
            // Empty line = end of event
            if (eventData) {
              this.handleEvent(eventType, eventData, eventId);
            }
            eventType = "";
            eventData = "";
            eventId = "";
            continue;
          }

          if (line.startsWith(":")) continue;

          const colonIdx = line.indexOf(":");
          const field = colonIdx === -1 ? line : line.slice(0, colonIdx);
          const fieldValue = colonIdx === -1 ? "" : line.slice(colonIdx + 1).replace(/^ /, "");

          switch (field) {
            case "event":
              eventType = fieldValue;
              break;
            case "data":
              eventData += (eventData ? "\n" : "") + fieldValue;
              break;
            case "id":
              eventId = fieldValue;
              break;
            case "retry": {
              const delay = parseInt(fieldValue, 10);
              if (!isNaN(delay)) {
                this.reconnectDelay = delay;
              }
              break;
            }
          }
        }
      }
    } catch (error) {
      if (isAbortError(error) || !this.connected) return;

      this.errorHandler?.(
        new MCPTransportError(`SSE stream failed: ${errorMessage(error)}`, { cause: error }),
      );
      await this.handleStreamEnd();
    } finally {
      reader.releaseLock();
    }
  }

  /**
   * Handle a complete SSE event
   */
  private handleEvent(type: string, data: string, id: string): void {
    if (id) {
      this.lastEventId = id;
    }

    if (type === "endpoint") {
      const endpoint = new URL(data.trim(), this.url).toString();
      if (this.endpointWaiter) {
        this.endpointWaiter.resolve(endpoint);
        this.endpointWaiter = null;
      } else {
        this.messageEndpoint = endpoint;
      }
      return;
    }

    if (type !== "" && type !== "message") {
      this.logger.debug(`Ignoring SSE event '${type}'`);
      return;
    }

    let message: JSONRPCMessage;
    try {
      message = decodeJSONRPCMessage(data);
    } catch (error) {
      this.errorHandler?.(
        new MCPTransportError(`Invalid message in SSE event: ${data.slice(0, 100)}`, {
          cause: error,
        }),
      );
      return;
    }
    this.messageHandler?.(message);
  }

  private async handleStreamEnd(): Promise<void> {
    if (!this.connected) return;

    // No reconnect before the session was ever established
    if (this.endpointWaiter) {
      this.connected = false;
      this.endpointWaiter.reject(
        new MCPConnectionError("SSE stream ended before the server announced its message endpoint"),
      );
      this.endpointWaiter = null;
      return;
    }

    await this.handleReconnect();
  }

  /**
   * Handle reconnection with exponential backoff
   */
  private async handleReconnect(): Promise<void> {
    if (!this.connected || this.reconnectAttempts >= this.maxReconnectAttempts) {
      this.connected = false;
      this.messageEndpoint = null;
      this.notifyClose();
      return;
    }

    this.reconnectAttempts++;
    const delay = Math.min(
      this.reconnectDelay * Math.pow(2, this.reconnectAttempts - 1),
      this.maxReconnectDelay,
    );
    this.logger.warn(
      `SSE stream lost, reconnecting in ${delay}ms (attempt ${this.reconnectAttempts}/${this.maxReconnectAttempts})`,
    );

    await sleep(delay);

    if (!this.connected) return;

    try {
      await this.startListening();
      this.reconnectAttempts = 0;
    } catch (error) {
      this.errorHandler?.(toError(error));
      await this.handleReconnect();
    }
  }
}
