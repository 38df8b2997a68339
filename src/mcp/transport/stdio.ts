/**
 * MCP Stdio Transport Implementation
 *
 * Spawns the server as a child process and exchanges line-delimited
 * JSON-RPC messages over its stdin and stdout.
 */

import { spawn, type ChildProcess } from "node:child_process";
import type { JSONRPCMessage, MCPTransport } from "../types.js";
import { MCPConnectionError, MCPTransportError } from "../errors.js";
import { decodeJSONRPCMessage } from "../protocol.js";
import { scopedLogger, type MCPLogger } from "../../utils/logger.js";

/**
 * Stdio transport configuration
 */
export interface StdioTransportConfig {
  /** Command to execute */
  command: string;
  /** Arguments for the command */
  args?: readonly string[];
  /** Extra environment variables, merged over the current process env */
  env?: Readonly<Record<string, string>>;
  /** Working directory */
  cwd?: string;
  /** Grace period before SIGTERM, and again before SIGKILL, on disconnect */
  shutdownTimeoutMs?: number;
  logger?: MCPLogger;
}

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;

/**
 * Stdio transport for MCP communication
 */
export class StdioTransport implements MCPTransport {
  private process: ChildProcess | null = null;
  private messageCallback: ((message: JSONRPCMessage) => void) | null = null;
  private errorCallback: ((error: Error) => void) | null = null;
  private closeCallback: (() => void) | null = null;
  private buffer = "";
  private connected = false;
  private exited = false;
  private readonly logger: MCPLogger;

  constructor(private readonly config: StdioTransportConfig) {
    this.logger = config.logger ?? scopedLogger("mcp:stdio");
  }

  /**
   * Connect to the stdio transport by spawning the process
   */
  async connect(): Promise<void> {
    if (this.connected || this.process) {
      throw new MCPConnectionError("Transport already connected");
    }

    const { command, args = [], env, cwd } = this.config;

    return new Promise((resolve, reject) => {
      let spawned = false;

      const child = spawn(command, [...args], {
        stdio: ["pipe", "pipe", "pipe"],
        env: { ...process.env, ...env },
        cwd,
      });
      this.process = child;

      child.on("error", (error) => {
        if (!spawned) {
          this.process = null;
          reject(
            new MCPConnectionError(`Failed to spawn '${command}': ${error.message}`, {
              cause: error,
            }),
          );
          return;
        }
        this.errorCallback?.(new MCPTransportError(`Process error: ${error.message}`, { cause: error }));
      });

      child.on("spawn", () => {
        spawned = true;
        this.connected = true;
        this.setupHandlers(child);
        resolve();
      });
    });
  }

  /**
   * Setup data handlers for the process
   */
  private setupHandlers(child: ChildProcess): void {
    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", (data: string) => {
      this.handleData(data);
    });

    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (data: string) => {
      for (const line of data.split("\n")) {
        if (line.trim()) this.logger.debug(`[${this.config.command} stderr] ${line.trimEnd()}`);
      }
    });

    // A failed write after the server exits surfaces through send()
    child.stdin?.on("error", (error) => {
      this.logger.debug(`stdin error: ${error.message}`);
    });

    child.on("exit", (code) => {
      if (code !== 0 && code !== null) {
        this.errorCallback?.(new MCPTransportError(`Process exited with code ${code}`));
      }
    });

    child.on("close", () => {
      this.connected = false;
      this.exited = true;
      this.closeCallback?.();
    });
  }

  /**
   * Handle incoming data from stdout
   */
  private handleData(data: string): void {
    this.buffer += data;

    // JSON-RPC messages are newline-delimited
    const lines = this.buffer.split("\n");
    this.buffer = lines.pop() ?? "";

    for (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed) continue;

      let message: JSONRPCMessage;
      try {
        message = decodeJSONRPCMessage(trimmed);
      } catch (error) {
        this.errorCallback?.(
          new MCPTransportError(`Invalid message from server: ${trimmed.slice(0, 200)}`, {
            cause: error,
          }),
        );
        continue;
      }
      this.messageCallback?.(message);
    }
  }

  /**
   * Send a message through the transport
   */
  async send(message: JSONRPCMessage): Promise<void> {
    const stdin = this.process?.stdin;
    if (!this.connected || !stdin) {
      throw new MCPConnectionError("Transport not connected");
    }

    const line = JSON.stringify(message) + "\n";

    return new Promise((resolve, reject) => {
      stdin.write(line, (error) => {
        if (error) {
          reject(new MCPTransportError(`Write error: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Disconnect: close stdin, then escalate to SIGTERM and SIGKILL
   */
  async disconnect(): Promise<void> {
    const child = this.process;
    if (!child) return;

    if (!this.exited) {
      const grace = this.config.shutdownTimeoutMs ?? DEFAULT_SHUTDOWN_TIMEOUT_MS;

      await new Promise<void>((resolve) => {
        let forceTimer: ReturnType<typeof setTimeout> | undefined;
        const termTimer = setTimeout(() => {
          child.kill("SIGTERM");
          forceTimer = setTimeout(() => child.kill("SIGKILL"), grace);
        }, grace);

        child.once("close", () => {
          clearTimeout(termTimer);
          clearTimeout(forceTimer);
          resolve();
        });

        child.stdin?.end();
      });
    }

    this.connected = false;
    this.process = null;
  }

  /**
   * Set callback for received messages
   */
  onMessage(callback: (message: JSONRPCMessage) => void): void {
    this.messageCallback = callback;
  }

  /**
   * Set callback for errors
   */
  onError(callback: (error: Error) => void): void {
    this.errorCallback = callback;
  }

  /**
   * Set callback for connection close
   */
  onClose(callback: () => void): void {
    this.closeCallback = callback;
  }

  /**
   * Check if transport is connected
   */
  isConnected(): boolean {
    return this.connected;
  }
}
