/**
 * MCP Configuration Module
 *
 * Schemas for the config file and validation of connection parameters.
 */

import { z } from "zod";
import { MCPConfigurationError } from "./errors.js";
import type {
  MCPConnectionInput,
  MCPConnectionParams,
  MCPSSEConnectionParams,
  MCPStdioConnectionParams,
} from "./types.js";
import { scopedLogger } from "../utils/logger.js";

/**
 * Default request and handshake budget, in seconds
 */
export const DEFAULT_TIMEOUT_SECONDS = 60;

/**
 * Longest delay a Node.js timer accepts; larger values fire after 1ms
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Largest `timeout` / `timeoutSeconds` accepted, so the budget fits one timer
 */
export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

/**
 * File name looked up in the working directory and under ~/.config/mcp
 */
export const CONFIG_FILE_NAME = "mcp.json";

/**
 * Prefix marking an api key as an environment variable reference
 */
export const ENV_REFERENCE_PREFIX = "env:";

/**
 * Environment lookup used for `env:` references
 */
export type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * One entry under `servers` in mcp.json
 */
export const MCPServerEntrySchema = z.object({
  transport: z.string().optional(),
  base_url: z.string().optional(),
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  env: z.record(z.string()).optional(),
  cwd: z.string().optional(),
  headers: z.record(z.string()).optional(),
  api_key: z.string().nullable().optional(),
  timeout: z.number().int().positive().max(MAX_TIMEOUT_SECONDS).optional(),
  description: z.string().optional(),
});

export type MCPServerEntry = z.infer<typeof MCPServerEntrySchema>;

function isServerMap(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Top level of mcp.json. Entries are validated one by one when selected.
 * `servers` is kept as parsed so every own key survives, `__proto__` included.
 */
export const MCPConfigFileSchema = z.object({
  default_server: z.string().optional(),
  servers: z.custom<Record<string, unknown>>(isServerMap, { message: "Expected an object" }),
});

const ConnectionInputSchema = z
  .object({
    transport: z.string().optional(),
    baseUrl: z.string().optional(),
    command: z.string().optional(),
    args: z.array(z.string()).readonly().optional(),
    env: z.record(z.string()).optional(),
    cwd: z.string().optional(),
    headers: z.record(z.string()).optional(),
    timeoutSeconds: z.number().finite().positive().max(MAX_TIMEOUT_SECONDS).optional(),
    apiKey: z.string().nullable().optional(),
    description: z.string().optional(),
  })
  .strict();

/**
 * Resolve an api key that may be an `env:NAME` reference.
 * An unset variable means no credential, never an error.
 */
export function resolveApiKey(ref: string | null | undefined, env: EnvSource): string | undefined {
  if (!ref) return undefined;
  if (!ref.startsWith(ENV_REFERENCE_PREFIX)) return ref;

  const name = ref.slice(ENV_REFERENCE_PREFIX.length).trim();
  const value = name ? env[name] : undefined;
  if (!value) {
    scopedLogger("mcp:config").debug(
      `Environment variable '${name}' is not set; connecting without a credential`,
    );
    return undefined;
  }
  return value;
}

/**
 * Map a config file entry onto connection input
 */
export function entryToConnectionInput(entry: MCPServerEntry): MCPConnectionInput {
  return {
    ...(entry.transport !== undefined && { transport: entry.transport }),
    ...(entry.base_url !== undefined && { baseUrl: entry.base_url }),
    ...(entry.command !== undefined && { command: entry.command }),
    ...(entry.args !== undefined && { args: entry.args }),
    ...(entry.env !== undefined && { env: entry.env }),
    ...(entry.cwd !== undefined && { cwd: entry.cwd }),
    ...(entry.headers !== undefined && { headers: entry.headers }),
    ...(entry.timeout !== undefined && { timeoutSeconds: entry.timeout }),
    ...(entry.api_key !== undefined && { apiKey: entry.api_key }),
    ...(entry.description !== undefined && { description: entry.description }),
  };
}

function inferTransport(input: { command?: string; baseUrl?: string }): string | undefined {
  if (input.command !== undefined) return "stdio";
  if (input.baseUrl !== undefined) return "sse";
  return undefined;
}

/**
 * Validate connection input and freeze it into connection parameters.
 * `apiKey` references are resolved against `env` here.
 */
export function createConnectionParams(
  input: MCPConnectionInput,
  env: EnvSource = process.env,
): MCPConnectionParams {
  const parsed = ConnectionInputSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
    );
    throw new MCPConfigurationError(`Invalid connection parameters: ${issues.join("; ")}`);
  }

  const data = parsed.data;
  const transport = data.transport ?? inferTransport(data);
  const apiKey = resolveApiKey(data.apiKey, env);
  const common = {
    timeoutSeconds: data.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS,
    ...(apiKey !== undefined && { apiKey }),
    ...(data.description !== undefined && { description: data.description }),
  };

  switch (transport) {
    case "stdio": {
      if (data.baseUrl !== undefined || data.headers !== undefined) {
        throw new MCPConfigurationError("stdio transport does not accept baseUrl or headers");
      }
      if (!data.command?.trim()) {
        throw new MCPConfigurationError("Command is required for stdio transport");
      }
      const params: MCPStdioConnectionParams = {
        transport: "stdio",
        command: data.command,
        args: Object.freeze([...(data.args ?? [])]),
        ...(data.env !== undefined && { env: Object.freeze({ ...data.env }) }),
        ...(data.cwd !== undefined && { cwd: data.cwd }),
        ...common,
      };
      return Object.freeze(params);
    }

    case "sse": {
      if (
        data.command !== undefined ||
        data.args !== undefined ||
        data.env !== undefined ||
        data.cwd !== undefined
      ) {
        throw new MCPConfigurationError("sse transport does not accept command, args, env or cwd");
      }
      const params: MCPSSEConnectionParams = {
        transport: "sse",
        baseUrl: data.baseUrl?.trim() ?? "",
        ...(data.headers !== undefined && { headers: Object.freeze({ ...data.headers }) }),
        ...common,
      };
      return Object.freeze(params);
    }

    case undefined:
      throw new MCPConfigurationError(
        'Connection parameters need a transport ("stdio" or "sse"), a command or a baseUrl',
      );

    default:
      throw new MCPConfigurationError(
        `Transport '${transport}' is not supported; use "stdio" or "sse"`,
      );
  }
}
