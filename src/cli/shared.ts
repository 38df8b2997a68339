/**
 * Helpers shared by the CLI commands
 */

import type { Command } from "commander";
import { z } from "zod";
import { withMCPClient } from "../mcp/client.js";
import { createConfigContext, resolveServerParams, type MCPConfigContext } from "../mcp/config-loader.js";
import { MCPDataError } from "../mcp/errors.js";
import { JSONObjectSchema } from "../mcp/protocol.js";
import type { JSONObject, MCPClient, MCPTransportFactory } from "../mcp/types.js";

/**
 * Injected by tests; the real CLI uses the process environment and real transports
 */
export interface CLIDependencies {
  context?: MCPConfigContext;
  transportFactory?: MCPTransportFactory;
}

interface GlobalOptions {
  config?: string;
}

/**
 * The global --config value, read from the root program
 */
export function getConfigPath(command: Command): string | undefined {
  let root = command;
  while (root.parent) root = root.parent;
  return root.opts<GlobalOptions>().config;
}

/**
 * Parse a JSON object given on the command line
 */
export function parseJSONObject(text: string | undefined, what: string): JSONObject {
  if (text === undefined || text.trim() === "") return {};

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new MCPDataError(`${what} must be valid JSON`, [String(error)], { cause: error });
  }

  const parsed = JSONObjectSchema.safeParse(value);
  if (!parsed.success) {
    throw new MCPDataError(`${what} must be a JSON object`);
  }
  return parsed.data;
}

const PromptArgsSchema = z.record(z.string());

/**
 * Parse prompt arguments, which MCP restricts to string values
 */
export function parsePromptArgs(text: string | undefined): Record<string, string> {
  const parsed = PromptArgsSchema.safeParse(parseJSONObject(text, "Prompt arguments"));
  if (!parsed.success) {
    throw new MCPDataError("Prompt arguments must map names to strings");
  }
  return parsed.data;
}

/**
 * Resolve `serverName` from the config, connect, run `fn`, and close
 */
export async function withConfiguredServer<T>(
  command: Command,
  serverName: string,
  deps: CLIDependencies,
  fn: (client: MCPClient) => Promise<T>,
): Promise<T> {
  const context = deps.context ?? createConfigContext();
  const params = await resolveServerParams({
    serverName,
    configPath: getConfigPath(command),
    context,
  });
  return withMCPClient(params, fn, {
    name: serverName,
    transportFactory: deps.transportFactory,
  });
}
