/**
 * MCP Config File Loader
 *
 * Finds mcp.json, validates it and turns server entries into connection parameters.
 */

import { access, readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import {
  CONFIG_FILE_NAME,
  MCPConfigFileSchema,
  MCPServerEntrySchema,
  createConnectionParams,
  entryToConnectionInput,
  type EnvSource,
} from "./config.js";
import { MCPConfigNotFoundError, MCPDataError, MCPServerNotFoundError } from "./errors.js";
import type { MCPConnectionParams } from "./types.js";

/**
 * Where to look for config files and which environment to resolve `env:` keys from
 */
export interface MCPConfigContext {
  cwd: string;
  homeDir: string;
  env: EnvSource;
}

/**
 * Parsed mcp.json; server entries are still unvalidated
 */
export interface MCPConfigFile {
  path: string;
  defaultServer?: string;
  servers: Record<string, unknown>;
}

/**
 * Values that take precedence over the selected server's entry
 */
export interface MCPConnectionOverrides {
  baseUrl?: string;
  timeoutSeconds?: number;
  apiKey?: string | null;
  description?: string;
}

export interface ResolveServerOptions {
  serverName?: string;
  configPath?: string;
  overrides?: MCPConnectionOverrides;
  context?: MCPConfigContext;
}

/**
 * Build a config context from the current process
 */
export function createConfigContext(overrides: Partial<MCPConfigContext> = {}): MCPConfigContext {
  return {
    cwd: overrides.cwd ?? process.cwd(),
    homeDir: overrides.homeDir ?? homedir(),
    env: overrides.env ?? process.env,
  };
}

/**
 * Locations searched when no explicit path is given, in order
 */
export function getConfigSearchPaths(context: MCPConfigContext): string[] {
  return [
    join(context.cwd, CONFIG_FILE_NAME),
    join(context.homeDir, ".mcp.json"),
    join(context.homeDir, ".config", "mcp", CONFIG_FILE_NAME),
  ];
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find the config file to use.
 *
 * An explicit path must exist. Otherwise the search paths are tried in order
 * and `null` means none was found.
 */
export async function findConfigFile(
  options: { configPath?: string; context?: MCPConfigContext } = {},
): Promise<string | null> {
  const context = options.context ?? createConfigContext();

  if (options.configPath !== undefined) {
    const explicit = resolve(context.cwd, options.configPath);
    if (!(await exists(explicit))) {
      throw new MCPConfigNotFoundError(`Config file not found: ${explicit}`, [explicit]);
    }
    return explicit;
  }

  for (const candidate of getConfigSearchPaths(context)) {
    if (await exists(candidate)) return candidate;
  }
  return null;
}

/**
 * Load and validate the top level of a config file
 */
export async function loadConfigFile(path: string): Promise<MCPConfigFile> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new MCPConfigNotFoundError(
      `Failed to read config file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      [path],
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new MCPDataError(
      `Invalid JSON in config file: ${path}`,
      [error instanceof Error ? error.message : String(error)],
      { cause: error },
    );
  }

  const result = MCPConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new MCPDataError(
      'Config file is missing a "servers" mapping',
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }

  return {
    path,
    servers: result.data.servers,
    ...(result.data.default_server !== undefined && { defaultServer: result.data.default_server }),
  };
}

/**
 * Validate one server entry and build its connection parameters
 */
export function paramsFromEntry(
  name: string,
  entry: unknown,
  env: EnvSource,
  overrides: MCPConnectionOverrides = {},
): MCPConnectionParams {
  const result = MCPServerEntrySchema.safeParse(entry);
  if (!result.success) {
    throw new MCPDataError(
      `Invalid server entry '${name}'`,
      result.error.issues.map((i) => `${i.path.join(".") || "(entry)"}: ${i.message}`),
    );
  }

  const input = entryToConnectionInput(result.data);
  return createConnectionParams(
    {
      ...input,
      ...(overrides.baseUrl !== undefined && { baseUrl: overrides.baseUrl }),
      ...(overrides.timeoutSeconds !== undefined && { timeoutSeconds: overrides.timeoutSeconds }),
      ...(overrides.apiKey !== undefined && { apiKey: overrides.apiKey }),
      ...(overrides.description !== undefined && { description: overrides.description }),
    },
    env,
  );
}

async function loadRequiredConfig(
  configPath: string | undefined,
  context: MCPConfigContext,
): Promise<MCPConfigFile> {
  const path = await findConfigFile({ configPath, context });
  if (path === null) {
    throw new MCPConfigNotFoundError(
      "No MCP config file found",
      getConfigSearchPaths(context),
    );
  }
  return loadConfigFile(path);
}

/**
 * Resolve connection parameters for one server.
 *
 * The server is picked by explicit name, else the file's `default_server`,
 * else the entry named `default`.
 */
export async function resolveServerParams(
  options: ResolveServerOptions = {},
): Promise<MCPConnectionParams> {
  const context = options.context ?? createConfigContext();
  const config = await loadRequiredConfig(options.configPath, context);

  const name = options.serverName ?? config.defaultServer ?? "default";
  if (!Object.prototype.hasOwnProperty.call(config.servers, name)) {
    throw new MCPServerNotFoundError(name, Object.keys(config.servers));
  }

  return paramsFromEntry(name, config.servers[name], context.env, options.overrides);
}

/**
 * Every configured server as connection parameters, in file order
 */
export async function loadServersFromConfig(
  options: { configPath?: string; context?: MCPConfigContext } = {},
): Promise<{ defaultServer?: string; servers: Record<string, MCPConnectionParams> }> {
  const context = options.context ?? createConfigContext();
  const config = await loadRequiredConfig(options.configPath, context);

  const servers: Record<string, MCPConnectionParams> = Object.fromEntries(
    Object.entries(config.servers).map(([name, entry]) => [
      name,
      paramsFromEntry(name, entry, context.env),
    ]),
  );

  return {
    servers,
    ...(config.defaultServer !== undefined && { defaultServer: config.defaultServer }),
  };
}
