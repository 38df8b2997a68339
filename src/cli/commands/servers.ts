/**
 * Servers Command
 *
 * Lists the servers defined in the config file.
 */

import type { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { createConfigContext, loadServersFromConfig } from "../../mcp/config-loader.js";
import type { MCPConnectionParams } from "../../mcp/types.js";
import { getConfigPath, type CLIDependencies } from "../shared.js";

/**
 * Where a server is reached, for display
 */
export function describeTarget(params: MCPConnectionParams): string {
  if (params.transport === "stdio") {
    return `stdio: ${[params.command, ...params.args].join(" ")}`;
  }
  return `sse: ${params.baseUrl || "(no base URL)"}`;
}

/**
 * Register servers command
 */
export function registerServersCommand(program: Command, deps: CLIDependencies = {}): void {
  program
    .command("servers")
    .description("List the servers defined in the config file")
    .action(async (_options: unknown, command: Command) => {
      const { servers, defaultServer } = await loadServersFromConfig({
        configPath: getConfigPath(command),
        context: deps.context ?? createConfigContext(),
      });

      const names = Object.keys(servers);
      if (names.length === 0) {
        p.outro("No MCP servers configured");
        return;
      }

      p.log.message("Configured MCP Servers:");

      for (const [name, params] of Object.entries(servers)) {
        const marker = name === defaultServer ? chalk.green(" (default)") : "";
        p.log.message(`  ${chalk.bold(name)}${marker}`);
        p.log.message(`    Transport: ${describeTarget(params)}`);
        p.log.message(`    Timeout: ${params.timeoutSeconds}s`);
        if (params.apiKey) {
          p.log.message("    Credential: configured");
        }
        if (params.description) {
          p.log.message(`    Description: ${params.description}`);
        }
      }

      p.outro(`Total: ${names.length} server${names.length === 1 ? "" : "s"}`);
    });
}
