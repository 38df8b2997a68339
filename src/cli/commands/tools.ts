/**
 * Tools Commands
 *
 * `tools [server]` lists tools, `call <server> <tool> [json]` invokes one.
 */

import type { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { createConfigContext, loadServersFromConfig } from "../../mcp/config-loader.js";
import { createMCPServerRegistry } from "../../mcp/registry.js";
import { bindTools, formatToolResult, type MCPBoundTool } from "../../mcp/tools.js";
import {
  getConfigPath,
  parseJSONObject,
  withConfiguredServer,
  type CLIDependencies,
} from "../shared.js";

function printTools(tools: MCPBoundTool[]): void {
  for (const tool of tools) {
    p.log.message(`  ${chalk.bold(tool.qualifiedName)}  ${chalk.dim(tool.description)}`);
  }
}

async function listAllTools(command: Command, deps: CLIDependencies): Promise<void> {
  const { servers } = await loadServersFromConfig({
    configPath: getConfigPath(command),
    context: deps.context ?? createConfigContext(),
  });

  const registry = createMCPServerRegistry({ transportFactory: deps.transportFactory });
  await registry.use(async (connected) => {
    const { failed } = await connected.connectAll(servers);
    for (const { name, error } of failed) {
      p.log.warn(`Skipped '${name}': ${error.message}`);
    }

    const tools = await connected.getTools();
    printTools(tools);
    p.outro(`Total: ${tools.length} tool${tools.length === 1 ? "" : "s"}`);
  });
}

/**
 * Register tools and call commands
 */
export function registerToolsCommands(program: Command, deps: CLIDependencies = {}): void {
  program
    .command("tools")
    .description("List tools of one server, or of every configured server")
    .argument("[server]", "Server name from the config file")
    .action(async (server: string | undefined, _options: unknown, command: Command) => {
      if (server === undefined) {
        await listAllTools(command, deps);
        return;
      }

      const tools = await withConfiguredServer(command, server, deps, async (client) =>
        bindTools(await client.listTools(), server, client),
      );
      printTools(tools);
      p.outro(`Total: ${tools.length} tool${tools.length === 1 ? "" : "s"}`);
    });

  program
    .command("call")
    .description("Call a tool and print its result")
    .argument("<server>", "Server name from the config file")
    .argument("<tool>", "Tool name as advertised by the server")
    .argument("[json]", "Tool arguments as a JSON object", "{}")
    .option("--raw", "Print the full JSON result")
    .action(
      async (
        server: string,
        tool: string,
        json: string,
        options: { raw?: boolean },
        command: Command,
      ) => {
        const args = parseJSONObject(json, "Tool arguments");
        const result = await withConfiguredServer(command, server, deps, (client) =>
          client.callTool(tool, args),
        );

        if (options.raw) {
          p.log.message(JSON.stringify(result, null, 2));
          return;
        }
        p.log.message(formatToolResult(result, tool));
      },
    );
}
