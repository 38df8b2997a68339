/**
 * Resources Commands
 */

import type { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import type { MCPResourceContent } from "../../mcp/types.js";
import { withConfiguredServer, type CLIDependencies } from "../shared.js";

function describeContent(content: MCPResourceContent): string {
  if ("text" in content) return content.text;
  const bytes = Buffer.from(content.blob, "base64").length;
  return `[Binary: ${content.mimeType ?? "application/octet-stream"}, ${bytes} bytes]`;
}

/**
 * Register resources and read commands
 */
export function registerResourcesCommands(program: Command, deps: CLIDependencies = {}): void {
  program
    .command("resources")
    .description("List resources and resource templates of a server")
    .argument("<server>", "Server name from the config file")
    .action(async (server: string, _options: unknown, command: Command) => {
      const { resources, templates } = await withConfiguredServer(command, server, deps, (client) =>
        client.listResources(),
      );

      if (resources.length === 0 && templates.length === 0) {
        p.outro(`Server '${server}' has no resources`);
        return;
      }

      for (const resource of resources) {
        p.log.message(`  ${chalk.bold(resource.uri)}  ${chalk.dim(resource.name)}`);
      }
      for (const template of templates) {
        p.log.message(`  ${chalk.bold(template.uriTemplate)}  ${chalk.dim(`${template.name} (template)`)}`);
      }

      p.outro(`Total: ${resources.length} resources, ${templates.length} templates`);
    });

  program
    .command("read")
    .description("Read a resource")
    .argument("<server>", "Server name from the config file")
    .argument("<uri>", "Resource URI")
    .action(async (server: string, uri: string, _options: unknown, command: Command) => {
      const contents = await withConfiguredServer(command, server, deps, (client) =>
        client.readResource(uri),
      );
      for (const content of contents) {
        p.log.message(describeContent(content));
      }
    });
}
