/**
 * Prompt Command
 */

import type { Command } from "commander";
import * as p from "@clack/prompts";
import chalk from "chalk";
import { parsePromptArgs, withConfiguredServer, type CLIDependencies } from "../shared.js";

/**
 * Register prompt command
 */
export function registerPromptCommand(program: Command, deps: CLIDependencies = {}): void {
  program
    .command("prompt")
    .description("Render a prompt and print its messages")
    .argument("<server>", "Server name from the config file")
    .argument("<name>", "Prompt name")
    .argument("[json]", "Prompt arguments as a JSON object of strings", "{}")
    .action(
      async (server: string, name: string, json: string, _options: unknown, command: Command) => {
        const args = parsePromptArgs(json);
        const messages = await withConfiguredServer(command, server, deps, (client) =>
          client.getPrompt(name, args),
        );

        for (const message of messages) {
          const body = message.content.text ?? `[${message.content.type}]`;
          p.log.message(`${chalk.cyan(message.role)}: ${body}`);
        }
      },
    );
}
