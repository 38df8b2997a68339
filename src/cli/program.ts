/**
 * CLI program definition
 */

import { Command } from "commander";
import { VERSION } from "../version.js";
import { registerServersCommand } from "./commands/servers.js";
import { registerToolsCommands } from "./commands/tools.js";
import { registerResourcesCommands } from "./commands/resources.js";
import { registerPromptCommand } from "./commands/prompts.js";
import type { CLIDependencies } from "./shared.js";

export function createProgram(deps: CLIDependencies = {}): Command {
  const program = new Command();

  program
    .name("mcpsw")
    .description("Inspect and call Model Context Protocol servers defined in mcp.json")
    .version(VERSION, "-v, --version", "Output the current version")
    .option("-c, --config <path>", "Config file (default: search ./mcp.json, ~/.mcp.json, ~/.config/mcp/mcp.json)");

  // Register commands
  registerServersCommand(program, deps);
  registerToolsCommands(program, deps);
  registerResourcesCommands(program, deps);
  registerPromptCommand(program, deps);

  return program;
}
