/**
 * Main CLI setup and command registration.
 */

import { Command, Option } from "commander";
import packageJson from "../../package.json";
import { createDefaultAction } from "./commands/default";
import { createServeCommand } from "./commands/serve";
import type { GlobalOptions } from "./types";
import { setupLogging } from "./utils";

/**
 * Creates and configures the main CLI program with all commands.
 */
export function createCliProgram(): Command {
  const program = new Command();

  program
    .name("north-mcp-server")
    .description("MCP server with North authentication: provider chain, trusted issuers and request context.")
    .version(packageJson.version)
    // Mutually exclusive logging flags
    .addOption(new Option("--verbose", "Enable verbose (debug) logging").conflicts("silent"))
    .addOption(new Option("--silent", "Disable all logging except errors"))
    .enablePositionalOptions()
    .allowExcessArguments(false)
    .showHelpAfterError(true);

  program.hook("preAction", async (thisCommand) => {
    const globalOptions: GlobalOptions = thisCommand.opts();
    setupLogging(globalOptions);
  });

  createServeCommand(program);

  // Set default action for when no subcommand is specified
  createDefaultAction(program);

  return program;
}
