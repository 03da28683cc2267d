/**
 * Serve command - starts the MCP server behind the authentication layer.
 * Also the default action when no subcommand is given.
 */

import type { Command } from "commander";
import { startAppServer } from "../../app";
import { loadEnvConfig } from "../../utils/config";
import { logger } from "../../utils/logger";
import { registerGlobalServices } from "../main";
import type { ServeOptions } from "../types";
import { collect, createAppServerConfig } from "../utils";

/**
 * Adds the serve options to a command.
 */
export function addServeOptions(command: Command): Command {
  return command
    .option("--port <number>", "Port for the server (env: PORT, default 8000)")
    .option("--host <host>", "Interface to bind (env: HOST, default 0.0.0.0)")
    .option("--server-secret <secret>", "Shared secret clients must present")
    .option("--trusted-issuer <url>", "Issuer whose ID tokens are verified (repeatable)", collect)
    .option("--api-key <key>", "Accepted API key (repeatable)", collect)
    .option("--oauth-jwt-secret <secret>", "Shared secret for OAuth JWT validation")
    .option("--oauth-jwt-algorithm <alg>", "Algorithm for OAuth JWT validation (default HS256)")
    .option("--oauth-introspection-endpoint <url>", "RFC 7662 token introspection endpoint")
    .option("--oauth-client-id <id>", "Client ID for token introspection")
    .option("--oauth-client-secret <secret>", "Client secret for token introspection")
    .option("--oauth-email-claim <claim>", "Claim carrying the user's email (default email)")
    .option("--protected-path <path>", "Path that requires authentication (repeatable)", collect)
    .option("--strict-bypass", "Do not try to authenticate requests to unprotected paths")
    .option("--debug", "Enable debug logging for authentication");
}

export async function runServe(options: ServeOptions): Promise<void> {
  const config = createAppServerConfig(options, loadEnvConfig());
  logger.info("🚀 Starting MCP server (http mode)");

  const appServer = await startAppServer(config);
  registerGlobalServices({ appServer });

  await new Promise(() => {}); // Keep running until SIGINT
}

export function createServeCommand(program: Command): Command {
  return addServeOptions(
    program.command("serve").description("Start the MCP server with authentication"),
  ).action(async (options: ServeOptions) => {
    await runServe(options);
  });
}
