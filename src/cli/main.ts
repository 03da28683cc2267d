/**
 * CLI main entry point with global shutdown and error handling.
 */

import type { AppServer } from "../app";
import { AuthError } from "../auth";
import { logger } from "../utils/logger";
import { createCliProgram } from "./index";

let activeAppServer: AppServer | null = null;
let isShuttingDown = false;

/**
 * Graceful shutdown handler for SIGINT
 */
const sigintHandler = async (): Promise<void> => {
  if (isShuttingDown) return;
  isShuttingDown = true;

  logger.debug("Received SIGINT. Shutting down gracefully...");

  try {
    if (activeAppServer) {
      logger.debug("SIGINT: Stopping AppServer...");
      await activeAppServer.stop();
      activeAppServer = null;
      logger.debug("SIGINT: AppServer stopped.");
    }

    logger.info("✅ Graceful shutdown completed");
    process.exit(0);
  } catch (error) {
    logger.error(`❌ Error during graceful shutdown: ${error}`);
    process.exit(1);
  }
};

/**
 * Registers global services for shutdown handling
 */
export function registerGlobalServices(services: { appServer?: AppServer }): void {
  if (services.appServer) activeAppServer = services.appServer;
}

/**
 * Main CLI execution function
 */
export async function runCli(argv: string[] = process.argv): Promise<void> {
  isShuttingDown = false;

  // Ensure only one SIGINT handler is active
  process.removeListener("SIGINT", sigintHandler);
  process.on("SIGINT", sigintHandler);

  try {
    const program = createCliProgram();
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof AuthError) {
      // Configuration and auth errors carry their own readable messages
      logger.error(error.message);
    } else {
      logger.error(`❌ Error in CLI: ${error}`);
    }

    if (!isShuttingDown && activeAppServer) {
      isShuttingDown = true;
      await activeAppServer.stop().catch((e: unknown) => logger.error(`❌ Error stopping AppServer: ${e}`));
      activeAppServer = null;
    }
    process.exit(1);
  }
}
