/**
 * Default command - starts the server when no subcommand is specified.
 */

import type { Command } from "commander";
import { logger } from "../../utils/logger";
import type { ServeOptions } from "../types";
import { addServeOptions, runServe } from "./serve";

export function createDefaultAction(program: Command): Command {
  return addServeOptions(program).action(async (options: ServeOptions) => {
    logger.debug("No subcommand specified, starting server by default...");
    await runServe(options);
  });
}
