/**
 * Application server module exports.
 */

export { AppServer } from "./AppServer";
export type { AppServerConfig } from "./AppServerConfig";

import { AppServer } from "./AppServer";
import type { AppServerConfig } from "./AppServerConfig";

/**
 * Start an AppServer with the given configuration.
 * Convenience function for CLI integration.
 */
export async function startAppServer(config: AppServerConfig): Promise<AppServer> {
  const appServer = new AppServer(config);
  await appServer.start();
  return appServer;
}
