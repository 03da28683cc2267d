import { WhoAmITool } from "../tools";

/**
 * Interface for the shared tool instances.
 */
export interface McpServerTools {
  whoami: WhoAmITool;
}

/**
 * Initializes and returns the shared tool instances.
 */
export function initializeTools(): McpServerTools {
  return {
    whoami: new WhoAmITool(),
  };
}
