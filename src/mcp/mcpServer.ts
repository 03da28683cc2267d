import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { type IssuerVerifier, withToolRequestContext } from "../auth";
import { createLogger } from "../utils/logger";
import type { McpServerTools } from "./tools";

const logger = createLogger("McpServer");

export interface McpServerOptions {
  name: string;
  version: string;
  /** Verifies ID tokens rebuilt from protocol request headers when no context is bound */
  verifier?: IssuerVerifier;
  /** Adds caller tools to every server instance */
  registerTools?: (server: McpServer) => void;
}

function createResponse(text: string): CallToolResult {
  return { content: [{ type: "text", text }] };
}

function createError(text: string): CallToolResult {
  return { content: [{ type: "text", text }], isError: true };
}

/**
 * Creates an MCP server instance with the built-in tools and any caller tools registered.
 * Tool handlers run inside {@link withToolRequestContext}, so they see the request's
 * context even when the transport dispatches them outside the HTTP hooks.
 */
export function createMcpServerInstance(
  tools: McpServerTools,
  options: McpServerOptions,
): McpServer {
  const server = new McpServer(
    { name: options.name, version: options.version },
    { capabilities: { tools: {} } },
  );

  server.tool(
    "whoami",
    "Report the identity and connector names available to the current request.",
    async (extra) =>
      withToolRequestContext(
        extra,
        async () => {
          try {
            const result = await tools.whoami.execute(extra);
            return createResponse(JSON.stringify(result, null, 2));
          } catch (error) {
            logger.error(`❌ whoami failed: ${error instanceof Error ? error.message : String(error)}`);
            return createError(
              `Failed to resolve identity: ${error instanceof Error ? error.message : String(error)}`,
            );
          }
        },
        { verifier: options.verifier },
      ),
  );

  options.registerTools?.(server);

  return server;
}
