/**
 * Configuration interface for the AppServer.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { FastifyInstance } from "fastify";
import type { AuthConfig } from "../auth/types";

export interface AppServerConfig {
  /** Server name reported to MCP clients */
  name: string;

  /** Server version reported to MCP clients (defaults to the package version) */
  version?: string;

  /** Port to run the server on */
  port: number;

  /** Interface to bind (defaults to all interfaces) */
  host?: string;

  /** Provider chain, server secret, trusted issuers and protected paths */
  auth?: AuthConfig;

  /** Raise logging to debug level */
  debug?: boolean;

  /** Adds tools to every MCP server instance */
  registerTools?: (server: McpServer) => void;

  /** Adds operator routes; they bypass authentication unless listed as protected */
  registerRoutes?: (server: FastifyInstance) => void | Promise<void>;
}
