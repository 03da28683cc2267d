/**
 * MCP service that registers the MCP protocol routes on a Fastify server.
 * Authentication and context binding happen in the server-wide hooks, so these routes only
 * deal with transports.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { MESSAGES_PATH_PREFIX } from "../auth/pathPolicy";
import { createMcpServerInstance, type McpServerOptions } from "../mcp/mcpServer";
import { initializeTools } from "../mcp/tools";
import { logger } from "../utils/logger";

export interface McpService {
  /** Closes open SSE sessions and their servers. */
  close(): Promise<void>;
}

const methodNotAllowed = {
  jsonrpc: "2.0",
  error: { code: -32000, message: "Method not allowed." },
  id: null,
};

/**
 * Register MCP protocol routes on a Fastify server instance: the stateless streamable HTTP
 * endpoint at `/mcp`, and the SSE endpoint at `/sse` with its message endpoint under `/messages/`.
 */
export function registerMcpService(server: FastifyInstance, options: McpServerOptions): McpService {
  const tools = initializeTools();
  const sseTransports = new Map<string, SSEServerTransport>();
  const sseServers = new Set<McpServer>();

  server.route({
    method: "GET",
    url: "/sse",
    handler: async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        const sessionServer = createMcpServerInstance(tools, options);
        const transport = new SSEServerTransport(MESSAGES_PATH_PREFIX, reply.raw);
        sseTransports.set(transport.sessionId, transport);
        sseServers.add(sessionServer);
        logger.debug(`🔗 MCP client connected: ${transport.sessionId}`);

        reply.raw.on("close", () => {
          sseTransports.delete(transport.sessionId);
          sseServers.delete(sessionServer);
          sessionServer.close().catch((error: unknown) => {
            logger.error(`❌ Failed to close SSE session ${transport.sessionId}: ${error}`);
          });
          logger.debug(`🔗 MCP client disconnected: ${transport.sessionId}`);
        });

        await sessionServer.connect(transport);
      } catch (error) {
        logger.error(`❌ Error in SSE endpoint: ${error}`);
        reply.code(500).send({
          error: error instanceof Error ? error.message : String(error),
        });
      }
    },
  });

  server.route({
    method: "POST",
    url: MESSAGES_PATH_PREFIX,
    handler: async (request: FastifyRequest, reply: FastifyReply) => {
      try {
        const url = new URL(request.url, `http://${request.headers.host ?? "localhost"}`);
        const sessionId = url.searchParams.get("sessionId");
        const transport = sessionId ? sseTransports.get(sessionId) : undefined;

        if (transport) {
          reply.hijack();
          await transport.handlePostMessage(request.raw, reply.raw, request.body);
        } else {
          reply.code(400).send({ error: "No transport found for sessionId" });
        }
      } catch (error) {
        logger.error(`❌ Error in messages endpoint: ${error}`);
        if (!reply.raw.headersSent) {
          reply.raw.writeHead(500, { "content-type": "application/json" });
          reply.raw.end(JSON.stringify({ error: error instanceof Error ? error.message : String(error) }));
        }
      }
    },
  });

  server.route({
    method: "POST",
    url: "/mcp",
    handler: async (request: FastifyRequest, reply: FastifyReply) => {
      // Stateless: a fresh server and transport per request. The transport writes the
      // response itself once the handlers finish, so Fastify must not reply on its own.
      const requestServer = createMcpServerInstance(tools, options);
      const requestTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined,
        enableJsonResponse: true,
      });

      reply.raw.on("close", () => {
        logger.debug("Streamable HTTP request closed");
        requestTransport.close().catch((error: unknown) => {
          logger.error(`❌ Failed to close MCP transport: ${error}`);
        });
        requestServer.close().catch((error: unknown) => {
          logger.error(`❌ Failed to close MCP server: ${error}`);
        });
      });

      reply.hijack();
      try {
        await requestServer.connect(requestTransport);
        await requestTransport.handleRequest(request.raw, reply.raw, request.body);
      } catch (error) {
        logger.error(`❌ Error in MCP endpoint: ${error}`);
        if (!reply.raw.headersSent) {
          reply.raw.writeHead(500, { "content-type": "application/json" });
          reply.raw.end(JSON.stringify({ error: error instanceof Error ? error.message : String(error) }));
        }
      }
    },
  });

  for (const method of ["GET", "DELETE"] as const) {
    server.route({
      method,
      url: "/mcp",
      handler: async (_request: FastifyRequest, reply: FastifyReply) =>
        reply.code(405).header("allow", "POST").send(methodNotAllowed),
    });
  }

  return {
    async close() {
      try {
        for (const transport of sseTransports.values()) {
          await transport.close();
        }
        sseTransports.clear();
        for (const sessionServer of sseServers) {
          await sessionServer.close();
        }
        sseServers.clear();
        logger.debug("MCP service cleaned up");
      } catch (error) {
        logger.error(`❌ Failed to cleanup MCP service: ${error}`);
        throw error;
      }
    },
  };
}
