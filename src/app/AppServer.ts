/**
 * Application server hosting the MCP endpoints behind the authentication layer.
 */

import Fastify, { type FastifyInstance } from "fastify";
import packageJson from "../../package.json";
import {
  type AuthBackend,
  createAuthBackend,
  createAuthMiddleware,
  createIssuerVerifier,
  createPathPolicy,
  createRequestContextHook,
  type IssuerVerifier,
} from "../auth";
import { type McpService, registerMcpService } from "../services/mcpService";
import { isDebugMode } from "../utils/config";
import { LogLevel, logger, setLogLevel } from "../utils/logger";
import type { AppServerConfig } from "./AppServerConfig";

/**
 * Central application server. Every request passes the authentication hook (`onRequest`)
 * and has its identity bound for the rest of the request (`preHandler`).
 */
export class AppServer {
  private server: FastifyInstance | null = null;
  private mcpService: McpService | null = null;
  private readonly verifier: IssuerVerifier | undefined;
  readonly backend: AuthBackend;

  constructor(private readonly config: AppServerConfig) {
    const auth = config.auth ?? {};
    // Misconfigured providers fail here, before anything listens
    this.verifier = createIssuerVerifier(auth);
    this.backend = createAuthBackend(auth, this.verifier);
  }

  /**
   * Build a configured Fastify instance (hooks and routes) without listening.
   */
  async build(): Promise<FastifyInstance> {
    if (this.server) {
      return this.server;
    }

    if (this.config.debug || isDebugMode()) {
      setLogLevel(LogLevel.DEBUG);
    }

    const server = Fastify({
      logger: false, // Use our own logger
    });
    this.server = server;

    const auth = this.config.auth ?? {};
    server.decorateRequest("identity", null);
    server.addHook(
      "onRequest",
      createAuthMiddleware(this.backend, {
        pathPolicy: createPathPolicy(auth.protectedPaths),
        bypassMode: auth.bypassMode,
      }),
    );
    server.addHook("preHandler", createRequestContextHook());
    this.setupErrorHandling(server);

    server.get("/health", async () => ({ status: "ok" }));

    this.mcpService = registerMcpService(server, {
      name: this.config.name,
      version: this.config.version ?? packageJson.version,
      verifier: this.verifier,
      registerTools: this.config.registerTools,
    });
    logger.debug("MCP server service enabled");

    if (this.config.registerRoutes) {
      await this.config.registerRoutes(server);
    }

    await server.ready();
    return server;
  }

  /**
   * Build the server and start listening.
   */
  async start(): Promise<FastifyInstance> {
    const server = await this.build();

    try {
      const address = await server.listen({
        port: this.config.port,
        host: this.config.host ?? "0.0.0.0",
      });

      this.logStartupInfo(address);
      return server;
    } catch (error) {
      logger.error(`❌ Failed to start AppServer: ${error}`);
      await server.close();
      this.server = null;
      throw error;
    }
  }

  /**
   * Close open MCP transports and the server.
   */
  async stop(): Promise<void> {
    try {
      if (this.mcpService) {
        await this.mcpService.close();
        this.mcpService = null;
      }

      if (this.server) {
        await this.server.close();
        this.server = null;
      }
      logger.info("🛑 AppServer stopped");
    } catch (error) {
      logger.error(`❌ Failed to stop AppServer gracefully: ${error}`);
      throw error;
    }
  }

  private setupErrorHandling(server: FastifyInstance): void {
    server.setErrorHandler(async (error, request, reply) => {
      const statusCode = error.statusCode ?? 500;
      if (statusCode >= 500) {
        logger.error(`HTTP Error on ${request.method} ${request.url}: ${error.message}`);
      } else {
        logger.debug(`HTTP ${statusCode} on ${request.method} ${request.url}: ${error.message}`);
      }

      return reply.status(statusCode).send({
        error: statusCode < 500 ? error.message : "internal server error",
      });
    });
  }

  private logStartupInfo(address: string): void {
    logger.info(`🚀 AppServer available at ${address}`);
    logger.info(`   • MCP endpoints: ${address}/mcp, ${address}/sse`);
    logger.info(`   • Auth providers: ${this.backend.schemes().join(", ")}`);
  }
}
