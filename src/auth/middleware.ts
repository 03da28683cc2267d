/**
 * Fastify hooks for path-based authentication and request context binding.
 */

import type { FastifyReply, FastifyRequest, HookHandlerDoneFunction } from "fastify";
import { createLogger } from "../utils/logger";
import type { AuthBackend } from "./AuthBackend";
import { AuthError } from "./errors";
import { createPathPolicy, type PathPolicy } from "./pathPolicy";
import { requestContextFromIdentity, runWithRequestContext } from "./requestContext";
import type { AuthConnection, BypassMode, Identity } from "./types";

declare module "fastify" {
  interface FastifyRequest {
    /** Set by the auth hook; null for anonymous requests */
    identity: Identity | null;
  }
}

const logger = createLogger("Auth");

export interface AuthMiddlewareOptions {
  pathPolicy?: PathPolicy;
  /** `optional` (default) still tries to authenticate bypassed paths; `skip` leaves them alone. */
  bypassMode?: BypassMode;
}

export function connectionFromRequest(request: FastifyRequest): AuthConnection {
  return {
    headers: request.headers,
    path: request.url,
    client: request.ip,
  };
}

/**
 * Create the `onRequest` hook that authenticates requests to protected paths.
 * Failures there end the request with `401 {"error": "<message>"}`; bypassed paths always proceed.
 */
export function createAuthMiddleware(
  backend: AuthBackend,
  options: AuthMiddlewareOptions = {},
) {
  const pathPolicy = options.pathPolicy ?? createPathPolicy();
  const bypassMode = options.bypassMode ?? "optional";

  return async (request: FastifyRequest, reply: FastifyReply) => {
    request.identity = null;

    if (!pathPolicy.requiresAuth(request.url)) {
      if (bypassMode === "skip") {
        return;
      }
      try {
        const result = await backend.authenticate(connectionFromRequest(request));
        request.identity = result.identity;
      } catch (error) {
        logger.debug(
          `Optional authentication failed for ${request.url}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
      return;
    }

    try {
      const result = await backend.authenticate(connectionFromRequest(request));
      request.identity = result.identity;
      logger.debug(`Authenticated ${request.method} ${request.url} (${result.credentials.scopes.join(", ")})`);
    } catch (error) {
      let message = "authentication failed";
      if (error instanceof AuthError) {
        message = error.message;
        logger.debug(`Authentication failed for ${request.url}: ${message}`);
      } else {
        logger.error(
          `❌ Unexpected authentication error for ${request.url}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
      return reply.status(401).send({ error: message });
    }
  };
}

/**
 * Create the `preHandler` hook that binds the request's identity and context for the
 * rest of the request (empty context when anonymous).
 */
export function createRequestContextHook() {
  return (request: FastifyRequest, _reply: FastifyReply, done: HookHandlerDoneFunction) => {
    const identity = request.identity ?? null;
    runWithRequestContext({ identity, context: requestContextFromIdentity(identity) }, () =>
      done(),
    );
  };
}
