/**
 * Behavior tests for AppServer: path policy, provider chain and request context, exercised
 * through Fastify's in-process `inject`.
 */

import type { FastifyInstance } from "fastify";
import { SignJWT } from "jose";
import { afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import {
  ApiKeyAuthProvider,
  apiKeyPseudoEmail,
  BearerTokenAuthProvider,
  encodeLegacyBearerHeader,
  getAuthenticatedUserOptional,
  getCurrentRequestContext,
  NorthHeadersAuthProvider,
} from "../auth";
import { getLogLevel, LogLevel, setLogLevel } from "../utils/logger";
import { AppServer } from "./AppServer";
import type { AppServerConfig } from "./AppServerConfig";

const mcpHeaders = {
  accept: "application/json, text/event-stream",
  "content-type": "application/json",
};

const whoamiCall = {
  jsonrpc: "2.0",
  id: 1,
  method: "tools/call",
  params: { name: "whoami", arguments: {} },
};

const bearerFor = (userIdToken: string | null, serverSecret = "test-secret") =>
  `Bearer ${encodeLegacyBearerHeader({
    server_secret: serverSecret,
    user_id_token: userIdToken,
    connector_access_tokens: { g: "tok" },
  })}`;

const signIdToken = (email: string) =>
  new SignJWT({ email })
    .setProtectedHeader({ alg: "HS256" })
    .sign(new TextEncoder().encode("test-signing-key"));

const base64Url = (value: unknown) =>
  Buffer.from(JSON.stringify(value), "utf8").toString("base64url");

const unsignedJwt = (claims: Record<string, unknown>) =>
  `${base64Url({ alg: "RS256", kid: "key-1" })}.${base64Url(claims)}.signature`;

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/** Operator route reporting what the handler sees through the ambient context. */
const registerStatusRoute = (server: FastifyInstance) => {
  server.get<{ Querystring: { delay?: string } }>("/auth-status", async (request) => {
    await sleep(Number(request.query.delay ?? 0));
    return {
      email: getAuthenticatedUserOptional()?.email ?? null,
      connectorTokens: getCurrentRequestContext().connectorTokens,
    };
  });
};

describe("AppServer", () => {
  let appServer: AppServer | null = null;
  let fooToken: string;

  const build = (config: Partial<AppServerConfig> = {}) => {
    appServer = new AppServer({
      name: "test-server",
      port: 0,
      auth: { serverSecret: "test-secret" },
      registerRoutes: registerStatusRoute,
      ...config,
    });
    return appServer.build();
  };

  beforeAll(async () => {
    setLogLevel(LogLevel.ERROR);
    fooToken = await signIdToken("foo@bar.com");
  });

  afterEach(async () => {
    await appServer?.stop();
    appServer = null;
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
    setLogLevel(LogLevel.ERROR);
  });

  describe("path policy", () => {
    it("should serve bypassed routes anonymously", async () => {
      const server = await build();

      const response = await server.inject({ method: "GET", url: "/health" });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ status: "ok" });
    });

    it("should reject unauthenticated MCP requests", async () => {
      const server = await build();

      const response = await server.inject({
        method: "POST",
        url: "/mcp",
        headers: mcpHeaders,
        payload: whoamiCall,
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({ error: "authentication failed" });
    });

    it("should protect paths regardless of trailing slash or query", async () => {
      const server = await build();

      const slash = await server.inject({ method: "POST", url: "/mcp/", payload: whoamiCall });
      const query = await server.inject({ method: "GET", url: "/sse?x=1" });

      expect(slash.statusCode).toBe(401);
      expect(query.statusCode).toBe(401);
    });

    it("should protect every path under the messages prefix", async () => {
      const server = await build();

      const response = await server.inject({
        method: "POST",
        url: "/messages/?sessionId=abc",
        payload: {},
      });

      expect(response.statusCode).toBe(401);
    });

    it("should not protect the bare messages path", async () => {
      const server = await build();

      const response = await server.inject({ method: "GET", url: "/messages" });

      expect(response.statusCode).toBe(404);
    });

    it("should report the failure message of the provider chain", async () => {
      const server = await build();

      const response = await server.inject({
        method: "POST",
        url: "/mcp",
        headers: { ...mcpHeaders, authorization: bearerFor(fooToken, "wrong-secret") },
        payload: whoamiCall,
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({ error: "access denied" });
    });

    it("should honour configured protected paths", async () => {
      const server = await build({
        auth: { serverSecret: "test-secret", protectedPaths: ["/auth-status"] },
      });

      const protectedResponse = await server.inject({ method: "GET", url: "/auth-status" });
      const mcpResponse = await server.inject({
        method: "POST",
        url: "/mcp",
        headers: mcpHeaders,
        payload: whoamiCall,
      });

      expect(protectedResponse.statusCode).toBe(401);
      expect(mcpResponse.statusCode).toBe(200);
    });
  });

  describe("request context", () => {
    it("should expose the legacy bearer identity to route handlers", async () => {
      const server = await build();

      const response = await server.inject({
        method: "GET",
        url: "/auth-status",
        headers: { authorization: bearerFor(fooToken) },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ email: "foo@bar.com", connectorTokens: { g: "tok" } });
    });

    it("should expose the empty context to anonymous requests", async () => {
      const server = await build();

      const response = await server.inject({ method: "GET", url: "/auth-status" });

      expect(response.json()).toEqual({ email: null, connectorTokens: {} });
    });

    it("should keep concurrent requests isolated", async () => {
      const server = await build();
      const barToken = await signIdToken("bar@baz.com");

      const [slow, fast] = await Promise.all([
        server.inject({
          method: "GET",
          url: "/auth-status?delay=30",
          headers: { authorization: bearerFor(fooToken) },
        }),
        server.inject({
          method: "GET",
          url: "/auth-status?delay=0",
          headers: { authorization: bearerFor(barToken) },
        }),
      ]);

      expect(slow.json().email).toBe("foo@bar.com");
      expect(fast.json().email).toBe("bar@baz.com");
    });

    it("should expose the identity to MCP tools", async () => {
      const server = await build();

      const response = await server.inject({
        method: "POST",
        url: "/mcp",
        headers: { ...mcpHeaders, authorization: bearerFor(fooToken) },
        payload: whoamiCall,
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.id).toBe(1);
      expect(JSON.parse(body.result.content[0].text)).toEqual({
        authenticated: true,
        email: "foo@bar.com",
        name: null,
        connectors: ["g"],
        hasUserIdToken: true,
      });
    });
  });

  describe("provider chain", () => {
    const chain = () => ({
      providers: [
        new BearerTokenAuthProvider({ serverSecret: "test-secret" }),
        new ApiKeyAuthProvider({ validKeys: ["test-api-key"] }),
      ],
    });

    it("should authenticate an API key after the bearer provider", async () => {
      const server = await build({ auth: chain() });

      const response = await server.inject({
        method: "GET",
        url: "/auth-status",
        headers: { "x-api-key": "test-api-key" },
      });

      expect(response.json()).toEqual({
        email: apiKeyPseudoEmail("test-api-key"),
        connectorTokens: {},
      });
    });

    it("should reject an unknown API key on protected paths", async () => {
      const server = await build({ auth: chain() });

      const response = await server.inject({
        method: "POST",
        url: "/mcp",
        headers: { ...mcpHeaders, "x-api-key": "other-key" },
        payload: whoamiCall,
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({ error: "invalid api key" });
    });
  });

  describe("tool context", () => {
    const callWhoami = async (server: FastifyInstance, headers: Record<string, string>) => {
      const response = await server.inject({
        method: "POST",
        url: "/mcp",
        headers: { ...mcpHeaders, ...headers },
        payload: whoamiCall,
      });
      expect(response.statusCode).toBe(200);
      return JSON.parse(response.json().result.content[0].text);
    };

    it("should not take credentials from a payload the chain rejected", async () => {
      const server = await build({
        auth: {
          providers: [
            new NorthHeadersAuthProvider({ serverSecret: "test-secret" }),
            new BearerTokenAuthProvider({ serverSecret: "test-secret" }),
            new ApiKeyAuthProvider({ validKeys: ["test-api-key"] }),
          ],
        },
      });

      const result = await callWhoami(server, {
        "x-api-key": "test-api-key",
        authorization: bearerFor(fooToken, "wrong-secret"),
      });

      expect(result).toEqual({
        authenticated: true,
        email: apiKeyPseudoEmail("test-api-key"),
        name: null,
        connectors: [],
        hasUserIdToken: false,
      });
    });

    it("should not decode an unverifiable ID token on a bypassed path", async () => {
      vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new Error("network unavailable")));
      const server = await build({
        auth: { trustedIssuers: ["https://issuer.example"], protectedPaths: ["/sse"] },
      });

      const result = await callWhoami(server, {
        "x-north-id-token": unsignedJwt({
          iss: "https://issuer.example",
          email: "forged@example.com",
        }),
      });

      expect(result).toEqual({
        authenticated: false,
        email: null,
        name: null,
        connectors: [],
        hasUserIdToken: false,
      });
    });
  });

  describe("lifecycle", () => {
    it("should raise the log level when NORTH_DEBUG is set", async () => {
      vi.stubEnv("NORTH_DEBUG", "1");

      await build();

      expect(getLogLevel()).toBe(LogLevel.DEBUG);
    });

    it("should reuse the built instance", async () => {
      const first = await build();
      const second = await appServer?.build();

      expect(second).toBe(first);
    });

    it("should stop cleanly before it was ever built", async () => {
      appServer = new AppServer({ name: "test-server", port: 0 });

      await expect(appServer.stop()).resolves.toBeUndefined();
    });
  });
});
