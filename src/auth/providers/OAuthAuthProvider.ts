import { jwtVerify } from "jose";
import { createLogger } from "../../utils/logger";
import { ConfigurationError, InvalidIdentityTokenError } from "../errors";
import { getBearerCredential } from "../headers";
import type { AuthConnection, AuthProvider, AuthScheme, Identity, JwtClaims } from "../types";

const logger = createLogger("Auth.OAuth");

export const DEFAULT_OAUTH_JWT_ALGORITHM = "HS256";
export const DEFAULT_OAUTH_EMAIL_CLAIM = "email";
export const INTROSPECTION_TIMEOUT_MS = 10_000;

/** Claim carrying delegated connector tokens in an OAuth token or introspection response. */
export const CONNECTOR_TOKENS_CLAIM = "connector_access_tokens";

/**
 * Caller-supplied token validation. Resolves to the token's claims, or null when the token is rejected.
 */
export type OAuthTokenValidator = (
  token: string,
) => Promise<JwtClaims | null> | JwtClaims | null;

export interface OAuthAuthProviderOptions {
  customValidator?: OAuthTokenValidator;
  jwtSecret?: string;
  jwtAlgorithm?: string;
  introspectionEndpoint?: string;
  clientId?: string;
  clientSecret?: string;
  emailClaim?: string;
  timeoutMs?: number;
}

type OAuthStrategy = "custom" | "jwt" | "introspection";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function connectorTokensFromClaims(claims: JwtClaims): Record<string, string> {
  const value = claims[CONNECTOR_TOKENS_CLAIM];
  if (!isPlainObject(value)) {
    return {};
  }
  const tokens: Record<string, string> = {};
  for (const [name, token] of Object.entries(value)) {
    if (typeof token === "string") {
      tokens[name] = token;
    }
  }
  return tokens;
}

/**
 * Validates `Authorization: Bearer <token>` with one strategy, picked at construction time in
 * priority order: custom validator, shared-secret JWT, remote token introspection (RFC 7662).
 */
export class OAuthAuthProvider implements AuthProvider {
  readonly scheme: AuthScheme = "OAuth";
  readonly strategy: OAuthStrategy;
  private readonly options: OAuthAuthProviderOptions;
  private readonly emailClaim: string;

  constructor(options: OAuthAuthProviderOptions) {
    if (options.customValidator) {
      this.strategy = "custom";
    } else if (options.jwtSecret) {
      this.strategy = "jwt";
    } else if (options.introspectionEndpoint) {
      this.strategy = "introspection";
    } else {
      throw new ConfigurationError(
        "Must provide either jwtSecret, introspectionEndpoint, or customValidator",
      );
    }
    this.options = options;
    this.emailClaim = options.emailClaim ?? DEFAULT_OAUTH_EMAIL_CLAIM;
    logger.debug(`Using ${this.strategy} token validation`);
  }

  async authenticate(connection: AuthConnection): Promise<Identity | null> {
    const token = getBearerCredential(connection.headers);
    if (!token) {
      return null;
    }

    const claims = await this.validate(token);
    if (!claims) {
      throw new InvalidIdentityTokenError("invalid oauth token");
    }

    const email = claims[this.emailClaim];
    if (typeof email !== "string" || email.length === 0) {
      throw new InvalidIdentityTokenError("email required in oauth token");
    }

    const connectorAccessTokens = connectorTokensFromClaims(claims);
    logger.debug(
      `OAuth token accepted (email: ${email}, connectors: ${Object.keys(connectorAccessTokens).join(", ") || "none"})`,
    );

    return Object.freeze({
      email,
      connectorAccessTokens: Object.freeze(connectorAccessTokens),
      rawUserIdToken: this.strategy === "jwt" ? token : undefined,
      claims: Object.freeze({ ...claims }),
    });
  }

  private async validate(token: string): Promise<JwtClaims | null> {
    try {
      switch (this.strategy) {
        case "custom":
          return (await this.options.customValidator?.(token)) ?? null;
        case "jwt":
          return await this.verifyJwt(token);
        case "introspection":
          return await this.introspect(token);
      }
    } catch (error) {
      logger.debug(
        `Token validation failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new InvalidIdentityTokenError(
        "invalid oauth token",
        error instanceof Error ? error : undefined,
      );
    }
  }

  private async verifyJwt(token: string): Promise<JwtClaims> {
    const secret = new TextEncoder().encode(this.options.jwtSecret ?? "");
    const { payload } = await jwtVerify(token, secret, {
      algorithms: [this.options.jwtAlgorithm ?? DEFAULT_OAUTH_JWT_ALGORITHM],
    });
    return payload;
  }

  private async introspect(token: string): Promise<JwtClaims | null> {
    const endpoint = this.options.introspectionEndpoint ?? "";
    const headers: Record<string, string> = {
      Accept: "application/json",
      "Content-Type": "application/x-www-form-urlencoded",
    };
    if (this.options.clientId) {
      const credentials = `${this.options.clientId}:${this.options.clientSecret ?? ""}`;
      headers.Authorization = `Basic ${Buffer.from(credentials, "utf8").toString("base64")}`;
    }

    const response = await fetch(endpoint, {
      method: "POST",
      headers,
      body: new URLSearchParams({ token }).toString(),
      signal: AbortSignal.timeout(this.options.timeoutMs ?? INTROSPECTION_TIMEOUT_MS),
    });
    if (!response.ok) {
      throw new Error(`Introspection endpoint returned HTTP ${response.status}`);
    }

    const result: unknown = await response.json();
    if (!isPlainObject(result) || result.active !== true) {
      logger.debug("Introspection reported an inactive token");
      return null;
    }
    return result;
  }
}
