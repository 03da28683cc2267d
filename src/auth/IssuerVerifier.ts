/**
 * Verifies user ID tokens against a fixed set of trusted OIDC issuers.
 *
 * Discovery (`/.well-known/openid-configuration`) runs per verification; signing keys are
 * resolved through one JWKS key set per `jwks_uri`, held by the verifier instance.
 */

import {
  createRemoteJWKSet,
  decodeProtectedHeader,
  type JWTVerifyGetKey,
  jwtVerify,
} from "jose";
import { createLogger } from "../utils/logger";
import { TokenVerificationError } from "./errors";
import { decodeJwtPayloadUnverified } from "./tokenCodec";
import type { JwtClaims } from "./types";

const logger = createLogger("IssuerVerifier");

export const ISSUER_FETCH_TIMEOUT_MS = 10_000;
export const DEFAULT_TOKEN_ALGORITHM = "RS256";

export interface IssuerVerifierOptions {
  /** Builds the key resolver for a JWKS URI. Defaults to a remote JWKS that refetches on unknown `kid`. */
  createKeySet?: (jwksUri: URL) => JWTVerifyGetKey;
  /** Timeout for discovery and JWKS requests */
  timeoutMs?: number;
}

function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

export class IssuerVerifier {
  readonly trustedIssuers: readonly string[];
  private readonly keySets = new Map<string, JWTVerifyGetKey>();
  private readonly createKeySet: (jwksUri: URL) => JWTVerifyGetKey;
  private readonly timeoutMs: number;

  constructor(trustedIssuers: readonly string[], options: IssuerVerifierOptions = {}) {
    this.trustedIssuers = Object.freeze([...trustedIssuers]);
    this.timeoutMs = options.timeoutMs ?? ISSUER_FETCH_TIMEOUT_MS;
    this.createKeySet =
      options.createKeySet ??
      ((jwksUri) =>
        createRemoteJWKSet(jwksUri, {
          timeoutDuration: this.timeoutMs,
          cooldownDuration: 0,
        }));
  }

  isTrusted(issuer: string): boolean {
    return this.trustedIssuers.includes(issuer);
  }

  /**
   * Verifies the token signature against the issuer's published keys and returns its claims.
   * The audience is not checked.
   * @throws TokenVerificationError with a short `reason`.
   */
  async verifyUserIdToken(rawJwt: string): Promise<JwtClaims> {
    const unverified = decodeJwtPayloadUnverified(rawJwt);
    const issuer = unverified?.iss;
    if (typeof issuer !== "string" || issuer.length === 0) {
      throw new TokenVerificationError("missing issuer");
    }

    if (!this.isTrusted(issuer)) {
      throw new TokenVerificationError(`untrusted issuer: ${issuer}`);
    }

    const jwksUri = await this.discoverJwksUri(issuer);

    let keyId: string | undefined;
    let algorithm: string;
    try {
      const header = decodeProtectedHeader(rawJwt);
      keyId = header.kid;
      algorithm = header.alg ?? DEFAULT_TOKEN_ALGORITHM;
    } catch (error) {
      throw new TokenVerificationError("unable to inspect token header", toError(error));
    }

    if (!keyId) {
      throw new TokenVerificationError("missing key identifier");
    }

    try {
      const { payload } = await jwtVerify(rawJwt, this.getKeySet(jwksUri), {
        issuer,
        algorithms: [algorithm],
      });
      return payload;
    } catch (error) {
      logger.debug(
        `Signature verification failed for issuer ${issuer} (kid ${keyId}): ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new TokenVerificationError("token signature verification failed", toError(error));
    }
  }

  private async discoverJwksUri(issuer: string): Promise<string> {
    const configUrl = `${issuer.replace(/\/$/, "")}/.well-known/openid-configuration`;

    let config: unknown;
    try {
      const response = await fetch(configUrl, {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }
      config = await response.json();
    } catch (error) {
      logger.debug(
        `Discovery failed for ${configUrl}: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw new TokenVerificationError("unable to fetch issuer configuration", toError(error));
    }

    const jwksUri =
      typeof config === "object" && config !== null && "jwks_uri" in config
        ? config.jwks_uri
        : undefined;
    if (typeof jwksUri !== "string" || jwksUri.length === 0) {
      throw new TokenVerificationError("issuer configuration missing jwks_uri");
    }
    return jwksUri;
  }

  private getKeySet(jwksUri: string): JWTVerifyGetKey {
    let keySet = this.keySets.get(jwksUri);
    if (!keySet) {
      keySet = this.createKeySet(new URL(jwksUri));
      this.keySets.set(jwksUri, keySet);
      logger.debug(`Created key set for ${jwksUri}`);
    }
    return keySet;
  }
}
