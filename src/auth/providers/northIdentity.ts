import { createHash, timingSafeEqual } from "node:crypto";
import type { Logger } from "../../utils/logger";
import {
  AccessDeniedError,
  InvalidIdentityTokenError,
  TokenVerificationError,
} from "../errors";
import type { IssuerVerifier } from "../IssuerVerifier";
import { decodeJwtPayloadUnverified } from "../tokenCodec";
import type { Identity, JwtClaims } from "../types";

/** Options shared by the two North providers. */
export interface NorthProviderOptions {
  /** Expected server secret. When unset, any (or no) presented secret is accepted. */
  serverSecret?: string;
  /** Issuers whose tokens must be signature-verified. Ignored when `verifier` is given. */
  trustedIssuers?: string[];
  /** Shared verifier instance (the backend passes one to every North provider). */
  verifier?: IssuerVerifier;
  /**
   * Fail with `email required in user id token` when a presented ID token has no email,
   * instead of yielding an anonymous identity.
   */
  requireEmail?: boolean;
}

export interface NorthCredentials {
  serverSecret: string | null | undefined;
  userIdToken: string | null | undefined;
  connectorAccessTokens: Record<string, string>;
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

/**
 * Constant-time comparison of the configured and presented server secrets.
 */
export function serverSecretMatches(expected: string, presented: string | null | undefined): boolean {
  if (presented === null || presented === undefined) {
    return false;
  }
  return timingSafeEqual(digest(expected), digest(presented));
}

async function resolveClaims(
  userIdToken: string,
  verifier: IssuerVerifier | undefined,
  logger: Logger,
): Promise<JwtClaims | null> {
  if (verifier && verifier.trustedIssuers.length > 0) {
    try {
      return await verifier.verifyUserIdToken(userIdToken);
    } catch (error) {
      if (error instanceof TokenVerificationError) {
        logger.debug(`Failed to verify user ID token: ${error.reason}`);
        const detail = error.reason ? error.reason.toLowerCase() : "verification failed";
        throw new InvalidIdentityTokenError(`invalid user id token: ${detail}`, error);
      }
      throw error;
    }
  }

  const claims = decodeJwtPayloadUnverified(userIdToken);
  if (!claims) {
    logger.debug("User ID token could not be decoded; continuing without claims");
  }
  return claims;
}

/**
 * Turns the credentials carried by either North header format into an identity:
 * server secret check, then ID token claims (verified when issuers are trusted), then email.
 */
export async function resolveNorthIdentity(
  credentials: NorthCredentials,
  options: NorthProviderOptions,
  logger: Logger,
): Promise<Identity> {
  if (options.serverSecret && !serverSecretMatches(options.serverSecret, credentials.serverSecret)) {
    logger.debug("Server secret mismatch - access denied");
    throw new AccessDeniedError();
  }

  const userIdToken = credentials.userIdToken || undefined;
  const claims = userIdToken ? await resolveClaims(userIdToken, options.verifier, logger) : null;
  const emailClaim = claims?.email;
  const email = typeof emailClaim === "string" && emailClaim ? emailClaim : undefined;

  if (options.requireEmail && userIdToken && !email) {
    throw new InvalidIdentityTokenError("email required in user id token");
  }

  logger.debug(
    `Resolved identity (email: ${email ?? "anonymous"}, connectors: ${Object.keys(credentials.connectorAccessTokens).join(", ") || "none"})`,
  );

  return Object.freeze({
    email,
    connectorAccessTokens: Object.freeze({ ...credentials.connectorAccessTokens }),
    rawUserIdToken: userIdToken,
    claims: claims ? Object.freeze({ ...claims }) : undefined,
  });
}
