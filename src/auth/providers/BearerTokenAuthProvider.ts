import { createLogger } from "../../utils/logger";
import { AUTHORIZATION_HEADER, getHeader } from "../headers";
import { IssuerVerifier } from "../IssuerVerifier";
import { decodeLegacyBearerHeader, looksLikeBase64 } from "../tokenCodec";
import type { AuthConnection, AuthProvider, AuthScheme, Identity } from "../types";
import { type NorthProviderOptions, resolveNorthIdentity } from "./northIdentity";

const logger = createLogger("Auth.Bearer");

/**
 * Legacy provider for `Authorization: Bearer <base64 JSON>` (or the same payload without the
 * `Bearer ` prefix). The payload carries the server secret, the user ID token and the
 * connector tokens in one value.
 */
export class BearerTokenAuthProvider implements AuthProvider {
  readonly scheme: AuthScheme = "Bearer";
  private readonly options: NorthProviderOptions;

  constructor(options: NorthProviderOptions = {}) {
    const verifier =
      options.verifier ??
      (options.trustedIssuers?.length ? new IssuerVerifier(options.trustedIssuers) : undefined);
    this.options = { ...options, verifier };
  }

  async authenticate(connection: AuthConnection): Promise<Identity | null> {
    const authorization = getHeader(connection.headers, AUTHORIZATION_HEADER);
    if (!authorization) {
      return null;
    }

    if (!authorization.startsWith("Bearer ") && !looksLikeBase64(authorization.trim())) {
      logger.debug("Authorization header is neither a Bearer payload nor raw base64");
      return null;
    }

    logger.debug(`Authorization header present (length: ${authorization.length})`);
    const tokens = decodeLegacyBearerHeader(authorization);
    logger.debug(
      `Parsed legacy payload (server secret: ${tokens.server_secret !== null}, user id token: ${tokens.user_id_token !== null})`,
    );

    return resolveNorthIdentity(
      {
        serverSecret: tokens.server_secret,
        userIdToken: tokens.user_id_token,
        connectorAccessTokens: tokens.connector_access_tokens,
      },
      this.options,
      logger,
    );
  }
}
