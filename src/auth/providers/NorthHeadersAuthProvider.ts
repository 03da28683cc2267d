import { createLogger } from "../../utils/logger";
import { MalformedTokenError } from "../errors";
import {
  CONNECTOR_TOKENS_HEADER,
  getHeader,
  NORTH_HEADERS,
  SERVER_SECRET_HEADER,
  USER_ID_TOKEN_HEADER,
} from "../headers";
import { IssuerVerifier } from "../IssuerVerifier";
import { decodeConnectorTokens } from "../tokenCodec";
import type { AuthConnection, AuthProvider, AuthScheme, Identity } from "../types";
import { type NorthProviderOptions, resolveNorthIdentity } from "./northIdentity";

const logger = createLogger("Auth.NorthHeaders");

/**
 * Provider for the dedicated `X-North-*` headers. Applies as soon as any of the three
 * headers carries a value.
 */
export class NorthHeadersAuthProvider implements AuthProvider {
  readonly scheme: AuthScheme = "NorthHeaders";
  private readonly options: NorthProviderOptions;

  constructor(options: NorthProviderOptions = {}) {
    const verifier =
      options.verifier ??
      (options.trustedIssuers?.length ? new IssuerVerifier(options.trustedIssuers) : undefined);
    this.options = { ...options, verifier };
  }

  async authenticate(connection: AuthConnection): Promise<Identity | null> {
    const present = NORTH_HEADERS.filter((name) => getHeader(connection.headers, name));
    if (present.length === 0) {
      return null;
    }
    logger.debug(`X-North headers present: ${present.join(", ")}`);

    let connectorAccessTokens: Record<string, string>;
    try {
      connectorAccessTokens = decodeConnectorTokens(
        getHeader(connection.headers, CONNECTOR_TOKENS_HEADER),
        { strict: true },
      );
    } catch (error) {
      throw new MalformedTokenError(
        "invalid connector tokens format",
        error instanceof Error ? error : undefined,
      );
    }

    return resolveNorthIdentity(
      {
        serverSecret: getHeader(connection.headers, SERVER_SECRET_HEADER),
        userIdToken: getHeader(connection.headers, USER_ID_TOKEN_HEADER),
        connectorAccessTokens,
      },
      this.options,
      logger,
    );
  }
}
