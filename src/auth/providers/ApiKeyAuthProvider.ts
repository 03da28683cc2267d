import { createHash } from "node:crypto";
import { createLogger } from "../../utils/logger";
import { AuthenticationFailedError, ConfigurationError } from "../errors";
import { API_KEY_HEADER, getBearerCredential, getHeader } from "../headers";
import type { AuthConnection, AuthProvider, AuthScheme, Identity } from "../types";

const logger = createLogger("Auth.ApiKey");

export const API_KEY_EMAIL_PREFIX = "api-key-user-";

export interface ApiKeyAuthProviderOptions {
  validKeys: Iterable<string>;
}

/**
 * Derives the correlation handle used as the email of an API-key identity.
 * It is stable per key and never reveals the key itself.
 */
export function apiKeyPseudoEmail(key: string): string {
  const hash = createHash("sha256").update(key, "utf8").digest("hex");
  return `${API_KEY_EMAIL_PREFIX}${hash.slice(0, 8)}`;
}

/**
 * Accepts a key from `X-API-Key`, or from `Authorization: Bearer <key>` when that header is absent.
 */
export class ApiKeyAuthProvider implements AuthProvider {
  readonly scheme: AuthScheme = "ApiKey";
  private readonly validKeys: ReadonlySet<string>;

  constructor(options: ApiKeyAuthProviderOptions) {
    this.validKeys = new Set([...options.validKeys].filter((key) => key.length > 0));
    if (this.validKeys.size === 0) {
      throw new ConfigurationError("At least one API key must be configured");
    }
  }

  async authenticate(connection: AuthConnection): Promise<Identity | null> {
    const key = getHeader(connection.headers, API_KEY_HEADER) || getBearerCredential(connection.headers);
    if (!key) {
      return null;
    }

    if (!this.validKeys.has(key)) {
      logger.debug("Presented API key is not in the configured set");
      throw new AuthenticationFailedError("invalid api key");
    }

    const email = apiKeyPseudoEmail(key);
    logger.debug(`API key accepted (${email})`);
    return Object.freeze({
      email,
      connectorAccessTokens: Object.freeze({}),
    });
  }
}
