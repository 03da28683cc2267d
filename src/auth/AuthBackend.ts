import { createLogger } from "../utils/logger";
import { AuthenticationFailedError, ConfigurationError } from "./errors";
import { IssuerVerifier } from "./IssuerVerifier";
import { BearerTokenAuthProvider } from "./providers/BearerTokenAuthProvider";
import { NorthHeadersAuthProvider } from "./providers/NorthHeadersAuthProvider";
import type {
  AuthConfig,
  AuthConnection,
  AuthProvider,
  AuthResult,
  AuthScheme,
} from "./types";

const logger = createLogger("AuthBackend");

/**
 * Ordered provider chain.
 *
 * Providers are tried in order and the first identity wins. A failing provider only ends the
 * attempt when it is the last one; earlier failures are logged and the next provider is tried.
 * When the chain runs out without a final failure, the most recent earlier failure is reported,
 * or `authentication failed` when no provider applied at all.
 */
export class AuthBackend {
  private readonly providers: readonly AuthProvider[];

  constructor(providers: readonly AuthProvider[]) {
    if (providers.length === 0) {
      throw new ConfigurationError("At least one auth provider is required");
    }
    this.providers = Object.freeze([...providers]);
  }

  /** Provider schemes in the order they are tried. */
  schemes(): AuthScheme[] {
    return this.providers.map((provider) => provider.scheme);
  }

  async authenticate(connection: AuthConnection): Promise<AuthResult> {
    logger.debug(`Authenticating request from ${connection.client ?? "unknown client"}`);
    logger.debug(`Request header names: ${Object.keys(connection.headers).join(", ")}`);

    let lastFailure: unknown;
    for (const [index, provider] of this.providers.entries()) {
      const isLast = index === this.providers.length - 1;
      try {
        const identity = await provider.authenticate(connection);
        if (identity) {
          logger.debug(`Authenticated via ${provider.scheme}`);
          return {
            credentials: { scopes: ["authenticated", `scheme:${provider.scheme}`] },
            identity,
          };
        }
        logger.debug(`${provider.scheme} provider not applicable`);
      } catch (error) {
        if (isLast) {
          throw error;
        }
        lastFailure = error;
        logger.debug(
          `${provider.scheme} provider failed, trying next: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    if (lastFailure !== undefined) {
      throw lastFailure;
    }
    throw new AuthenticationFailedError();
  }
}

/**
 * The verifier for the configured trusted issuers, or undefined when none are configured.
 */
export function createIssuerVerifier(config: AuthConfig): IssuerVerifier | undefined {
  const trustedIssuers = config.trustedIssuers ?? [];
  return trustedIssuers.length > 0 ? new IssuerVerifier(trustedIssuers) : undefined;
}

/**
 * Builds the backend for a configuration: the explicit providers when given, otherwise the
 * default North chain (X-North headers first, then the legacy Bearer payload) sharing one
 * server secret and one issuer verifier.
 */
export function createAuthBackend(
  config: AuthConfig = {},
  verifier: IssuerVerifier | undefined = createIssuerVerifier(config),
): AuthBackend {
  if (config.providers && config.providers.length > 0) {
    return new AuthBackend(config.providers);
  }

  const options = { serverSecret: config.serverSecret, verifier };
  return new AuthBackend([
    new NorthHeadersAuthProvider(options),
    new BearerTokenAuthProvider(options),
  ]);
}
