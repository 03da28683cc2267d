/**
 * Shared CLI utilities and helper functions.
 */

import type { AppServerConfig } from "../app";
import {
  ApiKeyAuthProvider,
  type AuthConfig,
  type AuthProvider,
  BearerTokenAuthProvider,
  ConfigurationError,
  createIssuerVerifier,
  NorthHeadersAuthProvider,
  OAuthAuthProvider,
} from "../auth";
import {
  DEFAULT_HOST,
  DEFAULT_HTTP_PORT,
  DEFAULT_SERVER_NAME,
  type EnvConfig,
} from "../utils/config";
import { LogLevel, setLogLevel } from "../utils/logger";
import type { GlobalOptions, ServeOptions } from "./types";

/**
 * Default configuration values
 */
export const CLI_DEFAULTS = {
  HTTP_PORT: DEFAULT_HTTP_PORT,
  HOST: DEFAULT_HOST,
  SERVER_NAME: DEFAULT_SERVER_NAME,
} as const;

/**
 * Sets up logging based on global options
 */
export function setupLogging(options: GlobalOptions): void {
  if (options.silent) {
    setLogLevel(LogLevel.ERROR);
  } else if (options.verbose) {
    setLogLevel(LogLevel.DEBUG);
  }
}

/**
 * Validates and parses port number
 */
export function validatePort(portString: string): number {
  const port = Number(portString);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError("❌ Invalid port number");
  }
  return port;
}

/** Commander collector for repeatable options. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values.map((value) => value.trim()).filter((value) => value.length > 0))];
}

/** CLI list when given, else the environment list. */
function pickList(cli: string[] | undefined, env: string[]): string[] {
  return cli && cli.length > 0 ? unique(cli) : env;
}

/**
 * Merges CLI flags over environment variables.
 * Precedence: CLI flags > env vars > defaults
 */
export function parseAuthOptions(options: ServeOptions, env: EnvConfig) {
  return {
    serverSecret: options.serverSecret ?? env.NORTH_SERVER_SECRET,
    trustedIssuers: pickList(options.trustedIssuer, env.NORTH_TRUSTED_ISSUERS),
    apiKeys: pickList(options.apiKey, env.NORTH_API_KEYS),
    protectedPaths: pickList(options.protectedPath, env.NORTH_PROTECTED_PATHS),
    oauth: {
      jwtSecret: options.oauthJwtSecret ?? env.NORTH_OAUTH_JWT_SECRET,
      jwtAlgorithm: options.oauthJwtAlgorithm ?? env.NORTH_OAUTH_JWT_ALGORITHM,
      introspectionEndpoint:
        options.oauthIntrospectionEndpoint ?? env.NORTH_OAUTH_INTROSPECTION_ENDPOINT,
      clientId: options.oauthClientId ?? env.NORTH_OAUTH_CLIENT_ID,
      clientSecret: options.oauthClientSecret ?? env.NORTH_OAUTH_CLIENT_SECRET,
      emailClaim: options.oauthEmailClaim ?? env.NORTH_OAUTH_EMAIL_CLAIM,
    },
    strictBypass: options.strictBypass ?? false,
  };
}

export type ParsedAuthOptions = ReturnType<typeof parseAuthOptions>;

/**
 * Builds the auth configuration. Without API keys or OAuth settings this is the default North
 * chain; otherwise the North providers come first, then the API key and OAuth providers.
 */
export function buildAuthConfig(options: ParsedAuthOptions): AuthConfig {
  const config: AuthConfig = {
    serverSecret: options.serverSecret,
    trustedIssuers: options.trustedIssuers,
    protectedPaths: options.protectedPaths.length > 0 ? options.protectedPaths : undefined,
    bypassMode: options.strictBypass ? "skip" : "optional",
  };

  const hasOAuth = Boolean(options.oauth.jwtSecret || options.oauth.introspectionEndpoint);
  if (options.apiKeys.length === 0 && !hasOAuth) {
    return config;
  }

  const verifier = createIssuerVerifier(config);
  const northOptions = { serverSecret: options.serverSecret, verifier };
  const providers: AuthProvider[] = [
    new NorthHeadersAuthProvider(northOptions),
    new BearerTokenAuthProvider(northOptions),
  ];
  if (options.apiKeys.length > 0) {
    providers.push(new ApiKeyAuthProvider({ validKeys: options.apiKeys }));
  }
  if (hasOAuth) {
    providers.push(new OAuthAuthProvider(options.oauth));
  }

  return { ...config, providers };
}

/**
 * Creates AppServerConfig from the serve options and environment.
 */
export function createAppServerConfig(options: ServeOptions, env: EnvConfig): AppServerConfig {
  const port = options.port ? validatePort(options.port) : (env.PORT ?? CLI_DEFAULTS.HTTP_PORT);

  return {
    name: CLI_DEFAULTS.SERVER_NAME,
    port,
    host: options.host ?? env.HOST ?? CLI_DEFAULTS.HOST,
    auth: buildAuthConfig(parseAuthOptions(options, env)),
    debug: options.debug ?? false,
  };
}
