/**
 * CLI types and interfaces for command definitions and shared functionality.
 */

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  verbose?: boolean;
  silent?: boolean;
}

/**
 * Options of the serve command (and the default action).
 * Repeatable flags collect into arrays.
 */
export interface ServeOptions {
  port?: string;
  host?: string;
  serverSecret?: string;
  trustedIssuer?: string[];
  apiKey?: string[];
  oauthJwtSecret?: string;
  oauthJwtAlgorithm?: string;
  oauthIntrospectionEndpoint?: string;
  oauthClientId?: string;
  oauthClientSecret?: string;
  oauthEmailClaim?: string;
  protectedPath?: string[];
  strictBypass?: boolean;
  debug?: boolean;
}
