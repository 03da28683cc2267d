/**
 * Authentication module: token codecs, issuer verification, the provider chain and the
 * Fastify hooks that bind each request's identity and context.
 */

export { AuthBackend, createAuthBackend, createIssuerVerifier } from "./AuthBackend";
export {
  AccessDeniedError,
  AuthenticationFailedError,
  AuthError,
  ConfigurationError,
  InvalidIdentityTokenError,
  MalformedTokenError,
  MissingIdentityError,
  TokenVerificationError,
} from "./errors";
export {
  API_KEY_HEADER,
  CONNECTOR_TOKENS_HEADER,
  SERVER_SECRET_HEADER,
  USER_ID_TOKEN_HEADER,
} from "./headers";
export { IssuerVerifier } from "./IssuerVerifier";
export { createAuthMiddleware, createRequestContextHook } from "./middleware";
export { createPathPolicy, DEFAULT_PROTECTED_PATHS } from "./pathPolicy";
export type { PathClassification, PathPolicy } from "./pathPolicy";
export * from "./providers";
export {
  contextFromHeaders,
  EMPTY_REQUEST_CONTEXT,
  getAuthenticatedUser,
  getAuthenticatedUserOptional,
  getCurrentRequestContext,
  getNorthUser,
  runWithRequestContext,
  verifiedContextFromHeaders,
  withToolRequestContext,
} from "./requestContext";
export type { NorthUser, ProtocolRequestExtra, RequestContextBinding } from "./requestContext";
export {
  decodeConnectorTokens,
  decodeJwtPayloadUnverified,
  decodeLegacyBearerHeader,
  encodeConnectorTokens,
  encodeLegacyBearerHeader,
} from "./tokenCodec";
export type {
  AuthConfig,
  AuthConnection,
  AuthHeaderTokens,
  AuthProvider,
  AuthResult,
  AuthScheme,
  BypassMode,
  Identity,
  JwtClaims,
  RequestContext,
} from "./types";
