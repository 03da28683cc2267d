/**
 * Request-scoped identity and context.
 *
 * Each request's binding lives in an `AsyncLocalStorage` store, so concurrent requests never
 * observe each other's values and a binding is unwound when its callback settles, including
 * on a throw. Handler code reads it through the accessors below and never sees `null` for the
 * context itself: anonymous requests get {@link EMPTY_REQUEST_CONTEXT}.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { createLogger } from "../utils/logger";
import { MissingIdentityError } from "./errors";
import {
  AUTHORIZATION_HEADER,
  CONNECTOR_TOKENS_HEADER,
  getHeader,
  NORTH_HEADERS,
  USER_ID_TOKEN_HEADER,
} from "./headers";
import type { IssuerVerifier } from "./IssuerVerifier";
import {
  decodeConnectorTokens,
  decodeJwtPayloadUnverified,
  tryDecodeLegacyBearerHeader,
} from "./tokenCodec";
import type { HeaderBag, Identity, JwtClaims, RequestContext } from "./types";

const logger = createLogger("AuthContext");

export interface RequestContextBinding {
  identity: Identity | null;
  context: RequestContext;
}

/**
 * The part of a protocol handler's `extra` argument used for reconstruction. Structurally
 * compatible with the MCP SDK's `RequestHandlerExtra`.
 */
export interface ProtocolRequestExtra {
  requestInfo?: { headers?: HeaderBag };
}

/** Parsed view of the current user's ID token claims. */
export interface NorthUser {
  rawToken: string;
  claims: Readonly<JwtClaims>;
  email?: string;
  name?: string;
  connectorId?: string;
  connectorUserId?: string;
}

export const EMPTY_REQUEST_CONTEXT: RequestContext = Object.freeze({
  connectorTokens: Object.freeze({}),
});

const storage = new AsyncLocalStorage<RequestContextBinding>();

export function requestContextFromIdentity(identity: Identity | null | undefined): RequestContext {
  if (!identity) {
    return EMPTY_REQUEST_CONTEXT;
  }
  return Object.freeze({
    rawUserIdToken: identity.rawUserIdToken,
    connectorTokens: identity.connectorAccessTokens,
    claims: identity.claims,
  });
}

/**
 * Runs `fn` with `binding` as the current request binding. Nested calls see the innermost
 * binding; the outer one is back in place once `fn` returns or throws.
 */
export function runWithRequestContext<T>(binding: RequestContextBinding, fn: () => T): T {
  return storage.run(binding, fn);
}

export function getRequestContextBinding(): RequestContextBinding | undefined {
  return storage.getStore();
}

interface HeaderTokens {
  userIdToken?: string;
  connectorTokens: Record<string, string>;
}

/**
 * X-North headers first (connector tokens decoded leniently), else the legacy Authorization payload.
 */
function extractHeaderTokens(headers: HeaderBag): HeaderTokens | null {
  if (NORTH_HEADERS.some((name) => getHeader(headers, name))) {
    return {
      userIdToken: getHeader(headers, USER_ID_TOKEN_HEADER) || undefined,
      connectorTokens: decodeConnectorTokens(getHeader(headers, CONNECTOR_TOKENS_HEADER)),
    };
  }

  const legacy = tryDecodeLegacyBearerHeader(getHeader(headers, AUTHORIZATION_HEADER));
  if (legacy) {
    return {
      userIdToken: legacy.user_id_token || undefined,
      connectorTokens: legacy.connector_access_tokens,
    };
  }
  return null;
}

function freezeContext(
  userIdToken: string | undefined,
  connectorTokens: Record<string, string>,
  claims: JwtClaims | null | undefined,
): RequestContext {
  return Object.freeze({
    rawUserIdToken: userIdToken,
    connectorTokens: Object.freeze({ ...connectorTokens }),
    claims: userIdToken && claims ? Object.freeze({ ...claims }) : undefined,
  });
}

/**
 * Best-effort context from raw request headers. The ID token is only decoded, never verified,
 * so it is dropped entirely when `trustedIssuers` is non-empty.
 */
export function contextFromHeaders(
  headers: HeaderBag | undefined,
  options: { trustedIssuers?: readonly string[] } = {},
): RequestContext {
  const tokens = headers ? extractHeaderTokens(headers) : null;
  if (!tokens) {
    return EMPTY_REQUEST_CONTEXT;
  }

  if (options.trustedIssuers && options.trustedIssuers.length > 0) {
    return freezeContext(undefined, tokens.connectorTokens, null);
  }
  return freezeContext(
    tokens.userIdToken,
    tokens.connectorTokens,
    decodeJwtPayloadUnverified(tokens.userIdToken),
  );
}

/**
 * Like {@link contextFromHeaders}, but verifies the ID token when the verifier trusts any issuer.
 * A token that fails verification is dropped; connector tokens are kept.
 */
export async function verifiedContextFromHeaders(
  headers: HeaderBag | undefined,
  verifier?: IssuerVerifier,
): Promise<RequestContext> {
  const tokens = headers ? extractHeaderTokens(headers) : null;
  if (!tokens) {
    return EMPTY_REQUEST_CONTEXT;
  }

  if (!tokens.userIdToken || !verifier || verifier.trustedIssuers.length === 0) {
    return freezeContext(
      tokens.userIdToken,
      tokens.connectorTokens,
      decodeJwtPayloadUnverified(tokens.userIdToken),
    );
  }

  try {
    const claims = await verifier.verifyUserIdToken(tokens.userIdToken);
    return freezeContext(tokens.userIdToken, tokens.connectorTokens, claims);
  } catch (error) {
    logger.debug(
      `Dropping unverifiable user ID token: ${error instanceof Error ? error.message : String(error)}`,
    );
    return freezeContext(undefined, tokens.connectorTokens, null);
  }
}

/**
 * The current request's context.
 *
 * A bound context is returned as is, whatever it carries: the hooks derive it from the
 * authenticated identity, and headers the provider chain rejected never replace it. Only when
 * nothing is bound (handler code reached outside the HTTP hooks and outside
 * {@link withToolRequestContext}) is the context rebuilt from the headers of the in-flight
 * protocol request in `extra`; pass `trustedIssuers` there so an unverified ID token is dropped.
 * Never throws; returns the empty context when nothing can be recovered.
 */
export function getCurrentRequestContext(
  extra?: ProtocolRequestExtra,
  options: { trustedIssuers?: readonly string[] } = {},
): RequestContext {
  const binding = storage.getStore();
  if (binding) {
    return binding.context;
  }

  const headers = extra?.requestInfo?.headers;
  if (!headers) {
    return EMPTY_REQUEST_CONTEXT;
  }

  try {
    return contextFromHeaders(headers, options);
  } catch (error) {
    logger.debug(
      `Unable to rebuild context from request headers: ${error instanceof Error ? error.message : String(error)}`,
    );
    return EMPTY_REQUEST_CONTEXT;
  }
}

/**
 * Runs a tool handler with a bound request context. An existing binding is used as is;
 * otherwise the context is rebuilt from `extra` (verified when the verifier trusts any issuer,
 * the token dropped when verification fails) and bound, without an identity, for the
 * duration of `fn`.
 */
export async function withToolRequestContext<T>(
  extra: ProtocolRequestExtra | undefined,
  fn: () => Promise<T> | T,
  options: { verifier?: IssuerVerifier } = {},
): Promise<T> {
  if (storage.getStore()) {
    return fn();
  }

  const context = await verifiedContextFromHeaders(extra?.requestInfo?.headers, options.verifier);
  return runWithRequestContext({ identity: null, context }, fn);
}

/**
 * @throws MissingIdentityError when the current request is not authenticated.
 */
export function getAuthenticatedUser(): Identity {
  const identity = storage.getStore()?.identity;
  if (!identity) {
    throw new MissingIdentityError();
  }
  return identity;
}

export function getAuthenticatedUserOptional(): Identity | null {
  return storage.getStore()?.identity ?? null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function northUserFromClaims(rawToken: string, claims: JwtClaims): NorthUser {
  const federated = claims.federated_claims;
  const federatedClaims: Record<string, unknown> = isPlainObject(federated) ? federated : {};

  return {
    rawToken,
    claims,
    email: optionalString(claims.email),
    name: optionalString(claims.name),
    connectorId: optionalString(federatedClaims.connector_id),
    connectorUserId: optionalString(federatedClaims.user_id),
  };
}

/**
 * Parsed view of the current ID token, or null when the request carries none
 * (or it cannot be decoded).
 */
export function getNorthUser(
  extra?: ProtocolRequestExtra,
  options: { trustedIssuers?: readonly string[] } = {},
): NorthUser | null {
  const context = getCurrentRequestContext(extra, options);
  if (!context.rawUserIdToken) {
    return null;
  }

  const claims = context.claims ?? decodeJwtPayloadUnverified(context.rawUserIdToken);
  return claims ? northUserFromClaims(context.rawUserIdToken, claims) : null;
}
