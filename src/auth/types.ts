/**
 * Identity, request context and provider types shared across the authentication layer.
 */

/** Decoded JWT payload (or an equivalent claims map returned by a validator). */
export type JwtClaims = Record<string, unknown>;

/** Header bag as Fastify (`IncomingHttpHeaders`) and the MCP SDK (`requestInfo.headers`) expose it. */
export type HeaderBag = Record<string, string | string[] | undefined>;

/** The authenticated principal for one request. Frozen once constructed. */
export interface Identity {
  /** Absent for an authenticated but anonymous caller */
  readonly email?: string;
  /** Connector name → delegated access token */
  readonly connectorAccessTokens: Readonly<Record<string, string>>;
  /** Original user ID token (JWT), when one was presented */
  readonly rawUserIdToken?: string;
  /**
   * Payload of `rawUserIdToken` when that is set. Otherwise the claims a custom validator or an
   * introspection endpoint returned, which no JWT on the identity backs.
   */
  readonly claims?: Readonly<JwtClaims>;
}

/**
 * Ambient bundle available to handler code whether or not authentication happened.
 * Never null: anonymous requests see the empty context.
 */
export interface RequestContext {
  readonly rawUserIdToken?: string;
  readonly connectorTokens: Readonly<Record<string, string>>;
  readonly claims?: Readonly<JwtClaims>;
}

/** Legacy `Authorization: Bearer <base64 JSON>` payload. */
export interface AuthHeaderTokens {
  server_secret: string | null;
  user_id_token: string | null;
  connector_access_tokens: Record<string, string>;
}

/** What a provider gets to look at. */
export interface AuthConnection {
  headers: HeaderBag;
  path?: string;
  client?: string;
}

export type AuthScheme = "NorthHeaders" | "Bearer" | "ApiKey" | "OAuth";

/**
 * A pluggable authentication strategy.
 *
 * `authenticate` resolves to an identity on success, to `null` when the credential shape
 * it understands is absent, and rejects with an `AuthError` when that shape is present but invalid.
 */
export interface AuthProvider {
  readonly scheme: AuthScheme;
  authenticate(connection: AuthConnection): Promise<Identity | null>;
}

export interface AuthCredentials {
  scopes: string[];
}

export interface AuthResult {
  credentials: AuthCredentials;
  identity: Identity;
}

/** What happens on paths outside the protected set. */
export type BypassMode = "skip" | "optional";

/** Authentication configuration consumed by the application server. */
export interface AuthConfig {
  /** Explicit provider chain. When omitted the default North chain is built from the fields below. */
  providers?: AuthProvider[];
  /** Shared secret expected in the legacy payload or the `X-North-Server-Secret` header */
  serverSecret?: string;
  /** Issuers whose ID tokens are accepted only after signature verification */
  trustedIssuers?: string[];
  /** Exact paths that require authentication (default `/mcp`, `/sse`) */
  protectedPaths?: string[];
  /** Behaviour on bypassed paths (default `optional`) */
  bypassMode?: BypassMode;
}
