/**
 * Base class for everything the authentication layer throws.
 * The message is what ends up in the `{"error": ...}` body of a 401 response,
 * so it stays short and never contains token material.
 */
export class AuthError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/** Structurally bad input: invalid base64, JSON that does not match the expected shape. */
export class MalformedTokenError extends AuthError {}

/** Server secret mismatch. */
export class AccessDeniedError extends AuthError {
  constructor(message = "access denied") {
    super(message);
  }
}

/** The identity token (or OAuth token) could not be decoded, verified or lacked a required claim. */
export class InvalidIdentityTokenError extends AuthError {}

/** No provider in the chain produced an identity. */
export class AuthenticationFailedError extends AuthError {
  constructor(message = "authentication failed", cause?: Error) {
    super(message, cause);
  }
}

/** Invalid provider or server configuration. Thrown at construction time, never per request. */
export class ConfigurationError extends AuthError {}

/** Handler code asked for an authenticated identity but none is bound to the request. */
export class MissingIdentityError extends AuthError {
  constructor(message = "user not found in context") {
    super(message);
  }
}

/**
 * Raised by the issuer verifier. `reason` is the lower-case detail that providers
 * append to `invalid user id token: `.
 */
export class TokenVerificationError extends Error {
  constructor(
    public readonly reason: string,
    public readonly cause?: Error,
  ) {
    super(reason);
    this.name = this.constructor.name;
  }
}
