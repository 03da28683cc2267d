/**
 * Pure encoders/decoders for the token formats carried in request headers:
 * the legacy base64-JSON bearer payload, the Base64URL connector-token map
 * and the (unverified) JWT payload segment.
 */

import { z } from "zod";
import { MalformedTokenError } from "./errors";
import type { AuthHeaderTokens, JwtClaims } from "./types";

const BEARER_PREFIX = "Bearer ";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
const BASE64URL_PATTERN = /^[A-Za-z0-9+/_-]*={0,2}$/;

const AuthHeaderTokensSchema = z.object({
  server_secret: z.string().nullable(),
  user_id_token: z.string().nullable(),
  connector_access_tokens: z.record(z.string()).default({}),
});

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function repad(value: string): string {
  return value + "=".repeat((4 - (value.length % 4)) % 4);
}

/**
 * Heuristic for a prefix-less legacy header: a standard Base64 string whose
 * length is a multiple of four.
 */
export function looksLikeBase64(value: string): boolean {
  return value.length > 0 && value.length % 4 === 0 && BASE64_PATTERN.test(value);
}

/**
 * Decodes a legacy `Authorization` header (`Bearer <base64 JSON>` or bare base64).
 * @throws MalformedTokenError when the base64 layer or the JSON shape is invalid.
 */
export function decodeLegacyBearerHeader(raw: string): AuthHeaderTokens {
  if (!raw) {
    throw new MalformedTokenError("authorization header missing");
  }

  const encoded = (raw.startsWith(BEARER_PREFIX) ? raw.slice(BEARER_PREFIX.length) : raw).trim();

  let decoded: string;
  try {
    if (!looksLikeBase64(encoded)) {
      throw new Error("not a base64 string");
    }
    decoded = utf8Decoder.decode(Buffer.from(encoded, "base64"));
  } catch (error) {
    throw new MalformedTokenError(
      "invalid authorization header",
      error instanceof Error ? error : undefined,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(decoded);
  } catch (error) {
    throw new MalformedTokenError(
      "unable to decode bearer token",
      error instanceof Error ? error : undefined,
    );
  }

  const result = AuthHeaderTokensSchema.safeParse(parsed);
  if (!result.success) {
    throw new MalformedTokenError("unable to decode bearer token", result.error);
  }
  return result.data;
}

/**
 * Lenient variant of {@link decodeLegacyBearerHeader}: null instead of an error.
 */
export function tryDecodeLegacyBearerHeader(raw: string | undefined): AuthHeaderTokens | null {
  if (!raw) {
    return null;
  }
  try {
    return decodeLegacyBearerHeader(raw);
  } catch {
    return null;
  }
}

/**
 * Encodes a legacy bearer payload (without the `Bearer ` prefix).
 */
export function encodeLegacyBearerHeader(tokens: AuthHeaderTokens): string {
  return Buffer.from(JSON.stringify(tokens), "utf8").toString("base64");
}

/**
 * Decodes the `X-North-Connector-Tokens` value: unpadded Base64URL JSON of
 * connector name → access token.
 *
 * In strict mode any problem throws a MalformedTokenError; otherwise the result is
 * an empty map for undecodable input and non-string entries are dropped.
 */
export function decodeConnectorTokens(
  raw: string | undefined,
  options: { strict?: boolean } = {},
): Record<string, string> {
  const strict = options.strict ?? false;
  if (!raw) {
    return {};
  }

  let parsed: unknown;
  try {
    if (!BASE64URL_PATTERN.test(raw)) {
      throw new Error("not a base64url string");
    }
    parsed = JSON.parse(utf8Decoder.decode(Buffer.from(repad(raw), "base64")));
  } catch (error) {
    if (strict) {
      throw new MalformedTokenError(
        "invalid connector tokens format",
        error instanceof Error ? error : undefined,
      );
    }
    return {};
  }

  if (!isPlainObject(parsed)) {
    if (strict) {
      throw new MalformedTokenError("connector tokens payload must be a JSON object");
    }
    return {};
  }

  const tokens: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "string") {
      tokens[key] = value;
    } else if (strict) {
      throw new MalformedTokenError("connector tokens must contain string keys and values");
    }
  }
  return tokens;
}

/**
 * Encodes a connector-token map as unpadded Base64URL JSON.
 */
export function encodeConnectorTokens(tokens: Record<string, string>): string {
  return Buffer.from(JSON.stringify(tokens), "utf8").toString("base64url");
}

/**
 * Best-effort peek at a JWT payload. The signature is NOT checked.
 * Returns null when the token has fewer than two segments or the payload is not a JSON object.
 */
export function decodeJwtPayloadUnverified(rawJwt: string | null | undefined): JwtClaims | null {
  if (!rawJwt) {
    return null;
  }

  const segments = rawJwt.split(".");
  if (segments.length < 2) {
    return null;
  }

  try {
    const payload: unknown = JSON.parse(
      utf8Decoder.decode(Buffer.from(repad(segments[1]), "base64url")),
    );
    return isPlainObject(payload) ? payload : null;
  } catch {
    return null;
  }
}
