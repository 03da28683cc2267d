import type { HeaderBag } from "./types";

export const USER_ID_TOKEN_HEADER = "X-North-ID-Token";
export const CONNECTOR_TOKENS_HEADER = "X-North-Connector-Tokens";
export const SERVER_SECRET_HEADER = "X-North-Server-Secret";
export const API_KEY_HEADER = "X-API-Key";
export const AUTHORIZATION_HEADER = "Authorization";

export const NORTH_HEADERS = [
  USER_ID_TOKEN_HEADER,
  CONNECTOR_TOKENS_HEADER,
  SERVER_SECRET_HEADER,
] as const;

/**
 * Case-insensitive header lookup. Node lower-cases incoming header names, but hand-built
 * header bags (tests, SDK request info) may not. Repeated headers resolve to the first value.
 */
export function getHeader(headers: HeaderBag | undefined, name: string): string | undefined {
  if (!headers) {
    return undefined;
  }

  const normalized = name.toLowerCase();
  let value = headers[normalized];
  if (value === undefined) {
    const key = Object.keys(headers).find((candidate) => candidate.toLowerCase() === normalized);
    value = key === undefined ? undefined : headers[key];
  }

  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

/**
 * Extracts the credential from `Authorization: Bearer <credential>`.
 * Returns undefined for a missing header or any other scheme.
 */
export function getBearerCredential(headers: HeaderBag | undefined): string | undefined {
  const authorization = getHeader(headers, AUTHORIZATION_HEADER);
  if (!authorization) {
    return undefined;
  }

  const match = authorization.match(/^Bearer\s+(.+)$/i);
  return match?.[1];
}
