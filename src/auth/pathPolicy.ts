/**
 * Classifies request paths as protected or bypassed.
 */

export const DEFAULT_PROTECTED_PATHS = ["/mcp", "/sse"] as const;

/** Streaming-transport callback routes; always protected. */
export const MESSAGES_PATH_PREFIX = "/messages/";

export type PathClassification = "requires-auth" | "bypass-auth";

export interface PathPolicy {
  readonly protectedPaths: readonly string[];
  classify(path: string): PathClassification;
  requiresAuth(path: string): boolean;
}

/**
 * Drops the query string and any trailing slashes (the root path stays `/`).
 */
export function normalizePath(path: string): string {
  const withoutQuery = path.split(/[?#]/, 1)[0] ?? "";
  const trimmed = withoutQuery.replace(/\/+$/, "");
  return trimmed === "" ? "/" : trimmed;
}

export function createPathPolicy(
  protectedPaths: readonly string[] = DEFAULT_PROTECTED_PATHS,
): PathPolicy {
  const exact = new Set(protectedPaths.map(normalizePath));

  const classify = (path: string): PathClassification => {
    const withoutQuery = path.split(/[?#]/, 1)[0] ?? "";
    if (withoutQuery.startsWith(MESSAGES_PATH_PREFIX)) {
      return "requires-auth";
    }
    return exact.has(normalizePath(withoutQuery)) ? "requires-auth" : "bypass-auth";
  };

  return {
    protectedPaths: Object.freeze([...exact]),
    classify,
    requiresAuth: (path) => classify(path) === "requires-auth",
  };
}
