/**
 * Default settings and environment configuration.
 */

import { z } from "zod";
import { DEFAULT_PROTECTED_PATHS } from "../auth/pathPolicy";
import { ConfigurationError } from "../auth/errors";

export const DEFAULT_HTTP_PORT = 8000;
export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_SERVER_NAME = "north-mcp-server";
export { DEFAULT_PROTECTED_PATHS };

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);

/**
 * Splits a comma-separated list, trimming entries and dropping empty ones and duplicates
 * (first occurrence wins).
 */
export function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  const entries = value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return [...new Set(entries)];
}

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

const optionalString = z.preprocess(emptyToUndefined, z.string().optional());
const list = z.string().optional().transform(parseList);
const flag = z
  .string()
  .optional()
  .transform((value) => TRUE_VALUES.has((value ?? "").trim().toLowerCase()));

const envSchema = z.object({
  PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).optional()),
  HOST: optionalString,
  NORTH_SERVER_SECRET: optionalString,
  NORTH_TRUSTED_ISSUERS: list,
  NORTH_API_KEYS: list,
  NORTH_PROTECTED_PATHS: list,
  NORTH_OAUTH_JWT_SECRET: optionalString,
  NORTH_OAUTH_JWT_ALGORITHM: optionalString,
  NORTH_OAUTH_INTROSPECTION_ENDPOINT: z.preprocess(emptyToUndefined, z.string().url().optional()),
  NORTH_OAUTH_CLIENT_ID: optionalString,
  NORTH_OAUTH_CLIENT_SECRET: optionalString,
  NORTH_OAUTH_EMAIL_CLAIM: optionalString,
  NORTH_DEBUG: flag,
});

export type EnvConfig = z.output<typeof envSchema>;

/**
 * Reads and validates the server's environment variables.
 * @throws ConfigurationError naming every invalid variable.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError(`Invalid environment configuration: ${problems.join("; ")}`);
  }
  return result.data;
}

export function isDebugMode(env: NodeJS.ProcessEnv = process.env): boolean {
  return TRUE_VALUES.has((env.NORTH_DEBUG ?? "").trim().toLowerCase());
}
