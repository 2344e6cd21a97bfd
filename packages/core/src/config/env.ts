/**
 * Vault configuration loader
 *
 * Reads the process environment once at startup and validates it into an
 * immutable VaultConfig. Blank variables count as unset.
 */

import { z } from "zod";
import { LOG_LEVELS, type LogLevel } from "../logging";

export const DEFAULT_API_BASE_URL = "https://api.github.com";
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_SERVER_PORT = 8000;

export const TransportSchema = z.enum(["stdio", "http"]);

export type TransportKind = z.infer<typeof TransportSchema>;

const EnvSchema = z.object({
  GITHUB_TOKEN: z.string().optional(),
  GITHUB_API_BASE_URL: z
    .string()
    .url()
    .default(DEFAULT_API_BASE_URL)
    .transform((url) => url.replace(/\/+$/, "")),
  LOG_LEVEL: z
    .string()
    .default("info")
    .transform((level) => level.toLowerCase())
    .pipe(z.enum(LOG_LEVELS)),
  GITHUB_REQUEST_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_REQUEST_TIMEOUT_MS),
  MCP_TRANSPORT: z
    .string()
    .default("stdio")
    .transform((transport) => transport.toLowerCase())
    .pipe(TransportSchema),
  MCP_SERVER_PORT: z.coerce.number().int().min(1).max(65535).default(DEFAULT_SERVER_PORT),
});

export interface VaultConfig {
  /** Bearer token forwarded to GitHub; undefined means unauthenticated mode */
  githubToken?: string;
  apiBaseUrl: string;
  logLevel: LogLevel;
  requestTimeoutMs: number;
  transport: TransportKind;
  port: number;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Readonly<VaultConfig> {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) {
      present[key] = value;
    }
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  return Object.freeze({
    githubToken: vars.GITHUB_TOKEN,
    apiBaseUrl: vars.GITHUB_API_BASE_URL,
    logLevel: vars.LOG_LEVEL,
    requestTimeoutMs: vars.GITHUB_REQUEST_TIMEOUT_MS,
    transport: vars.MCP_TRANSPORT,
    port: vars.MCP_SERVER_PORT,
  });
}
