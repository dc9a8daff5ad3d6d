/**
 * Runtime configuration
 * `.env` is loaded with dotenv, then the environment is validated and coerced with zod
 */

import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";
import { LOG_LEVELS } from "./lib/logger.ts";

/** Handler names in their default dispatch order */
export const HANDLER_NAMES = ["arithmetic", "function", "variable", "unit", "currency", "translate"] as const;

export type HandlerName = (typeof HANDLER_NAMES)[number];

const HandlerListSchema = z
  .string()
  .transform((raw) =>
    raw
      .split(",")
      .map((name) => name.trim().toLowerCase())
      .filter((name) => name.length > 0),
  )
  .pipe(z.array(z.enum(HANDLER_NAMES)).min(1, "at least one handler is required"))
  .refine((names) => new Set(names).size === names.length, "handler names must be unique");

export const ConfigSchema = z.object({
  LINECALC_LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
  LINECALC_HANDLERS: HandlerListSchema.default([...HANDLER_NAMES]),
  LINECALC_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  LINECALC_CURRENCY_API_URL: z.url().default("https://open.er-api.com/v6/latest"),
  LINECALC_TRANSLATE_API_URL: z.url().default("https://translate.googleapis.com/translate_a/single"),
  LINECALC_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(60 * 60 * 1000),
  LINECALC_SESSION_TTL_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
  LINECALC_MAX_SESSIONS: z.coerce.number().int().positive().default(100),
});

export interface AppConfig {
  logLevel: z.infer<typeof ConfigSchema>["LINECALC_LOG_LEVEL"];
  handlers: HandlerName[];
  httpTimeoutMs: number;
  currencyApiUrl: string;
  translateApiUrl: string;
  cacheTtlMs: number;
  sessionTtlMs: number;
  maxSessions: number;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Parse configuration from an environment map.
 * Throws ConfigError listing every invalid key.
 */
export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.map(String).join(".") || "(root)"}: ${issue.message}`,
      ),
    );
  }

  const c = parsed.data;
  return {
    logLevel: c.LINECALC_LOG_LEVEL,
    handlers: c.LINECALC_HANDLERS,
    httpTimeoutMs: c.LINECALC_HTTP_TIMEOUT_MS,
    currencyApiUrl: c.LINECALC_CURRENCY_API_URL,
    translateApiUrl: c.LINECALC_TRANSLATE_API_URL,
    cacheTtlMs: c.LINECALC_CACHE_TTL_MS,
    sessionTtlMs: c.LINECALC_SESSION_TTL_MS,
    maxSessions: c.LINECALC_MAX_SESSIONS,
  };
}

/** Load `.env` from the project root (if present) and parse process.env */
export function loadConfig(): AppConfig {
  const projectRoot = resolve(dirname(fileURLToPath(import.meta.url)), "..");
  loadDotenv({ path: resolve(projectRoot, ".env") });
  return parseConfig(process.env);
}

export const DEFAULT_CONFIG: AppConfig = parseConfig({});
