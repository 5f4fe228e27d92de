import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { config as loadEnvFile } from "dotenv";
import { z } from "zod";
import { LOG_LEVELS } from "./logger";
import type { LogLevel } from "./logger";

export const loadEnvFiles = (): void => {
  const moduleDir = dirname(fileURLToPath(import.meta.url));
  const candidateRoots = [
    process.cwd(),
    resolve(process.cwd(), ".."),
    resolve(process.cwd(), "..", ".."),
    moduleDir,
    resolve(moduleDir, ".."),
    resolve(moduleDir, "..", "..")
  ];
  for (const base of candidateRoots) {
    const candidate = resolve(base, ".env");
    if (existsSync(candidate)) {
      loadEnvFile({ path: candidate });
      return;
    }
  }
  loadEnvFile();
};

export type Credentials = {
  readonly apiKey: string;
  readonly secretApiKey: string;
};

export type AppConfig = {
  readonly credentials: Credentials;
  readonly domain: string;
  readonly subdomains: readonly string[];
  readonly checkIntervalSeconds: number;
  readonly recordTtl: number;
  readonly requestTimeoutMs: number;
  readonly apiBaseUrl: string;
  readonly ipEchoUrl: string;
  readonly logLevel: LogLevel;
};

export const DEFAULT_CHECK_INTERVAL_SECONDS = 300;
// Porkbun rejects TTLs below ten minutes.
export const MIN_RECORD_TTL = 600;
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
// Node timers clamp longer delays to 1 ms.
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
export const MAX_CHECK_INTERVAL_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);
export const DEFAULT_API_BASE_URL = "https://api.porkbun.com/api/json/v3";
export const DEFAULT_IP_ECHO_URL = "https://api.ipify.org";

export class ConfigError extends Error {
  public readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const requiredString = (key: string) =>
  z.string({ required_error: `${key} is required` }).trim().min(1, `${key} is required`);

const optionalString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed === undefined || trimmed.length === 0 ? undefined : trimmed;
  });

const positiveInteger = (
  key: string,
  fallback: number,
  minimum: number = 1,
  maximum: number = Number.MAX_SAFE_INTEGER
) =>
  optionalString.transform((value, ctx) => {
    if (value === undefined) {
      return fallback;
    }
    const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
    if (Number.isNaN(parsed) || parsed < minimum) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: minimum === 1 ? `${key} must be a positive integer` : `${key} must be an integer of at least ${minimum}`
      });
      return z.NEVER;
    }
    if (parsed > maximum) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${key} must be at most ${maximum}`
      });
      return z.NEVER;
    }
    return parsed;
  });

const url = (key: string, fallback: string) =>
  optionalString.pipe(z.string().url(`${key} must be a valid URL`).optional()).transform((value) => {
    const base = value ?? fallback;
    return base.endsWith("/") ? base.slice(0, -1) : base;
  });

const envSchema = z.object({
  PORKBUN_API_KEY: requiredString("PORKBUN_API_KEY"),
  PORKBUN_SECRET_API_KEY: requiredString("PORKBUN_SECRET_API_KEY"),
  PORKBUN_DOMAIN: requiredString("PORKBUN_DOMAIN"),
  PORKBUN_SUBDOMAIN: z.string().optional(),
  PORKBUN_CHECK_INTERVAL_SECONDS: positiveInteger(
    "PORKBUN_CHECK_INTERVAL_SECONDS",
    DEFAULT_CHECK_INTERVAL_SECONDS,
    1,
    MAX_CHECK_INTERVAL_SECONDS
  ),
  PORKBUN_RECORD_TTL: positiveInteger("PORKBUN_RECORD_TTL", MIN_RECORD_TTL, MIN_RECORD_TTL),
  PORKBUN_REQUEST_TIMEOUT_MS: positiveInteger("PORKBUN_REQUEST_TIMEOUT_MS", DEFAULT_REQUEST_TIMEOUT_MS, 1, MAX_TIMER_DELAY_MS),
  PORKBUN_API_BASE_URL: url("PORKBUN_API_BASE_URL", DEFAULT_API_BASE_URL),
  PUBLIC_IP_URL: url("PUBLIC_IP_URL", DEFAULT_IP_ECHO_URL),
  LOG_LEVEL: optionalString.pipe(
    z.enum(LOG_LEVELS, { errorMap: () => ({ message: `LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}` }) }).optional()
  )
});

/**
 * Splits the subdomain list, keeping empty entries: an empty entry (or an
 * unset variable) stands for the root domain.
 */
export const parseSubdomainList = (value: string | undefined): readonly string[] => {
  if (value === undefined) {
    return [""];
  }
  return value.split(",").map((entry) => entry.trim().toLowerCase());
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => issue.message));
  }
  const parsed = result.data;

  return Object.freeze({
    credentials: Object.freeze({
      apiKey: parsed.PORKBUN_API_KEY,
      secretApiKey: parsed.PORKBUN_SECRET_API_KEY
    }),
    domain: parsed.PORKBUN_DOMAIN.toLowerCase(),
    subdomains: parseSubdomainList(parsed.PORKBUN_SUBDOMAIN),
    checkIntervalSeconds: parsed.PORKBUN_CHECK_INTERVAL_SECONDS,
    recordTtl: parsed.PORKBUN_RECORD_TTL,
    requestTimeoutMs: parsed.PORKBUN_REQUEST_TIMEOUT_MS,
    apiBaseUrl: parsed.PORKBUN_API_BASE_URL,
    ipEchoUrl: parsed.PUBLIC_IP_URL,
    logLevel: parsed.LOG_LEVEL ?? "info"
  });
};
