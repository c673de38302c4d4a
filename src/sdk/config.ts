/**
 * Environment configuration, parsed once per process.
 */

import { z } from "zod";
import { SdkError } from "./errors.ts";
import { ASANA_BASE_URL, DEFAULT_TIMEOUT_MS } from "./http.ts";

export const TOKEN_ENV_KEYS = [
  "ASANA_ACCESS_TOKEN",
  "ASANA_PERSONAL_ACCESS_TOKEN",
  "ASANA_TOKEN",
  "ASANA_PAT",
] as const;

export const DEFAULT_POLL_INTERVAL_MS = 5_000;

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

/**
 * Parses `250ms`, `5s`, `2m`, `1h` or a bare number of milliseconds.
 * Returns undefined for anything else, including zero and negatives.
 */
export function parseDuration(input: string): number | undefined {
  const match = /^(\d+(?:\.\d+)?)(ms|s|m|h)?$/.exec(input.trim());
  if (!match) return undefined;
  const amount = Number(match[1]);
  const unit = DURATION_UNITS[match[2] ?? "ms"] ?? 1;
  const ms = Math.round(amount * unit);
  return ms > 0 ? ms : undefined;
}

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const blankToUndefined = (v: unknown) =>
  typeof v === "string" && v.trim() === "" ? undefined : v;

const EnvSchema = z.object({
  ASANA_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(ASANA_BASE_URL)),
  ASANA_WORKSPACE_GID: z.preprocess(blankToUndefined, z.string().trim().optional()),
  ASANA_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  ),
  ASANA_POLL_INTERVAL: z.preprocess(
    blankToUndefined,
    z
      .string()
      .optional()
      .transform((v, ctx) => {
        if (v === undefined) return DEFAULT_POLL_INTERVAL_MS;
        const ms = parseDuration(v);
        if (ms === undefined) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration "${v}"` });
          return z.NEVER;
        }
        return ms;
      }),
  ),
  ASANA_LOG_LEVEL: z.preprocess(
    (v) => (typeof v === "string" ? blankToUndefined(v.trim().toLowerCase()) : v),
    z.enum(LOG_LEVELS).default("warn"),
  ),
});

export type EnvConfig = {
  readonly token: string | undefined;
  readonly baseUrl: string;
  readonly workspaceGid: string | undefined;
  readonly timeoutMs: number;
  readonly pollIntervalMs: number;
  readonly logLevel: LogLevel;
};

/** First non-empty token among TOKEN_ENV_KEYS. */
export function resolveTokenFromEnv(env: NodeJS.ProcessEnv = process.env): string | undefined {
  for (const key of TOKEN_ENV_KEYS) {
    const val = env[key]?.trim();
    if (val) return val;
  }
  return undefined;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join(".") ?? "environment";
    throw new SdkError(
      `Invalid ${key}: ${issue?.message ?? "unrecognized value"}`,
      "INVALID_INPUT",
      `Correct or unset ${key}.`,
    );
  }
  return {
    token: resolveTokenFromEnv(env),
    baseUrl: parsed.data.ASANA_BASE_URL,
    workspaceGid: parsed.data.ASANA_WORKSPACE_GID || undefined,
    timeoutMs: parsed.data.ASANA_TIMEOUT_MS,
    pollIntervalMs: parsed.data.ASANA_POLL_INTERVAL,
    logLevel: parsed.data.ASANA_LOG_LEVEL,
  };
}
