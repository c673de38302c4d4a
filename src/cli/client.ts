/**
 * Per-process wiring for commands.
 *
 * cli.ts builds one CliContext after scanning global flags and hands it to
 * every command factory. The client is created on first use, so `--help`
 * and argument errors never need a token.
 */

import { createClientFromEnv, type AsanaClient } from "../sdk/client.ts";
import { SyncExpiredError, sdkError, toSdkError } from "../sdk/errors.ts";
import { type EnvConfig } from "../sdk/config.ts";
import { BIN, fatal, type NextAction } from "../hateoas/index.ts";
import { type Logger } from "../lib/logger.ts";

export type CliContext = {
  readonly env: EnvConfig;
  readonly logger: Logger;
  /** Aborted on SIGINT/SIGTERM. */
  readonly signal: AbortSignal;
  getClient(): AsanaClient;
};

export function createCliContext(opts: {
  env: EnvConfig;
  logger: Logger;
  signal: AbortSignal;
  workspaceRef?: string;
}): CliContext {
  let client: AsanaClient | undefined;
  return {
    env: opts.env,
    logger: opts.logger,
    signal: opts.signal,
    getClient() {
      client ??= createClientFromEnv({ workspaceRef: opts.workspaceRef, logger: opts.logger });
      return client;
    },
  };
}

function nextActionsFor(err: unknown): NextAction[] {
  if (err instanceof SyncExpiredError && err.sync) {
    const { resource } = err;
    return [
      {
        command: `${BIN} events-get --gid ${resource} --sync ${err.sync}`,
        description: "Restart from the fresh sync token",
      },
      {
        command: `${BIN} events-sync --gid ${resource}`,
        description: "Obtain a new sync token",
      },
    ];
  }
  return [{ command: `${BIN} --help`, description: "Show available commands" }];
}

/** Translates any failure into the JSON error envelope and exits 1. */
export function handleError(err: unknown, command: string): never {
  const sdk = toSdkError(err);
  fatal(sdk.message, {
    code: sdk.code,
    status: sdk.status,
    fix: sdk.fix,
    command,
    nextActions: nextActionsFor(err),
  });
}

export function withErrorHandler<T>(command: string, fn: () => Promise<T>): Promise<T> {
  return fn().catch((err: unknown) => handleError(err, command));
}

// ── Argument helpers ────────────────────────────────────────────────

export type GlobalFlags = { verbose: boolean; workspace?: string };

/** Reads the flags the client needs before any command runs. */
export function scanGlobalFlags(argv: readonly string[]): GlobalFlags {
  const flags: GlobalFlags = { verbose: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--verbose" || arg === "-v") flags.verbose = true;
    else if (arg === "--workspace" || arg === "-w") flags.workspace = argv[i + 1];
    else if (arg?.startsWith("--workspace=")) flags.workspace = arg.slice("--workspace=".length);
  }
  return flags;
}

export function requireArg(value: string | undefined, flag: string): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    sdkError(`--${flag} is required.`, "INVALID_INPUT", `Pass --${flag} <value>.`);
  }
  return trimmed;
}

export function parseIntArg(value: string | undefined, flag: string): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  if (!Number.isInteger(n)) {
    sdkError(`--${flag} must be an integer, got "${value}".`, "INVALID_INPUT");
  }
  return n;
}

/** `"null"` clears a field; anything else is sent as given. */
export function nullableArg(value: string | undefined): string | null | undefined {
  if (value === undefined) return undefined;
  return value === "null" ? null : value;
}

export function csvArg(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
