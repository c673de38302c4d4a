/**
 * AsanaClient: the one dependency threaded through every SDK call.
 *
 * Owns a bound `send` (raw, status-agnostic), a bound `request` (decoding,
 * error-raising), a bound `paginate`, and lazy workspace resolution cached on
 * the instance. Configuration is frozen at construction.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import {
  createRequestFn,
  createSendFn,
  paginate,
  type QueryParams,
  type RequestFn,
  type SendFn,
} from "./http.ts";
import { SdkError } from "./errors.ts";
import { loadEnvConfig } from "./config.ts";
import { AsanaWorkspaceSchema, type AsanaWorkspace } from "./types.ts";
import { silentLogger, type Logger } from "../lib/logger.ts";

export const CONFIG_FILE = ".asana-pulse.json";

// ── Config ───────────────────────────────────────────────────────────

export type WorkspaceSource = "explicit" | "env" | "config" | "fallback";

export type ClientConfig = {
  readonly token: string;
  /** Workspace GID or name from `--workspace`. Beats every other source. */
  readonly workspaceRef?: string;
  /** Workspace GID or name from ASANA_WORKSPACE_GID. */
  readonly envWorkspaceRef?: string;
  /** Directory searched for the config file (default: cwd). */
  readonly configDir?: string;
  readonly baseUrl?: string;
  readonly fetchImpl?: typeof fetch;
  readonly timeoutMs?: number;
  readonly logger?: Logger;
};

export type ResolvedWorkspace = {
  readonly gid: string;
  readonly name?: string;
  readonly source: WorkspaceSource;
};

// ── Public interface ─────────────────────────────────────────────────

export type AsanaClient = {
  readonly config: Readonly<ClientConfig>;
  readonly logger: Logger;
  /** Raw transport; statuses are not interpreted. */
  readonly send: SendFn;
  readonly request: RequestFn;
  paginate<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    query?: QueryParams,
  ): Promise<T[]>;
  getWorkspace(): Promise<ResolvedWorkspace>;
  getWorkspaceGid(): Promise<string>;
};

// ── Workspace resolution ─────────────────────────────────────────────

export function sortWorkspaces(workspaces: readonly AsanaWorkspace[]): AsanaWorkspace[] {
  return [...workspaces].sort((a, b) =>
    (a.name ?? a.gid).toLowerCase().localeCompare((b.name ?? b.gid).toLowerCase()),
  );
}

async function fetchWorkspaces(send: SendFn): Promise<AsanaWorkspace[]> {
  const all = await paginate(send, "/workspaces", AsanaWorkspaceSchema, {
    opt_fields: "gid,name,is_organization",
    limit: 100,
  });
  return sortWorkspaces(all);
}

/** Matches a GID exactly, or a name case-insensitively. */
export function pickByRef(
  workspaces: readonly AsanaWorkspace[],
  ref: string,
): AsanaWorkspace | undefined {
  const trimmed = ref.trim();
  if (/^\d+$/.test(trimmed)) return workspaces.find((w) => w.gid === trimmed);
  const lower = trimmed.toLowerCase();
  const exact = workspaces.filter((w) => (w.name ?? "").toLowerCase() === lower);
  if (exact.length > 1) {
    throw new SdkError(
      `Workspace "${trimmed}" is ambiguous (${exact.length} matches).`,
      "AMBIGUOUS_WORKSPACE",
      "Use the workspace GID instead of its name.",
    );
  }
  return exact[0];
}

const ConfigFileSchema = z.object({
  workspace_gid: z.string().optional(),
  workspace: z.string().optional(),
});

async function loadConfigWorkspace(dir: string, logger: Logger): Promise<string | undefined> {
  let text: string;
  try {
    text = await readFile(join(dir, CONFIG_FILE), "utf8");
  } catch {
    return undefined;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SdkError(
      `${CONFIG_FILE} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
      "INVALID_INPUT",
      `Fix or remove ${join(dir, CONFIG_FILE)}.`,
    );
  }
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn({ file: CONFIG_FILE }, "ignoring config file with unexpected shape");
    return undefined;
  }
  return parsed.data.workspace_gid ?? parsed.data.workspace;
}

function requireMatch(
  workspaces: readonly AsanaWorkspace[],
  ref: string,
  source: Exclude<WorkspaceSource, "fallback">,
): ResolvedWorkspace {
  const ws = pickByRef(workspaces, ref);
  if (!ws) {
    const origin =
      source === "env" ? "ASANA_WORKSPACE_GID" : source === "config" ? CONFIG_FILE : "--workspace";
    throw new SdkError(
      `Workspace "${ref}" (from ${origin}) not found.`,
      "WORKSPACE_NOT_FOUND",
      "Run 'asana-pulse workspace-list' to see accessible workspaces.",
    );
  }
  return { gid: ws.gid, name: ws.name ?? undefined, source };
}

async function resolveWorkspace(
  send: SendFn,
  config: ClientConfig,
  logger: Logger,
): Promise<ResolvedWorkspace> {
  const workspaces = await fetchWorkspaces(send);
  const first = workspaces[0];
  if (!first) {
    throw new SdkError(
      "No workspaces found for this token.",
      "NO_WORKSPACE",
      "Verify the token belongs to an Asana user with workspace access.",
    );
  }

  if (config.workspaceRef?.trim()) {
    return requireMatch(workspaces, config.workspaceRef, "explicit");
  }
  if (config.envWorkspaceRef?.trim()) {
    return requireMatch(workspaces, config.envWorkspaceRef, "env");
  }
  const fromFile = await loadConfigWorkspace(config.configDir ?? process.cwd(), logger);
  if (fromFile?.trim()) {
    return requireMatch(workspaces, fromFile, "config");
  }
  return { gid: first.gid, name: first.name ?? undefined, source: "fallback" };
}

// ── Factory ──────────────────────────────────────────────────────────

/**
 * @example
 * const client = createClient({ token: "..." });
 * const gid = await client.getWorkspaceGid();
 */
export function createClient(config: ClientConfig): AsanaClient {
  if (!config.token.trim()) {
    throw new SdkError(
      "Asana bearer token is required.",
      "AUTH_MISSING",
      "Set ASANA_ACCESS_TOKEN or pass token to createClient().",
    );
  }

  const frozen = Object.freeze({ ...config });
  const logger = frozen.logger ?? silentLogger;
  const send = createSendFn(frozen.token, frozen.baseUrl, frozen.fetchImpl, {
    timeoutMs: frozen.timeoutMs,
    logger,
  });
  const request = createRequestFn(send);

  let pending: Promise<ResolvedWorkspace> | undefined;

  const client: AsanaClient = {
    config: frozen,
    logger,
    send,
    request,
    paginate: (path, schema, query) => paginate(send, path, schema, query),

    getWorkspace() {
      if (!pending) {
        pending = resolveWorkspace(send, frozen, logger).catch((err: unknown) => {
          pending = undefined;
          throw err;
        });
      }
      return pending;
    },

    async getWorkspaceGid() {
      return (await client.getWorkspace()).gid;
    },
  };

  return client;
}

/**
 * Builds a client from the process environment.
 * Throws AUTH_MISSING when none of the token variables is set.
 */
export function createClientFromEnv(
  overrides: Partial<ClientConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): AsanaClient {
  const cfg = loadEnvConfig(env);
  const token = overrides.token ?? cfg.token;
  if (!token) {
    throw new SdkError(
      "No Asana token found.",
      "AUTH_MISSING",
      "Set ASANA_ACCESS_TOKEN (or ASANA_PERSONAL_ACCESS_TOKEN). Create one at https://app.asana.com/0/developer-console",
    );
  }
  return createClient({
    baseUrl: cfg.baseUrl,
    timeoutMs: cfg.timeoutMs,
    envWorkspaceRef: cfg.workspaceGid,
    ...overrides,
    token,
  });
}
