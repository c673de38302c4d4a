import { type AsanaClient } from "./client.ts";
import { apiPath } from "./http.ts";
import { isSdkError } from "./errors.ts";
import { parallel } from "./parallel.ts";
import { listWorkspaces } from "./workspaces.ts";
import { AsanaUserSchema, USER_OPT_FIELDS, type AsanaUser } from "./types.ts";

/** One workspace's users, or the reason they could not be listed. */
export type WorkspaceUsers =
  | {
      readonly workspace: { readonly gid: string; readonly name?: string };
      readonly ok: true;
      readonly users: AsanaUser[];
    }
  | {
      readonly workspace: { readonly gid: string; readonly name?: string };
      readonly ok: false;
      readonly error: { readonly message: string; readonly code?: string };
    };

export function getCurrentUser(client: AsanaClient): Promise<AsanaUser> {
  return client.request("GET", "/users/me", AsanaUserSchema, {
    query: { opt_fields: `${USER_OPT_FIELDS},workspaces.name` },
  });
}

export async function listWorkspaceUsers(
  client: AsanaClient,
  workspaceGid: string,
): Promise<AsanaUser[]> {
  const items = await client.paginate(apiPath`/workspaces/${workspaceGid}/users`, AsanaUserSchema, {
    opt_fields: USER_OPT_FIELDS,
  });
  return [...items].sort((a, b) => (a.name ?? a.gid).localeCompare(b.name ?? b.gid));
}

/**
 * Users of every visible workspace. A workspace that fails is reported in its
 * own entry; the listing as a whole only fails if the workspaces can't be read.
 */
export async function listUsersByWorkspace(
  client: AsanaClient,
  opts: { readonly concurrency?: number; readonly delayMs?: number } = {},
): Promise<WorkspaceUsers[]> {
  const workspaces = await listWorkspaces(client);
  const results = await parallel(
    workspaces.map((ws) => () => listWorkspaceUsers(client, ws.gid)),
    { concurrency: opts.concurrency ?? 3, delayMs: opts.delayMs ?? 0 },
  );

  return results.map((r): WorkspaceUsers => {
    const ws = workspaces[r.index];
    const workspace = { gid: ws?.gid ?? "", name: ws?.name ?? undefined };
    if (r.ok) return { workspace, ok: true, users: r.value };
    const err = r.error;
    client.logger.warn({ workspace: workspace.gid, err }, "listing workspace users failed");
    return {
      workspace,
      ok: false,
      error: isSdkError(err)
        ? { message: err.message, code: err.code }
        : { message: err instanceof Error ? err.message : String(err) },
    };
  });
}
