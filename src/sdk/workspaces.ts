/**
 * Workspace lookups. State (the resolved default) lives on the client;
 * these helpers only fetch.
 */

import { sortWorkspaces, type AsanaClient } from "./client.ts";
import { apiPath } from "./http.ts";
import { AsanaWorkspaceSchema, type AsanaWorkspace } from "./types.ts";

const WORKSPACE_OPT_FIELDS = "gid,name,is_organization,email_domains";

/** All workspaces visible to the token, sorted by name then GID. */
export async function listWorkspaces(client: AsanaClient): Promise<AsanaWorkspace[]> {
  const all = await client.paginate("/workspaces", AsanaWorkspaceSchema, {
    opt_fields: WORKSPACE_OPT_FIELDS,
    limit: 100,
  });
  return sortWorkspaces(all);
}

export async function getWorkspace(client: AsanaClient, gid: string): Promise<AsanaWorkspace> {
  return client.request("GET", apiPath`/workspaces/${gid}`, AsanaWorkspaceSchema, {
    query: { opt_fields: WORKSPACE_OPT_FIELDS },
  });
}
