import { type AsanaClient } from "./client.ts";
import { apiPath, type QueryParams } from "./http.ts";
import { validateLimit } from "./tasks.ts";
import {
  AsanaProjectSchema,
  PROJECT_LIST_OPT_FIELDS,
  PROJECT_OPT_FIELDS,
  type AsanaProject,
} from "./types.ts";

export type ListProjectsOpts = {
  readonly archived?: boolean;
  /** Page size, 1–100. */
  readonly limit?: number;
};

async function listProjects(
  client: AsanaClient,
  filter: QueryParams,
  opts: ListProjectsOpts,
): Promise<AsanaProject[]> {
  return client.paginate("/projects", AsanaProjectSchema, {
    ...filter,
    archived: opts.archived ?? false,
    opt_fields: PROJECT_LIST_OPT_FIELDS,
    limit: validateLimit(opts.limit),
  });
}

export function listWorkspaceProjects(
  client: AsanaClient,
  workspaceGid: string,
  opts: ListProjectsOpts = {},
): Promise<AsanaProject[]> {
  return listProjects(client, { workspace: workspaceGid }, opts);
}

export function listTeamProjects(
  client: AsanaClient,
  teamGid: string,
  opts: ListProjectsOpts = {},
): Promise<AsanaProject[]> {
  return listProjects(client, { team: teamGid }, opts);
}

export async function getProject(client: AsanaClient, gid: string): Promise<AsanaProject> {
  return client.request("GET", apiPath`/projects/${gid}`, AsanaProjectSchema, {
    query: { opt_fields: PROJECT_OPT_FIELDS },
  });
}
