import { type AsanaClient } from "./client.ts";
import { apiPath, type QueryParams } from "./http.ts";
import { sdkError } from "./errors.ts";
import {
  AsanaTaskSchema,
  TASK_LIST_OPT_FIELDS,
  TASK_OPT_FIELDS,
  type AsanaTask,
} from "./types.ts";

export type ListTasksOpts = {
  /** Keep completed tasks in the result. */
  readonly completed?: boolean;
  /** Page size, 1–100. Every page is still collected. */
  readonly limit?: number;
};

/**
 * Fields for PUT /tasks/{gid}. Only keys that are present are sent;
 * `null` on assignee or a date clears it.
 */
export type UpdateTaskFields = {
  readonly name?: string;
  readonly notes?: string;
  readonly assignee?: string | null;
  readonly due_on?: string | null;
  readonly start_on?: string | null;
  readonly completed?: boolean;
  readonly tags?: readonly string[];
};

export const MAX_PAGE_SIZE = 100;

export function validateLimit(limit: number | undefined): number | undefined {
  if (limit === undefined) return undefined;
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE) {
    sdkError(
      `Limit must be an integer between 1 and ${MAX_PAGE_SIZE}, got ${limit}.`,
      "INVALID_INPUT",
      `Pass --limit 1..${MAX_PAGE_SIZE}.`,
    );
  }
  return limit;
}

async function listTasks(
  client: AsanaClient,
  filter: QueryParams,
  opts: ListTasksOpts,
): Promise<AsanaTask[]> {
  const tasks = await client.paginate("/tasks", AsanaTaskSchema, {
    ...filter,
    completed_since: "now",
    opt_fields: TASK_LIST_OPT_FIELDS,
    limit: validateLimit(opts.limit),
  });
  return opts.completed ? tasks : tasks.filter((t) => t.completed !== true);
}

export function listProjectTasks(
  client: AsanaClient,
  projectGid: string,
  opts: ListTasksOpts = {},
): Promise<AsanaTask[]> {
  return listTasks(client, { project: projectGid }, opts);
}

export function listSectionTasks(
  client: AsanaClient,
  sectionGid: string,
  opts: ListTasksOpts = {},
): Promise<AsanaTask[]> {
  return listTasks(client, { section: sectionGid }, opts);
}

/** The API only accepts an assignee filter together with a workspace. */
export function listAssigneeTasks(
  client: AsanaClient,
  assigneeGid: string,
  workspaceGid: string,
  opts: ListTasksOpts = {},
): Promise<AsanaTask[]> {
  return listTasks(client, { assignee: assigneeGid, workspace: workspaceGid }, opts);
}

export async function getTask(client: AsanaClient, gid: string): Promise<AsanaTask> {
  return client.request("GET", apiPath`/tasks/${gid}`, AsanaTaskSchema, {
    query: { opt_fields: TASK_OPT_FIELDS },
  });
}

export async function updateTask(
  client: AsanaClient,
  gid: string,
  fields: UpdateTaskFields,
): Promise<AsanaTask> {
  const body: Record<string, unknown> = {};
  if (fields.name !== undefined) body.name = fields.name;
  if (fields.notes !== undefined) body.notes = fields.notes;
  if (fields.assignee !== undefined) body.assignee = fields.assignee;
  if (fields.due_on !== undefined) body.due_on = fields.due_on;
  if (fields.start_on !== undefined) body.start_on = fields.start_on;
  if (fields.completed !== undefined) body.completed = fields.completed;
  if (fields.tags !== undefined) body.tags = [...fields.tags];

  if (Object.keys(body).length === 0) {
    sdkError(
      "No fields to update.",
      "INVALID_INPUT",
      "Pass at least one of --name, --notes, --assignee, --due-date, --start-date, --completed, --tags.",
    );
  }

  return client.request("PUT", apiPath`/tasks/${gid}`, AsanaTaskSchema, {
    query: { opt_fields: TASK_OPT_FIELDS },
    body,
  });
}

export function completeTask(client: AsanaClient, gid: string): Promise<AsanaTask> {
  return updateTask(client, gid, { completed: true });
}

export function uncompleteTask(client: AsanaClient, gid: string): Promise<AsanaTask> {
  return updateTask(client, gid, { completed: false });
}
