import { z } from "zod";
import { NextPageSchema } from "./http.ts";

// ── Open values ─────────────────────────────────────────────────────
// Event change slots carry whatever the field being changed holds: a scalar,
// an enum option object, a nested resource. No fixed schema per field.

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

// ── Compact references ──────────────────────────────────────────────

export const AsanaCompactSchema = z.object({
  gid: z.string(),
  resource_type: z.string().nullish(),
  name: z.string().nullish(),
});
export type AsanaCompact = z.infer<typeof AsanaCompactSchema>;

// ── Events ──────────────────────────────────────────────────────────

export const EventResourceSchema = AsanaCompactSchema.extend({
  resource_subtype: z.string().nullish(),
});

export const EventChangeSchema = z.object({
  field: z.string().nullish(),
  action: z.string().nullish(),
  old_value: JsonValueSchema.optional(),
  new_value: JsonValueSchema.optional(),
  added_value: JsonValueSchema.optional(),
  removed_value: JsonValueSchema.optional(),
}).passthrough();
export type EventChange = z.infer<typeof EventChangeSchema>;

// `action` stays a plain string: new actions should not break decoding.
// Unknown keys pass through so filters can reach them.
export const AsanaEventSchema = z.object({
  user: AsanaCompactSchema.nullish(),
  created_at: z.string().nullish(),
  action: z.string().nullish(),
  resource: EventResourceSchema.nullish(),
  parent: AsanaCompactSchema.nullish(),
  change: EventChangeSchema.nullish(),
  type: z.string().nullish(),
}).passthrough();
export type AsanaEvent = z.infer<typeof AsanaEventSchema>;

/**
 * One response from `GET /events`. `sync` is the cursor valid after this page;
 * `has_more` means the same cursor position still has events pending.
 */
export const EventPageSchema = z.object({
  data: z.array(AsanaEventSchema).nullish().transform((d) => d ?? []),
  sync: z.string().nullish().transform((s) => s ?? ""),
  has_more: z.boolean().nullish().transform((h) => h ?? false),
  next_page: NextPageSchema.nullish().transform((n) => n ?? null),
});
export type EventPage = z.infer<typeof EventPageSchema>;

// ── Tasks ───────────────────────────────────────────────────────────

export const AsanaTaskSchema = z.object({
  gid: z.string(),
  resource_type: z.string().optional(),
  name: z.string().default(""),
  resource_subtype: z.string().nullish(),
  completed: z.boolean().optional(),
  completed_at: z.string().nullish(),
  completed_by: AsanaCompactSchema.nullish(),
  created_at: z.string().nullish(),
  due_at: z.string().nullish(),
  due_on: z.string().nullish(),
  start_at: z.string().nullish(),
  start_on: z.string().nullish(),
  notes: z.string().nullish(),
  html_notes: z.string().nullish(),
  num_subtasks: z.number().optional(),
  assignee: AsanaCompactSchema.nullish(),
  assignee_section: AsanaCompactSchema.nullish(),
  custom_fields: z
    .array(
      AsanaCompactSchema.extend({
        display_value: z.string().nullish(),
        type: z.string().nullish(),
        resource_subtype: z.string().nullish(),
      }),
    )
    .nullish(),
  followers: z.array(AsanaCompactSchema).nullish(),
  parent: AsanaCompactSchema.nullish(),
  projects: z.array(AsanaCompactSchema).nullish(),
  tags: z.array(AsanaCompactSchema.extend({ color: z.string().nullish() })).nullish(),
  workspace: AsanaCompactSchema.nullish(),
  memberships: z
    .array(
      z.object({
        project: AsanaCompactSchema.nullish(),
        section: AsanaCompactSchema.nullish(),
      }),
    )
    .nullish(),
  dependencies: z.array(AsanaCompactSchema).nullish(),
  dependents: z.array(AsanaCompactSchema).nullish(),
});
export type AsanaTask = z.infer<typeof AsanaTaskSchema>;

// ── Projects ────────────────────────────────────────────────────────

export const AsanaProjectSchema = z.object({
  gid: z.string(),
  resource_type: z.string().optional(),
  name: z.string().default(""),
  archived: z.boolean().optional(),
  color: z.string().nullish(),
  created_at: z.string().nullish(),
  modified_at: z.string().nullish(),
  current_status: z
    .object({
      title: z.string().nullish(),
      color: z.string().nullish(),
      text: z.string().nullish(),
    })
    .nullish(),
  due_date: z.string().nullish(),
  due_on: z.string().nullish(),
  start_on: z.string().nullish(),
  notes: z.string().nullish(),
  html_notes: z.string().nullish(),
  public: z.boolean().optional(),
  default_view: z.string().nullish(),
  icon: z.string().nullish(),
  permalink_url: z.string().nullish(),
  owner: AsanaCompactSchema.nullish(),
  team: AsanaCompactSchema.nullish(),
  workspace: AsanaCompactSchema.nullish(),
  followers: z.array(AsanaCompactSchema).nullish(),
  members: z.array(AsanaCompactSchema).nullish(),
});
export type AsanaProject = z.infer<typeof AsanaProjectSchema>;

// ── Workspaces and users ────────────────────────────────────────────

export const AsanaWorkspaceSchema = z.object({
  gid: z.string(),
  resource_type: z.string().optional(),
  name: z.string().nullish(),
  is_organization: z.boolean().optional(),
  email_domains: z.array(z.string()).nullish(),
});
export type AsanaWorkspace = z.infer<typeof AsanaWorkspaceSchema>;

export const AsanaUserSchema = z.object({
  gid: z.string(),
  resource_type: z.string().optional(),
  name: z.string().nullish(),
  email: z.string().nullish(),
  workspaces: z.array(AsanaCompactSchema).nullish(),
});
export type AsanaUser = z.infer<typeof AsanaUserSchema>;

// ── Webhooks ────────────────────────────────────────────────────────

export const WebhookFilterSchema = z.object({
  resource_type: z.string().nullish(),
  resource_subtype: z.string().nullish(),
  action: z.string().nullish(),
  fields: z.array(z.string()).nullish(),
});
export type WebhookFilter = z.infer<typeof WebhookFilterSchema>;

export const AsanaWebhookSchema = z.object({
  gid: z.string(),
  resource: AsanaCompactSchema.nullish(),
  target: z.string().nullish(),
  active: z.boolean().optional(),
  created_at: z.string().nullish(),
  filters: z.array(WebhookFilterSchema).nullish(),
  last_success_at: z.string().nullish(),
  last_failure_at: z.string().nullish(),
  last_failure_content: z.string().nullish(),
  delivery_retry_count: z.number().optional(),
  next_attempt_after: z.string().nullish(),
  failure_deletion_timestamp: z.string().nullish(),
  is_workspace_webhook: z.boolean().optional(),
});
export type AsanaWebhook = z.infer<typeof AsanaWebhookSchema>;

// ── opt_fields constants ────────────────────────────────────────────

export const TASK_LIST_OPT_FIELDS = [
  "name", "completed", "completed_at", "completed_by.name", "created_at",
  "due_on", "due_at", "notes", "assignee.name", "assignee_section.name",
  "projects.name", "tags.name", "tags.color", "num_subtasks", "parent.name",
  "memberships.section.name", "resource_subtype", "start_on",
].join(",");

export const TASK_OPT_FIELDS = [
  "name", "completed", "completed_at", "completed_by.name", "created_at",
  "due_on", "due_at", "html_notes", "notes", "assignee.name",
  "assignee_section.name", "custom_fields", "followers.name", "parent.name",
  "projects.name", "tags", "workspace.name", "memberships.project.name",
  "memberships.section.name", "num_subtasks", "resource_subtype", "start_on",
  "start_at", "dependencies.name", "dependents.name",
].join(",");

export const PROJECT_LIST_OPT_FIELDS = [
  "name", "archived", "created_at", "modified_at", "due_date", "start_on",
  "notes", "public", "color", "owner.name", "current_status.title",
  "current_status.color",
].join(",");

export const PROJECT_OPT_FIELDS = [
  "name", "archived", "created_at", "modified_at", "due_date", "start_on",
  "notes", "html_notes", "public", "color", "owner.name", "current_status",
  "team.name", "workspace.name", "followers.name", "members.name",
  "permalink_url", "default_view", "icon",
].join(",");

export const USER_OPT_FIELDS = "gid,name,email";
