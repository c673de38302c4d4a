import type {
  AsanaProject,
  AsanaTask,
  AsanaUser,
  AsanaWebhook,
  AsanaWorkspace,
  WebhookFilter,
} from "../sdk/types.ts";

export type FormattedTask = {
  id: string;
  name: string;
  notes?: string;
  completed: boolean;
  completed_at?: string;
  due_on: string | null;
  due_at: string | null;
  start_on?: string;
  assignee?: string;
  assignee_gid?: string;
  projects: string[];
  section?: string;
  parent_id?: string;
  tags?: string[];
  subtasks?: number;
  custom_fields?: { id: string; name: string; type?: string; value: string | null }[];
};

export type FormattedProject = {
  id: string;
  name: string;
  archived: boolean;
  color?: string;
  owner?: string;
  team?: string;
  due_on: string | null;
  start_on?: string;
  status?: string;
  public?: boolean;
  url?: string;
};

export type FormattedWebhook = {
  id: string;
  resource?: { id: string; name?: string; type?: string };
  target?: string;
  active: boolean;
  created_at?: string;
  filters: WebhookFilter[];
  last_success_at?: string;
  last_failure_at?: string;
  last_failure_content?: string;
};

export function formatTask(t: AsanaTask): FormattedTask {
  return {
    id: t.gid,
    name: t.name,
    notes: t.notes || undefined,
    completed: t.completed ?? false,
    completed_at: t.completed_at ?? undefined,
    due_on: t.due_on ?? null,
    due_at: t.due_at ?? null,
    start_on: t.start_on ?? undefined,
    assignee: t.assignee?.name ?? t.assignee?.gid ?? undefined,
    assignee_gid: t.assignee?.gid ?? undefined,
    projects: t.projects?.map((p) => p.name ?? p.gid) ?? [],
    section: t.memberships?.[0]?.section?.name ?? undefined,
    parent_id: t.parent?.gid ?? undefined,
    tags: t.tags != null && t.tags.length > 0
      ? t.tags.map((x) => x.name ?? x.gid)
      : undefined,
    subtasks: t.num_subtasks || undefined,
    custom_fields: t.custom_fields?.map((f) => ({
      id: f.gid,
      name: f.name ?? f.gid,
      type: f.resource_subtype ?? undefined,
      value: f.display_value ?? null,
    })),
  };
}

export function formatProject(p: AsanaProject): FormattedProject {
  return {
    id: p.gid,
    name: p.name,
    archived: p.archived ?? false,
    color: p.color ?? undefined,
    owner: p.owner?.name ?? p.owner?.gid ?? undefined,
    team: p.team?.name ?? undefined,
    due_on: p.due_on ?? p.due_date ?? null,
    start_on: p.start_on ?? undefined,
    status: p.current_status?.title ?? undefined,
    public: p.public,
    url: p.permalink_url ?? undefined,
  };
}

export function formatWorkspace(w: AsanaWorkspace) {
  return {
    id: w.gid,
    name: w.name ?? w.gid,
    is_organization: w.is_organization ?? false,
    email_domains: w.email_domains ?? undefined,
  };
}

export function formatUser(u: AsanaUser) {
  return {
    id: u.gid,
    name: u.name ?? u.gid,
    email: u.email ?? undefined,
  };
}

export function formatWebhook(w: AsanaWebhook): FormattedWebhook {
  return {
    id: w.gid,
    resource: w.resource
      ? {
          id: w.resource.gid,
          name: w.resource.name ?? undefined,
          type: w.resource.resource_type ?? undefined,
        }
      : undefined,
    target: w.target ?? undefined,
    active: w.active ?? false,
    created_at: w.created_at ?? undefined,
    filters: w.filters ?? [],
    last_success_at: w.last_success_at ?? undefined,
    last_failure_at: w.last_failure_at ?? undefined,
    last_failure_content: w.last_failure_content || undefined,
  };
}
