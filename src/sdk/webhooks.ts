import { z } from "zod";
import { type AsanaClient } from "./client.ts";
import { apiPath } from "./http.ts";
import { sdkError } from "./errors.ts";
import { AsanaWebhookSchema, type AsanaWebhook, type WebhookFilter } from "./types.ts";

/** Action value meaning "any action": the filter carries no action at all. */
export const ALL_ACTIONS = "all";

/** Partial filter from the command line. Empty strings mean "leave unchanged". */
export type WebhookFilterPatch = {
  readonly action?: string;
  readonly resource_type?: string;
  readonly resource_subtype?: string;
};

const WEBHOOK_OPT_FIELDS = [
  "resource.name", "resource.resource_type", "target", "active", "created_at",
  "filters", "last_success_at", "last_failure_at", "last_failure_content",
  "delivery_retry_count", "next_attempt_after", "failure_deletion_timestamp",
  "is_workspace_webhook",
].join(",");

/** Drops empty and null members so the wire body carries only set keys. */
export function toWireFilter(filter: WebhookFilter): WebhookFilter {
  const out: WebhookFilter = { resource_type: filter.resource_type ?? "" };
  if (filter.resource_subtype) out.resource_subtype = filter.resource_subtype;
  if (filter.action) out.action = filter.action;
  if (filter.fields && filter.fields.length > 0) out.fields = [...filter.fields];
  return out;
}

function normalizeAction(action: string): string | undefined {
  return action === ALL_ACTIONS ? undefined : action;
}

/** Builds a new filter from a patch; `action: "all"` yields no action. */
export function filterFromPatch(patch: WebhookFilterPatch): WebhookFilter {
  const filter: WebhookFilter = { resource_type: patch.resource_type ?? "" };
  if (patch.resource_subtype) filter.resource_subtype = patch.resource_subtype;
  const action = patch.action ? normalizeAction(patch.action) : undefined;
  if (action) filter.action = action;
  return filter;
}

/** Applies the non-empty members of `patch` over `filter`. */
export function applyFilterPatch(filter: WebhookFilter, patch: WebhookFilterPatch): WebhookFilter {
  const next: WebhookFilter = { ...filter };
  if (patch.action) next.action = normalizeAction(patch.action) ?? null;
  if (patch.resource_type) next.resource_type = patch.resource_type;
  if (patch.resource_subtype) next.resource_subtype = patch.resource_subtype;
  return next;
}

function isEmptyPatch(patch: WebhookFilterPatch): boolean {
  return !patch.action && !patch.resource_type && !patch.resource_subtype;
}

export function createWebhook(
  client: AsanaClient,
  resource: string,
  target: string,
  filters: readonly WebhookFilter[] = [],
): Promise<AsanaWebhook> {
  return client.request("POST", "/webhooks", AsanaWebhookSchema, {
    query: { opt_fields: WEBHOOK_OPT_FIELDS },
    body: { resource, target, active: true, filters: filters.map(toWireFilter) },
  });
}

export function listWebhooks(
  client: AsanaClient,
  opts: { readonly workspace?: string; readonly resource?: string },
): Promise<AsanaWebhook[]> {
  return client.paginate("/webhooks", AsanaWebhookSchema, {
    workspace: opts.workspace,
    resource: opts.resource,
    opt_fields: WEBHOOK_OPT_FIELDS,
  });
}

export async function getWebhook(client: AsanaClient, gid: string): Promise<AsanaWebhook> {
  return client.request("GET", apiPath`/webhooks/${gid}`, AsanaWebhookSchema, {
    query: { opt_fields: WEBHOOK_OPT_FIELDS },
  });
}

export async function deleteWebhook(client: AsanaClient, gid: string): Promise<void> {
  await client.request("DELETE", apiPath`/webhooks/${gid}`, z.object({}));
}

/** PUT carrying only `filters`; other webhook settings are left as they are. */
export async function updateWebhookFilters(
  client: AsanaClient,
  gid: string,
  filters: readonly WebhookFilter[],
): Promise<AsanaWebhook> {
  return client.request("PUT", apiPath`/webhooks/${gid}`, AsanaWebhookSchema, {
    query: { opt_fields: WEBHOOK_OPT_FIELDS },
    body: { filters: filters.map(toWireFilter) },
  });
}

export async function addWebhookFilter(
  client: AsanaClient,
  gid: string,
  patch: WebhookFilterPatch,
): Promise<AsanaWebhook> {
  if (isEmptyPatch(patch)) {
    sdkError(
      "A filter needs at least one of action, resource type or resource subtype.",
      "INVALID_INPUT",
      "Pass --action, --resource-type or --resource-subtype.",
    );
  }
  const current = await getWebhook(client, gid);
  return updateWebhookFilters(client, gid, [...(current.filters ?? []), filterFromPatch(patch)]);
}

/**
 * Patches one filter of a webhook.
 *
 * `index` is 1-based; `0` appends a new filter built from the patch. It may be
 * omitted when the webhook has at most one filter: a single filter is patched,
 * and a webhook with none gets the patch as its only filter.
 */
export async function editWebhookFilter(
  client: AsanaClient,
  gid: string,
  index: number | undefined,
  patch: WebhookFilterPatch,
): Promise<AsanaWebhook> {
  const current = await getWebhook(client, gid);
  const filters = [...(current.filters ?? [])];

  if (filters.length === 0 || index === 0) {
    if (isEmptyPatch(patch)) {
      sdkError(
        "No filters to edit and no new filter values provided.",
        "INVALID_INPUT",
        "Pass --action, --resource-type or --resource-subtype.",
      );
    }
    filters.push(filterFromPatch(patch));
    return updateWebhookFilters(client, gid, filters);
  }

  if (index === undefined && filters.length > 1) {
    sdkError(
      `Webhook ${gid} has ${filters.length} filters; choose one.`,
      "INVALID_INPUT",
      `Pass --index 1..${filters.length}, or --index 0 to add a new filter.`,
    );
  }

  const position = (index ?? 1) - 1;
  const target = filters[position];
  if (!target) {
    sdkError(
      `Filter index ${index ?? 1} is out of range (1..${filters.length}).`,
      "INVALID_INPUT",
      `Pass --index 1..${filters.length}.`,
    );
  }
  filters[position] = applyFilterPatch(target, patch);
  return updateWebhookFilters(client, gid, filters);
}
