import { define } from "gunshi";
import { parseIntArg, requireArg, withErrorHandler, type CliContext } from "../client.ts";
import { commonArgs, workspaceArg } from "./common.ts";
import { BIN, formatWebhook, ok, truncate } from "../../hateoas/index.ts";
import {
  addWebhookFilter,
  createWebhook,
  deleteWebhook,
  editWebhookFilter,
  filterFromPatch,
  getWebhook,
  listWebhooks,
  type WebhookFilterPatch,
} from "../../sdk/webhooks.ts";

const gidArg = {
  gid: { type: "string", short: "g", description: "Webhook GID (required)" },
} as const;

const filterArgs = {
  action: {
    type: "string",
    description: "changed, added, removed, deleted, undeleted, or 'all' for any action",
  },
  "resource-type": { type: "string", description: "Resource type, e.g. task" },
  "resource-subtype": { type: "string", description: "Resource subtype, e.g. milestone" },
} as const;

function patchFrom(values: {
  action?: string;
  "resource-type"?: string;
  "resource-subtype"?: string;
}): WebhookFilterPatch {
  return {
    action: values.action?.trim() || undefined,
    resource_type: values["resource-type"]?.trim() || undefined,
    resource_subtype: values["resource-subtype"]?.trim() || undefined,
  };
}

function webhookActions(gid: string) {
  return [
    { command: `${BIN} webhook-get --gid ${gid}`, description: "View the webhook" },
    { command: `${BIN} webhook-filter-add --gid ${gid} --resource-type task --action changed`, description: "Add a filter" },
    { command: `${BIN} webhook-delete --gid ${gid}`, description: "Delete the webhook" },
  ];
}

export function webhookCommands(cx: CliContext) {
  const webhookList = define({
    name: "webhook-list",
    description: "List webhooks in a workspace, optionally for one resource",
    args: {
      ...commonArgs,
      ...workspaceArg,
      resource: { type: "string", short: "r", description: "Only webhooks on this resource GID" },
    },
    run: (ctx) =>
      withErrorHandler("webhook-list", async () => {
        const client = cx.getClient();
        const hooks = await listWebhooks(client, {
          workspace: await client.getWorkspaceGid(),
          resource: ctx.values.resource?.trim() || undefined,
        });
        const { items, meta } = truncate(hooks.map(formatWebhook));
        ok("webhook-list", { ...meta, webhooks: items }, [
          {
            command: `${BIN} webhook-get --gid <gid>`,
            description: "View a webhook",
            params: { gid: { required: true, description: "Webhook GID from the list" } },
          },
          {
            command: `${BIN} webhook-create --resource <gid> --target <url>`,
            description: "Create a webhook",
          },
        ]);
      }),
  });

  const webhookGet = define({
    name: "webhook-get",
    description: "Show one webhook and its filters",
    args: { ...commonArgs, ...gidArg },
    run: (ctx) =>
      withErrorHandler("webhook-get", async () => {
        const gid = requireArg(ctx.values.gid, "gid");
        const hook = await getWebhook(cx.getClient(), gid);
        ok("webhook-get", formatWebhook(hook), webhookActions(gid));
      }),
  });

  const webhookCreate = define({
    name: "webhook-create",
    description: "Create an active webhook; filter flags add one initial filter",
    args: {
      ...commonArgs,
      resource: { type: "string", short: "r", description: "Resource GID to watch (required)" },
      target: { type: "string", short: "t", description: "HTTPS URL receiving deliveries (required)" },
      ...filterArgs,
    },
    run: (ctx) =>
      withErrorHandler("webhook-create", async () => {
        const resource = requireArg(ctx.values.resource, "resource");
        const target = requireArg(ctx.values.target, "target");
        const patch = patchFrom(ctx.values);
        const filters = patch.action || patch.resource_type || patch.resource_subtype ? [filterFromPatch(patch)] : [];
        const hook = await createWebhook(cx.getClient(), resource, target, filters);
        ok("webhook-create", formatWebhook(hook), webhookActions(hook.gid));
      }),
  });

  const webhookDelete = define({
    name: "webhook-delete",
    description: "Delete a webhook",
    args: { ...commonArgs, ...gidArg },
    run: (ctx) =>
      withErrorHandler("webhook-delete", async () => {
        const gid = requireArg(ctx.values.gid, "gid");
        await deleteWebhook(cx.getClient(), gid);
        ok("webhook-delete", { id: gid, deleted: true }, [
          { command: `${BIN} webhook-list`, description: "List remaining webhooks" },
        ]);
      }),
  });

  const webhookFilterAdd = define({
    name: "webhook-filter-add",
    description: "Append a filter to a webhook",
    args: { ...commonArgs, ...gidArg, ...filterArgs },
    run: (ctx) =>
      withErrorHandler("webhook-filter-add", async () => {
        const gid = requireArg(ctx.values.gid, "gid");
        const hook = await addWebhookFilter(cx.getClient(), gid, patchFrom(ctx.values));
        ok("webhook-filter-add", formatWebhook(hook), webhookActions(gid));
      }),
  });

  const webhookFilterEdit = define({
    name: "webhook-filter-edit",
    description: "Change one filter of a webhook (--index 0 adds a new one)",
    args: {
      ...commonArgs,
      ...gidArg,
      index: { type: "string", short: "n", description: "1-based filter position; required with several filters" },
      ...filterArgs,
    },
    run: (ctx) =>
      withErrorHandler("webhook-filter-edit", async () => {
        const gid = requireArg(ctx.values.gid, "gid");
        const index = parseIntArg(ctx.values.index, "index");
        const hook = await editWebhookFilter(cx.getClient(), gid, index, patchFrom(ctx.values));
        ok("webhook-filter-edit", formatWebhook(hook), webhookActions(gid));
      }),
  });

  return { webhookList, webhookGet, webhookCreate, webhookDelete, webhookFilterAdd, webhookFilterEdit };
}
