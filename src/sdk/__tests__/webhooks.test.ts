import { describe, it, expect } from "vitest";
import {
  addWebhookFilter,
  applyFilterPatch,
  createWebhook,
  editWebhookFilter,
  filterFromPatch,
} from "../webhooks.ts";
import type { WebhookFilter } from "../types.ts";
import { stubClient, type RecordedCall } from "./stub.ts";

function webhook(filters: WebhookFilter[]) {
  return { body: { data: { gid: "900", target: "https://hook.test/in", active: true, filters } } };
}

function sentBody(call: RecordedCall | undefined): unknown {
  return JSON.parse(call?.body ?? "null");
}

const taskChanged: WebhookFilter = { resource_type: "task", action: "changed" };
const storyAdded: WebhookFilter = { resource_type: "story", action: "added" };

describe("filter patches", () => {
  it("drops the action for 'all'", () => {
    expect(filterFromPatch({ action: "all", resource_type: "task" })).toEqual({ resource_type: "task" });
    expect(applyFilterPatch(taskChanged, { action: "all" })).toEqual({ resource_type: "task", action: null });
  });

  it("leaves members with empty values untouched", () => {
    expect(applyFilterPatch(taskChanged, { action: "", resource_subtype: "milestone" })).toEqual({
      resource_type: "task",
      action: "changed",
      resource_subtype: "milestone",
    });
  });
});

describe("createWebhook", () => {
  it("posts resource, target and active filters", async () => {
    const { client, calls } = stubClient([webhook([taskChanged])]);
    await createWebhook(client, "42", "https://hook.test/in", [{ ...taskChanged, resource_subtype: null }]);

    expect(calls[0]?.method).toBe("POST");
    expect(calls[0]?.url.pathname).toBe("/api/1.0/webhooks");
    expect(sentBody(calls[0])).toEqual({
      data: {
        resource: "42",
        target: "https://hook.test/in",
        active: true,
        filters: [{ resource_type: "task", action: "changed" }],
      },
    });
  });
});

describe("addWebhookFilter", () => {
  it("appends to the existing filters and PUTs only filters", async () => {
    const { client, calls } = stubClient([webhook([taskChanged]), webhook([taskChanged, storyAdded])]);
    await addWebhookFilter(client, "900", { action: "all", resource_type: "story" });

    expect(calls.map((c) => c.method)).toEqual(["GET", "PUT"]);
    expect(calls[1]?.url.pathname).toBe("/api/1.0/webhooks/900");
    expect(sentBody(calls[1])).toEqual({
      data: { filters: [{ resource_type: "task", action: "changed" }, { resource_type: "story" }] },
    });
  });

  it("refuses an empty patch before any request", async () => {
    const { client, calls } = stubClient([webhook([])]);
    await expect(addWebhookFilter(client, "900", {})).rejects.toMatchObject({ code: "INVALID_INPUT" });
    expect(calls).toHaveLength(0);
  });
});

describe("editWebhookFilter", () => {
  it("patches the only filter when no index is given", async () => {
    const { client, calls } = stubClient([webhook([taskChanged]), webhook([])]);
    await editWebhookFilter(client, "900", undefined, { action: "all" });

    expect(sentBody(calls[1])).toEqual({ data: { filters: [{ resource_type: "task" }] } });
  });

  it("patches the filter at a 1-based index", async () => {
    const { client, calls } = stubClient([webhook([taskChanged, storyAdded]), webhook([])]);
    await editWebhookFilter(client, "900", 2, { action: "removed" });

    expect(sentBody(calls[1])).toEqual({
      data: {
        filters: [
          { resource_type: "task", action: "changed" },
          { resource_type: "story", action: "removed" },
        ],
      },
    });
  });

  it("appends for index 0", async () => {
    const { client, calls } = stubClient([webhook([taskChanged]), webhook([])]);
    await editWebhookFilter(client, "900", 0, { resource_type: "project" });

    expect(sentBody(calls[1])).toEqual({
      data: { filters: [{ resource_type: "task", action: "changed" }, { resource_type: "project" }] },
    });
  });

  it("creates the first filter on a webhook that has none", async () => {
    const { client, calls } = stubClient([webhook([]), webhook([])]);
    await editWebhookFilter(client, "900", undefined, { resource_type: "task", action: "added" });

    expect(sentBody(calls[1])).toEqual({
      data: { filters: [{ resource_type: "task", action: "added" }] },
    });
  });

  it("asks for an index when there are several filters", async () => {
    const { client, calls } = stubClient([webhook([taskChanged, storyAdded])]);
    await expect(editWebhookFilter(client, "900", undefined, { action: "added" })).rejects.toMatchObject({
      code: "INVALID_INPUT",
      message: "Webhook 900 has 2 filters; choose one.",
    });
    expect(calls).toHaveLength(1);
  });

  it("rejects an out-of-range index", async () => {
    const { client } = stubClient([webhook([taskChanged, storyAdded])]);
    await expect(editWebhookFilter(client, "900", 3, { action: "added" })).rejects.toMatchObject({
      code: "INVALID_INPUT",
      message: "Filter index 3 is out of range (1..2).",
    });
  });

  it("rejects an empty patch when there is nothing to edit", async () => {
    const { client, calls } = stubClient([webhook([])]);
    await expect(editWebhookFilter(client, "900", undefined, {})).rejects.toMatchObject({
      code: "INVALID_INPUT",
    });
    expect(calls).toHaveLength(1);
  });
});
