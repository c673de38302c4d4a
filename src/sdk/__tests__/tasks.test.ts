import { describe, it, expect } from "vitest";
import {
  completeTask,
  getTask,
  listAssigneeTasks,
  listProjectTasks,
  updateTask,
  validateLimit,
} from "../tasks.ts";
import { stubClient } from "./stub.ts";

const open = { gid: "1", name: "Write brief", completed: false };
const done = { gid: "2", name: "Book room", completed: true };

describe("list tasks", () => {
  it("asks for incomplete tasks of a project and drops completed ones", async () => {
    const { client, calls } = stubClient([{ body: { data: [open, done] } }]);
    const tasks = await listProjectTasks(client, "77");

    expect(tasks.map((t) => t.gid)).toEqual(["1"]);
    const params = calls[0]?.url.searchParams;
    expect(params?.get("project")).toBe("77");
    expect(params?.get("completed_since")).toBe("now");
    expect(params?.has("limit")).toBe(false);
  });

  it("keeps completed tasks on request", async () => {
    const { client } = stubClient([{ body: { data: [open, done] } }]);
    const tasks = await listProjectTasks(client, "77", { completed: true, limit: 50 });
    expect(tasks.map((t) => t.gid)).toEqual(["1", "2"]);
  });

  it("sends assignee and workspace together", async () => {
    const { client, calls } = stubClient([{ body: { data: [] } }]);
    await listAssigneeTasks(client, "me", "100", { limit: 10 });

    const params = calls[0]?.url.searchParams;
    expect(params?.get("assignee")).toBe("me");
    expect(params?.get("workspace")).toBe("100");
    expect(params?.get("limit")).toBe("10");
  });

  it.each([0, 101, 2.5])("rejects limit %s", (limit) => {
    expect(() => validateLimit(limit)).toThrow(`Limit must be an integer between 1 and 100, got ${limit}.`);
  });
});

describe("getTask", () => {
  it("keeps a GID with slashes inside its own path segment", async () => {
    const { client, calls } = stubClient([{ body: { data: open } }]);
    await getTask(client, "../users/me");

    expect(calls[0]?.url.pathname).toBe("/api/1.0/tasks/..%2Fusers%2Fme");
  });

  it("rejects a dot segment before any request", async () => {
    const { client, calls } = stubClient([{ body: { data: open } }]);
    await expect(getTask(client, "..")).rejects.toMatchObject({ code: "INVALID_INPUT" });
    expect(calls).toHaveLength(0);
  });
});

describe("updateTask", () => {
  it("sends only the given fields and null to clear", async () => {
    const { client, calls } = stubClient([{ body: { data: open } }]);
    await updateTask(client, "1", { name: "Renamed", assignee: null, due_on: "2026-11-02" });

    expect(calls[0]?.method).toBe("PUT");
    expect(calls[0]?.url.pathname).toBe("/api/1.0/tasks/1");
    expect(JSON.parse(calls[0]?.body ?? "null")).toEqual({
      data: { name: "Renamed", assignee: null, due_on: "2026-11-02" },
    });
  });

  it("refuses an empty update before any request", async () => {
    const { client, calls } = stubClient([{ body: { data: open } }]);
    await expect(updateTask(client, "1", {})).rejects.toMatchObject({ code: "INVALID_INPUT" });
    expect(calls).toHaveLength(0);
  });

  it("completes a task", async () => {
    const { client, calls } = stubClient([{ body: { data: { ...open, completed: true } } }]);
    const task = await completeTask(client, "1");

    expect(task.completed).toBe(true);
    expect(JSON.parse(calls[0]?.body ?? "null")).toEqual({ data: { completed: true } });
  });
});
