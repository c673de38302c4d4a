import { define } from "gunshi";
import {
  csvArg,
  nullableArg,
  parseIntArg,
  requireArg,
  withErrorHandler,
  type CliContext,
} from "../client.ts";
import { commonArgs, workspaceArg } from "./common.ts";
import { BIN, formatTask, ok, truncate } from "../../hateoas/index.ts";
import {
  completeTask,
  getTask,
  listAssigneeTasks,
  listProjectTasks,
  listSectionTasks,
  uncompleteTask,
  updateTask,
} from "../../sdk/tasks.ts";
import { sdkError } from "../../sdk/errors.ts";

const gidArg = {
  gid: { type: "string", short: "g", description: "Task GID (required)" },
} as const;

function taskActions(gid: string) {
  return [
    { command: `${BIN} task-get --gid ${gid}`, description: "View task details" },
    { command: `${BIN} events-poll --gid ${gid}`, description: "Watch changes to this task" },
  ];
}

export function taskCommands(cx: CliContext) {
  const taskList = define({
    name: "task-list",
    description: "List open tasks in a project, a section, or for an assignee",
    args: {
      ...commonArgs,
      ...workspaceArg,
      project: { type: "string", short: "p", description: "Project GID" },
      section: { type: "string", short: "s", description: "Section GID" },
      assignee: { type: "string", short: "a", description: "Assignee GID or 'me' (uses the workspace)" },
      completed: { type: "boolean", short: "c", description: "Include completed tasks" },
      limit: { type: "string", short: "l", description: "Page size, 1-100" },
    },
    run: (ctx) =>
      withErrorHandler("task-list", async () => {
        const { project, section, assignee, completed } = ctx.values;
        const given = [project, section, assignee].filter((v) => v !== undefined && v.trim() !== "");
        if (given.length !== 1) {
          sdkError(
            "Exactly one of --project, --section or --assignee is required.",
            "INVALID_INPUT",
            `Try: ${BIN} task-list --project <gid>`,
          );
        }
        const opts = { completed: completed ?? false, limit: parseIntArg(ctx.values.limit, "limit") };
        const client = cx.getClient();

        const tasks = project
          ? await listProjectTasks(client, project.trim(), opts)
          : section
            ? await listSectionTasks(client, section.trim(), opts)
            : await listAssigneeTasks(client, requireArg(assignee, "assignee"), await client.getWorkspaceGid(), opts);

        const { items, meta } = truncate(tasks.map(formatTask));
        ok("task-list", { ...meta, tasks: items }, [
          {
            command: `${BIN} task-get --gid <gid>`,
            description: "View task details",
            params: { gid: { required: true, description: "Task GID from the list" } },
          },
          {
            command: `${BIN} task-complete --gid <gid>`,
            description: "Complete a task",
            params: { gid: { required: true, description: "Task GID from the list" } },
          },
        ]);
      }),
  });

  const taskGet = define({
    name: "task-get",
    description: "Show one task",
    args: { ...commonArgs, ...gidArg },
    run: (ctx) =>
      withErrorHandler("task-get", async () => {
        const gid = requireArg(ctx.values.gid, "gid");
        const task = await getTask(cx.getClient(), gid);
        ok("task-get", formatTask(task), [
          { command: `${BIN} task-edit --gid ${gid} --name <name>`, description: "Rename the task" },
          { command: `${BIN} events-sync --gid ${gid}`, description: "Start tracking changes" },
        ]);
      }),
  });

  const taskEdit = define({
    name: "task-edit",
    description: "Update task fields; pass 'null' to clear assignee or dates",
    args: {
      ...commonArgs,
      ...gidArg,
      name: { type: "string", short: "n", description: "New name" },
      notes: { type: "string", description: "New description" },
      assignee: { type: "string", short: "a", description: "Assignee GID, 'me' or 'null'" },
      "due-date": { type: "string", short: "d", description: "Due date YYYY-MM-DD or 'null'" },
      "start-date": { type: "string", description: "Start date YYYY-MM-DD or 'null'" },
      completed: { type: "boolean", short: "c", description: "Mark completed" },
      tags: { type: "string", short: "t", description: "Comma-separated tag GIDs" },
    },
    run: (ctx) =>
      withErrorHandler("task-edit", async () => {
        const gid = requireArg(ctx.values.gid, "gid");
        const task = await updateTask(cx.getClient(), gid, {
          name: ctx.values.name,
          notes: ctx.values.notes,
          assignee: nullableArg(ctx.values.assignee),
          due_on: nullableArg(ctx.values["due-date"]),
          start_on: nullableArg(ctx.values["start-date"]),
          completed: ctx.values.completed ? true : undefined,
          tags: csvArg(ctx.values.tags),
        });
        ok("task-edit", formatTask(task), taskActions(gid));
      }),
  });

  const taskComplete = define({
    name: "task-complete",
    description: "Mark a task completed",
    args: { ...commonArgs, ...gidArg },
    run: (ctx) =>
      withErrorHandler("task-complete", async () => {
        const gid = requireArg(ctx.values.gid, "gid");
        const task = await completeTask(cx.getClient(), gid);
        ok("task-complete", formatTask(task), [
          { command: `${BIN} task-uncomplete --gid ${gid}`, description: "Undo" },
          ...taskActions(gid),
        ]);
      }),
  });

  const taskUncomplete = define({
    name: "task-uncomplete",
    description: "Mark a task incomplete",
    args: { ...commonArgs, ...gidArg },
    run: (ctx) =>
      withErrorHandler("task-uncomplete", async () => {
        const gid = requireArg(ctx.values.gid, "gid");
        const task = await uncompleteTask(cx.getClient(), gid);
        ok("task-uncomplete", formatTask(task), [
          { command: `${BIN} task-complete --gid ${gid}`, description: "Complete it again" },
          ...taskActions(gid),
        ]);
      }),
  });

  return { taskList, taskGet, taskEdit, taskComplete, taskUncomplete };
}
