import { define } from "gunshi";
import { parseIntArg, requireArg, withErrorHandler, type CliContext } from "../client.ts";
import { commonArgs, workspaceArg } from "./common.ts";
import { BIN, formatProject, ok, truncate } from "../../hateoas/index.ts";
import { getProject, listTeamProjects, listWorkspaceProjects } from "../../sdk/projects.ts";

export function projectCommands(cx: CliContext) {
  const projectList = define({
    name: "project-list",
    description: "List projects in a workspace or team",
    args: {
      ...commonArgs,
      ...workspaceArg,
      team: { type: "string", short: "t", description: "Team GID (instead of the workspace)" },
      archived: { type: "boolean", description: "List archived projects instead of active ones" },
      limit: { type: "string", short: "l", description: "Page size, 1-100" },
    },
    run: (ctx) =>
      withErrorHandler("project-list", async () => {
        const client = cx.getClient();
        const opts = { archived: ctx.values.archived ?? false, limit: parseIntArg(ctx.values.limit, "limit") };
        const team = ctx.values.team?.trim();
        const projects = team
          ? await listTeamProjects(client, team, opts)
          : await listWorkspaceProjects(client, await client.getWorkspaceGid(), opts);

        const { items, meta } = truncate(projects.map(formatProject));
        ok("project-list", { ...meta, projects: items }, [
          {
            command: `${BIN} task-list --project <gid>`,
            description: "List open tasks in a project",
            params: { gid: { required: true, description: "Project GID from the list" } },
          },
          {
            command: `${BIN} events-poll --gid <gid>`,
            description: "Watch a project's events",
            params: { gid: { required: true, description: "Project GID from the list" } },
          },
        ]);
      }),
  });

  const projectGet = define({
    name: "project-get",
    description: "Show one project",
    args: {
      ...commonArgs,
      gid: { type: "string", short: "g", description: "Project GID (required)" },
    },
    run: (ctx) =>
      withErrorHandler("project-get", async () => {
        const gid = requireArg(ctx.values.gid, "gid");
        const project = await getProject(cx.getClient(), gid);
        ok("project-get", formatProject(project), [
          { command: `${BIN} task-list --project ${gid}`, description: "List open tasks" },
          { command: `${BIN} events-sync --gid ${gid}`, description: "Start tracking changes" },
        ]);
      }),
  });

  return { projectList, projectGet };
}
