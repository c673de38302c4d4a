import { define } from "gunshi";
import { requireArg, withErrorHandler, type CliContext } from "../client.ts";
import { commonArgs, workspaceArg } from "./common.ts";
import { BIN, formatWorkspace, ok } from "../../hateoas/index.ts";
import { CONFIG_FILE } from "../../sdk/client.ts";
import { getWorkspace, listWorkspaces } from "../../sdk/workspaces.ts";

export function workspaceCommands(cx: CliContext) {
  const workspaceList = define({
    name: "workspace-list",
    description: "List accessible workspaces and which one is the default",
    args: { ...commonArgs, ...workspaceArg },
    run: () =>
      withErrorHandler("workspace-list", async () => {
        const client = cx.getClient();
        const [all, selected] = await Promise.all([listWorkspaces(client), client.getWorkspace()]);

        ok("workspace-list", {
          resolution_policy: {
            precedence: [
              "--workspace <ref>",
              "ASANA_WORKSPACE_GID",
              `${CONFIG_FILE} workspace/workspace_gid`,
              "lexicographic fallback by name then gid",
            ],
            selected_source: selected.source,
            selected_gid: selected.gid,
          },
          workspaces: all.map((w) => ({ ...formatWorkspace(w), selected: w.gid === selected.gid })),
        }, [
          { command: `${BIN} project-list --workspace <gid>`, description: "List projects in a workspace" },
          { command: `${BIN} user-list --workspace <gid>`, description: "List users in a workspace" },
        ]);
      }),
  });

  const workspaceGet = define({
    name: "workspace-get",
    description: "Show one workspace",
    args: {
      ...commonArgs,
      gid: { type: "string", short: "g", description: "Workspace GID (required)" },
    },
    run: (ctx) =>
      withErrorHandler("workspace-get", async () => {
        const gid = requireArg(ctx.values.gid, "gid");
        const workspace = await getWorkspace(cx.getClient(), gid);
        ok("workspace-get", formatWorkspace(workspace), [
          { command: `${BIN} project-list --workspace ${gid}`, description: "List projects" },
          { command: `${BIN} webhook-list --workspace ${gid}`, description: "List webhooks" },
        ]);
      }),
  });

  return { workspaceList, workspaceGet };
}
