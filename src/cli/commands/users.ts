import { define } from "gunshi";
import { withErrorHandler, type CliContext } from "../client.ts";
import { commonArgs, workspaceArg } from "./common.ts";
import { BIN, formatUser, ok } from "../../hateoas/index.ts";
import { getCurrentUser, listUsersByWorkspace, listWorkspaceUsers } from "../../sdk/users.ts";

export function userCommands(cx: CliContext) {
  const userList = define({
    name: "user-list",
    description: "List users of one workspace, or of every workspace",
    args: { ...commonArgs, ...workspaceArg },
    run: (ctx) =>
      withErrorHandler("user-list", async () => {
        const client = cx.getClient();
        const next = [
          {
            command: `${BIN} task-list --assignee <gid>`,
            description: "List a user's open tasks",
            params: { gid: { required: true, description: "User GID from the list" } },
          },
        ];

        if (ctx.values.workspace?.trim()) {
          const workspace = await client.getWorkspace();
          const users = await listWorkspaceUsers(client, workspace.gid);
          ok("user-list", {
            workspace: { id: workspace.gid, name: workspace.name },
            count: users.length,
            users: users.map(formatUser),
          }, next);
          return;
        }

        const groups = await listUsersByWorkspace(client);
        ok("user-list", {
          workspaces: groups.map((g) =>
            g.ok
              ? { id: g.workspace.gid, name: g.workspace.name, count: g.users.length, users: g.users.map(formatUser) }
              : { id: g.workspace.gid, name: g.workspace.name, error: g.error },
          ),
        }, next);
      }),
  });

  const userMe = define({
    name: "user-me",
    description: "Show the user the token belongs to",
    args: { ...commonArgs },
    run: () =>
      withErrorHandler("user-me", async () => {
        const me = await getCurrentUser(cx.getClient());
        ok("user-me", {
          ...formatUser(me),
          workspaces: (me.workspaces ?? []).map((w) => ({ id: w.gid, name: w.name })),
        }, [
          { command: `${BIN} task-list --assignee me`, description: "List your open tasks" },
          { command: `${BIN} workspace-list`, description: "See accessible workspaces" },
        ]);
      }),
  });

  return { userList, userMe };
}
