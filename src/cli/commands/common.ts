/** Flags every command accepts. cli.ts reads them before dispatch. */
export const commonArgs = {
  verbose: {
    type: "boolean",
    short: "v",
    description: "Debug logging on stderr",
  },
} as const;

export const workspaceArg = {
  workspace: {
    type: "string",
    short: "w",
    description: "Workspace GID or name (default: ASANA_WORKSPACE_GID, .asana-pulse.json, first by name)",
  },
} as const;
