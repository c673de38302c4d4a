#!/usr/bin/env tsx
/**
 * asana-pulse: Asana from the command line, built around the event stream.
 *
 * Every command prints one JSON envelope (events-poll prints one line per
 * event). Diagnostics go to stderr through pino.
 *
 * Usage: asana-pulse <command> [options]
 */

import { readFileSync } from "node:fs";
import { cli, define } from "gunshi";
import { z } from "zod";
import { createCliContext, handleError, scanGlobalFlags } from "./cli/client.ts";
import { commonArgs } from "./cli/commands/common.ts";
import { eventsCommands } from "./cli/commands/events.ts";
import { taskCommands } from "./cli/commands/tasks.ts";
import { projectCommands } from "./cli/commands/projects.ts";
import { workspaceCommands } from "./cli/commands/workspaces.ts";
import { userCommands } from "./cli/commands/users.ts";
import { webhookCommands } from "./cli/commands/webhooks.ts";
import { BIN, ok } from "./hateoas/index.ts";
import { loadEnvConfig, type EnvConfig } from "./sdk/config.ts";
import { createLogger } from "./lib/logger.ts";

// ── Helpers ─────────────────────────────────────────────────────────

function readVersion(): string {
  const PackageSchema = z.object({ version: z.string() });
  try {
    const raw: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
    return PackageSchema.parse(raw).version;
  } catch {
    return "0.0.0";
  }
}

// ── Entry ───────────────────────────────────────────────────────────

const argv = process.argv.slice(2);
const flags = scanGlobalFlags(argv);

let env: EnvConfig;
try {
  env = loadEnvConfig();
} catch (err) {
  handleError(err, argv[0] ?? "");
}

const logger = createLogger({ level: flags.verbose ? "debug" : env.logLevel });
const controller = new AbortController();
for (const sig of ["SIGINT", "SIGTERM"] as const) {
  process.once(sig, () => {
    logger.debug({ signal: sig }, "shutting down");
    controller.abort();
  });
}

const cx = createCliContext({ env, logger, signal: controller.signal, workspaceRef: flags.workspace });

const commands = {
  ...eventsCommands(cx),
  ...taskCommands(cx),
  ...projectCommands(cx),
  ...workspaceCommands(cx),
  ...userCommands(cx),
  ...webhookCommands(cx),
};

const main = define({
  name: BIN,
  description: "Asana CLI centred on the change-event stream. JSON in, JSON out.",
  args: { ...commonArgs },
  run: () => {
    ok("", {
      description: "Asana CLI centred on the change-event stream",
      auth: "ASANA_ACCESS_TOKEN (or ASANA_PERSONAL_ACCESS_TOKEN, ASANA_TOKEN, ASANA_PAT)",
      commands: Object.values(commands).map((c) => ({ name: c.name, description: c.description })),
    }, [
      { command: `${BIN} workspace-list`, description: "See accessible workspaces" },
      { command: `${BIN} events-sync --gid <gid>`, description: "Get a sync token for a resource" },
      { command: `${BIN} events-poll --gid <gid>`, description: "Stream a resource's events" },
    ]);
  },
});

await cli(argv, main, {
  name: BIN,
  version: readVersion(),
  description: "Asana CLI centred on the change-event stream",
  subCommands: new Map(Object.values(commands).map((c): [string, typeof c] => [c.name ?? "", c])),
});
