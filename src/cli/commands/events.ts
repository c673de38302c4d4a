import { define } from "gunshi";
import { requireArg, withErrorHandler, type CliContext } from "../client.ts";
import { commonArgs } from "./common.ts";
import { BIN, errorLine, line, ok } from "../../hateoas/index.ts";
import { drainAll, initializeOrRefreshCursor, poll } from "../../sdk/events.ts";
import { compileFilter, filterEvents, type FilterEvaluator } from "../../sdk/filter.ts";
import { parseDuration } from "../../sdk/config.ts";
import { sdkError } from "../../sdk/errors.ts";

const gidArg = {
  gid: {
    type: "string",
    short: "g",
    description: "Resource GID: project, task, portfolio… (required)",
  },
} as const;

const filterArg = {
  filter: {
    type: "string",
    short: "f",
    description: 'Keep events where the expression is true, e.g. \'event.change.field == "name"\'',
  },
} as const;

function optionalFilter(expr: string | undefined): FilterEvaluator | undefined {
  return expr?.trim() ? compileFilter(expr) : undefined;
}

export function eventsCommands(cx: CliContext) {
  const eventsGet = define({
    name: "events-get",
    description: "Fetch every pending event for a resource (all pages)",
    args: {
      ...commonArgs,
      ...gidArg,
      sync: { type: "string", short: "s", description: "Sync token from a previous call" },
      ...filterArg,
    },
    run: (ctx) =>
      withErrorHandler("events-get", async () => {
        const gid = requireArg(ctx.values.gid, "gid");
        const evaluator = optionalFilter(ctx.values.filter);
        const { events, sync } = await drainAll(cx.getClient(), gid, ctx.values.sync ?? "", {
          signal: cx.signal,
        });
        const kept = evaluator ? filterEvents(events, evaluator) : events;

        ok("events-get", {
          resource: gid,
          sync,
          count: kept.length,
          ...(evaluator ? { total: events.length, filter: evaluator.expression } : {}),
          events: kept,
        }, [
          {
            command: `${BIN} events-get --gid ${gid} --sync ${sync}`,
            description: "Fetch events since this call",
          },
          {
            command: `${BIN} events-poll --gid ${gid} --sync ${sync}`,
            description: "Stream new events as they happen",
          },
        ]);
      }),
  });

  const eventsSync = define({
    name: "events-sync",
    description: "Initialize or refresh the sync token for a resource",
    args: { ...commonArgs, ...gidArg },
    run: (ctx) =>
      withErrorHandler("events-sync", async () => {
        const gid = requireArg(ctx.values.gid, "gid");
        const { sync, events, cursorExpired } = await initializeOrRefreshCursor(cx.getClient(), gid, {
          signal: cx.signal,
        });

        ok("events-sync", {
          resource: gid,
          sync,
          count: events.length,
          cursor_expired: cursorExpired,
        }, [
          {
            command: `${BIN} events-get --gid ${gid} --sync ${sync}`,
            description: "Fetch events since this token",
          },
          {
            command: `${BIN} events-poll --gid ${gid} --sync ${sync}`,
            description: "Stream new events as they happen",
          },
        ]);
      }),
  });

  const eventsPoll = define({
    name: "events-poll",
    description: "Poll a resource until interrupted, one JSON line per event",
    args: {
      ...commonArgs,
      ...gidArg,
      sync: { type: "string", short: "s", description: "Initial sync token (fetched when omitted)" },
      interval: { type: "string", short: "i", description: "Poll interval: 500ms, 5s, 1m (default: ASANA_POLL_INTERVAL or 5s)" },
      ...filterArg,
    },
    run: (ctx) =>
      withErrorHandler("events-poll", async () => {
        const gid = requireArg(ctx.values.gid, "gid");
        const evaluator = optionalFilter(ctx.values.filter);
        let intervalMs = cx.env.pollIntervalMs;
        if (ctx.values.interval !== undefined) {
          const parsed = parseDuration(ctx.values.interval);
          if (parsed === undefined) {
            sdkError(`Invalid --interval "${ctx.values.interval}".`, "INVALID_INPUT", "Use a duration such as 500ms, 5s or 1m.");
          }
          intervalMs = parsed;
        }

        const client = cx.getClient();
        let cursor = ctx.values.sync?.trim() ?? "";
        if (!cursor) {
          const init = await initializeOrRefreshCursor(client, gid, { signal: cx.signal });
          cursor = init.sync;
          cx.logger.info({ resource: gid, backlog: init.events.length }, "initialized sync token");
        }
        cx.logger.info({ resource: gid, intervalMs }, "polling");

        for await (const s of poll(client, gid, cursor, { intervalMs, signal: cx.signal, logger: cx.logger })) {
          if (s.kind === "error") {
            errorLine(s.error.message, { code: s.error.code, status: s.error.status, fix: s.error.fix, command: "events-poll" });
          } else if (!evaluator || evaluator.matches(s.event)) {
            line(s.event);
          }
        }
        cx.logger.info({ resource: gid }, "polling stopped");
      }),
  });

  return { eventsGet, eventsSync, eventsPoll };
}
