/**
 * Event stream synchronization for one resource.
 *
 * Asana hands out an opaque `sync` cursor with every `/events` response. A
 * cursor that is too old (or absent) is answered with HTTP 412, and that 412
 * body still carries a fresh cursor. Everything here hinges on treating that
 * one status as data rather than failure.
 *
 * Cursors are scoped to the resource they were issued for; never reuse one
 * across resources.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { type AsanaClient } from "./client.ts";
import { DEFAULT_POLL_INTERVAL_MS } from "./config.ts";
import { SdkError, SyncExpiredError, toSdkError } from "./errors.ts";
import { decodeJson, throwIfError } from "./http.ts";
import { EventPageSchema, type AsanaEvent, type EventPage } from "./types.ts";
import { type Logger } from "../lib/logger.ts";

export type FetchPageResult = {
  readonly page: EventPage;
  /** The server rejected the cursor; `page.sync` is its replacement. */
  readonly cursorExpired: boolean;
};

export type SyncResult = {
  readonly sync: string;
  readonly events: AsanaEvent[];
  readonly cursorExpired: boolean;
};

export type DrainResult = {
  readonly events: AsanaEvent[];
  readonly sync: string;
};

export type PollSignal =
  | { readonly kind: "event"; readonly event: AsanaEvent }
  | { readonly kind: "error"; readonly error: SdkError };

export type PollOptions = {
  /** Sleep between fetch cycles, in ms. */
  readonly intervalMs?: number;
  /** Stops the loop before the next fetch, or mid-fetch / mid-sleep. */
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
};

function requireResource(resource: string): void {
  if (!resource.trim()) {
    throw new SdkError(
      "Resource GID is required for the events endpoint.",
      "INVALID_INPUT",
      "Pass --gid <resource gid>.",
    );
  }
}

// ── Single page ──────────────────────────────────────────────────────

/**
 * One `GET /events`. An empty cursor is left off the query.
 * 412 resolves with `cursorExpired: true`; other statuses >= 400 throw.
 */
export async function fetchPage(
  client: AsanaClient,
  resource: string,
  cursor: string,
  opts: { readonly signal?: AbortSignal } = {},
): Promise<FetchPageResult> {
  requireResource(resource);
  const raw = await client.send("GET", "/events", {
    query: { resource, sync: cursor || undefined },
    signal: opts.signal,
  });

  if (raw.status === 412) {
    return { page: decodeJson(EventPageSchema, raw, "events page (412)"), cursorExpired: true };
  }
  throwIfError(raw);
  return { page: decodeJson(EventPageSchema, raw, "events page"), cursorExpired: false };
}

// ── Handshake ────────────────────────────────────────────────────────

/**
 * Obtains a cursor for "now". Both 2xx and 412 are success: the response
 * carries the cursor either way, and `events` is whatever backlog came with it.
 */
export async function initializeOrRefreshCursor(
  client: AsanaClient,
  resource: string,
  opts: { readonly signal?: AbortSignal } = {},
): Promise<SyncResult> {
  const { page, cursorExpired } = await fetchPage(client, resource, "", opts);
  if (!page.sync) {
    throw new SdkError(
      `Events response for resource ${resource} carried no sync token.`,
      "DECODE_ERROR",
      "Retry; if it persists, check that the resource GID is a project, task or portfolio.",
    );
  }
  return { sync: page.sync, events: page.data, cursorExpired };
}

// ── Full drain ───────────────────────────────────────────────────────

/**
 * Fetches until `has_more` is false, chaining each page's cursor into the
 * next call. All-or-nothing: the first error discards what was collected.
 * A 412 part-way through throws SyncExpiredError holding the fresh cursor.
 */
export async function drainAll(
  client: AsanaClient,
  resource: string,
  cursor: string,
  opts: { readonly signal?: AbortSignal } = {},
): Promise<DrainResult> {
  const events: AsanaEvent[] = [];
  let current = cursor;

  for (;;) {
    const { page, cursorExpired } = await fetchPage(client, resource, current, opts);
    if (cursorExpired) throw new SyncExpiredError(resource, page.sync);

    events.push(...page.data);
    if (page.sync) current = page.sync;
    if (!page.has_more) return { events, sync: current };
  }
}

// ── Poll loop ────────────────────────────────────────────────────────

/**
 * Fetch, emit, sleep, repeat; never ends on its own.
 *
 * Each event is yielded before the next is read, so a slow consumer stalls
 * the loop instead of growing a backlog. Failed cycles yield an error and keep
 * the cursor. A 412 on a cursor yields SYNC_EXPIRED; on an empty cursor it is
 * the initial handshake and reports nothing. Either way the page's events are
 * emitted and the fresh cursor adopted.
 * Aborting `signal`, or leaving the `for await`, ends the iteration quietly.
 */
export async function* poll(
  client: AsanaClient,
  resource: string,
  cursor: string,
  opts: PollOptions = {},
): AsyncGenerator<PollSignal, void, undefined> {
  requireResource(resource);
  const intervalMs = opts.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const logger = opts.logger ?? client.logger;
  const { signal } = opts;
  let current = cursor;
  let cycle = 0;

  while (!signal?.aborted) {
    cycle += 1;
    logger.debug({ resource, cycle, cursor: current ? "set" : "empty" }, "poll cycle");

    let result: FetchPageResult | undefined;
    let failure: SdkError | undefined;
    try {
      result = await fetchPage(client, resource, current, { signal });
    } catch (err) {
      if (signal?.aborted) return;
      failure = toSdkError(err);
    }

    if (failure) {
      logger.warn({ resource, cycle, code: failure.code, status: failure.status }, failure.message);
      yield { kind: "error", error: failure };
    } else if (result) {
      if (result.cursorExpired && current) {
        const expired = new SyncExpiredError(resource, result.page.sync);
        logger.warn({ resource, cycle, code: expired.code }, "sync token expired; adopting fresh token");
        yield { kind: "error", error: expired };
      } else if (result.cursorExpired) {
        logger.debug({ resource, cycle }, "initialized sync token");
      }
      for (const event of result.page.data) {
        yield { kind: "event", event };
      }
      if (result.page.sync) current = result.page.sync;
    }

    if (signal?.aborted) return;
    try {
      await sleep(intervalMs, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) return;
      throw err;
    }
  }
}

// ── Two-channel form ─────────────────────────────────────────────────

/**
 * Unbuffered hand-off: `send` resolves once a reader has taken the value.
 * After `close`, pending and later sends resolve immediately and are dropped,
 * and `onClose` runs once.
 */
class Channel<T> implements AsyncIterable<T> {
  private readonly readers: ((result: IteratorResult<T, undefined>) => void)[] = [];
  private readonly writers: { value: T; delivered: () => void }[] = [];
  private readonly onClose: (() => void) | undefined;
  private closed = false;

  constructor(onClose?: () => void) {
    this.onClose = onClose;
  }

  send(value: T): Promise<void> {
    if (this.closed) return Promise.resolve();
    const reader = this.readers.shift();
    if (reader) {
      reader({ value, done: false });
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.writers.push({ value, delivered: resolve });
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const reader of this.readers.splice(0)) reader({ value: undefined, done: true });
    for (const writer of this.writers.splice(0)) writer.delivered();
    this.onClose?.();
  }

  next(): Promise<IteratorResult<T, undefined>> {
    const writer = this.writers.shift();
    if (writer) {
      writer.delivered();
      return Promise.resolve({ value: writer.value, done: false });
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.readers.push(resolve);
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}

export type PollChannels = {
  readonly events: AsyncIterable<AsanaEvent>;
  readonly errors: AsyncIterable<SdkError>;
  /** Cancels the loop and closes both channels. */
  stop(): void;
  /** Settles once the loop has ended and both channels are closed. */
  readonly done: Promise<void>;
};

/**
 * Runs `poll` in the background and routes its output onto two channels.
 * Both must be read: the loop waits on whichever one it is writing to.
 * Leaving the `events` loop stops polling; leaving the `errors` loop only
 * discards later errors.
 */
export function pollChannels(
  client: AsanaClient,
  resource: string,
  cursor: string,
  opts: PollOptions = {},
): PollChannels {
  const controller = new AbortController();
  const events = new Channel<AsanaEvent>(() => controller.abort());
  const errors = new Channel<SdkError>();
  const signal = opts.signal ? AbortSignal.any([controller.signal, opts.signal]) : controller.signal;

  const stop = (): void => {
    controller.abort();
    events.close();
    errors.close();
  };
  signal.addEventListener("abort", stop, { once: true });

  const done = (async () => {
    try {
      for await (const s of poll(client, resource, cursor, { ...opts, signal })) {
        if (s.kind === "event") await events.send(s.event);
        else await errors.send(s.error);
      }
    } catch (err) {
      await errors.send(toSdkError(err));
    } finally {
      signal.removeEventListener("abort", stop);
      events.close();
      errors.close();
    }
  })();

  return { events, errors, stop, done };
}
