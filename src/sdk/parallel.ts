/**
 * Bounded-concurrency fan-out.
 *
 * Runs task factories with at most `concurrency` in flight and an optional
 * gap between worker starts.
 *
 * @example
 * const results = await parallel(
 *   workspaces.map((ws) => () => listWorkspaceUsers(client, ws.gid)),
 *   { concurrency: 3 },
 * );
 */

import { setTimeout as sleep } from "node:timers/promises";

export type ParallelOpts = {
  /** Maximum simultaneous in-flight tasks. Default 5. */
  readonly concurrency?: number;
  /** Delay between starting workers, in ms. Default 100. */
  readonly delayMs?: number;
};

export type ParallelResult<T> =
  | { readonly ok: true; readonly value: T; readonly index: number }
  | { readonly ok: false; readonly error: unknown; readonly index: number };

/**
 * Never rejects: each input gets a ParallelResult at its own index.
 * Filter for `!result.ok` to fail fast.
 */
export async function parallel<T>(
  tasks: readonly (() => Promise<T>)[],
  opts: ParallelOpts = {},
): Promise<ParallelResult<T>[]> {
  const concurrency = Math.max(1, opts.concurrency ?? 5);
  const delayMs = opts.delayMs ?? 100;

  const results: ParallelResult<T>[] = new Array<ParallelResult<T>>(tasks.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < tasks.length) {
      const index = next++;
      const task = tasks[index];
      if (!task) continue;
      try {
        results[index] = { ok: true, value: await task(), index };
      } catch (error) {
        results[index] = { ok: false, error, index };
      }
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, tasks.length); i += 1) {
    workers.push(worker());
    if (delayMs > 0) await sleep(delayMs);
  }
  await Promise.all(workers);

  return results;
}
