// ── HATEOAS JSON Output ─────────────────────────────────────────────

import type { SdkErrorCode } from "../sdk/errors.ts";

export const BIN = "asana-pulse";

type NextActionParam = {
  description?: string;
  value?: string | number;
  default?: string | number;
  enum?: string[];
  required?: boolean;
};

export type NextAction = {
  command: string;
  description: string;
  params?: Record<string, NextActionParam>;
};

type TruncationMeta = {
  truncated: boolean;
  total: number;
  showing: number;
};

export const MAX_LIST_ITEMS = 50;

/** Caps a list for display and reports what was cut. */
export function truncate<T>(items: readonly T[], limit = MAX_LIST_ITEMS): { items: T[]; meta: TruncationMeta } {
  return {
    items: items.slice(0, limit),
    meta: {
      truncated: items.length > limit,
      total: items.length,
      showing: Math.min(items.length, limit),
    },
  };
}

export function envelope(command: string, result: unknown, nextActions: readonly NextAction[] = []) {
  return {
    ok: true as const,
    command: `${BIN} ${command}`,
    result,
    next_actions: nextActions,
  };
}

export function ok(command: string, result: unknown, nextActions: readonly NextAction[] = []): void {
  console.log(JSON.stringify(envelope(command, result, nextActions), null, 2));
}

/** One compact JSON document per line, for streaming commands. */
export function line(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value)}\n`);
}

export type FatalOptions = {
  code?: SdkErrorCode;
  status?: number;
  fix?: string;
  command?: string;
  nextActions?: readonly NextAction[];
};

export function errorEnvelope(message: string, opts: FatalOptions = {}) {
  return {
    ok: false as const,
    command: opts.command ? `${BIN} ${opts.command}` : undefined,
    error: {
      message,
      code: opts.code ?? "COMMAND_FAILED",
      ...(opts.status !== undefined ? { status: opts.status } : {}),
    },
    fix: opts.fix ?? "Check the error message and retry with corrected input.",
    next_actions: opts.nextActions ?? [{ command: `${BIN} --help`, description: "Show available commands" }],
  };
}

export function fatal(message: string, opts: FatalOptions = {}): never {
  console.error(JSON.stringify(errorEnvelope(message, opts)));
  process.exit(1);
}

/** Compact error document on stderr; the process keeps running. */
export function errorLine(message: string, opts: FatalOptions = {}): void {
  console.error(JSON.stringify(errorEnvelope(message, opts)));
}
