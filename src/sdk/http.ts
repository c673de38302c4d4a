/**
 * Injectable HTTP transport for the Asana REST API.
 *
 * Two layers:
 *  - `SendFn` performs one call and hands back the raw status and body, with no
 *    opinion about which statuses are failures. The event core uses it to treat
 *    412 as a response rather than an error.
 *  - `RequestFn` sits on top: statuses >= 400 become SdkError, bodies are
 *    decoded through a zod schema and unwrapped from `{ data }`.
 *
 * Tests stub the `fetchImpl` with canned `Response` objects.
 */

import { z } from "zod";
import { SdkError, codeForStatus, fixForCode } from "./errors.ts";
import { silentLogger, type Logger } from "../lib/logger.ts";

export const ASANA_BASE_URL = "https://app.asana.com/api/1.0";
export const DEFAULT_TIMEOUT_MS = 30_000;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type RequestOptions = {
  readonly query?: QueryParams;
  /** JSON body; sent wrapped as `{ "data": body }`. */
  readonly body?: unknown;
  /** Form fields; sent as application/x-www-form-urlencoded. Ignored when `body` is set. */
  readonly form?: Readonly<Record<string, string>>;
  /** Optional per-call signal. Merged with the transport timeout. */
  readonly signal?: AbortSignal;
};

export type RawResponse = {
  readonly status: number;
  readonly statusText: string;
  readonly contentType: string;
  readonly text: string;
  /** Parsed body, or `undefined` when the body is not JSON. */
  readonly json: unknown;
};

export type SendFn = (
  method: HttpMethod,
  path: string,
  opts?: RequestOptions,
) => Promise<RawResponse>;

export type RequestFn = <T>(
  method: HttpMethod,
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  opts?: RequestOptions,
) => Promise<T>;

export type TransportOptions = {
  readonly timeoutMs?: number;
  readonly logger?: Logger;
};

export const NextPageSchema = z.object({
  offset: z.string().nullish(),
  path: z.string().nullish(),
  uri: z.string().nullish(),
});
export type NextPage = z.infer<typeof NextPageSchema>;

// ── URL builder ──────────────────────────────────────────────────────

export function buildUrl(baseUrl: string, path: string, params?: QueryParams): string {
  const url = new URL(path.startsWith("http") ? path : `${baseUrl.replace(/\/+$/, "")}${path}`);
  if (params) {
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined) url.searchParams.set(k, String(v));
    }
  }
  return url.toString();
}

/**
 * Tagged template for API paths: every interpolated value is encoded as a
 * single path segment.
 *
 * @example
 * apiPath`/workspaces/${gid}/users` // "/workspaces/123/users"
 */
export function apiPath(strings: TemplateStringsArray, ...segments: readonly string[]): string {
  let out = strings[0] ?? "";
  segments.forEach((segment, i) => {
    const trimmed = segment.trim();
    if (trimmed === "" || trimmed === "." || trimmed === "..") {
      throw new SdkError(`Invalid GID "${segment}".`, "INVALID_INPUT", "Pass the numeric GID of the resource.");
    }
    out += encodeURIComponent(trimmed) + (strings[i + 1] ?? "");
  });
  return out;
}

// ── Response handling ────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function tryParse(text: string): unknown {
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
}

async function safeText(res: Response): Promise<string> {
  try { return await res.text(); } catch { return ""; }
}

function parseJsonBody(contentType: string, text: string): unknown {
  if (!contentType.includes("application/json") || text.length === 0) return undefined;
  return tryParse(text);
}

/**
 * Message for a failed response: `errors[0].message` when the body carries the
 * Asana error envelope, else the raw body, else the status line.
 */
export function extractErrorMessage(raw: RawResponse): string {
  const body = raw.json ?? tryParse(raw.text);
  if (isRecord(body)) {
    const errors = body["errors"];
    if (Array.isArray(errors) && errors.length > 0) {
      const first: unknown = errors[0];
      if (isRecord(first) && typeof first["message"] === "string" && first["message"].trim()) {
        return first["message"];
      }
    }
  }
  const text = raw.text.trim();
  if (text) return text;
  return `${raw.status} ${raw.statusText}`.trim();
}

export function errorForResponse(raw: RawResponse): SdkError {
  const code = codeForStatus(raw.status);
  return new SdkError(
    extractErrorMessage(raw),
    code,
    fixForCode(code, raw.status, raw.statusText),
    raw.status,
  );
}

export function throwIfError(raw: RawResponse): void {
  if (raw.status >= 400) throw errorForResponse(raw);
}

/** Validates a parsed body against `schema`; failures are DECODE_ERROR. */
export function decode<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  what: string,
): T {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
  throw new SdkError(
    `Failed to decode ${what}${where}: ${issue?.message ?? "invalid shape"}`,
    "DECODE_ERROR",
    "The API returned an unexpected shape. Retry, or report the response body.",
  );
}

export function decodeJson<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: RawResponse,
  what: string,
): T {
  if (raw.json === undefined) {
    throw new SdkError(
      `API returned non-JSON (content-type: ${raw.contentType || "unknown"}): ${raw.text.slice(0, 200)}`,
      "DECODE_ERROR",
    );
  }
  return decode(schema, raw.json, what);
}

// ── Factories ────────────────────────────────────────────────────────

function mergeSignals(timeoutMs: number, signal: AbortSignal | undefined): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([timeout, signal]) : timeout;
}

/**
 * Returns a `SendFn` bound to `token` and `baseUrl`.
 * Never throws for HTTP statuses; network failures are NETWORK_ERROR.
 */
export function createSendFn(
  token: string,
  baseUrl = ASANA_BASE_URL,
  fetchImpl: typeof fetch = fetch,
  opts: TransportOptions = {},
): SendFn {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const logger = opts.logger ?? silentLogger;

  return async function send(method, path, reqOpts) {
    const url = buildUrl(baseUrl, path, reqOpts?.query);
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: "application/json",
    };

    let body: string | undefined;
    if (reqOpts?.body !== undefined) {
      headers["Content-Type"] = "application/json";
      body = JSON.stringify({ data: reqOpts.body });
    } else if (reqOpts?.form !== undefined) {
      headers["Content-Type"] = "application/x-www-form-urlencoded";
      body = new URLSearchParams({ ...reqOpts.form }).toString();
    }

    let res: Response;
    try {
      res = await fetchImpl(url, {
        method,
        headers,
        body,
        signal: mergeSignals(timeoutMs, reqOpts?.signal),
      });
    } catch (cause) {
      throw new SdkError(
        `Network error: ${method} ${path}${cause instanceof Error ? ` (${cause.message})` : ""}`,
        "NETWORK_ERROR",
        "Check network connectivity and retry.",
      );
    }

    const contentType = (res.headers.get("content-type") ?? "").toLowerCase();
    const text = await safeText(res);
    logger.debug({ method, path, status: res.status }, "asana request");

    return {
      status: res.status,
      statusText: res.statusText,
      contentType,
      text,
      json: parseJsonBody(contentType, text),
    };
  };
}

/**
 * Wraps a `SendFn` into the decoding, error-raising `RequestFn`.
 * DELETE and 204 responses decode `{}` against the schema.
 */
export function createRequestFn(send: SendFn): RequestFn {
  return async function request<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    opts?: RequestOptions,
  ): Promise<T> {
    const raw = await send(method, path, opts);
    throwIfError(raw);

    if (method === "DELETE" || raw.status === 204) {
      return decode(schema, {}, `${method} ${path}`);
    }

    const envelope = decodeJson(z.object({ data: schema }), raw, `${method} ${path}`);
    return envelope.data;
  };
}

// ── Paginator ────────────────────────────────────────────────────────

/**
 * Collects all pages using Asana's offset-based pagination, one page at a time.
 * Stops when `next_page` or its offset is absent or empty.
 */
export async function paginate<T>(
  send: SendFn,
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  query: QueryParams = {},
): Promise<T[]> {
  const pageSchema = z.object({
    data: z.array(schema),
    next_page: NextPageSchema.nullish(),
  });
  const all: T[] = [];
  let offset: string | undefined;

  do {
    const pageQuery: QueryParams = offset === undefined ? query : { ...query, offset };
    const raw = await send("GET", path, { query: pageQuery });
    throwIfError(raw);
    const page = decodeJson(pageSchema, raw, `GET ${path}`);
    all.push(...page.data);
    offset = page.next_page?.offset || undefined;
  } while (offset !== undefined);

  return all;
}
