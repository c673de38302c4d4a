import { describe, it, expect } from "vitest";
import { z } from "zod";
import { apiPath, buildUrl, createRequestFn, createSendFn, extractErrorMessage, paginate } from "../http.ts";
import { SdkError } from "../errors.ts";
import { BASE_URL, scriptedFetch, type StubReply } from "./stub.ts";

const Item = z.object({ gid: z.string(), name: z.string() });

function transport(replies: readonly StubReply[]) {
  const { fetchImpl, calls } = scriptedFetch(replies);
  const send = createSendFn("test-secret", BASE_URL, fetchImpl);
  return { send, request: createRequestFn(send), calls };
}

describe("buildUrl", () => {
  it("joins base and path and skips undefined params", () => {
    expect(buildUrl("https://x.test/api/1.0/", "/tasks", { a: "1", b: undefined, c: false })).toBe(
      "https://x.test/api/1.0/tasks?a=1&c=false",
    );
  });
});

describe("apiPath", () => {
  it("encodes each GID as one path segment", () => {
    expect(apiPath`/workspaces/${"123"}/users`).toBe("/workspaces/123/users");
    expect(apiPath`/tasks/${"../users/me"}`).toBe("/tasks/..%2Fusers%2Fme");
    expect(apiPath`/tasks/${"1?opt_fields=notes#x"}`).toBe("/tasks/1%3Fopt_fields%3Dnotes%23x");
  });

  it("rejects empty and dot segments", () => {
    for (const gid of ["", " ", ".", ".."]) {
      expect(() => apiPath`/tasks/${gid}`).toThrow(SdkError);
      expect(() => apiPath`/tasks/${gid}`).toThrow(`Invalid GID "${gid}".`);
    }
  });
});

describe("createRequestFn", () => {
  it("wraps a JSON body in { data } and unwraps the response", async () => {
    const { request, calls } = transport([{ body: { data: { gid: "1", name: "test" } } }]);
    const result = await request("POST", "/tasks", Item, { body: { name: "Test Task" } });

    expect(result).toEqual({ gid: "1", name: "test" });
    expect(calls[0]?.method).toBe("POST");
    expect(calls[0]?.body).toBe('{"data":{"name":"Test Task"}}');
    expect(calls[0]?.headers.get("content-type")).toBe("application/json");
    expect(calls[0]?.headers.get("accept")).toBe("application/json");
  });

  it("form-encodes a form body", async () => {
    const { request, calls } = transport([{ body: { data: { gid: "1", name: "n" } } }]);
    await request("POST", "/webhooks", Item, { form: { resource: "42", target: "https://hook.test/a b" } });

    expect(calls[0]?.headers.get("content-type")).toBe("application/x-www-form-urlencoded");
    expect(calls[0]?.body).toBe("resource=42&target=https%3A%2F%2Fhook.test%2Fa+b");
  });

  it("carries status 400 and errors[0].message", async () => {
    const { request } = transport([
      { status: 400, body: { errors: [{ message: "workspace: Missing input" }] } },
    ]);
    const err = await request("GET", "/tasks", z.array(Item)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(SdkError);
    expect(err).toMatchObject({ status: 400, message: "workspace: Missing input", code: "API_ERROR" });
  });

  it.each([
    [401, "AUTH_MISSING"],
    [403, "FORBIDDEN"],
    [404, "NOT_FOUND"],
    [429, "RATE_LIMITED"],
    [500, "API_ERROR"],
  ])("maps status %i to %s", async (status, code) => {
    const { request } = transport([{ status, body: { errors: [{ message: "nope" }] } }]);
    await expect(request("GET", "/tasks/1", Item)).rejects.toMatchObject({ code, status });
  });

  it("falls back to the raw body when the error envelope is missing", async () => {
    const { request } = transport([{ status: 502, text: "  upstream down \n", contentType: "text/plain" }]);
    await expect(request("GET", "/tasks/1", Item)).rejects.toMatchObject({
      status: 502,
      message: "upstream down",
    });
  });

  it("decodes {} for DELETE", async () => {
    const { request } = transport([{ body: { data: {} } }]);
    expect(await request("DELETE", "/webhooks/9", z.object({}))).toEqual({});
  });

  it("rejects a response without data as DECODE_ERROR", async () => {
    const { request } = transport([{ body: { items: [] } }]);
    await expect(request("GET", "/tasks/1", Item)).rejects.toMatchObject({ code: "DECODE_ERROR" });
  });

  it("turns a fetch rejection into NETWORK_ERROR", async () => {
    const send = createSendFn("test-secret", BASE_URL, () => Promise.reject(new TypeError("fetch failed")));
    await expect(createRequestFn(send)("GET", "/tasks/1", Item)).rejects.toMatchObject({
      code: "NETWORK_ERROR",
      message: "Network error: GET /tasks/1 (fetch failed)",
    });
  });
});

describe("extractErrorMessage", () => {
  it("uses the status line when the body is empty", () => {
    expect(
      extractErrorMessage({ status: 503, statusText: "Service Unavailable", contentType: "", text: "", json: undefined }),
    ).toBe("503 Service Unavailable");
  });
});

describe("paginate", () => {
  it("follows next_page.offset until it is absent", async () => {
    const { send, calls } = transport([
      { body: { data: [{ gid: "1", name: "a" }], next_page: { offset: "o1", path: "/tasks?offset=o1" } } },
      { body: { data: [{ gid: "2", name: "b" }], next_page: { offset: "o2" } } },
      { body: { data: [{ gid: "3", name: "c" }], next_page: null } },
    ]);
    const items = await paginate(send, "/tasks", Item, { project: "9" });

    expect(items.map((i) => i.gid)).toEqual(["1", "2", "3"]);
    expect(calls.map((c) => c.url.searchParams.get("offset"))).toEqual([null, "o1", "o2"]);
    expect(calls.every((c) => c.url.searchParams.get("project") === "9")).toBe(true);
  });

  it("stops on an empty offset", async () => {
    const { send, calls } = transport([
      { body: { data: [{ gid: "1", name: "a" }], next_page: { offset: "" } } },
      { body: { data: [{ gid: "2", name: "b" }] } },
    ]);
    expect(await paginate(send, "/tasks", Item)).toEqual([{ gid: "1", name: "a" }]);
    expect(calls).toHaveLength(1);
  });

  it("propagates the first failing page", async () => {
    const { send } = transport([
      { body: { data: [{ gid: "1", name: "a" }], next_page: { offset: "o1" } } },
      { status: 400, body: { errors: [{ message: "offset: Invalid offset" }] } },
    ]);
    await expect(paginate(send, "/tasks", Item)).rejects.toMatchObject({
      status: 400,
      message: "offset: Invalid offset",
    });
  });
});
