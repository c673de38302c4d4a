import { describe, it, expect, vi } from "vitest";
import { createClient } from "../client.ts";
import { getCurrentUser, listUsersByWorkspace } from "../users.ts";
import { BASE_URL, stubClient } from "./stub.ts";

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

describe("getCurrentUser", () => {
  it("reads /users/me with its workspaces", async () => {
    const { client, calls } = stubClient([
      { body: { data: { gid: "u1", name: "Ali", email: "ali@example.test", workspaces: [{ gid: "1", name: "Eng" }] } } },
    ]);
    const me = await getCurrentUser(client);

    expect(me.workspaces).toEqual([{ gid: "1", name: "Eng" }]);
    expect(calls[0]?.url.pathname).toBe("/api/1.0/users/me");
    expect(calls[0]?.url.searchParams.get("opt_fields")).toBe("gid,name,email,workspaces.name");
  });
});

describe("listUsersByWorkspace", () => {
  it("reports a failing workspace in its own entry", async () => {
    const fetchImpl = vi.fn(async (input: string | URL | Request) => {
      const path = new URL(input instanceof Request ? input.url : input).pathname;
      switch (path) {
        case "/api/1.0/workspaces":
          return json(200, { data: [{ gid: "2", name: "Ops" }, { gid: "1", name: "Eng" }] });
        case "/api/1.0/workspaces/1/users":
          return json(200, { data: [{ gid: "u2", name: "Sam" }, { gid: "u1", name: "Ali" }] });
        default:
          return json(403, { errors: [{ message: "Not authorized" }] });
      }
    });
    const client = createClient({ token: "test-secret", baseUrl: BASE_URL, fetchImpl });

    const result = await listUsersByWorkspace(client);

    expect(result).toEqual([
      {
        workspace: { gid: "1", name: "Eng" },
        ok: true,
        users: [
          { gid: "u1", name: "Ali" },
          { gid: "u2", name: "Sam" },
        ],
      },
      {
        workspace: { gid: "2", name: "Ops" },
        ok: false,
        error: { message: "Not authorized", code: "FORBIDDEN" },
      },
    ]);
  });
});
