import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { CONFIG_FILE, createClient, createClientFromEnv, type ClientConfig } from "../client.ts";
import { SdkError } from "../errors.ts";
import { BASE_URL, scriptedFetch } from "./stub.ts";

const zebraAlpha = [
  { gid: "200", name: "Zebra Corp" },
  { gid: "100", name: "Alpha Inc" },
];

let configDir: string;

beforeEach(async () => {
  configDir = await mkdtemp(join(tmpdir(), "pulse-client-"));
});

afterEach(async () => {
  await rm(configDir, { recursive: true, force: true });
});

function workspaceClient(
  workspaces: ReadonlyArray<{ gid: string; name: string }>,
  extra: Partial<ClientConfig> = {},
) {
  const { fetchImpl, calls } = scriptedFetch([{ body: { data: workspaces } }]);
  const client = createClient({ token: "test-secret", baseUrl: BASE_URL, fetchImpl, configDir, ...extra });
  return { client, calls };
}

describe("createClient", () => {
  it("throws AUTH_MISSING when the token is blank", () => {
    expect(() => createClient({ token: "" })).toThrow(SdkError);
    expect(() => createClient({ token: "  " })).toThrow("Asana bearer token is required.");
  });

  it("falls back to the lexicographically first workspace", async () => {
    const { client, calls } = workspaceClient(zebraAlpha);

    expect(await client.getWorkspace()).toEqual({ gid: "100", name: "Alpha Inc", source: "fallback" });
    expect(calls[0]?.url.pathname).toBe("/api/1.0/workspaces");
  });

  it("honours an explicit GID", async () => {
    const { client } = workspaceClient(zebraAlpha, { workspaceRef: "200" });
    expect(await client.getWorkspace()).toEqual({ gid: "200", name: "Zebra Corp", source: "explicit" });
  });

  it("matches an explicit name case-insensitively", async () => {
    const { client } = workspaceClient(zebraAlpha, { workspaceRef: "zebra corp" });
    expect(await client.getWorkspaceGid()).toBe("200");
  });

  it("prefers the explicit ref over the environment", async () => {
    const { client } = workspaceClient(zebraAlpha, { workspaceRef: "100", envWorkspaceRef: "200" });
    expect(await client.getWorkspace()).toMatchObject({ gid: "100", source: "explicit" });
  });

  it("uses the environment ref when no explicit one is given", async () => {
    const { client } = workspaceClient(zebraAlpha, { envWorkspaceRef: "200" });
    expect(await client.getWorkspace()).toMatchObject({ gid: "200", source: "env" });
  });

  it("reads the workspace from the config file", async () => {
    await writeFile(join(configDir, CONFIG_FILE), JSON.stringify({ workspace: "Zebra Corp" }));
    const { client } = workspaceClient(zebraAlpha);
    expect(await client.getWorkspace()).toMatchObject({ gid: "200", source: "config" });
  });

  it("rejects a config file that is not JSON", async () => {
    await writeFile(join(configDir, CONFIG_FILE), "{ workspace:");
    const { client } = workspaceClient(zebraAlpha);
    await expect(client.getWorkspace()).rejects.toMatchObject({ code: "INVALID_INPUT" });
  });

  it("throws WORKSPACE_NOT_FOUND for an unknown ref", async () => {
    const { client } = workspaceClient([{ gid: "100", name: "Alpha Inc" }], { workspaceRef: "999" });
    await expect(client.getWorkspaceGid()).rejects.toMatchObject({
      code: "WORKSPACE_NOT_FOUND",
      message: 'Workspace "999" (from --workspace) not found.',
    });
  });

  it("throws AMBIGUOUS_WORKSPACE when a name matches twice", async () => {
    const { client } = workspaceClient(
      [
        { gid: "1", name: "Acme" },
        { gid: "2", name: "ACME" },
      ],
      { workspaceRef: "acme" },
    );
    await expect(client.getWorkspace()).rejects.toMatchObject({ code: "AMBIGUOUS_WORKSPACE" });
  });

  it("throws NO_WORKSPACE when the token sees none", async () => {
    const { client } = workspaceClient([]);
    await expect(client.getWorkspaceGid()).rejects.toMatchObject({ code: "NO_WORKSPACE" });
  });

  it("resolves the workspace once", async () => {
    const { client, calls } = workspaceClient([{ gid: "100", name: "A" }]);
    await Promise.all([client.getWorkspaceGid(), client.getWorkspaceGid()]);
    await client.getWorkspaceGid();
    expect(calls).toHaveLength(1);
  });

  it("retries resolution after a failure", async () => {
    const { fetchImpl, calls } = scriptedFetch([
      { status: 500, body: { errors: [{ message: "Server Error" }] } },
      { body: { data: [{ gid: "100", name: "A" }] } },
    ]);
    const client = createClient({ token: "test-secret", baseUrl: BASE_URL, fetchImpl, configDir });

    await expect(client.getWorkspaceGid()).rejects.toMatchObject({ status: 500 });
    expect(await client.getWorkspaceGid()).toBe("100");
    expect(calls).toHaveLength(2);
  });
});

describe("createClientFromEnv", () => {
  it("throws AUTH_MISSING without a token variable", () => {
    expect(() => createClientFromEnv({}, {})).toThrow("No Asana token found.");
  });

  it("takes the token, base URL and workspace from the environment", async () => {
    const { fetchImpl, calls } = scriptedFetch([{ body: { data: zebraAlpha } }]);
    const client = createClientFromEnv(
      { fetchImpl, configDir },
      { ASANA_PAT: "test-secret", ASANA_BASE_URL: BASE_URL, ASANA_WORKSPACE_GID: "200" },
    );

    expect(await client.getWorkspace()).toMatchObject({ gid: "200", source: "env" });
    expect(calls[0]?.headers.get("authorization")).toBe("Bearer test-secret");
  });
});
