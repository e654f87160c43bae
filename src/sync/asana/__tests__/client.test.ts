import { describe, expect, it } from "vitest";
import { AsanaClient } from "../client";
import { AsanaApiError } from "@/sync/errors";

interface FakeResponse {
  status: number;
  body?: unknown;
  headers?: Record<string, string>;
}

function fakeFetch(responses: FakeResponse[]) {
  const urls: string[] = [];
  const headers: HeadersInit[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    urls.push(String(input));
    if (init?.headers) headers.push(init.headers);
    const next = responses.shift();
    if (!next) throw new Error("unexpected request");
    return new Response(JSON.stringify(next.body ?? {}), { status: next.status, headers: next.headers });
  };
  return { fetchImpl, urls, headers };
}

function client(responses: FakeResponse[], maxAttempts = 3) {
  const fake = fakeFetch(responses);
  const sleeps: number[] = [];
  const asana = new AsanaClient({
    token: "test-token",
    baseUrl: "https://asana.test/api/1.0/",
    maxAttempts,
    fetchImpl: fake.fetchImpl,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
  });
  return { asana, sleeps, ...fake };
}

describe("AsanaClient", () => {
  it("sends the bearer token and fetches a project", async () => {
    const { asana, urls, headers } = client([{ status: 200, body: { data: { gid: "1001", name: "Portal" } } }]);

    const outcome = await asana.getProject("1001");

    expect(outcome.status).toBe("ok");
    if (outcome.status === "ok") expect(outcome.data.name).toBe("Portal");
    expect(urls[0].startsWith("https://asana.test/api/1.0/projects/1001?opt_fields=")).toBe(true);
    expect(headers[0]).toEqual({ Authorization: "Bearer test-token", Accept: "application/json" });
  });

  it("retries rate limits after the advertised delay", async () => {
    const { asana, sleeps } = client([
      { status: 429, headers: { "retry-after": "2" } },
      { status: 200, body: { data: [{ gid: "t1" }] } },
    ]);

    const outcome = await asana.getProjectTasks("1001");

    expect(outcome).toEqual({
      status: "ok",
      data: [{ gid: "t1", name: null, completed: false, createdAt: null, completedAt: null, modifiedAt: null }],
    });
    expect(sleeps).toEqual([2000]);
  });

  it("backs off exponentially and reports exhaustion as transient", async () => {
    const { asana, sleeps, urls } = client([{ status: 503 }, { status: 503 }, { status: 503 }]);

    const outcome = await asana.listStatusUpdates("1001");

    expect(outcome.status).toBe("transient");
    expect(sleeps).toEqual([1000, 2000]);
    expect(urls).toHaveLength(3);
  });

  it("reports forbidden and missing projects without retrying", async () => {
    const { asana, urls, sleeps } = client([{ status: 403 }, { status: 404 }]);

    expect(await asana.getProject("1")).toEqual({ status: "forbidden" });
    expect(await asana.getProject("2")).toEqual({ status: "not_found" });
    expect(urls).toHaveLength(2);
    expect(sleeps).toEqual([]);
  });

  it("reports other client errors as failed", async () => {
    const { asana } = client([{ status: 400, body: { errors: [] } }]);
    const outcome = await asana.getProjectTasks("1001");
    expect(outcome.status).toBe("failed");
  });

  it("follows next_page offsets", async () => {
    const { asana, urls } = client([
      { status: 200, body: { data: [{ gid: "t1" }], next_page: { offset: "abc" } } },
      { status: 200, body: { data: [{ gid: "t2" }], next_page: null } },
    ]);

    const outcome = await asana.getProjectTasks("1001");

    expect(outcome.status === "ok" ? outcome.data.map((t) => t.gid) : []).toEqual(["t1", "t2"]);
    expect(new URL(urls[0]).searchParams.get("offset")).toBeNull();
    expect(new URL(urls[1]).searchParams.get("offset")).toBe("abc");
    expect(new URL(urls[1]).searchParams.get("limit")).toBe("100");
  });

  it("lists only unarchived projects unless asked", async () => {
    const { asana, urls } = client([
      { status: 200, body: { data: [{ gid: "1" }] } },
      { status: 200, body: { data: [{ gid: "1" }, { gid: "2" }] } },
    ]);

    expect(await asana.listActiveProjects({ workspaceGid: "ws-1" })).toHaveLength(1);
    expect(await asana.listActiveProjects({ workspaceGid: "ws-1", includeArchived: true })).toHaveLength(2);
    expect(new URL(urls[0]).searchParams.get("archived")).toBe("false");
    expect(new URL(urls[1]).searchParams.get("archived")).toBeNull();
    expect(new URL(urls[0]).searchParams.get("workspace")).toBe("ws-1");
  });

  it("throws when the project listing cannot be obtained", async () => {
    const { asana } = client([{ status: 401 }]);
    await expect(asana.listActiveProjects({ workspaceGid: "ws-1" })).rejects.toBeInstanceOf(AsanaApiError);
  });
});
