import { beforeEach, describe, expect, it } from "vitest";
import { runRulesOnly, runSync } from "../index";
import { openDatabase } from "@/sync/ledger/db";
import { SqliteStateStore } from "@/sync/ledger/repository";
import { defaultRulesConfig, parseRulesConfig, type RulesConfig } from "@/sync/config/rules";
import { StoreUnavailableError } from "@/sync/errors";
import type { ProjectRecord } from "@/sync/types";
import type { ProjectPayload } from "@/sync/types/remote";
import { notifyPendingFindings, type Notifier } from "@/sync/notify/notifier";
import { FakeRemote, RecordingNotifier } from "./fakes";
import { NOW, dateIn, daysAgo, makePayload, makeTask } from "./fixtures";

class FailingStore extends SqliteStateStore {
  private upserts = 0;

  constructor(private readonly failAfter: number) {
    super(openDatabase(":memory:"));
  }

  upsertProject(record: ProjectRecord): void {
    this.upserts++;
    if (this.upserts > this.failAfter) throw new StoreUnavailableError("disk I/O error");
    super.upsertProject(record);
  }
}

class UnloggableStore extends SqliteStateStore {
  constructor() {
    super(openDatabase(":memory:"));
  }

  recordInaccessible(): void {
    throw new Error("constraint failed");
  }
}

const recentTasks = (gid: string, n = 5) =>
  Array.from({ length: n }, (_, i) => makeTask({ gid: `${gid}-t${i}`, createdAt: daysAgo(1), modifiedAt: daysAgo(1) }));

const oldTasks = (gid: string, n: number) => Array.from({ length: n }, (_, i) => makeTask({ gid: `${gid}-t${i}` }));

function healthy(gid: string, overrides: Partial<ProjectPayload> = {}): ProjectPayload {
  return makePayload({ gid, name: `Project ${gid}`, customFields: { "PMO ID": `PMO-${gid}` }, ...overrides });
}

function stale(gid: string): ProjectPayload {
  return healthy(gid, { currentStatus: { status: "at_risk", createdAt: daysAgo(10), authorName: "Ana Rojas" } });
}

function newStore(): SqliteStateStore {
  return new SqliteStateStore(openDatabase(":memory:"));
}

function sync(remote: FakeRemote, store: SqliteStateStore, notifier: Notifier, extra: { workers?: number; rules?: RulesConfig } = {}) {
  return runSync({
    client: remote,
    store,
    notifier,
    rules: extra.rules ?? defaultRulesConfig(),
    workspaceGid: "ws-1",
    workers: extra.workers,
    now: NOW,
    clock: () => NOW,
  });
}

function findingSummary(store: SqliteStateStore): string[] {
  return store
    .listFindings("all")
    .map((f) => `${f.projectGid}:${f.ruleId}:${f.severity}:${f.status}`)
    .sort();
}

describe("runSync", () => {
  let remote: FakeRemote;
  let store: SqliteStateStore;
  let notifier: RecordingNotifier;

  beforeEach(() => {
    remote = new FakeRemote();
    store = newStore();
    notifier = new RecordingNotifier();
  });

  it("completes despite forbidden projects and records them", async () => {
    for (let i = 1; i <= 50; i++) remote.add(healthy(`p${i}`), recentTasks(`p${i}`));
    for (const gid of ["p7", "p21", "p42"]) remote.overrides.set(gid, { status: "forbidden" });

    const summary = await sync(remote, store, notifier, { workers: 8 });

    expect(summary.status).toBe("completed");
    expect(summary.counts.projectsSynced).toBe(47);
    expect(summary.counts.forbidden).toBe(3);
    expect(summary.errorMessage).toBeNull();
    expect(store.listInaccessible(summary.runId).map((e) => e.projectGid).sort()).toEqual(["p21", "p42", "p7"]);
    expect(store.getRun(summary.runId)).toMatchObject({ status: "completed", projectsSynced: 47 });
    expect(store.listProjects()).toHaveLength(47);
  });

  it("counts a forbidden project once when it cannot be logged", async () => {
    const unloggable = new UnloggableStore();
    remote.add(healthy("p1"), recentTasks("p1"));
    remote.overrides.set("p1", { status: "forbidden" });

    const summary = await sync(remote, unloggable, notifier);

    expect(summary.status).toBe("completed");
    expect(summary.counts).toMatchObject({ forbidden: 0, failed: 1, projectsSynced: 0 });
  });

  it("counts other fetch failures separately", async () => {
    remote.add(healthy("p1"), recentTasks("p1"));
    remote.add(healthy("p2"), recentTasks("p2"));
    remote.overrides.set("p1", { status: "failed", error: "400 bad request" });
    remote.overrides.set("p2", { status: "not_found" });

    const summary = await sync(remote, store, notifier);

    expect(summary.status).toBe("completed");
    expect(summary.counts).toMatchObject({ projectsSynced: 0, failed: 1, notFound: 1 });
    expect(store.listInaccessible(summary.runId).find((e) => e.projectGid === "p1")?.detail).toBe("400 bad request");
  });

  it("produces the same state with one worker or many", async () => {
    const seed = (r: FakeRemote) => {
      for (let i = 1; i <= 30; i++) {
        const gid = `p${i}`;
        const project = i % 3 === 0 ? stale(gid) : healthy(gid);
        r.add(project, i % 5 === 0 ? oldTasks(gid, 2) : recentTasks(gid));
      }
    };
    seed(remote);
    const sequential = newStore();
    const parallel = newStore();

    await sync(remote, sequential, new RecordingNotifier(), { workers: 1 });
    await sync(remote, parallel, new RecordingNotifier(), { workers: 8 });
    for (let i = 1; i <= 30; i += 4) remote.update(`p${i}`, { dueDate: dateIn(5) });
    await sync(remote, sequential, new RecordingNotifier(), { workers: 1 });
    await sync(remote, parallel, new RecordingNotifier(), { workers: 8 });

    expect(parallel.listProjects()).toEqual(sequential.listProjects());
    expect(findingSummary(parallel)).toEqual(findingSummary(sequential));
    const changes = (s: SqliteStateStore) =>
      s.listProjects().flatMap((p) => s.listChanges(p.gid).map((c) => `${c.projectGid}:${c.field}:${c.oldValue}:${c.newValue}`));
    expect(changes(parallel)).toEqual(changes(sequential));
    expect(changes(sequential)).toContain(`p1:due_date:null:${dateIn(5)}`);
  });

  it("logs field changes only after the first observation", async () => {
    remote.add(healthy("p1"), recentTasks("p1"));

    const first = await sync(remote, store, notifier);
    remote.update("p1", { dueDate: "2025-09-30", ownerName: "Luis Pérez" });
    const second = await sync(remote, store, notifier);

    expect(first.counts.changesDetected).toBe(0);
    expect(second.counts.changesDetected).toBe(2);
    expect(store.listChanges("p1").map((c) => [c.field, c.oldValue, c.newValue, c.syncId])).toEqual([
      ["due_date", null, "2025-09-30", second.runId],
      ["owner_name", "Ana Rojas", "Luis Pérez", second.runId],
    ]);
  });

  it("is idempotent for unchanged data", async () => {
    remote.add(stale("p1"), recentTasks("p1"));

    await sync(remote, store, notifier);
    const again = await sync(remote, store, notifier);

    expect(again.counts).toMatchObject({ changesDetected: 0, findingsCreated: 0, findingsEscalated: 0, findingsResolved: 0 });
    expect(findingSummary(store)).toEqual(["p1:no_status_update:medium:open"]);
    expect(notifier.sent).toHaveLength(1);
  });

  it("notifies on creation and escalation, never on resolution", async () => {
    remote.add(stale("p1"), recentTasks("p1"));
    const escalating = parseRulesConfig({ no_status_update: { severity: "high" } });

    const created = await sync(remote, store, notifier);
    const escalated = await sync(remote, store, notifier, { rules: escalating });
    remote.update("p1", { currentStatus: { status: "on_track", createdAt: daysAgo(1), authorName: "Ana Rojas" } });
    const resolved = await sync(remote, store, notifier, { rules: escalating });

    expect(created.counts.findingsCreated).toBe(1);
    expect(escalated.counts.findingsEscalated).toBe(1);
    expect(resolved.counts.findingsResolved).toBe(1);
    expect(notifier.sent).toEqual([
      { projectName: "Project p1", ruleId: "no_status_update", severity: "medium", kind: "created" },
      { projectName: "Project p1", ruleId: "no_status_update", severity: "high", kind: "escalated" },
    ]);
    expect(findingSummary(store)).toEqual(["p1:no_status_update:high:resolved"]);
  });

  it("skips escalation alerts when disabled", async () => {
    remote.add(stale("p1"), recentTasks("p1"));
    const quiet = parseRulesConfig({ no_status_update: { severity: "high" }, notifications: { notifyOnEscalation: false } });

    await sync(remote, store, notifier);
    await sync(remote, store, notifier, { rules: quiet });

    expect(notifier.sent.map((n) => n.kind)).toEqual(["created"]);
    expect(store.listUnnotifiedFindings()).toEqual([]);
  });

  it("re-sends an escalation alert that could not be delivered", async () => {
    remote.add(stale("p1"), recentTasks("p1"));
    const escalating = parseRulesConfig({ no_status_update: { severity: "high" } });

    await sync(remote, store, notifier);
    notifier.fail = true;
    await sync(remote, store, notifier, { rules: escalating });
    notifier.fail = false;

    expect(store.listUnnotifiedFindings().map((f) => f.severity)).toEqual(["high"]);
    expect(await notifyPendingFindings(store, notifier, () => NOW)).toEqual({ sent: 1, failed: 0 });
    expect(notifier.sent).toEqual([
      { projectName: "Project p1", ruleId: "no_status_update", severity: "medium", kind: "created" },
      { projectName: "Project p1", ruleId: "no_status_update", severity: "high", kind: "escalated" },
    ]);
    expect(store.listUnnotifiedFindings()).toEqual([]);
  });

  it("keeps findings when delivery fails", async () => {
    remote.add(stale("p1"), recentTasks("p1"));
    notifier.fail = true;

    const summary = await sync(remote, store, notifier);

    expect(summary.status).toBe("completed");
    expect(store.listUnnotifiedFindings().map((f) => f.ruleId)).toEqual(["no_status_update"]);
  });

  it("continues without status updates when they cannot be fetched", async () => {
    remote.add(healthy("p1"), recentTasks("p1"));
    remote.statusUpdatesFail = true;

    const summary = await sync(remote, store, notifier);

    expect(summary.counts.projectsSynced).toBe(1);
    expect(store.getProject("p1")?.status).toBe("on_track");
  });

  it("leaves projects without a PMO id out of scope", async () => {
    remote.add(healthy("p1"), recentTasks("p1"));
    remote.add(makePayload({ gid: "x1", customFields: {} }), []);

    const summary = await sync(remote, store, notifier);

    expect(summary.counts).toMatchObject({ projectsSynced: 1, outOfScope: 1 });
    expect(store.getProject("x1")).toBeUndefined();
  });

  it("resolves findings of a recently closed project", async () => {
    remote.add(stale("p1"), recentTasks("p1"));
    await sync(remote, store, notifier);

    remote.update("p1", { completed: true, completedAt: daysAgo(2) });
    const summary = await sync(remote, store, notifier);

    expect(summary.counts).toMatchObject({ projectsSynced: 1, findingsResolved: 1 });
    expect(store.getProject("p1")?.completedFlag).toBe(true);
  });

  it("archives long-closed projects to history once", async () => {
    remote.add(healthy("p1"), recentTasks("p1"));
    await sync(remote, store, notifier);

    remote.update("p1", { completed: true, completedAt: daysAgo(45) });
    const archived = await sync(remote, store, notifier);
    const again = await sync(remote, store, notifier);

    expect(archived.counts).toMatchObject({ projectsSynced: 0, archived: 1 });
    expect(again.counts.archived).toBe(0);
    expect(store.getHistoricalProject("p1")?.pmoId).toBe("PMO-p1");
  });

  it("fails the run when the project listing is unavailable", async () => {
    remote.listError = new Error("Asana API error: 401 Unauthorized");

    const summary = await sync(remote, store, notifier);

    expect(summary.status).toBe("failed");
    expect(summary.errorMessage).toBe("Asana API error: 401 Unauthorized");
    expect(store.getRun(summary.runId)?.status).toBe("failed");
  });

  it("fails the run when the store cannot be written", async () => {
    for (let i = 1; i <= 5; i++) remote.add(healthy(`p${i}`), recentTasks(`p${i}`));
    const failing = new FailingStore(2);

    const summary = await sync(remote, failing, notifier, { workers: 1 });

    expect(summary.status).toBe("failed");
    expect(summary.errorMessage).toBe("State store unavailable: disk I/O error");
    expect(summary.counts.projectsSynced).toBe(2);
    expect(failing.getRun(summary.runId)).toMatchObject({ status: "failed", projectsSynced: 2 });
  });

  it("fails without throwing when the run cannot be recorded", async () => {
    const db = openDatabase(":memory:");
    const closed = new SqliteStateStore(db);
    db.close();

    const summary = await sync(remote, closed, notifier);

    expect(summary.status).toBe("failed");
    expect(summary.errorMessage?.startsWith("Could not record run:")).toBe(true);
  });
});

describe("runRulesOnly", () => {
  it("re-evaluates stored projects without fetching", async () => {
    const remote = new FakeRemote();
    const store = newStore();
    const notifier = new RecordingNotifier();
    remote.add(stale("p1"), recentTasks("p1"));
    remote.add(healthy("p2"), recentTasks("p2"));
    const run = await sync(remote, store, notifier);
    remote.listError = new Error("must not be called");

    const summary = await runRulesOnly({
      store,
      notifier,
      rules: parseRulesConfig({ no_status_update: { severity: "high" } }),
      now: NOW,
      clock: () => NOW,
    });

    expect(summary).toEqual({
      syncId: run.runId,
      projectsEvaluated: 2,
      findingsCreated: 0,
      findingsEscalated: 1,
      findingsResolved: 0,
    });
    expect(notifier.sent.map((n) => `${n.kind}:${n.severity}`)).toEqual(["created:medium", "escalated:high"]);
  });
});
