import { randomUUID } from "crypto";
import {
  emptyCounts,
  type Finding,
  type ProjectRecord,
  type SyncCounts,
  type SyncRunSummary,
} from "@/sync/types";
import type { CommentPayload, FetchOutcome, ProjectPayload, RemoteDataClient } from "@/sync/types/remote";
import type { RulesConfig } from "@/sync/config/rules";
import type { InaccessibleReason, StateStore } from "@/sync/ledger/repository";
import { detectChanges } from "@/sync/ledger/change-detector";
import { buildProjectRecord, deriveTaskMetrics, resolveLastStatus, DEFAULT_LOOKBACK_DAYS } from "@/sync/metrics/derive";
import { evaluateRules, reconcileFindings, type FindingPlan } from "@/sync/rules/engine";
import { classifyScope, isClosedRecord, type ScopeClass } from "@/sync/scope";
import { snapshotFromRecord } from "@/sync/history";
import { runWithConcurrency } from "@/sync/pool";
import { deliverNotification, type Notifier, type NotificationKind } from "@/sync/notify/notifier";
import { isStoreUnavailable } from "@/sync/errors";
import { createChildLogger, errorMessage } from "@/sync/logger";

const log = createChildLogger("sync-engine");

export const DEFAULT_WORKERS = 4;

export interface SyncOptions {
  client: RemoteDataClient;
  store: StateStore;
  notifier: Notifier;
  rules: RulesConfig;
  workspaceGid: string;
  businessVerticals?: string[];
  retentionDays?: number;
  workers?: number;
  lookbackDays?: number;
  /** Reference instant for rolling windows and rules. Defaults to the clock at start. */
  now?: Date;
  /** Source of `synced_at` / transition timestamps. */
  clock?: () => Date;
}

interface RunContext {
  runId: string;
  now: Date;
  clock: () => Date;
  lookbackDays: number;
  options: SyncOptions;
}

interface PendingNotification {
  finding: Finding;
  kind: NotificationKind;
}

/**
 * One sync run: list, classify, then fetch-diff-derive-persist-evaluate each
 * in-scope project on a bounded worker pool. Always resolves with the run's
 * terminal summary; per-project failures are counted, and only an unusable
 * store (or an unobtainable project listing) fails the run.
 */
export async function runSync(options: SyncOptions): Promise<SyncRunSummary> {
  const clock = options.clock ?? (() => new Date());
  const runId = randomUUID();
  const startedAt = clock().toISOString();
  const ctx: RunContext = {
    runId,
    now: options.now ?? new Date(startedAt),
    clock,
    lookbackDays: options.lookbackDays ?? DEFAULT_LOOKBACK_DAYS,
    options,
  };
  const { store } = options;

  log.info("Starting sync run", { runId, workers: options.workers ?? DEFAULT_WORKERS });

  try {
    store.createRun(runId, "asana", startedAt);
  } catch (error) {
    log.error("Could not record sync run start", { runId, error: errorMessage(error) });
    return summarize(runId, startedAt, clock, emptyCounts(), "failed", `Could not record run: ${errorMessage(error)}`);
  }

  let counts = emptyCounts();
  let failure: string | null = null;

  try {
    counts = await executeRun(ctx);
  } catch (error) {
    failure = errorMessage(error);
    log.error("Sync run failed", { runId, error: failure });
    if (error instanceof RunAbortedError) counts = error.counts;
  }

  const summary = summarize(runId, startedAt, clock, counts, failure ? "failed" : "completed", failure);
  try {
    store.completeRun(runId, summary.status, counts, summary.completedAt, failure);
  } catch (error) {
    // Left in `running`; an operator reconciles it
    log.error("Could not record sync run completion", { runId, error: errorMessage(error) });
  }
  log.info("Sync run finished", { runId, status: summary.status, counts });
  return summary;
}

class RunAbortedError extends Error {
  constructor(
    message: string,
    readonly counts: SyncCounts,
  ) {
    super(message);
    this.name = "RunAbortedError";
  }
}

async function executeRun(ctx: RunContext): Promise<SyncCounts> {
  const { client, store } = ctx.options;
  const listed = await client.listActiveProjects({ workspaceGid: ctx.options.workspaceGid });
  const totals = emptyCounts();

  const working: { project: ProjectPayload; scope: ScopeClass }[] = [];
  for (const project of listed) {
    const scope = classifyScope(project, {
      businessVerticals: ctx.options.businessVerticals ?? [],
      retentionDays: ctx.options.retentionDays ?? 30,
      now: ctx.now,
    });
    if (scope === "out_of_scope") {
      totals.outOfScope++;
    } else if (scope === "closed_expired") {
      if (archiveExpired(store, project.gid, ctx)) totals.archived++;
    } else {
      working.push({ project, scope });
    }
  }

  log.info("Working set determined", {
    runId: ctx.runId,
    listed: listed.length,
    working: working.length,
    outOfScope: totals.outOfScope,
    archived: totals.archived,
  });

  const workers = Math.max(1, ctx.options.workers ?? DEFAULT_WORKERS);
  const partials = Array.from({ length: workers }, () => emptyCounts());
  const abort: { storeError: unknown } = { storeError: null };

  await runWithConcurrency(
    working,
    workers,
    async (item, _index, workerId) => {
      const counts = partials[workerId];
      try {
        await processProject(ctx, item.project, item.scope, counts);
      } catch (error) {
        if (isStoreUnavailable(error)) {
          abort.storeError ??= error;
          return;
        }
        counts.failed++;
        log.error("Project sync failed", { runId: ctx.runId, projectGid: item.project.gid, error: errorMessage(error) });
      }
    },
    { isStopped: () => abort.storeError !== null },
  );

  const merged = partials.reduce(addCounts, totals);
  if (abort.storeError !== null) {
    throw new RunAbortedError(`State store unavailable: ${errorMessage(abort.storeError)}`, merged);
  }
  return merged;
}

function archiveExpired(store: StateStore, gid: string, ctx: RunContext): boolean {
  try {
    const live = store.getProject(gid);
    if (!live) return false;
    const inserted = store.insertHistory(snapshotFromRecord(live, ctx.clock().toISOString()));
    if (inserted) log.info("Project archived to history", { runId: ctx.runId, projectGid: gid });
    return inserted;
  } catch (error) {
    if (isStoreUnavailable(error)) throw error;
    log.error("Could not archive project", { runId: ctx.runId, projectGid: gid, error: errorMessage(error) });
    return false;
  }
}

async function processProject(
  ctx: RunContext,
  listed: ProjectPayload,
  scope: ScopeClass,
  counts: SyncCounts,
): Promise<void> {
  const { client, store } = ctx.options;
  const gid = listed.gid;

  const projectOutcome = await client.getProject(gid);
  if (projectOutcome.status !== "ok") {
    recordFetchFailure(ctx, listed, projectOutcome, counts);
    return;
  }
  const project = projectOutcome.data;

  const tasksOutcome = await client.getProjectTasks(gid);
  if (tasksOutcome.status !== "ok") {
    recordFetchFailure(ctx, listed, tasksOutcome, counts);
    return;
  }

  const updatesOutcome = await client.listStatusUpdates(gid);
  const updates = updatesOutcome.status === "ok" ? updatesOutcome.data : [];
  if (updatesOutcome.status !== "ok") {
    log.warn("Status updates unavailable, continuing without them", { projectGid: gid, outcome: updatesOutcome.status });
  }

  const comments: { statusUpdateGid: string; items: CommentPayload[] }[] = [];
  for (const update of updates) {
    const outcome = await client.listStatusUpdateComments(update.gid);
    if (outcome.status === "ok") {
      comments.push({ statusUpdateGid: update.gid, items: outcome.data });
    } else {
      log.warn("Status update comments unavailable", { projectGid: gid, statusUpdateGid: update.gid, outcome: outcome.status });
    }
  }

  const metrics = deriveTaskMetrics(tasksOutcome.data, { now: ctx.now, lookbackDays: ctx.lookbackDays });
  const record = buildProjectRecord(project, metrics, resolveLastStatus(project, updates), ctx.clock().toISOString());
  // Closed projects are kept current but no longer audited by the rules
  const hits = scope === "in_scope" ? evaluateRules(record, ctx.options.rules, ctx.now) : [];
  const detectedAt = ctx.clock().toISOString();

  const { changes, notifications, plan } = store.transaction(() => {
    const previous = store.getProject(gid);
    const changes = detectChanges(previous, record);
    store.upsertProject(record);
    store.appendChanges(gid, changes, ctx.runId, detectedAt);
    store.upsertStatusUpdates(gid, updates, record.syncedAt);
    for (const c of comments) {
      store.upsertStatusUpdateComments(gid, c.statusUpdateGid, c.items, record.syncedAt);
    }
    const plan = reconcileFindings(hits, store.getActiveFindings(gid));
    const notifications = applyFindingPlan(store, gid, plan, detectedAt, ctx.options.rules);
    return { changes, notifications, plan };
  });

  counts.projectsSynced++;
  counts.changesDetected += changes.length;
  counts.findingsCreated += plan.create.length;
  counts.findingsEscalated += plan.escalate.length;
  counts.findingsResolved += plan.resolve.length;

  log.debug("Project synced", {
    runId: ctx.runId,
    projectGid: gid,
    changes: changes.length,
    created: plan.create.length,
    escalated: plan.escalate.length,
    resolved: plan.resolve.length,
  });

  await sendNotifications(store, ctx.options.notifier, ctx.options.rules, record, notifications, ctx.clock);
}

function recordFetchFailure(
  ctx: RunContext,
  listed: ProjectPayload,
  outcome: Exclude<FetchOutcome<unknown>, { status: "ok" }>,
  counts: SyncCounts,
): void {
  let reason: InaccessibleReason;
  let detail: string | null = null;
  switch (outcome.status) {
    case "forbidden":
      reason = "forbidden";
      log.warn("Project forbidden, skipping", { runId: ctx.runId, projectGid: listed.gid, name: listed.name });
      break;
    case "not_found":
      reason = "not_found";
      log.warn("Project not found, skipping", { runId: ctx.runId, projectGid: listed.gid, name: listed.name });
      break;
    case "transient":
    case "failed":
      reason = "failed";
      detail = outcome.error;
      log.error("Project fetch failed", { runId: ctx.runId, projectGid: listed.gid, error: outcome.error });
      break;
  }
  ctx.options.store.recordInaccessible({
    projectGid: listed.gid,
    projectName: listed.name,
    reason,
    detail,
    syncId: ctx.runId,
    detectedAt: ctx.clock().toISOString(),
  });
  // Counted only once the row is written; a failed write is counted by the caller
  if (reason === "forbidden") counts.forbidden++;
  else if (reason === "not_found") counts.notFound++;
  else counts.failed++;
}

/** Write the plan's transitions. Must run inside the caller's transaction. */
export function applyFindingPlan(
  store: StateStore,
  projectGid: string,
  plan: FindingPlan,
  at: string,
  rules: RulesConfig,
): PendingNotification[] {
  const notifications: PendingNotification[] = [];
  for (const hit of plan.create) {
    const finding = store.insertFinding({ projectGid, ruleId: hit.ruleId, severity: hit.severity, details: hit.details }, at);
    notifications.push({ finding, kind: "created" });
  }
  for (const e of plan.escalate) {
    store.escalateFinding(e.finding.id, e.severity, e.details, rules.notifications.notifyOnEscalation);
    notifications.push({ finding: { ...e.finding, severity: e.severity, details: e.details }, kind: "escalated" });
  }
  for (const finding of plan.resolve) {
    store.resolveFinding(finding.id, at);
  }
  return notifications;
}

async function sendNotifications(
  store: StateStore,
  notifier: Notifier,
  rules: RulesConfig,
  project: Pick<ProjectRecord, "gid" | "name">,
  notifications: PendingNotification[],
  clock: () => Date,
): Promise<void> {
  for (const n of notifications) {
    if (n.kind === "escalated" && !rules.notifications.notifyOnEscalation) continue;
    await deliverNotification(store, notifier, n.finding, { gid: project.gid, name: project.name }, n.kind, clock);
  }
}

// --- Rules only ---

export interface RulesOnlyOptions {
  store: StateStore;
  notifier: Notifier;
  rules: RulesConfig;
  now?: Date;
  clock?: () => Date;
}

export interface RulesRunSummary {
  /** Latest sync run the evaluated state came from, if any. */
  syncId: string | null;
  projectsEvaluated: number;
  findingsCreated: number;
  findingsEscalated: number;
  findingsResolved: number;
}

/** Re-evaluate the rules over the stored state without calling the remote API. */
export async function runRulesOnly(options: RulesOnlyOptions): Promise<RulesRunSummary> {
  const clock = options.clock ?? (() => new Date());
  const now = options.now ?? clock();
  const { store } = options;
  const latest = store.getLatestRun("asana");
  const summary: RulesRunSummary = {
    syncId: latest?.syncId ?? null,
    projectsEvaluated: 0,
    findingsCreated: 0,
    findingsEscalated: 0,
    findingsResolved: 0,
  };

  for (const project of store.listProjects()) {
    const hits = isClosedRecord(project) ? [] : evaluateRules(project, options.rules, now);
    const at = clock().toISOString();
    const { plan, notifications } = store.transaction(() => {
      const plan = reconcileFindings(hits, store.getActiveFindings(project.gid));
      return { plan, notifications: applyFindingPlan(store, project.gid, plan, at, options.rules) };
    });
    summary.projectsEvaluated++;
    summary.findingsCreated += plan.create.length;
    summary.findingsEscalated += plan.escalate.length;
    summary.findingsResolved += plan.resolve.length;
    await sendNotifications(store, options.notifier, options.rules, project, notifications, clock);
  }

  log.info("Rules evaluated", { ...summary });
  return summary;
}

// --- Helpers ---

function addCounts(a: SyncCounts, b: SyncCounts): SyncCounts {
  return {
    projectsSynced: a.projectsSynced + b.projectsSynced,
    changesDetected: a.changesDetected + b.changesDetected,
    findingsCreated: a.findingsCreated + b.findingsCreated,
    findingsEscalated: a.findingsEscalated + b.findingsEscalated,
    findingsResolved: a.findingsResolved + b.findingsResolved,
    forbidden: a.forbidden + b.forbidden,
    notFound: a.notFound + b.notFound,
    failed: a.failed + b.failed,
    archived: a.archived + b.archived,
    outOfScope: a.outOfScope + b.outOfScope,
  };
}

function summarize(
  runId: string,
  startedAt: string,
  clock: () => Date,
  counts: SyncCounts,
  status: SyncRunSummary["status"],
  errorMessage: string | null,
): SyncRunSummary {
  return { runId, status, startedAt, completedAt: clock().toISOString(), counts, errorMessage };
}
