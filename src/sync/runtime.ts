import type { SyncRunSummary } from "@/sync/types";
import { getEnv, requireAsanaEnv, requireClockifyEnv, type SyncEnv } from "@/sync/config/env";
import { loadRulesConfig, type RulesConfig } from "@/sync/config/rules";
import { SqliteStateStore } from "@/sync/ledger/repository";
import { AsanaClient } from "@/sync/asana/client";
import { ClockifyClient } from "@/sync/clockify/client";
import { clockifyRange, runClockifySync, type ClockifySyncSummary } from "@/sync/clockify/sync";
import { createNotifier, type Notifier } from "@/sync/notify/notifier";
import { loadProjectHistory, type HistoryLoadResult } from "@/sync/history";
import { runRulesOnly, runSync, type RulesRunSummary } from "@/sync";

/** Collaborators built from the environment, shared by the CLI and the HTTP routes. */
export interface SyncRuntime {
  env: SyncEnv;
  store: SqliteStateStore;
  notifier: Notifier;
  rules: RulesConfig;
}

export function createRuntime(env: SyncEnv = getEnv()): SyncRuntime {
  return {
    env,
    store: new SqliteStateStore(),
    notifier: createNotifier(env),
    rules: loadRulesConfig(env.RULES_CONFIG_PATH),
  };
}

function createAsanaClient(env: SyncEnv): { client: AsanaClient; workspaceGid: string } {
  const { token, workspaceGid } = requireAsanaEnv(env);
  const client = new AsanaClient({
    token,
    baseUrl: env.ASANA_BASE_URL,
    timeoutMs: env.ASANA_TIMEOUT_MS,
    maxAttempts: env.ASANA_MAX_RETRIES,
  });
  return { client, workspaceGid };
}

export interface SyncOverrides {
  workers?: number;
  lookbackDays?: number;
}

export function runConfiguredSync(runtime: SyncRuntime, overrides: SyncOverrides = {}): Promise<SyncRunSummary> {
  const { env } = runtime;
  const { client, workspaceGid } = createAsanaClient(env);
  return runSync({
    client,
    store: runtime.store,
    notifier: runtime.notifier,
    rules: runtime.rules,
    workspaceGid,
    businessVerticals: env.SYNC_BUSINESS_VERTICALS,
    retentionDays: env.SYNC_RETENTION_DAYS,
    workers: overrides.workers ?? env.SYNC_WORKERS,
    lookbackDays: overrides.lookbackDays ?? env.SYNC_LOOKBACK_DAYS,
  });
}

export function runConfiguredRules(runtime: SyncRuntime): Promise<RulesRunSummary> {
  return runRulesOnly({ store: runtime.store, notifier: runtime.notifier, rules: runtime.rules });
}

export function runConfiguredHistory(runtime: SyncRuntime): Promise<HistoryLoadResult> {
  const { client, workspaceGid } = createAsanaClient(runtime.env);
  return loadProjectHistory({ client, store: runtime.store, workspaceGid });
}

export function runConfiguredClockifySync(runtime: SyncRuntime, days?: number): Promise<ClockifySyncSummary> {
  const { env } = runtime;
  const { apiKey, workspaceId } = requireClockifyEnv(env);
  const client = new ClockifyClient({
    apiKey,
    workspaceId,
    baseUrl: env.CLOCKIFY_BASE_URL,
    timeoutMs: env.CLOCKIFY_TIMEOUT_MS,
  });
  return runClockifySync({ client, store: runtime.store, ...clockifyRange(new Date(), days) });
}

// One sync at a time per process
let activeSync: Promise<SyncRunSummary> | null = null;

export function isSyncInProgress(): boolean {
  return activeSync !== null;
}

/** Starts a sync unless one is already running in this process; returns null in that case. */
export function startExclusiveSync(runtime: SyncRuntime, overrides: SyncOverrides = {}): Promise<SyncRunSummary> | null {
  if (activeSync) return null;
  const run = runConfiguredSync(runtime, overrides).finally(() => {
    activeSync = null;
  });
  activeSync = run;
  return run;
}
