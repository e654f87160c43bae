import { randomUUID } from "crypto";
import type { StateStore } from "@/sync/ledger/repository";
import { createChildLogger, errorMessage } from "@/sync/logger";
import { subtractDays } from "@/sync/dates";
import type { ClockifyClient } from "./client";
import type { TimeEntryRecord } from "./types";

const log = createChildLogger("clockify-sync");

export const DEFAULT_CLOCKIFY_DAYS = 90;

export interface ClockifySyncOptions {
  client: Pick<ClockifyClient, "listUsers" | "listProjects" | "listTimeEntries">;
  store: StateStore;
  start: Date;
  end: Date;
  clock?: () => Date;
}

export interface ClockifySyncSummary {
  runId: string;
  status: "completed" | "failed";
  people: number;
  projects: number;
  timeEntries: number;
  usersFailed: number;
  errorMessage: string | null;
}

/** Range ending at `now` and spanning the last `days` days. */
export function clockifyRange(now: Date, days: number = DEFAULT_CLOCKIFY_DAYS): { start: Date; end: Date } {
  return { start: subtractDays(now, days), end: now };
}

/**
 * Pull people, projects and time entries for the range and upsert them.
 * A user whose entries cannot be fetched is skipped; anything else fails the
 * run, which is recorded in `sync_log` under source `clockify`.
 */
export async function runClockifySync(options: ClockifySyncOptions): Promise<ClockifySyncSummary> {
  const clock = options.clock ?? (() => new Date());
  const { client, store } = options;
  const runId = randomUUID();
  const startedAt = clock().toISOString();
  const summary: ClockifySyncSummary = {
    runId,
    status: "completed",
    people: 0,
    projects: 0,
    timeEntries: 0,
    usersFailed: 0,
    errorMessage: null,
  };

  try {
    store.createRun(runId, "clockify", startedAt);
  } catch (error) {
    log.error("Could not record Clockify run start", { runId, error: errorMessage(error) });
    return { ...summary, status: "failed", errorMessage: `Could not record run: ${errorMessage(error)}` };
  }
  log.info("Starting Clockify sync", { runId, start: options.start.toISOString(), end: options.end.toISOString() });

  try {
    const [people, projects] = await Promise.all([client.listUsers(), client.listProjects()]);
    const range = { start: options.start.toISOString(), end: options.end.toISOString() };

    const entries: TimeEntryRecord[] = [];
    for (const person of people) {
      try {
        entries.push(...(await client.listTimeEntries(person.id, range)));
      } catch (error) {
        summary.usersFailed++;
        log.warn("Time entries unavailable for user", { userId: person.id, error: errorMessage(error) });
      }
    }

    const syncedAt = clock().toISOString();
    store.transaction(() => {
      store.upsertClockifyPeople(people, syncedAt);
      store.upsertClockifyProjects(projects, syncedAt);
      store.upsertTimeEntries(entries, syncedAt);
    });
    summary.people = people.length;
    summary.projects = projects.length;
    summary.timeEntries = entries.length;
  } catch (error) {
    summary.status = "failed";
    summary.errorMessage = errorMessage(error);
    log.error("Clockify sync failed", { runId, error: summary.errorMessage });
  }

  try {
    store.completeRun(
      runId,
      summary.status,
      { projectsSynced: summary.projects, failed: summary.usersFailed },
      clock().toISOString(),
      summary.errorMessage,
    );
  } catch (error) {
    log.error("Could not record Clockify run completion", { runId, error: errorMessage(error) });
  }
  log.info("Clockify sync finished", { ...summary });
  return summary;
}
