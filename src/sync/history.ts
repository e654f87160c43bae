import type { HistoricalProject, ProjectRecord } from "@/sync/types";
import type { ProjectPayload, RemoteDataClient } from "@/sync/types/remote";
import type { StateStore } from "@/sync/ledger/repository";
import { classifyProject } from "@/sync/asana/mappers";
import { resolveLastStatus } from "@/sync/metrics/derive";
import { createChildLogger, errorMessage } from "@/sync/logger";
import { isStoreUnavailable } from "@/sync/errors";

const log = createChildLogger("history");

function searchText(parts: (string | null)[]): string {
  return parts
    .filter((p): p is string => !!p)
    .join(" ")
    .toLowerCase();
}

/** Snapshot of a live record, as archived when it leaves the retention window. */
export function snapshotFromRecord(record: ProjectRecord, snapshotAt: string): HistoricalProject {
  return {
    gid: record.gid,
    name: record.name,
    ownerGid: record.ownerGid,
    ownerName: record.ownerName,
    status: record.status,
    lastStatusUpdateAt: record.lastStatusUpdateAt,
    lastStatusUpdateBy: record.lastStatusUpdateBy,
    pmoId: record.pmoId,
    sponsor: record.sponsor,
    clientName: record.clientName,
    projectLead: record.projectLead,
    businessVertical: record.businessVertical,
    projectPhase: record.projectPhase,
    completedFlag: record.completedFlag,
    searchText: searchText([record.name, record.pmoId, record.sponsor, record.clientName, record.ownerName, record.projectLead]),
    rawData: record.rawData,
    snapshotAt,
  };
}

export function snapshotFromPayload(project: ProjectPayload, snapshotAt: string): HistoricalProject {
  const c = classifyProject(project);
  const last = resolveLastStatus(project, []);
  return {
    gid: project.gid,
    name: project.name,
    ownerGid: project.ownerGid,
    ownerName: project.ownerName,
    status: last.status,
    lastStatusUpdateAt: last.lastStatusUpdateAt,
    lastStatusUpdateBy: last.lastStatusUpdateBy,
    pmoId: c.pmoId,
    sponsor: c.sponsor,
    clientName: c.clientName,
    projectLead: c.projectLead,
    businessVertical: c.businessVertical,
    projectPhase: c.projectPhase,
    completedFlag: project.completed,
    searchText: searchText([project.name, c.pmoId, c.sponsor, c.clientName, project.ownerName, c.projectLead]),
    rawData: JSON.stringify({ project: project.raw }),
    snapshotAt,
  };
}

export interface HistoryLoadOptions {
  client: RemoteDataClient;
  store: StateStore;
  workspaceGid: string;
  clock?: () => Date;
}

export interface HistoryLoadResult {
  listed: number;
  skipped: number;
  inserted: number;
  forbidden: number;
  notFound: number;
  failed: number;
}

/**
 * Backfill `projects_history` with every workspace project (archived ones
 * included) that has neither a live nor a historical row yet.
 */
export async function loadProjectHistory(options: HistoryLoadOptions): Promise<HistoryLoadResult> {
  const clock = options.clock ?? (() => new Date());
  const { client, store } = options;

  const projects = await client.listActiveProjects({ workspaceGid: options.workspaceGid, includeArchived: true });
  const known = store.knownProjectGids();
  const result: HistoryLoadResult = {
    listed: projects.length,
    skipped: 0,
    inserted: 0,
    forbidden: 0,
    notFound: 0,
    failed: 0,
  };

  log.info("Loading project history...", { listed: projects.length, known: known.size });

  for (const listed of projects) {
    if (known.has(listed.gid)) {
      result.skipped++;
      continue;
    }

    const outcome = await client.getProject(listed.gid);
    switch (outcome.status) {
      case "ok":
        break;
      case "forbidden":
        result.forbidden++;
        log.warn("Project not accessible, skipping", { projectGid: listed.gid, name: listed.name });
        continue;
      case "not_found":
        result.notFound++;
        log.warn("Project no longer exists, skipping", { projectGid: listed.gid });
        continue;
      case "transient":
      case "failed":
        result.failed++;
        log.error("Project fetch failed", { projectGid: listed.gid, error: outcome.error });
        continue;
    }

    try {
      if (store.insertHistory(snapshotFromPayload(outcome.data, clock().toISOString()))) {
        result.inserted++;
      } else {
        result.skipped++;
      }
    } catch (error) {
      if (isStoreUnavailable(error)) throw error;
      result.failed++;
      log.error("Could not store history snapshot", { projectGid: listed.gid, error: errorMessage(error) });
    }
  }

  log.info("Project history loaded", { ...result });
  return result;
}
