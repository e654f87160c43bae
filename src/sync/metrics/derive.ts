import type { ProjectRecord, ProjectStatus } from "@/sync/types";
import type { ProjectPayload, StatusUpdatePayload, TaskPayload } from "@/sync/types/remote";
import { classifyProject } from "@/sync/asana/mappers";
import { parseTimestamp, subtractDays } from "@/sync/dates";

export interface TaskMetrics {
  totalTasks: number;
  completedTasks: number;
  calculatedProgress: number;
  tasksCreatedLast7d: number;
  tasksCompletedLast7d: number;
  tasksModifiedLast7d: number;
  lastActivityAt: string | null;
}

export interface DeriveOptions {
  /** Reference instant for the rolling window; never read from the clock here. */
  now: Date;
  lookbackDays?: number;
}

export const DEFAULT_LOOKBACK_DAYS = 7;

export function progressPercent(completed: number, total: number): number {
  if (total <= 0) return 0;
  const ratio = Math.min(Math.max(completed / total, 0), 1);
  return Math.round(ratio * 10_000) / 100;
}

export function deriveTaskMetrics(tasks: TaskPayload[], options: DeriveOptions): TaskMetrics {
  const cutoff = subtractDays(options.now, options.lookbackDays ?? DEFAULT_LOOKBACK_DAYS).getTime();
  const inWindow = (value: string | null) => {
    const ms = parseTimestamp(value);
    return ms !== null && ms >= cutoff;
  };

  let completed = 0;
  let created = 0;
  let completedRecently = 0;
  let modified = 0;
  let latest: number | null = null;

  for (const task of tasks) {
    if (task.completed) completed++;
    if (inWindow(task.createdAt)) created++;
    if (inWindow(task.completedAt)) completedRecently++;
    if (inWindow(task.modifiedAt)) modified++;

    for (const value of [task.createdAt, task.completedAt, task.modifiedAt]) {
      const ms = parseTimestamp(value);
      if (ms !== null && (latest === null || ms > latest)) latest = ms;
    }
  }

  return {
    totalTasks: tasks.length,
    completedTasks: completed,
    calculatedProgress: progressPercent(completed, tasks.length),
    tasksCreatedLast7d: created,
    tasksCompletedLast7d: completedRecently,
    tasksModifiedLast7d: modified,
    lastActivityAt: latest === null ? null : new Date(latest).toISOString(),
  };
}

export interface LastStatus {
  status: ProjectStatus | null;
  lastStatusUpdateAt: string | null;
  lastStatusUpdateBy: string | null;
}

/**
 * The project's current status update wins; otherwise the newest status
 * update fetched for it.
 */
export function resolveLastStatus(project: ProjectPayload, updates: StatusUpdatePayload[]): LastStatus {
  const current = project.currentStatus;
  if (current?.createdAt) {
    return {
      status: current.status,
      lastStatusUpdateAt: current.createdAt,
      lastStatusUpdateBy: current.authorName,
    };
  }

  let newest: StatusUpdatePayload | null = null;
  for (const update of updates) {
    const ms = parseTimestamp(update.createdAt);
    if (ms === null) continue;
    if (!newest || ms > (parseTimestamp(newest.createdAt) ?? 0)) newest = update;
  }
  if (!newest) {
    return { status: current?.status ?? null, lastStatusUpdateAt: null, lastStatusUpdateBy: null };
  }
  return {
    status: newest.status ?? current?.status ?? null,
    lastStatusUpdateAt: newest.createdAt,
    lastStatusUpdateBy: newest.authorName,
  };
}

export function buildProjectRecord(
  project: ProjectPayload,
  metrics: TaskMetrics,
  lastStatus: LastStatus,
  syncedAt: string,
): ProjectRecord {
  const classification = classifyProject(project);
  return {
    gid: project.gid,
    name: project.name,
    ownerGid: project.ownerGid,
    ownerName: project.ownerName,
    dueDate: project.dueDate,
    status: lastStatus.status,
    calculatedProgress: metrics.calculatedProgress,
    lastStatusUpdateAt: lastStatus.lastStatusUpdateAt,
    lastStatusUpdateBy: lastStatus.lastStatusUpdateBy,
    lastActivityAt: metrics.lastActivityAt,
    totalTasks: metrics.totalTasks,
    completedTasks: metrics.completedTasks,
    tasksCreatedLast7d: metrics.tasksCreatedLast7d,
    tasksCompletedLast7d: metrics.tasksCompletedLast7d,
    tasksModifiedLast7d: metrics.tasksModifiedLast7d,
    ...classification,
    completedFlag: project.completed,
    rawData: JSON.stringify({ project: project.raw }),
    syncedAt,
  };
}
