import type { Finding, ProjectRecord } from "@/sync/types";
import type { ProjectPayload, TaskPayload } from "@/sync/types/remote";

export const NOW = new Date("2025-06-15T12:00:00.000Z");

export function daysAgo(days: number, from: Date = NOW): string {
  return new Date(from.getTime() - days * 24 * 60 * 60 * 1000).toISOString();
}

export function dateIn(days: number, from: Date = NOW): string {
  return new Date(from.getTime() + days * 24 * 60 * 60 * 1000).toISOString().slice(0, 10);
}

export function makeRecord(overrides: Partial<ProjectRecord> = {}): ProjectRecord {
  return {
    gid: "1001",
    name: "Portal Clientes",
    ownerGid: "u-1",
    ownerName: "Ana Rojas",
    dueDate: null,
    status: "on_track",
    calculatedProgress: 50,
    lastStatusUpdateAt: daysAgo(2),
    lastStatusUpdateBy: "Ana Rojas",
    lastActivityAt: daysAgo(1),
    totalTasks: 10,
    completedTasks: 5,
    tasksCreatedLast7d: 1,
    tasksCompletedLast7d: 1,
    tasksModifiedLast7d: 2,
    startDate: null,
    plannedEndDate: null,
    plannedHoursTotal: null,
    effectiveHoursTotal: null,
    pmoId: "PMO-1",
    sponsor: null,
    clientName: null,
    projectLead: null,
    projectType: null,
    country: null,
    businessVertical: null,
    projectPhase: null,
    inBillingPlan: null,
    completedFlag: false,
    rawData: "{}",
    syncedAt: NOW.toISOString(),
    ...overrides,
  };
}

export function makePayload(overrides: Partial<ProjectPayload> = {}): ProjectPayload {
  return {
    gid: "1001",
    name: "Portal Clientes",
    ownerGid: "u-1",
    ownerName: "Ana Rojas",
    dueDate: null,
    startOn: null,
    createdAt: daysAgo(60),
    modifiedAt: daysAgo(1),
    completed: false,
    completedAt: null,
    currentStatus: { status: "on_track", createdAt: daysAgo(2), authorName: "Ana Rojas" },
    customFields: { "PMO ID": "PMO-1" },
    raw: {},
    ...overrides,
  };
}

export function makeTask(overrides: Partial<TaskPayload> = {}): TaskPayload {
  return {
    gid: "t-1",
    name: "Task",
    completed: false,
    createdAt: daysAgo(30),
    completedAt: null,
    modifiedAt: daysAgo(30),
    ...overrides,
  };
}

export function makeFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    id: 1,
    projectGid: "1001",
    ruleId: "no_status_update",
    severity: "medium",
    status: "open",
    details: {},
    createdAt: daysAgo(3),
    acknowledgedAt: null,
    acknowledgedBy: null,
    ackComment: null,
    resolvedAt: null,
    notifiedAt: null,
    notifiedSeverity: null,
    ...overrides,
  };
}
