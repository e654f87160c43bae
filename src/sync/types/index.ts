export type ProjectStatus = "on_track" | "at_risk" | "off_track" | "on_hold";

export const SEVERITIES = ["low", "medium", "high"] as const;
export type Severity = (typeof SEVERITIES)[number];

export const RULE_IDS = ["no_status_update", "no_activity", "schedule_risk", "amount_of_tasks"] as const;
export type RuleId = (typeof RULE_IDS)[number];

export type FindingStatus = "open" | "acknowledged" | "resolved";

/** Current snapshot of one Asana project, keyed by its gid. */
export interface ProjectRecord {
  gid: string;
  name: string;
  ownerGid: string | null;
  ownerName: string | null;
  dueDate: string | null;
  status: ProjectStatus | null;
  calculatedProgress: number;
  lastStatusUpdateAt: string | null;
  lastStatusUpdateBy: string | null;
  lastActivityAt: string | null;
  totalTasks: number;
  completedTasks: number;
  tasksCreatedLast7d: number;
  tasksCompletedLast7d: number;
  tasksModifiedLast7d: number;
  startDate: string | null;
  plannedEndDate: string | null;
  plannedHoursTotal: number | null;
  effectiveHoursTotal: number | null;
  pmoId: string | null;
  sponsor: string | null;
  clientName: string | null;
  projectLead: string | null;
  projectType: string | null;
  country: string | null;
  businessVertical: string | null;
  projectPhase: string | null;
  inBillingPlan: boolean | null;
  completedFlag: boolean;
  /** Opaque upstream payload, kept for traceability only. */
  rawData: string;
  syncedAt: string;
}

export interface HistoricalProject {
  gid: string;
  name: string | null;
  ownerGid: string | null;
  ownerName: string | null;
  status: ProjectStatus | null;
  lastStatusUpdateAt: string | null;
  lastStatusUpdateBy: string | null;
  pmoId: string | null;
  sponsor: string | null;
  clientName: string | null;
  projectLead: string | null;
  businessVertical: string | null;
  projectPhase: string | null;
  completedFlag: boolean;
  searchText: string;
  rawData: string;
  snapshotAt: string;
}

export interface FieldChange {
  field: string;
  oldValue: string | null;
  newValue: string | null;
}

export interface ChangeLogEntry extends FieldChange {
  id: number;
  projectGid: string;
  detectedAt: string;
  syncId: string;
}

export type FindingDetails = Record<string, string | number | boolean | null>;

export interface Finding {
  id: number;
  projectGid: string;
  ruleId: RuleId;
  severity: Severity;
  status: FindingStatus;
  details: FindingDetails;
  createdAt: string;
  acknowledgedAt: string | null;
  acknowledgedBy: string | null;
  ackComment: string | null;
  resolvedAt: string | null;
  notifiedAt: string | null;
  /** Severity carried by the last delivered alert. */
  notifiedSeverity: Severity | null;
}

export type SyncSource = "asana" | "clockify";

export type SyncRunStatus = "running" | "completed" | "failed";

export interface SyncCounts {
  projectsSynced: number;
  changesDetected: number;
  findingsCreated: number;
  findingsEscalated: number;
  findingsResolved: number;
  forbidden: number;
  notFound: number;
  failed: number;
  archived: number;
  outOfScope: number;
}

export interface SyncRunRecord {
  id: number;
  syncId: string;
  source: SyncSource;
  startedAt: string;
  completedAt: string | null;
  projectsSynced: number | null;
  changesDetected: number | null;
  findingsCreated: number | null;
  counts: Partial<SyncCounts>;
  status: SyncRunStatus;
  errorMessage: string | null;
}

export interface SyncRunSummary {
  runId: string;
  status: Exclude<SyncRunStatus, "running">;
  startedAt: string;
  completedAt: string;
  counts: SyncCounts;
  errorMessage: string | null;
}

export function emptyCounts(): SyncCounts {
  return {
    projectsSynced: 0,
    changesDetected: 0,
    findingsCreated: 0,
    findingsEscalated: 0,
    findingsResolved: 0,
    forbidden: 0,
    notFound: 0,
    failed: 0,
    archived: 0,
    outOfScope: 0,
  };
}

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export function maxSeverity(a: Severity, b: Severity): Severity {
  return severityRank(a) >= severityRank(b) ? a : b;
}

const PROJECT_STATUSES: readonly string[] = ["on_track", "at_risk", "off_track", "on_hold"];
const FINDING_STATUSES: readonly string[] = ["open", "acknowledged", "resolved"];
const SEVERITY_VALUES: readonly string[] = SEVERITIES;
const RULE_ID_VALUES: readonly string[] = RULE_IDS;

export function isProjectStatus(value: unknown): value is ProjectStatus {
  return typeof value === "string" && PROJECT_STATUSES.includes(value);
}

export function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && SEVERITY_VALUES.includes(value);
}

export function isRuleId(value: unknown): value is RuleId {
  return typeof value === "string" && RULE_ID_VALUES.includes(value);
}

export function isFindingStatus(value: unknown): value is FindingStatus {
  return typeof value === "string" && FINDING_STATUSES.includes(value);
}
