import type Database from "better-sqlite3";
import {
  isFindingStatus,
  isProjectStatus,
  isRuleId,
  isSeverity,
  SEVERITIES,
  type ChangeLogEntry,
  type FieldChange,
  type Finding,
  type FindingDetails,
  type FindingStatus,
  type HistoricalProject,
  type ProjectRecord,
  type RuleId,
  type Severity,
  type SyncCounts,
  type SyncRunRecord,
  type SyncRunStatus,
  type SyncSource,
} from "@/sync/types";
import type { CommentPayload, StatusUpdatePayload } from "@/sync/types/remote";
import type {
  ClockifyPersonRecord,
  ClockifyProjectRecord,
  ProjectHours,
  TimeEntryRecord,
} from "@/sync/clockify/types";
import { FindingStateError } from "@/sync/errors";
import { getDatabase } from "./db";

export interface NewFinding {
  projectGid: string;
  ruleId: RuleId;
  severity: Severity;
  details: FindingDetails;
}

export interface FindingListItem extends Finding {
  projectName: string | null;
  ownerName: string | null;
}

/** "active" = open or acknowledged. */
export type FindingFilter = FindingStatus | "active" | "all";

export type InaccessibleReason = "forbidden" | "not_found" | "failed";

export interface InaccessibleEntry {
  projectGid: string;
  projectName: string | null;
  reason: InaccessibleReason;
  detail: string | null;
  syncId: string;
  detectedAt: string;
}

export type ProjectLookup =
  | { source: "live"; project: ProjectRecord }
  | { source: "history"; project: HistoricalProject };

/** Everything the sync core reads from and writes to. All calls are synchronous. */
export interface StateStore {
  transaction<T>(fn: () => T): T;

  getProject(gid: string): ProjectRecord | undefined;
  listProjects(): ProjectRecord[];
  upsertProject(record: ProjectRecord): void;
  appendChanges(projectGid: string, changes: FieldChange[], syncId: string, detectedAt: string): number;
  listChanges(projectGid: string): ChangeLogEntry[];
  upsertStatusUpdates(projectGid: string, updates: StatusUpdatePayload[], syncedAt: string): void;
  upsertStatusUpdateComments(
    projectGid: string,
    statusUpdateGid: string,
    comments: CommentPayload[],
    syncedAt: string,
  ): void;

  getFinding(id: number): Finding | undefined;
  getActiveFindings(projectGid: string): Finding[];
  insertFinding(finding: NewFinding, createdAt: string): Finding;
  /** With `renotify`, the finding becomes pending again until the escalation alert is delivered. */
  escalateFinding(id: number, severity: Severity, details: FindingDetails, renotify?: boolean): void;
  resolveFinding(id: number, resolvedAt: string): void;
  acknowledgeFinding(id: number, by: string, comment: string, at: string): Finding;
  markNotified(id: number, at: string, severity: Severity): void;
  listFindings(filter?: FindingFilter): FindingListItem[];
  listUnnotifiedFindings(): Finding[];

  createRun(syncId: string, source: SyncSource, startedAt: string): void;
  completeRun(
    syncId: string,
    status: Exclude<SyncRunStatus, "running">,
    counts: Partial<SyncCounts>,
    completedAt: string,
    errorMessage: string | null,
  ): void;
  getRun(syncId: string): SyncRunRecord | undefined;
  getLatestRun(source?: SyncSource): SyncRunRecord | undefined;
  listRuns(limit: number): SyncRunRecord[];

  recordInaccessible(entry: InaccessibleEntry): void;
  listInaccessible(syncId: string): InaccessibleEntry[];

  getHistoricalProject(gid: string): HistoricalProject | undefined;
  /** Append-once: returns false when a snapshot already exists. */
  insertHistory(snapshot: HistoricalProject): boolean;
  findProject(gid: string): ProjectLookup | undefined;
  knownProjectGids(): Set<string>;

  upsertClockifyPeople(people: ClockifyPersonRecord[], syncedAt: string): void;
  upsertClockifyProjects(projects: ClockifyProjectRecord[], syncedAt: string): void;
  upsertTimeEntries(entries: TimeEntryRecord[], syncedAt: string): void;
  hoursByProject(range?: { from: string; to: string }): ProjectHours[];
}

export class SqliteStateStore implements StateStore {
  constructor(private readonly db: Database.Database = getDatabase()) {}

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  // --- Projects ---

  getProject(gid: string): ProjectRecord | undefined {
    const row = this.db.prepare<[string], RawProjectRow>("SELECT * FROM projects WHERE gid = ?").get(gid);
    return row ? toProjectRecord(row) : undefined;
  }

  listProjects(): ProjectRecord[] {
    return this.db
      .prepare<[], RawProjectRow>("SELECT * FROM projects ORDER BY gid")
      .all()
      .map(toProjectRecord);
  }

  upsertProject(record: ProjectRecord): void {
    this.db
      .prepare<[RawProjectRow]>(`
      INSERT INTO projects (
        gid, name, owner_gid, owner_name, due_date, status, calculated_progress,
        last_status_update_at, last_status_update_by, last_activity_at,
        total_tasks, completed_tasks, tasks_created_last_7d, tasks_completed_last_7d, tasks_modified_last_7d,
        start_date, planned_end_date, planned_hours_total, effective_hours_total,
        pmo_id, sponsor, client_name, project_lead, project_type, country,
        business_vertical, project_phase, in_billing_plan, completed_flag, raw_data, synced_at
      ) VALUES (
        @gid, @name, @owner_gid, @owner_name, @due_date, @status, @calculated_progress,
        @last_status_update_at, @last_status_update_by, @last_activity_at,
        @total_tasks, @completed_tasks, @tasks_created_last_7d, @tasks_completed_last_7d, @tasks_modified_last_7d,
        @start_date, @planned_end_date, @planned_hours_total, @effective_hours_total,
        @pmo_id, @sponsor, @client_name, @project_lead, @project_type, @country,
        @business_vertical, @project_phase, @in_billing_plan, @completed_flag, @raw_data, @synced_at
      )
      ON CONFLICT(gid) DO UPDATE SET
        name = excluded.name,
        owner_gid = excluded.owner_gid,
        owner_name = excluded.owner_name,
        due_date = excluded.due_date,
        status = excluded.status,
        calculated_progress = excluded.calculated_progress,
        last_status_update_at = excluded.last_status_update_at,
        last_status_update_by = excluded.last_status_update_by,
        last_activity_at = excluded.last_activity_at,
        total_tasks = excluded.total_tasks,
        completed_tasks = excluded.completed_tasks,
        tasks_created_last_7d = excluded.tasks_created_last_7d,
        tasks_completed_last_7d = excluded.tasks_completed_last_7d,
        tasks_modified_last_7d = excluded.tasks_modified_last_7d,
        start_date = excluded.start_date,
        planned_end_date = excluded.planned_end_date,
        planned_hours_total = excluded.planned_hours_total,
        effective_hours_total = excluded.effective_hours_total,
        pmo_id = excluded.pmo_id,
        sponsor = excluded.sponsor,
        client_name = excluded.client_name,
        project_lead = excluded.project_lead,
        project_type = excluded.project_type,
        country = excluded.country,
        business_vertical = excluded.business_vertical,
        project_phase = excluded.project_phase,
        in_billing_plan = excluded.in_billing_plan,
        completed_flag = excluded.completed_flag,
        raw_data = excluded.raw_data,
        synced_at = MAX(projects.synced_at, excluded.synced_at)
    `)
      .run(toProjectRow(record));
  }

  appendChanges(projectGid: string, changes: FieldChange[], syncId: string, detectedAt: string): number {
    const insert = this.db.prepare<[string, string, string | null, string | null, string, string]>(`
      INSERT INTO project_changelog (project_gid, field_name, old_value, new_value, detected_at, sync_id)
      VALUES (?, ?, ?, ?, ?, ?)
    `);
    for (const change of changes) {
      insert.run(projectGid, change.field, change.oldValue, change.newValue, detectedAt, syncId);
    }
    return changes.length;
  }

  listChanges(projectGid: string): ChangeLogEntry[] {
    return this.db
      .prepare<[string], RawChangeRow>("SELECT * FROM project_changelog WHERE project_gid = ? ORDER BY id")
      .all(projectGid)
      .map((row) => ({
        id: row.id,
        projectGid: row.project_gid,
        field: row.field_name,
        oldValue: row.old_value,
        newValue: row.new_value,
        detectedAt: row.detected_at,
        syncId: row.sync_id,
      }));
  }

  upsertStatusUpdates(projectGid: string, updates: StatusUpdatePayload[], syncedAt: string): void {
    const upsert = this.db.prepare(`
      INSERT INTO status_updates (gid, project_gid, author_gid, author_name, created_at, status_type, title, text, html_text, raw_data, synced_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(gid) DO UPDATE SET
        author_gid = excluded.author_gid,
        author_name = excluded.author_name,
        created_at = excluded.created_at,
        status_type = excluded.status_type,
        title = excluded.title,
        text = excluded.text,
        html_text = excluded.html_text,
        raw_data = excluded.raw_data,
        synced_at = excluded.synced_at
    `);
    for (const u of updates) {
      upsert.run(
        u.gid,
        projectGid,
        u.authorGid,
        u.authorName,
        u.createdAt,
        u.status,
        u.title,
        u.text,
        u.htmlText,
        JSON.stringify(u.raw ?? null),
        syncedAt,
      );
    }
  }

  upsertStatusUpdateComments(
    projectGid: string,
    statusUpdateGid: string,
    comments: CommentPayload[],
    syncedAt: string,
  ): void {
    const upsert = this.db.prepare(`
      INSERT INTO status_update_comments (gid, status_update_gid, project_gid, author_gid, author_name, created_at, text, html_text, raw_data, synced_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(gid) DO UPDATE SET
        author_gid = excluded.author_gid,
        author_name = excluded.author_name,
        created_at = excluded.created_at,
        text = excluded.text,
        html_text = excluded.html_text,
        raw_data = excluded.raw_data,
        synced_at = excluded.synced_at
    `);
    for (const c of comments) {
      upsert.run(
        c.gid,
        statusUpdateGid,
        projectGid,
        c.authorGid,
        c.authorName,
        c.createdAt,
        c.text,
        c.htmlText,
        JSON.stringify(c.raw ?? null),
        syncedAt,
      );
    }
  }

  // --- Findings ---

  getFinding(id: number): Finding | undefined {
    const row = this.db.prepare<[number], RawFindingRow>("SELECT * FROM findings WHERE id = ?").get(id);
    return row ? toFinding(row) : undefined;
  }

  getActiveFindings(projectGid: string): Finding[] {
    return this.db
      .prepare<[string], RawFindingRow>(
        "SELECT * FROM findings WHERE project_gid = ? AND status IN ('open', 'acknowledged') ORDER BY id",
      )
      .all(projectGid)
      .map(toFinding);
  }

  insertFinding(finding: NewFinding, createdAt: string): Finding {
    const result = this.db
      .prepare<[string, string, string, string, string]>(`
      INSERT INTO findings (project_gid, rule_id, severity, status, details, created_at)
      VALUES (?, ?, ?, 'open', ?, ?)
    `)
      .run(finding.projectGid, finding.ruleId, finding.severity, JSON.stringify(finding.details), createdAt);
    return {
      id: Number(result.lastInsertRowid),
      projectGid: finding.projectGid,
      ruleId: finding.ruleId,
      severity: finding.severity,
      status: "open",
      details: finding.details,
      createdAt,
      acknowledgedAt: null,
      acknowledgedBy: null,
      ackComment: null,
      resolvedAt: null,
      notifiedAt: null,
      notifiedSeverity: null,
    };
  }

  escalateFinding(id: number, severity: Severity, details: FindingDetails, renotify = true): void {
    this.db
      .prepare<[string, string, number, number]>(`
      UPDATE findings
      SET severity = ?, details = ?, notified_at = CASE WHEN ? THEN NULL ELSE notified_at END
      WHERE id = ? AND status IN ('open', 'acknowledged')
    `)
      .run(severity, JSON.stringify(details), renotify ? 1 : 0, id);
  }

  resolveFinding(id: number, resolvedAt: string): void {
    this.db
      .prepare<[string, number]>(
        "UPDATE findings SET status = 'resolved', resolved_at = ? WHERE id = ? AND status IN ('open', 'acknowledged')",
      )
      .run(resolvedAt, id);
  }

  acknowledgeFinding(id: number, by: string, comment: string, at: string): Finding {
    const text = comment.trim();
    if (!text) {
      throw new FindingStateError("An acknowledgement comment is required.", "comment_required");
    }
    const finding = this.getFinding(id);
    if (!finding) {
      throw new FindingStateError(`Finding ${id} does not exist.`, "not_found");
    }
    if (finding.status !== "open") {
      throw new FindingStateError(
        `Finding ${id} is ${finding.status}; only open findings can be acknowledged.`,
        "invalid_transition",
      );
    }
    const acknowledgedBy = by.trim() || "PMO";
    this.db
      .prepare<[string, string, string, number]>(`
      UPDATE findings
      SET status = 'acknowledged', acknowledged_at = ?, acknowledged_by = ?, ack_comment = ?
      WHERE id = ?
    `)
      .run(at, acknowledgedBy, text, id);
    return { ...finding, status: "acknowledged", acknowledgedAt: at, acknowledgedBy, ackComment: text };
  }

  markNotified(id: number, at: string, severity: Severity): void {
    this.db
      .prepare<[string, string, number]>("UPDATE findings SET notified_at = ?, notified_severity = ? WHERE id = ?")
      .run(at, severity, id);
  }

  listFindings(filter: FindingFilter = "active"): FindingListItem[] {
    const statuses: string[] =
      filter === "all" ? ["open", "acknowledged", "resolved"] : filter === "active" ? ["open", "acknowledged"] : [filter];
    const rows = this.db
      .prepare<[string], RawFindingRow & { project_name: string | null; project_owner: string | null }>(`
      SELECT f.*, p.name AS project_name, p.owner_name AS project_owner
      FROM findings f
      LEFT JOIN projects p ON p.gid = f.project_gid
      WHERE f.status IN (SELECT value FROM json_each(?))
      ORDER BY f.id DESC
    `)
      .all(JSON.stringify(statuses));
    return rows.map((row) => ({ ...toFinding(row), projectName: row.project_name, ownerName: row.project_owner }));
  }

  listUnnotifiedFindings(): Finding[] {
    return this.db
      .prepare<[], RawFindingRow>(
        "SELECT * FROM findings WHERE notified_at IS NULL AND status IN ('open', 'acknowledged') ORDER BY id",
      )
      .all()
      .map(toFinding);
  }

  // --- Sync Runs ---

  createRun(syncId: string, source: SyncSource, startedAt: string): void {
    this.db
      .prepare<[string, string, string]>(`
      INSERT INTO sync_log (sync_id, source, started_at, counts_json, status)
      VALUES (?, ?, ?, '{}', 'running')
    `)
      .run(syncId, source, startedAt);
  }

  completeRun(
    syncId: string,
    status: Exclude<SyncRunStatus, "running">,
    counts: Partial<SyncCounts>,
    completedAt: string,
    errorMessage: string | null,
  ): void {
    // completed_at is written once; a second terminal transition is a no-op
    this.db
      .prepare<[string, number | null, number | null, number | null, string, string, string | null, string]>(`
      UPDATE sync_log
      SET completed_at = ?, projects_synced = ?, changes_detected = ?, findings_created = ?,
          counts_json = ?, status = ?, error_message = ?
      WHERE sync_id = ? AND completed_at IS NULL
    `)
      .run(
        completedAt,
        counts.projectsSynced ?? null,
        counts.changesDetected ?? null,
        counts.findingsCreated ?? null,
        JSON.stringify(counts),
        status,
        errorMessage,
        syncId,
      );
  }

  getRun(syncId: string): SyncRunRecord | undefined {
    const row = this.db.prepare<[string], RawRunRow>("SELECT * FROM sync_log WHERE sync_id = ?").get(syncId);
    return row ? toRunRecord(row) : undefined;
  }

  getLatestRun(source?: SyncSource): SyncRunRecord | undefined {
    const row = source
      ? this.db
          .prepare<[string], RawRunRow>("SELECT * FROM sync_log WHERE source = ? ORDER BY id DESC LIMIT 1")
          .get(source)
      : this.db.prepare<[], RawRunRow>("SELECT * FROM sync_log ORDER BY id DESC LIMIT 1").get();
    return row ? toRunRecord(row) : undefined;
  }

  listRuns(limit: number): SyncRunRecord[] {
    return this.db
      .prepare<[number], RawRunRow>("SELECT * FROM sync_log ORDER BY id DESC LIMIT ?")
      .all(limit)
      .map(toRunRecord);
  }

  // --- Inaccessible projects ---

  recordInaccessible(entry: InaccessibleEntry): void {
    this.db
      .prepare<[string, string | null, string, string | null, string, string]>(`
      INSERT INTO inaccessible_projects (project_gid, project_name, reason, detail, sync_id, detected_at)
      VALUES (?, ?, ?, ?, ?, ?)
    `)
      .run(entry.projectGid, entry.projectName, entry.reason, entry.detail, entry.syncId, entry.detectedAt);
  }

  listInaccessible(syncId: string): InaccessibleEntry[] {
    return this.db
      .prepare<[string], RawInaccessibleRow>("SELECT * FROM inaccessible_projects WHERE sync_id = ? ORDER BY id")
      .all(syncId)
      .map((row) => ({
        projectGid: row.project_gid,
        projectName: row.project_name,
        reason: toInaccessibleReason(row.reason),
        detail: row.detail,
        syncId: row.sync_id,
        detectedAt: row.detected_at,
      }));
  }

  // --- History ---

  getHistoricalProject(gid: string): HistoricalProject | undefined {
    const row = this.db.prepare<[string], RawHistoryRow>("SELECT * FROM projects_history WHERE gid = ?").get(gid);
    return row ? toHistoricalProject(row) : undefined;
  }

  insertHistory(snapshot: HistoricalProject): boolean {
    const result = this.db
      .prepare<[RawHistoryRow]>(`
      INSERT INTO projects_history (
        gid, name, owner_gid, owner_name, status, last_status_update_at, last_status_update_by,
        pmo_id, sponsor, client_name, project_lead, business_vertical, project_phase,
        completed_flag, search_text, raw_data, snapshot_at
      ) VALUES (
        @gid, @name, @owner_gid, @owner_name, @status, @last_status_update_at, @last_status_update_by,
        @pmo_id, @sponsor, @client_name, @project_lead, @business_vertical, @project_phase,
        @completed_flag, @search_text, @raw_data, @snapshot_at
      )
      ON CONFLICT(gid) DO NOTHING
    `)
      .run(toHistoryRow(snapshot));
    return result.changes > 0;
  }

  findProject(gid: string): ProjectLookup | undefined {
    const live = this.getProject(gid);
    if (live) return { source: "live", project: live };
    const archived = this.getHistoricalProject(gid);
    if (archived) return { source: "history", project: archived };
    return undefined;
  }

  knownProjectGids(): Set<string> {
    const rows = this.db
      .prepare<[], { gid: string }>("SELECT gid FROM projects UNION SELECT gid FROM projects_history")
      .all();
    return new Set(rows.map((r) => r.gid));
  }

  // --- Clockify ---

  upsertClockifyPeople(people: ClockifyPersonRecord[], syncedAt: string): void {
    const upsert = this.db.prepare<[string, string | null, string | null, string | null, string]>(`
      INSERT INTO clockify_people (id, name, email, status, synced_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        name = excluded.name, email = excluded.email, status = excluded.status, synced_at = excluded.synced_at
    `);
    for (const p of people) upsert.run(p.id, p.name, p.email, p.status, syncedAt);
  }

  upsertClockifyProjects(projects: ClockifyProjectRecord[], syncedAt: string): void {
    const upsert = this.db.prepare<[string, string, string | null, number, string]>(`
      INSERT INTO clockify_projects (id, name, client_name, archived, synced_at)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        name = excluded.name, client_name = excluded.client_name, archived = excluded.archived,
        synced_at = excluded.synced_at
    `);
    for (const p of projects) upsert.run(p.id, p.name, p.clientName, p.archived ? 1 : 0, syncedAt);
  }

  upsertTimeEntries(entries: TimeEntryRecord[], syncedAt: string): void {
    const upsert = this.db.prepare(`
      INSERT INTO clockify_time_entries (id, user_id, project_id, description, start_at, end_at, hours, entry_date, billable, synced_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        user_id = excluded.user_id,
        project_id = excluded.project_id,
        description = excluded.description,
        start_at = excluded.start_at,
        end_at = excluded.end_at,
        hours = excluded.hours,
        entry_date = excluded.entry_date,
        billable = excluded.billable,
        synced_at = excluded.synced_at
    `);
    for (const e of entries) {
      upsert.run(
        e.id,
        e.userId,
        e.projectId,
        e.description,
        e.startAt,
        e.endAt,
        e.hours,
        e.entryDate,
        e.billable ? 1 : 0,
        syncedAt,
      );
    }
  }

  hoursByProject(range?: { from: string; to: string }): ProjectHours[] {
    const rows = this.db
      .prepare<[{ from: string | null; to: string | null }], RawHoursRow>(`
      SELECT e.project_id, p.name AS project_name, SUM(e.hours) AS hours, COUNT(*) AS entries
      FROM clockify_time_entries e
      LEFT JOIN clockify_projects p ON p.id = e.project_id
      WHERE (@from IS NULL OR e.entry_date >= @from) AND (@to IS NULL OR e.entry_date <= @to)
      GROUP BY e.project_id, p.name
      ORDER BY hours DESC
    `)
      .all({ from: range?.from ?? null, to: range?.to ?? null });
    return rows.map((r) => ({
      projectId: r.project_id,
      projectName: r.project_name,
      hours: Math.round(r.hours * 100) / 100,
      entries: r.entries,
    }));
  }
}

// --- Internal helpers ---

interface RawProjectRow {
  gid: string;
  name: string;
  owner_gid: string | null;
  owner_name: string | null;
  due_date: string | null;
  status: string | null;
  calculated_progress: number;
  last_status_update_at: string | null;
  last_status_update_by: string | null;
  last_activity_at: string | null;
  total_tasks: number;
  completed_tasks: number;
  tasks_created_last_7d: number;
  tasks_completed_last_7d: number;
  tasks_modified_last_7d: number;
  start_date: string | null;
  planned_end_date: string | null;
  planned_hours_total: number | null;
  effective_hours_total: number | null;
  pmo_id: string | null;
  sponsor: string | null;
  client_name: string | null;
  project_lead: string | null;
  project_type: string | null;
  country: string | null;
  business_vertical: string | null;
  project_phase: string | null;
  in_billing_plan: number | null;
  completed_flag: number;
  raw_data: string;
  synced_at: string;
}

interface RawChangeRow {
  id: number;
  project_gid: string;
  field_name: string;
  old_value: string | null;
  new_value: string | null;
  detected_at: string;
  sync_id: string;
}

interface RawFindingRow {
  id: number;
  project_gid: string;
  rule_id: string;
  severity: string;
  status: string;
  details: string;
  created_at: string;
  acknowledged_at: string | null;
  acknowledged_by: string | null;
  ack_comment: string | null;
  resolved_at: string | null;
  notified_at: string | null;
  notified_severity: string | null;
}

interface RawRunRow {
  id: number;
  sync_id: string;
  source: string;
  started_at: string;
  completed_at: string | null;
  projects_synced: number | null;
  changes_detected: number | null;
  findings_created: number | null;
  counts_json: string;
  status: string;
  error_message: string | null;
}

interface RawHistoryRow {
  gid: string;
  name: string | null;
  owner_gid: string | null;
  owner_name: string | null;
  status: string | null;
  last_status_update_at: string | null;
  last_status_update_by: string | null;
  pmo_id: string | null;
  sponsor: string | null;
  client_name: string | null;
  project_lead: string | null;
  business_vertical: string | null;
  project_phase: string | null;
  completed_flag: number;
  search_text: string;
  raw_data: string;
  snapshot_at: string;
}

interface RawInaccessibleRow {
  project_gid: string;
  project_name: string | null;
  reason: string;
  detail: string | null;
  sync_id: string;
  detected_at: string;
}

interface RawHoursRow {
  project_id: string | null;
  project_name: string | null;
  hours: number;
  entries: number;
}

function toProjectRow(r: ProjectRecord): RawProjectRow {
  return {
    gid: r.gid,
    name: r.name,
    owner_gid: r.ownerGid,
    owner_name: r.ownerName,
    due_date: r.dueDate,
    status: r.status,
    calculated_progress: r.calculatedProgress,
    last_status_update_at: r.lastStatusUpdateAt,
    last_status_update_by: r.lastStatusUpdateBy,
    last_activity_at: r.lastActivityAt,
    total_tasks: r.totalTasks,
    completed_tasks: r.completedTasks,
    tasks_created_last_7d: r.tasksCreatedLast7d,
    tasks_completed_last_7d: r.tasksCompletedLast7d,
    tasks_modified_last_7d: r.tasksModifiedLast7d,
    start_date: r.startDate,
    planned_end_date: r.plannedEndDate,
    planned_hours_total: r.plannedHoursTotal,
    effective_hours_total: r.effectiveHoursTotal,
    pmo_id: r.pmoId,
    sponsor: r.sponsor,
    client_name: r.clientName,
    project_lead: r.projectLead,
    project_type: r.projectType,
    country: r.country,
    business_vertical: r.businessVertical,
    project_phase: r.projectPhase,
    in_billing_plan: r.inBillingPlan === null ? null : r.inBillingPlan ? 1 : 0,
    completed_flag: r.completedFlag ? 1 : 0,
    raw_data: r.rawData,
    synced_at: r.syncedAt,
  };
}

function toProjectRecord(row: RawProjectRow): ProjectRecord {
  return {
    gid: row.gid,
    name: row.name,
    ownerGid: row.owner_gid,
    ownerName: row.owner_name,
    dueDate: row.due_date,
    status: isProjectStatus(row.status) ? row.status : null,
    calculatedProgress: row.calculated_progress,
    lastStatusUpdateAt: row.last_status_update_at,
    lastStatusUpdateBy: row.last_status_update_by,
    lastActivityAt: row.last_activity_at,
    totalTasks: row.total_tasks,
    completedTasks: row.completed_tasks,
    tasksCreatedLast7d: row.tasks_created_last_7d,
    tasksCompletedLast7d: row.tasks_completed_last_7d,
    tasksModifiedLast7d: row.tasks_modified_last_7d,
    startDate: row.start_date,
    plannedEndDate: row.planned_end_date,
    plannedHoursTotal: row.planned_hours_total,
    effectiveHoursTotal: row.effective_hours_total,
    pmoId: row.pmo_id,
    sponsor: row.sponsor,
    clientName: row.client_name,
    projectLead: row.project_lead,
    projectType: row.project_type,
    country: row.country,
    businessVertical: row.business_vertical,
    projectPhase: row.project_phase,
    inBillingPlan: row.in_billing_plan === null ? null : row.in_billing_plan === 1,
    completedFlag: row.completed_flag === 1,
    rawData: row.raw_data,
    syncedAt: row.synced_at,
  };
}

function toFinding(row: RawFindingRow): Finding {
  if (!isRuleId(row.rule_id)) {
    throw new Error(`Finding ${row.id} has unknown rule_id "${row.rule_id}"`);
  }
  return {
    id: row.id,
    projectGid: row.project_gid,
    ruleId: row.rule_id,
    severity: isSeverity(row.severity) ? row.severity : SEVERITIES[0],
    status: isFindingStatus(row.status) ? row.status : "open",
    details: parseDetails(row.details),
    createdAt: row.created_at,
    acknowledgedAt: row.acknowledged_at,
    acknowledgedBy: row.acknowledged_by,
    ackComment: row.ack_comment,
    resolvedAt: row.resolved_at,
    notifiedAt: row.notified_at,
    notifiedSeverity: isSeverity(row.notified_severity) ? row.notified_severity : null,
  };
}

function parseDetails(text: string): FindingDetails {
  const details: FindingDetails = {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return details;
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return details;
  for (const [key, value] of Object.entries(parsed)) {
    if (value === null || typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      details[key] = value;
    }
  }
  return details;
}

const COUNT_KEYS: (keyof SyncCounts)[] = [
  "projectsSynced",
  "changesDetected",
  "findingsCreated",
  "findingsEscalated",
  "findingsResolved",
  "forbidden",
  "notFound",
  "failed",
  "archived",
  "outOfScope",
];

function parseCounts(text: string): Partial<SyncCounts> {
  const counts: Partial<SyncCounts> = {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return counts;
  }
  if (!parsed || typeof parsed !== "object") return counts;
  for (const key of COUNT_KEYS) {
    const value: unknown = Reflect.get(parsed, key);
    if (typeof value === "number") counts[key] = value;
  }
  return counts;
}

function toRunRecord(row: RawRunRow): SyncRunRecord {
  return {
    id: row.id,
    syncId: row.sync_id,
    source: row.source === "clockify" ? "clockify" : "asana",
    startedAt: row.started_at,
    completedAt: row.completed_at,
    projectsSynced: row.projects_synced,
    changesDetected: row.changes_detected,
    findingsCreated: row.findings_created,
    counts: parseCounts(row.counts_json),
    status: row.status === "completed" || row.status === "failed" ? row.status : "running",
    errorMessage: row.error_message,
  };
}

function toHistoryRow(h: HistoricalProject): RawHistoryRow {
  return {
    gid: h.gid,
    name: h.name,
    owner_gid: h.ownerGid,
    owner_name: h.ownerName,
    status: h.status,
    last_status_update_at: h.lastStatusUpdateAt,
    last_status_update_by: h.lastStatusUpdateBy,
    pmo_id: h.pmoId,
    sponsor: h.sponsor,
    client_name: h.clientName,
    project_lead: h.projectLead,
    business_vertical: h.businessVertical,
    project_phase: h.projectPhase,
    completed_flag: h.completedFlag ? 1 : 0,
    search_text: h.searchText,
    raw_data: h.rawData,
    snapshot_at: h.snapshotAt,
  };
}

function toHistoricalProject(row: RawHistoryRow): HistoricalProject {
  return {
    gid: row.gid,
    name: row.name,
    ownerGid: row.owner_gid,
    ownerName: row.owner_name,
    status: isProjectStatus(row.status) ? row.status : null,
    lastStatusUpdateAt: row.last_status_update_at,
    lastStatusUpdateBy: row.last_status_update_by,
    pmoId: row.pmo_id,
    sponsor: row.sponsor,
    clientName: row.client_name,
    projectLead: row.project_lead,
    businessVertical: row.business_vertical,
    projectPhase: row.project_phase,
    completedFlag: row.completed_flag === 1,
    searchText: row.search_text,
    rawData: row.raw_data,
    snapshotAt: row.snapshot_at,
  };
}

function toInaccessibleReason(value: string): InaccessibleReason {
  return value === "forbidden" || value === "not_found" ? value : "failed";
}
