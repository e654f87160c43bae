import type { FieldChange, ProjectRecord } from "@/sync/types";
import { toCalendarDate, toIsoTimestamp } from "@/sync/dates";

type FieldKind = "date" | "timestamp" | "text" | "number";

interface AuditedField {
  key: keyof ProjectRecord;
  /** Column name, also the `field_name` written to the changelog. */
  column: string;
  kind: FieldKind;
}

/** The only fields whose transitions are recorded in the changelog. */
export const AUDITED_FIELDS: readonly AuditedField[] = [
  { key: "dueDate", column: "due_date", kind: "date" },
  { key: "ownerGid", column: "owner_gid", kind: "text" },
  { key: "ownerName", column: "owner_name", kind: "text" },
  { key: "status", column: "status", kind: "text" },
  { key: "lastStatusUpdateAt", column: "last_status_update_at", kind: "timestamp" },
  { key: "lastStatusUpdateBy", column: "last_status_update_by", kind: "text" },
  { key: "totalTasks", column: "total_tasks", kind: "number" },
  { key: "completedTasks", column: "completed_tasks", kind: "number" },
  { key: "calculatedProgress", column: "calculated_progress", kind: "number" },
];

/**
 * Canonical string form of a field value, or null when the field is absent.
 * Dates compare as calendar dates, timestamps as instants, text trimmed and
 * numbers at two decimals.
 */
export function normalizeFieldValue(value: ProjectRecord[keyof ProjectRecord], kind: FieldKind): string | null {
  if (value === null || value === undefined) return null;
  switch (kind) {
    case "date":
      return toCalendarDate(String(value));
    case "timestamp":
      return toIsoTimestamp(String(value)) ?? (String(value).trim() || null);
    case "number": {
      const n = typeof value === "number" ? value : Number(value);
      if (!Number.isFinite(n)) return null;
      return String(Math.round(n * 100) / 100);
    }
    case "text": {
      const trimmed = String(value).trim();
      return trimmed.length > 0 ? trimmed : null;
    }
  }
}

/**
 * Field-level changes between the stored snapshot and a freshly built record,
 * in `AUDITED_FIELDS` order. A first observation (no previous record) has
 * nothing to diff against and yields no changes.
 */
export function detectChanges(previous: ProjectRecord | undefined, next: ProjectRecord): FieldChange[] {
  if (!previous) return [];

  const changes: FieldChange[] = [];
  for (const field of AUDITED_FIELDS) {
    const oldValue = normalizeFieldValue(previous[field.key], field.kind);
    const newValue = normalizeFieldValue(next[field.key], field.kind);
    if (oldValue !== newValue) {
      changes.push({ field: field.column, oldValue, newValue });
    }
  }
  return changes;
}
