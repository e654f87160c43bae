import type { ProjectStatus } from "@/sync/types";
import type {
  CommentPayload,
  CustomFieldValue,
  ProjectPayload,
  StatusUpdatePayload,
  TaskPayload,
} from "@/sync/types/remote";
import { toCalendarDate, toIsoTimestamp } from "@/sync/dates";
import { createChildLogger } from "@/sync/logger";
import { parseItems } from "@/sync/normalize";
import {
  asanaCustomFieldSchema,
  asanaProjectSchema,
  asanaStatusUpdateSchema,
  asanaStorySchema,
  asanaTaskSchema,
  type AsanaCustomField,
  type AsanaProject,
  type AsanaStatusUpdate,
  type AsanaStory,
  type AsanaTask,
} from "./types";

const log = createChildLogger("asana-mappers");

export function parseProject(payload: unknown): ProjectPayload | null {
  const result = asanaProjectSchema.safeParse(payload);
  if (!result.success) {
    log.warn("Malformed project payload", { issues: result.error.issues.length });
    return null;
  }
  return mapProject(result.data);
}

export function parseProjects(payload: unknown, context: string): ProjectPayload[] {
  return parseItems(asanaProjectSchema, payload, context).map(mapProject);
}

export function parseTasks(payload: unknown, context: string): TaskPayload[] {
  return parseItems(asanaTaskSchema, payload, context).map(mapTask);
}

export function parseStatusUpdates(payload: unknown, context: string): StatusUpdatePayload[] {
  return parseItems(asanaStatusUpdateSchema, payload, context).map(mapStatusUpdate);
}

/** Only human comments; system stories on a status update are skipped. */
export function parseComments(payload: unknown, context: string): CommentPayload[] {
  return parseItems(asanaStorySchema, payload, context)
    .filter((s) => s.resource_subtype === "comment_added" || (!s.resource_subtype && s.type === "comment"))
    .map(mapStory);
}

const STATUS_TYPES: Record<string, ProjectStatus> = {
  on_track: "on_track",
  at_risk: "at_risk",
  off_track: "off_track",
  on_hold: "on_hold",
};

// Legacy current_status colours
const STATUS_COLORS: Record<string, ProjectStatus> = {
  green: "on_track",
  yellow: "at_risk",
  red: "off_track",
  blue: "on_hold",
};

export function mapStatus(statusType?: string | null, color?: string | null): ProjectStatus | null {
  if (statusType && STATUS_TYPES[statusType]) return STATUS_TYPES[statusType];
  if (color && STATUS_COLORS[color]) return STATUS_COLORS[color];
  return null;
}

export function mapProject(raw: AsanaProject): ProjectPayload {
  const update = raw.current_status_update ?? null;
  const legacy = raw.current_status ?? null;

  let currentStatus: ProjectPayload["currentStatus"] = null;
  if (update || legacy) {
    currentStatus = {
      status: mapStatus(update?.status_type, legacy?.color),
      createdAt: toIsoTimestamp(update?.created_at ?? legacy?.created_at),
      authorName: clean(update?.created_by?.name ?? legacy?.author?.name),
    };
  }

  return {
    gid: raw.gid,
    name: clean(raw.name) ?? "(untitled)",
    ownerGid: clean(raw.owner?.gid),
    ownerName: clean(raw.owner?.name),
    dueDate: toCalendarDate(raw.due_date ?? raw.due_on),
    startOn: toCalendarDate(raw.start_on),
    createdAt: toIsoTimestamp(raw.created_at),
    modifiedAt: toIsoTimestamp(raw.modified_at),
    completed: raw.completed === true,
    completedAt: toIsoTimestamp(raw.completed_at),
    currentStatus,
    customFields: customFieldMap(raw.custom_fields),
    raw,
  };
}

export function mapTask(raw: AsanaTask): TaskPayload {
  return {
    gid: raw.gid,
    name: clean(raw.name),
    completed: raw.completed === true,
    createdAt: toIsoTimestamp(raw.created_at),
    completedAt: toIsoTimestamp(raw.completed_at),
    modifiedAt: toIsoTimestamp(raw.modified_at),
  };
}

export function mapStatusUpdate(raw: AsanaStatusUpdate): StatusUpdatePayload {
  const author = raw.author ?? raw.created_by ?? null;
  return {
    gid: raw.gid,
    createdAt: toIsoTimestamp(raw.created_at),
    authorGid: clean(author?.gid),
    authorName: clean(author?.name),
    status: mapStatus(raw.status_type),
    title: clean(raw.title),
    text: raw.text ?? null,
    htmlText: raw.html_text ?? null,
    raw,
  };
}

export function mapStory(raw: AsanaStory): CommentPayload {
  return {
    gid: raw.gid,
    createdAt: toIsoTimestamp(raw.created_at),
    authorGid: clean(raw.created_by?.gid),
    authorName: clean(raw.created_by?.name),
    text: raw.text ?? null,
    htmlText: raw.html_text ?? null,
    raw,
  };
}

// --- Custom fields ---

export function customFieldValue(field: AsanaCustomField): CustomFieldValue {
  if (field.display_value !== null && field.display_value !== undefined && field.display_value !== "") {
    return field.display_value;
  }
  if (field.text_value) return field.text_value;
  if (typeof field.number_value === "number") return field.number_value;
  if (field.enum_value?.name) return field.enum_value.name;
  if (field.multi_enum_values?.length) {
    const names = field.multi_enum_values.map((v) => v.name).filter((n): n is string => !!n);
    if (names.length > 0) return names.join(", ");
  }
  if (field.date_value?.date) return field.date_value.date;
  return null;
}

export function customFieldMap(payload: unknown): Record<string, CustomFieldValue> {
  const out: Record<string, CustomFieldValue> = {};
  if (payload === null || payload === undefined) return out;
  for (const field of parseItems(asanaCustomFieldSchema, payload, "custom_fields")) {
    const name = clean(field.name);
    if (!name) continue;
    out[name] = customFieldValue(field);
  }
  return out;
}

export interface ProjectClassification {
  pmoId: string | null;
  sponsor: string | null;
  clientName: string | null;
  projectLead: string | null;
  projectType: string | null;
  country: string | null;
  businessVertical: string | null;
  projectPhase: string | null;
  inBillingPlan: boolean | null;
  startDate: string | null;
  plannedEndDate: string | null;
  plannedHoursTotal: number | null;
  effectiveHoursTotal: number | null;
}

// Custom field names as configured in the workspace, compared lowercased
const FIELD_NAMES = {
  pmoId: ["pmo id"],
  sponsor: ["sponsor"],
  clientName: ["cliente_nuevo", "cliente nuevo"],
  projectLead: ["responsable proyecto"],
  projectType: ["tipo de proyecto", "tipo proyecto"],
  country: ["país", "pais"],
  businessVertical: ["business vertical"],
  projectPhase: ["fase del proyecto"],
  startDate: ["fecha inicio del proyecto"],
  plannedEndDate: ["fecha planificada termino del proyecto"],
  plannedHours: ["horas planificadas", "horas planificada"],
  effectiveHours: ["horas efectivas"],
} as const;

const BILLING_PLAN_PREFIX = "en plan de fact";

export function classifyProject(project: ProjectPayload): ProjectClassification {
  const byName = new Map<string, CustomFieldValue>();
  for (const [name, value] of Object.entries(project.customFields)) {
    byName.set(name.trim().toLowerCase(), value);
  }
  const pick = (names: readonly string[]): CustomFieldValue => {
    for (const name of names) {
      const value = byName.get(name);
      if (value !== undefined && value !== null && value !== "") return value;
    }
    return null;
  };
  const text = (names: readonly string[]) => clean(asText(pick(names)));

  let inBillingPlan: boolean | null = null;
  for (const [name, value] of byName) {
    if (name.startsWith(BILLING_PLAN_PREFIX)) {
      const normalized = (asText(value) ?? "").trim().toLowerCase();
      inBillingPlan = normalized === "si" || normalized === "sí";
      break;
    }
  }

  return {
    pmoId: text(FIELD_NAMES.pmoId),
    sponsor: text(FIELD_NAMES.sponsor),
    clientName: text(FIELD_NAMES.clientName),
    projectLead: text(FIELD_NAMES.projectLead),
    projectType: text(FIELD_NAMES.projectType),
    country: text(FIELD_NAMES.country),
    businessVertical: text(FIELD_NAMES.businessVertical),
    projectPhase: text(FIELD_NAMES.projectPhase),
    inBillingPlan,
    startDate: toCalendarDate(asText(pick(FIELD_NAMES.startDate))) ?? project.startOn,
    plannedEndDate: toCalendarDate(asText(pick(FIELD_NAMES.plannedEndDate))) ?? project.dueDate,
    plannedHoursTotal: parseHours(pick(FIELD_NAMES.plannedHours)),
    effectiveHoursTotal: parseHours(pick(FIELD_NAMES.effectiveHours)),
  };
}

/**
 * "120,5 h", "1.200,5" or "1,200.5": the last separator is the decimal point,
 * any other separator groups thousands.
 */
export function parseHours(value: CustomFieldValue): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const stripped = value.replace(/[^0-9.,-]/g, "");
  if (!stripped) return null;
  const decimalAt = Math.max(stripped.lastIndexOf(","), stripped.lastIndexOf("."));
  const normalized =
    decimalAt === -1
      ? stripped
      : `${stripped.slice(0, decimalAt).replace(/[.,]/g, "")}.${stripped.slice(decimalAt + 1)}`;
  const parsed = Number.parseFloat(normalized);
  return Number.isFinite(parsed) ? parsed : null;
}

function asText(value: CustomFieldValue): string | null {
  if (value === null) return null;
  return String(value);
}

function clean(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}
