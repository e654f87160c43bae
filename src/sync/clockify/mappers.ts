import { parseItems } from "@/sync/normalize";
import { toIsoTimestamp } from "@/sync/dates";
import {
  clockifyProjectSchema,
  clockifyTimeEntrySchema,
  clockifyUserSchema,
  type ClockifyProject,
  type ClockifyTimeEntry,
  type ClockifyUser,
  type ClockifyPersonRecord,
  type ClockifyProjectRecord,
  type TimeEntryRecord,
} from "./types";

const ISO_DURATION = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+(?:\.\d+)?)S)?)?$/;

/** Seconds in an ISO-8601 duration such as "PT1H30M"; null when unparseable. */
export function parseIsoDuration(value: string | null | undefined): number | null {
  if (!value) return null;
  const match = ISO_DURATION.exec(value.trim());
  if (!match || value.trim() === "P" || value.trim() === "PT") return null;
  const [, days, hours, minutes, seconds] = match;
  return (
    Number(days ?? 0) * 86_400 +
    Number(hours ?? 0) * 3_600 +
    Number(minutes ?? 0) * 60 +
    Number(seconds ?? 0)
  );
}

function roundHours(seconds: number): number {
  return Math.round((seconds / 3_600) * 100) / 100;
}

// Clockify placeholders for "no project"
const NO_PROJECT = new Set(["", "NO_PROJECT"]);

/**
 * Stored form of a time entry. Entries without a user or start, and entries
 * that amount to zero hours (running timers included), are dropped.
 */
export function normalizeTimeEntry(raw: ClockifyTimeEntry): TimeEntryRecord | null {
  const startAt = toIsoTimestamp(raw.timeInterval?.start);
  if (!raw.userId || !startAt) return null;
  const endAt = toIsoTimestamp(raw.timeInterval?.end);

  let seconds = parseIsoDuration(raw.timeInterval?.duration);
  if ((seconds === null || seconds <= 0) && endAt) {
    seconds = (Date.parse(endAt) - Date.parse(startAt)) / 1000;
  }
  if (seconds === null || seconds <= 0) return null;
  const hours = roundHours(seconds);
  if (hours <= 0) return null;

  const projectId = raw.projectId && !NO_PROJECT.has(raw.projectId) ? raw.projectId : null;
  return {
    id: raw.id,
    userId: raw.userId,
    projectId,
    description: raw.description?.trim() || null,
    startAt,
    endAt,
    hours,
    entryDate: startAt.slice(0, 10),
    billable: raw.billable === true,
  };
}

export function mapPerson(raw: ClockifyUser): ClockifyPersonRecord {
  return {
    id: raw.id,
    name: raw.name?.trim() || raw.email?.trim() || null,
    email: raw.email ?? null,
    status: raw.status ?? null,
  };
}

export function mapClockifyProject(raw: ClockifyProject): ClockifyProjectRecord {
  return {
    id: raw.id,
    name: raw.name?.trim() || "Unnamed Project",
    clientName: raw.clientName?.trim() || null,
    archived: raw.archived === true,
  };
}

export function parsePeople(payload: unknown): ClockifyPersonRecord[] {
  return parseItems(clockifyUserSchema, payload, "clockify:users").map(mapPerson);
}

export function parseClockifyProjects(payload: unknown): ClockifyProjectRecord[] {
  return parseItems(clockifyProjectSchema, payload, "clockify:projects").map(mapClockifyProject);
}

export function parseTimeEntries(payload: unknown, context: string): TimeEntryRecord[] {
  const entries: TimeEntryRecord[] = [];
  for (const raw of parseItems(clockifyTimeEntrySchema, payload, context)) {
    const entry = normalizeTimeEntry(raw);
    if (entry) entries.push(entry);
  }
  return entries;
}
