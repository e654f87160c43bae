import type { ProjectRecord } from "@/sync/types";
import type { ProjectPayload } from "@/sync/types/remote";
import { classifyProject } from "@/sync/asana/mappers";
import { parseTimestamp, subtractDays } from "@/sync/dates";

export type ScopeClass = "in_scope" | "closed_recent" | "closed_expired" | "out_of_scope";

export interface ScopeOptions {
  /** Business verticals to keep, compared case-insensitively. Empty keeps all. */
  businessVerticals: string[];
  retentionDays: number;
  now: Date;
}

const CLOSED_PHASE_MARKERS = ["terminad", "cancelad"];

export function isClosedPhase(phase: string | null): boolean {
  if (!phase) return false;
  const lower = phase.toLowerCase();
  return CLOSED_PHASE_MARKERS.some((marker) => lower.includes(marker));
}

export function isClosedRecord(record: Pick<ProjectRecord, "completedFlag" | "projectPhase">): boolean {
  return record.completedFlag || isClosedPhase(record.projectPhase);
}

export function classifyScope(project: ProjectPayload, options: ScopeOptions): ScopeClass {
  const { pmoId, businessVertical, projectPhase } = classifyProject(project);
  if (!pmoId) return "out_of_scope";

  if (options.businessVerticals.length > 0) {
    const vertical = businessVertical?.toLowerCase() ?? "";
    if (!options.businessVerticals.some((v) => v.toLowerCase() === vertical)) return "out_of_scope";
  }

  if (!project.completed && !isClosedPhase(projectPhase)) return "in_scope";

  const closedAt = parseTimestamp(project.completedAt ?? project.modifiedAt);
  const cutoff = subtractDays(options.now, options.retentionDays).getTime();
  // Unknown closure date: keep syncing rather than archive blindly
  if (closedAt === null || closedAt >= cutoff) return "closed_recent";
  return "closed_expired";
}
