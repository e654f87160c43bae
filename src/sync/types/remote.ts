import type { ProjectStatus } from "./index";

export type CustomFieldValue = string | number | boolean | null;

export interface CurrentStatus {
  status: ProjectStatus | null;
  createdAt: string | null;
  authorName: string | null;
}

/** Normalized Asana project, as seen by the core. */
export interface ProjectPayload {
  gid: string;
  name: string;
  ownerGid: string | null;
  ownerName: string | null;
  dueDate: string | null;
  startOn: string | null;
  createdAt: string | null;
  modifiedAt: string | null;
  completed: boolean;
  completedAt: string | null;
  currentStatus: CurrentStatus | null;
  /** Keyed by the custom field's display name. */
  customFields: Record<string, CustomFieldValue>;
  raw: unknown;
}

export interface TaskPayload {
  gid: string;
  name: string | null;
  completed: boolean;
  createdAt: string | null;
  completedAt: string | null;
  modifiedAt: string | null;
}

export interface StatusUpdatePayload {
  gid: string;
  createdAt: string | null;
  authorGid: string | null;
  authorName: string | null;
  status: ProjectStatus | null;
  title: string | null;
  text: string | null;
  htmlText: string | null;
  raw: unknown;
}

export interface CommentPayload {
  gid: string;
  createdAt: string | null;
  authorGid: string | null;
  authorName: string | null;
  text: string | null;
  htmlText: string | null;
  raw: unknown;
}

export type FetchOutcome<T> =
  | { status: "ok"; data: T }
  | { status: "not_found" }
  | { status: "forbidden" }
  | { status: "transient"; error: string }
  | { status: "failed"; error: string };

export interface ProjectListFilter {
  workspaceGid: string;
  /** Archived projects are skipped unless set. */
  includeArchived?: boolean;
}

/** Read-only view of the work-tracking API. */
export interface RemoteDataClient {
  /** Throws when the listing itself cannot be obtained; the run cannot proceed without it. */
  listActiveProjects(filter: ProjectListFilter): Promise<ProjectPayload[]>;
  getProject(projectGid: string): Promise<FetchOutcome<ProjectPayload>>;
  getProjectTasks(projectGid: string): Promise<FetchOutcome<TaskPayload[]>>;
  listStatusUpdates(projectGid: string): Promise<FetchOutcome<StatusUpdatePayload[]>>;
  listStatusUpdateComments(statusUpdateGid: string): Promise<FetchOutcome<CommentPayload[]>>;
}
