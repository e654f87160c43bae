import type {
  CommentPayload,
  FetchOutcome,
  ProjectListFilter,
  ProjectPayload,
  RemoteDataClient,
  StatusUpdatePayload,
  TaskPayload,
} from "@/sync/types/remote";
import { AsanaApiError, isTransientStatus } from "@/sync/errors";
import { createChildLogger, errorMessage } from "@/sync/logger";
import { extractCollection } from "@/sync/normalize";
import { parseComments, parseProject, parseProjects, parseStatusUpdates, parseTasks } from "./mappers";
import {
  PROJECT_OPT_FIELDS,
  STATUS_UPDATE_OPT_FIELDS,
  STORY_OPT_FIELDS,
  TASK_OPT_FIELDS,
  type AsanaListResponse,
} from "./types";

const log = createChildLogger("asana-client");

const DEFAULT_BASE_URL = "https://app.asana.com/api/1.0";
const PAGE_LIMIT = 100;
const BACKOFF_BASE_MS = 1_000;
const BACKOFF_MAX_MS = 30_000;

export interface AsanaClientOptions {
  token: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxAttempts?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

interface HttpFailure {
  ok: false;
  status: number | null;
  message: string;
}

type HttpResult = { ok: true; body: unknown } | HttpFailure;

/**
 * Read-only Asana REST client. Only GET endpoints are ever called.
 *
 * Rate limits (429), 5xx responses and network failures are retried with
 * exponential backoff before being reported as `transient`.
 */
export class AsanaClient implements RemoteDataClient {
  private baseUrl: string;
  private token: string;
  private timeoutMs: number;
  private maxAttempts: number;
  private fetchImpl: typeof fetch;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: AsanaClientOptions) {
    this.token = options.token;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 5);
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /** GET with retry. Never throws; failures come back as `ok: false`. */
  private async request(path: string, params?: Record<string, string>): Promise<HttpResult> {
    const url = new URL(`${this.baseUrl}${path}`);
    if (params) {
      Object.entries(params).forEach(([k, v]) => {
        if (v !== undefined && v !== "") url.searchParams.set(k, v);
      });
    }

    let last: HttpFailure = { ok: false, status: null, message: "no attempt made" };

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      let retryAfterMs: number | null = null;
      try {
        log.debug("Asana API request", { path, attempt });
        const response = await this.fetchImpl(url.toString(), {
          method: "GET",
          headers: {
            Authorization: `Bearer ${this.token}`,
            Accept: "application/json",
          },
          signal: AbortSignal.timeout(this.timeoutMs),
        });

        if (response.ok) {
          try {
            return { ok: true, body: await response.json() };
          } catch (error) {
            return { ok: false, status: response.status, message: `Malformed JSON from ${path}: ${errorMessage(error)}` };
          }
        }

        const body = await response.text().catch(() => "");
        last = {
          ok: false,
          status: response.status,
          message: `Asana API error: ${response.status} ${response.statusText}${body ? ` ${body.slice(0, 200)}` : ""}`,
        };
        retryAfterMs = parseRetryAfter(response.headers.get("retry-after"));
      } catch (error) {
        last = { ok: false, status: null, message: `Asana request failed: ${errorMessage(error)}` };
      }

      if (!isTransientStatus(last.status) || attempt === this.maxAttempts) break;

      const delay = retryAfterMs ?? Math.min(BACKOFF_MAX_MS, BACKOFF_BASE_MS * 2 ** (attempt - 1));
      log.warn("Transient Asana error — retrying", { path, attempt, status: last.status, delayMs: delay });
      await this.sleep(delay);
    }

    return last;
  }

  /** Follow `next_page.offset` until the collection is exhausted. */
  private async fetchAllPages(path: string, params: Record<string, string>): Promise<HttpResult> {
    const items: unknown[] = [];
    let offset: string | undefined;

    do {
      const result = await this.request(path, {
        ...params,
        limit: String(PAGE_LIMIT),
        ...(offset ? { offset } : {}),
      });
      if (!result.ok) return result;

      const page = asListResponse(result.body);
      items.push(...extractCollection(page?.data ?? result.body, path));
      offset = page?.next_page?.offset ?? undefined;
    } while (offset);

    return { ok: true, body: items };
  }

  // --- Projects ---

  async listActiveProjects(filter: ProjectListFilter): Promise<ProjectPayload[]> {
    log.info("Listing workspace projects...", { workspaceGid: filter.workspaceGid });
    const result = await this.fetchAllPages("/projects", {
      workspace: filter.workspaceGid,
      ...(filter.includeArchived ? {} : { archived: "false" }),
      opt_fields: PROJECT_OPT_FIELDS.join(","),
    });
    if (!result.ok) {
      throw new AsanaApiError(result.message, result.status);
    }
    const projects = parseProjects(result.body, "projects");
    log.info("Workspace projects listed", { count: projects.length });
    return projects;
  }

  async getProject(projectGid: string): Promise<FetchOutcome<ProjectPayload>> {
    const result = await this.request(`/projects/${encodeURIComponent(projectGid)}`, {
      opt_fields: PROJECT_OPT_FIELDS.join(","),
    });
    if (!result.ok) return toOutcome(result);

    const project = parseProject(asListResponse(result.body)?.data ?? null);
    if (!project) {
      return { status: "failed", error: `Malformed project payload for ${projectGid}` };
    }
    return { status: "ok", data: project };
  }

  // --- Tasks ---

  async getProjectTasks(projectGid: string): Promise<FetchOutcome<TaskPayload[]>> {
    const result = await this.fetchAllPages(`/projects/${encodeURIComponent(projectGid)}/tasks`, {
      opt_fields: TASK_OPT_FIELDS.join(","),
    });
    if (!result.ok) return toOutcome(result);
    return { status: "ok", data: parseTasks(result.body, `tasks:${projectGid}`) };
  }

  // --- Status updates ---

  async listStatusUpdates(projectGid: string): Promise<FetchOutcome<StatusUpdatePayload[]>> {
    const result = await this.fetchAllPages("/status_updates", {
      parent: projectGid,
      opt_fields: STATUS_UPDATE_OPT_FIELDS.join(","),
    });
    if (!result.ok) return toOutcome(result);
    return { status: "ok", data: parseStatusUpdates(result.body, `status_updates:${projectGid}`) };
  }

  async listStatusUpdateComments(statusUpdateGid: string): Promise<FetchOutcome<CommentPayload[]>> {
    const result = await this.fetchAllPages(`/tasks/${encodeURIComponent(statusUpdateGid)}/stories`, {
      opt_fields: STORY_OPT_FIELDS.join(","),
    });
    if (!result.ok) return toOutcome(result);
    return { status: "ok", data: parseComments(result.body, `stories:${statusUpdateGid}`) };
  }
}

function toOutcome<T>(result: HttpFailure): FetchOutcome<T> {
  if (result.status === 403) return { status: "forbidden" };
  if (result.status === 404) return { status: "not_found" };
  if (isTransientStatus(result.status)) return { status: "transient", error: result.message };
  return { status: "failed", error: result.message };
}

function asListResponse(body: unknown): AsanaListResponse | null {
  if (!body || typeof body !== "object" || Array.isArray(body)) return null;
  const data: unknown = Reflect.get(body, "data");
  const nextPage: unknown = Reflect.get(body, "next_page");
  let next_page: AsanaListResponse["next_page"] = null;
  if (nextPage && typeof nextPage === "object") {
    const offset: unknown = Reflect.get(nextPage, "offset");
    if (typeof offset === "string" && offset.length > 0) next_page = { offset };
  }
  return { data, next_page };
}

function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;
  const seconds = Number(header);
  if (!Number.isFinite(seconds) || seconds < 0) return null;
  return Math.min(BACKOFF_MAX_MS, seconds * 1000);
}
