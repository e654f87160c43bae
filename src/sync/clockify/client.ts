import { ClockifyApiError, isTransientStatus } from "@/sync/errors";
import { createChildLogger, errorMessage } from "@/sync/logger";
import { extractCollection } from "@/sync/normalize";
import { parseClockifyProjects, parsePeople, parseTimeEntries } from "./mappers";
import type { ClockifyPersonRecord, ClockifyProjectRecord, TimeEntryRecord } from "./types";

const log = createChildLogger("clockify-client");

const DEFAULT_BASE_URL = "https://api.clockify.me/api/v1";
const PAGE_SIZE = 500;
const MAX_ATTEMPTS = 3;
const BACKOFF_BASE_MS = 1_000;

export interface ClockifyClientOptions {
  apiKey: string;
  workspaceId: string;
  baseUrl?: string;
  pageSize?: number;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

/** Read-only Clockify client. Failures throw `ClockifyApiError`. */
export class ClockifyClient {
  private apiKey: string;
  private workspaceId: string;
  private baseUrl: string;
  private pageSize: number;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: ClockifyClientOptions) {
    this.apiKey = options.apiKey;
    this.workspaceId = options.workspaceId;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.pageSize = options.pageSize ?? PAGE_SIZE;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  private async request(path: string, params: Record<string, string>): Promise<unknown> {
    const url = new URL(`${this.baseUrl}${path}`);
    Object.entries(params).forEach(([k, v]) => {
      if (v !== "") url.searchParams.set(k, v);
    });

    for (let attempt = 1; ; attempt++) {
      let status: number | null = null;
      let message: string;
      try {
        log.debug("Clockify API request", { path, attempt });
        const response = await this.fetchImpl(url.toString(), {
          headers: { "X-Api-Key": this.apiKey, Accept: "application/json" },
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        if (response.ok) return await response.json();
        status = response.status;
        const body = await response.text().catch(() => "");
        message = `Clockify API error: ${response.status} ${body.slice(0, 200)}`;
      } catch (error) {
        message = `Clockify request failed: ${errorMessage(error)}`;
      }

      if (!isTransientStatus(status) || attempt >= MAX_ATTEMPTS) {
        throw new ClockifyApiError(message, status);
      }
      const delay = BACKOFF_BASE_MS * 2 ** (attempt - 1);
      log.warn("Transient Clockify error — retrying", { path, attempt, status, delayMs: delay });
      await this.sleep(delay);
    }
  }

  /** Pages until a short (or empty) page comes back. */
  private async fetchAllPages(path: string, params: Record<string, string> = {}): Promise<unknown[]> {
    const all: unknown[] = [];
    for (let page = 1; ; page++) {
      const body = await this.request(path, { ...params, page: String(page), "page-size": String(this.pageSize) });
      const items = extractCollection(body, path);
      all.push(...items);
      if (items.length < this.pageSize) return all;
    }
  }

  async listUsers(): Promise<ClockifyPersonRecord[]> {
    return parsePeople(await this.fetchAllPages(`/workspaces/${this.workspaceId}/users`));
  }

  async listProjects(): Promise<ClockifyProjectRecord[]> {
    return parseClockifyProjects(await this.fetchAllPages(`/workspaces/${this.workspaceId}/projects`));
  }

  async listTimeEntries(userId: string, range: { start: string; end: string }): Promise<TimeEntryRecord[]> {
    const path = `/workspaces/${this.workspaceId}/user/${encodeURIComponent(userId)}/time-entries`;
    return parseTimeEntries(await this.fetchAllPages(path, range), `clockify:time-entries:${userId}`);
  }
}
