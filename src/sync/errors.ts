export class AsanaApiError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
  ) {
    super(message);
    this.name = "AsanaApiError";
  }

  get transient(): boolean {
    return isTransientStatus(this.status);
  }
}

export class ClockifyApiError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
  ) {
    super(message);
    this.name = "ClockifyApiError";
  }
}

/** The state store can no longer be written; nothing further can be committed. */
export class StoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}

export type FindingStateCode = "not_found" | "invalid_transition" | "comment_required";

export class FindingStateError extends Error {
  constructor(
    message: string,
    readonly code: FindingStateCode,
  ) {
    super(message);
    this.name = "FindingStateError";
  }
}

/** null = the request never got a response (network error, timeout). */
export function isTransientStatus(status: number | null): boolean {
  return status === null || status === 429 || status >= 500;
}

const UNAVAILABLE_SQLITE_CODES = [
  "SQLITE_IOERR",
  "SQLITE_CANTOPEN",
  "SQLITE_CORRUPT",
  "SQLITE_NOTADB",
  "SQLITE_FULL",
  "SQLITE_READONLY",
];

export function isStoreUnavailable(error: unknown): boolean {
  if (error instanceof StoreUnavailableError) return true;
  if (!(error instanceof Error)) return false;
  if (error.message.includes("database connection is not open")) return true;
  const code = "code" in error && typeof error.code === "string" ? error.code : "";
  return UNAVAILABLE_SQLITE_CODES.some((prefix) => code.startsWith(prefix));
}
