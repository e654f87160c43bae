import { z } from "zod";

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const envSchema = z.object({
  // Asana is read-only: the token only needs read scope
  ASANA_ACCESS_TOKEN: z.string().optional(),
  ASANA_WORKSPACE_GID: z.string().optional(),
  ASANA_BASE_URL: z.string().url().default("https://app.asana.com/api/1.0"),
  ASANA_TIMEOUT_MS: intFromEnv(30_000, 1_000, 300_000),
  ASANA_MAX_RETRIES: intFromEnv(5, 1, 10),

  CLOCKIFY_API_KEY: z.string().optional(),
  CLOCKIFY_WORKSPACE_ID: z.string().optional(),
  CLOCKIFY_BASE_URL: z.string().url().default("https://api.clockify.me/api/v1"),
  CLOCKIFY_TIMEOUT_MS: intFromEnv(30_000, 1_000, 300_000),

  SLACK_WEBHOOK_URL: z.string().url().optional().or(z.literal("").transform(() => undefined)),
  SLACK_CHANNEL: z.string().default("#pmo-status"),

  SYNC_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default("info"),
  SYNC_DB_PATH: z
    .string()
    .default("./pmo_watch.db"),
  SYNC_WORKERS: intFromEnv(4, 1, 32),
  SYNC_LOOKBACK_DAYS: intFromEnv(7, 1, 90),
  SYNC_RETENTION_DAYS: intFromEnv(30, 0, 3650),
  SYNC_BUSINESS_VERTICALS: z
    .string()
    .default("")
    .transform((v) => v.split(",").map((s) => s.trim()).filter((s) => s.length > 0)),
  SYNC_DRY_RUN: z
    .string()
    .default("false")
    .transform((v) => v === "true"),
  RULES_CONFIG_PATH: z.string().optional(),
});

export type SyncEnv = z.infer<typeof envSchema>;

let _env: SyncEnv | null = null;

export function getEnv(): SyncEnv {
  if (!_env) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const invalid = result.error.issues
        .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
        .join("\n");
      throw new Error(
        `Sync environment validation failed:\n${invalid}\n\nCopy .env.example to .env.local and fill in the values.`
      );
    }
    _env = result.data;
  }
  return _env;
}

/** Asana credentials, required by every command that reads projects. */
export function requireAsanaEnv(env: SyncEnv = getEnv()): { token: string; workspaceGid: string } {
  if (!env.ASANA_ACCESS_TOKEN || !env.ASANA_WORKSPACE_GID) {
    throw new Error("ASANA_ACCESS_TOKEN and ASANA_WORKSPACE_GID must be set.");
  }
  return { token: env.ASANA_ACCESS_TOKEN, workspaceGid: env.ASANA_WORKSPACE_GID };
}

export function requireClockifyEnv(env: SyncEnv = getEnv()): { apiKey: string; workspaceId: string } {
  if (!env.CLOCKIFY_API_KEY || !env.CLOCKIFY_WORKSPACE_ID) {
    throw new Error("CLOCKIFY_API_KEY and CLOCKIFY_WORKSPACE_ID must be set.");
  }
  return { apiKey: env.CLOCKIFY_API_KEY, workspaceId: env.CLOCKIFY_WORKSPACE_ID };
}
