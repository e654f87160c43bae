import fs from "fs";
import path from "path";
import { z } from "zod";
import { SEVERITIES } from "@/sync/types";

const severitySchema = z.enum(SEVERITIES);

const thresholdSchema = z.object({
  daysRemaining: z.number().int(),
  minProgress: z.number().min(0).max(100),
  severity: severitySchema,
});

const DEFAULT_THRESHOLDS: z.infer<typeof thresholdSchema>[] = [
  { daysRemaining: 7, minProgress: 80, severity: "high" },
  { daysRemaining: 14, minProgress: 60, severity: "medium" },
  { daysRemaining: 30, minProgress: 40, severity: "low" },
];

export const rulesConfigSchema = z.object({
  no_status_update: z
    .object({
      enabled: z.boolean().default(true),
      daysThreshold: z.number().int().min(0).default(7),
      severity: severitySchema.default("medium"),
    })
    .default({}),
  no_activity: z
    .object({
      enabled: z.boolean().default(true),
      severity: severitySchema.default("medium"),
      // amount_of_tasks already reports empty projects
      skipWhenNoTasks: z.boolean().default(false),
    })
    .default({}),
  schedule_risk: z
    .object({
      enabled: z.boolean().default(true),
      thresholds: z.array(thresholdSchema).min(1).default(DEFAULT_THRESHOLDS),
    })
    .default({}),
  amount_of_tasks: z
    .object({
      enabled: z.boolean().default(true),
      maxTasks: z.number().int().min(0).default(3),
      severity: severitySchema.default("medium"),
    })
    .default({}),
  notifications: z
    .object({
      notifyOnEscalation: z.boolean().default(true),
    })
    .default({}),
});

export type RulesConfig = z.infer<typeof rulesConfigSchema>;
export type ScheduleThreshold = z.infer<typeof thresholdSchema>;

export function defaultRulesConfig(): RulesConfig {
  return rulesConfigSchema.parse({});
}

export function parseRulesConfig(input: unknown): RulesConfig {
  const result = rulesConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid rules configuration:\n${issues}`);
  }
  return result.data;
}

/** Reads the rules JSON file, or the built-in defaults when no path is given. */
export function loadRulesConfig(filePath?: string): RulesConfig {
  if (!filePath) return defaultRulesConfig();
  const resolved = path.resolve(filePath);
  const text = fs.readFileSync(resolved, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new Error(`Rules configuration ${resolved} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseRulesConfig(parsed);
}
