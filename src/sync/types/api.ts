import { z } from "zod";

export const syncRunRequestSchema = z
  .object({
    workers: z.number().int().min(1).max(32).optional(),
    lookbackDays: z.number().int().min(1).max(90).optional(),
  })
  .default({});

export const findingsQuerySchema = z.object({
  status: z.enum(["open", "acknowledged", "resolved", "active", "all"]).default("active"),
});

export const findingIdSchema = z.coerce.number().int().positive();

export const acknowledgeRequestSchema = z.object({
  comment: z.string().trim().min(1, "A comment is required to acknowledge a finding"),
  by: z.string().trim().min(1).optional(),
});

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

export const hoursQuerySchema = z
  .object({ from: isoDate.optional(), to: isoDate.optional() })
  .refine((q) => (q.from === undefined) === (q.to === undefined), "from and to go together");

export type SyncRunRequest = z.infer<typeof syncRunRequestSchema>;
export type FindingsQuery = z.infer<typeof findingsQuerySchema>;
export type AcknowledgeRequest = z.infer<typeof acknowledgeRequestSchema>;
export type HoursQuery = z.infer<typeof hoursQuerySchema>;
