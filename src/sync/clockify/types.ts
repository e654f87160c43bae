import { z } from "zod";

// --- API shapes (only the fields we read) ---

export const clockifyUserSchema = z
  .object({
    id: z.string(),
    name: z.string().nullish(),
    email: z.string().nullish(),
    status: z.string().nullish(),
  })
  .passthrough();

export const clockifyProjectSchema = z
  .object({
    id: z.string(),
    name: z.string().nullish(),
    clientName: z.string().nullish(),
    archived: z.boolean().nullish(),
  })
  .passthrough();

export const clockifyTimeEntrySchema = z
  .object({
    id: z.string(),
    userId: z.string().nullish(),
    projectId: z.string().nullish(),
    description: z.string().nullish(),
    billable: z.boolean().nullish(),
    timeInterval: z
      .object({
        start: z.string().nullish(),
        end: z.string().nullish(),
        duration: z.string().nullish(),
      })
      .nullish(),
  })
  .passthrough();

export type ClockifyUser = z.infer<typeof clockifyUserSchema>;
export type ClockifyProject = z.infer<typeof clockifyProjectSchema>;
export type ClockifyTimeEntry = z.infer<typeof clockifyTimeEntrySchema>;

// --- Stored records ---

export interface ClockifyPersonRecord {
  id: string;
  name: string | null;
  email: string | null;
  status: string | null;
}

export interface ClockifyProjectRecord {
  id: string;
  name: string;
  clientName: string | null;
  archived: boolean;
}

export interface TimeEntryRecord {
  id: string;
  userId: string;
  projectId: string | null;
  description: string | null;
  startAt: string;
  endAt: string | null;
  hours: number;
  /** UTC calendar date of `startAt`. */
  entryDate: string;
  billable: boolean;
}

export interface ProjectHours {
  projectId: string | null;
  projectName: string | null;
  hours: number;
  entries: number;
}
