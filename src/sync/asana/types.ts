// Raw response shapes from the Asana REST API (read endpoints only)
// Docs: https://developers.asana.com/reference/rest-api-reference

import { z } from "zod";

const nullableString = z.string().nullable().optional();

const compactUser = z
  .object({
    gid: nullableString,
    name: nullableString,
  })
  .passthrough();

export const asanaCustomFieldSchema = z
  .object({
    gid: nullableString,
    name: nullableString,
    display_value: z.union([z.string(), z.number()]).nullable().optional(),
    text_value: nullableString,
    number_value: z.number().nullable().optional(),
    enum_value: z.object({ name: nullableString }).passthrough().nullable().optional(),
    multi_enum_values: z.array(z.object({ name: nullableString }).passthrough()).nullable().optional(),
    date_value: z.object({ date: nullableString }).passthrough().nullable().optional(),
  })
  .passthrough();

export const asanaProjectSchema = z
  .object({
    gid: z.string().min(1),
    name: nullableString,
    owner: compactUser.nullable().optional(),
    due_date: nullableString,
    due_on: nullableString,
    start_on: nullableString,
    created_at: nullableString,
    modified_at: nullableString,
    completed: z.boolean().nullable().optional(),
    completed_at: nullableString,
    archived: z.boolean().nullable().optional(),
    current_status: z
      .object({
        color: nullableString,
        created_at: nullableString,
        author: compactUser.nullable().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
    current_status_update: z
      .object({
        gid: nullableString,
        status_type: nullableString,
        created_at: nullableString,
        created_by: compactUser.nullable().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
    // Some workspaces return custom fields as an object keyed by gid; the mapper accepts both
    custom_fields: z.unknown().optional(),
  })
  .passthrough();

export const asanaTaskSchema = z
  .object({
    gid: z.string().min(1),
    name: nullableString,
    completed: z.boolean().nullable().optional(),
    created_at: nullableString,
    completed_at: nullableString,
    modified_at: nullableString,
  })
  .passthrough();

export const asanaStatusUpdateSchema = z
  .object({
    gid: z.string().min(1),
    created_at: nullableString,
    author: compactUser.nullable().optional(),
    created_by: compactUser.nullable().optional(),
    status_type: nullableString,
    title: nullableString,
    text: nullableString,
    html_text: nullableString,
  })
  .passthrough();

export const asanaStorySchema = z
  .object({
    gid: z.string().min(1),
    created_at: nullableString,
    created_by: compactUser.nullable().optional(),
    resource_subtype: nullableString,
    type: nullableString,
    text: nullableString,
    html_text: nullableString,
  })
  .passthrough();

export type AsanaCustomField = z.infer<typeof asanaCustomFieldSchema>;
export type AsanaProject = z.infer<typeof asanaProjectSchema>;
export type AsanaTask = z.infer<typeof asanaTaskSchema>;
export type AsanaStatusUpdate = z.infer<typeof asanaStatusUpdateSchema>;
export type AsanaStory = z.infer<typeof asanaStorySchema>;

export interface AsanaNextPage {
  offset: string;
  path?: string;
  uri?: string;
}

export interface AsanaListResponse {
  data: unknown;
  next_page?: AsanaNextPage | null;
}

export const PROJECT_OPT_FIELDS = [
  "name",
  "owner",
  "owner.name",
  "owner.gid",
  "due_date",
  "due_on",
  "start_on",
  "created_at",
  "modified_at",
  "completed",
  "completed_at",
  "archived",
  "current_status",
  "current_status.color",
  "current_status.created_at",
  "current_status.author.name",
  "current_status_update",
  "current_status_update.status_type",
  "current_status_update.created_at",
  "current_status_update.created_by.name",
  "custom_fields",
  "custom_fields.name",
  "custom_fields.display_value",
  "custom_fields.text_value",
  "custom_fields.number_value",
  "custom_fields.enum_value.name",
  "custom_fields.multi_enum_values.name",
  "custom_fields.date_value.date",
];

export const TASK_OPT_FIELDS = ["name", "completed", "created_at", "completed_at", "modified_at"];

export const STATUS_UPDATE_OPT_FIELDS = [
  "created_at",
  "author.name",
  "author.gid",
  "created_by.name",
  "created_by.gid",
  "status_type",
  "title",
  "text",
  "html_text",
];

export const STORY_OPT_FIELDS = [
  "created_at",
  "created_by.name",
  "created_by.gid",
  "resource_subtype",
  "type",
  "text",
  "html_text",
];
