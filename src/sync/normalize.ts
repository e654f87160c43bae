import type { z } from "zod";
import { createChildLogger } from "@/sync/logger";

const log = createChildLogger("normalize");

const COLLECTION_KEYS = ["data", "items", "results"] as const;

/**
 * Pull the list out of whatever shape the API returned. Anything that is not
 * a recognisable collection yields an empty list.
 */
export function extractCollection(payload: unknown, context: string): unknown[] {
  if (Array.isArray(payload)) return payload;
  if (payload && typeof payload === "object") {
    for (const key of COLLECTION_KEYS) {
      const value: unknown = Reflect.get(payload, key);
      if (Array.isArray(value)) return value;
    }
    // A keyed map of items ({ "<gid>": {...} })
    const values = Object.values(payload);
    if (values.length > 0 && values.every((v) => v !== null && typeof v === "object" && !Array.isArray(v))) {
      return values;
    }
  }
  if (payload !== null && payload !== undefined) {
    log.warn("Unexpected collection shape — treating as empty", { context, type: typeof payload });
  }
  return [];
}

/** Validate each item, dropping (and logging) the ones that do not fit. */
export function parseItems<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  context: string,
): z.infer<S>[] {
  const items: z.infer<S>[] = [];
  let dropped = 0;
  for (const item of extractCollection(payload, context)) {
    const result = schema.safeParse(item);
    if (result.success) {
      items.push(result.data);
    } else {
      dropped++;
    }
  }
  if (dropped > 0) {
    log.warn("Dropped malformed items", { context, dropped, kept: items.length });
  }
  return items;
}
