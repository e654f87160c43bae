import { describe, expect, it } from "vitest";
import {
  acknowledgeRequestSchema,
  findingIdSchema,
  findingsQuerySchema,
  hoursQuerySchema,
  syncRunRequestSchema,
} from "../api";

describe("API request schemas", () => {
  it("accepts an empty sync request", () => {
    expect(syncRunRequestSchema.parse(undefined)).toEqual({});
    expect(syncRunRequestSchema.parse({ workers: 4 })).toEqual({ workers: 4 });
    expect(syncRunRequestSchema.safeParse({ workers: 0 }).success).toBe(false);
  });

  it("defaults the findings filter to active", () => {
    expect(findingsQuerySchema.parse({})).toEqual({ status: "active" });
    expect(findingsQuerySchema.safeParse({ status: "closed" }).success).toBe(false);
  });

  it("coerces finding ids from the path", () => {
    expect(findingIdSchema.parse("42")).toBe(42);
    expect(findingIdSchema.safeParse("abc").success).toBe(false);
    expect(findingIdSchema.safeParse("-1").success).toBe(false);
  });

  it("requires a non-blank acknowledgement comment", () => {
    expect(acknowledgeRequestSchema.parse({ comment: "  Waiting on client " })).toEqual({ comment: "Waiting on client" });
    expect(acknowledgeRequestSchema.safeParse({ comment: "   " }).success).toBe(false);
  });

  it("takes an hours range only as a pair of dates", () => {
    expect(hoursQuerySchema.parse({})).toEqual({});
    expect(hoursQuerySchema.parse({ from: "2025-06-01", to: "2025-06-30" })).toEqual({ from: "2025-06-01", to: "2025-06-30" });
    expect(hoursQuerySchema.safeParse({ from: "2025-06-01" }).success).toBe(false);
    expect(hoursQuerySchema.safeParse({ from: "06/01/2025", to: "2025-06-30" }).success).toBe(false);
  });
});
