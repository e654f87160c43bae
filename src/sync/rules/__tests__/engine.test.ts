import { describe, expect, it } from "vitest";
import { evaluateRules, reconcileFindings } from "../engine";
import { defaultRulesConfig, parseRulesConfig } from "@/sync/config/rules";
import { NOW, dateIn, daysAgo, makeFinding, makeRecord } from "@/sync/__tests__/fixtures";

const config = defaultRulesConfig();

function summary(hits: { ruleId: string; severity: string }[]): Record<string, string> {
  return Object.fromEntries(hits.map((h) => [h.ruleId, h.severity]));
}

describe("evaluateRules", () => {
  it("fires nothing for a healthy project", () => {
    expect(evaluateRules(makeRecord(), config, NOW)).toEqual([]);
  });

  it("flags a stale status update and a late schedule", () => {
    const project = makeRecord({
      lastStatusUpdateAt: daysAgo(10),
      dueDate: dateIn(20),
      calculatedProgress: 30,
      totalTasks: 10,
    });

    const hits = evaluateRules(project, config, NOW);

    expect(summary(hits)).toEqual({ no_status_update: "medium", schedule_risk: "low" });
    expect(hits[0].details).toEqual({
      projectName: "Portal Clientes",
      ownerName: "Ana Rojas",
      daysSinceLastStatusUpdate: 10,
      daysThreshold: 7,
    });
    expect(hits[1].details).toEqual({
      projectName: "Portal Clientes",
      ownerName: "Ana Rojas",
      daysRemaining: 20,
      progress: 30,
      minProgressRequired: 40,
    });
  });

  it("flags a small idle project", () => {
    const project = makeRecord({ totalTasks: 2, completedTasks: 0, tasksCreatedLast7d: 0, tasksCompletedLast7d: 0 });
    expect(summary(evaluateRules(project, config, NOW))).toEqual({ no_activity: "medium", amount_of_tasks: "medium" });
  });

  it("treats a project never updated as overdue", () => {
    const [hit] = evaluateRules(makeRecord({ lastStatusUpdateAt: null }), config, NOW);
    expect(hit.ruleId).toBe("no_status_update");
    expect(hit.details.daysSinceLastStatusUpdate).toBeNull();
  });

  it("does not fire no_status_update exactly at the threshold", () => {
    expect(evaluateRules(makeRecord({ lastStatusUpdateAt: daysAgo(7) }), config, NOW)).toEqual([]);
  });

  it("picks the tightest schedule threshold", () => {
    const hits = evaluateRules(makeRecord({ dueDate: dateIn(5), calculatedProgress: 70 }), config, NOW);
    expect(summary(hits)).toEqual({ schedule_risk: "high" });
  });

  it("moves on to a wider threshold when progress satisfies the tighter one", () => {
    const hits = evaluateRules(makeRecord({ dueDate: dateIn(12), calculatedProgress: 55 }), config, NOW);
    expect(summary(hits)).toEqual({ schedule_risk: "medium" });
  });

  it("flags overdue projects below every threshold", () => {
    const hits = evaluateRules(makeRecord({ dueDate: dateIn(-3), calculatedProgress: 10 }), config, NOW);
    expect(hits[0].details.daysRemaining).toBe(-3);
    expect(hits[0].severity).toBe("high");
  });

  it("skips no_activity on empty projects when configured", () => {
    const empty = makeRecord({ totalTasks: 0, completedTasks: 0, tasksCreatedLast7d: 0, tasksCompletedLast7d: 0 });
    const skipping = parseRulesConfig({ no_activity: { skipWhenNoTasks: true } });
    expect(summary(evaluateRules(empty, config, NOW))).toEqual({ no_activity: "medium", amount_of_tasks: "medium" });
    expect(summary(evaluateRules(empty, skipping, NOW))).toEqual({ amount_of_tasks: "medium" });
  });

  it("respects disabled rules", () => {
    const disabled = parseRulesConfig({ no_status_update: { enabled: false } });
    expect(evaluateRules(makeRecord({ lastStatusUpdateAt: null }), disabled, NOW)).toEqual([]);
  });
});

describe("reconcileFindings", () => {
  const hit = (ruleId: "no_status_update" | "no_activity", severity: "low" | "medium" | "high") => ({
    ruleId,
    severity,
    details: { projectName: "Portal Clientes" },
  });

  it("creates findings for new hits", () => {
    const plan = reconcileFindings([hit("no_status_update", "medium")], []);
    expect(plan.create).toHaveLength(1);
    expect(plan.escalate).toEqual([]);
    expect(plan.resolve).toEqual([]);
  });

  it("leaves an equal-severity finding alone", () => {
    const existing = makeFinding({ severity: "medium" });
    const plan = reconcileFindings([hit("no_status_update", "medium")], [existing]);
    expect(plan).toEqual({ create: [], escalate: [], resolve: [], unchanged: [existing] });
  });

  it("escalates but never downgrades", () => {
    const existing = makeFinding({ severity: "medium" });
    expect(reconcileFindings([hit("no_status_update", "high")], [existing]).escalate).toEqual([
      { finding: existing, severity: "high", details: { projectName: "Portal Clientes" } },
    ]);
    expect(reconcileFindings([hit("no_status_update", "low")], [existing]).unchanged).toEqual([existing]);
  });

  it("keeps acknowledged findings active", () => {
    const acked = makeFinding({ status: "acknowledged" });
    const plan = reconcileFindings([hit("no_status_update", "medium")], [acked]);
    expect(plan.create).toEqual([]);
    expect(plan.unchanged).toEqual([acked]);
  });

  it("resolves findings whose rule no longer holds", () => {
    const stale = makeFinding({ id: 2, ruleId: "no_activity" });
    const plan = reconcileFindings([], [stale]);
    expect(plan.resolve).toEqual([stale]);
  });
});
