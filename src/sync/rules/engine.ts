import type { RulesConfig } from "@/sync/config/rules";
import {
  RULE_IDS,
  maxSeverity,
  severityRank,
  type Finding,
  type FindingDetails,
  type ProjectRecord,
  type RuleId,
  type Severity,
} from "@/sync/types";
import { daysSince, daysUntil } from "@/sync/dates";

/** A rule whose condition currently holds for a project. */
export interface RuleHit {
  ruleId: RuleId;
  severity: Severity;
  details: FindingDetails;
}

export interface FindingPlan {
  create: RuleHit[];
  escalate: { finding: Finding; severity: Severity; details: FindingDetails }[];
  resolve: Finding[];
  unchanged: Finding[];
}

type RuleFn = (project: ProjectRecord, config: RulesConfig, now: Date) => RuleHit | null;

function baseDetails(project: ProjectRecord): FindingDetails {
  return { projectName: project.name, ownerName: project.ownerName };
}

const noStatusUpdate: RuleFn = (project, config, now) => {
  const rule = config.no_status_update;
  if (!rule.enabled) return null;
  const days = project.lastStatusUpdateAt ? daysSince(project.lastStatusUpdateAt, now) : null;
  // Never updated counts as overdue
  if (days !== null && days <= rule.daysThreshold) return null;
  return {
    ruleId: "no_status_update",
    severity: rule.severity,
    details: { ...baseDetails(project), daysSinceLastStatusUpdate: days, daysThreshold: rule.daysThreshold },
  };
};

const noActivity: RuleFn = (project, config) => {
  const rule = config.no_activity;
  if (!rule.enabled) return null;
  if (rule.skipWhenNoTasks && project.totalTasks === 0) return null;
  if (project.tasksCreatedLast7d !== 0 || project.tasksCompletedLast7d !== 0) return null;
  return {
    ruleId: "no_activity",
    severity: rule.severity,
    details: {
      ...baseDetails(project),
      tasksCreatedLast7d: project.tasksCreatedLast7d,
      tasksCompletedLast7d: project.tasksCompletedLast7d,
    },
  };
};

const scheduleRisk: RuleFn = (project, config, now) => {
  const rule = config.schedule_risk;
  if (!rule.enabled || !project.dueDate) return null;
  const daysRemaining = daysUntil(project.dueDate, now);
  if (daysRemaining === null) return null;

  const thresholds = [...rule.thresholds].sort((a, b) => a.daysRemaining - b.daysRemaining);
  for (const t of thresholds) {
    if (daysRemaining <= t.daysRemaining && project.calculatedProgress < t.minProgress) {
      return {
        ruleId: "schedule_risk",
        severity: t.severity,
        details: {
          ...baseDetails(project),
          daysRemaining,
          progress: project.calculatedProgress,
          minProgressRequired: t.minProgress,
        },
      };
    }
  }
  return null;
};

const amountOfTasks: RuleFn = (project, config) => {
  const rule = config.amount_of_tasks;
  if (!rule.enabled || project.totalTasks > rule.maxTasks) return null;
  return {
    ruleId: "amount_of_tasks",
    severity: rule.severity,
    details: { ...baseDetails(project), totalTasks: project.totalTasks, maxTasks: rule.maxTasks },
  };
};

const RULES: Record<RuleId, RuleFn> = {
  no_status_update: noStatusUpdate,
  no_activity: noActivity,
  schedule_risk: scheduleRisk,
  amount_of_tasks: amountOfTasks,
};

/** Every rule that currently holds, in fixed rule order. Pure: `now` is supplied. */
export function evaluateRules(project: ProjectRecord, config: RulesConfig, now: Date): RuleHit[] {
  const hits: RuleHit[] = [];
  for (const ruleId of RULE_IDS) {
    const hit = RULES[ruleId](project, config, now);
    if (hit) hits.push(hit);
  }
  return hits;
}

/**
 * Decide the transitions that bring the active findings in line with the
 * current hits. Severity only moves up; an active finding whose rule no longer
 * holds is resolved.
 */
export function reconcileFindings(hits: RuleHit[], active: Finding[]): FindingPlan {
  const plan: FindingPlan = { create: [], escalate: [], resolve: [], unchanged: [] };
  const byRule = new Map<RuleId, Finding>();
  for (const finding of active) {
    byRule.set(finding.ruleId, finding);
  }

  const hitRules = new Set<RuleId>();
  for (const hit of hits) {
    hitRules.add(hit.ruleId);
    const existing = byRule.get(hit.ruleId);
    if (!existing) {
      plan.create.push(hit);
      continue;
    }
    const severity = maxSeverity(existing.severity, hit.severity);
    if (severityRank(severity) > severityRank(existing.severity)) {
      plan.escalate.push({ finding: existing, severity, details: hit.details });
    } else {
      plan.unchanged.push(existing);
    }
  }

  for (const finding of active) {
    if (!hitRules.has(finding.ruleId)) plan.resolve.push(finding);
  }
  return plan;
}
