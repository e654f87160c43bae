import * as p from "@clack/prompts";
import {
  createRuntime,
  runConfiguredClockifySync,
  runConfiguredHistory,
  runConfiguredRules,
  runConfiguredSync,
  type SyncRuntime,
} from "@/sync/runtime";
import { notifyPendingFindings } from "@/sync/notify/notifier";
import { acknowledge } from "./commands";

type MenuAction = "sync" | "rules" | "notify" | "ack" | "history" | "clockify";

function formatCounts(counts: Record<string, number>): string {
  return Object.entries(counts)
    .filter(([, n]) => n > 0)
    .map(([k, n]) => `${k}=${n}`)
    .join(", ");
}

async function runSyncAction(runtime: SyncRuntime): Promise<void> {
  const spinner = p.spinner();
  spinner.start("Syncing Asana projects...");
  const summary = await runConfiguredSync(runtime);
  if (summary.status === "failed") {
    spinner.stop("Sync failed.");
    p.log.error(summary.errorMessage ?? "Unknown error");
    return;
  }
  spinner.stop("Sync finished.");
  const { forbidden, notFound, failed } = summary.counts;
  if (forbidden + notFound + failed > 0) {
    p.log.warn(`${forbidden + notFound + failed} projects skipped. Check the log for details.`);
  }
  p.log.success(formatCounts({ ...summary.counts }) || "Nothing changed.");
}

async function runAckAction(runtime: SyncRuntime): Promise<void> {
  const open = runtime.store.listFindings("open");
  if (open.length === 0) {
    p.log.info("No open findings.");
    return;
  }

  const id = await p.select({
    message: "Which finding?",
    options: open.map((f) => ({
      value: f.id,
      label: `#${f.id} [${f.severity}] ${f.projectName ?? f.projectGid} — ${f.ruleId}`,
    })),
  });
  if (p.isCancel(id)) return;

  const comment = await p.text({
    message: "Comment (required)",
    validate: (value) => (value.trim() ? undefined : "A comment is required."),
  });
  if (p.isCancel(comment)) return;

  const by = await p.text({ message: "Acknowledged by", placeholder: "PMO", defaultValue: "PMO" });
  if (p.isCancel(by)) return;

  const finding = acknowledge(runtime.store, { id, comment, by });
  p.log.success(`Finding #${finding.id} acknowledged by ${finding.acknowledgedBy ?? "PMO"}.`);
}

export async function runInteractive(): Promise<void> {
  p.intro("PMO Watch");

  let runtime: SyncRuntime;
  try {
    runtime = createRuntime();
  } catch (error) {
    p.log.error(error instanceof Error ? error.message : String(error));
    p.outro("Set up your .env.local file and try again.");
    return;
  }

  const action = await p.select<MenuAction>({
    message: "What would you like to do?",
    options: [
      { value: "sync", label: "Sync projects from Asana" },
      { value: "rules", label: "Re-evaluate rules" },
      { value: "notify", label: "Send pending notifications" },
      { value: "ack", label: "Acknowledge a finding" },
      { value: "history", label: "Load project history" },
      { value: "clockify", label: "Sync Clockify time entries" },
    ],
  });

  if (p.isCancel(action)) {
    p.outro("Cancelled.");
    return;
  }

  try {
    switch (action) {
      case "sync":
        await runSyncAction(runtime);
        break;
      case "rules": {
        const summary = await runConfiguredRules(runtime);
        const changed = formatCounts({
          created: summary.findingsCreated,
          escalated: summary.findingsEscalated,
          resolved: summary.findingsResolved,
        });
        p.log.success(`${summary.projectsEvaluated} projects evaluated. ${changed || "No finding changes."}`);
        break;
      }
      case "notify": {
        const result = await notifyPendingFindings(runtime.store, runtime.notifier);
        p.log.success(`${result.sent} sent, ${result.failed} failed.`);
        break;
      }
      case "ack":
        await runAckAction(runtime);
        break;
      case "history": {
        const result = await runConfiguredHistory(runtime);
        p.log.success(`${result.inserted} snapshots stored. ${formatCounts({ ...result, inserted: 0 })}`);
        break;
      }
      case "clockify": {
        const summary = await runConfiguredClockifySync(runtime);
        if (summary.status === "failed") p.log.error(summary.errorMessage ?? "Unknown error");
        else p.log.success(`${summary.timeEntries} time entries stored.`);
        break;
      }
    }
  } catch (error) {
    p.log.error(error instanceof Error ? error.message : String(error));
  }

  p.outro("Done!");
}
