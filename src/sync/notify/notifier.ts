import type { Finding } from "@/sync/types";
import type { SyncEnv } from "@/sync/config/env";
import type { StateStore } from "@/sync/ledger/repository";
import { createChildLogger, errorMessage } from "@/sync/logger";
import { isStoreUnavailable } from "@/sync/errors";
import { SlackNotifier, formatFindingMessage } from "./slack";

const log = createChildLogger("notify");

export type NotificationKind = "created" | "escalated";

export interface NotifiedProject {
  gid: string;
  name: string | null;
}

/** Outbound alert channel for new and escalated findings. */
export interface Notifier {
  notify(finding: Finding, project: NotifiedProject | null, kind: NotificationKind): Promise<void>;
}

/** Writes the alert to the log instead of sending it anywhere. */
export class LogNotifier implements Notifier {
  async notify(finding: Finding, project: NotifiedProject | null, kind: NotificationKind): Promise<void> {
    log.info(formatFindingMessage(finding, project, kind), { findingId: finding.id, projectGid: finding.projectGid });
  }
}

export function createNotifier(env: SyncEnv): Notifier {
  if (env.SYNC_DRY_RUN || !env.SLACK_WEBHOOK_URL) {
    return new LogNotifier();
  }
  return new SlackNotifier({ webhookUrl: env.SLACK_WEBHOOK_URL, channel: env.SLACK_CHANNEL });
}

/**
 * Send one alert and stamp `notified_at` on success. A delivery failure is
 * logged and reported as `false`; the finding itself is already committed.
 */
export async function deliverNotification(
  store: StateStore,
  notifier: Notifier,
  finding: Finding,
  project: NotifiedProject | null,
  kind: NotificationKind,
  clock: () => Date = () => new Date(),
): Promise<boolean> {
  try {
    await notifier.notify(finding, project, kind);
  } catch (error) {
    log.warn("Notification delivery failed", { findingId: finding.id, kind, error: errorMessage(error) });
    return false;
  }
  try {
    store.markNotified(finding.id, clock().toISOString(), finding.severity);
  } catch (error) {
    if (isStoreUnavailable(error)) throw error;
    log.error("Could not record notification", { findingId: finding.id, error: errorMessage(error) });
  }
  return true;
}

export interface NotifyResult {
  sent: number;
  failed: number;
}

/**
 * Re-send every active finding whose current severity was never delivered.
 * A finding already alerted at a lower severity goes out as an escalation.
 */
export async function notifyPendingFindings(
  store: StateStore,
  notifier: Notifier,
  clock: () => Date = () => new Date(),
): Promise<NotifyResult> {
  const pending = store.listUnnotifiedFindings();
  const result: NotifyResult = { sent: 0, failed: 0 };

  for (const finding of pending) {
    const lookup = store.findProject(finding.projectGid);
    const project = lookup ? { gid: lookup.project.gid, name: lookup.project.name } : null;
    const kind: NotificationKind =
      finding.notifiedSeverity !== null && finding.notifiedSeverity !== finding.severity ? "escalated" : "created";
    const delivered = await deliverNotification(store, notifier, finding, project, kind, clock);
    if (delivered) result.sent++;
    else result.failed++;
  }

  log.info("Pending notifications processed", { pending: pending.length, ...result });
  return result;
}
