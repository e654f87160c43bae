import type { Finding } from "@/sync/types";
import { createChildLogger } from "@/sync/logger";
import type { Notifier, NotificationKind, NotifiedProject } from "./notifier";

const log = createChildLogger("slack");

export interface SlackNotifierOptions {
  webhookUrl: string;
  channel?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export function formatFindingMessage(finding: Finding, project: NotifiedProject | null, kind: NotificationKind): string {
  const name = project?.name ?? (typeof finding.details.projectName === "string" ? finding.details.projectName : null);
  const line = `[${finding.severity.toUpperCase()}] ${name ?? "(unnamed project)"} — ${finding.ruleId}`;
  return kind === "escalated" ? `escalated ${line}` : line;
}

/** Posts one message per finding to an incoming webhook. */
export class SlackNotifier implements Notifier {
  private webhookUrl: string;
  private channel: string | undefined;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(options: SlackNotifierOptions) {
    this.webhookUrl = options.webhookUrl;
    this.channel = options.channel;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async notify(finding: Finding, project: NotifiedProject | null, kind: NotificationKind): Promise<void> {
    const text = formatFindingMessage(finding, project, kind);
    const response = await this.fetchImpl(this.webhookUrl, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(this.channel ? { text, channel: this.channel } : { text }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      const body = await response.text().catch(() => "");
      throw new Error(`Slack webhook failed: ${response.status} ${body.slice(0, 200)}`);
    }
    log.debug("Slack message sent", { findingId: finding.id, kind });
  }
}
