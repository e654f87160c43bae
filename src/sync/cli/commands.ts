import type { Finding } from "@/sync/types";
import type { StateStore } from "@/sync/ledger/repository";

export type CliCommand =
  | { name: "sync"; workers?: number }
  | { name: "rules" }
  | { name: "notify" }
  | { name: "history" }
  | { name: "clockify"; days?: number }
  | { name: "ack"; id: number; comment: string; by?: string };

export const USAGE = `Usage: pmo-watch <command>

  sync [--workers N]                      Pull Asana projects, diff, evaluate rules
  rules                                   Re-evaluate rules on stored projects
  notify                                  Send findings that were never delivered
  history                                 Backfill projects_history
  clockify [--days N]                     Pull Clockify time entries
  ack <id> --comment <text> [--by <name>] Acknowledge an open finding

Run without a command in a terminal for the interactive menu.`;

function flagValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  if (index === -1) return undefined;
  return args[index + 1];
}

function positiveInt(value: string | undefined, flag: string): number | undefined | { error: string } {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) return { error: `${flag} expects a positive integer, got "${value}"` };
  return n;
}

/** null when no command was given. */
export function parseArgs(args: string[]): CliCommand | { error: string } | null {
  const [name, ...rest] = args;
  if (!name) return null;

  switch (name) {
    case "sync": {
      const workers = positiveInt(flagValue(rest, "--workers"), "--workers");
      if (typeof workers === "object") return workers;
      return { name, workers };
    }
    case "rules":
    case "notify":
    case "history":
      return { name };
    case "clockify": {
      const days = positiveInt(flagValue(rest, "--days"), "--days");
      if (typeof days === "object") return days;
      return { name, days };
    }
    case "ack": {
      const id = Number(rest[0]);
      if (!Number.isInteger(id) || id < 1) return { error: "ack expects a finding id" };
      const comment = flagValue(rest, "--comment")?.trim();
      if (!comment) return { error: "ack requires --comment" };
      return { name, id, comment, by: flagValue(rest, "--by") };
    }
    default:
      return { error: `Unknown command "${name}"` };
  }
}

export function acknowledge(store: StateStore, command: { id: number; comment: string; by?: string }): Finding {
  return store.acknowledgeFinding(command.id, command.by ?? "PMO", command.comment, new Date().toISOString());
}
