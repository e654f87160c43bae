"use client";

import { useCallback, useEffect, useState } from "react";
import type { Finding, Severity, SyncCounts, SyncRunRecord, SyncRunSummary } from "@/sync/types";
import type { ProjectHours } from "@/sync/clockify/types";

interface FindingRow extends Finding {
  projectName: string | null;
  ownerName: string | null;
}

interface SyncResult {
  status: string;
  summary?: SyncRunSummary;
  error?: string;
  message?: string;
}

const SEVERITY_STYLES: Record<Severity, string> = {
  low: "bg-yellow-50 text-yellow-700",
  medium: "bg-orange-50 text-orange-700",
  high: "bg-red-50 text-red-700",
};

const RULE_LABELS: Record<Finding["ruleId"], string> = {
  no_status_update: "No status update",
  no_activity: "No activity",
  schedule_risk: "Schedule risk",
  amount_of_tasks: "Too few tasks",
};

const COUNT_TILES: { key: keyof SyncCounts; label: string; color: string; bg: string }[] = [
  { key: "projectsSynced", label: "Synced", color: "text-blue-600", bg: "bg-blue-50" },
  { key: "changesDetected", label: "Changes", color: "text-gray-700", bg: "bg-gray-50" },
  { key: "findingsCreated", label: "New", color: "text-orange-600", bg: "bg-orange-50" },
  { key: "findingsResolved", label: "Resolved", color: "text-green-600", bg: "bg-green-50" },
];

function Spinner() {
  return (
    <svg
      className="animate-spin h-5 w-5 text-white inline-block"
      xmlns="http://www.w3.org/2000/svg"
      fill="none"
      viewBox="0 0 24 24"
    >
      <circle className="opacity-25" cx="12" cy="12" r="10" stroke="currentColor" strokeWidth="4" />
      <path className="opacity-75" fill="currentColor" d="M4 12a8 8 0 018-8V0C5.373 0 0 5.373 0 12h4z" />
    </svg>
  );
}

function formatDuration(start: string, end: string): string {
  const ms = new Date(end).getTime() - new Date(start).getTime();
  if (ms < 1000) return `${ms}ms`;
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const remaining = seconds % 60;
  return `${minutes}m ${remaining}s`;
}

function skippedCount(counts: SyncCounts): number {
  return counts.forbidden + counts.notFound + counts.failed;
}

function AcknowledgeForm({ finding, onDone }: { finding: FindingRow; onDone: () => void }) {
  const [comment, setComment] = useState("");
  const [by, setBy] = useState("");
  const [error, setError] = useState<string | null>(null);
  const [saving, setSaving] = useState(false);

  const submit = async () => {
    setSaving(true);
    setError(null);
    try {
      const response = await fetch(`/api/findings/${finding.id}/acknowledge`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ comment, by: by.trim() || undefined }),
      });
      if (!response.ok) {
        const data: { error?: string } = await response.json();
        setError(data.error ?? `Request failed (${response.status})`);
        return;
      }
      onDone();
    } catch (err) {
      setError(err instanceof Error ? err.message : "Unknown error");
    } finally {
      setSaving(false);
    }
  };

  return (
    <div className="mt-3 space-y-2">
      <textarea
        value={comment}
        onChange={(e) => setComment(e.target.value)}
        placeholder="Comment (required)"
        rows={2}
        className="w-full border border-gray-200 rounded-lg px-3 py-1.5 text-xs text-gray-700"
      />
      <div className="flex gap-2">
        <input
          value={by}
          onChange={(e) => setBy(e.target.value)}
          placeholder="PMO"
          className="border border-gray-200 rounded-lg px-3 py-1.5 text-xs flex-1 text-gray-700"
        />
        <button
          onClick={submit}
          disabled={saving || !comment.trim()}
          className={`px-3 py-1.5 rounded-lg text-xs font-semibold transition-colors ${
            saving || !comment.trim()
              ? "bg-gray-200 text-gray-400 cursor-not-allowed"
              : "bg-gray-900 text-white hover:bg-gray-800"
          }`}
        >
          {saving ? "Saving..." : "Acknowledge"}
        </button>
      </div>
      {error && <p className="text-xs text-red-600">{error}</p>}
    </div>
  );
}

export default function Home() {
  const [loading, setLoading] = useState(false);
  const [result, setResult] = useState<SyncResult | null>(null);
  const [findings, setFindings] = useState<FindingRow[]>([]);
  const [runs, setRuns] = useState<SyncRunRecord[]>([]);
  const [acking, setAcking] = useState<number | null>(null);
  const [hours, setHours] = useState<ProjectHours[]>([]);

  const refresh = useCallback(async () => {
    try {
      const [findingsRes, runsRes, hoursRes] = await Promise.all([
        fetch("/api/findings"),
        fetch("/api/sync/run"),
        fetch("/api/clockify/hours"),
      ]);
      if (findingsRes.ok) {
        const data: { findings: FindingRow[] } = await findingsRes.json();
        setFindings(data.findings);
      }
      if (runsRes.ok) {
        const data: { runs: SyncRunRecord[] } = await runsRes.json();
        setRuns(data.runs);
      }
      if (hoursRes.ok) {
        const data: { hours: ProjectHours[] } = await hoursRes.json();
        setHours(data.hours);
      }
    } catch (error) {
      console.error("Could not load dashboard data", error);
    }
  }, []);

  useEffect(() => {
    void refresh();
  }, [refresh]);

  const runSync = async () => {
    setLoading(true);
    setResult(null);

    try {
      const response = await fetch("/api/sync/run", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({}),
      });
      const data: SyncResult = await response.json();

      // 409 means another run holds the lock
      if (response.status === 409) {
        setResult({
          status: "error",
          error: "Sync already in progress",
          message: data.message || "Please wait for the current sync to finish.",
        });
        return;
      }

      setResult(data.summary?.status === "failed" ? { ...data, error: data.summary.errorMessage ?? "Sync failed" } : data);
      await refresh();
    } catch (error) {
      setResult({
        status: "error",
        error: error instanceof Error ? error.message : "Unknown error",
      });
    } finally {
      setLoading(false);
    }
  };

  const statusDot = result
    ? result.error || (result.summary && skippedCount(result.summary.counts) > 0)
      ? "bg-red-400"
      : "bg-green-400"
    : "bg-gray-300";

  return (
    <div className="min-h-screen bg-gray-50 flex items-start justify-center pt-16 px-4 font-[family-name:var(--font-geist-sans)]">
      <div className="w-full max-w-2xl">
        {/* Header */}
        <div className="mb-8">
          <div className="flex items-center gap-3 mb-1">
            <h1 className="text-2xl font-bold text-gray-900">PMO Watch</h1>
            <span className={`w-2.5 h-2.5 rounded-full ${statusDot}`} />
          </div>
          <p className="text-sm text-gray-500">Asana portfolio health &amp; findings</p>
        </div>

        <button
          onClick={runSync}
          disabled={loading}
          className={`w-full flex items-center gap-4 px-5 py-4 rounded-xl text-white font-medium transition-all mb-6 ${
            loading
              ? "opacity-50 cursor-not-allowed bg-gray-400"
              : "bg-teal-600 hover:bg-teal-700 shadow-sm hover:shadow-md active:scale-[0.99]"
          }`}
        >
          <span className="text-xl w-7 text-center">{loading ? <Spinner /> : "↻"}</span>
          <div className="text-left">
            <div className="text-sm font-semibold">Run sync</div>
            <div className="text-xs opacity-80">Projects, changelog &amp; rule findings</div>
          </div>
        </button>

        {/* Results */}
        {result && (
          <div className="bg-white rounded-xl shadow-sm border border-gray-100 p-5 mb-6">
            <div className="flex items-center justify-between mb-4">
              <h2 className="text-sm font-semibold text-gray-900">
                {result.error ? "Sync Failed" : "Sync Complete"}
              </h2>
              <button onClick={() => setResult(null)} className="text-xs text-gray-400 hover:text-gray-600">
                Clear
              </button>
            </div>

            {result.error ? (
              <div className="bg-red-50 border border-red-100 rounded-lg p-3 text-xs text-red-700">
                <p className="font-medium">{result.error}</p>
                {result.message && <p className="mt-1 text-red-600">{result.message}</p>}
              </div>
            ) : (
              result.summary && (
                <>
                  <div className="grid grid-cols-4 gap-2 mb-4">
                    {COUNT_TILES.map((tile) => (
                      <div key={tile.key} className={`${tile.bg} rounded-lg p-2.5 text-center`}>
                        <div className={`text-lg font-bold ${tile.color}`}>{result.summary?.counts[tile.key]}</div>
                        <div className="text-[10px] text-gray-500 uppercase tracking-wide">{tile.label}</div>
                      </div>
                    ))}
                  </div>
                  {skippedCount(result.summary.counts) > 0 && (
                    <div className="text-xs text-red-600 mb-3">
                      {skippedCount(result.summary.counts)} projects skipped (forbidden, missing or failed)
                    </div>
                  )}
                  <div className="text-[10px] text-gray-400 space-y-0.5">
                    <div>Duration: {formatDuration(result.summary.startedAt, result.summary.completedAt)}</div>
                    <div>Run: {result.summary.runId}</div>
                  </div>
                </>
              )
            )}
          </div>
        )}

        {/* Active findings */}
        <div className="bg-white rounded-xl shadow-sm border border-gray-100 p-5 mb-6">
          <h2 className="text-sm font-semibold text-gray-900 mb-3">Active findings ({findings.length})</h2>
          {findings.length === 0 ? (
            <p className="text-xs text-gray-400">No active findings.</p>
          ) : (
            <ul className="divide-y divide-gray-100">
              {findings.map((finding) => (
                <li key={finding.id} className="py-3">
                  <div className="flex items-center gap-2">
                    <span
                      className={`px-2 py-0.5 rounded-full text-[10px] font-medium uppercase ${SEVERITY_STYLES[finding.severity]}`}
                    >
                      {finding.severity}
                    </span>
                    <span className="text-sm text-gray-900 flex-1">{finding.projectName ?? finding.projectGid}</span>
                    <span className="text-xs text-gray-500">{RULE_LABELS[finding.ruleId]}</span>
                  </div>
                  <div className="text-[10px] text-gray-400 mt-1">
                    {finding.ownerName ?? "No owner"} &middot; since {finding.createdAt.slice(0, 10)}
                    {finding.status === "acknowledged" && (
                      <> &middot; acknowledged by {finding.acknowledgedBy}: {finding.ackComment}</>
                    )}
                  </div>
                  {finding.status === "open" &&
                    (acking === finding.id ? (
                      <AcknowledgeForm
                        finding={finding}
                        onDone={() => {
                          setAcking(null);
                          void refresh();
                        }}
                      />
                    ) : (
                      <button
                        onClick={() => setAcking(finding.id)}
                        className="text-xs text-gray-400 hover:text-gray-600 mt-1"
                      >
                        Acknowledge&hellip;
                      </button>
                    ))}
                </li>
              ))}
            </ul>
          )}
        </div>

        {/* Recent runs */}
        <div className="bg-white rounded-xl shadow-sm border border-gray-100 p-5">
          <h2 className="text-sm font-semibold text-gray-900 mb-3">Recent runs</h2>
          {runs.length === 0 ? (
            <p className="text-xs text-gray-400">No runs yet.</p>
          ) : (
            <table className="w-full text-xs text-gray-600">
              <tbody>
                {runs.map((run) => (
                  <tr key={run.syncId} className="border-t border-gray-100">
                    <td className="py-1.5">{run.startedAt.replace("T", " ").slice(0, 16)}</td>
                    <td>{run.source}</td>
                    <td className={run.status === "failed" ? "text-red-600" : ""}>{run.status}</td>
                    <td className="text-right">{run.projectsSynced ?? "-"} synced</td>
                    <td className="text-right">{run.findingsCreated ?? "-"} new</td>
                  </tr>
                ))}
              </tbody>
            </table>
          )}
        </div>

        {hours.length > 0 && (
          <div className="bg-white rounded-xl shadow-sm border border-gray-100 p-5">
            <h2 className="text-sm font-semibold text-gray-900 mb-3">Tracked hours</h2>
            <table className="w-full text-xs text-gray-600">
              <tbody>
                {hours.map((row) => (
                  <tr key={row.projectId ?? "none"} className="border-t border-gray-100">
                    <td className="py-1.5">{row.projectName ?? "(no project)"}</td>
                    <td className="text-right">{row.hours.toFixed(1)} h</td>
                    <td className="text-right">{row.entries} entries</td>
                  </tr>
                ))}
              </tbody>
            </table>
          </div>
        )}
      </div>
    </div>
  );
}
