import { NextRequest, NextResponse } from "next/server";
import { syncRunRequestSchema } from "@/sync/types/api";
import { createRuntime, isSyncInProgress, startExclusiveSync } from "@/sync/runtime";
import { createChildLogger, errorMessage } from "@/sync/logger";

const log = createChildLogger("api-run");

// A full sync walks every project; allow up to 5 minutes
export const maxDuration = 300;

/** GET /api/sync/run: recent runs and whether one is in progress. */
export async function GET() {
  try {
    const runtime = createRuntime();
    return NextResponse.json({ inProgress: isSyncInProgress(), runs: runtime.store.listRuns(10) });
  } catch (error) {
    log.error("Could not list sync runs", { error: errorMessage(error) });
    return NextResponse.json({ error: "Could not list sync runs", message: errorMessage(error) }, { status: 500 });
  }
}

/**
 * POST /api/sync/run: run a full sync using env-configured credentials.
 *
 * Body (optional):
 *   workers?: number
 *   lookbackDays?: number
 */
export async function POST(request: NextRequest) {
  let body: unknown = undefined;
  const text = await request.text();
  if (text.trim()) {
    try {
      body = JSON.parse(text);
    } catch {
      return NextResponse.json({ error: "Invalid JSON in request body" }, { status: 400 });
    }
  }

  const parsed = syncRunRequestSchema.safeParse(body);
  if (!parsed.success) {
    return NextResponse.json({ error: "Invalid request", details: parsed.error.issues }, { status: 400 });
  }

  let run: ReturnType<typeof startExclusiveSync>;
  try {
    run = startExclusiveSync(createRuntime(), parsed.data);
  } catch (error) {
    log.error("Sync could not start", { error: errorMessage(error) });
    return NextResponse.json({ error: "Sync could not start", message: errorMessage(error) }, { status: 500 });
  }

  if (!run) {
    return NextResponse.json(
      { error: "Sync already in progress", message: "Please wait for the current sync to finish." },
      { status: 409 },
    );
  }

  log.info("Sync triggered via API", { ...parsed.data });
  const summary = await run;
  log.info("Sync finished via API", { runId: summary.runId, status: summary.status });

  return NextResponse.json(
    { status: summary.status, summary },
    { status: summary.status === "failed" ? 500 : 200 },
  );
}
