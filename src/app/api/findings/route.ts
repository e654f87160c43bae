import { NextRequest, NextResponse } from "next/server";
import { findingsQuerySchema } from "@/sync/types/api";
import { createRuntime } from "@/sync/runtime";
import { createChildLogger, errorMessage } from "@/sync/logger";

const log = createChildLogger("api-findings");

/** GET /api/findings?status=open|acknowledged|resolved|active|all */
export async function GET(request: NextRequest) {
  const parsed = findingsQuerySchema.safeParse({
    status: request.nextUrl.searchParams.get("status") ?? undefined,
  });
  if (!parsed.success) {
    return NextResponse.json({ error: "Invalid request", details: parsed.error.issues }, { status: 400 });
  }

  try {
    const { store } = createRuntime();
    return NextResponse.json({ findings: store.listFindings(parsed.data.status) });
  } catch (error) {
    log.error("Could not list findings", { error: errorMessage(error) });
    return NextResponse.json({ error: "Could not list findings", message: errorMessage(error) }, { status: 500 });
  }
}
