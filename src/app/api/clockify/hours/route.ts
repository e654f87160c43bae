import { NextRequest, NextResponse } from "next/server";
import { hoursQuerySchema } from "@/sync/types/api";
import { createRuntime } from "@/sync/runtime";
import { createChildLogger, errorMessage } from "@/sync/logger";

const log = createChildLogger("api-hours");

/** GET /api/clockify/hours?from=YYYY-MM-DD&to=YYYY-MM-DD */
export async function GET(request: NextRequest) {
  const params = request.nextUrl.searchParams;
  const parsed = hoursQuerySchema.safeParse({
    from: params.get("from") ?? undefined,
    to: params.get("to") ?? undefined,
  });
  if (!parsed.success) {
    return NextResponse.json({ error: "Invalid request", details: parsed.error.issues }, { status: 400 });
  }

  const { from, to } = parsed.data;
  try {
    const { store } = createRuntime();
    const range = from !== undefined && to !== undefined ? { from, to } : undefined;
    return NextResponse.json({ hours: store.hoursByProject(range) });
  } catch (error) {
    log.error("Could not aggregate hours", { error: errorMessage(error) });
    return NextResponse.json({ error: "Could not aggregate hours", message: errorMessage(error) }, { status: 500 });
  }
}
