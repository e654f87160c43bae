/**
 * Quick check: print the custom fields Asana returns for one project, as the mapper sees them.
 * Run: npx tsx scripts/check-asana-custom-fields.ts <projectGid>
 */

import "@/sync/cli/load-env";
import { AsanaClient } from "@/sync/asana/client";
import { getEnv, requireAsanaEnv } from "@/sync/config/env";

async function main() {
  const projectGid = process.argv[2];
  if (!projectGid) {
    console.error("Usage: npx tsx scripts/check-asana-custom-fields.ts <projectGid>");
    process.exitCode = 1;
    return;
  }

  const env = getEnv();
  const { token } = requireAsanaEnv(env);
  const client = new AsanaClient({ token, baseUrl: env.ASANA_BASE_URL, timeoutMs: env.ASANA_TIMEOUT_MS });

  console.log(`🔎 Fetching project ${projectGid}\n`);
  const outcome = await client.getProject(projectGid);
  if (outcome.status !== "ok") {
    console.error(`❌ Could not fetch project: ${outcome.status}${"error" in outcome ? ` (${outcome.error})` : ""}`);
    process.exitCode = 1;
    return;
  }

  const project = outcome.data;
  console.log(`Name:    ${project.name}`);
  console.log(`Owner:   ${project.ownerName ?? "(none)"}`);
  console.log(`Due:     ${project.dueDate ?? "(none)"}`);
  console.log(`Status:  ${project.currentStatus?.status ?? "(none)"}\n`);

  const entries = Object.entries(project.customFields);
  if (entries.length === 0) {
    console.log("No custom fields.");
    return;
  }
  console.log("Custom fields:");
  for (const [name, value] of entries) {
    console.log(`  ${name.padEnd(28)} ${value === null ? "(empty)" : String(value)}`);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exitCode = 1;
});
