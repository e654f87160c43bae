import "./load-env";
import { runInteractive } from "./interactive";
import { acknowledge, parseArgs, USAGE, type CliCommand } from "./commands";
import {
  createRuntime,
  runConfiguredClockifySync,
  runConfiguredHistory,
  runConfiguredRules,
  runConfiguredSync,
} from "@/sync/runtime";
import { notifyPendingFindings } from "@/sync/notify/notifier";
import { closeDatabase } from "@/sync/ledger/db";

async function run(command: CliCommand): Promise<number> {
  const runtime = createRuntime();

  switch (command.name) {
    case "sync": {
      const summary = await runConfiguredSync(runtime, { workers: command.workers });
      console.log(JSON.stringify(summary, null, 2));
      return summary.status === "failed" ? 1 : 0;
    }
    case "rules": {
      console.log(JSON.stringify(await runConfiguredRules(runtime), null, 2));
      return 0;
    }
    case "notify": {
      console.log(JSON.stringify(await notifyPendingFindings(runtime.store, runtime.notifier), null, 2));
      return 0;
    }
    case "history": {
      console.log(JSON.stringify(await runConfiguredHistory(runtime), null, 2));
      return 0;
    }
    case "clockify": {
      const summary = await runConfiguredClockifySync(runtime, command.days);
      console.log(JSON.stringify(summary, null, 2));
      return summary.status === "failed" ? 1 : 0;
    }
    case "ack": {
      const finding = acknowledge(runtime.store, command);
      console.log(JSON.stringify(finding, null, 2));
      return 0;
    }
  }
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed === null) {
    if (process.stdout.isTTY) {
      await runInteractive();
      return 0;
    }
    console.error(USAGE);
    return 1;
  }
  if ("error" in parsed) {
    console.error(`${parsed.error}\n\n${USAGE}`);
    return 1;
  }
  return run(parsed);
}

main()
  .then((code) => {
    closeDatabase();
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("Command failed:", err instanceof Error ? err.message : String(err));
    closeDatabase();
    process.exit(1);
  });
