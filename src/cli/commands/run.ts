/**
 * src/cli/commands/run.ts
 * toolscript run <file> [--session <id>] [--json]
 */

import { Command } from "commander";
import fs from "fs";
import { createSandbox } from "../../core/bootstrap";
import { toEnvelope } from "../../core/sandbox";
import type { ExecutionEnvelope } from "../../core/types";
import { loadConfig } from "../utils/loadConfig";

export function formatEnvelope(envelope: ExecutionEnvelope): string {
  const timing = `(${envelope.total_time}s, started ${envelope.execution_time})`;
  if (envelope.status === "success") {
    return `success ${timing}\n${JSON.stringify(envelope.result, null, 2)}`;
  }
  return `error [${envelope.error_kind}] ${timing}\n${envelope.error}`;
}

export function runCommand(): Command {
  const cmd = new Command("run");
  cmd
    .description("Run a script file in the sandbox against the built-in tools")
    .argument("<file>", "script file, or - for stdin")
    .option("--session <id>", "session whose variables the script sees and updates")
    .option("--json", "print the raw response envelope as JSON")
    .action(async (file: string, opts: { session?: string; json?: boolean }) => {
      try {
        const scriptText = fs.readFileSync(file === "-" ? 0 : file, "utf8");
        const sandbox = createSandbox(loadConfig());
        const envelope = toEnvelope(await sandbox.engine.execute({ scriptText, sessionId: opts.session }));
        sandbox.logger.flush();

        console.log(opts.json ? JSON.stringify(envelope) : formatEnvelope(envelope));
        if (envelope.status === "error") process.exitCode = 1;
      } catch (e) {
        console.error("Run failed:", e instanceof Error ? e.message : String(e));
        process.exitCode = 1;
      }
    });

  return cmd;
}
