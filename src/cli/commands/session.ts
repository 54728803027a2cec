/**
 * src/cli/commands/session.ts
 * toolscript session:show <id>
 * toolscript session:reset [id] [--all] [--force]
 */

import { Command } from "commander";
import { FileSessionStore, SessionStore } from "../../core/storage";
import { loadConfig } from "../utils/loadConfig";

export interface ResetOptions {
  all?: boolean;
  force?: boolean;
}

/**
 * Clear one session, or every session when `all` and `force` are both set
 * @returns lines describing what was cleared
 */
export async function resetSessions(store: SessionStore, sessionId: string | undefined, opts: ResetOptions): Promise<string[]> {
  if (opts.all) {
    if (!opts.force) {
      throw new Error("Refusing to clear every session without --force");
    }
    const ids = await store.list();
    for (const id of ids) {
      await store.clear(id);
    }
    return ids.length > 0 ? ids.map((id) => `Cleared session ${id}`) : ["No sessions to clear"];
  }

  if (!sessionId) {
    throw new Error("Pass a session id, or --all --force");
  }
  return [(await store.clear(sessionId)) ? `Cleared session ${sessionId}` : `No state for session ${sessionId}`];
}

function fileStore(): FileSessionStore {
  return new FileSessionStore({ stateDir: loadConfig().stateDir });
}

export function sessionShowCommand(): Command {
  const cmd = new Command("session:show");
  cmd
    .description("Print the variables stored for a session")
    .argument("<id>", "session id")
    .action(async (id: string) => {
      try {
        console.log(JSON.stringify(await fileStore().load(id), null, 2));
      } catch (e) {
        console.error("Reading session failed:", e instanceof Error ? e.message : String(e));
        process.exitCode = 1;
      }
    });
  return cmd;
}

export function sessionResetCommand(): Command {
  const cmd = new Command("session:reset");
  cmd
    .description("Clear stored session variables")
    .argument("[id]", "session id")
    .option("--all", "clear every session")
    .option("--force", "required with --all")
    .action(async (id: string | undefined, opts: ResetOptions) => {
      try {
        for (const line of await resetSessions(fileStore(), id, opts)) {
          console.log(line);
        }
      } catch (e) {
        console.error("Reset failed:", e instanceof Error ? e.message : String(e));
        process.exitCode = 1;
      }
    });
  return cmd;
}
