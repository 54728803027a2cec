#!/usr/bin/env node
/**
 * src/cli/index.ts
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { runCommand } from "./commands/run";
import { sessionResetCommand, sessionShowCommand } from "./commands/session";
import { toolsListCommand } from "./commands/toolsList";

export function createCli(): Command {
  const program = new Command();

  program
    .name("toolscript")
    .description("toolscript CLI: run generated scripts in the sandbox and manage session state")
    .version("0.1.0");

  program.addCommand(runCommand());
  program.addCommand(toolsListCommand());
  program.addCommand(sessionShowCommand());
  program.addCommand(sessionResetCommand());

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((e: unknown) => {
      console.error(e instanceof Error ? e.message : String(e));
      process.exitCode = 1;
    });
}
