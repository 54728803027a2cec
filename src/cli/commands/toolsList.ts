/**
 * src/cli/commands/toolsList.ts
 * toolscript tools:list
 */

import { Command } from "commander";
import { createSandbox } from "../../core/bootstrap";
import type { ToolDescriptor } from "../../core/types";
import { loadConfig } from "../utils/loadConfig";
import { printTable } from "../utils/printTable";

export function toolRows(tools: ToolDescriptor[]): string[][] {
  return tools.map((tool) => [
    tool.name,
    tool.params.map((p) => (p.optional ? `${p.name}?` : p.name)).join(", "),
    tool.description ?? "",
  ]);
}

export function toolsListCommand(): Command {
  const cmd = new Command("tools:list");
  cmd.description("List the tools scripts can call").action(() => {
    try {
      const { tools } = createSandbox(loadConfig());
      printTable(["NAME", "PARAMS", "DESCRIPTION"], toolRows(tools.listTools()));
    } catch (e) {
      console.error("Listing tools failed:", e instanceof Error ? e.message : String(e));
      process.exitCode = 1;
    }
  });
  return cmd;
}
