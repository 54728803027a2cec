/**
 * Built-in tools for toolscript
 * Small local utilities so scripts can be run without a remote tool host
 */

import { setTimeout as delay } from "timers/promises";
import { ToolEngine } from "../tool-engine";

export const MAX_SLEEP_MS = 10_000;

/**
 * Register all built-in tools to the tool engine
 */
export function registerBuiltinTools(toolEngine: ToolEngine): void {
  // echo - Return the text unchanged
  toolEngine.register(
    {
      name: "echo",
      description: "Returns its argument unchanged",
      params: [{ name: "text", description: "Text to echo", schema: { type: "string" } }],
    },
    (args) => args.text
  );

  // add - Add two numbers
  toolEngine.register(
    {
      name: "add",
      description: "Adds two numbers",
      params: [
        { name: "a", schema: { type: "number" } },
        { name: "b", schema: { type: "number" } },
      ],
    },
    (args) => Number(args.a) + Number(args.b)
  );

  // sleep - Wait before resolving
  toolEngine.register(
    {
      name: "sleep",
      description: `Waits the given number of milliseconds (at most ${MAX_SLEEP_MS})`,
      params: [{ name: "ms", schema: { type: "number", minimum: 0, maximum: MAX_SLEEP_MS } }],
    },
    async (args) => {
      await delay(Number(args.ms));
      return { slept: Number(args.ms) };
    }
  );

  // word_count - Count words, reported as a tool outcome
  toolEngine.register(
    {
      name: "word_count",
      description: "Counts the words in a text",
      params: [{ name: "text", schema: { type: "string" } }],
    },
    (args) => {
      const text = String(args.text);
      const words = text.split(/\s+/).filter(Boolean);
      if (words.length === 0) {
        return { success: false, content: null, error: "text contains no words" };
      }
      return { success: true, content: words.length, error: null };
    }
  );

  // split_lines - Split text into a text bundle
  toolEngine.register(
    {
      name: "split_lines",
      description: "Splits text into lines, returned as text parts",
      params: [
        { name: "text", schema: { type: "string" } },
        { name: "limit", schema: { type: "integer", minimum: 1 }, optional: true },
      ],
    },
    (args) => {
      const lines = String(args.text).split(/\r?\n/);
      const limit = typeof args.limit === "number" ? args.limit : lines.length;
      return { content: lines.slice(0, limit).map((text) => ({ type: "text", text })) };
    }
  );
}
