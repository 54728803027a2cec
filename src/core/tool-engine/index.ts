/**
 * In-process Tool Engine:
 * - register tool definitions with ordered positional parameters
 * - check arity and validate arguments (ajv) before calling the handler
 * - emit invocation/result/error events on the EventBus
 *
 * Implements the ToolRegistry contract the sandbox calls into.
 */

import Ajv, { ValidateFunction } from "ajv";
import { EventBus } from "../eventBus";
import { ToolArgumentError, ToolNotFoundError } from "../errors";
import { ToolDescriptor, ToolRegistry } from "../types";
import { ToolDef, ToolDefInput, validateToolDef } from "./toolSchema";

export interface ToolExecutionContext {
  eventBus: EventBus;
  toolName: string;
}

/**
 * Handlers receive the positional arguments keyed by parameter name
 */
export type ToolHandler = (args: Record<string, unknown>, ctx: ToolExecutionContext) => Promise<unknown> | unknown;

interface RegisteredTool {
  def: ToolDef;
  run: ToolHandler;
  validator: ValidateFunction | null;
}

export class ToolEngine implements ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();
  private ajv = new Ajv({ allErrors: true });

  constructor(private eventBus: EventBus) {}

  register(definition: ToolDefInput, run: ToolHandler): void {
    const def = validateToolDef(definition);
    if (this.tools.has(def.name)) throw new Error("Tool already registered: " + def.name);

    const hasSchemas = def.params.some((p) => p.schema);
    const validator = hasSchemas
      ? this.ajv.compile({
          type: "object",
          properties: Object.fromEntries(def.params.map((p) => [p.name, p.schema ?? {}])),
          required: def.params.filter((p) => !p.optional).map((p) => p.name),
        })
      : null;

    this.tools.set(def.name, { def, run, validator });
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listTools(): ToolDescriptor[] {
    return Array.from(this.tools.values()).map(({ def }) => ({
      name: def.name,
      description: def.description,
      params: def.params,
    }));
  }

  async invoke(name: string, ...args: unknown[]): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolNotFoundError(name);
    }

    const named = this.bindArguments(tool, args);

    this.eventBus.emit("ToolInvocationEvent", { toolName: name, args });
    const startTime = Date.now();
    try {
      const output = await tool.run(named, { eventBus: this.eventBus, toolName: name });
      this.eventBus.emit("ToolResultEvent", { toolName: name, duration: Date.now() - startTime });
      return output;
    } catch (e) {
      this.eventBus.emit("ToolErrorEvent", {
        toolName: name,
        duration: Date.now() - startTime,
        error: e instanceof Error ? e.message : String(e),
      });
      throw e;
    }
  }

  /**
   * Map positional arguments onto the declared parameter names
   * @throws ToolArgumentError on arity or schema mismatch
   */
  private bindArguments(tool: RegisteredTool, args: unknown[]): Record<string, unknown> {
    const { def } = tool;
    const required = def.params.filter((p) => !p.optional).length;
    const max = def.params.length;

    if (args.length < required || args.length > max) {
      const expected = required === max ? `${max}` : `${required}-${max}`;
      throw new ToolArgumentError(def.name, `Tool ${def.name} expects ${expected} args, got ${args.length}`);
    }

    const named: Record<string, unknown> = {};
    def.params.forEach((param, index) => {
      if (index < args.length) named[param.name] = args[index];
    });

    if (tool.validator && !tool.validator(named)) {
      const detail = this.ajv.errorsText(tool.validator.errors, { dataVar: "args" });
      this.eventBus.emit("ToolErrorEvent", { toolName: def.name, error: detail });
      throw new ToolArgumentError(def.name, `Tool ${def.name} received invalid args: ${detail}`);
    }

    return named;
  }
}

export type { ToolDef, ToolDefInput } from "./toolSchema";
export { validateToolDef } from "./toolSchema";
