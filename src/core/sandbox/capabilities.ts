/**
 * Capability Table
 *
 * The complete set of names a script can see. Primitives and library
 * namespaces are process-wide frozen constants; tool proxies, `parallel`,
 * `finalAnswer`, `print`, `globalsSchema` and session variables are added
 * per request. The finished table is frozen.
 */

import type { ToolscriptLogger } from "../logger";
import type { SessionRecord, ToolDescriptor, ToolRegistry } from "../types";
import type { CancellationToken } from "./cancellation";
import { LIBRARIES } from "./libraries";
import { PRIMITIVES, createPrint } from "./primitives";
import { createToolProxies, makeParallel } from "./toolProxy";

export type CapabilityKind = "primitive" | "library" | "tool" | "binding" | "session";

export const PARALLEL_BINDING = "parallel";
export const FINAL_ANSWER_BINDING = "finalAnswer";
export const GLOBALS_SCHEMA_BINDING = "globalsSchema";
export const CHECKPOINT_BINDING = "__checkpoint";
export const UNIT_NAME = "__main";

/**
 * Names no tool or session variable may take
 */
export const RESERVED_NAMES: ReadonlySet<string> = new Set([
  ...Object.keys(PRIMITIVES),
  "print",
  ...Object.keys(LIBRARIES),
  PARALLEL_BINDING,
  FINAL_ANSWER_BINDING,
  GLOBALS_SCHEMA_BINDING,
  CHECKPOINT_BINDING,
  UNIT_NAME,
]);

/**
 * Holds the first value a script passes to finalAnswer()
 */
export class FinalAnswerSlot {
  private recorded = false;
  private recordedValue: unknown = undefined;

  record(value: unknown): void {
    if (this.recorded) return;
    this.recorded = true;
    this.recordedValue = value;
  }

  get isSet(): boolean {
    return this.recorded;
  }

  get value(): unknown {
    return this.recordedValue;
  }
}

/** Kinds a script can look up through `globalsSchema` */
export const GLOBALS_SCHEMA_KINDS: ReadonlySet<CapabilityKind> = new Set<CapabilityKind>(["library", "tool", "session"]);

export interface CapabilityTable {
  readonly bindings: Readonly<Record<string, unknown>>;
  readonly kinds: ReadonlyMap<string, CapabilityKind>;
  /** Names whose calls suspend the script */
  readonly asyncNames: ReadonlySet<string>;
  readonly finalAnswer: FinalAnswerSlot;
}

export class CapabilityTableBuilder {
  private entries = new Map<string, { kind: CapabilityKind; value: unknown }>();
  private asyncNames = new Set<string>();

  has(name: string): boolean {
    return this.entries.has(name);
  }

  add(name: string, kind: CapabilityKind, value: unknown, options: { async?: boolean } = {}): this {
    if (this.entries.has(name)) {
      throw new Error(`Capability already defined: ${name}`);
    }
    this.entries.set(name, { kind, value });
    if (options.async) this.asyncNames.add(name);
    return this;
  }

  /**
   * Frozen name → value view of the entries of the given kinds
   */
  valuesOf(kinds: ReadonlySet<CapabilityKind>): Readonly<Record<string, unknown>> {
    const view: Record<string, unknown> = {};
    for (const [name, { kind, value }] of this.entries) {
      if (kinds.has(kind)) view[name] = value;
    }
    return Object.freeze(view);
  }

  build(finalAnswer: FinalAnswerSlot): CapabilityTable {
    const bindings: Record<string, unknown> = {};
    const kinds = new Map<string, CapabilityKind>();
    for (const [name, { kind, value }] of this.entries) {
      bindings[name] = value;
      kinds.set(name, kind);
    }
    return Object.freeze({
      bindings: Object.freeze(bindings),
      kinds,
      asyncNames: new Set(this.asyncNames),
      finalAnswer,
    });
  }
}

export interface BuildCapabilityTableOptions {
  registry: ToolRegistry;
  tools: ToolDescriptor[];
  token: CancellationToken;
  logger: ToolscriptLogger;
  session?: SessionRecord;
}

export function buildCapabilityTable({ registry, tools, token, logger, session = {} }: BuildCapabilityTableOptions): CapabilityTable {
  const builder = new CapabilityTableBuilder();
  const finalAnswer = new FinalAnswerSlot();

  for (const [name, fn] of Object.entries(PRIMITIVES)) {
    builder.add(name, "primitive", fn);
  }
  builder.add("print", "primitive", createPrint(logger));
  for (const [name, namespace] of Object.entries(LIBRARIES)) {
    builder.add(name, "library", namespace);
  }

  const usableTools = tools.filter((tool) => {
    if (RESERVED_NAMES.has(tool.name)) {
      logger.warn("Tool name collides with a built-in capability, skipping", { toolName: tool.name });
      return false;
    }
    return true;
  });

  const proxies = createToolProxies(
    registry,
    usableTools.map((t) => t.name),
    token,
    logger
  );
  for (const [name, proxy] of proxies) {
    builder.add(name, "tool", proxy, { async: true });
  }

  builder
    .add(PARALLEL_BINDING, "binding", makeParallel(proxies, token), { async: true })
    .add(FINAL_ANSWER_BINDING, "binding", (value: unknown) => finalAnswer.record(value));

  for (const [name, value] of Object.entries(session)) {
    if (builder.has(name) || RESERVED_NAMES.has(name)) {
      logger.warn("Session variable shadows a capability, skipping", { variable: name });
      continue;
    }
    builder.add(name, "session", value);
  }

  builder.add(GLOBALS_SCHEMA_BINDING, "binding", builder.valuesOf(GLOBALS_SCHEMA_KINDS));

  return builder.build(finalAnswer);
}
