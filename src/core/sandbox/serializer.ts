/**
 * Result Serializer
 *
 * Turns whatever a script returned into a JSON-safe record in the host
 * realm. Values are first classified into a tagged union, then serialized
 * by an exhaustive match on the tag.
 */

import { z } from "zod";
import { isErrorLike } from "../errors";
import type { JsonObject, JsonValue } from "../types";

export type ToolValue =
  | { kind: "primitive"; value: JsonValue }
  | { kind: "toolOutcome"; success: boolean; content: unknown; error: unknown }
  | { kind: "textBundle"; parts: string[] }
  | { kind: "collection"; source: object; items: unknown[] }
  | { kind: "record"; source: object; fields: Array<[string, unknown]> }
  | { kind: "opaque"; text: string };

export interface FailureRules {
  failurePrefixes: string[];
  failureSubstrings: string[];
}

export interface DetectedFailure {
  field: string;
  message: string;
}

const ToolOutcomeSchema = z.object({
  success: z.boolean(),
  content: z.unknown(),
  error: z.unknown(),
});

const TextBundleSchema = z.object({
  content: z.array(z.unknown()),
});

const TextPartSchema = z.object({
  text: z.string(),
});

/**
 * Plain objects from any realm: their prototype chain ends right after
 * the realm's own Object.prototype
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || Object.getPrototypeOf(proto) === null;
}

function hasFields(value: unknown, fields: string[]): boolean {
  return typeof value === "object" && value !== null && fields.every((field) => field in value);
}

function isIterable(value: object): value is Iterable<unknown> {
  return Symbol.iterator in value && typeof value[Symbol.iterator] === "function";
}

function tagOf(value: object): string {
  return Object.prototype.toString.call(value);
}

/**
 * Deep copy into host JSON values, or undefined when something on the way
 * is not representable
 */
function toJsonSafe(value: unknown, seen: Set<object>): JsonValue | undefined {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value !== "object" || seen.has(value)) return undefined;

  if (Array.isArray(value)) {
    seen.add(value);
    const out: JsonValue[] = [];
    for (let i = 0; i < value.length; i++) {
      const item = toJsonSafe(value[i], seen);
      if (item === undefined) return undefined;
      out.push(item);
    }
    seen.delete(value);
    return out;
  }

  if (isPlainObject(value)) {
    seen.add(value);
    const out: JsonObject = {};
    for (const [key, field] of Object.entries(value)) {
      const item = toJsonSafe(field, seen);
      if (item === undefined) return undefined;
      out[key] = item;
    }
    seen.delete(value);
    return out;
  }

  return undefined;
}

function describe(value: unknown): string {
  if (typeof value === "function") {
    return `[function ${value.name || "anonymous"}]`;
  }
  try {
    return String(value);
  } catch (e) {
    // Objects without a usable toString, e.g. Object.create(null)
    return typeof value === "object" && value !== null ? tagOf(value) : `[unprintable: ${isErrorLike(e) ? e.message : "unknown"}]`;
  }
}

export function classifyValue(value: unknown): ToolValue {
  if (hasFields(value, ["success", "content", "error"])) {
    const outcome = ToolOutcomeSchema.safeParse(value);
    if (outcome.success) {
      const { success, content, error } = outcome.data;
      return { kind: "toolOutcome", success, content, error };
    }
  }

  const bundle = TextBundleSchema.safeParse(value);
  if (bundle.success) {
    const parts = bundle.data.content.flatMap((item) => {
      const part = TextPartSchema.safeParse(item);
      return part.success ? [part.data.text] : [];
    });
    if (parts.length > 0) {
      return { kind: "textBundle", parts };
    }
  }

  const json = toJsonSafe(value, new Set());
  if (json !== undefined) {
    return { kind: "primitive", value: json };
  }

  if (typeof value === "object" && value !== null) {
    if (Array.isArray(value)) {
      return { kind: "collection", source: value, items: Array.from(value) };
    }
    if (isPlainObject(value)) {
      return { kind: "record", source: value, fields: Object.entries(value) };
    }
    // Set and Map from either realm
    const tag = tagOf(value);
    if ((tag === "[object Set]" || tag === "[object Map]") && isIterable(value)) {
      return { kind: "collection", source: value, items: Array.from(value) };
    }
  }

  return { kind: "opaque", text: describe(value) };
}

function isEmptyContent(content: unknown): boolean {
  if (!content) return true;
  if (Array.isArray(content)) return content.length === 0;
  return isPlainObject(content) && Object.keys(content).length === 0;
}

function describeError(error: unknown, seen: Set<object>): string {
  if (typeof error === "string") return error;
  if (error === null || error === undefined) return "unknown error";
  if (isErrorLike(error)) return error.message;
  const serialized = serializeUnknown(error, seen);
  return typeof serialized === "string" ? serialized : JSON.stringify(serialized);
}

function serializeUnknown(value: unknown, seen: Set<object>): JsonValue {
  return serializeValue(classifyValue(value), seen);
}

export function serializeValue(value: ToolValue, seen: Set<object> = new Set()): JsonValue {
  switch (value.kind) {
    case "primitive":
      return value.value;
    case "toolOutcome":
      if (!value.success) {
        return `Error executing tool: ${describeError(value.error, seen)}`;
      }
      return isEmptyContent(value.content) ? "Success" : serializeUnknown(value.content, seen);
    case "textBundle":
      return value.parts.join("\n");
    case "collection": {
      if (seen.has(value.source)) return "[Circular]";
      seen.add(value.source);
      const items = value.items.map((item) => serializeUnknown(item, seen));
      seen.delete(value.source);
      return items;
    }
    case "record": {
      if (seen.has(value.source)) return "[Circular]";
      seen.add(value.source);
      const out: JsonObject = {};
      for (const [key, field] of value.fields) {
        out[key] = serializeUnknown(field, seen);
      }
      seen.delete(value.source);
      return out;
    }
    case "opaque":
      return value.text;
    default: {
      const unreachable: never = value;
      throw new Error(`Unhandled value kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * The fields a script produced: a returned plain object field by field,
 * anything else under `result`
 */
function resultFields(raw: unknown): Array<[string, unknown]> {
  const classified = classifyValue(raw);
  if (classified.kind === "record") return classified.fields;
  if (classified.kind === "primitive" && isJsonObject(classified.value) && isPlainObject(raw)) {
    return Object.entries(raw);
  }
  return [["result", raw]];
}

export function serializeResult(raw: unknown): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of resultFields(raw)) {
    out[key] = serializeUnknown(value, new Set());
  }
  return out;
}

function matchesFailure(text: string, rules: FailureRules): boolean {
  const lower = text.toLowerCase();
  return (
    rules.failurePrefixes.some((prefix) => lower.startsWith(prefix.toLowerCase())) ||
    rules.failureSubstrings.some((part) => lower.includes(part.toLowerCase()))
  );
}

/**
 * A tool outcome reporting failure wins over the text scan of the
 * serialized fields
 */
export function detectFailure(raw: unknown, serialized: JsonObject, rules: FailureRules): DetectedFailure | undefined {
  for (const [field, value] of resultFields(raw)) {
    const classified = classifyValue(value);
    if (classified.kind === "toolOutcome" && !classified.success) {
      const error = classified.error ? describeError(classified.error, new Set()) : "";
      return { field, message: error || `Tool ${field} failed` };
    }
  }

  for (const [field, value] of Object.entries(serialized)) {
    if (typeof value === "string" && matchesFailure(value, rules)) {
      return { field, message: value };
    }
  }

  return undefined;
}
