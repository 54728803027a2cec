/**
 * Primitive allow-list
 *
 * Small pure helpers exposed as bare names inside the sandbox, next to the
 * ECMAScript intrinsics every fresh context already has. Nothing here
 * touches the filesystem, the process, timers or the network.
 */

import { createHash } from "crypto";
import { inspect } from "util";
import isEqual from "lodash/isEqual";
import type { ToolscriptLogger } from "../logger";

function toNumber(value: unknown, name: string): number {
  const n = typeof value === "number" ? value : Number(value);
  if (Number.isNaN(n)) {
    throw new TypeError(`${name}() expects a number, got ${inspect(value)}`);
  }
  return n;
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return value !== null && typeof value === "object" && Symbol.iterator in value && typeof value[Symbol.iterator] === "function";
}

function toArray(value: unknown, name: string): unknown[] {
  if (typeof value === "string") return Array.from(value);
  if (isIterable(value)) return Array.from(value);
  throw new TypeError(`${name}() expects an iterable, got ${inspect(value)}`);
}

function numbersOf(args: unknown[], name: string): number[] {
  const values = args.length === 1 && typeof args[0] !== "number" ? toArray(args[0], name) : args;
  return values.map((v) => toNumber(v, name));
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

// Arithmetic

function abs(value: unknown): number {
  return Math.abs(toNumber(value, "abs"));
}

/**
 * Round half away from zero to `digits` decimals
 */
function round(value: unknown, digits: unknown = 0): number {
  const n = toNumber(value, "round");
  const factor = 10 ** toNumber(digits, "round");
  return (Math.sign(n) * Math.round(Math.abs(n) * factor)) / factor;
}

function sum(values: unknown, start: unknown = 0): number {
  return toArray(values, "sum").reduce<number>((acc, v) => acc + toNumber(v, "sum"), toNumber(start, "sum"));
}

function min(...args: unknown[]): number {
  const values = numbersOf(args, "min");
  if (values.length === 0) throw new RangeError("min() arg is an empty sequence");
  return Math.min(...values);
}

function max(...args: unknown[]): number {
  const values = numbersOf(args, "max");
  if (values.length === 0) throw new RangeError("max() arg is an empty sequence");
  return Math.max(...values);
}

function clamp(value: unknown, lower: unknown, upper: unknown): number {
  return Math.min(Math.max(toNumber(value, "clamp"), toNumber(lower, "clamp")), toNumber(upper, "clamp"));
}

// Comparison

function all(values: unknown): boolean {
  return toArray(values, "all").every(Boolean);
}

function any(values: unknown): boolean {
  return toArray(values, "any").some(Boolean);
}

// Conversion

function toInt(value: unknown): number {
  const n = typeof value === "string" ? Number.parseInt(value.trim(), 10) : Math.trunc(toNumber(value, "toInt"));
  if (Number.isNaN(n)) {
    throw new TypeError(`toInt() cannot convert ${inspect(value)}`);
  }
  return n;
}

function toFloat(value: unknown): number {
  return toNumber(typeof value === "string" ? value.trim() : value, "toFloat");
}

function toStr(value: unknown): string {
  if (typeof value === "string") return value;
  if (value !== null && typeof value === "object") return JSON.stringify(value);
  return String(value);
}

function toBool(value: unknown): boolean {
  if (typeof value === "string") {
    return !["", "false", "0", "no", "off"].includes(value.trim().toLowerCase());
  }
  if (Array.isArray(value)) return value.length > 0;
  return Boolean(value);
}

// Collections

function range(startOrStop: unknown, stop?: unknown, step: unknown = 1): number[] {
  const [from, to] = stop === undefined ? [0, toNumber(startOrStop, "range")] : [toNumber(startOrStop, "range"), toNumber(stop, "range")];
  const by = toNumber(step, "range");
  if (by === 0) throw new RangeError("range() step must not be zero");

  const out: number[] = [];
  for (let i = from; by > 0 ? i < to : i > to; i += by) {
    out.push(i);
  }
  return out;
}

function enumerate(values: unknown, start: unknown = 0): Array<[number, unknown]> {
  const offset = toNumber(start, "enumerate");
  return toArray(values, "enumerate").map((v, i): [number, unknown] => [i + offset, v]);
}

function zip(...iterables: unknown[]): unknown[][] {
  const arrays = iterables.map((it) => toArray(it, "zip"));
  const length = arrays.length === 0 ? 0 : Math.min(...arrays.map((a) => a.length));
  return Array.from({ length }, (_, i) => arrays.map((a) => a[i]));
}

/**
 * `sorted(values, key?, reverse?)`. Arguments are positional, so a boolean
 * in the key position is the reverse flag: `sorted(xs, reverse = true)`
 * reaches here as `sorted(xs, true)`.
 */
function sorted(values: unknown, key: unknown = null, reverse: unknown = false): unknown[] {
  if (typeof key === "boolean") {
    return sorted(values, null, key);
  }
  if (key !== null && key !== undefined && typeof key !== "function") {
    throw new TypeError(`sorted() key must be a function, got ${inspect(key)}`);
  }
  const keyOf = (v: unknown): unknown => (typeof key === "function" ? key(v) : v);
  const out = toArray(values, "sorted").sort((a, b) => compareValues(keyOf(a), keyOf(b)));
  return reverse ? out.reverse() : out;
}

function reversed(values: unknown): unknown[] {
  return toArray(values, "reversed").reverse();
}

function len(value: unknown): number {
  if (typeof value === "string" || Array.isArray(value)) return value.length;
  // Map and Set from the sandbox realm fail host instanceof checks
  if (value !== null && typeof value === "object" && "size" in value && typeof value.size === "number") return value.size;
  if (value !== null && typeof value === "object") return Object.keys(value).length;
  throw new TypeError(`len() has no length for ${inspect(value)}`);
}

// Introspection

function typeOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function isNumeric(value: unknown): boolean {
  if (typeof value === "number") return Number.isFinite(value);
  return typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value));
}

// Formatting

/**
 * `format("{0} of {total}", 3, { total: 5 })`
 */
function format(template: unknown, ...args: unknown[]): string {
  const last = args[args.length - 1];
  const named = last !== null && typeof last === "object" && !Array.isArray(last) ? last : {};

  return String(template).replace(/\{(\w+)\}/g, (match, key: string) => {
    const value: unknown = /^\d+$/.test(key) ? args[Number(key)] : Object.entries(named).find(([k]) => k === key)?.[1];
    return value === undefined ? match : toStr(value);
  });
}

function repr(value: unknown): string {
  return inspect(value, { depth: 4, breakLength: Infinity });
}

function hash(value: unknown): string {
  return createHash("sha256").update(toStr(value)).digest("hex");
}

/**
 * Process-wide primitives. `print` is bound per request, see createPrint.
 */
export const PRIMITIVES = Object.freeze({
  abs,
  round,
  sum,
  min,
  max,
  clamp,
  all,
  any,
  isEqual: (a: unknown, b: unknown): boolean => isEqual(a, b),
  toInt,
  toFloat,
  toStr,
  toBool,
  range,
  enumerate,
  zip,
  sorted,
  reversed,
  len,
  typeOf,
  isNumeric,
  format,
  repr,
  hash,
});

export type PrimitiveName = keyof typeof PRIMITIVES | "print";

/**
 * Script output goes to the structured log, never to stdout
 */
export function createPrint(logger: ToolscriptLogger): (...values: unknown[]) => void {
  return (...values) => {
    logger.info(values.map((v) => (typeof v === "string" ? v : repr(v))).join(" "), { source: "script" });
  };
}
