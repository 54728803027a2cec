/**
 * Library namespaces exposed to scripts as frozen objects:
 * math, random, text, datetime, encoding, collections, hashlib.
 *
 * Everything here is side-effect free apart from reading the clock and the
 * random source.
 */

import { createHash, createHmac, randomInt, randomUUID } from "crypto";
import {
  addDays,
  addHours,
  addMinutes,
  differenceInDays,
  differenceInHours,
  differenceInMinutes,
  format as formatDate,
  formatISO,
  getUnixTime,
  isValid,
  parse as parseDate,
  parseISO,
} from "date-fns";
import chunk from "lodash/chunk";
import countBy from "lodash/countBy";
import groupBy from "lodash/groupBy";
import intersection from "lodash/intersection";
import keyBy from "lodash/keyBy";
import partition from "lodash/partition";
import pick from "lodash/pick";
import omit from "lodash/omit";
import sortBy from "lodash/sortBy";
import uniq from "lodash/uniq";
import uniqBy from "lodash/uniqBy";
import difference from "lodash/difference";
import flattenDeep from "lodash/flattenDeep";
import get from "lodash/get";

function numbers(values: unknown, name: string): number[] {
  if (!Array.isArray(values)) {
    throw new TypeError(`math.${name}() expects an array of numbers`);
  }
  return values.map((v) => {
    const n = Number(v);
    if (Number.isNaN(n)) throw new TypeError(`math.${name}() got a non-numeric value: ${String(v)}`);
    return n;
  });
}

function nonEmpty(values: number[], name: string): number[] {
  if (values.length === 0) throw new RangeError(`math.${name}() requires at least one data point`);
  return values;
}

function mean(values: unknown): number {
  const data = nonEmpty(numbers(values, "mean"), "mean");
  return data.reduce((a, b) => a + b, 0) / data.length;
}

function median(values: unknown): number {
  const data = nonEmpty(numbers(values, "median"), "median").sort((a, b) => a - b);
  const mid = Math.floor(data.length / 2);
  return data.length % 2 === 0 ? (data[mid - 1] + data[mid]) / 2 : data[mid];
}

function mode(values: unknown): number {
  const data = nonEmpty(numbers(values, "mode"), "mode");
  const counts = new Map<number, number>();
  for (const v of data) counts.set(v, (counts.get(v) ?? 0) + 1);

  let best = data[0];
  for (const [value, count] of counts) {
    if (count > (counts.get(best) ?? 0)) best = value;
  }
  return best;
}

/**
 * Sample variance (n - 1)
 */
function variance(values: unknown): number {
  const data = numbers(values, "variance");
  if (data.length < 2) throw new RangeError("math.variance() requires at least two data points");
  const m = mean(data);
  return data.reduce((acc, v) => acc + (v - m) ** 2, 0) / (data.length - 1);
}

function stdev(values: unknown): number {
  return Math.sqrt(variance(values));
}

function percentile(values: unknown, p: number): number {
  const data = nonEmpty(numbers(values, "percentile"), "percentile").sort((a, b) => a - b);
  if (p < 0 || p > 100) throw new RangeError("math.percentile() expects p between 0 and 100");
  const rank = (p / 100) * (data.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return data[lower] + (data[upper] - data[lower]) * (rank - lower);
}

export const MATH = Object.freeze({
  pi: Math.PI,
  e: Math.E,
  sqrt: Math.sqrt,
  pow: Math.pow,
  log: Math.log,
  log10: Math.log10,
  exp: Math.exp,
  floor: Math.floor,
  ceil: Math.ceil,
  mean,
  median,
  mode,
  variance,
  stdev,
  percentile,
});

function sequence(values: unknown, name: string): unknown[] {
  if (!Array.isArray(values) || values.length === 0) {
    throw new RangeError(`random.${name}() expects a non-empty array`);
  }
  return values;
}

function shuffled(values: unknown[]): unknown[] {
  const out = [...values];
  for (let i = out.length - 1; i > 0; i--) {
    const j = randomInt(i + 1);
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

export const RANDOM = Object.freeze({
  random: (): number => Math.random(),
  /** Inclusive on both ends */
  randint: (low: number, high: number): number => randomInt(low, high + 1),
  choice: (values: unknown): unknown => {
    const data = sequence(values, "choice");
    return data[randomInt(data.length)];
  },
  sample: (values: unknown, k: number): unknown[] => {
    const data = sequence(values, "sample");
    if (k > data.length) throw new RangeError("random.sample() sample larger than population");
    return shuffled(data).slice(0, k);
  },
  shuffle: (values: unknown): unknown[] => shuffled(sequence(values, "shuffle")),
  uuid: (): string => randomUUID(),
});

function toRegExp(pattern: string, flags = ""): RegExp {
  return new RegExp(pattern, flags);
}

export const TEXT = Object.freeze({
  search: (pattern: string, value: string, flags?: string): string | null => toRegExp(pattern, flags).exec(value)?.[0] ?? null,
  findAll: (pattern: string, value: string, flags = ""): string[] =>
    Array.from(value.matchAll(toRegExp(pattern, flags.includes("g") ? flags : `${flags}g`)), (m) => m[1] ?? m[0]),
  test: (pattern: string, value: string, flags?: string): boolean => toRegExp(pattern, flags).test(value),
  replace: (pattern: string, replacement: string, value: string, flags = "g"): string =>
    value.replace(toRegExp(pattern, flags), replacement),
  split: (pattern: string, value: string): string[] => value.split(toRegExp(pattern)),
  escape: (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"),
  lines: (value: string): string[] => value.split(/\r?\n/),
  words: (value: string): string[] => value.split(/\s+/).filter(Boolean),
  capitalize: (value: string): string => value.charAt(0).toUpperCase() + value.slice(1),
  truncate: (value: string, length: number, suffix = "..."): string =>
    value.length <= length ? value : value.slice(0, Math.max(0, length - suffix.length)) + suffix,
  slugify: (value: string): string =>
    value
      .toLowerCase()
      .normalize("NFKD")
      .replace(/[\u0300-\u036f]/g, "")
      .replace(/[^a-z0-9]+/g, "-")
      .replace(/^-+|-+$/g, ""),
});

function toDate(value: unknown): Date {
  const date = typeof value === "string" ? parseISO(value) : new Date(Number(value));
  if (!isValid(date)) throw new RangeError(`datetime: invalid date ${String(value)}`);
  return date;
}

export const DATETIME = Object.freeze({
  now: (): string => formatISO(new Date()),
  today: (): string => formatDate(new Date(), "yyyy-MM-dd"),
  timestamp: (): number => getUnixTime(new Date()),
  format: (value: unknown, pattern = "yyyy-MM-dd HH:mm:ss"): string => formatDate(toDate(value), pattern),
  parse: (value: string, pattern: string): string => {
    const date = parseDate(value, pattern, new Date());
    if (!isValid(date)) throw new RangeError(`datetime.parse(): "${value}" does not match ${pattern}`);
    return formatISO(date);
  },
  addDays: (value: unknown, amount: number): string => formatISO(addDays(toDate(value), amount)),
  addHours: (value: unknown, amount: number): string => formatISO(addHours(toDate(value), amount)),
  addMinutes: (value: unknown, amount: number): string => formatISO(addMinutes(toDate(value), amount)),
  diff: (left: unknown, right: unknown, unit: "days" | "hours" | "minutes" = "days"): number => {
    const a = toDate(left);
    const b = toDate(right);
    switch (unit) {
      case "hours":
        return differenceInHours(a, b);
      case "minutes":
        return differenceInMinutes(a, b);
      default:
        return differenceInDays(a, b);
    }
  },
});

export const ENCODING = Object.freeze({
  jsonStringify: (value: unknown, indent?: number): string => JSON.stringify(value, null, indent),
  jsonParse: (value: string): unknown => JSON.parse(value),
  base64Encode: (value: string): string => Buffer.from(value, "utf8").toString("base64"),
  base64Decode: (value: string): string => Buffer.from(value, "base64").toString("utf8"),
  urlEncode: (value: string): string => encodeURIComponent(value),
  urlDecode: (value: string): string => decodeURIComponent(value),
});

export const COLLECTIONS = Object.freeze({
  chunk,
  countBy,
  groupBy,
  keyBy,
  partition,
  sortBy,
  uniq,
  uniqBy,
  intersection,
  difference,
  flattenDeep,
  pick,
  omit,
  get,
  counter: (values: unknown[]): Record<string, number> => countBy(values),
});

const DIGESTS = ["md5", "sha1", "sha256", "sha512"] as const;
type Digest = (typeof DIGESTS)[number];

function isDigest(value: string): value is Digest {
  return DIGESTS.some((d) => d === value);
}

function digest(algorithm: Digest): (value: string) => string {
  return (value) => createHash(algorithm).update(value).digest("hex");
}

export const HASHLIB = Object.freeze({
  md5: digest("md5"),
  sha1: digest("sha1"),
  sha256: digest("sha256"),
  sha512: digest("sha512"),
  hmac: (key: string, value: string, algorithm = "sha256"): string => {
    if (!isDigest(algorithm)) throw new RangeError(`hashlib.hmac(): unsupported algorithm ${algorithm}`);
    return createHmac(algorithm, key).update(value).digest("hex");
  },
});

export const LIBRARIES = Object.freeze({
  math: MATH,
  random: RANDOM,
  text: TEXT,
  datetime: DATETIME,
  encoding: ENCODING,
  collections: COLLECTIONS,
  hashlib: HASHLIB,
});

export type LibraryName = keyof typeof LIBRARIES;
