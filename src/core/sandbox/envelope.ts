/**
 * Process-boundary response: the snake_case envelope callers receive
 */

import { performance } from "perf_hooks";
import { format } from "date-fns";
import type { ExecutionEnvelope, ExecutionResult, Timing } from "../types";

export const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm:ss";

export function formatTimestamp(date: Date): string {
  return format(date, TIMESTAMP_FORMAT);
}

/**
 * Seconds since `startMark` (a performance.now() reading), three decimals
 */
export function elapsedSeconds(startMark: number, endMark: number = performance.now()): string {
  return ((endMark - startMark) / 1000).toFixed(3);
}

/**
 * Wall-clock start plus a monotonic mark for measuring the run
 */
export function startTiming(now: Date = new Date()): { startedAt: Date; mark: number; finish(): Timing } {
  const mark = performance.now();
  return {
    startedAt: now,
    mark,
    finish: () => ({
      startedAt: now,
      executionTime: formatTimestamp(now),
      totalTime: elapsedSeconds(mark),
    }),
  };
}

export function toEnvelope(result: ExecutionResult): ExecutionEnvelope {
  const { executionTime, totalTime } = result.timing;

  if (result.status === "success") {
    return {
      status: "success",
      result: result.result,
      execution_time: executionTime,
      total_time: totalTime,
    };
  }

  return {
    status: "error",
    error: result.message,
    error_kind: result.kind,
    ...(result.traceback !== undefined ? { traceback: result.traceback } : {}),
    execution_time: executionTime,
    total_time: totalTime,
  };
}
