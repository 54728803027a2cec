/**
 * Logger Formatters
 * Pino formatters and display helpers
 */

import type pino from "pino";
import { LoggerConfig } from "./config";

/**
 * Create Pino formatters based on configuration
 */
export function createFormatter(config: LoggerConfig): NonNullable<pino.LoggerOptions["formatters"]> {
  return {
    level: (label: string) => ({ level: label }),

    log: (obj: Record<string, unknown>) => {
      if (config.source) {
        obj.source = config.source;
      }

      // Request id doubles as the correlation id
      if (!obj.correlationId && obj.requestId) {
        obj.correlationId = obj.requestId;
      }

      return obj;
    },
  };
}

/**
 * Format duration for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  } else if (ms < 60000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    const minutes = Math.floor(ms / 60000);
    const seconds = ((ms % 60000) / 1000).toFixed(2);
    return `${minutes}m ${seconds}s`;
  }
}

/**
 * Sanitize a value for logging (depth limit, functions, large collections)
 */
export function sanitizeForLogging(value: unknown, maxDepth = 5, currentDepth = 0): unknown {
  if (currentDepth >= maxDepth) {
    return "[Max Depth Reached]";
  }

  if (value === null || value === undefined) {
    return value;
  }

  if (typeof value === "function") {
    return "[Function]";
  }

  if (typeof value === "symbol" || typeof value === "bigint") {
    return value.toString();
  }

  if (typeof value !== "object") {
    return value;
  }

  if (Array.isArray(value)) {
    if (value.length > 100) {
      return `[Array(${value.length})]`;
    }
    return value.map((item) => sanitizeForLogging(item, maxDepth, currentDepth + 1));
  }

  const sanitized: Record<string, unknown> = {};
  const keys = Object.keys(value);

  const maxKeys = 50;
  const keysToProcess = keys.length > maxKeys ? keys.slice(0, maxKeys) : keys;

  for (const key of keysToProcess) {
    try {
      sanitized[key] = sanitizeForLogging(Reflect.get(value, key), maxDepth, currentDepth + 1);
    } catch {
      sanitized[key] = "[Error serializing]";
    }
  }

  if (keys.length > maxKeys) {
    sanitized["..."] = `${keys.length - maxKeys} more keys`;
  }

  return sanitized;
}
