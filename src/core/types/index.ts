/**
 * Core type definitions for toolscript
 */

import type { ErrorKind } from "../errors";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Variables persisted for a session between runs
 */
export type SessionRecord = JsonObject;

export interface ToolParam {
  name: string;
  description?: string;
  schema?: Record<string, unknown>; // JSON Schema for this positional argument
  optional?: boolean;
}

export interface ToolDescriptor {
  name: string;
  description?: string;
  params: ToolParam[];
}

/**
 * The collaborator that performs the real work behind a tool name
 */
export interface ToolRegistry {
  listTools(): ToolDescriptor[];
  invoke(name: string, ...args: unknown[]): Promise<unknown>;
}

export interface ExecutionRequest {
  scriptText: string;
  sessionId?: string;
}

export interface Timing {
  startedAt: Date;
  /** Wall-clock start, "YYYY-MM-DD HH:mm:ss" */
  executionTime: string;
  /** Elapsed seconds with three decimals */
  totalTime: string;
}

export interface ExecutionSuccess {
  status: "success";
  result: JsonObject;
  calls: number;
  timeoutMs: number;
  timing: Timing;
}

export interface ExecutionFailure {
  status: "error";
  kind: ErrorKind;
  message: string;
  traceback?: string;
  timing: Timing;
}

export type ExecutionResult = ExecutionSuccess | ExecutionFailure;

/**
 * Process-boundary response shape
 */
export type ExecutionEnvelope =
  | {
      status: "success";
      result: JsonObject;
      execution_time: string;
      total_time: string;
    }
  | {
      status: "error";
      error: string;
      error_kind: ErrorKind;
      traceback?: string;
      execution_time: string;
      total_time: string;
    };
