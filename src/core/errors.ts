/**
 * Custom error types for toolscript
 */

/**
 * Stable error kinds reported in a failed execution envelope
 */
export type ErrorKind =
  | "StructuralError"
  | "ValidationError"
  | "TimeoutError"
  | "UnboundReferenceError"
  | "UnknownSymbolError"
  | "ArgumentError"
  | "AttributeAccessError"
  | "ToolFailureError"
  | "GenericRuntimeError";

export class ToolscriptError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ToolscriptError";
    Object.setPrototypeOf(this, ToolscriptError.prototype);
  }
}

/**
 * Script text could not be parsed or compiled
 */
export class StructuralError extends ToolscriptError {
  constructor(message: string, public readonly line?: number) {
    super(message, "STRUCTURAL_ERROR", { line });
    this.name = "StructuralError";
    Object.setPrototypeOf(this, StructuralError.prototype);
  }
}

export class ComplexityLimitError extends ToolscriptError {
  constructor(public readonly calls: number, public readonly limit: number) {
    super(`Too many functions (${calls} > ${limit})`, "COMPLEXITY_LIMIT", { calls, limit });
    this.name = "ComplexityLimitError";
    Object.setPrototypeOf(this, ComplexityLimitError.prototype);
  }
}

export class ScriptTimeoutError extends ToolscriptError {
  constructor(public readonly timeoutMs: number) {
    super(
      `Execution timed out after ${timeoutMs / 1000} seconds`,
      "SCRIPT_TIMEOUT",
      { timeoutMs }
    );
    this.name = "ScriptTimeoutError";
    Object.setPrototypeOf(this, ScriptTimeoutError.prototype);
  }
}

export class ToolNotFoundError extends ToolscriptError {
  constructor(public readonly toolName: string) {
    super(`Tool not found: ${toolName}`, "TOOL_NOT_FOUND", { toolName });
    this.name = "ToolNotFoundError";
    Object.setPrototypeOf(this, ToolNotFoundError.prototype);
  }
}

/**
 * Positional arguments do not fit a tool's declared parameters
 */
export class ToolArgumentError extends ToolscriptError {
  constructor(public readonly toolName: string, message: string) {
    super(message, "TOOL_ARGUMENT_MISMATCH", { toolName });
    this.name = "ToolArgumentError";
    Object.setPrototypeOf(this, ToolArgumentError.prototype);
  }
}

export class PathTraversalError extends ToolscriptError {
  constructor(path: string) {
    super(`Path traversal detected: ${path}`, "PATH_TRAVERSAL", { path });
    this.name = "PathTraversalError";
    Object.setPrototypeOf(this, PathTraversalError.prototype);
  }
}

export class ConfigError extends ToolscriptError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Invalid configuration: ${message}`, "CONFIG_ERROR", details);
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * Shape shared by errors from any realm, including the sandbox's own
 * ReferenceError/TypeError constructors, which fail host `instanceof` checks.
 */
export interface ErrorLike {
  name: string;
  message: string;
  stack?: string;
}

export function isErrorLike(value: unknown): value is ErrorLike {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "message" in value &&
    typeof value.message === "string"
  );
}

export function hasErrorCode(value: unknown, code: string): boolean {
  return typeof value === "object" && value !== null && "code" in value && value.code === code;
}
