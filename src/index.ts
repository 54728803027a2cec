/**
 * toolscript public API
 */

export * from "./core/sandbox";
export { createSandbox, loggerConfigFrom } from "./core/bootstrap";
export type { Sandbox, SandboxOverrides } from "./core/bootstrap";
export { CONFIG_FILE_NAME, SandboxConfigSchema, createConfig, resolveConfig } from "./core/config";
export type { CapabilityGroup, SandboxConfig, SandboxConfigInput } from "./core/config";
export * from "./core/errors";
export { EventBus } from "./core/eventBus";
export type { EventEnvelope, EventType } from "./core/eventBus";
export { ToolscriptLogger, initializeLogger, getLogger, hasLogger } from "./core/logger";
export { FileSessionStore, MemorySessionStore } from "./core/storage";
export type { SessionStore } from "./core/storage";
export { ToolEngine } from "./core/tool-engine";
export type { ToolDef, ToolDefInput, ToolHandler } from "./core/tool-engine";
export { registerBuiltinTools } from "./core/tools/builtinTools";
export type * from "./core/types";
