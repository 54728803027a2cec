/**
 * Wire a sandbox engine from configuration: event bus, logger, tool
 * engine with the built-in tools, and a file-backed session store
 */

import { SandboxConfig } from "./config";
import { EventBus } from "./eventBus";
import { LoggerConfig, ToolscriptLogger } from "./logger";
import { SandboxEngine } from "./sandbox";
import { FileSessionStore, SessionStore } from "./storage";
import { ToolEngine } from "./tool-engine";
import { registerBuiltinTools } from "./tools/builtinTools";
import { ToolRegistry } from "./types";

export interface Sandbox {
  config: SandboxConfig;
  eventBus: EventBus;
  logger: ToolscriptLogger;
  tools: ToolEngine;
  sessionStore: SessionStore;
  engine: SandboxEngine;
}

export interface SandboxOverrides {
  eventBus?: EventBus;
  logger?: ToolscriptLogger;
  sessionStore?: SessionStore;
  /** Replaces the built-in tool engine as the registry scripts call into */
  registry?: ToolRegistry;
}

export function loggerConfigFrom(config: SandboxConfig): Partial<LoggerConfig> {
  const { level, format, file } = config.logger;
  return {
    level,
    format,
    ...(file ? { file: { enabled: true, path: file } } : {}),
  };
}

export function createSandbox(config: SandboxConfig, overrides: SandboxOverrides = {}): Sandbox {
  const eventBus = overrides.eventBus ?? new EventBus();
  const logger = overrides.logger ?? new ToolscriptLogger(eventBus, loggerConfigFrom(config));

  const tools = new ToolEngine(eventBus);
  registerBuiltinTools(tools);

  const sessionStore = overrides.sessionStore ?? new FileSessionStore({ stateDir: config.stateDir });
  const engine = new SandboxEngine({
    registry: overrides.registry ?? tools,
    sessionStore,
    config,
    logger,
    eventBus,
  });

  return { config, eventBus, logger, tools, sessionStore, engine };
}
