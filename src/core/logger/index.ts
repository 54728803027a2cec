/**
 * toolscript logger - Pino-based logging system
 *
 * Features:
 * - Structured JSON logging with Pino
 * - Pretty console output for development
 * - EventBus integration so script and tool events land in the log
 * - Child loggers carrying session/request context
 */

import pino from "pino";
import pinoPretty from "pino-pretty";
import { EventBus, EventType } from "../eventBus";
import { LoggerConfig, createLoggerConfig } from "./config";
import { createFormatter, sanitizeForLogging } from "./formatters";

export interface LoggerContext {
  sessionId?: string;
  requestId?: string;
  toolName?: string;
  correlationId?: string;
  [key: string]: unknown;
}

const EVENT_LOG_MAPPINGS: ReadonlyArray<{ event: EventType; level: "debug" | "info" | "warn"; message: string }> = [
  { event: "ScriptStartEvent", level: "debug", message: "Script started" },
  { event: "ScriptFinishEvent", level: "debug", message: "Script finished" },
  { event: "ScriptErrorEvent", level: "warn", message: "Script failed" },
  { event: "ToolInvocationEvent", level: "debug", message: "Tool invoked" },
  { event: "ToolResultEvent", level: "debug", message: "Tool completed" },
  { event: "ToolErrorEvent", level: "warn", message: "Tool error" },
  { event: "SessionSaveEvent", level: "debug", message: "Session saved" },
];

/**
 * Pino logger wired to the EventBus
 */
export class ToolscriptLogger {
  private pinoLogger: pino.Logger;
  private config: LoggerConfig;

  constructor(private eventBus: EventBus, config: Partial<LoggerConfig> = {}, parent?: pino.Logger) {
    this.config = createLoggerConfig(config);

    if (parent) {
      this.pinoLogger = parent;
      return;
    }

    this.pinoLogger = pino(
      {
        level: this.config.level,
        formatters: createFormatter(this.config),
        serializers: {
          err: pino.stdSerializers.err,
        },
      },
      this.createDestination()
    );

    this.setupEventBusIntegration();
  }

  /**
   * Create child logger with context. Children share the parent's
   * destination and EventBus subscription.
   */
  child(context: LoggerContext): ToolscriptLogger {
    return new ToolscriptLogger(this.eventBus, this.config, this.pinoLogger.child(context));
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context || {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context || {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context || {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  fatal(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.fatal({ ...context, err: error }, error.message);
  }

  isLevelEnabled(level: pino.Level): boolean {
    return this.pinoLogger.isLevelEnabled(level);
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }

  /**
   * Performance logging
   */
  startTimer(name: string, context?: LoggerContext): () => number {
    const start = Date.now();
    return () => {
      const duration = Date.now() - start;
      this.debug(`Timer: ${name}`, { ...context, duration, timer: name });
      return duration;
    };
  }

  /**
   * Script execution tracing
   */
  traceScriptExecution(sessionId: string, calls: number, duration: number, success: boolean, context?: LoggerContext): void {
    this.info("Script execution completed", {
      ...context,
      sessionId,
      calls,
      duration,
      success,
      type: "script_execution",
    });
  }

  /**
   * Tool execution tracing
   */
  traceToolExecution(toolName: string, args: unknown[], duration: number, success: boolean, error?: string, context?: LoggerContext): void {
    const level = success ? "debug" : "warn";
    this.pinoLogger[level](
      {
        ...context,
        toolName,
        args: sanitizeForLogging(args),
        duration,
        success,
        error,
        type: "tool_execution",
      },
      `Tool ${toolName} ${success ? "succeeded" : "failed"} (${duration}ms)`
    );
  }

  flush(): void {
    this.pinoLogger.flush();
  }

  private createDestination(): pino.DestinationStream {
    // Logs go to stderr so stdout stays free for command output
    const streams: pino.StreamEntry[] = [
      {
        level: "trace",
        stream:
          this.config.format === "pretty"
            ? pinoPretty({
                colorize: true,
                translateTime: "SYS:standard",
                ignore: "pid,hostname",
                destination: 2,
                sync: true,
              })
            : pino.destination({ dest: 2, sync: true }),
      },
    ];

    if (this.config.file?.enabled) {
      streams.push({
        level: "trace",
        stream: pino.destination({ dest: this.config.file.path, mkdir: true, sync: true }),
      });
    }

    return pino.multistream(streams);
  }

  private setupEventBusIntegration(): void {
    for (const { event, level, message } of EVENT_LOG_MAPPINGS) {
      this.eventBus.on(event, (evt) => {
        this.pinoLogger[level](
          {
            event,
            payload: sanitizeForLogging(evt.payload),
            type: "eventbus",
            correlationId: evt.id,
          },
          message
        );
      });
    }
  }
}

let globalLogger: ToolscriptLogger | null = null;

/**
 * Initialize global logger
 */
export function initializeLogger(eventBus: EventBus, config: Partial<LoggerConfig> = {}): ToolscriptLogger {
  globalLogger = new ToolscriptLogger(eventBus, config);
  return globalLogger;
}

/**
 * Get global logger instance
 */
export function getLogger(): ToolscriptLogger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return globalLogger;
}

export function hasLogger(): boolean {
  return globalLogger !== null;
}

export type { LoggerConfig, LogLevel, LogFormat } from "./config";
export { createLoggerConfig } from "./config";
export { formatDuration, sanitizeForLogging } from "./formatters";
