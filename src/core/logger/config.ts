/**
 * Logger Configuration
 * Configuration shape and defaults for the toolscript logger
 */

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";
export type LogFormat = "json" | "pretty";

export interface FileTransportConfig {
  enabled: boolean;
  path: string;
}

export interface LoggerConfig {
  level: LogLevel;
  format: LogFormat;
  file?: FileTransportConfig;
  source?: string;
}

/**
 * Default logger configuration
 */
const DEFAULT_CONFIG: LoggerConfig = {
  level: "info",
  format: "pretty",
  file: {
    enabled: false,
    path: "./logs/toolscript.log",
  },
};

/**
 * Create logger configuration with defaults
 */
export function createLoggerConfig(config: Partial<LoggerConfig> = {}): LoggerConfig {
  return {
    ...DEFAULT_CONFIG,
    ...config,
    file: config.file ? { ...DEFAULT_CONFIG.file, ...config.file } : DEFAULT_CONFIG.file,
  };
}
