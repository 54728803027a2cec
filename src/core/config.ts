/**
 * Sandbox configuration
 *
 * Resolution order: built-in defaults, then the JSON config file, then
 * environment variables. The merged object is validated with zod.
 */

import path from "path";
import { z } from "zod";
import { ConfigError } from "./errors";

export const CapabilityGroupSchema = z.object({
  name: z.string().min(1),
  tools: z.array(z.string().min(1)).min(1),
  hint: z.string().min(1),
});

export const SandboxConfigSchema = z
  .object({
    maxCalls: z.number().int().positive().default(20),
    minTimeoutMs: z.number().int().positive().default(3_000),
    perCallTimeoutMs: z.number().int().positive().default(50_000),
    stateDir: z.string().min(1).default(path.join(".toolscript", "sandbox_state")),
    defaultSessionId: z.string().min(1).default("default_session"),
    failurePrefixes: z.array(z.string().min(1)).default(["error executing tool", "error:"]),
    failureSubstrings: z.array(z.string().min(1)).default(["failed"]),
    optionalCapabilityGroups: z.array(CapabilityGroupSchema).default([
      {
        name: "browser",
        tools: ["open_tab", "search_google", "input_text_by_index", "click_element_by_index"],
        hint: "Browser tools are not available. Make sure the browser tool server is running.",
      },
    ]),
    logger: z
      .object({
        level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
        format: z.enum(["json", "pretty"]).default("pretty"),
        file: z.string().min(1).optional(),
      })
      .default({}),
  })
  .strict();

export type SandboxConfig = z.infer<typeof SandboxConfigSchema>;
export type SandboxConfigInput = z.input<typeof SandboxConfigSchema>;
export type CapabilityGroup = z.infer<typeof CapabilityGroupSchema>;

export const CONFIG_FILE_NAME = "toolscript.config.json";

/**
 * Read the numeric env vars the sandbox honours
 */
function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const numeric: Array<[string, keyof SandboxConfig]> = [
    ["TOOLSCRIPT_MAX_CALLS", "maxCalls"],
    ["TOOLSCRIPT_MIN_TIMEOUT_MS", "minTimeoutMs"],
    ["TOOLSCRIPT_PER_CALL_TIMEOUT_MS", "perCallTimeoutMs"],
  ];

  for (const [name, key] of numeric) {
    const raw = env[name];
    if (raw !== undefined && raw !== "") {
      overrides[key] = Number(raw);
    }
  }

  if (env.TOOLSCRIPT_STATE_DIR) {
    overrides.stateDir = env.TOOLSCRIPT_STATE_DIR;
  }
  if (env.TOOLSCRIPT_SESSION_ID) {
    overrides.defaultSessionId = env.TOOLSCRIPT_SESSION_ID;
  }

  return overrides;
}

function loggerOverrides(env: NodeJS.ProcessEnv): Record<string, string> {
  const overrides: Record<string, string> = {};
  if (env.LOG_LEVEL) overrides.level = env.LOG_LEVEL;
  if (env.LOG_FORMAT) overrides.format = env.LOG_FORMAT;
  if (env.LOG_FILE) overrides.file = env.LOG_FILE;
  return overrides;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Merge file config and env vars over the defaults and validate
 * @throws ConfigError when the merged config does not validate
 */
export function resolveConfig(fileConfig: unknown = {}, env: NodeJS.ProcessEnv = process.env): SandboxConfig {
  if (!isRecord(fileConfig)) {
    throw new ConfigError("config file must contain a JSON object");
  }

  const fileLogger = isRecord(fileConfig.logger) ? fileConfig.logger : {};
  const merged = {
    ...fileConfig,
    ...envOverrides(env),
    logger: { ...fileLogger, ...loggerOverrides(env) },
  };

  const parsed = SandboxConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; "),
      { issues: parsed.error.issues }
    );
  }
  return parsed.data;
}

/**
 * Defaults merged with explicit overrides, ignoring file and env
 */
export function createConfig(overrides: SandboxConfigInput = {}): SandboxConfig {
  return SandboxConfigSchema.parse(overrides);
}
