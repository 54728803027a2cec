/**
 * src/cli/utils/loadConfig.ts
 */

import fs from "fs";
import path from "path";
import { CONFIG_FILE_NAME, SandboxConfig, resolveConfig } from "../../core/config";
import { ConfigError } from "../../core/errors";

/**
 * Read toolscript.config.json from the working directory (when present)
 * and resolve it against defaults and env vars
 * @throws ConfigError when the file is not valid JSON or does not validate
 */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): SandboxConfig {
  const p = path.join(cwd, CONFIG_FILE_NAME);
  if (!fs.existsSync(p)) return resolveConfig({}, env);

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(p, "utf8"));
  } catch (e) {
    throw new ConfigError(`${CONFIG_FILE_NAME} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return resolveConfig(parsed, env);
}
