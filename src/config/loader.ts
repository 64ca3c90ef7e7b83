// Config loader: reads ~/.config/phalcon-dev-mcp/config.yaml (or PHALCON_MCP_CONFIG),
// overlays PHALCON_MCP_* environment variables, then validates with ServerConfigSchema.
// A missing file is normal: every key has a default. The server never writes the file.
// Config shape lives in ./schema.ts; add new keys there with a default.
import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { DEFAULT_CONFIG, ServerConfigSchema, type ServerConfig } from "./schema.js";
import { logger } from "../logger.js";

export const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "phalcon-dev-mcp", "config.yaml");

export interface ConfigResult {
  config: ServerConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const configPath = explicitPath ?? env.PHALCON_MCP_CONFIG ?? DEFAULT_CONFIG_PATH;
  const { values: fileValues, fromFile } = readConfigFile(configPath);

  const merged = deepMerge(fileValues, envOverrides(env));
  const result = ServerConfigSchema.safeParse(merged);
  if (!result.success) {
    logger.error(
      { configPath, issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
      "Invalid configuration — using defaults",
    );
    return { config: DEFAULT_CONFIG, configPath, fromFile };
  }
  return { config: result.data, configPath, fromFile };
}

function readConfigFile(configPath: string): { values: Record<string, unknown>; fromFile: boolean } {
  if (!existsSync(configPath)) {
    logger.debug({ configPath }, "No config file found — using defaults");
    return { values: {}, fromFile: false };
  }
  try {
    const parsed: unknown = parseYaml(readFileSync(configPath, "utf-8"));
    if (parsed === null || parsed === undefined) return { values: {}, fromFile: true };
    if (!isRecord(parsed)) {
      logger.error({ configPath }, "Config file is not a YAML mapping — ignoring it");
      return { values: {}, fromFile: false };
    }
    return { values: parsed, fromFile: true };
  } catch (err) {
    logger.error({ configPath, error: err instanceof Error ? err.message : String(err) }, "Failed to parse config — ignoring it");
    return { values: {}, fromFile: false };
  }
}

/** Numbers from the environment; anything unparsable is passed through for the schema to reject. */
function numeric(raw: string): number | string {
  const n = Number(raw);
  return raw.trim() !== "" && Number.isFinite(n) ? n : raw;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const phalcon: Record<string, unknown> = {};
  const execution: Record<string, unknown> = {};

  if (env.PHALCON_MCP_EXECUTABLE) phalcon.executable = env.PHALCON_MCP_EXECUTABLE;
  if (env.PHALCON_MCP_CWD) phalcon.working_directory = env.PHALCON_MCP_CWD;
  if (env.PHALCON_MCP_TIMEOUT_MS) execution.timeout_ms = numeric(env.PHALCON_MCP_TIMEOUT_MS);
  if (env.PHALCON_MCP_SERVE_GRACE_MS) execution.serve_grace_ms = numeric(env.PHALCON_MCP_SERVE_GRACE_MS);

  const overrides: Record<string, unknown> = {};
  if (Object.keys(phalcon).length > 0) overrides.phalcon = phalcon;
  if (Object.keys(execution).length > 0) overrides.execution = execution;
  return overrides;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deep merge b into a (a provides the base, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
