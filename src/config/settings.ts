/**
 * Settings and Configuration Manager
 * Loads the provisioning config from YAML/JSON, applies environment
 * overrides and validates it against the schema.
 */
import fs from "fs";
import os from "os";
import path from "path";
import YAML from "yaml";
import { ConfigurationError, errorMessage } from "../core/errors";
import { ProvisionConfig, validateConfigSafe } from "../types/schemas";

export const DEFAULT_CONFIG_FILE = "homelab.yaml";

export interface LoadOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export function resolveConfigPath(configPath?: string, options: LoadOptions = {}): string {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  return path.resolve(cwd, configPath || env.HOMELAB_CONFIG || DEFAULT_CONFIG_FILE);
}

export function loadConfig(configPath?: string, options: LoadOptions = {}): ProvisionConfig {
  const p = resolveConfigPath(configPath, options);
  if (!fs.existsSync(p)) {
    throw new ConfigurationError(`Config file not found: ${p}`);
  }
  const raw = fs.readFileSync(p, "utf8");
  let data: unknown;
  try {
    data = p.endsWith(".json") ? JSON.parse(raw) : YAML.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Config parse error in ${p}: ${errorMessage(error)}`);
  }
  return parseConfig(applyEnvOverrides(data, options.env ?? process.env));
}

export function parseConfig(data: unknown): ProvisionConfig {
  const result = validateConfigSafe(data);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `- ${i.path.length > 0 ? i.path.join(".") : "root"}: ${i.message}`);
    throw new ConfigurationError(`Config validation failed:\n${issues.join("\n")}`);
  }
  return result.data;
}

/**
 * `K3S_VERSION`, `HOMELAB_GPU` and `HOMELAB_LOG_LEVEL` win over the file.
 */
export function applyEnvOverrides(data: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    return data;
  }
  const record: Record<string, unknown> = { ...data };

  if (env.K3S_VERSION) {
    record.runtime = { ...asRecord(record.runtime), version: env.K3S_VERSION };
  }
  if (env.HOMELAB_GPU) {
    record.gpu = { ...asRecord(record.gpu), enabled: ["1", "true", "yes"].includes(env.HOMELAB_GPU.toLowerCase()) };
  }
  if (env.HOMELAB_LOG_LEVEL) {
    record.logging = { ...asRecord(record.logging), level: env.HOMELAB_LOG_LEVEL };
  }
  return record;
}

/** Expand a leading `~` to the invoking user's home directory. */
export function expandHome(p: string, home: string = os.homedir()): string {
  if (p === "~") return home;
  if (p.startsWith("~/")) return path.join(home, p.slice(2));
  return p;
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) ? { ...value } : {};
}
