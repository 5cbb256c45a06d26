/**
 * Config manager: loads and inspects driftlens.yaml.
 *
 * Every field has a default, so a missing file yields the default config.
 * Environment variables override the file: DRIFTLENS_POLICY, DRIFTLENS_EVENTS_DIR.
 */

import { access, readFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { DriftConfig } from "../schemas/config.js";
import { ConfigError } from "../drift/errors.js";
import { isPlainObject } from "../policy/catalog.js";

export const DEFAULT_CONFIG_FILE = "driftlens.yaml";

export interface ConfigLintIssue {
  severity: "error" | "warning";
  rule: string;
  message: string;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Load the config file, apply environment overrides and resolve relative
 * paths against the file's directory.
 */
export async function loadDriftConfig(configPath: string, env: Env = process.env): Promise<DriftConfig> {
  const raw = await readConfigFile(configPath);
  const result = DriftConfig.safeParse(raw ?? { schemaVersion: 1 });
  if (!result.success) {
    throw new ConfigError(
      `Invalid config ${configPath}`,
      result.error.issues.map(i => ({ path: i.path.join("."), message: i.message })),
    );
  }

  const config = result.data;
  const baseDir = dirname(resolve(configPath));
  const policyPath = env["DRIFTLENS_POLICY"] || config.policyPath;
  const eventsDir = env["DRIFTLENS_EVENTS_DIR"] || config.eventsDir;

  return {
    ...config,
    ...(policyPath ? { policyPath: resolve(baseDir, policyPath) } : {}),
    ...(eventsDir ? { eventsDir: resolve(baseDir, eventsDir) } : {}),
  };
}

/**
 * Get a value from the effective config (file plus defaults) using a
 * dot-notation path, e.g. "remediation.resourceGroup".
 */
export async function getConfigValue(configPath: string, key: string, env: Env = process.env): Promise<unknown> {
  const config = await loadDriftConfig(configPath, env);
  return resolveKeyPath(config, key);
}

/**
 * Validate the config file (schema + referenced files).
 */
export async function validateConfig(configPath: string): Promise<{
  valid: boolean;
  schemaErrors: Array<{ path: string; message: string }>;
  lintIssues: ConfigLintIssue[];
}> {
  const raw = await readConfigFile(configPath);
  if (raw === undefined) {
    return {
      valid: false,
      schemaErrors: [{ path: "", message: `Config file not found: ${configPath}` }],
      lintIssues: [],
    };
  }

  const result = DriftConfig.safeParse(raw);
  if (!result.success) {
    return {
      valid: false,
      schemaErrors: result.error.issues.map(i => ({
        path: i.path.join("."),
        message: i.message,
      })),
      lintIssues: [],
    };
  }

  const lint = await lintConfig(result.data, dirname(resolve(configPath)));
  return {
    valid: !lint.some(i => i.severity === "error"),
    schemaErrors: [],
    lintIssues: lint,
  };
}

async function lintConfig(config: DriftConfig, baseDir: string): Promise<ConfigLintIssue[]> {
  const issues: ConfigLintIssue[] = [];

  if (config.policyPath) {
    const path = isAbsolute(config.policyPath) ? config.policyPath : resolve(baseDir, config.policyPath);
    const exists = await access(path).then(() => true, () => false);
    if (!exists) {
      issues.push({ severity: "error", rule: "policy-path", message: `Policy file not found: ${path}` });
    }
  }

  if (!config.remediation.resourceGroup) {
    issues.push({
      severity: "warning",
      rule: "remediation-resource-group",
      message: "remediation.resourceGroup is not set; --commands will need the live inventory's resourceGroup",
    });
  }

  if (config.failOn === "never") {
    issues.push({ severity: "warning", rule: "fail-on", message: "failOn is 'never'; check always exits 0" });
  }

  return issues;
}

// --- Helpers ---

/** Parsed YAML, or undefined when the file does not exist. */
async function readConfigFile(configPath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return undefined;
    throw new ConfigError(`Failed to read config ${configPath}: ${(err as Error).message}`);
  }

  try {
    return parseYaml(content) ?? {};
  } catch (err) {
    throw new ConfigError(`Failed to parse config ${configPath}: ${(err as Error).message}`);
  }
}

function resolveKeyPath(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split(".")) {
    if (current === null || current === undefined) return undefined;
    if (Array.isArray(current)) {
      const idx = parseInt(part, 10);
      current = isNaN(idx) ? undefined : current[idx];
    } else if (isPlainObject(current)) {
      current = Object.prototype.hasOwnProperty.call(current, part) ? current[part] : undefined;
    } else {
      return undefined;
    }
  }
  return current;
}
