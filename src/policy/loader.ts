/**
 * Policy loader: reads, validates and freezes the drift policy YAML.
 *
 * Loaded once per process and passed into each component; nothing mutates it.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { DriftPolicy } from "../schemas/policy.js";
import { PolicyError } from "../drift/errors.js";

/** Bundled Azure policy (resolved from both src/ and dist/). */
export const DEFAULT_POLICY_PATH = fileURLToPath(new URL("../../policies/azure.yaml", import.meta.url));

export interface PolicyLintIssue {
  severity: "error" | "warning";
  rule: string;
  message: string;
}

/**
 * Validate a raw policy object. Throws PolicyError on schema or lint errors.
 */
export function parsePolicy(raw: unknown): DriftPolicy {
  const result = DriftPolicy.safeParse(raw);
  if (!result.success) {
    throw new PolicyError(
      "Invalid drift policy",
      result.error.issues.map(i => ({ path: i.path.join("."), message: i.message })),
    );
  }

  const errors = lintPolicy(result.data).filter(i => i.severity === "error");
  if (errors.length > 0) {
    throw new PolicyError(
      "Inconsistent drift policy",
      errors.map(i => ({ path: i.rule, message: i.message })),
    );
  }

  return deepFreeze(result.data);
}

/**
 * Load and validate a policy file (YAML or JSON).
 */
export async function loadPolicy(path: string = DEFAULT_POLICY_PATH): Promise<DriftPolicy> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    throw new PolicyError(`Failed to read policy ${path}: ${(err as Error).message}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new PolicyError(`Failed to parse policy ${path}: ${(err as Error).message}`);
  }

  return parsePolicy(raw);
}

/**
 * Referential checks the schema cannot express.
 */
export function lintPolicy(policy: DriftPolicy): PolicyLintIssue[] {
  const issues: PolicyLintIssue[] = [];
  const declaredOwners = new Map<string, string>();
  const nativeOwners = new Map<string, string[]>();

  for (const [kind, type] of Object.entries(policy.entityTypes)) {
    for (const declared of [kind, ...type.declaredTypes]) {
      const key = declared.toLowerCase();
      const owner = declaredOwners.get(key);
      if (owner && owner !== kind) {
        issues.push({
          severity: "error",
          rule: "unique-declared-type",
          message: `Declared type '${declared}' is claimed by both '${owner}' and '${kind}'`,
        });
      }
      declaredOwners.set(key, kind);
    }

    const native = type.nativeType.toLowerCase();
    nativeOwners.set(native, [...(nativeOwners.get(native) ?? []), kind]);

    const setPaths = new Set(type.sets.map(s => s.path));
    for (const path of Object.keys(type.unwrap)) {
      if (type.blocks.includes(path)) {
        issues.push({
          severity: "error",
          rule: "unwrap-block",
          message: `${kind}: '${path}' cannot be both a block and an unwrapped collection`,
        });
      }
    }
    for (const path of setPaths) {
      if (type.blocks.includes(path)) {
        issues.push({
          severity: "error",
          rule: "set-block",
          message: `${kind}: '${path}' cannot be both a block and a set`,
        });
      }
    }

    if (!type.remediation) {
      issues.push({
        severity: "warning",
        rule: "remediation-table",
        message: `${kind}: no remediation table, no commands will be planned`,
      });
    }
  }

  for (const [native, kinds] of nativeOwners) {
    if (kinds.length < 2) continue;
    const unmarked = kinds.filter(k => policy.entityTypes[k]?.liveMarker === undefined);
    if (unmarked.length > 1) {
      issues.push({
        severity: "error",
        rule: "live-marker",
        message: `Kinds ${unmarked.join(", ")} share native type '${native}' without a liveMarker`,
      });
    }
  }

  return issues;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
