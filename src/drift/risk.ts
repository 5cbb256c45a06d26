/**
 * Risk Classifier: assigns a RiskLevel to each diff and missing entity.
 *
 * Pure policy lookup: the most specific rule for the diff's schema path wins,
 * otherwise the per-kind default applies.
 */

import type { PolicyCatalog } from "../policy/catalog.js";
import type { DiffKind, MissingSide, RiskLevel, RiskRule } from "../schemas/policy.js";
import type { CanonicalEntity } from "./canonical.js";
import { schemaPath } from "./canonical.js";
import type { PropertyDiff } from "./differ.js";

export const RISK_ORDER: Record<RiskLevel, number> = {
  low: 0,
  medium: 1,
  high: 2,
};

export function compareRisk(a: RiskLevel, b: RiskLevel): number {
  return RISK_ORDER[a] - RISK_ORDER[b];
}

/** Highest level in the list, or undefined when it is empty. */
export function maxRisk(levels: Iterable<RiskLevel>): RiskLevel | undefined {
  let highest: RiskLevel | undefined;
  for (const level of levels) {
    if (highest === undefined || RISK_ORDER[level] > RISK_ORDER[highest]) {
      highest = level;
    }
  }
  return highest;
}

/** True when `path` is `prefix` itself or lies below it. */
export function pathHasPrefix(path: string, prefix: string): boolean {
  if (path === prefix) return true;
  if (!path.startsWith(prefix)) return false;
  const next = path.charAt(prefix.length);
  return next === "." || next === "[";
}

export class RiskClassifier {
  constructor(private readonly catalog: PolicyCatalog) {}

  classify(kind: string, diff: PropertyDiff): RiskLevel {
    const path = schemaPath(diff.path);
    const typeRules = this.catalog.get(kind)?.riskRules ?? [];
    const rule =
      longestMatch(typeRules, path, diff.kind) ??
      longestMatch(this.catalog.policy.common.risk, path, diff.kind);
    return rule?.level ?? this.catalog.policy.risk.diffDefaults[diff.kind];
  }

  classifyMissing(entity: CanonicalEntity, side: MissingSide): RiskLevel {
    const override = this.catalog.get(entity.kind)?.policy.missingRisk[side];
    return override ?? this.catalog.policy.risk.missingDefaults[side];
  }
}

function longestMatch(rules: readonly RiskRule[], path: string, kind: DiffKind): RiskRule | undefined {
  let best: RiskRule | undefined;
  for (const rule of rules) {
    if (rule.kinds && !rule.kinds.includes(kind)) continue;
    if (!pathHasPrefix(path, rule.prefix)) continue;
    if (!best || rule.prefix.length > best.prefix.length) best = rule;
  }
  return best;
}
