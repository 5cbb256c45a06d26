/**
 * Policy catalog: indexed, read-only view over a DriftPolicy.
 *
 * One record per entity kind; every component looks rules up here by kind
 * instead of branching on type strings.
 */

import type { DriftPolicy, EntityTypePolicy, RiskRule, SetRule } from "../schemas/policy.js";

export interface EntityTypeRecord {
  readonly kind: string;
  readonly nativeType: string;
  readonly policy: EntityTypePolicy;
  /** Common + type-specific ignore paths. */
  readonly ignore: ReadonlySet<string>;
  readonly caseInsensitive: ReadonlySet<string>;
  readonly lowercaseKeys: ReadonlySet<string>;
  readonly blocks: ReadonlySet<string>;
  readonly sets: ReadonlyMap<string, SetRule>;
  /** Declared path → live path. */
  readonly translations: ReadonlyMap<string, string>;
  readonly aliases: ReadonlyMap<string, string>;
  readonly unwrap: ReadonlyMap<string, string>;
  /** Raw default values by live schema path. */
  readonly defaults: ReadonlyMap<string, unknown>;
  readonly riskRules: readonly RiskRule[];
}

export class PolicyCatalog {
  private readonly records = new Map<string, EntityTypeRecord>();
  private readonly declaredIndex = new Map<string, EntityTypeRecord>();
  private readonly nativeIndex = new Map<string, EntityTypeRecord[]>();

  constructor(readonly policy: DriftPolicy) {
    const common = policy.common;

    for (const [kind, typePolicy] of Object.entries(policy.entityTypes)) {
      const record: EntityTypeRecord = {
        kind,
        nativeType: typePolicy.nativeType,
        policy: typePolicy,
        ignore: new Set([...common.ignore, ...typePolicy.ignore]),
        caseInsensitive: new Set([...common.caseInsensitive, ...typePolicy.caseInsensitive]),
        lowercaseKeys: new Set([...common.lowercaseKeys, ...typePolicy.lowercaseKeys]),
        blocks: new Set(typePolicy.blocks),
        sets: new Map(typePolicy.sets.map(rule => [rule.path, rule])),
        translations: new Map(Object.entries(typePolicy.properties)),
        aliases: new Map(Object.entries(typePolicy.aliases)),
        unwrap: new Map(Object.entries(typePolicy.unwrap)),
        defaults: new Map(Object.entries(typePolicy.defaults)),
        riskRules: typePolicy.risk,
      };
      this.records.set(kind, record);

      for (const declared of [kind, ...typePolicy.declaredTypes]) {
        this.declaredIndex.set(declared.toLowerCase(), record);
      }

      const nativeKey = typePolicy.nativeType.toLowerCase();
      const sharing = this.nativeIndex.get(nativeKey) ?? [];
      sharing.push(record);
      this.nativeIndex.set(nativeKey, sharing);
    }
  }

  get version(): string {
    return this.policy.version;
  }

  kinds(): string[] {
    return [...this.records.keys()];
  }

  get(kind: string): EntityTypeRecord | undefined {
    return this.records.get(kind);
  }

  /** Resolve a declared type (`storage_account` or `azurerm_storage_account`). */
  resolveDeclared(entityType: string): EntityTypeRecord | undefined {
    return this.declaredIndex.get(entityType.toLowerCase());
  }

  /**
   * Resolve a live native type. When several kinds share the type, the first
   * whose `liveMarker` path is present in the raw tree wins.
   */
  resolveLive(entityType: string, raw: Record<string, unknown>): EntityTypeRecord | undefined {
    const candidates = this.nativeIndex.get(entityType.toLowerCase());
    if (!candidates || candidates.length === 0) return undefined;
    if (candidates.length === 1) return candidates[0];

    const marked = candidates.find(
      c => c.policy.liveMarker !== undefined && lookupRawPath(raw, c.policy.liveMarker) != null,
    );
    return marked ?? candidates[0];
  }
}

/** Walk a dotted path through nested plain objects. */
export function lookupRawPath(raw: Record<string, unknown>, path: string): unknown {
  let current: unknown = raw;
  for (const part of path.split(".")) {
    if (!isPlainObject(current)) return undefined;
    current = current[part];
  }
  return current;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
