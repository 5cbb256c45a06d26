/**
 * Recursive Differ: walks two canonical entities in lock-step.
 *
 * Emits one PropertyDiff per disagreeing path, in lexicographic path order.
 * Never throws: type clashes become `changed` diffs carrying both values.
 */

import type { PolicyCatalog } from "../policy/catalog.js";
import type { DiffKind } from "../schemas/policy.js";
import type {
  CanonicalEntity,
  CanonicalProperties,
  CanonicalValue,
  EntitySource,
  ListValue,
  SetValue,
} from "./canonical.js";
import { canonicalEquals, compareKeys, elementKey, isUnresolved, schemaPath } from "./canonical.js";
import type { EntityNormalizer } from "./normalizer.js";

export interface PropertyDiff {
  readonly path: string;
  readonly kind: DiffKind;
  readonly declaredValue?: CanonicalValue;
  readonly liveValue?: CanonicalValue;
  /** Side whose value was taken from the default-value table. */
  readonly defaulted?: EntitySource;
}

export class Differ {
  private readonly defaultCache = new Map<string, CanonicalValue | null>();

  constructor(
    private readonly catalog: PolicyCatalog,
    private readonly normalizer: EntityNormalizer,
  ) {}

  diff(declared: CanonicalEntity, live: CanonicalEntity): PropertyDiff[] {
    const out: PropertyDiff[] = [];
    this.diffProperties(declared.kind, "", declared.properties, live.properties, out);
    return out;
  }

  /** Default value for a concrete path, normalized like live data. */
  defaultFor(kind: string, path: string): CanonicalValue | undefined {
    const schema = schemaPath(path);
    const cacheKey = `${kind}\u0000${schema}`;
    const cached = this.defaultCache.get(cacheKey);
    if (cached !== undefined) return cached ?? undefined;

    const raw = this.catalog.get(kind)?.defaults.get(schema);
    const value = raw === undefined ? undefined : this.normalizer.normalizeValue(kind, schema, raw);
    this.defaultCache.set(cacheKey, value ?? null);
    return value;
  }

  private diffProperties(
    kind: string,
    prefix: string,
    declared: CanonicalProperties,
    live: CanonicalProperties,
    out: PropertyDiff[],
  ): void {
    const keys = [...new Set([...declared.keys(), ...live.keys()])].sort(compareKeys);
    for (const key of keys) {
      const path = prefix ? `${prefix}.${key}` : key;
      this.diffValue(kind, path, declared.get(key), live.get(key), out);
    }
  }

  private diffValue(
    kind: string,
    path: string,
    declared: CanonicalValue | undefined,
    live: CanonicalValue | undefined,
    out: PropertyDiff[],
  ): void {
    if (declared === undefined && live === undefined) return;

    if (isUnresolved(declared) || isUnresolved(live)) {
      out.push(withValues({ path, kind: "unresolved" }, declared, live));
      return;
    }

    if (declared === undefined || live === undefined) {
      this.diffOneSided(kind, path, declared, live, out);
      return;
    }

    if (equivalent(declared, live)) return;

    if (declared.kind === "object" && live.kind === "object") {
      this.diffProperties(kind, path, declared.entries, live.entries, out);
      return;
    }

    if (declared.kind === "list" && live.kind === "list") {
      this.diffLists(kind, path, declared, live, out);
      return;
    }

    if (declared.kind === "set" && live.kind === "set") {
      this.diffSets(kind, path, declared, live, out);
      return;
    }

    if (containsUnresolved(declared) || containsUnresolved(live)) {
      out.push({ path, kind: "unresolved", declaredValue: declared, liveValue: live });
      return;
    }

    out.push({ path, kind: "changed", declaredValue: declared, liveValue: live });
  }

  /**
   * One side has no value. A known default stands in for the missing side:
   * equal → elided, unequal → `changed`. Without a default the value is
   * `removed` (declared only) or `added` (live only). A value holding an
   * unresolved part is always `unresolved`.
   */
  private diffOneSided(
    kind: string,
    path: string,
    declared: CanonicalValue | undefined,
    live: CanonicalValue | undefined,
    out: PropertyDiff[],
  ): void {
    const fallback = this.defaultFor(kind, path);
    const present = declared ?? live;
    if (!present) return;

    // A value with an unresolved part cannot be compared, not even with a default.
    if (containsUnresolved(present)) {
      out.push(withValues({ path, kind: "unresolved" }, declared, live));
      return;
    }

    if (fallback) {
      if (equivalent(fallback, present)) return;
      out.push(
        declared
          ? { path, kind: "changed", declaredValue: declared, liveValue: fallback, defaulted: "live" }
          : { path, kind: "changed", declaredValue: fallback, liveValue: present, defaulted: "declared" },
      );
      return;
    }

    out.push(declared ? { path, kind: "removed", declaredValue: declared } : { path, kind: "added", liveValue: present });
  }

  /**
   * Lists of objects are paired by index and recursed; lists of scalars are
   * compared whole, so reordering yields a single `changed`.
   */
  private diffLists(kind: string, path: string, declared: ListValue, live: ListValue, out: PropertyDiff[]): void {
    const hasObjects = [...declared.items, ...live.items].some(item => item.kind === "object");
    if (!hasObjects) {
      const uncertain = containsUnresolved(declared) || containsUnresolved(live);
      out.push({ path, kind: uncertain ? "unresolved" : "changed", declaredValue: declared, liveValue: live });
      return;
    }

    const length = Math.max(declared.items.length, live.items.length);
    for (let i = 0; i < length; i++) {
      this.diffElement(kind, `${path}[${i}]`, declared.items[i], live.items[i], out);
    }
  }

  /**
   * Sets pair elements by identity key (or by value) and report only the
   * elements present on one side; shared object elements are recursed.
   */
  private diffSets(kind: string, path: string, declared: SetValue, live: SetValue, out: PropertyDiff[]): void {
    const identityKey = declared.identityKey ?? live.identityKey;
    const declaredItems = keyElements(declared, identityKey);
    const liveItems = keyElements(live, identityKey);
    // An unresolved element may stand for any element the other side has.
    const declaredUncertain = declared.items.some(containsUnresolved);
    const liveUncertain = live.items.some(containsUnresolved);

    const keys = [...new Set([...declaredItems.keys(), ...liveItems.keys()])].sort(compareKeys);
    for (const key of keys) {
      const elementPath = `${path}[${key}]`;
      const d = declaredItems.get(key);
      const l = liveItems.get(key);

      if (d && l) {
        this.diffValue(kind, elementPath, d, l, out);
      } else if (d) {
        const uncertain = liveUncertain || containsUnresolved(d);
        out.push({ path: elementPath, kind: uncertain ? "unresolved" : "removed", declaredValue: d });
      } else if (l) {
        const uncertain = declaredUncertain || containsUnresolved(l);
        out.push({ path: elementPath, kind: uncertain ? "unresolved" : "added", liveValue: l });
      }
    }
  }

  private diffElement(
    kind: string,
    path: string,
    declared: CanonicalValue | undefined,
    live: CanonicalValue | undefined,
    out: PropertyDiff[],
  ): void {
    if (declared && live) {
      this.diffValue(kind, path, declared, live, out);
    } else if (declared) {
      out.push({ path, kind: containsUnresolved(declared) ? "unresolved" : "removed", declaredValue: declared });
    } else if (live) {
      out.push({ path, kind: containsUnresolved(live) ? "unresolved" : "added", liveValue: live });
    }
  }
}

/**
 * Equality with one semantic rule on top of structural equality: a scalar
 * equals a one-element collection holding that scalar.
 */
export function equivalent(a: CanonicalValue, b: CanonicalValue): boolean {
  if (canonicalEquals(a, b)) return true;
  return singletonEquals(a, b) || singletonEquals(b, a);
}

function singletonEquals(single: CanonicalValue, collection: CanonicalValue): boolean {
  if (single.kind !== "scalar") return false;
  if (collection.kind !== "list" && collection.kind !== "set") return false;
  const [only] = collection.items;
  return collection.items.length === 1 && only !== undefined && canonicalEquals(single, only);
}

export function containsUnresolved(value: CanonicalValue): boolean {
  switch (value.kind) {
    case "unresolved":
      return true;
    case "scalar":
      return false;
    case "list":
    case "set":
      return value.items.some(containsUnresolved);
    case "object":
      return [...value.entries.values()].some(containsUnresolved);
  }
}

function keyElements(value: SetValue, identityKey: string | undefined): Map<string, CanonicalValue> {
  const keyed = new Map<string, CanonicalValue>();
  for (const item of value.items) {
    let key = elementKey(item, identityKey);
    if (keyed.has(key)) {
      let n = 2;
      while (keyed.has(`${key}#${n}`)) n++;
      key = `${key}#${n}`;
    }
    keyed.set(key, item);
  }
  return keyed;
}

function withValues(
  base: { path: string; kind: DiffKind },
  declared: CanonicalValue | undefined,
  live: CanonicalValue | undefined,
): PropertyDiff {
  return {
    ...base,
    ...(declared !== undefined ? { declaredValue: declared } : {}),
    ...(live !== undefined ? { liveValue: live } : {}),
  };
}
