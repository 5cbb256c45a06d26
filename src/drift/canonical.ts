/**
 * Canonical entity model: the one shape both sources are normalized into.
 *
 * Values are a tagged union on `kind`. `unresolved` carries declared text that
 * could not be reduced to a literal and is never equal or unequal to anything.
 */

export type Scalar = string | number | boolean | null;

export interface ScalarValue {
  readonly kind: "scalar";
  readonly value: Scalar;
}

/** Order-significant collection. */
export interface ListValue {
  readonly kind: "list";
  readonly items: readonly CanonicalValue[];
}

/** Unordered collection; items are stored sorted by element key. */
export interface SetValue {
  readonly kind: "set";
  readonly items: readonly CanonicalValue[];
  /** Field of object elements used to pair elements across sources. */
  readonly identityKey?: string;
}

/** Element of a collection; its own nested keys are flattened to dotted paths. */
export interface ObjectValue {
  readonly kind: "object";
  readonly entries: CanonicalProperties;
}

export interface UnresolvedValue {
  readonly kind: "unresolved";
  readonly expression: string;
}

export type CanonicalValue = ScalarValue | ListValue | SetValue | ObjectValue | UnresolvedValue;

/** Dotted path → value, iterated in lexicographic path order. */
export type CanonicalProperties = ReadonlyMap<string, CanonicalValue>;

export type EntitySource = "declared" | "live";

export interface EntityIdentity {
  /** Cloud-native type, as spelled in the policy. */
  readonly type: string;
  readonly name: string;
  /** `<lowercase type>:<lowercase name>`. */
  readonly key: string;
}

export interface CanonicalEntity {
  /** Entity kind tag from the policy (e.g. `key_vault`). */
  readonly kind: string;
  readonly identity: EntityIdentity;
  readonly source: EntitySource;
  /** Source location (declared) or region (live). */
  readonly origin?: string;
  readonly properties: CanonicalProperties;
}

// --- Constructors ---

export function scalar(value: Scalar): ScalarValue {
  return { kind: "scalar", value };
}

export function list(items: readonly CanonicalValue[]): ListValue {
  return { kind: "list", items: Object.freeze([...items]) };
}

export function set(items: readonly CanonicalValue[], identityKey?: string): SetValue {
  const keyed = items.map(item => ({ key: elementKey(item, identityKey), text: serializeValue(item), item }));
  // Ties on the key are broken by the full value.
  keyed.sort((a, b) => compareKeys(a.key, b.key) || compareKeys(a.text, b.text));
  const sorted = Object.freeze(keyed.map(k => k.item));
  return identityKey ? { kind: "set", items: sorted, identityKey } : { kind: "set", items: sorted };
}

export function object(entries: Iterable<readonly [string, CanonicalValue]>): ObjectValue {
  return { kind: "object", entries: sortedProperties(entries) };
}

export function unresolved(expression: string): UnresolvedValue {
  return { kind: "unresolved", expression };
}

export function createIdentity(type: string, name: string): EntityIdentity {
  return { type, name, key: `${type.toLowerCase()}:${name.toLowerCase()}` };
}

// --- Helpers ---

/** Plain code-unit ordering; locale-independent so output is reproducible. */
export function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function sortedProperties(entries: Iterable<readonly [string, CanonicalValue]>): CanonicalProperties {
  const sorted = [...entries].sort((a, b) => compareKeys(a[0], b[0]));
  return new Map(sorted);
}

export function joinPath(prefix: string, key: string): string {
  return prefix ? `${prefix}.${key}` : key;
}

/** Concrete path → schema path: `security_rules[ssh].access` → `security_rules[].access`. */
export function schemaPath(path: string): string {
  return path.replace(/\[[^\]]*\]/g, "[]");
}

/**
 * Key an element of a set: the identity field (case-insensitive) for objects
 * that carry it, otherwise the element's canonical serialization.
 */
export function elementKey(value: CanonicalValue, identityKey?: string): string {
  if (identityKey && value.kind === "object") {
    const id = value.entries.get(identityKey);
    if (id?.kind === "scalar" && id.value !== null) {
      return String(id.value).toLowerCase();
    }
  }
  if (value.kind === "scalar") {
    return String(value.value);
  }
  return serializeValue(value);
}

export function isUnresolved(value: CanonicalValue | undefined): value is UnresolvedValue {
  return value?.kind === "unresolved";
}

/** Structural equality. Anything involving `unresolved` is not equal. */
export function canonicalEquals(a: CanonicalValue, b: CanonicalValue): boolean {
  switch (a.kind) {
    case "scalar":
      return b.kind === "scalar" && a.value === b.value;
    case "list":
    case "set":
      return (
        b.kind === a.kind &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => {
          const other = b.items[i];
          return other !== undefined && canonicalEquals(item, other);
        })
      );
    case "object": {
      if (b.kind !== "object" || a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (!other || !canonicalEquals(value, other)) return false;
      }
      return true;
    }
    case "unresolved":
      return false;
  }
}

export type PlainValue = Scalar | PlainValue[] | { [key: string]: PlainValue };

/** JSON-ready form. Unresolved values become `{ "$unresolved": "<text>" }`. */
export function toPlain(value: CanonicalValue): PlainValue {
  switch (value.kind) {
    case "scalar":
      return value.value;
    case "list":
    case "set":
      return value.items.map(toPlain);
    case "object":
      return propertiesToPlain(value.entries);
    case "unresolved":
      return { $unresolved: value.expression };
  }
}

export function propertiesToPlain(properties: CanonicalProperties): { [key: string]: PlainValue } {
  const out: { [key: string]: PlainValue } = {};
  for (const [key, value] of properties) {
    out[key] = toPlain(value);
  }
  return out;
}

export function serializeValue(value: CanonicalValue): string {
  return JSON.stringify(toPlain(value));
}
