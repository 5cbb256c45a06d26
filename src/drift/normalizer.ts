/**
 * Entity Normalizer: raw property tree → CanonicalEntity.
 *
 * - Declared paths are translated into the live vocabulary on ingestion
 * - Nested mappings flatten to dotted paths; collections become list or set
 * - Numeric and boolean-like strings are coerced; null leaves are omitted
 * - Reference expressions (`${...}`) are kept as `unresolved`
 *
 * Shape violations never throw: the offending value is kept as `unresolved`
 * and a NormalizationError diagnostic is returned with the entity.
 */

import type { EntityTypeRecord, PolicyCatalog } from "../policy/catalog.js";
import { isPlainObject } from "../policy/catalog.js";
import type { CanonicalEntity, CanonicalValue, EntitySource } from "./canonical.js";
import {
  createIdentity,
  joinPath,
  list,
  object,
  scalar,
  set,
  sortedProperties,
  unresolved,
} from "./canonical.js";
import type { Diagnostic } from "./diagnostics.js";
import { diagnosticFromError } from "./diagnostics.js";
import { NormalizationError, UnknownEntityTypeError } from "./errors.js";

export const DEFAULT_MAX_DEPTH = 32;

/** Unresolved interpolation (`${var.x}`) or a parser's variable placeholder. */
const REFERENCE_PATTERN = /\$\{[^}]*\}|<variable:[^>]*>/;
const NUMERIC_PATTERN = /^-?(?:0|[1-9]\d*)(?:\.\d+)?$/;
const BOOLEAN_PATTERN = /^(?:true|false)$/i;
const DEPTH_EXCEEDED = "<depth limit exceeded>";

/** Either side's resource record; only the fields the normalizer reads. */
export interface SourceResource {
  entityType: string;
  name: string;
  rawProperties?: Record<string, unknown>;
  sourceLocation?: string;
  region?: string;
}

export interface NormalizerOptions {
  maxDepth?: number;
}

export interface NormalizationResult {
  entity: CanonicalEntity;
  diagnostics: Diagnostic[];
}

interface WalkContext {
  record: EntityTypeRecord;
  source: EntitySource;
  entity: { type: string; name: string };
  diagnostics: Diagnostic[];
}

export function containsReference(text: string): boolean {
  return REFERENCE_PATTERN.test(text);
}

export class EntityNormalizer {
  private readonly maxDepth: number;

  constructor(
    private readonly catalog: PolicyCatalog,
    options: NormalizerOptions = {},
  ) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  /**
   * Normalize one resource. Throws UnknownEntityTypeError when the type is
   * not in the policy; every other problem is reported as a diagnostic.
   */
  normalize(resource: SourceResource, source: EntitySource): NormalizationResult {
    const raw: unknown = resource.rawProperties ?? {};
    const record =
      source === "declared"
        ? this.catalog.resolveDeclared(resource.entityType)
        : this.catalog.resolveLive(resource.entityType, isPlainObject(raw) ? raw : {});

    if (!record) {
      throw new UnknownEntityTypeError(source, resource.entityType, resource.name);
    }

    const ctx: WalkContext = {
      record,
      source,
      entity: { type: record.kind, name: resource.name },
      diagnostics: [],
    };

    if (containsReference(resource.name)) {
      this.fail(ctx, "name", "name contains an unresolved reference; left out of matching");
    }

    const properties = new Map<string, CanonicalValue>();
    if (isPlainObject(raw)) {
      const tree =
        source === "live" && resource.region && raw["location"] == null
          ? { ...raw, location: resource.region }
          : raw;
      this.flatten(ctx, properties, tree, "", "", "", 1);
    } else {
      this.fail(ctx, "", `expected a mapping of properties, got ${describe(raw)}`);
      properties.set("$", unresolved(String(raw)));
    }

    const origin = source === "declared" ? resource.sourceLocation : resource.region;
    const entity: CanonicalEntity = Object.freeze({
      kind: record.kind,
      identity: Object.freeze(createIdentity(record.nativeType, resource.name)),
      source,
      ...(origin !== undefined ? { origin } : {}),
      properties: sortedProperties(properties),
    });

    return { entity, diagnostics: ctx.diagnostics };
  }

  /**
   * Normalize a single raw value found at a live schema path, the way it
   * would appear inside an entity. Used for default-value tables.
   */
  normalizeValue(kind: string, path: string, raw: unknown): CanonicalValue | undefined {
    const record = this.catalog.get(kind);
    if (!record) return undefined;
    const ctx: WalkContext = { record, source: "live", entity: { type: kind, name: "<default>" }, diagnostics: [] };
    return this.toValue(ctx, raw, path, path, 1);
  }

  private flatten(
    ctx: WalkContext,
    target: Map<string, CanonicalValue>,
    obj: Record<string, unknown>,
    declPrefix: string,
    livePrefix: string,
    relBase: string,
    depth: number,
  ): void {
    const lowerKeys = ctx.record.lowercaseKeys.has(livePrefix);

    for (const [rawKey, rawValue] of Object.entries(obj)) {
      const key = lowerKeys ? rawKey.toLowerCase() : rawKey;
      const declPath = joinPath(declPrefix, key);
      const livePath = this.livePathFor(ctx, declPath, livePrefix, key);
      if (ctx.record.ignore.has(livePath)) continue;

      const relKey = relativePath(livePath, relBase);
      const shaped = this.unwrapBlock(ctx, rawValue, declPath, livePath);
      if (shaped.failed) {
        target.set(relKey, shaped.failed);
        continue;
      }

      const value = shaped.raw;
      if (isPlainObject(value)) {
        if (depth + 1 > this.maxDepth) {
          this.fail(ctx, livePath, `nesting deeper than ${this.maxDepth} levels`);
          target.set(relKey, unresolved(DEPTH_EXCEEDED));
        } else {
          this.flatten(ctx, target, value, declPath, livePath, relBase, depth + 1);
        }
        continue;
      }

      const canonical = this.toValue(ctx, value, declPath, livePath, depth + 1);
      if (canonical) target.set(relKey, canonical);
    }
  }

  private toValue(
    ctx: WalkContext,
    raw: unknown,
    declPath: string,
    livePath: string,
    depth: number,
  ): CanonicalValue | undefined {
    if (raw === null || raw === undefined) return undefined;

    switch (typeof raw) {
      case "string":
        if (containsReference(raw)) return unresolved(raw);
        return scalar(coerceString(raw, this.isCaseInsensitive(ctx, livePath)));
      case "number":
        if (!Number.isFinite(raw)) {
          this.fail(ctx, livePath, `non-finite number ${raw}`);
          return unresolved(String(raw));
        }
        return scalar(raw);
      case "boolean":
        return scalar(raw);
      default:
        break;
    }

    if (Array.isArray(raw) || isPlainObject(raw)) {
      if (depth > this.maxDepth) {
        this.fail(ctx, livePath, `nesting deeper than ${this.maxDepth} levels`);
        return unresolved(DEPTH_EXCEEDED);
      }
    }

    if (Array.isArray(raw)) {
      const unwrapField = ctx.record.unwrap.get(livePath);
      const items: CanonicalValue[] = [];
      for (const element of raw) {
        const lifted =
          unwrapField !== undefined && isPlainObject(element) && element[unwrapField] !== undefined
            ? element[unwrapField]
            : element;
        const item = this.toValue(ctx, lifted, `${declPath}[]`, `${livePath}[]`, depth + 1);
        if (item) items.push(item);
      }
      const setRule = ctx.record.sets.get(livePath);
      return setRule ? set(items, setRule.identityKey) : list(items);
    }

    if (isPlainObject(raw)) {
      const entries = new Map<string, CanonicalValue>();
      this.flatten(ctx, entries, raw, declPath, livePath, livePath, depth);
      return object(entries);
    }

    this.fail(ctx, livePath, `unsupported value of type ${typeof raw}`);
    return unresolved(String(raw));
  }

  private livePathFor(ctx: WalkContext, declPath: string, livePrefix: string, key: string): string {
    const translated =
      ctx.source === "declared" ? ctx.record.translations.get(declPath) : undefined;
    const path = translated ?? joinPath(livePrefix, key);
    return ctx.record.aliases.get(path) ?? path;
  }

  /**
   * Blocks arrive as one-element arrays from HCL parsers; unwrap them and
   * reject anything that is not an object.
   */
  private unwrapBlock(
    ctx: WalkContext,
    value: unknown,
    declPath: string,
    livePath: string,
  ): { raw: unknown; failed?: undefined } | { raw?: undefined; failed: CanonicalValue } {
    const isBlock = ctx.record.blocks.has(declPath) || ctx.record.blocks.has(livePath);
    if (!isBlock || value === null || value === undefined || isPlainObject(value)) {
      return { raw: value };
    }

    if (Array.isArray(value)) {
      if (value.length === 0) return { raw: undefined };
      const [first] = value;
      if (value.length === 1 && isPlainObject(first)) return { raw: first };
      this.fail(ctx, livePath, `expected a single block, got ${value.length} entries`);
      return { failed: unresolved(JSON.stringify(value)) };
    }

    this.fail(ctx, livePath, `expected an object, got ${describe(value)}`);
    return { failed: unresolved(String(value)) };
  }

  private isCaseInsensitive(ctx: WalkContext, livePath: string): boolean {
    const paths = ctx.record.caseInsensitive;
    return paths.has(livePath) || (livePath.endsWith("[]") && paths.has(livePath.slice(0, -2)));
  }

  private fail(ctx: WalkContext, path: string, reason: string): void {
    ctx.diagnostics.push(diagnosticFromError(new NormalizationError(ctx.entity, path, reason)));
  }
}

/** Trim, then coerce numeric and boolean-like text. */
export function coerceString(text: string, lowercase: boolean): string | number | boolean {
  const trimmed = text.trim();
  if (BOOLEAN_PATTERN.test(trimmed)) return trimmed.toLowerCase() === "true";
  if (NUMERIC_PATTERN.test(trimmed)) return Number(trimmed);
  return lowercase ? trimmed.toLowerCase() : trimmed;
}

function relativePath(livePath: string, relBase: string): string {
  if (!relBase) return livePath;
  const prefix = `${relBase}.`;
  if (livePath.startsWith(prefix)) return livePath.slice(prefix.length);
  const lastDot = livePath.lastIndexOf(".");
  return lastDot === -1 ? livePath : livePath.slice(lastDot + 1);
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  return `a ${typeof value}`;
}
