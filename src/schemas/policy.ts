import { z } from "zod";

/**
 * Drift policy schema: the versioned lookup tables that drive normalization,
 * default elision, risk classification and remediation planning.
 *
 * Stored as a single YAML file (policies/azure.yaml). Paths are in the live
 * vocabulary; collection elements use the schema form `collection[].field`.
 */

export const RiskLevel = z.enum(["low", "medium", "high"]);
export type RiskLevel = z.infer<typeof RiskLevel>;

export const DiffKind = z.enum(["added", "removed", "changed", "unresolved"]);
export type DiffKind = z.infer<typeof DiffKind>;

export const MissingSide = z.enum(["declared_only", "live_only"]);
export type MissingSide = z.infer<typeof MissingSide>;

/** A risk override for every diff at or below a property path prefix. */
export const RiskRule = z.object({
  prefix: z.string().min(1),
  level: RiskLevel,
  /** Restrict the rule to these diff kinds (all kinds when omitted). */
  kinds: z.array(DiffKind).optional(),
});
export type RiskRule = z.infer<typeof RiskRule>;

/** An unordered collection, optionally keyed by a field of its elements. */
export const SetRule = z.object({
  path: z.string().min(1),
  identityKey: z.string().min(1).optional(),
});
export type SetRule = z.infer<typeof SetRule>;

/** A CLI flag assembled from several property values (e.g. `--sku Standard_LRS`). */
export const CompositeFlag = z.object({
  flag: z.string().startsWith("--"),
  paths: z.array(z.string().min(1)).min(2),
  separator: z.string().default(""),
});
export type CompositeFlag = z.infer<typeof CompositeFlag>;

export const RemediationTable = z.object({
  create: z.string().min(1),
  update: z.string().min(1),
  nameFlag: z.string().startsWith("--").default("--name"),
  /** Flags that locate the resource and go on every command (e.g. `--vnet-name`). */
  scopeFlags: z.record(z.string(), z.string().startsWith("--")).default({}),
  /** Property path (or prefix, for mappings such as tags) → flag. */
  flags: z.record(z.string(), z.string().startsWith("--")).default({}),
  composites: z.array(CompositeFlag).default([]),
  /** Paths or flags that cannot be changed by the update command. */
  immutable: z.array(z.string()).default([]),
});
export type RemediationTable = z.infer<typeof RemediationTable>;

export const EntityTypePolicy = z.object({
  /** Declared type strings accepted besides the entity kind tag itself. */
  declaredTypes: z.array(z.string().min(1)).default([]),
  /** Cloud-native type string reported by the live scan. */
  nativeType: z.string().min(1),
  /** Live path whose presence selects this kind when several share a native type. */
  liveMarker: z.string().min(1).optional(),
  /** Declared path → live path. */
  properties: z.record(z.string(), z.string()).default({}),
  /** Alternative live path → canonical live path (applied to both sources). */
  aliases: z.record(z.string(), z.string()).default({}),
  ignore: z.array(z.string()).default([]),
  /** Single-block paths (either vocabulary); one-element arrays are unwrapped. */
  blocks: z.array(z.string()).default([]),
  sets: z.array(SetRule).default([]),
  /** Collection path → field to lift out of object elements. */
  unwrap: z.record(z.string(), z.string()).default({}),
  caseInsensitive: z.array(z.string()).default([]),
  lowercaseKeys: z.array(z.string()).default([]),
  /** Value the provider assumes when the property is not set. */
  defaults: z.record(z.string(), z.unknown()).default({}),
  risk: z.array(RiskRule).default([]),
  missingRisk: z.object({
    declared_only: RiskLevel.optional(),
    live_only: RiskLevel.optional(),
  }).default({}),
  remediation: RemediationTable.optional(),
});
export type EntityTypePolicy = z.infer<typeof EntityTypePolicy>;

/** Rules shared by every entity type. */
export const CommonPolicy = z.object({
  ignore: z.array(z.string()).default([]),
  caseInsensitive: z.array(z.string()).default([]),
  lowercaseKeys: z.array(z.string()).default([]),
  risk: z.array(RiskRule).default([]),
});
export type CommonPolicy = z.infer<typeof CommonPolicy>;

export const RiskDefaults = z.object({
  diffDefaults: z.object({
    added: RiskLevel.default("low"),
    changed: RiskLevel.default("medium"),
    removed: RiskLevel.default("medium"),
    unresolved: RiskLevel.default("low"),
  }).default({}),
  missingDefaults: z.object({
    declared_only: RiskLevel.default("medium"),
    live_only: RiskLevel.default("low"),
  }).default({}),
});
export type RiskDefaults = z.infer<typeof RiskDefaults>;

const ENTITY_KIND_PATTERN = /^[a-z][a-z0-9_]*$/;

/** Top-level drift policy. */
export const DriftPolicy = z.object({
  schemaVersion: z.literal(1),
  /** Version of the lookup tables, echoed into every report. */
  version: z.string().min(1),
  common: CommonPolicy.default({}),
  risk: RiskDefaults.default({}),
  entityTypes: z
    .record(z.string().regex(ENTITY_KIND_PATTERN, "Entity kind must be snake_case"), EntityTypePolicy)
    .refine(types => Object.keys(types).length > 0, "At least one entity type is required"),
});
export type DriftPolicy = z.infer<typeof DriftPolicy>;
