/**
 * Drift Engine: runs one comparison end to end.
 *
 * normalize (both sides) → match per entity type → diff matched pairs →
 * classify → report. Synchronous and side-effect free; the policy is loaded
 * by the caller and never mutated.
 */

import { PolicyCatalog } from "../policy/catalog.js";
import type { DriftPolicy } from "../schemas/policy.js";
import type { CanonicalEntity, EntitySource } from "./canonical.js";
import { compareKeys } from "./canonical.js";
import type { Diagnostic } from "./diagnostics.js";
import { diagnosticFromError } from "./diagnostics.js";
import type { PropertyDiff } from "./differ.js";
import { Differ } from "./differ.js";
import { DuplicateEntityError, UnknownEntityTypeError } from "./errors.js";
import type { MatchResult } from "./matcher.js";
import { matchEntities, mergeMatchResults } from "./matcher.js";
import type { NormalizerOptions, SourceResource } from "./normalizer.js";
import { EntityNormalizer, containsReference } from "./normalizer.js";
import type { DriftReport } from "./report.js";
import { buildReport } from "./report.js";
import { RiskClassifier } from "./risk.js";
import { resolveName, resolveVariables } from "./variables.js";

export interface CompareInput {
  declared: readonly SourceResource[];
  live: readonly SourceResource[];
  /** Values substituted into declared names and properties before normalization. */
  variables?: Readonly<Record<string, unknown>>;
  scope?: string;
}

export type EngineOptions = NormalizerOptions;

export class DriftEngine {
  readonly catalog: PolicyCatalog;
  readonly classifier: RiskClassifier;
  private readonly normalizer: EntityNormalizer;
  private readonly differ: Differ;

  constructor(policy: DriftPolicy | PolicyCatalog, options: EngineOptions = {}) {
    this.catalog = policy instanceof PolicyCatalog ? policy : new PolicyCatalog(policy);
    this.normalizer = new EntityNormalizer(this.catalog, options);
    this.differ = new Differ(this.catalog, this.normalizer);
    this.classifier = new RiskClassifier(this.catalog);
  }

  compare(input: CompareInput): DriftReport {
    const diagnostics: Diagnostic[] = [];
    const variables = input.variables ?? {};

    const declaredResources =
      Object.keys(variables).length > 0
        ? input.declared.map(resource => ({
            ...resource,
            name: resolveName(resource.name, variables),
            ...(resource.rawProperties ? { rawProperties: resolveVariables(resource.rawProperties, variables) } : {}),
          }))
        : input.declared;

    const declared = this.normalizeAll(declaredResources, "declared", diagnostics);
    const live = this.normalizeAll(input.live, "live", diagnostics);
    const match = this.matchByType(declared, live, diagnostics);

    const diffs = new Map<string, PropertyDiff[]>();
    for (const pair of match.matched) {
      const pairDiffs = this.differ.diff(pair.declared, pair.live);
      if (pairDiffs.length > 0) diffs.set(pair.key, pairDiffs);
    }

    return buildReport({
      match,
      diffs,
      classifier: this.classifier,
      policyVersion: this.catalog.version,
      ...(input.scope !== undefined ? { scope: input.scope } : {}),
      diagnostics,
    });
  }

  private normalizeAll(
    resources: readonly SourceResource[],
    source: EntitySource,
    diagnostics: Diagnostic[],
  ): CanonicalEntity[] {
    const entities: CanonicalEntity[] = [];
    for (const resource of resources) {
      try {
        const result = this.normalizer.normalize(resource, source);
        diagnostics.push(...result.diagnostics);
        // The normalizer has already warned about the name; such an entity can never be matched.
        if (containsReference(result.entity.identity.name)) continue;
        entities.push(result.entity);
      } catch (err) {
        if (!(err instanceof UnknownEntityTypeError)) throw err;
        diagnostics.push(diagnosticFromError(err));
      }
    }
    return entities;
  }

  /**
   * Match each native type separately so a duplicate identity only takes
   * its own group out of the report.
   */
  private matchByType(
    declared: readonly CanonicalEntity[],
    live: readonly CanonicalEntity[],
    diagnostics: Diagnostic[],
  ): MatchResult {
    const groups = new Map<string, { declared: CanonicalEntity[]; live: CanonicalEntity[] }>();
    const groupFor = (entity: CanonicalEntity) => {
      const type = entity.identity.type.toLowerCase();
      let group = groups.get(type);
      if (!group) {
        group = { declared: [], live: [] };
        groups.set(type, group);
      }
      return group;
    };
    for (const entity of declared) groupFor(entity).declared.push(entity);
    for (const entity of live) groupFor(entity).live.push(entity);

    const results: MatchResult[] = [];
    for (const type of [...groups.keys()].sort(compareKeys)) {
      const group = groups.get(type);
      if (!group) continue;
      try {
        results.push(matchEntities(group.declared, group.live));
      } catch (err) {
        if (!(err instanceof DuplicateEntityError)) throw err;
        diagnostics.push(diagnosticFromError(err));
      }
    }
    return mergeMatchResults(results);
  }
}
