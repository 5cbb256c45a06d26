/**
 * Entity Matcher: pairs declared and live entities by identity.
 *
 * Identity is (native type, lowercase name). There is no fuzzy matching:
 * a renamed resource shows up as one missing and one extra entity.
 */

import type { CanonicalEntity, EntitySource } from "./canonical.js";
import { compareKeys } from "./canonical.js";
import { DuplicateEntityError } from "./errors.js";

export interface MatchedPair {
  key: string;
  declared: CanonicalEntity;
  live: CanonicalEntity;
}

export interface MatchResult {
  matched: MatchedPair[];
  declaredOnly: CanonicalEntity[];
  liveOnly: CanonicalEntity[];
}

/**
 * Partition both entity lists. Throws DuplicateEntityError when one side
 * holds two entities with the same identity.
 */
export function matchEntities(declared: readonly CanonicalEntity[], live: readonly CanonicalEntity[]): MatchResult {
  const declaredIndex = indexByIdentity(declared, "declared");
  const liveIndex = indexByIdentity(live, "live");

  const matched: MatchedPair[] = [];
  const declaredOnly: CanonicalEntity[] = [];
  const liveOnly: CanonicalEntity[] = [];

  for (const [key, entity] of declaredIndex) {
    const counterpart = liveIndex.get(key);
    if (counterpart) {
      matched.push({ key, declared: entity, live: counterpart });
    } else {
      declaredOnly.push(entity);
    }
  }

  for (const [key, entity] of liveIndex) {
    if (!declaredIndex.has(key)) {
      liveOnly.push(entity);
    }
  }

  matched.sort((a, b) => compareKeys(a.key, b.key));
  declaredOnly.sort(byIdentity);
  liveOnly.sort(byIdentity);

  return { matched, declaredOnly, liveOnly };
}

/** Concatenate partition results of independent entity groups, keeping key order. */
export function mergeMatchResults(results: readonly MatchResult[]): MatchResult {
  const merged: MatchResult = { matched: [], declaredOnly: [], liveOnly: [] };
  for (const result of results) {
    merged.matched.push(...result.matched);
    merged.declaredOnly.push(...result.declaredOnly);
    merged.liveOnly.push(...result.liveOnly);
  }
  merged.matched.sort((a, b) => compareKeys(a.key, b.key));
  merged.declaredOnly.sort(byIdentity);
  merged.liveOnly.sort(byIdentity);
  return merged;
}

function indexByIdentity(entities: readonly CanonicalEntity[], source: EntitySource): Map<string, CanonicalEntity> {
  const index = new Map<string, CanonicalEntity>();
  for (const entity of entities) {
    const key = entity.identity.key;
    const existing = index.get(key);
    if (existing) {
      throw new DuplicateEntityError(source, key, [describeOrigin(existing), describeOrigin(entity)]);
    }
    index.set(key, entity);
  }
  return index;
}

function describeOrigin(entity: CanonicalEntity): string {
  return entity.origin ?? `${entity.kind} '${entity.identity.name}'`;
}

function byIdentity(a: CanonicalEntity, b: CanonicalEntity): number {
  return compareKeys(a.identity.key, b.identity.key);
}
