/**
 * Drift Report Model: the one artifact that leaves the comparison core.
 *
 * Pure aggregation over the match result and per-pair diffs. Every matched
 * pair is recorded (in-sync pairs included) so totals reconcile:
 *   matched + declaredOnly = declared, matched + liveOnly = live.
 */

import type { MissingSide, RiskLevel } from "../schemas/policy.js";
import type { CanonicalEntity, EntityIdentity, PlainValue } from "./canonical.js";
import { compareKeys, propertiesToPlain, toPlain } from "./canonical.js";
import type { Diagnostic } from "./diagnostics.js";
import type { PropertyDiff } from "./differ.js";
import type { MatchResult } from "./matcher.js";
import type { RiskClassifier } from "./risk.js";
import { maxRisk } from "./risk.js";

export interface ClassifiedDiff extends PropertyDiff {
  readonly risk: RiskLevel;
}

/**
 * - `in_sync`: no diffs
 * - `drifted`: at least one added, removed or changed path
 * - `unresolved`: every diff is unresolved, so drift can be neither shown nor ruled out
 */
export type EntityStatus = "in_sync" | "drifted" | "unresolved";

export interface EntityReport {
  readonly key: string;
  readonly kind: string;
  readonly identity: EntityIdentity;
  readonly status: EntityStatus;
  readonly declared: CanonicalEntity;
  readonly live: CanonicalEntity;
  readonly diffs: readonly ClassifiedDiff[];
  /** Highest diff risk; absent when in sync. */
  readonly risk?: RiskLevel;
}

export interface MissingEntity {
  readonly key: string;
  readonly kind: string;
  readonly identity: EntityIdentity;
  readonly side: MissingSide;
  readonly entity: CanonicalEntity;
  readonly risk: RiskLevel;
}

export type RiskCounts = Record<RiskLevel, number>;

export interface ReportTotals {
  declared: number;
  live: number;
  matched: number;
  inSync: number;
  drifted: number;
  unresolved: number;
  declaredOnly: number;
  liveOnly: number;
}

export interface DriftReport {
  readonly policyVersion: string;
  readonly scope?: string;
  readonly entities: readonly EntityReport[];
  readonly declaredOnly: readonly MissingEntity[];
  readonly liveOnly: readonly MissingEntity[];
  readonly totals: Readonly<ReportTotals>;
  readonly riskSummary: {
    readonly diffs: Readonly<RiskCounts>;
    readonly entities: Readonly<RiskCounts>;
  };
  readonly highestRisk?: RiskLevel;
  /** True when any entity drifted or exists on one side only. */
  readonly hasDrift: boolean;
  readonly diagnostics: readonly Diagnostic[];
}

export interface ReportInput {
  match: MatchResult;
  /** Diffs per matched pair, keyed by identity key. Pairs without an entry are in sync. */
  diffs: ReadonlyMap<string, readonly PropertyDiff[]>;
  classifier: RiskClassifier;
  policyVersion: string;
  scope?: string;
  diagnostics?: readonly Diagnostic[];
}

export function buildReport(input: ReportInput): DriftReport {
  const { match, classifier } = input;
  const diffRisk = emptyCounts();
  const entityRisk = emptyCounts();

  const entities = [...match.matched]
    .sort((a, b) => compareKeys(a.key, b.key))
    .map((pair): EntityReport => {
      const diffs = (input.diffs.get(pair.key) ?? []).map(
        (diff): ClassifiedDiff => Object.freeze({ ...diff, risk: classifier.classify(pair.declared.kind, diff) }),
      );
      for (const diff of diffs) diffRisk[diff.risk]++;

      const risk = maxRisk(diffs.map(d => d.risk));
      if (risk) entityRisk[risk]++;

      return Object.freeze({
        key: pair.key,
        kind: pair.declared.kind,
        identity: pair.declared.identity,
        status: statusOf(diffs),
        declared: pair.declared,
        live: pair.live,
        diffs: Object.freeze(diffs),
        ...(risk ? { risk } : {}),
      });
    });

  const missing = (list: readonly CanonicalEntity[], side: MissingSide): MissingEntity[] =>
    [...list]
      .sort((a, b) => compareKeys(a.identity.key, b.identity.key))
      .map(entity => {
        const risk = classifier.classifyMissing(entity, side);
        entityRisk[risk]++;
        return Object.freeze({ key: entity.identity.key, kind: entity.kind, identity: entity.identity, side, entity, risk });
      });

  const declaredOnly = missing(match.declaredOnly, "declared_only");
  const liveOnly = missing(match.liveOnly, "live_only");

  const totals: ReportTotals = {
    declared: match.matched.length + declaredOnly.length,
    live: match.matched.length + liveOnly.length,
    matched: match.matched.length,
    inSync: entities.filter(e => e.status === "in_sync").length,
    drifted: entities.filter(e => e.status === "drifted").length,
    unresolved: entities.filter(e => e.status === "unresolved").length,
    declaredOnly: declaredOnly.length,
    liveOnly: liveOnly.length,
  };

  const highestRisk = maxRisk([
    ...entities.flatMap(e => (e.risk ? [e.risk] : [])),
    ...declaredOnly.map(m => m.risk),
    ...liveOnly.map(m => m.risk),
  ]);

  return Object.freeze({
    policyVersion: input.policyVersion,
    ...(input.scope !== undefined ? { scope: input.scope } : {}),
    entities: Object.freeze(entities),
    declaredOnly: Object.freeze(declaredOnly),
    liveOnly: Object.freeze(liveOnly),
    totals: Object.freeze(totals),
    riskSummary: Object.freeze({ diffs: Object.freeze(diffRisk), entities: Object.freeze(entityRisk) }),
    ...(highestRisk ? { highestRisk } : {}),
    hasDrift: totals.drifted + totals.declaredOnly + totals.liveOnly > 0,
    diagnostics: Object.freeze([...(input.diagnostics ?? [])]),
  });
}

function statusOf(diffs: readonly PropertyDiff[]): EntityStatus {
  if (diffs.length === 0) return "in_sync";
  return diffs.every(d => d.kind === "unresolved") ? "unresolved" : "drifted";
}

function emptyCounts(): RiskCounts {
  return { low: 0, medium: 0, high: 0 };
}

// --- Serialization ---

export interface SerializedDiff {
  path: string;
  kind: PropertyDiff["kind"];
  risk: RiskLevel;
  declared?: PlainValue;
  live?: PlainValue;
  defaulted?: PropertyDiff["defaulted"];
}

export interface SerializedEntity {
  key: string;
  kind: string;
  type: string;
  name: string;
  status: EntityStatus;
  risk?: RiskLevel;
  sourceLocation?: string;
  region?: string;
  diffs: SerializedDiff[];
}

export interface SerializedMissing {
  key: string;
  kind: string;
  type: string;
  name: string;
  risk: RiskLevel;
  origin?: string;
  properties: { [key: string]: PlainValue };
}

export interface SerializedReport {
  policyVersion: string;
  scope?: string;
  hasDrift: boolean;
  highestRisk?: RiskLevel;
  totals: ReportTotals;
  riskSummary: { diffs: RiskCounts; entities: RiskCounts };
  entities: SerializedEntity[];
  declaredOnly: SerializedMissing[];
  liveOnly: SerializedMissing[];
  diagnostics: Diagnostic[];
}

/** Plain JSON form; key order is fixed so equal reports serialize identically. */
export function serializeReport(report: DriftReport): SerializedReport {
  return {
    policyVersion: report.policyVersion,
    ...(report.scope !== undefined ? { scope: report.scope } : {}),
    hasDrift: report.hasDrift,
    ...(report.highestRisk ? { highestRisk: report.highestRisk } : {}),
    totals: { ...report.totals },
    riskSummary: { diffs: { ...report.riskSummary.diffs }, entities: { ...report.riskSummary.entities } },
    entities: report.entities.map(entity => ({
      key: entity.key,
      kind: entity.kind,
      type: entity.identity.type,
      name: entity.identity.name,
      status: entity.status,
      ...(entity.risk ? { risk: entity.risk } : {}),
      ...(entity.declared.origin !== undefined ? { sourceLocation: entity.declared.origin } : {}),
      ...(entity.live.origin !== undefined ? { region: entity.live.origin } : {}),
      diffs: entity.diffs.map(serializeDiff),
    })),
    declaredOnly: report.declaredOnly.map(serializeMissing),
    liveOnly: report.liveOnly.map(serializeMissing),
    diagnostics: report.diagnostics.map(d => ({ ...d })),
  };
}

function serializeDiff(diff: ClassifiedDiff): SerializedDiff {
  return {
    path: diff.path,
    kind: diff.kind,
    risk: diff.risk,
    ...(diff.declaredValue !== undefined ? { declared: toPlain(diff.declaredValue) } : {}),
    ...(diff.liveValue !== undefined ? { live: toPlain(diff.liveValue) } : {}),
    ...(diff.defaulted ? { defaulted: diff.defaulted } : {}),
  };
}

function serializeMissing(missing: MissingEntity): SerializedMissing {
  return {
    key: missing.key,
    kind: missing.kind,
    type: missing.identity.type,
    name: missing.identity.name,
    risk: missing.risk,
    ...(missing.entity.origin !== undefined ? { origin: missing.entity.origin } : {}),
    properties: propertiesToPlain(missing.entity.properties),
  };
}
