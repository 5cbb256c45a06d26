/**
 * Drift detection module: compare declared infrastructure with a live scan
 */

export { DriftEngine } from "./engine.js";
export type { CompareInput, EngineOptions } from "./engine.js";
export { EntityNormalizer, DEFAULT_MAX_DEPTH, containsReference, coerceString } from "./normalizer.js";
export type { SourceResource, NormalizerOptions, NormalizationResult } from "./normalizer.js";
export { matchEntities, mergeMatchResults } from "./matcher.js";
export type { MatchedPair, MatchResult } from "./matcher.js";
export { Differ, equivalent, containsUnresolved } from "./differ.js";
export type { PropertyDiff } from "./differ.js";
export { RiskClassifier, RISK_ORDER, compareRisk, maxRisk, pathHasPrefix } from "./risk.js";
export { buildReport, serializeReport } from "./report.js";
export type {
  DriftReport,
  EntityReport,
  EntityStatus,
  MissingEntity,
  ClassifiedDiff,
  ReportInput,
  ReportTotals,
  RiskCounts,
  SerializedReport,
  SerializedEntity,
  SerializedMissing,
  SerializedDiff,
} from "./report.js";
export { FixtureAdapter } from "./adapters.js";
export type { InventoryAdapter } from "./adapters.js";
export { resolveVariables } from "./variables.js";
export { formatDriftReport } from "./formatter.js";
export * from "./canonical.js";
export * from "./errors.js";
export { diagnosticFromError } from "./diagnostics.js";
export type { Diagnostic } from "./diagnostics.js";
