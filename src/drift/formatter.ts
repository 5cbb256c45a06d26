/**
 * Drift Report Formatter: Actionable CLI output
 */

import type { CanonicalValue } from "./canonical.js";
import { serializeValue } from "./canonical.js";
import type { ClassifiedDiff, DriftReport, EntityReport, MissingEntity } from "./report.js";

/**
 * Format drift report as actionable CLI output
 */
export function formatDriftReport(report: DriftReport): string {
  const lines: string[] = [];
  const scope = report.scope ? ` in ${report.scope}` : "";

  if (!report.hasDrift && report.totals.unresolved === 0) {
    lines.push(`✅ No drift detected${scope} — ${report.totals.matched} resources match their declarations`);
    appendDiagnostics(lines, report);
    return lines.join("\n");
  }

  if (report.hasDrift) {
    const issues = report.totals.drifted + report.totals.declaredOnly + report.totals.liveOnly;
    lines.push(`⚠️  Drift detected${scope}: ${issues} resources affected (highest risk: ${report.highestRisk ?? "low"})\n`);
  } else {
    lines.push(`✅ No confirmed drift${scope}, but some values could not be resolved\n`);
  }

  // Declared resources with no live counterpart
  if (report.declaredOnly.length > 0) {
    lines.push(`Missing in live (${report.declaredOnly.length}):`);
    lines.push("  Resources declared but not found in the scan:\n");
    for (const item of report.declaredOnly) {
      lines.push(`  ✗ ${describeMissing(item)}`);
      lines.push(`    Action: Create the resource or remove its declaration\n`);
    }
  }

  // Live resources nobody declared
  if (report.liveOnly.length > 0) {
    lines.push(`Not declared (${report.liveOnly.length}):`);
    lines.push("  Resources found in the scan but absent from the declarations:\n");
    for (const item of report.liveOnly) {
      lines.push(`  ✗ ${describeMissing(item)}`);
      lines.push(`    Action: Import into the declarations or delete manually\n`);
    }
  }

  const drifted = report.entities.filter(e => e.status !== "in_sync");
  if (drifted.length > 0) {
    lines.push(`Drifted (${drifted.length}):`);
    lines.push("  Resources whose live properties differ from the declarations:\n");
    for (const entity of drifted) {
      appendEntity(lines, entity);
    }
  }

  appendDiagnostics(lines, report);

  // Summary
  const { totals } = report;
  lines.push("Summary:");
  lines.push(`  Declared: ${totals.declared}  Live: ${totals.live}  Matched: ${totals.matched}`);
  lines.push(`  In sync: ${totals.inSync}`);
  lines.push(`  Drifted: ${totals.drifted}`);
  lines.push(`  Unresolved: ${totals.unresolved}`);
  lines.push(`  Missing in live: ${totals.declaredOnly}`);
  lines.push(`  Not declared: ${totals.liveOnly}`);
  lines.push(`  Policy: ${report.policyVersion}`);

  return lines.join("\n");
}

function appendEntity(lines: string[], entity: EntityReport): void {
  const marker = entity.status === "unresolved" ? "?" : "✗";
  lines.push(`  ${marker} ${entity.kind} ${entity.identity.name} [${entity.risk ?? "low"}]`);
  for (const diff of entity.diffs) {
    lines.push(`    ${diff.path} (${diff.kind}, ${diff.risk})`);
    for (const line of describeDiff(diff)) {
      lines.push(`      ${line}`);
    }
  }
  lines.push("");
}

function describeDiff(diff: ClassifiedDiff): string[] {
  const declared = renderValue(diff.declaredValue, diff.defaulted === "declared");
  const live = renderValue(diff.liveValue, diff.defaulted === "live");
  switch (diff.kind) {
    case "added":
      return [`Live:     ${live}`];
    case "removed":
      return [`Declared: ${declared}`];
    case "changed":
    case "unresolved":
      return [`Declared: ${declared}`, `Live:     ${live}`];
  }
}

function renderValue(value: CanonicalValue | undefined, defaulted: boolean): string {
  if (value === undefined) return "(absent)";
  const text = value.kind === "unresolved" ? `unresolved ${value.expression}` : serializeValue(value);
  return defaulted ? `${text} (default)` : text;
}

function describeMissing(item: MissingEntity): string {
  const origin = item.entity.origin ? ` at ${item.entity.origin}` : "";
  return `${item.kind} ${item.identity.name}${origin} [${item.risk}]`;
}

function appendDiagnostics(lines: string[], report: DriftReport): void {
  if (report.diagnostics.length === 0) return;
  lines.push("");
  lines.push(`Diagnostics (${report.diagnostics.length}):`);
  for (const diagnostic of report.diagnostics) {
    const icon = diagnostic.severity === "error" ? "❌" : "⚠ ";
    lines.push(`  ${icon} ${diagnostic.message}`);
  }
  lines.push("");
}
