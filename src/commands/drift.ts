/**
 * Drift commands: check, policy validate/show.
 */

import { randomUUID } from "node:crypto";
import writeFileAtomic from "write-file-atomic";
import { loadDriftConfig } from "../config/index.js";
import { DriftEngine, FixtureAdapter, formatDriftReport, serializeReport } from "../drift/index.js";
import type { DriftReport } from "../drift/index.js";
import { ConfigError, PolicyError } from "../drift/errors.js";
import { compareRisk, maxRisk } from "../drift/risk.js";
import { EventLogger } from "../events/index.js";
import { DEFAULT_POLICY_PATH, lintPolicy, loadPolicy } from "../policy/index.js";
import { planRemediation } from "../remediation/index.js";
import type { RemediationCommand } from "../remediation/index.js";
import type { DriftConfig } from "../schemas/config.js";

export interface DriftCheckOptions {
  declaredPath: string;
  livePath: string;
  configPath: string;
  json?: boolean;
  outPath?: string;
  commands?: boolean;
}

/**
 * True when a drifted or missing entity is at or above `failOn`. Entities
 * whose diffs are all unresolved never fail a check.
 */
export function exceedsThreshold(report: DriftReport, failOn: DriftConfig["failOn"]): boolean {
  if (failOn === "never") return false;
  const gating = maxRisk([
    ...report.entities.flatMap(e => (e.status === "drifted" && e.risk ? [e.risk] : [])),
    ...report.declaredOnly.map(m => m.risk),
    ...report.liveOnly.map(m => m.risk),
  ]);
  return gating !== undefined && compareRisk(gating, failOn) >= 0;
}

export async function driftCheck(opts: DriftCheckOptions): Promise<void> {
  let logger: EventLogger | undefined;
  const runId = randomUUID();

  try {
    const config = await loadDriftConfig(opts.configPath);
    const policy = await loadPolicy(config.policyPath ?? DEFAULT_POLICY_PATH);
    logger = config.eventsDir ? new EventLogger(config.eventsDir) : undefined;

    const declared = await new FixtureAdapter(opts.declaredPath).getDeclared();
    const live = await new FixtureAdapter(opts.livePath).getLive();

    if (!opts.json) {
      console.log(`Checking drift`);
      console.log(`Declared: ${opts.declaredPath} (${declared.resources.length} resources)`);
      console.log(`Live: ${opts.livePath} (${live.resources.length} resources)`);
      console.log();
    }

    await logger?.logRunStarted(runId, {
      declared: declared.resources.length,
      live: live.resources.length,
      policyVersion: policy.version,
    });

    const started = Date.now();
    const engine = new DriftEngine(policy, { maxDepth: config.maxDepth });
    const scope = config.scope ?? live.resourceGroup;
    const report = engine.compare({
      declared: declared.resources,
      live: live.resources,
      variables: { ...declared.variables, ...config.variables },
      ...(scope !== undefined ? { scope } : {}),
    });

    for (const diagnostic of report.diagnostics) {
      await logger?.logDiagnostic(runId, diagnostic);
    }

    let commands: RemediationCommand[] | undefined;
    if (opts.commands) {
      const resourceGroup = config.remediation.resourceGroup ?? live.resourceGroup;
      const subscriptionId = config.remediation.subscriptionId ?? live.subscriptionId;
      if (resourceGroup) {
        commands = planRemediation(report, engine.catalog, {
          resourceGroup,
          ...(subscriptionId ? { subscriptionId } : {}),
        });
      } else {
        console.error("⚠️  No resource group configured; skipping remediation commands");
      }
    }

    const serialized = { ...serializeReport(report), ...(commands ? { commands } : {}) };

    if (opts.json) {
      console.log(JSON.stringify(serialized, null, 2));
    } else {
      console.log(formatDriftReport(report));
      if (commands) {
        console.log(formatCommands(commands));
      }
    }

    if (opts.outPath) {
      await writeFileAtomic(opts.outPath, JSON.stringify(serialized, null, 2) + "\n");
      await logger?.logReportWritten(runId, opts.outPath);
      if (!opts.json) console.log(`\n📄 Report written to ${opts.outPath}`);
    }

    await logger?.logRunCompleted(runId, {
      hasDrift: report.hasDrift,
      ...(report.highestRisk ? { highestRisk: report.highestRisk } : {}),
      totals: { ...report.totals },
      durationMs: Date.now() - started,
    });

    if (exceedsThreshold(report, config.failOn)) {
      process.exitCode = 1;
    }
  } catch (err) {
    console.error(`❌ Drift check failed: ${(err as Error).message}`);
    printIssues(err);
    await logger?.logRunFailed(runId, (err as Error).message);
    process.exitCode = 1;
  }
}

export async function validatePolicy(path: string = DEFAULT_POLICY_PATH): Promise<void> {
  try {
    const policy = await loadPolicy(path);
    const kinds = Object.keys(policy.entityTypes);
    console.log(`✅ Policy valid: version ${policy.version}, ${kinds.length} entity types`);

    const warnings = lintPolicy(policy).filter(i => i.severity === "warning");
    for (const warning of warnings) {
      console.log(`   ⚠ [${warning.rule}] ${warning.message}`);
    }
  } catch (err) {
    console.error(`❌ Policy validation failed: ${(err as Error).message}`);
    printIssues(err);
    process.exitCode = 1;
  }
}

export async function showPolicy(path: string = DEFAULT_POLICY_PATH): Promise<void> {
  try {
    const policy = await loadPolicy(path);
    console.log(`\n📋 Drift policy ${policy.version}`);
    console.log("─".repeat(50));

    for (const [kind, type] of Object.entries(policy.entityTypes)) {
      const declared = type.declaredTypes.length > 0 ? ` (${type.declaredTypes.join(", ")})` : "";
      console.log(`\n  ${kind}${declared}`);
      console.log(`    native: ${type.nativeType}${type.liveMarker ? ` [marker: ${type.liveMarker}]` : ""}`);
      console.log(`    defaults: ${Object.keys(type.defaults).length}, risk rules: ${type.risk.length}`);
      if (type.remediation) {
        console.log(`    remediation: ${type.remediation.create} / ${type.remediation.update}`);
      }
    }
  } catch (err) {
    console.error(`❌ Failed to load policy: ${(err as Error).message}`);
    printIssues(err);
    process.exitCode = 1;
  }
}

export function formatCommands(commands: readonly RemediationCommand[]): string {
  const lines: string[] = [];
  if (commands.length === 0) {
    lines.push("No remediation commands");
    return lines.join("\n");
  }

  lines.push(`\nRemediation commands (${commands.length}):`);
  for (const command of commands) {
    lines.push(`\n  # ${command.description} [${command.risk}]`);
    lines.push(`  ${command.command}`);
    for (const path of command.manual) {
      lines.push(`  #   manual: ${path}`);
    }
  }
  return lines.join("\n");
}

function printIssues(err: unknown): void {
  if (err instanceof PolicyError || err instanceof ConfigError) {
    for (const issue of err.issues) {
      console.error(`   ${issue.path}: ${issue.message}`);
    }
  }
}
