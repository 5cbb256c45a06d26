/**
 * Remediation planner: turns a drift report into `az` commands that would
 * bring live resources back to their declarations.
 *
 * Plans only: nothing is executed, and nothing is ever deleted. Live-only
 * resources get no command.
 */

import { PolicyCatalog } from "../policy/catalog.js";
import type { DriftPolicy, RemediationTable, RiskLevel } from "../schemas/policy.js";
import type { CanonicalEntity, CanonicalValue } from "../drift/canonical.js";
import { schemaPath } from "../drift/canonical.js";
import { containsReference } from "../drift/normalizer.js";
import type { DriftReport, EntityReport, MissingEntity } from "../drift/report.js";
import { pathHasPrefix } from "../drift/risk.js";

export type RemediationAction = "create" | "update";

export interface RemediationCommand {
  action: RemediationAction;
  entity: { kind: string; type: string; name: string; key: string };
  /** Program and arguments, unquoted. */
  argv: string[];
  /** `argv` as one shell-quoted line. */
  command: string;
  description: string;
  risk: RiskLevel;
  /** Drifted paths this command cannot fix (immutable or without a flag). */
  manual: string[];
}

export interface RemediationOptions {
  resourceGroup: string;
  subscriptionId?: string;
}

type FlagValues = Map<string, string[]>;

export function planRemediation(
  report: DriftReport,
  policy: DriftPolicy | PolicyCatalog,
  options: RemediationOptions,
): RemediationCommand[] {
  const catalog = policy instanceof PolicyCatalog ? policy : new PolicyCatalog(policy);
  const commands: RemediationCommand[] = [];

  for (const missing of report.declaredOnly) {
    const command = planCreate(catalog, missing, options);
    if (command) commands.push(command);
  }

  for (const entity of report.entities) {
    if (entity.status !== "drifted") continue;
    const command = planUpdate(catalog, entity, options);
    if (command) commands.push(command);
  }

  return commands;
}

function planCreate(
  catalog: PolicyCatalog,
  missing: MissingEntity,
  options: RemediationOptions,
): RemediationCommand | undefined {
  const table = catalog.get(missing.kind)?.policy.remediation;
  if (!table || containsReference(missing.identity.name)) return undefined;

  const values: FlagValues = new Map();
  for (const [path, flag] of Object.entries(table.flags)) {
    const args = argsForPath(missing.entity, path);
    if (args) values.set(flag, args);
  }
  for (const composite of table.composites) {
    const parts = composite.paths.map(path => compositePart(catalog, missing.entity, path));
    if (parts.every((p): p is string => p !== undefined)) {
      values.set(composite.flag, [parts.join(composite.separator)]);
    }
  }

  return assemble({
    action: "create",
    table,
    entity: missing.entity,
    values,
    options,
    description: `Create ${missing.kind} '${missing.identity.name}'`,
    risk: missing.risk,
    manual: [],
  });
}

function planUpdate(
  catalog: PolicyCatalog,
  report: EntityReport,
  options: RemediationOptions,
): RemediationCommand | undefined {
  const table = catalog.get(report.kind)?.policy.remediation;
  if (!table || containsReference(report.identity.name)) return undefined;

  const immutable = new Set(table.immutable);
  const values: FlagValues = new Map();
  const manual: string[] = [];
  const fixed: string[] = [];

  for (const diff of report.diffs) {
    if (diff.kind === "unresolved") continue;
    const path = schemaPath(diff.path);

    const composite = table.composites.find(c => c.paths.some(p => pathHasPrefix(path, p)));
    if (composite) {
      if (immutable.has(composite.flag)) {
        manual.push(diff.path);
        continue;
      }
      const parts = composite.paths.map(p => compositePart(catalog, report.declared, p));
      if (parts.every((p): p is string => p !== undefined)) {
        values.set(composite.flag, [parts.join(composite.separator)]);
        fixed.push(diff.path);
      } else {
        manual.push(diff.path);
      }
      continue;
    }

    const mapped = Object.entries(table.flags).find(([flagPath]) => pathHasPrefix(path, flagPath));
    if (!mapped) {
      manual.push(diff.path);
      continue;
    }
    const [flagPath, flag] = mapped;
    if (immutable.has(flagPath) || immutable.has(flag)) {
      manual.push(diff.path);
      continue;
    }

    const fallback = diff.defaulted === "declared" ? diff.declaredValue : undefined;
    const args = argsForPath(report.declared, flagPath) ?? (fallback ? formatArgs(fallback) : undefined);
    if (args) {
      values.set(flag, args);
      fixed.push(diff.path);
    } else {
      manual.push(diff.path);
    }
  }

  if (values.size === 0) return undefined;

  return assemble({
    action: "update",
    table,
    entity: report.declared,
    values,
    options,
    description: `Update ${report.kind} '${report.identity.name}': ${fixed.join(", ")}`,
    risk: report.risk ?? "low",
    manual,
  });
}

interface AssembleInput {
  action: RemediationAction;
  table: RemediationTable;
  entity: CanonicalEntity;
  values: FlagValues;
  options: RemediationOptions;
  description: string;
  risk: RiskLevel;
  manual: string[];
}

function assemble(input: AssembleInput): RemediationCommand {
  const { table, entity, options } = input;
  const base = input.action === "create" ? table.create : table.update;

  const argv = [...base.split(/\s+/), table.nameFlag, entity.identity.name, "--resource-group", options.resourceGroup];
  for (const [path, flag] of Object.entries(table.scopeFlags)) {
    const args = argsForPath(entity, path);
    if (args) argv.push(flag, ...args);
  }
  if (options.subscriptionId) {
    argv.push("--subscription", options.subscriptionId);
  }
  for (const [flag, args] of input.values) {
    argv.push(flag, ...args);
  }

  return {
    action: input.action,
    entity: {
      kind: entity.kind,
      type: entity.identity.type,
      name: entity.identity.name,
      key: entity.identity.key,
    },
    argv,
    command: argv.map(shellQuote).join(" "),
    description: input.description,
    risk: input.risk,
    manual: input.manual,
  };
}

/**
 * Arguments for a property path: the value at the path itself, or the
 * `key=value` pairs of every property below it (tags).
 */
function argsForPath(entity: CanonicalEntity, path: string): string[] | undefined {
  const exact = entity.properties.get(path);
  if (exact) return formatArgs(exact);

  const prefix = `${path}.`;
  const pairs: string[] = [];
  for (const [key, value] of entity.properties) {
    if (!key.startsWith(prefix)) continue;
    const [arg] = formatArgs(value) ?? [];
    if (arg === undefined || value.kind !== "scalar") return undefined;
    pairs.push(`${key.slice(prefix.length)}=${arg}`);
  }
  return pairs.length > 0 ? pairs : undefined;
}

function compositePart(catalog: PolicyCatalog, entity: CanonicalEntity, path: string): string | undefined {
  const value = entity.properties.get(path);
  if (value) {
    const args = formatArgs(value);
    return args?.length === 1 ? args[0] : undefined;
  }
  const fallback = catalog.get(entity.kind)?.defaults.get(path);
  return typeof fallback === "string" || typeof fallback === "number" ? String(fallback) : undefined;
}

/** Scalars and collections of scalars; anything unresolved or nested yields undefined. */
function formatArgs(value: CanonicalValue): string[] | undefined {
  switch (value.kind) {
    case "scalar":
      return value.value === null ? undefined : [String(value.value)];
    case "list":
    case "set": {
      const args: string[] = [];
      for (const item of value.items) {
        if (item.kind !== "scalar" || item.value === null) return undefined;
        args.push(String(item.value));
      }
      return args.length > 0 ? args : undefined;
    }
    case "object":
    case "unresolved":
      return undefined;
  }
}

const SAFE_ARG = /^[A-Za-z0-9_\-.,:/=@%+]+$/;

export function shellQuote(arg: string): string {
  if (SAFE_ARG.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
