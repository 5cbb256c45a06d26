/**
 * Drift CLI commands.
 *
 * Registers the drift check and policy inspection commands.
 */

import type { Command } from "commander";
import { driftCheck, showPolicy, validatePolicy } from "../../commands/drift.js";
import type { GlobalOptions } from "../program.js";

interface CheckOptions {
  declared: string;
  live: string;
  json: boolean;
  out?: string;
  commands: boolean;
}

/**
 * Register drift commands with the CLI program.
 */
export function registerDriftCommands(program: Command): void {
  program
    .command("check")
    .description("Compare declared resources with a live scan")
    .requiredOption("--declared <file>", "Declared inventory (JSON or YAML)")
    .requiredOption("--live <file>", "Live inventory (JSON or YAML)")
    .option("--json", "Print the report as JSON", false)
    .option("--out <file>", "Write the JSON report to a file")
    .option("--commands", "Plan remediation commands", false)
    .action(async (opts: CheckOptions) => {
      await driftCheck({
        declaredPath: opts.declared,
        livePath: opts.live,
        configPath: program.opts<GlobalOptions>().config,
        json: opts.json,
        commands: opts.commands,
        ...(opts.out ? { outPath: opts.out } : {}),
      });
    });

  const policy = program
    .command("policy")
    .description("Drift policy management");

  policy
    .command("validate [path]")
    .description("Validate a policy file (default: bundled Azure policy)")
    .action(async (path?: string) => {
      await validatePolicy(path);
    });

  policy
    .command("show [path]")
    .description("Display the entity types a policy covers")
    .action(async (path?: string) => {
      await showPolicy(path);
    });
}
