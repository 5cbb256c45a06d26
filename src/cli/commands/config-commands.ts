/**
 * Configuration commands.
 */

import type { Command } from "commander";
import { getConfigValue, validateConfig } from "../../config/index.js";
import type { GlobalOptions } from "../program.js";

/**
 * Register configuration inspection commands.
 */
export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Inspect driftlens.yaml");

  config
    .command("get <key>")
    .description("Get effective config value (dot-notation)")
    .action(async (key: string) => {
      const configPath = program.opts<GlobalOptions>().config;
      try {
        const value = await getConfigValue(configPath, key);
        if (value === undefined) {
          console.log(`Key '${key}' not found`);
          process.exitCode = 1;
        } else {
          console.log(typeof value === "object" ? JSON.stringify(value, null, 2) : String(value));
        }
      } catch (err) {
        console.error(`❌ Failed to read config: ${(err as Error).message}`);
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate config (schema + referenced files)")
    .action(async () => {
      const configPath = program.opts<GlobalOptions>().config;
      let result: Awaited<ReturnType<typeof validateConfig>>;
      try {
        result = await validateConfig(configPath);
      } catch (err) {
        console.error(`❌ Failed to read config: ${(err as Error).message}`);
        process.exitCode = 1;
        return;
      }

      if (result.schemaErrors.length > 0) {
        console.log("❌ Schema validation failed:");
        for (const err of result.schemaErrors) {
          console.log(`  ✗ ${err.path}: ${err.message}`);
        }
        process.exitCode = 1;
        return;
      }

      for (const issue of result.lintIssues) {
        const icon = issue.severity === "error" ? "✗" : "⚠";
        console.log(`  ${icon} [${issue.rule}] ${issue.message}`);
      }

      if (result.valid) {
        console.log("✅ Config valid");
      } else {
        process.exitCode = 1;
      }
    });
}
