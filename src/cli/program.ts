/**
 * driftlens CLI program.
 */

import { Command } from "commander";
import { DEFAULT_CONFIG_FILE } from "../config/index.js";
import { registerConfigCommands } from "./commands/config-commands.js";
import { registerDriftCommands } from "./commands/drift.js";

export interface GlobalOptions {
  config: string;
}

export const VERSION = "0.1.0";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("driftlens")
    .description("Detect drift between declared infrastructure and live cloud resources")
    .version(VERSION)
    .option("-c, --config <path>", "Config file", process.env["DRIFTLENS_CONFIG"] ?? DEFAULT_CONFIG_FILE);

  registerDriftCommands(program);
  registerConfigCommands(program);

  return program;
}
