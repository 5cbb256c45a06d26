/**
 * driftlens configuration schema.
 *
 * Stored as a single YAML file (driftlens.yaml) next to the inventories.
 * Every field has a default, so a missing file is a valid configuration.
 */

import { z } from "zod";
import { RiskLevel } from "./policy.js";

/** Remediation command defaults. */
export const RemediationConfig = z.object({
  /** Resource group passed to every generated command. */
  resourceGroup: z.string().min(1).optional(),
  /** Subscription passed to every generated command. */
  subscriptionId: z.string().min(1).optional(),
});
export type RemediationConfig = z.infer<typeof RemediationConfig>;

/** Top-level driftlens configuration. */
export const DriftConfig = z.object({
  schemaVersion: z.literal(1),
  /** Policy file; the bundled Azure policy when omitted. */
  policyPath: z.string().min(1).optional(),
  /** Directory for the JSONL event log; logging is off when omitted. */
  eventsDir: z.string().min(1).optional(),
  /** Maximum nesting depth of a raw property tree. */
  maxDepth: z.number().int().positive().max(256).default(32),
  /** Lowest entity risk that makes `check` exit non-zero. */
  failOn: z.union([RiskLevel, z.literal("never")]).default("medium"),
  /** Label for the compared environment (e.g. resource group name). */
  scope: z.string().optional(),
  /** Variable values substituted into declared properties. */
  variables: z.record(z.string(), z.unknown()).default({}),
  remediation: RemediationConfig.default({}),
});
export type DriftConfig = z.infer<typeof DriftConfig>;
