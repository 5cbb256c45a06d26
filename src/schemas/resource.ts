import { z } from "zod";

/**
 * Resource inventory schemas: the shapes the source-tree and live-scan
 * collaborators hand to the drift engine.
 */

const RawProperties = z.record(z.string(), z.unknown());

/** One resource as declared in the IaC source tree. */
export const DeclaredResource = z.object({
  /** Entity kind tag (`storage_account`) or declared type (`azurerm_storage_account`). */
  entityType: z.string().min(1),
  name: z.string().min(1),
  rawProperties: RawProperties.default({}),
  /** Opaque pointer back into the source tree (e.g. `main.tf:12`). */
  sourceLocation: z.string().optional(),
});
export type DeclaredResource = z.input<typeof DeclaredResource>;

/** One resource as reported by the live scan. */
export const LiveResource = z.object({
  /** Cloud-native type string (`Microsoft.Storage/storageAccounts`). */
  entityType: z.string().min(1),
  name: z.string().min(1),
  rawProperties: RawProperties.default({}),
  region: z.string().optional(),
});
export type LiveResource = z.input<typeof LiveResource>;

/** Declared inventory file: resources plus variable values for substitution. */
export const DeclaredInventory = z.object({
  source: z.string().optional(),
  variables: z.record(z.string(), z.unknown()).default({}),
  resources: z.array(DeclaredResource),
});
export type DeclaredInventory = z.infer<typeof DeclaredInventory>;

/** Live inventory file, as captured from a resource-group scan. */
export const LiveInventory = z.object({
  resourceGroup: z.string().optional(),
  subscriptionId: z.string().optional(),
  resources: z.array(LiveResource),
});
export type LiveInventory = z.infer<typeof LiveInventory>;
