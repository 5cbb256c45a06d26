/**
 * Inventory adapter tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, writeFileSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { FixtureAdapter } from "../adapters.js";

describe("FixtureAdapter", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "driftlens-test-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("loads a declared inventory from JSON", async () => {
    const fixturePath = join(tempDir, "declared.json");
    writeFileSync(
      fixturePath,
      JSON.stringify({
        source: "infra/main.tf",
        variables: { location: "eastus" },
        resources: [
          { entityType: "azurerm_storage_account", name: "data01", rawProperties: { sku: "Standard_LRS" }, sourceLocation: "main.tf:3" },
        ],
      }),
    );

    const inventory = await new FixtureAdapter(fixturePath).getDeclared();

    expect(inventory.source).toBe("infra/main.tf");
    expect(inventory.variables).toEqual({ location: "eastus" });
    expect(inventory.resources).toEqual([
      { entityType: "azurerm_storage_account", name: "data01", rawProperties: { sku: "Standard_LRS" }, sourceLocation: "main.tf:3" },
    ]);
  });

  it("loads a live inventory from YAML and fills defaults", async () => {
    const fixturePath = join(tempDir, "live.yaml");
    writeFileSync(
      fixturePath,
      [
        "resourceGroup: rg-test",
        "resources:",
        "  - entityType: Microsoft.Network/virtualNetworks",
        "    name: core",
        "    region: eastus",
      ].join("\n"),
    );

    const inventory = await new FixtureAdapter(fixturePath).getLive();

    expect(inventory.resourceGroup).toBe("rg-test");
    expect(inventory.resources).toEqual([
      { entityType: "Microsoft.Network/virtualNetworks", name: "core", region: "eastus", rawProperties: {} },
    ]);
  });

  it("accepts a bare resource array", async () => {
    const fixturePath = join(tempDir, "live.json");
    writeFileSync(fixturePath, JSON.stringify([{ entityType: "Microsoft.KeyVault/vaults", name: "kv" }]));

    const inventory = await new FixtureAdapter(fixturePath).getLive();

    expect(inventory.resources.map(r => r.name)).toEqual(["kv"]);
    expect(inventory.resourceGroup).toBeUndefined();
  });

  it("rejects a missing file", async () => {
    const adapter = new FixtureAdapter(join(tempDir, "nonexistent.json"));
    await expect(adapter.getDeclared()).rejects.toThrow(/ENOENT/);
  });

  it("rejects malformed JSON", async () => {
    const fixturePath = join(tempDir, "invalid.json");
    writeFileSync(fixturePath, "not valid json");

    await expect(new FixtureAdapter(fixturePath).getLive()).rejects.toThrow(
      `Failed to parse live inventory ${fixturePath}`,
    );
  });

  it("reports schema violations with their paths", async () => {
    const fixturePath = join(tempDir, "declared.json");
    writeFileSync(fixturePath, JSON.stringify({ resources: [{ entityType: "storage_account" }] }));

    await expect(new FixtureAdapter(fixturePath).getDeclared()).rejects.toThrow(
      `Invalid declared inventory ${fixturePath}:\n  resources.0.name: Required`,
    );
  });
});
