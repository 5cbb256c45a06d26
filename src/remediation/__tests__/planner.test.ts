import { describe, it, expect, beforeAll } from "vitest";
import { planRemediation, shellQuote } from "../planner.js";
import { DriftEngine } from "../../drift/engine.js";
import { loadPolicy } from "../../policy/loader.js";

const STORAGE = "Microsoft.Storage/storageAccounts";

describe("planRemediation", () => {
  let engine: DriftEngine;

  beforeAll(async () => {
    engine = new DriftEngine(await loadPolicy());
  });

  it("plans a create with composite flags for a resource missing in live", () => {
    const report = engine.compare({
      declared: [
        {
          entityType: "azurerm_storage_account",
          name: "data01",
          rawProperties: {
            location: "EastUS",
            account_tier: "Standard",
            account_replication_type: "LRS",
            tags: { Owner: "Data Team" },
          },
        },
      ],
      live: [],
    });

    const [command, ...rest] = planRemediation(report, engine.catalog, { resourceGroup: "rg-test" });

    expect(rest).toEqual([]);
    expect(command?.action).toBe("create");
    expect(command?.argv).toEqual([
      "az", "storage", "account", "create",
      "--name", "data01",
      "--resource-group", "rg-test",
      "--location", "eastus",
      "--tags", "owner=Data Team",
      "--sku", "standard_lrs",
    ]);
    expect(command?.command).toBe(
      "az storage account create --name data01 --resource-group rg-test --location eastus --tags 'owner=Data Team' --sku standard_lrs",
    );
    expect(command?.description).toBe("Create storage_account 'data01'");
    expect(command?.risk).toBe("medium");
  });

  it("adds scope flags that locate child resources", () => {
    const report = engine.compare({
      declared: [
        {
          entityType: "subnet",
          name: "internal",
          rawProperties: { virtual_network_name: "core", address_prefixes: ["10.0.2.0/24"] },
        },
      ],
      live: [],
    });

    const [command] = planRemediation(report, engine.catalog, { resourceGroup: "rg-test" });

    expect(command?.command).toBe(
      "az network vnet subnet create --name internal --resource-group rg-test --vnet-name core --address-prefixes 10.0.2.0/24",
    );
  });

  it("plans an update and leaves immutable paths for manual follow-up", () => {
    const report = engine.compare({
      declared: [
        {
          entityType: "storage_account",
          name: "data01",
          rawProperties: { access_tier: "Cool", location: "eastus", tags: { env: "prod" } },
        },
      ],
      live: [
        {
          entityType: STORAGE,
          name: "data01",
          rawProperties: { access_tier: "Hot", location: "westus", tags: { env: "dev" } },
        },
      ],
    });

    const commands = planRemediation(report, engine.catalog, { resourceGroup: "rg-test", subscriptionId: "sub-test" });

    expect(commands).toHaveLength(1);
    const [command] = commands;
    expect(command?.action).toBe("update");
    expect(command?.command).toBe(
      "az storage account update --name data01 --resource-group rg-test --subscription sub-test --access-tier cool --tags env=prod",
    );
    expect(command?.description).toBe("Update storage_account 'data01': access_tier, tags.env");
    expect(command?.manual).toEqual(["location"]);
    expect(command?.risk).toBe(report.entities[0]?.risk);
  });

  it("never plans deletes or commands for unresolved entities", () => {
    const report = engine.compare({
      declared: [
        { entityType: "storage_account", name: "data01", rawProperties: { location: "${var.location}" } },
      ],
      live: [
        { entityType: STORAGE, name: "data01", rawProperties: { location: "eastus" } },
        { entityType: STORAGE, name: "orphan", rawProperties: { location: "eastus" } },
      ],
    });

    expect(report.liveOnly).toHaveLength(1);
    expect(planRemediation(report, engine.catalog, { resourceGroup: "rg-test" })).toEqual([]);
  });
});

describe("shellQuote", () => {
  it("leaves safe arguments bare", () => {
    expect(shellQuote("10.0.0.0/16")).toBe("10.0.0.0/16");
    expect(shellQuote("--resource-group")).toBe("--resource-group");
  });

  it("single-quotes everything else", () => {
    expect(shellQuote("Data Team")).toBe("'Data Team'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
    expect(shellQuote("")).toBe("''");
  });
});
