import { describe, it, expect } from "vitest";
import { resolveName, resolveVariables } from "../variables.js";

describe("resolveVariables", () => {
  it("keeps the variable's own type for whole-value references", () => {
    const out = resolveVariables(
      { address_space: "${var.address_space}", retention: "${ var.retention }" },
      { address_space: ["10.0.0.0/16"], retention: 30 },
    );

    expect(out).toEqual({ address_space: ["10.0.0.0/16"], retention: 30 });
  });

  it("substitutes scalars inside longer strings", () => {
    const out = resolveVariables({ name: "st${var.env}data${var.index}" }, { env: "prod", index: 1 });
    expect(out).toEqual({ name: "stproddata1" });
  });

  it("leaves non-scalar inline references as text", () => {
    const out = resolveVariables({ name: "net-${var.tags}" }, { tags: { env: "prod" } });
    expect(out).toEqual({ name: "net-${var.tags}" });
  });

  it("looks up dotted names in nested variables", () => {
    const out = resolveVariables({ location: "${var.network.region}" }, { network: { region: "eastus" } });
    expect(out).toEqual({ location: "eastus" });
  });

  it("recurses into lists and objects", () => {
    const out = resolveVariables(
      { network_rules: [{ ip_rules: ["${var.office_ip}", "2.2.2.2"] }], tags: { env: "${var.env}" } },
      { office_ip: "1.1.1.1", env: "prod" },
    );

    expect(out).toEqual({ network_rules: [{ ip_rules: ["1.1.1.1", "2.2.2.2"] }], tags: { env: "prod" } });
  });

  it("leaves unknown variables and other expressions untouched", () => {
    const tree = {
      location: "${azurerm_resource_group.main.location}",
      sku: "${var.missing}",
      count: 3,
    };
    expect(resolveVariables(tree, { env: "prod" })).toEqual(tree);
  });
});

describe("resolveName", () => {
  it("resolves scalar references and keeps anything else as written", () => {
    expect(resolveName("${var.name}", { name: "data01" })).toBe("data01");
    expect(resolveName("st${var.env}01", { env: "prod" })).toBe("stprod01");
    expect(resolveName("${var.names}", { names: ["a", "b"] })).toBe("${var.names}");
    expect(resolveName("${var.missing}", {})).toBe("${var.missing}");
  });
});
