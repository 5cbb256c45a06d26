/**
 * Entity Matcher tests
 */

import { describe, it, expect } from "vitest";
import { matchEntities, mergeMatchResults } from "../matcher.js";
import { createIdentity } from "../canonical.js";
import type { CanonicalEntity, EntitySource } from "../canonical.js";
import { DuplicateEntityError } from "../errors.js";

function entity(type: string, name: string, source: EntitySource, origin?: string): CanonicalEntity {
  return {
    kind: type.split("/")[1] ?? type,
    identity: createIdentity(type, name),
    source,
    ...(origin ? { origin } : {}),
    properties: new Map(),
  };
}

const VNET = "Microsoft.Network/virtualNetworks";
const SUBNET = "Microsoft.Network/virtualNetworks/subnets";

describe("matchEntities", () => {
  it("pairs entities by type and case-insensitive name", () => {
    const result = matchEntities(
      [entity(VNET, "Core-VNet", "declared")],
      [entity(VNET, "core-vnet", "live")],
    );

    expect(result.matched).toHaveLength(1);
    expect(result.matched[0]?.key).toBe("microsoft.network/virtualnetworks:core-vnet");
    expect(result.declaredOnly).toEqual([]);
    expect(result.liveOnly).toEqual([]);
  });

  it("does not pair entities of different types with the same name", () => {
    const result = matchEntities(
      [entity(VNET, "internal", "declared")],
      [entity(SUBNET, "internal", "live")],
    );

    expect(result.matched).toEqual([]);
    expect(result.declaredOnly.map(e => e.identity.key)).toEqual(["microsoft.network/virtualnetworks:internal"]);
    expect(result.liveOnly.map(e => e.identity.key)).toEqual([
      "microsoft.network/virtualnetworks/subnets:internal",
    ]);
  });

  it("covers every input identity in exactly one partition", () => {
    const declared = ["a", "b", "c", "d"].map(n => entity(VNET, n, "declared"));
    const live = ["c", "d", "e"].map(n => entity(VNET, n, "live"));
    const result = matchEntities(declared, live);

    const seen = [
      ...result.matched.map(p => p.key),
      ...result.declaredOnly.map(e => e.identity.key),
      ...result.liveOnly.map(e => e.identity.key),
    ];
    const union = new Set([...declared, ...live].map(e => e.identity.key));

    expect(seen).toHaveLength(union.size);
    expect(new Set(seen)).toEqual(union);
    expect(result.matched.map(p => p.declared.identity.name)).toEqual(["c", "d"]);
    expect(result.declaredOnly.map(e => e.identity.name)).toEqual(["a", "b"]);
    expect(result.liveOnly.map(e => e.identity.name)).toEqual(["e"]);
  });

  it("sorts output by identity key regardless of input order", () => {
    const result = matchEntities(
      [entity(VNET, "zeta", "declared"), entity(VNET, "alpha", "declared")],
      [],
    );

    expect(result.declaredOnly.map(e => e.identity.name)).toEqual(["alpha", "zeta"]);
  });

  it("throws DuplicateEntityError naming both origins", () => {
    const declared = [
      entity(VNET, "core", "declared", "network.tf:1"),
      entity(VNET, "CORE", "declared", "network.tf:40"),
    ];

    expect(() => matchEntities(declared, [])).toThrow(DuplicateEntityError);
    try {
      matchEntities(declared, []);
    } catch (err) {
      expect(err).toBeInstanceOf(DuplicateEntityError);
      if (err instanceof DuplicateEntityError) {
        expect(err.source).toBe("declared");
        expect(err.origins).toEqual(["network.tf:1", "network.tf:40"]);
      }
    }
  });
});

describe("mergeMatchResults", () => {
  it("merges groups in identity order", () => {
    const subnets = matchEntities([entity(SUBNET, "b", "declared")], [entity(SUBNET, "b", "live")]);
    const vnets = matchEntities([entity(VNET, "a", "declared")], [entity(VNET, "a", "live")]);
    const merged = mergeMatchResults([subnets, vnets]);

    // "/" sorts before ":", so the subnet key comes first.
    expect(merged.matched.map(p => p.key)).toEqual([
      "microsoft.network/virtualnetworks/subnets:b",
      "microsoft.network/virtualnetworks:a",
    ]);
  });
});
