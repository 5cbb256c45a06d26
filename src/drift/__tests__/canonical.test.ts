/**
 * Canonical value model tests
 */

import { describe, it, expect } from "vitest";
import {
  canonicalEquals,
  compareKeys,
  createIdentity,
  elementKey,
  list,
  object,
  scalar,
  schemaPath,
  serializeValue,
  set,
  toPlain,
  unresolved,
} from "../canonical.js";

describe("canonical values", () => {
  it("builds identity keys from lowercase type and name", () => {
    const identity = createIdentity("Microsoft.Storage/storageAccounts", "Data01");
    expect(identity.key).toBe("microsoft.storage/storageaccounts:data01");
    expect(identity.name).toBe("Data01");
  });

  it("stores set items sorted by element key", () => {
    const value = set([scalar("b"), scalar("a"), scalar("c")]);
    expect(value.items.map(i => toPlain(i))).toEqual(["a", "b", "c"]);
  });

  it("orders elements sharing an identity key by their full value", () => {
    const first = object([["name", scalar("SSH")], ["priority", scalar(200)]]);
    const second = object([["name", scalar("ssh")], ["priority", scalar(100)]]);

    const forward = set([first, second], "name");
    const backward = set([second, first], "name");

    expect(forward.items.map(i => toPlain(i))).toEqual([
      { name: "SSH", priority: 200 },
      { name: "ssh", priority: 100 },
    ]);
    expect(backward.items.map(i => serializeValue(i))).toEqual(forward.items.map(i => serializeValue(i)));
  });

  it("keys object elements by their identity field, case-insensitively", () => {
    const rule = object([["name", scalar("SSH")], ["priority", scalar(100)]]);
    expect(elementKey(rule, "name")).toBe("ssh");
    expect(elementKey(rule)).toBe('{"name":"SSH","priority":100}');
  });

  it("treats sets with the same members as equal regardless of input order", () => {
    const a = set([scalar("10.0.0.1"), scalar("10.0.0.2")]);
    const b = set([scalar("10.0.0.2"), scalar("10.0.0.1")]);
    expect(canonicalEquals(a, b)).toBe(true);
  });

  it("treats lists as order-significant", () => {
    const a = list([scalar(1), scalar(2)]);
    const b = list([scalar(2), scalar(1)]);
    expect(canonicalEquals(a, b)).toBe(false);
  });

  it("never treats unresolved values as equal", () => {
    const ref = unresolved("${var.location}");
    expect(canonicalEquals(ref, ref)).toBe(false);
    expect(canonicalEquals(object([["x", ref]]), object([["x", ref]]))).toBe(false);
  });

  it("does not equate a list with a set of the same items", () => {
    expect(canonicalEquals(list([scalar("a")]), set([scalar("a")]))).toBe(false);
  });

  it("strips element keys and indices from schema paths", () => {
    expect(schemaPath("security_rules[ssh].destination_port_ranges[22]")).toBe(
      "security_rules[].destination_port_ranges[]",
    );
    expect(schemaPath("subnets[0].name")).toBe("subnets[].name");
  });

  it("orders keys by code unit, independent of locale", () => {
    expect(["b", "B", "a", "_"].sort(compareKeys)).toEqual(["B", "_", "a", "b"]);
  });

  it("serializes unresolved values with their expression", () => {
    const value = object([["location", unresolved("${var.loc}")], ["count", scalar(2)]]);
    expect(serializeValue(value)).toBe('{"count":2,"location":{"$unresolved":"${var.loc}"}}');
  });
});
