/**
 * Inventory adapters: load declared and live resource inventories.
 *
 * Fixture files are JSON or YAML (by extension) and validated with zod at
 * this boundary; the engine only ever sees well-formed resource records.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import type { z } from "zod";
import { DeclaredInventory, LiveInventory } from "../schemas/resource.js";

export interface InventoryAdapter {
  getDeclared(): Promise<DeclaredInventory>;
  getLive(): Promise<LiveInventory>;
}

/**
 * Reads inventories captured to disk. One adapter serves one file; call the
 * getter matching the file's side.
 */
export class FixtureAdapter implements InventoryAdapter {
  constructor(private readonly fixturePath: string) {}

  async getDeclared(): Promise<DeclaredInventory> {
    return this.load(DeclaredInventory, "declared");
  }

  async getLive(): Promise<LiveInventory> {
    return this.load(LiveInventory, "live");
  }

  private async load<S extends z.ZodTypeAny>(schema: S, label: string): Promise<z.output<S>> {
    const content = await readFile(this.fixturePath, "utf-8");

    let raw: unknown;
    try {
      raw = extname(this.fixturePath).toLowerCase() === ".json" ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
      throw new Error(`Failed to parse ${label} inventory ${this.fixturePath}: ${(err as Error).message}`);
    }

    // A bare array is shorthand for `{ resources: [...] }`.
    const result = schema.safeParse(Array.isArray(raw) ? { resources: raw } : raw);
    if (!result.success) {
      const issues = result.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`);
      throw new Error(`Invalid ${label} inventory ${this.fixturePath}:\n  ${issues.join("\n  ")}`);
    }
    return result.data;
  }
}
