/**
 * Config manager tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { getConfigValue, loadDriftConfig, validateConfig } from "../manager.js";
import { ConfigError } from "../../drift/errors.js";

describe("config manager", () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "driftlens-config-"));
    configPath = join(tmpDir, "driftlens.yaml");
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  describe("loadDriftConfig", () => {
    it("returns defaults when the file does not exist", async () => {
      const config = await loadDriftConfig(configPath, {});

      expect(config).toEqual({ schemaVersion: 1, maxDepth: 32, failOn: "medium", variables: {}, remediation: {} });
    });

    it("resolves paths against the config directory", async () => {
      await writeFile(
        configPath,
        ["schemaVersion: 1", "policyPath: policies/custom.yaml", "eventsDir: ./events", "failOn: high"].join("\n"),
      );

      const config = await loadDriftConfig(configPath, {});

      expect(config.policyPath).toBe(join(tmpDir, "policies/custom.yaml"));
      expect(config.eventsDir).toBe(join(tmpDir, "events"));
      expect(config.failOn).toBe("high");
    });

    it("lets the environment override file paths", async () => {
      await writeFile(configPath, "schemaVersion: 1\npolicyPath: a.yaml\n");

      const config = await loadDriftConfig(configPath, {
        DRIFTLENS_POLICY: "/etc/driftlens/policy.yaml",
        DRIFTLENS_EVENTS_DIR: "/var/log/driftlens",
      });

      expect(config.policyPath).toBe("/etc/driftlens/policy.yaml");
      expect(config.eventsDir).toBe("/var/log/driftlens");
    });

    it("throws ConfigError listing schema issues", async () => {
      await writeFile(configPath, "schemaVersion: 1\nfailOn: critical\nmaxDepth: 0\n");

      const error = await loadDriftConfig(configPath, {}).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.message).toBe(`Invalid config ${configPath}`);
        expect(error.issues.map(i => i.path)).toEqual(["maxDepth", "failOn"]);
      }
    });

    it("throws ConfigError on malformed YAML", async () => {
      await writeFile(configPath, "variables: [unclosed");
      await expect(loadDriftConfig(configPath, {})).rejects.toThrow(`Failed to parse config ${configPath}`);
    });
  });

  describe("getConfigValue", () => {
    it("reads nested values from the effective config", async () => {
      await writeFile(
        configPath,
        ["schemaVersion: 1", "remediation:", "  resourceGroup: rg-test", "variables:", "  zones: [\"1\", \"2\"]"].join(
          "\n",
        ),
      );

      expect(await getConfigValue(configPath, "remediation.resourceGroup", {})).toBe("rg-test");
      expect(await getConfigValue(configPath, "variables.zones.1", {})).toBe("2");
      expect(await getConfigValue(configPath, "maxDepth", {})).toBe(32);
      expect(await getConfigValue(configPath, "remediation.missing.deeper", {})).toBeUndefined();
    });
  });

  describe("validateConfig", () => {
    it("reports a missing file", async () => {
      const result = await validateConfig(configPath);

      expect(result.valid).toBe(false);
      expect(result.schemaErrors).toEqual([{ path: "", message: `Config file not found: ${configPath}` }]);
    });

    it("reports schema errors", async () => {
      await writeFile(configPath, "schemaVersion: 2\n");

      const result = await validateConfig(configPath);

      expect(result.valid).toBe(false);
      expect(result.schemaErrors.map(e => e.path)).toEqual(["schemaVersion"]);
    });

    it("fails when the policy file is missing and warns about remediation gaps", async () => {
      await writeFile(configPath, "schemaVersion: 1\npolicyPath: missing.yaml\nfailOn: never\n");

      const result = await validateConfig(configPath);

      expect(result.valid).toBe(false);
      expect(result.lintIssues.map(i => [i.severity, i.rule])).toEqual([
        ["error", "policy-path"],
        ["warning", "remediation-resource-group"],
        ["warning", "fail-on"],
      ]);
      expect(result.lintIssues[0]?.message).toBe(`Policy file not found: ${join(tmpDir, "missing.yaml")}`);
    });

    it("accepts a complete config", async () => {
      await writeFile(join(tmpDir, "policy.yaml"), "schemaVersion: 1\n");
      await writeFile(
        configPath,
        ["schemaVersion: 1", "policyPath: policy.yaml", "remediation:", "  resourceGroup: rg-test"].join("\n"),
      );

      expect(await validateConfig(configPath)).toEqual({ valid: true, schemaErrors: [], lintIssues: [] });
    });
  });
});
