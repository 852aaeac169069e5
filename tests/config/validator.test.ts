import * as os from "node:os";
import * as path from "node:path";
import { beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import { createDefaultConfig, mergeConfig } from "../../src/config/defaults";
import { expandHome, freezeConfig, resolvePaths } from "../../src/config/resolver";
import { ConfigError, parseRetentionDays, validateConfig } from "../../src/config/validator";

describe("config validation", () => {
  let warnSpy: MockInstance;

  beforeEach(() => {
    warnSpy = vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  describe("validateConfig", () => {
    test("returns an empty layer for an empty document", () => {
      expect(validateConfig(null)).toEqual({});
      expect(validateConfig(undefined)).toEqual({});
    });

    test("rejects a document that is not an object", () => {
      expect(() => validateConfig(["shop"])).toThrow("Config must be an object");
      expect(() => validateConfig("shop")).toThrow(ConfigError);
    });

    test("rejects wrong types with the offending key", () => {
      expect(() => validateConfig({ databaseName: 42 })).toThrow("databaseName must be a string");
      expect(() => validateConfig({ sync: { enabled: "yes" } })).toThrow("sync.enabled must be a boolean");
      expect(() => validateConfig({ sync: "backup-host" })).toThrow("sync must be an object");
      expect(() => validateConfig({ tools: { rsync: false } })).toThrow("tools.rsync must be a string");
    });

    test("accepts empty strings for preflight to judge", () => {
      expect(validateConfig({ databaseName: "", backupDir: "" })).toEqual({ databaseName: "", backupDir: "" });
    });

    test("rejects an extension that is not a dotted suffix", () => {
      expect(() => validateConfig({ artifactExtension: "sql.gz" })).toThrow("artifactExtension must start with '.'");
      expect(() => validateConfig({ artifactExtension: ".sql/gz" })).toThrow(ConfigError);
      expect(validateConfig({ artifactExtension: ".sql.zst" })).toEqual({ artifactExtension: ".sql.zst" });
    });

    test("warns about unknown keys without failing", () => {
      expect(validateConfig({ databaseName: "shop", schedules: {} })).toEqual({ databaseName: "shop" });
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(String(warnSpy.mock.calls[0]?.[0])).toContain("Ignoring unknown config key: schedules");
    });
  });

  describe("parseRetentionDays", () => {
    test("accepts non-negative integers and digit strings", () => {
      expect(parseRetentionDays(0)).toBe(0);
      expect(parseRetentionDays(30)).toBe(30);
      expect(parseRetentionDays(" 14 ")).toBe(14);
      expect(parseRetentionDays(36500)).toBe(36500);
    });

    test("rejects windows beyond the supported maximum", () => {
      expect(() => parseRetentionDays("999999999")).toThrow(ConfigError);
      expect(() => parseRetentionDays(36501)).toThrow("retentionDays must be at most 36500");
    });

    test("rejects negative, fractional and non-numeric values", () => {
      for (const value of [-1, 2.5, "-1", "2.5", "", true]) {
        expect(() => parseRetentionDays(value)).toThrow("retentionDays must be a non-negative integer");
      }
    });
  });

  describe("mergeConfig", () => {
    test("later layers win and nested sections merge", () => {
      const merged = mergeConfig(
        createDefaultConfig(),
        { databaseName: "shop", sync: { targetDir: "/srv/mirror", remoteHost: "backup-host" } },
        { sync: { enabled: true } },
      );

      expect(merged.databaseName).toBe("shop");
      expect(merged.sync).toMatchObject({ enabled: true, targetDir: "/srv/mirror", remoteHost: "backup-host" });
      expect(merged.tools).toEqual({ clpctl: "clpctl", rsync: "rsync" });
    });
  });

  describe("path resolution", () => {
    test("expands the home directory", () => {
      expect(expandHome("~/.ssh/config")).toBe(path.join(os.homedir(), ".ssh", "config"));
      expect(expandHome("/etc/ssh/ssh_config")).toBe("/etc/ssh/ssh_config");
    });

    test("resolves relative paths and leaves empty ones for preflight", () => {
      expect(resolvePaths({ backupDir: "dumps", sync: { sshConfigPath: "ssh/config" } }, "/opt/app")).toEqual({
        backupDir: "/opt/app/dumps",
        sync: { sshConfigPath: "/opt/app/ssh/config" },
      });
      expect(resolvePaths({ backupDir: "" }, "/opt/app")).toEqual({ backupDir: "" });
    });

    test("freezes the run configuration", () => {
      const config = freezeConfig(createDefaultConfig());

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.tools)).toBe(true);
    });
  });
});
