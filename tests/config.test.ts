/**
 * Tests for repovet configuration loading.
 */

import * as path from "path";
import {
  createDefaultConfig,
  loadConfig,
  loadConfigFromString,
  mergeCliSelections,
} from "../src/config/loader";
import { DEFAULT_FILES_CONFIG } from "../src/config/schema";
import { ConfigValidationError } from "../src/errors";

const CONFIG_FILE = path.join(__dirname, "fixtures/repovet-config/.repovet.yml");

describe("Config Loading", () => {
  describe("loadConfig", () => {
    it("should load config from .repovet.yml file", () => {
      const config = loadConfig(CONFIG_FILE);

      expect(config.raw.version).toBe(1);
      expect(config.disabledChecks).toEqual(["cla-dco-pulls"]);
      expect(config.ignoredFlags).toEqual(["commit-age"]);
      expect(config.maxContributors).toBe(50);
    });

    it("should merge defaults with config file values", () => {
      const config = loadConfig(CONFIG_FILE);

      expect(config.thresholds).toEqual({ dominance: 0.5, staleDays: 30, orphanedDays: 365 });
      expect(config.files).toEqual({
        documents: DEFAULT_FILES_CONFIG.documents,
        licenses: DEFAULT_FILES_CONFIG.licenses,
        extra_paths: [".github", "docs"],
      });
      expect(config.cloneDepth).toBe(100);
    });

    it("should return defaults when no config file exists", () => {
      const config = loadConfig("/nonexistent/path/.repovet.yml");

      expect(config.disabledChecks).toEqual([]);
      expect(config.thresholds).toEqual({ dominance: 0.75, staleDays: 90, orphanedDays: 365 });
      expect(config.maxContributors).toBe(30);
    });

    it("should fail when a required config file is missing", () => {
      expect(() => loadConfig("/nonexistent/path/.repovet.yml", true)).toThrow(ConfigValidationError);
    });
  });

  describe("loadConfigFromString", () => {
    let consoleSpy: jest.SpyInstance;

    beforeEach(() => {
      consoleSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    });

    afterEach(() => {
      consoleSpy.mockRestore();
    });

    it("should parse YAML config string", () => {
      const config = loadConfigFromString(`
version: 1
disable: [license-file]
git:
  clone_depth: 10
`);

      expect(config.isCheckEnabled("license-file")).toBe(false);
      expect(config.isCheckEnabled("commit-age")).toBe(true);
      expect(config.cloneDepth).toBe(10);
    });

    it("should fall back to defaults for invalid YAML", () => {
      const config = loadConfigFromString("disable: [unclosed");

      expect(config.disabledChecks).toEqual([]);
      expect(consoleSpy).toHaveBeenCalledTimes(1);
    });

    it("should fall back to defaults for an empty file", () => {
      expect(loadConfigFromString("").raw).toEqual(createDefaultConfig().raw);
    });

    it("should reject unknown check ids", () => {
      expect(() => loadConfigFromString("disable: [licence-file]")).toThrow(
        'Unknown check "licence-file". Valid checks: cla-files, dco-files, cla-dco-pulls, ' +
          "inbound-outbound, license-file, contributions, commit-age"
      );
    });

    it("should reject unknown flag kinds", () => {
      expect(() => loadConfigFromString("ignore: [cla-files]")).toThrow(ConfigValidationError);
    });

    it("should reject unsupported versions", () => {
      expect(() => loadConfigFromString("version: 2")).toThrow("Unsupported config version 2");
    });

    it("should reject invalid thresholds", () => {
      expect(() => loadConfigFromString("thresholds:\n  dominance: high")).toThrow(
        '"thresholds.dominance" must be a non-negative number'
      );
      expect(() => loadConfigFromString("thresholds:\n  stale_days: 400")).toThrow(
        "thresholds.stale_days (400) must not exceed thresholds.orphaned_days (365)"
      );
    });

    it("should reject a fractional or zero clone depth", () => {
      expect(() => loadConfigFromString("git:\n  clone_depth: 1.5")).toThrow(
        '"git.clone_depth" must be a positive integer'
      );
      expect(() => loadConfigFromString("git:\n  clone_depth: 0")).toThrow(
        '"git.clone_depth" must be a positive integer'
      );
    });

    it("should limit max_contributors to one page of results", () => {
      expect(() => loadConfigFromString("github:\n  max_contributors: 101")).toThrow(
        '"github.max_contributors" must not exceed 100'
      );
      expect(() => loadConfigFromString("github:\n  max_contributors: 2.5")).toThrow(ConfigValidationError);
      expect(loadConfigFromString("github:\n  max_contributors: 100").maxContributors).toBe(100);
    });

    it("should reject a disable entry that is not a list", () => {
      expect(() => loadConfigFromString("disable: cla-files")).toThrow('"disable" must be a list of strings');
    });
  });

  describe("mergeCliSelections", () => {
    it("should add command line selections to those of the file", () => {
      const config = mergeCliSelections(loadConfig(CONFIG_FILE), {
        disable: ["commit-age", "cla-dco-pulls"],
        ignore: ["cla"],
      });

      expect(config.disabledChecks).toEqual(["cla-dco-pulls", "commit-age"]);
      expect(config.ignoredFlags).toEqual(["commit-age", "cla"]);
      expect(config.thresholds.dominance).toBe(0.5);
    });

    it("should validate command line selections", () => {
      expect(() => mergeCliSelections(createDefaultConfig(), { ignore: ["everything"] })).toThrow(
        ConfigValidationError
      );
    });
  });
});

describe("File Filtering", () => {
  const config = createDefaultConfig();

  it("should match documents case-insensitively in any directory", () => {
    expect(config.isDocumentFile("README")).toBe(true);
    expect(config.isDocumentFile("docs/readme.rst")).toBe(true);
    expect(config.isDocumentFile(".github/CONTRIBUTING.md")).toBe(true);
    expect(config.isDocumentFile("READMEFIRST")).toBe(false);
  });

  it("should match license files case-sensitively", () => {
    expect(config.isLicenseFile("LICENSE")).toBe(true);
    expect(config.isLicenseFile("COPYING")).toBe(true);
    expect(config.isLicenseFile("license")).toBe(false);
  });
});
