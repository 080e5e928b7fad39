/**
 * Configuration loader for repovet.
 *
 * Loads .repovet.yml, validates check ids and flag kinds, applies defaults
 * and merges the selections given on the command line.
 */

import * as fs from "fs";
import * as yaml from "js-yaml";
import { minimatch } from "minimatch";
import { ConfigValidationError } from "../errors";
import { logger } from "../logger";
import {
  ALL_CHECK_IDS,
  ALL_FLAG_KINDS,
  CheckId,
  FlagKind,
  isValidCheckId,
  isValidFlagKind,
} from "../analysis/checks";
import { AnalysisThresholds, DEFAULT_THRESHOLDS } from "../analysis/engine";
import {
  RepovetConfig,
  RequiredFilesConfig,
  DEFAULT_FILES_CONFIG,
  DEFAULT_MAX_CONTRIBUTORS,
  DEFAULT_CLONE_DEPTH,
  MAX_CONTRIBUTORS_PER_PAGE,
} from "./schema";

/**
 * The loaded and resolved configuration with helper methods.
 */
export interface LoadedConfig {
  /**
   * The parsed configuration (or defaults if no file was found).
   */
  raw: RepovetConfig;

  disabledChecks: CheckId[];

  ignoredFlags: FlagKind[];

  thresholds: AnalysisThresholds;

  files: RequiredFilesConfig;

  maxContributors: number;

  cloneDepth: number;

  /**
   * Whether a check should run.
   */
  isCheckEnabled(check: CheckId): boolean;

  /**
   * Whether a listed path is a README/CONTRIBUTING-like document.
   * @param filePath - Path relative to the repository root
   */
  isDocumentFile(filePath: string): boolean;

  /**
   * Whether a listed path declares the license of the project.
   * @param filePath - Path relative to the repository root
   */
  isLicenseFile(filePath: string): boolean;
}

/**
 * Selections made on the command line, added to those of the config file.
 */
export interface CliSelections {
  disable?: string[];
  ignore?: string[];
}

const DEFAULT_CONFIG: RepovetConfig = {
  version: 1,
  disable: [],
  ignore: [],
};

/**
 * Load configuration from a YAML file.
 *
 * A missing file yields the defaults unless `required` is set, in which case
 * it is a configuration error.
 */
export function loadConfig(configPath: string, required = false): LoadedConfig {
  if (!fs.existsSync(configPath)) {
    if (required) {
      throw new ConfigValidationError(`Config file not found: ${configPath}`);
    }
    return createDefaultConfig();
  }

  logger.debug("Loading configuration", { path: configPath });
  return loadConfigFromString(fs.readFileSync(configPath, "utf-8"));
}

/**
 * Load configuration from a YAML string. Does not touch the filesystem.
 */
export function loadConfigFromString(yamlContent: string): LoadedConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (err) {
    logger.warn("Failed to parse configuration, using defaults", {
      error: err instanceof Error ? err.message : String(err),
    });
    return createDefaultConfig();
  }

  if (parsed === null || parsed === undefined) {
    return createDefaultConfig();
  }

  return buildLoadedConfig(parseRawConfig(parsed));
}

/**
 * Create a default LoadedConfig without any file.
 */
export function createDefaultConfig(): LoadedConfig {
  return buildLoadedConfig({ ...DEFAULT_CONFIG });
}

/**
 * Return a new config whose disable and ignore lists also contain the CLI selections.
 */
export function mergeCliSelections(config: LoadedConfig, selections: CliSelections): LoadedConfig {
  const disable = [...(config.raw.disable ?? []), ...(selections.disable ?? [])];
  const ignore = [...(config.raw.ignore ?? []), ...(selections.ignore ?? [])];

  return buildLoadedConfig({
    ...config.raw,
    disable: [...new Set(disable)],
    ignore: [...new Set(ignore)],
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readStringList(value: unknown, field: string): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigValidationError(`"${field}" must be a list of strings`);
  }
  return value;
}

function readNumber(value: unknown, field: string): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw new ConfigValidationError(`"${field}" must be a non-negative number`);
  }
  return value;
}

function readInteger(value: unknown, field: string, max?: number): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigValidationError(`"${field}" must be a positive integer`);
  }
  if (max !== undefined && value > max) {
    throw new ConfigValidationError(`"${field}" must not exceed ${max}`);
  }
  return value;
}

function readSection(value: unknown, field: string): Record<string, unknown> {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConfigValidationError(`"${field}" must be a mapping`);
  }
  return value;
}

/**
 * Check the shape of a parsed YAML document and turn it into a RepovetConfig.
 */
function parseRawConfig(parsed: unknown): RepovetConfig {
  if (!isRecord(parsed)) {
    throw new ConfigValidationError("Configuration must be a mapping");
  }

  const version = readNumber(parsed.version, "version") ?? 1;
  if (version !== 1) {
    throw new ConfigValidationError(`Unsupported config version ${version}`);
  }

  const thresholds = readSection(parsed.thresholds, "thresholds");
  const files = readSection(parsed.files, "files");
  const github = readSection(parsed.github, "github");
  const git = readSection(parsed.git, "git");

  return {
    version,
    disable: readStringList(parsed.disable, "disable") ?? [],
    ignore: readStringList(parsed.ignore, "ignore") ?? [],
    thresholds: {
      dominance: readNumber(thresholds.dominance, "thresholds.dominance"),
      stale_days: readNumber(thresholds.stale_days, "thresholds.stale_days"),
      orphaned_days: readNumber(thresholds.orphaned_days, "thresholds.orphaned_days"),
    },
    files: {
      documents: readStringList(files.documents, "files.documents"),
      licenses: readStringList(files.licenses, "files.licenses"),
      extra_paths: readStringList(files.extra_paths, "files.extra_paths"),
    },
    github: {
      max_contributors: readInteger(github.max_contributors, "github.max_contributors", MAX_CONTRIBUTORS_PER_PAGE),
    },
    git: {
      clone_depth: readInteger(git.clone_depth, "git.clone_depth"),
    },
  };
}

function validateChecks(ids: string[]): CheckId[] {
  return ids.map((id) => {
    if (!isValidCheckId(id)) {
      throw new ConfigValidationError(
        `Unknown check "${id}". Valid checks: ${ALL_CHECK_IDS.join(", ")}`
      );
    }
    return id;
  });
}

function validateFlags(ids: string[]): FlagKind[] {
  return ids.map((id) => {
    if (!isValidFlagKind(id)) {
      throw new ConfigValidationError(
        `Unknown flag "${id}". Valid flags: ${ALL_FLAG_KINDS.join(", ")}`
      );
    }
    return id;
  });
}

/**
 * Check if a path matches any of the given glob patterns.
 */
function matchesAnyPattern(filePath: string, patterns: string[], nocase: boolean): boolean {
  const normalizedPath = filePath.replace(/\\/g, "/");
  return patterns.some((pattern) => minimatch(normalizedPath, pattern, { dot: true, nocase }));
}

/**
 * Build a LoadedConfig from a raw RepovetConfig.
 */
function buildLoadedConfig(rawConfig: RepovetConfig): LoadedConfig {
  const disabledChecks = validateChecks(rawConfig.disable ?? []);
  const ignoredFlags = validateFlags(rawConfig.ignore ?? []);

  const thresholds: AnalysisThresholds = {
    dominance: rawConfig.thresholds?.dominance ?? DEFAULT_THRESHOLDS.dominance,
    staleDays: rawConfig.thresholds?.stale_days ?? DEFAULT_THRESHOLDS.staleDays,
    orphanedDays: rawConfig.thresholds?.orphaned_days ?? DEFAULT_THRESHOLDS.orphanedDays,
  };

  if (thresholds.staleDays > thresholds.orphanedDays) {
    throw new ConfigValidationError(
      `thresholds.stale_days (${thresholds.staleDays}) must not exceed thresholds.orphaned_days (${thresholds.orphanedDays})`
    );
  }

  const files: RequiredFilesConfig = {
    documents: rawConfig.files?.documents ?? DEFAULT_FILES_CONFIG.documents,
    licenses: rawConfig.files?.licenses ?? DEFAULT_FILES_CONFIG.licenses,
    extra_paths: rawConfig.files?.extra_paths ?? DEFAULT_FILES_CONFIG.extra_paths,
  };

  const disabled = new Set(disabledChecks);

  return {
    raw: rawConfig,
    disabledChecks,
    ignoredFlags,
    thresholds,
    files,
    maxContributors: rawConfig.github?.max_contributors ?? DEFAULT_MAX_CONTRIBUTORS,
    cloneDepth: rawConfig.git?.clone_depth ?? DEFAULT_CLONE_DEPTH,
    isCheckEnabled: (check) => !disabled.has(check),
    isDocumentFile: (filePath) => matchesAnyPattern(filePath, files.documents, true),
    isLicenseFile: (filePath) => matchesAnyPattern(filePath, files.licenses, false),
  };
}
