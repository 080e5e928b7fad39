/**
 * Configuration schema types for .repovet.yml files.
 *
 * This module defines the structure of the configuration file that can be
 * placed in the working directory (or passed with --config) to customize
 * which checks run and how findings are rated.
 */

/**
 * Rating thresholds.
 */
export interface RepovetThresholdsConfig {
  /**
   * Dominance above which the top contributor is predominant.
   * Default: 0.75
   */
  dominance?: number;

  /**
   * Days after the last human commit before updates count as infrequent.
   * Default: 90
   */
  stale_days?: number;

  /**
   * Days after the last human commit before the project counts as orphaned.
   * Default: 365
   */
  orphaned_days?: number;
}

/**
 * Which files of a working copy are inspected.
 */
export interface RepovetFilesConfig {
  /**
   * Glob patterns (case-insensitive) of documents searched for CLA, DCO and inbound=outbound.
   * Default: ["**\/README", "**\/README.*", "**\/CONTRIBUTING", "**\/CONTRIBUTING.*"]
   */
  documents?: string[];

  /**
   * Glob patterns (case-sensitive) of license declarations.
   * Default: ["LICENSE*", "License*", "COPYING*"]
   */
  licenses?: string[];

  /**
   * Directories whose entries are listed in addition to the repository root.
   * Default: [".github"]
   */
  extra_paths?: string[];
}

export interface RepovetGithubConfig {
  /**
   * Contributors fetched for the dominance calculation (one API page).
   * Default: 30
   */
  max_contributors?: number;
}

export interface RepovetGitConfig {
  /**
   * Depth of fresh clones.
   * Default: 100
   */
  clone_depth?: number;
}

/**
 * Complete .repovet.yml configuration schema.
 */
export interface RepovetConfig {
  /**
   * Config file version. Currently only version 1 is supported.
   */
  version: number;

  /**
   * Check ids that are not run at all.
   */
  disable?: string[];

  /**
   * Flag kinds whose findings are reported as ignored.
   */
  ignore?: string[];

  thresholds?: RepovetThresholdsConfig;

  files?: RepovetFilesConfig;

  github?: RepovetGithubConfig;

  git?: RepovetGitConfig;
}

export interface RequiredFilesConfig {
  documents: string[];
  licenses: string[];
  extra_paths: string[];
}

export const DEFAULT_FILES_CONFIG: RequiredFilesConfig = {
  documents: ["**/README", "**/README.*", "**/CONTRIBUTING", "**/CONTRIBUTING.*"],
  licenses: ["LICENSE*", "License*", "COPYING*"],
  extra_paths: [".github"],
};

export const DEFAULT_MAX_CONTRIBUTORS = 30;

// Page size limit of the contributors endpoint; only one page is fetched
export const MAX_CONTRIBUTORS_PER_PAGE = 100;

export const DEFAULT_CLONE_DEPTH = 100;

/**
 * Config file name searched for in the working directory.
 */
export const CONFIG_FILE_NAME = ".repovet.yml";
