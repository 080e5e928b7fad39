/**
 * Library entry point.
 */

export { analyzeReport, hasRedFlags, DEFAULT_THRESHOLDS, DOMINANCE_WINDOW } from "./analysis/engine";
export type { AnalysisOptions, AnalysisThresholds } from "./analysis/engine";
export {
  ALL_CHECK_IDS,
  ALL_FLAG_KINDS,
  GITHUB_ONLY_CHECKS,
  SEVERITY_RANK,
  isValidCheckId,
  isValidFlagKind,
} from "./analysis/checks";
export type { CheckId, FlagKind, FindingCategory, Severity } from "./analysis/checks";
export { checkRepository, checkRepositories } from "./checker";
export type { CheckContext } from "./checker";
export { loadConfig, loadConfigFromString, createDefaultConfig, mergeCliSelections } from "./config/loader";
export type { LoadedConfig, CliSelections } from "./config/loader";
export type { RepovetConfig } from "./config/schema";
export { InvalidReportError, ConfigValidationError, GitCommandError, RepoListError } from "./errors";
export { readRepoList, parseRepoList } from "./repo-list";
export { buildJsonReport, renderJsonReport, JSON_VERSION } from "./report/json";
export type { JsonReport, JsonRepository, JsonReportOptions } from "./report/json";
export { formatTextReport } from "./report/text";
export { emptyReport, freezeReport } from "./report/types";
export type {
  BatchResult,
  CheckedRepository,
  FailedRepository,
  FileEvidence,
  Finding,
  MaintainerDominance,
  PullEvidence,
  RepositoryDiagnostics,
  RepositoryReport,
} from "./report/types";
