/**
 * Report and finding types shared by collectors, the analysis engine and the output formatters.
 */

import { CheckId, FindingCategory, FlagKind, Severity } from "../analysis/checks";

/**
 * Keyword matches found in one file of the working copy.
 */
export interface FileEvidence {
  /** Path relative to the repository root */
  file: string;
  /** Matching lines, sorted, never empty */
  indicators: readonly string[];
}

/**
 * Where a pull-request indicator was found: a commit status or a check run (GitHub Action).
 */
export type PullIndicatorOrigin = "status" | "action";

/**
 * Keyword matches found in the status checks of a pull request.
 */
export interface PullEvidence {
  pullRequest: number;
  origin: PullIndicatorOrigin;
  url: string;
  indicators: readonly string[];
}

/**
 * How concentrated the human contributions are.
 * - sole-contributor: fewer than two human contributors
 * - ratio: 1 - (next 10 contributors) / (top contributor), unrounded
 */
export type MaintainerDominance =
  | { kind: "sole-contributor" }
  | { kind: "ratio"; value: number };

/**
 * Everything the collectors learned about one repository.
 * Frozen once collection finishes; the analysis engine only reads it.
 */
export interface RepositoryReport {
  readonly url: string;
  readonly shortname: string;
  readonly claFiles: readonly FileEvidence[];
  readonly claPulls: readonly PullEvidence[];
  readonly dcoFiles: readonly FileEvidence[];
  readonly dcoPulls: readonly PullEvidence[];
  readonly inoutboundFiles: readonly FileEvidence[];
  readonly licenseFiles: readonly string[];
  /** null when no contributor data exists */
  readonly maintainerDominance: MaintainerDominance | null;
  /** null when no human commit exists */
  readonly daysSinceLastHumanCommit: number | null;
  /** null when no bot commit exists */
  readonly daysSinceLastBotCommit: number | null;
}

/**
 * A human contributor as considered by the dominance calculation.
 */
export interface ContributorStat {
  login: string;
  contributions: number;
}

/**
 * Technical details of a check run. Only rendered in debug mode.
 */
export interface RepositoryDiagnostics {
  repoDir: string;
  files: string[];
  searchedFiles: {
    cla: string[];
    dco: string[];
    inoutbound: string[];
  };
  contributors: ContributorStat[];
  impossibleChecks: CheckId[];
}

/**
 * One categorized, severity-tagged observation about a repository.
 */
export interface Finding {
  category: FindingCategory;
  severity: Severity;
  indicator: string;
  ignored: boolean;
  check: CheckId;
  kind: FlagKind;
  flag: string;
}

/**
 * The complete outcome of checking one repository.
 */
export interface CheckedRepository {
  report: RepositoryReport;
  diagnostics: RepositoryDiagnostics;
  findings: Finding[];
}

/**
 * A repository whose check could not be completed.
 */
export interface FailedRepository {
  url: string;
  error: string;
}

export interface BatchResult {
  results: CheckedRepository[];
  failures: FailedRepository[];
}

/**
 * Create a report with no evidence. Collectors fill in what they find.
 */
export function emptyReport(url: string, shortname: string): RepositoryReport {
  return {
    url,
    shortname,
    claFiles: [],
    claPulls: [],
    dcoFiles: [],
    dcoPulls: [],
    inoutboundFiles: [],
    licenseFiles: [],
    maintainerDominance: null,
    daysSinceLastHumanCommit: null,
    daysSinceLastBotCommit: null,
  };
}

/**
 * Deep-freeze a report so no later stage can change it.
 */
export function freezeReport(report: RepositoryReport): RepositoryReport {
  return Object.freeze({
    ...report,
    claFiles: freezeFileEvidence(report.claFiles),
    claPulls: freezePullEvidence(report.claPulls),
    dcoFiles: freezeFileEvidence(report.dcoFiles),
    dcoPulls: freezePullEvidence(report.dcoPulls),
    inoutboundFiles: freezeFileEvidence(report.inoutboundFiles),
    licenseFiles: Object.freeze([...report.licenseFiles]),
    maintainerDominance: report.maintainerDominance
      ? Object.freeze({ ...report.maintainerDominance })
      : null,
  });
}

function freezeFileEvidence(items: readonly FileEvidence[]): readonly FileEvidence[] {
  return Object.freeze(
    items.map((item) =>
      Object.freeze({ file: item.file, indicators: Object.freeze([...item.indicators]) })
    )
  );
}

function freezePullEvidence(items: readonly PullEvidence[]): readonly PullEvidence[] {
  return Object.freeze(
    items.map((item) =>
      Object.freeze({
        pullRequest: item.pullRequest,
        origin: item.origin,
        url: item.url,
        indicators: Object.freeze([...item.indicators]),
      })
    )
  );
}
