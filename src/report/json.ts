/**
 * Machine-readable report. Keys are snake_case and form a stable contract;
 * bump JSON_VERSION on incompatible changes.
 */

import { CheckId, FlagKind, Severity } from "../analysis/checks";
import {
  BatchResult,
  CheckedRepository,
  FailedRepository,
  FileEvidence,
  Finding,
  MaintainerDominance,
  PullEvidence,
} from "./types";

export const JSON_VERSION = "1.0";

export interface JsonReportOptions {
  disabledChecks: readonly CheckId[];
  ignoredFlags: readonly FlagKind[];
  debug: boolean;
}

interface JsonFileEvidence {
  file: string;
  indicators: string[];
}

interface JsonPullEvidence {
  pull_request: number;
  type: string;
  url: string;
  indicators: string[];
}

interface JsonFinding {
  category: string;
  severity: Severity;
  indicator: string;
  ignored: boolean;
}

interface JsonDebug {
  repo_dir: string;
  files: string[];
  searched_files: { cla: string[]; dco: string[]; inoutbound: string[] };
  contributors: Array<{ login: string; contributions: number }>;
  impossible_checks: CheckId[];
}

export interface JsonRepository {
  url: string;
  shortname: string;
  red_flags: string[];
  yellow_flags: string[];
  green_flags: string[];
  cla_files: JsonFileEvidence[];
  cla_pulls: JsonPullEvidence[];
  dco_files: JsonFileEvidence[];
  dco_pulls: JsonPullEvidence[];
  inoutbound_files: JsonFileEvidence[];
  license_files: string[];
  maintainer_dominance: number | null;
  days_since_last_human_commit: number | null;
  days_since_last_bot_commit: number | null;
  analysis: JsonFinding[];
  debug?: JsonDebug;
}

export interface JsonReport {
  json_version: string;
  disabled_checks: CheckId[];
  ignored_flags: FlagKind[];
  debug_mode: boolean;
  repositories: JsonRepository[];
  failures: FailedRepository[];
}

function fileEvidence(items: readonly FileEvidence[]): JsonFileEvidence[] {
  return items.map((item) => ({ file: item.file, indicators: [...item.indicators] }));
}

function pullEvidence(items: readonly PullEvidence[]): JsonPullEvidence[] {
  return items.map((item) => ({
    pull_request: item.pullRequest,
    type: item.origin,
    url: item.url,
    indicators: [...item.indicators],
  }));
}

/**
 * Dominance as reported: 1 for a sole contributor, otherwise rounded to two decimals.
 */
function dominanceValue(dominance: MaintainerDominance | null): number | null {
  if (dominance === null) return null;
  if (dominance.kind === "sole-contributor") return 1;
  return Math.round(dominance.value * 100) / 100;
}

/**
 * Distinct flag names of the non-ignored findings with the given severity.
 */
function flagNames(findings: readonly Finding[], severity: Severity): string[] {
  const names = findings
    .filter((finding) => !finding.ignored && finding.severity === severity)
    .map((finding) => finding.flag);
  return [...new Set(names)];
}

function buildRepository(result: CheckedRepository, debug: boolean): JsonRepository {
  const { report, findings, diagnostics } = result;

  const repository: JsonRepository = {
    url: report.url,
    shortname: report.shortname,
    red_flags: flagNames(findings, "red"),
    yellow_flags: flagNames(findings, "yellow"),
    green_flags: flagNames(findings, "green"),
    cla_files: fileEvidence(report.claFiles),
    cla_pulls: pullEvidence(report.claPulls),
    dco_files: fileEvidence(report.dcoFiles),
    dco_pulls: pullEvidence(report.dcoPulls),
    inoutbound_files: fileEvidence(report.inoutboundFiles),
    license_files: [...report.licenseFiles],
    maintainer_dominance: dominanceValue(report.maintainerDominance),
    days_since_last_human_commit: report.daysSinceLastHumanCommit,
    days_since_last_bot_commit: report.daysSinceLastBotCommit,
    analysis: findings.map((finding) => ({
      category: finding.category,
      severity: finding.severity,
      indicator: finding.indicator,
      ignored: finding.ignored,
    })),
  };

  if (debug) {
    repository.debug = {
      repo_dir: diagnostics.repoDir,
      files: [...diagnostics.files],
      searched_files: {
        cla: [...diagnostics.searchedFiles.cla],
        dco: [...diagnostics.searchedFiles.dco],
        inoutbound: [...diagnostics.searchedFiles.inoutbound],
      },
      contributors: diagnostics.contributors.map((c) => ({ login: c.login, contributions: c.contributions })),
      impossible_checks: [...diagnostics.impossibleChecks],
    };
  }

  return repository;
}

export function buildJsonReport(batch: BatchResult, options: JsonReportOptions): JsonReport {
  return {
    json_version: JSON_VERSION,
    disabled_checks: [...options.disabledChecks],
    ignored_flags: [...options.ignoredFlags],
    debug_mode: options.debug,
    repositories: batch.results.map((result) => buildRepository(result, options.debug)),
    failures: batch.failures.map((failure) => ({ url: failure.url, error: failure.error })),
  };
}

/**
 * Serialize the report, indented by two spaces.
 */
export function renderJsonReport(batch: BatchResult, options: JsonReportOptions): string {
  return JSON.stringify(buildJsonReport(batch, options), null, 2);
}
