/**
 * Flag analysis engine.
 *
 * Turns a frozen RepositoryReport into an ordered list of findings. Every rule
 * is evaluated on its own and returns zero or more findings; the results are
 * concatenated in the fixed order of RULES (licensing before contributions).
 * The engine reads nothing but its arguments and may run for several reports
 * at once.
 */

import { InvalidReportError } from "../errors";
import { CheckId, FindingCategory, FlagKind, Severity } from "./checks";
import { FileEvidence, Finding, PullEvidence, RepositoryReport } from "../report/types";

/**
 * Number of contributors after the top one that the dominance ratio compares against.
 */
export const DOMINANCE_WINDOW = 10;

export interface AnalysisThresholds {
  /** Dominance above this value is a predominant maintainer */
  dominance: number;
  /** A human commit older than this many days is infrequent */
  staleDays: number;
  /** A human commit older than this many days means the project is orphaned */
  orphanedDays: number;
}

export const DEFAULT_THRESHOLDS: AnalysisThresholds = {
  dominance: 0.75,
  staleDays: 90,
  orphanedDays: 365,
};

export interface AnalysisOptions {
  disabledChecks?: Iterable<CheckId>;
  ignoredFlags?: Iterable<FlagKind>;
  thresholds?: Partial<AnalysisThresholds>;
}

/**
 * A finding before the ignore list has been applied.
 */
type Draft = Omit<Finding, "ignored" | "check">;

interface Rule {
  check: CheckId;
  evaluate(report: RepositoryReport, thresholds: AnalysisThresholds): Draft[];
}

function draft(
  category: FindingCategory,
  severity: Severity,
  kind: FlagKind,
  flag: string,
  indicator: string
): Draft {
  return { category, severity, kind, flag, indicator };
}

/**
 * Group pull-request evidence by PR id, keeping first-appearance order of PRs and origins.
 */
function groupPulls(pulls: readonly PullEvidence[]): Array<{ pullRequest: number; origins: string[] }> {
  const groups = new Map<number, string[]>();

  for (const pull of pulls) {
    const origins = groups.get(pull.pullRequest) ?? [];
    if (!origins.includes(pull.origin)) {
      origins.push(pull.origin);
    }
    groups.set(pull.pullRequest, origins);
  }

  return [...groups.entries()].map(([pullRequest, origins]) => ({ pullRequest, origins }));
}

function perFile(
  files: readonly FileEvidence[],
  build: (file: string) => Draft
): Draft[] {
  return files.map((evidence) => build(evidence.file));
}

function perPull(
  pulls: readonly PullEvidence[],
  build: (pullRequest: number, origins: string) => Draft
): Draft[] {
  return groupPulls(pulls).map((group) => build(group.pullRequest, group.origins.join(" and one ")));
}

const claInFiles: Rule = {
  check: "cla-files",
  evaluate: (report) =>
    perFile(report.claFiles, (file) =>
      draft(
        "Licensing",
        "red",
        "cla",
        "cla",
        `A mention of Contributor License Agreements in the file ${file}`
      )
    ),
};

const claInPulls: Rule = {
  check: "cla-dco-pulls",
  evaluate: (report) =>
    perPull(report.claPulls, (pullRequest, origins) =>
      draft(
        "Licensing",
        "red",
        "cla",
        "cla",
        `A check for Contributor License Agreements in at least one ${origins} in pull request #${pullRequest}`
      )
    ),
};

const dcoInFiles: Rule = {
  check: "dco-files",
  evaluate: (report) =>
    perFile(report.dcoFiles, (file) =>
      draft(
        "Licensing",
        "green",
        "dco",
        "dco",
        `A mention of Developer Certificate of Origin in the file ${file}`
      )
    ),
};

const dcoInPulls: Rule = {
  check: "cla-dco-pulls",
  evaluate: (report) =>
    perPull(report.dcoPulls, (pullRequest, origins) =>
      draft(
        "Licensing",
        "green",
        "dco",
        "dco",
        `A check for Developer Certificate of Origin in at least one ${origins} in pull request #${pullRequest}`
      )
    ),
};

const inboundOutbound: Rule = {
  check: "inbound-outbound",
  evaluate: (report) => {
    if (report.inoutboundFiles.length === 0) return [];
    const files = report.inoutboundFiles.map((evidence) => evidence.file);
    return [
      draft(
        "Licensing",
        "green",
        "inbound-outbound",
        "inbound=outbound",
        `A mention of inbound=outbound in the following file(s): ${files.join(", ")}`
      ),
    ];
  },
};

const licenseFile: Rule = {
  check: "license-file",
  evaluate: (report) => {
    if (report.licenseFiles.length > 0) return [];
    return [
      draft(
        "Licensing",
        "red",
        "license-file",
        "no-license-file",
        "The project does not seem to have a LICENSE or COPYING file"
      ),
    ];
  },
};

const contributionDistribution: Rule = {
  check: "contributions",
  evaluate: (report, thresholds) => {
    const dominance = report.maintainerDominance;

    // Without a ratio there is nobody to compare the top contributor with
    if (dominance === null || dominance.kind === "sole-contributor") {
      return [
        draft(
          "Contributions",
          "red",
          "contributions",
          "only-one-contributor",
          "The project only has one contributor"
        ),
      ];
    }

    if (dominance.value > thresholds.dominance) {
      const percent = Math.round(thresholds.dominance * 100);
      return [
        draft(
          "Contributions",
          "yellow",
          "contributions",
          "predominant-main-contributor",
          `The contributions of the top contributor exceed those of the next ${DOMINANCE_WINDOW} ` +
            `contributors combined by more than ${percent}%`
        ),
      ];
    }

    return [
      draft(
        "Contributions",
        "green",
        "contributions",
        "distributed-contributions",
        "The project has multiple contributors with an acceptable contribution distribution"
      ),
    ];
  },
};

const commitAge: Rule = {
  check: "commit-age",
  evaluate: (report, thresholds) => {
    const human = report.daysSinceLastHumanCommit;
    const bot = report.daysSinceLastBotCommit;

    if (human === null) {
      return [
        draft(
          "Contributions",
          "red",
          "commit-age",
          "orphaned",
          "No commit made by a human could be found"
        ),
      ];
    }

    if (human > thresholds.orphanedDays) {
      const drafts = [
        draft(
          "Contributions",
          "red",
          "commit-age",
          "orphaned",
          `The last commit made by a human is more than ${thresholds.orphanedDays} days old (${human} days)`
        ),
      ];
      if (bot !== null && bot <= thresholds.orphanedDays) {
        drafts.push(
          draft(
            "Contributions",
            "yellow",
            "commit-age",
            "orphaned-but-bot",
            `Bots still commit to the project although human activity is stale (${bot} days since last bot commit)`
          )
        );
      }
      return drafts;
    }

    if (human > thresholds.staleDays) {
      return [
        draft(
          "Contributions",
          "yellow",
          "commit-age",
          "infrequent-updates",
          `The last commit made by a human is more than ${thresholds.staleDays} days old (${human} days)`
        ),
      ];
    }

    return [
      draft(
        "Contributions",
        "green",
        "commit-age",
        "actively-developed",
        `The last commit made by a human is at most ${thresholds.staleDays} days old (${human} days)`
      ),
    ];
  },
};

/**
 * All rules in output order.
 */
const RULES: readonly Rule[] = [
  claInFiles,
  claInPulls,
  dcoInFiles,
  dcoInPulls,
  inboundOutbound,
  licenseFile,
  contributionDistribution,
  commitAge,
];

/**
 * Analyze a repository report and return its findings in rule order.
 *
 * Rules whose check is disabled are skipped. Findings whose flag kind is
 * ignored are kept, with `ignored: true`.
 *
 * @throws InvalidReportError if the report has no URL
 */
export function analyzeReport(report: RepositoryReport, options: AnalysisOptions = {}): Finding[] {
  if (typeof report.url !== "string" || report.url.trim() === "") {
    throw new InvalidReportError("url");
  }

  const disabled = new Set<CheckId>(options.disabledChecks ?? []);
  const ignored = new Set<FlagKind>(options.ignoredFlags ?? []);
  const thresholds: AnalysisThresholds = {
    dominance: options.thresholds?.dominance ?? DEFAULT_THRESHOLDS.dominance,
    staleDays: options.thresholds?.staleDays ?? DEFAULT_THRESHOLDS.staleDays,
    orphanedDays: options.thresholds?.orphanedDays ?? DEFAULT_THRESHOLDS.orphanedDays,
  };

  const findings: Finding[] = [];
  for (const rule of RULES) {
    if (disabled.has(rule.check)) continue;

    for (const result of rule.evaluate(report, thresholds)) {
      findings.push({ ...result, check: rule.check, ignored: ignored.has(result.kind) });
    }
  }

  return findings;
}

/**
 * Whether any finding that was not ignored has red severity.
 */
export function hasRedFlags(findings: readonly Finding[]): boolean {
  return findings.some((finding) => !finding.ignored && finding.severity === "red");
}
