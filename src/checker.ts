/**
 * Repository checks: collect evidence for one repository, freeze it into a
 * report and analyze it. Batches are processed one repository at a time and a
 * failing repository never stops the others.
 */

import { Octokit } from "octokit";
import { analyzeReport } from "./analysis/engine";
import { CheckId, GITHUB_ONLY_CHECKS } from "./analysis/checks";
import {
  analyzeContributors,
  computeCommitAges,
  findClaOrDcoInPulls,
  findLicenseFiles,
  listRepositoryFiles,
  searchDocuments,
} from "./analysis/detectors";
import { CLA_PATTERNS, DCO_PATTERNS, INOUTBOUND_PATTERNS } from "./analysis/patterns";
import { LoadedConfig } from "./config/loader";
import { GitHubMetadataSource } from "./integrations/github/metadata";
import { listCommits, prepareWorkingCopy } from "./integrations/git/repository";
import { parseGitHubRepo, shortenRepoUrl } from "./integrations/git/urls";
import { logger } from "./logger";
import {
  BatchResult,
  CheckedRepository,
  RepositoryDiagnostics,
  RepositoryReport,
  emptyReport,
  freezeReport,
} from "./report/types";

export interface CheckContext {
  config: LoadedConfig;
  /** Client for API-based checks of github.com repositories */
  github: Octokit;
  /** Keep clones in the cache directory instead of a temporary one */
  cache: boolean;
}

function checkEnabled(config: LoadedConfig, check: CheckId): boolean {
  if (!config.isCheckEnabled(check)) {
    logger.info("Check has been disabled", { check });
    return false;
  }
  return true;
}

/**
 * Run all enabled checks on a single repository.
 */
export async function checkRepository(url: string, context: CheckContext): Promise<CheckedRepository> {
  const { config } = context;
  const shortname = shortenRepoUrl(url);
  logger.info("Checking repository", { url });

  let report: RepositoryReport = emptyReport(url, shortname);
  const diagnostics: RepositoryDiagnostics = {
    repoDir: "",
    files: [],
    searchedFiles: { cla: [], dco: [], inoutbound: [] },
    contributors: [],
    impossibleChecks: [],
  };

  const workingCopy = await prepareWorkingCopy(url, {
    cache: context.cache,
    cloneDepth: config.cloneDepth,
  });

  try {
    diagnostics.repoDir = workingCopy.dir;
    const files = listRepositoryFiles(workingCopy.dir, config.files.extra_paths);
    diagnostics.files = files;

    const githubRepo = parseGitHubRepo(url);
    if (githubRepo) {
      const source = new GitHubMetadataSource(context.github, githubRepo);

      if (checkEnabled(config, "cla-dco-pulls")) {
        const pulls = await findClaOrDcoInPulls(source);
        report = { ...report, claPulls: pulls.claPulls, dcoPulls: pulls.dcoPulls };
      }

      if (checkEnabled(config, "contributions")) {
        const contributors = await analyzeContributors(source, config.maxContributors);
        report = { ...report, maintainerDominance: contributors.dominance };
        diagnostics.contributors = contributors.humanContributors;
      }
    } else {
      diagnostics.impossibleChecks.push(...GITHUB_ONLY_CHECKS);
      logger.warn(
        "Repository is not on github.com, therefore CLA/DCO in pull requests and contributor dominance cannot be checked",
        { url }
      );
    }

    if (checkEnabled(config, "cla-files")) {
      const cla = searchDocuments(workingCopy.dir, files, config, CLA_PATTERNS);
      report = { ...report, claFiles: cla.evidence };
      diagnostics.searchedFiles.cla = cla.searchedFiles;
    }

    if (checkEnabled(config, "dco-files")) {
      const dco = searchDocuments(workingCopy.dir, files, config, DCO_PATTERNS);
      report = { ...report, dcoFiles: dco.evidence };
      diagnostics.searchedFiles.dco = dco.searchedFiles;
    }

    if (checkEnabled(config, "inbound-outbound")) {
      const inoutbound = searchDocuments(workingCopy.dir, files, config, INOUTBOUND_PATTERNS);
      report = { ...report, inoutboundFiles: inoutbound.evidence };
      diagnostics.searchedFiles.inoutbound = inoutbound.searchedFiles;
    }

    if (checkEnabled(config, "license-file")) {
      report = { ...report, licenseFiles: findLicenseFiles(files, config) };
    }

    if (checkEnabled(config, "commit-age")) {
      const ages = computeCommitAges(await listCommits(workingCopy.dir));
      report = { ...report, ...ages };
    }
  } finally {
    await workingCopy.cleanup();
  }

  const frozen = freezeReport(report);
  const findings = analyzeReport(frozen, {
    disabledChecks: [...config.disabledChecks, ...diagnostics.impossibleChecks],
    ignoredFlags: config.ignoredFlags,
    thresholds: config.thresholds,
  });

  return { report: frozen, diagnostics, findings };
}

/**
 * Check repositories one after another. Failures are logged and collected.
 */
export async function checkRepositories(urls: readonly string[], context: CheckContext): Promise<BatchResult> {
  const batch: BatchResult = { results: [], failures: [] };

  for (const url of urls) {
    try {
      batch.results.push(await checkRepository(url, context));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error("Checking repository failed", { url, error: message });
      batch.failures.push({ url, error: message });
    }
  }

  return batch;
}
