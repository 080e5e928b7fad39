/**
 * Pull-request detectors.
 *
 * CLA and DCO requirements are usually enforced by status checks on pull
 * requests. We look at the newest pull request against the default branch,
 * where such checks are almost certainly active, and match the checks of its
 * head commit against the keyword lists.
 */

import { logger } from "../../logger";
import { PullEvidence } from "../../report/types";
import { RepositoryMetadataSource } from "../../integrations/github/types";
import { findPatternsInList } from "../matching";
import { CLA_PATTERNS, DCO_PATTERNS } from "../patterns";

export interface PullSearchResult {
  claPulls: PullEvidence[];
  dcoPulls: PullEvidence[];
}

/**
 * Search the status checks of the newest pull request for CLA and DCO indicators.
 */
export async function findClaOrDcoInPulls(source: RepositoryMetadataSource): Promise<PullSearchResult> {
  const result: PullSearchResult = { claPulls: [], dcoPulls: [] };

  const baseBranch = await source.getDefaultBranch();
  const pull =
    (await source.findNewestPullRequest(baseBranch)) ??
    (await findWithoutBase(source, baseBranch));
  if (!pull) {
    logger.warn("Searching for pull requests failed, probably because there are none");
    return result;
  }

  logger.debug("Checking pull request", { pullRequest: pull.number, sha: pull.headSha });

  const addMatches = (
    origin: PullEvidence["origin"],
    url: string,
    fields: Array<string | null>
  ): void => {
    const cla = findPatternsInList(CLA_PATTERNS, ...fields);
    if (cla.length > 0) {
      result.claPulls.push({ pullRequest: pull.number, origin, url, indicators: cla });
    }
    const dco = findPatternsInList(DCO_PATTERNS, ...fields);
    if (dco.length > 0) {
      result.dcoPulls.push({ pullRequest: pull.number, origin, url, indicators: dco });
    }
  };

  for (const check of await source.listCheckRuns(pull.headSha)) {
    logger.debug("Checking check run", { url: check.url });
    addMatches("action", check.url, [check.name, check.title, check.summary]);
  }

  for (const status of await source.listCommitStatuses(pull.headSha)) {
    logger.debug("Checking status", { url: status.url });
    addMatches("status", status.url, [status.description, status.context]);
  }

  return result;
}

async function findWithoutBase(source: RepositoryMetadataSource, baseBranch: string) {
  logger.debug("No pull request against base branch, trying without base", { base: baseBranch });
  return source.findNewestPullRequest();
}
