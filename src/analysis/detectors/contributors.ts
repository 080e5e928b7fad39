/**
 * Contributor statistics: how much the top human contributor dominates the project.
 */

import { logger } from "../../logger";
import { ContributorStat, MaintainerDominance } from "../../report/types";
import { ContributorInfo, RepositoryMetadataSource } from "../../integrations/github/types";
import { DOMINANCE_WINDOW } from "../engine";
import { isBotName } from "../matching";

export interface ContributorAnalysis {
  dominance: MaintainerDominance;
  /** The top contributor and the ones compared against */
  humanContributors: ContributorStat[];
}

/**
 * Remove bot accounts and sort by contribution count, highest first.
 */
export function filterHumanContributors(contributors: readonly ContributorInfo[]): ContributorStat[] {
  const humans: ContributorStat[] = [];

  for (const contributor of contributors) {
    if (contributor.type === "Bot" || isBotName(contributor.login)) {
      logger.debug("Contributor detected as bot, not considered for dominance", {
        login: contributor.login,
      });
      continue;
    }
    humans.push({ login: contributor.login, contributions: contributor.contributions });
  }

  return humans.sort((a, b) => b.contributions - a.contributions);
}

/**
 * Compute the dominance of the top contributor over the next ten.
 *
 * dominance = 1 - (sum of the next 10 contributions) / (top contributions).
 * The value is kept unrounded so that it exceeds 0.75 exactly when the next
 * ten together have less than a quarter of the top contributor's
 * contributions. It is negative when they have more.
 */
export function computeMaintainerDominance(humans: readonly ContributorStat[]): MaintainerDominance {
  if (humans.length <= 1 || humans[0].contributions <= 0) {
    return { kind: "sole-contributor" };
  }

  const top = humans[0].contributions;
  const next = humans
    .slice(1, DOMINANCE_WINDOW + 1)
    .reduce((sum, contributor) => sum + contributor.contributions, 0);

  return { kind: "ratio", value: 1 - next / top };
}

/**
 * Fetch contributors and rate how concentrated their contributions are.
 */
export async function analyzeContributors(
  source: RepositoryMetadataSource,
  limit: number
): Promise<ContributorAnalysis> {
  const contributors = await source.listContributors(limit);
  const humans = filterHumanContributors(contributors);

  return {
    dominance: computeMaintainerDominance(humans),
    humanContributors: humans.slice(0, DOMINANCE_WINDOW + 1),
  };
}
