/**
 * Commit age: days since the newest commit made by a human and by a bot.
 */

import { logger } from "../../logger";
import { isBotName } from "../matching";

export interface CommitInfo {
  name: string;
  email: string;
  date: Date;
  hash: string;
}

export interface CommitAges {
  daysSinceLastHumanCommit: number | null;
  daysSinceLastBotCommit: number | null;
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Whole days between the UTC calendar dates of two instants.
 */
export function calendarDaysBetween(from: Date, to: Date): number {
  const fromDay = Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate());
  const toDay = Date.UTC(to.getUTCFullYear(), to.getUTCMonth(), to.getUTCDate());
  return Math.round((toDay - fromDay) / MS_PER_DAY);
}

function daysSinceNewest(commits: readonly CommitInfo[], now: Date): number | null {
  if (commits.length === 0) return null;

  const newest = commits.reduce((latest, commit) => (commit.date > latest.date ? commit : latest));
  logger.debug("Newest detected commit", { date: newest.date.toISOString(), author: newest.name });
  return calendarDaysBetween(newest.date, now);
}

/**
 * Split commits by bot authorship and compute the age of the newest commit of each group.
 */
export function computeCommitAges(commits: readonly CommitInfo[], now: Date = new Date()): CommitAges {
  const human: CommitInfo[] = [];
  const bot: CommitInfo[] = [];

  for (const commit of commits) {
    if (isBotName(commit.name)) {
      bot.push(commit);
    } else {
      human.push(commit);
    }
  }

  return {
    daysSinceLastHumanCommit: daysSinceNewest(human, now),
    daysSinceLastBotCommit: daysSinceNewest(bot, now),
  };
}
