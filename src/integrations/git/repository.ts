/**
 * Working copies of remote repositories.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { CommitInfo } from "../../analysis/detectors/commits";
import { logger } from "../../logger";
import { getCacheDir } from "./cache";
import { runGit } from "./runner";

export interface WorkingCopy {
  dir: string;
  /** Removes the working copy unless it lives in the cache */
  cleanup(): Promise<void>;
}

export interface WorkingCopyOptions {
  cache: boolean;
  cloneDepth: number;
}

// Unit separator, cannot appear in names or e-mail addresses
const FIELD_SEPARATOR = "\x1f";

/**
 * Clone a repository into an empty directory, or update an existing clone to
 * the newest commit of its branch.
 */
export async function cloneOrPullRepository(url: string, dir: string, cloneDepth: number): Promise<void> {
  const entries = await fs.readdir(dir);

  if (entries.length === 0) {
    await runGit(["clone", `--depth=${cloneDepth}`, "--", url, dir]);
    logger.info("Repository has been cloned", { url, dir });
    return;
  }

  const { stdout: status } = await runGit(["status", "--porcelain"], dir);
  const branch = (await runGit(["rev-parse", "--abbrev-ref", "HEAD"], dir)).stdout.trim();
  if (branch === "HEAD" || status.trim() !== "") {
    logger.error("HEAD of cached repository is detached or dirty. Did you make manual changes in it?", {
      url,
      dir,
    });
  }

  try {
    await runGit(["fetch", "origin"], dir);
    // Assumes the project did not switch its main branch since it was cached
    await runGit(["reset", "--hard", `origin/${branch}`], dir);
    logger.info("Cached repository has been updated", { url, dir });
  } catch (error) {
    logger.error("Fetching and resetting to the newest commits failed, using cached state", {
      url,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Provide a working copy of the repository, either in a temporary directory
 * or in the cache.
 */
export async function prepareWorkingCopy(url: string, options: WorkingCopyOptions): Promise<WorkingCopy> {
  if (options.cache) {
    const dir = await getCacheDir(url);
    await cloneOrPullRepository(url, dir, options.cloneDepth);
    return { dir, cleanup: async () => undefined };
  }

  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "repovet-"));
  const cleanup = async (): Promise<void> => {
    logger.info("Deleting temporary directory of the cloned repository", { dir });
    await fs.rm(dir, { recursive: true, force: true });
  };

  try {
    await cloneOrPullRepository(url, dir, options.cloneDepth);
  } catch (error) {
    await cleanup();
    throw error;
  }

  return { dir, cleanup };
}

/**
 * Parse `git log` output produced with the format used by listCommits.
 */
export function parseGitLog(output: string): CommitInfo[] {
  return output
    .split("\n")
    .filter((line) => line.trim() !== "")
    .map((line) => {
      const [name = "", email = "", timestamp = "0", hash = ""] = line.split(FIELD_SEPARATOR);
      return { name, email, date: new Date(Number(timestamp) * 1000), hash };
    });
}

/**
 * All commits reachable from HEAD, newest first. An empty repository has none.
 */
export async function listCommits(dir: string): Promise<CommitInfo[]> {
  const format = ["%an", "%ae", "%at", "%H"].join("%x1f");
  try {
    const { stdout } = await runGit(["log", `--format=${format}`, "HEAD"], dir);
    return parseGitLog(stdout);
  } catch (error) {
    const { stdout } = await runGit(["rev-list", "--all", "--max-count=1"], dir);
    if (stdout.trim() === "") {
      logger.warn("Repository has no commits", { dir });
      return [];
    }
    throw error;
  }
}
