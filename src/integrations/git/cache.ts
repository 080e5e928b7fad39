/**
 * Cache directory for cloned repositories.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { config } from "../../env";
import { logger } from "../../logger";
import { urlToDirname } from "./urls";

const CACHE_NAME = "repovet";

/**
 * Root of the clone cache: REPOVET_CACHE_DIR, else the XDG cache home, else ~/.cache.
 */
export function getCacheRoot(): string {
  if (config.REPOVET_CACHE_DIR) return config.REPOVET_CACHE_DIR;
  const base = config.XDG_CACHE_HOME || path.join(os.homedir(), ".cache");
  return path.join(base, CACHE_NAME);
}

/**
 * Create (if needed) and return the cache directory of one repository.
 */
export async function getCacheDir(url: string): Promise<string> {
  const cacheDir = path.join(getCacheRoot(), urlToDirname(url));
  await fs.mkdir(cacheDir, { recursive: true });
  return cacheDir;
}

/**
 * Delete the whole cache. Returns false when there was nothing to delete.
 */
export async function cleanCache(): Promise<boolean> {
  const cacheRoot = getCacheRoot();
  logger.debug("Attempting to delete cache", { path: cacheRoot });

  try {
    await fs.access(cacheRoot);
  } catch {
    return false;
  }

  await fs.rm(cacheRoot, { recursive: true, force: true });
  return true;
}
