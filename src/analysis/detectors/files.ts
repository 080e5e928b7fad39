/**
 * File-based detectors.
 *
 * Work on a local working copy: list the first-level files, search
 * README/CONTRIBUTING documents for licensing keywords and find license files.
 */

import * as fs from "fs";
import * as path from "path";
import { LoadedConfig } from "../../config/loader";
import { FileEvidence } from "../../report/types";
import { logger } from "../../logger";
import { findPatternsInList, readLines } from "../matching";

export interface DocumentSearchResult {
  /** Documents that were read, in file-list order */
  searchedFiles: string[];
  /** One entry per document with at least one match */
  evidence: FileEvidence[];
}

/**
 * List the first-level entries of a directory, plus the entries of extra
 * subdirectories prefixed with their directory name. Sorted by code point.
 * The .git directory is never listed.
 */
export function listRepositoryFiles(directory: string, extraDirs: readonly string[] = []): string[] {
  const files = fs.readdirSync(directory).filter((entry) => entry !== ".git");

  for (const extraDir of extraDirs) {
    const extraPath = path.join(directory, extraDir);
    if (fs.existsSync(extraPath) && fs.statSync(extraPath).isDirectory()) {
      files.push(...fs.readdirSync(extraPath).map((entry) => `${extraDir}/${entry}`));
    }
  }

  return files.sort();
}

/**
 * Search the documents among `files` for lines matching any of the patterns.
 */
export function searchDocuments(
  repoDir: string,
  files: readonly string[],
  config: LoadedConfig,
  patterns: readonly RegExp[]
): DocumentSearchResult {
  const searchedFiles = files.filter((file) => config.isDocumentFile(file));
  const evidence: FileEvidence[] = [];

  for (const file of searchedFiles) {
    const filePath = path.join(repoDir, file);
    const stat = fs.statSync(filePath, { throwIfNoEntry: false });
    if (!stat?.isFile()) {
      logger.debug("Skipping document candidate that is not a file", { file });
      continue;
    }

    const indicators = findPatternsInList(patterns, ...readLines(filePath));
    if (indicators.length > 0) {
      evidence.push({ file, indicators });
    }
  }

  return { searchedFiles, evidence };
}

/**
 * Entries of the file list that declare the license of the project,
 * e.g. LICENSE, COPYING or a REUSE-style LICENSES directory.
 */
export function findLicenseFiles(files: readonly string[], config: LoadedConfig): string[] {
  return files.filter((file) => config.isLicenseFile(file));
}
