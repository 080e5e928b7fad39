import * as fs from "fs";
import { RepoListError } from "./errors";

/**
 * Parse a repository list: one URL per line, blank lines and `#` comments skipped.
 */
export function parseRepoList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

/**
 * Collect the repositories to check from a single URL and/or a list file.
 * A file name of `-` reads the list from stdin.
 */
export function readRepoList(repository?: string, repoFile?: string): string[] {
  const urls: string[] = [];
  if (repository) urls.push(repository.trim());

  if (repoFile) {
    const source = repoFile === "-" ? "stdin" : repoFile;
    let content: string;
    try {
      content = fs.readFileSync(repoFile === "-" ? 0 : repoFile, "utf-8");
    } catch (err) {
      throw new RepoListError(source, err);
    }
    urls.push(...parseRepoList(content));
  }

  return urls;
}
