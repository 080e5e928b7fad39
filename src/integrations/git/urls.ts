/**
 * Repository URL helpers.
 */

import { GitHubRepoRef } from "../github/types";

/**
 * Convert a repository URL to a short owner/name form.
 * Example: https://github.com/example-org/widgets.git -> example-org/widgets
 */
export function shortenRepoUrl(url: string): string {
  const trimmed = url.trim().replace(/^\/+|\/+$/g, "");
  const name = trimmed.split("/").slice(-2).join("/");
  return name.endsWith(".git") ? name.slice(0, -4) : name;
}

/**
 * Escape a repository URL so it can be used as a directory name on any platform.
 */
export function urlToDirname(url: string): string {
  const withoutScheme = url.replace(/^https?:\/\//, "");
  return withoutScheme.replace(/[^a-zA-Z0-9\-_]/g, "_").slice(0, 260);
}

/**
 * Extract owner and repository name from a github.com URL.
 */
export function parseGitHubRepo(url: string): GitHubRepoRef | null {
  const match = /^(?:https?:\/\/|git@)(?:www\.)?github\.com[/:]([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/i.exec(
    url.trim()
  );
  if (!match) return null;
  return { owner: match[1], repo: match[2] };
}
