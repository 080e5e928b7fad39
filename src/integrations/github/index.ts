/**
 * GitHub integration module.
 *
 * This module provides the authenticated API client and the repository
 * metadata the pull-request and contributor detectors read.
 */

export { createGitHubClient, resolveGitHubToken, hasHttpStatus } from "./client";
export { GitHubMetadataSource } from "./metadata";

export type {
  GitHubRepoRef,
  PullRequestInfo,
  CheckRunInfo,
  CommitStatusInfo,
  ContributorInfo,
  RepositoryMetadataSource,
} from "./types";
