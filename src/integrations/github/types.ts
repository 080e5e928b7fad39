/**
 * Types for the GitHub integration.
 */

/**
 * Owner and name of a GitHub repository.
 */
export interface GitHubRepoRef {
  owner: string;
  repo: string;
}

export interface PullRequestInfo {
  number: number;
  /** SHA of the newest commit of the pull request */
  headSha: string;
}

/**
 * A check run (usually a GitHub Action) attached to a commit.
 */
export interface CheckRunInfo {
  name: string;
  title: string | null;
  summary: string | null;
  url: string;
}

/**
 * A commit status, e.g. set by an external CLA service.
 */
export interface CommitStatusInfo {
  context: string;
  description: string | null;
  url: string;
}

export interface ContributorInfo {
  login: string;
  /** "User", "Bot" or "Anonymous" */
  type: string;
  contributions: number;
}

/**
 * The repository metadata the detectors need, bound to one repository.
 */
export interface RepositoryMetadataSource {
  getDefaultBranch(): Promise<string>;

  /**
   * Most recently updated pull request in any state, optionally restricted to a base branch.
   */
  findNewestPullRequest(base?: string): Promise<PullRequestInfo | null>;

  listCheckRuns(ref: string): Promise<CheckRunInfo[]>;

  listCommitStatuses(ref: string): Promise<CommitStatusInfo[]>;

  /**
   * Contributors ordered by contribution count, highest first.
   */
  listContributors(limit: number): Promise<ContributorInfo[]>;
}
