import {
  CheckRunInfo,
  CommitStatusInfo,
  ContributorInfo,
  PullRequestInfo,
  RepositoryMetadataSource,
} from "../../src/integrations/github/types";

export interface FakeRepositoryData {
  defaultBranch?: string;
  /** Pull requests by base branch; the key "*" answers requests without base */
  pulls?: Record<string, PullRequestInfo>;
  checkRuns?: CheckRunInfo[];
  statuses?: CommitStatusInfo[];
  contributors?: ContributorInfo[];
}

/**
 * In-memory RepositoryMetadataSource that records the calls it receives.
 */
export class FakeMetadataSource implements RepositoryMetadataSource {
  readonly calls: string[] = [];

  constructor(private readonly data: FakeRepositoryData = {}) {}

  async getDefaultBranch(): Promise<string> {
    this.calls.push("getDefaultBranch");
    return this.data.defaultBranch ?? "main";
  }

  async findNewestPullRequest(base?: string): Promise<PullRequestInfo | null> {
    this.calls.push(`findNewestPullRequest:${base ?? "*"}`);
    return this.data.pulls?.[base ?? "*"] ?? null;
  }

  async listCheckRuns(ref: string): Promise<CheckRunInfo[]> {
    this.calls.push(`listCheckRuns:${ref}`);
    return this.data.checkRuns ?? [];
  }

  async listCommitStatuses(ref: string): Promise<CommitStatusInfo[]> {
    this.calls.push(`listCommitStatuses:${ref}`);
    return this.data.statuses ?? [];
  }

  async listContributors(limit: number): Promise<ContributorInfo[]> {
    this.calls.push(`listContributors:${limit}`);
    return (this.data.contributors ?? []).slice(0, limit);
  }
}
