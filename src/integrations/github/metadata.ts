/**
 * Repository metadata backed by the GitHub REST API.
 */

import { Octokit } from "octokit";
import {
  CheckRunInfo,
  CommitStatusInfo,
  ContributorInfo,
  GitHubRepoRef,
  PullRequestInfo,
  RepositoryMetadataSource,
} from "./types";

export class GitHubMetadataSource implements RepositoryMetadataSource {
  constructor(
    private readonly octokit: Octokit,
    private readonly ref: GitHubRepoRef
  ) {}

  async getDefaultBranch(): Promise<string> {
    const { data } = await this.octokit.rest.repos.get({ ...this.ref });
    return data.default_branch;
  }

  async findNewestPullRequest(base?: string): Promise<PullRequestInfo | null> {
    const { data } = await this.octokit.rest.pulls.list({
      ...this.ref,
      state: "all",
      sort: "updated",
      direction: "desc",
      per_page: 1,
      ...(base ? { base } : {}),
    });

    const pull = data[0];
    return pull ? { number: pull.number, headSha: pull.head.sha } : null;
  }

  async listCheckRuns(ref: string): Promise<CheckRunInfo[]> {
    const { data } = await this.octokit.rest.checks.listForRef({ ...this.ref, ref, per_page: 100 });
    return data.check_runs.map((run) => ({
      name: run.name,
      title: run.output.title,
      summary: run.output.summary,
      url: run.html_url ?? run.url,
    }));
  }

  async listCommitStatuses(ref: string): Promise<CommitStatusInfo[]> {
    const { data } = await this.octokit.rest.repos.listCommitStatusesForRef({
      ...this.ref,
      ref,
      per_page: 100,
    });
    return data.map((status) => ({
      context: status.context,
      description: status.description,
      url: status.url,
    }));
  }

  async listContributors(limit: number): Promise<ContributorInfo[]> {
    const { data } = await this.octokit.rest.repos.listContributors({
      ...this.ref,
      per_page: limit,
    });
    return data.map((contributor) => ({
      login: contributor.login ?? contributor.name ?? "anonymous",
      type: contributor.type,
      contributions: contributor.contributions,
    }));
  }
}
