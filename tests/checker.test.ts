/**
 * Tests for the repository checker. Git and the GitHub API are replaced by
 * the sample fixture repository and an in-memory metadata source.
 */

import * as path from "path";
import { Octokit } from "octokit";
import { checkRepositories, checkRepository, CheckContext } from "../src/checker";
import { createDefaultConfig, mergeCliSelections } from "../src/config/loader";
import { listCommits, prepareWorkingCopy } from "../src/integrations/git/repository";
import { GitHubMetadataSource } from "../src/integrations/github/metadata";
import { FakeMetadataSource } from "./helpers/fakeMetadataSource";

jest.mock("../src/integrations/git/repository", () => ({
  prepareWorkingCopy: jest.fn(),
  listCommits: jest.fn(),
}));

let mockSource: FakeMetadataSource;
jest.mock("../src/integrations/github/metadata", () => ({
  GitHubMetadataSource: jest.fn().mockImplementation(() => mockSource),
}));

const SAMPLE_REPO = path.join(__dirname, "fixtures/sample-repo");
const DAY_MS = 24 * 60 * 60 * 1000;

describe("checkRepository", () => {
  const cleanup = jest.fn(async () => undefined);
  let consoleSpy: jest.SpyInstance;
  let context: CheckContext;

  beforeEach(() => {
    jest.clearAllMocks();
    consoleSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    mockSource = new FakeMetadataSource({
      contributors: [
        { login: "alice", type: "User", contributions: 10 },
        { login: "bob", type: "User", contributions: 6 },
        { login: "dependabot[bot]", type: "Bot", contributions: 40 },
      ],
    });
    jest.mocked(prepareWorkingCopy).mockResolvedValue({ dir: SAMPLE_REPO, cleanup });
    jest.mocked(listCommits).mockResolvedValue([
      { name: "Alice", email: "alice@example.test", date: new Date(Date.now() - 2 * DAY_MS), hash: "a1" },
    ]);
    context = { config: createDefaultConfig(), github: new Octokit(), cache: false };
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  it("should run all checks for a github.com repository", async () => {
    const result = await checkRepository("https://github.com/example-org/widgets", context);

    expect(prepareWorkingCopy).toHaveBeenCalledWith("https://github.com/example-org/widgets", {
      cache: false,
      cloneDepth: 100,
    });
    expect(GitHubMetadataSource).toHaveBeenCalledWith(context.github, {
      owner: "example-org",
      repo: "widgets",
    });
    expect(result.report.shortname).toBe("example-org/widgets");
    expect(result.report.licenseFiles).toEqual(["LICENSES"]);
    expect(result.report.maintainerDominance).toEqual({ kind: "ratio", value: 0.4 });
    expect(result.report.daysSinceLastHumanCommit).toBe(2);
    expect(result.findings.map((finding) => finding.flag)).toEqual([
      "cla",
      "cla",
      "dco",
      "dco",
      "inbound=outbound",
      "distributed-contributions",
      "actively-developed",
    ]);
    expect(result.diagnostics.contributors).toEqual([
      { login: "alice", contributions: 10 },
      { login: "bob", contributions: 6 },
    ]);
    expect(result.diagnostics.impossibleChecks).toEqual([]);
    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  it("should freeze the report", async () => {
    const result = await checkRepository("https://github.com/example-org/widgets", context);

    expect(Object.isFrozen(result.report)).toBe(true);
    expect(Object.isFrozen(result.report.claFiles)).toBe(true);
  });

  it("should skip API checks for repositories hosted elsewhere", async () => {
    const result = await checkRepository("https://codeberg.org/team/lib", context);

    expect(GitHubMetadataSource).not.toHaveBeenCalled();
    expect(result.diagnostics.impossibleChecks).toEqual(["cla-dco-pulls", "contributions"]);
    expect(result.findings.some((finding) => finding.check === "contributions")).toBe(false);
    expect(result.findings.some((finding) => finding.check === "commit-age")).toBe(true);
  });

  it("should not collect evidence for disabled checks", async () => {
    context.config = mergeCliSelections(createDefaultConfig(), { disable: ["commit-age", "contributions"] });

    const result = await checkRepository("https://github.com/example-org/widgets", context);

    expect(listCommits).not.toHaveBeenCalled();
    expect(mockSource.calls).not.toContain("listContributors:30");
    expect(result.report.daysSinceLastHumanCommit).toBeNull();
    expect(result.findings.some((finding) => finding.check === "commit-age")).toBe(false);
  });

  it("should remove the working copy when a collector fails", async () => {
    jest.mocked(listCommits).mockRejectedValue(new Error("git log failed"));

    await expect(checkRepository("https://github.com/example-org/widgets", context)).rejects.toThrow(
      "git log failed"
    );
    expect(cleanup).toHaveBeenCalledTimes(1);
  });

  describe("checkRepositories", () => {
    it("should record failures and continue with the next repository", async () => {
      jest
        .mocked(prepareWorkingCopy)
        .mockRejectedValueOnce(new Error("clone failed"))
        .mockResolvedValueOnce({ dir: SAMPLE_REPO, cleanup });

      const batch = await checkRepositories(
        ["https://github.com/example-org/missing", "https://github.com/example-org/widgets"],
        context
      );

      expect(batch.failures).toEqual([{ url: "https://github.com/example-org/missing", error: "clone failed" }]);
      expect(batch.results.map((result) => result.report.url)).toEqual([
        "https://github.com/example-org/widgets",
      ]);
    });
  });
});
