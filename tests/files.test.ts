/**
 * Tests for the file-based detectors, run against tests/fixtures/sample-repo.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { findLicenseFiles, listRepositoryFiles, searchDocuments } from "../src/analysis/detectors";
import { CLA_PATTERNS, DCO_PATTERNS, INOUTBOUND_PATTERNS } from "../src/analysis/patterns";
import { createDefaultConfig } from "../src/config/loader";

const SAMPLE_REPO = path.join(__dirname, "fixtures/sample-repo");

describe("listRepositoryFiles", () => {
  it("should list first-level entries and the .github directory, sorted", () => {
    expect(listRepositoryFiles(SAMPLE_REPO, [".github", "docs"])).toEqual([
      ".github",
      ".github/CONTRIBUTING.md",
      "CONTRIBUTING.adoc",
      "CONTRIBUTING.md",
      "LICENSES",
      "README.adoc",
      "README.md",
      "src",
    ]);
  });

  it("should only list the root without extra directories", () => {
    expect(listRepositoryFiles(SAMPLE_REPO)).not.toContain(".github/CONTRIBUTING.md");
  });
});

describe("searchDocuments", () => {
  const config = createDefaultConfig();
  const files = listRepositoryFiles(SAMPLE_REPO, config.files.extra_paths);

  it("should search README and CONTRIBUTING files in any directory", () => {
    const result = searchDocuments(SAMPLE_REPO, files, config, CLA_PATTERNS);

    expect(result.searchedFiles).toEqual([
      ".github/CONTRIBUTING.md",
      "CONTRIBUTING.adoc",
      "CONTRIBUTING.md",
      "README.adoc",
      "README.md",
    ]);
  });

  it("should find CLA mentions", () => {
    const { evidence } = searchDocuments(SAMPLE_REPO, files, config, CLA_PATTERNS);

    expect(evidence).toEqual([
      { file: "CONTRIBUTING.adoc", indicators: ["You have to sign a CLA in order to contribute"] },
      { file: "README.md", indicators: ["You have to sign a CLA in order to contribute"] },
    ]);
  });

  it("should find DCO mentions", () => {
    const { evidence } = searchDocuments(SAMPLE_REPO, files, config, DCO_PATTERNS);

    expect(evidence).toEqual([
      { file: ".github/CONTRIBUTING.md", indicators: ["Every commit needs a Signed-off-by trailer."] },
      { file: "CONTRIBUTING.md", indicators: ["A Developer Certificate of Origin is required"] },
    ]);
  });

  it("should find inbound=outbound mentions", () => {
    const { evidence } = searchDocuments(SAMPLE_REPO, files, config, INOUTBOUND_PATTERNS);

    expect(evidence).toEqual([
      {
        file: "README.adoc",
        indicators: ["This project is covered under the simple inbound= outbound licensing rule."],
      },
    ]);
  });

  describe("with unusual working copies", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "repovet-files-"));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("should skip directories named like documents and never list .git", () => {
      fs.mkdirSync(path.join(tmpDir, ".git"));
      fs.mkdirSync(path.join(tmpDir, "README"));
      fs.writeFileSync(path.join(tmpDir, "contributing"), "Sign-offs follow the DCO\n");

      const listed = listRepositoryFiles(tmpDir, [".github"]);
      const result = searchDocuments(tmpDir, listed, config, DCO_PATTERNS);

      expect(listed).toEqual(["README", "contributing"]);
      expect(result).toEqual({
        searchedFiles: ["README", "contributing"],
        evidence: [{ file: "contributing", indicators: ["Sign-offs follow the DCO"] }],
      });
    });

    it("should skip a document that is a dangling symlink", () => {
      fs.symlinkSync(path.join(tmpDir, "missing-target"), path.join(tmpDir, "README.md"));
      fs.writeFileSync(path.join(tmpDir, "CONTRIBUTING.md"), "Sign-offs follow the DCO\n");

      const listed = listRepositoryFiles(tmpDir);
      const result = searchDocuments(tmpDir, listed, config, DCO_PATTERNS);

      expect(listed).toEqual(["CONTRIBUTING.md", "README.md"]);
      expect(result).toEqual({
        searchedFiles: ["CONTRIBUTING.md", "README.md"],
        evidence: [{ file: "CONTRIBUTING.md", indicators: ["Sign-offs follow the DCO"] }],
      });
    });
  });
});

describe("findLicenseFiles", () => {
  const config = createDefaultConfig();

  it("should recognize a REUSE-style LICENSES directory", () => {
    expect(findLicenseFiles(listRepositoryFiles(SAMPLE_REPO), config)).toEqual(["LICENSES"]);
  });

  it("should match license names case-sensitively", () => {
    const files = ["COPYING.LESSER", "License.md", "LICENSE", "license.txt", "docs/LICENSE"];

    expect(findLicenseFiles(files, config)).toEqual(["COPYING.LESSER", "License.md", "LICENSE"]);
  });
});
