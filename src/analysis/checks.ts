/**
 * Check and flag identifiers for repovet.
 *
 * Check ids select which collectors and rules run (`--disable`).
 * Flag kinds select which findings are reported as ignored (`--ignore`).
 * DO NOT rename existing ids - only extend. They are part of the CLI and JSON contract.
 */

export type CheckId =
  | "cla-files"
  | "dco-files"
  | "cla-dco-pulls"
  | "inbound-outbound"
  | "license-file"
  | "contributions"
  | "commit-age";

export type FlagKind =
  | "cla"
  | "dco"
  | "inbound-outbound"
  | "license-file"
  | "contributions"
  | "commit-age";

export type FindingCategory = "Licensing" | "Contributions";

/**
 * Finding severity. Ordered by risk: red > yellow > green.
 */
export type Severity = "red" | "yellow" | "green";

export const ALL_CHECK_IDS: readonly CheckId[] = [
  "cla-files",
  "dco-files",
  "cla-dco-pulls",
  "inbound-outbound",
  "license-file",
  "contributions",
  "commit-age",
];

export const ALL_FLAG_KINDS: readonly FlagKind[] = [
  "cla",
  "dco",
  "inbound-outbound",
  "license-file",
  "contributions",
  "commit-age",
];

export const SEVERITY_RANK: Record<Severity, number> = {
  red: 3,
  yellow: 2,
  green: 1,
};

/**
 * Checks that need the GitHub API and cannot run for repositories hosted elsewhere.
 */
export const GITHUB_ONLY_CHECKS: readonly CheckId[] = ["cla-dco-pulls", "contributions"];

export function isValidCheckId(id: string): id is CheckId {
  return ALL_CHECK_IDS.some((check) => check === id);
}

export function isValidFlagKind(id: string): id is FlagKind {
  return ALL_FLAG_KINDS.some((kind) => kind === id);
}
