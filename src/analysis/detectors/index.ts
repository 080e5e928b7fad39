/**
 * Detectors collect the evidence a RepositoryReport is made of.
 */

export { listRepositoryFiles, searchDocuments, findLicenseFiles } from "./files";
export type { DocumentSearchResult } from "./files";
export { findClaOrDcoInPulls } from "./pulls";
export type { PullSearchResult } from "./pulls";
export {
  analyzeContributors,
  computeMaintainerDominance,
  filterHumanContributors,
} from "./contributors";
export type { ContributorAnalysis } from "./contributors";
export { computeCommitAges, calendarDaysBetween } from "./commits";
export type { CommitInfo, CommitAges } from "./commits";
