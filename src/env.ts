import dotenv from "dotenv";

dotenv.config();

export const config = {
  // Personal token; lifts the GitHub API limits for anonymous requests
  GITHUB_TOKEN: process.env.GITHUB_TOKEN,
  // Overrides the directory cached clones are kept in
  REPOVET_CACHE_DIR: process.env.REPOVET_CACHE_DIR,
  XDG_CACHE_HOME: process.env.XDG_CACHE_HOME,
  LOG_FORMAT: process.env.LOG_FORMAT === "json" ? "json" : "text",
};
