#!/usr/bin/env node
/**
 * repovet command line interface.
 *
 * Reports go to stdout, logs to stderr. Exit codes:
 *   0 - all repositories checked (and no red flag with --fail-on-red)
 *   1 - configuration error, unreadable list, every repository failed,
 *       or a red flag with --fail-on-red
 *   2 - invalid usage
 */

import * as fs from "fs";
import * as path from "path";
import chalk from "chalk";
import { Command, Option } from "commander";
import { ALL_CHECK_IDS, ALL_FLAG_KINDS } from "./analysis/checks";
import { hasRedFlags } from "./analysis/engine";
import { checkRepositories } from "./checker";
import { LoadedConfig, loadConfig, mergeCliSelections } from "./config/loader";
import { CONFIG_FILE_NAME } from "./config/schema";
import { ConfigValidationError, RepoListError } from "./errors";
import { createGitHubClient, resolveGitHubToken } from "./integrations/github";
import { cleanCache, getCacheRoot } from "./integrations/git/cache";
import { logger, setLogLevel } from "./logger";
import { readRepoList } from "./repo-list";
import { renderJsonReport } from "./report/json";
import { formatTextReport } from "./report/text";

export type CliOptions = {
  repository?: string;
  repoFile?: string;
  json: boolean;
  verbose: boolean;
  debug: boolean;
  cache: boolean;
  token?: string;
  disable: string[];
  ignore: string[];
  config?: string;
  failOnRed: boolean;
  cacheClean: boolean;
  version: boolean;
};

export function readPackageVersion(): string {
  const pkgPath = path.join(__dirname, "..", "package.json");
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

export function buildProgram(): Command {
  return new Command()
    .name("repovet")
    .description("Check open source repositories for licensing and contribution red flags")
    .option("-r, --repository <url>", "Repository to check")
    .option("-f, --repo-file <file>", "File with one repository URL per line, - for stdin")
    .option("-j, --json", "Print the report as JSON", false)
    .option("-v, --verbose", "Print informational logs", false)
    .option("--debug", "Print debug logs, the JSON report with diagnostics and the text report", false)
    .option("-c, --cache", "Keep cloned repositories in the cache directory", false)
    .option("-t, --token <token>", "GitHub token (default: GITHUB_TOKEN)")
    .addOption(
      new Option("-d, --disable <checks...>", "Checks not to run").choices(ALL_CHECK_IDS).default([])
    )
    .addOption(
      new Option("-i, --ignore <flags...>", "Flag kinds to report as ignored").choices(ALL_FLAG_KINDS).default([])
    )
    .option("--config <path>", `Configuration file (default: ./${CONFIG_FILE_NAME} when present)`)
    .option("--fail-on-red", "Exit with code 1 when a red flag was found", false)
    .option("--cache-clean", "Delete all cached repositories and exit", false)
    .option("--version", "Print the version and exit", false);
}

function loadCliConfig(options: CliOptions): LoadedConfig {
  const configPath = options.config ?? path.join(process.cwd(), CONFIG_FILE_NAME);
  const fileConfig = loadConfig(configPath, options.config !== undefined);
  return mergeCliSelections(fileConfig, { disable: options.disable, ignore: options.ignore });
}

/**
 * Run the CLI and resolve with the exit code.
 */
export async function run(argv: readonly string[]): Promise<number> {
  const program = buildProgram();
  program.parse([...argv]);
  const options = program.opts<CliOptions>();

  if (options.debug) {
    setLogLevel("debug");
  } else if (options.verbose) {
    setLogLevel("info");
  }

  const modes = [options.repository, options.repoFile, options.cacheClean, options.version].filter(Boolean);
  if (modes.length !== 1) {
    console.error("Exactly one of --repository, --repo-file, --cache-clean or --version is required\n");
    console.error(program.helpInformation());
    return 2;
  }

  if (options.version) {
    console.log(readPackageVersion());
    return 0;
  }

  if (options.cacheClean) {
    const deleted = await cleanCache();
    console.log(deleted ? `Deleted cache in ${getCacheRoot()}` : `No cache found in ${getCacheRoot()}`);
    return 0;
  }

  let config: LoadedConfig;
  let urls: string[];
  try {
    config = loadCliConfig(options);
    urls = readRepoList(options.repository, options.repoFile);
  } catch (err) {
    if (err instanceof ConfigValidationError || err instanceof RepoListError) {
      logger.error(err.message);
      return 1;
    }
    throw err;
  }

  if (urls.length === 0) {
    logger.error("No repositories to check");
    return 1;
  }

  const github = await createGitHubClient(resolveGitHubToken(options.token));
  const batch = await checkRepositories(urls, { config, github, cache: options.cache });

  // Debug mode prints both: JSON with diagnostics, then the text report
  if (options.json || options.debug) {
    console.log(
      renderJsonReport(batch, {
        disabledChecks: config.disabledChecks,
        ignoredFlags: config.ignoredFlags,
        debug: options.debug,
      })
    );
  }
  if ((!options.json || options.debug) && batch.results.length > 0) {
    console.log(formatTextReport(batch.results, { color: chalk.level > 0 }));
  }

  if (batch.results.length === 0) return 1;
  if (options.failOnRed && batch.results.some((result) => hasRedFlags(result.findings))) return 1;
  return 0;
}

if (require.main === module) {
  run(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error("repovet failed", { error: err instanceof Error ? err.message : String(err) });
      process.exitCode = 1;
    });
}
