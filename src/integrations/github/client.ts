/**
 * GitHub API client creation and authentication.
 */

import { Octokit } from "octokit";
import { config } from "../../env";
import { logger } from "../../logger";

/**
 * Pick the token to use: the command line argument wins over GITHUB_TOKEN.
 */
export function resolveGitHubToken(
  cliToken: string | undefined,
  envToken: string | undefined = config.GITHUB_TOKEN
): string | undefined {
  if (cliToken) return cliToken;
  if (envToken) return envToken;
  return undefined;
}

/**
 * Whether an error thrown by octokit carries an HTTP status.
 */
export function hasHttpStatus(error: unknown): error is { status: number } {
  return (
    typeof error === "object" &&
    error !== null &&
    "status" in error &&
    typeof error.status === "number"
  );
}

function buildOctokit(token?: string): Octokit {
  return new Octokit({
    auth: token,
    throttle: {
      onRateLimit: (
        retryAfter: number,
        options: { method: string; url: string },
        _octokit: Octokit,
        retryCount: number
      ) => {
        logger.warn("GitHub API rate limit exceeded. Consider using a token (-t) which lifts API limits", {
          request: `${options.method} ${options.url}`,
          retryAfterSeconds: retryAfter,
        });
        // Wait for the reset once, then give up
        return retryCount < 1;
      },
      onSecondaryRateLimit: (retryAfter: number, options: { method: string; url: string }) => {
        logger.warn("GitHub API secondary rate limit hit", {
          request: `${options.method} ${options.url}`,
          retryAfterSeconds: retryAfter,
        });
        return false;
      },
    },
  });
}

/**
 * Create an Octokit client, authenticated when a token is given.
 *
 * A token is verified with one request. An invalid token falls back to an
 * anonymous client instead of failing every later request.
 */
export async function createGitHubClient(token?: string): Promise<Octokit> {
  if (!token) {
    logger.warn(
      "No token for GitHub set. GitHub API limits for unauthorized requests are very low " +
        "so you may quickly run into waiting times. Use --token or set GITHUB_TOKEN to fix this."
    );
    return buildOctokit();
  }

  const octokit = buildOctokit(token);
  try {
    const { data } = await octokit.rest.users.getAuthenticated();
    logger.debug("Authenticated with GitHub", { login: data.login });
    return octokit;
  } catch (error) {
    if (hasHttpStatus(error) && error.status === 401) {
      logger.error("The provided GitHub token seems to be invalid. Continuing without authentication");
      return buildOctokit();
    }
    throw error;
  }
}
