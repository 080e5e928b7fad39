/**
 * Runs the git executable.
 */

import { spawn } from "child_process";
import { GitCommandError } from "../../errors";
import { logger } from "../../logger";

export interface GitRunResult {
  stdout: string;
  stderr: string;
  durationMs: number;
}

/**
 * Run git with the given arguments and resolve with its output.
 * Rejects with GitCommandError on a non-zero exit code.
 */
export async function runGit(args: readonly string[], cwd?: string): Promise<GitRunResult> {
  logger.debug("Running git", { args: args.join(" "), cwd });

  return new Promise((resolve, reject) => {
    const start = Date.now();
    const proc = spawn("git", [...args], {
      cwd,
      stdio: ["ignore", "pipe", "pipe"],
      env: { ...process.env, GIT_TERMINAL_PROMPT: "0" },
    });
    let stdout = "";
    let stderr = "";
    proc.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    proc.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    proc.on("error", (err) => reject(err));
    proc.on("close", (code) => {
      if (code === 0) {
        resolve({ stdout, stderr, durationMs: Date.now() - start });
      } else {
        reject(new GitCommandError(args, code, stderr));
      }
    });
  });
}
