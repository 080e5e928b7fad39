/**
 * Error types raised by repovet.
 */

export class InvalidReportError extends Error {
  constructor(field: string) {
    super(`Repository report is missing the mandatory field "${field}".`);
    this.name = "InvalidReportError";
  }
}

export class ConfigValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigValidationError";
  }
}

export class GitCommandError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(args: readonly string[], exitCode: number | null, stderr: string) {
    const command = `git ${args.join(" ")}`;
    super(`${command} exited with code ${exitCode ?? "unknown"}: ${stderr.trim() || "no output"}`);
    this.name = "GitCommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class RepoListError extends Error {
  constructor(source: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Could not read repository list from ${source}${detail}`);
    this.name = "RepoListError";
  }
}
