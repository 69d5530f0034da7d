/**
 * Error types raised by the git data-access layer.
 *
 * Only malformed input and missing binaries throw. Non-zero exits and stderr
 * output are returned to callers, which decide whether they matter.
 */

import type { JobResult } from "./models.js";

export class InvalidVersionError extends Error {
  constructor(readonly version: string) {
    super(`Invalid git version: ${version}`);
    this.name = "InvalidVersionError";
  }
}

export class GitNotFoundError extends Error {
  constructor(readonly command: string) {
    super(`${command} command not found. Please install ${command}.`);
    this.name = "GitNotFoundError";
  }
}

export class NotAGitRepositoryError extends Error {
  constructor(readonly path: string) {
    super(`Not a git repository: ${path}`);
    this.name = "NotAGitRepositoryError";
  }
}

export class GitCommandError extends Error {
  constructor(
    readonly args: string[],
    readonly exitCode: number,
    readonly stderr: string,
  ) {
    super(
      `Git command failed (exit ${exitCode}): git ${args.join(" ")}` +
        (stderr.trim() ? `\n${stderr.trim()}` : ""),
    );
    this.name = "GitCommandError";
  }
}

/**
 * Throw a GitCommandError when `result` exited non-zero.
 */
export function assertSuccess(args: string[], result: JobResult): JobResult {
  if (result.exitCode !== 0) {
    throw new GitCommandError(args, result.exitCode, result.stderr);
  }
  return result;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
