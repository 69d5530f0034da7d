/**
 * Git version parsing and feature gating.
 */

import { InvalidVersionError } from "./errors.js";
import type { CommandRunner, Version, VersionBound } from "./models.js";

const VERSION_PATTERN = /^(\d+)\.(\d+)\.(\w+)(?:[.\s].*)?$/;

/**
 * Parse "major.minor.patch". A non-numeric third component (a development
 * marker such as "GIT") yields patch 0.
 *
 * @throws InvalidVersionError for any other shape
 */
export function parseVersion(version: string): Version {
  const match = VERSION_PATTERN.exec(version.trim());
  if (!match) {
    throw new InvalidVersionError(version);
  }

  const [, major, minor, patch] = match;
  return {
    major: parseInt(major, 10),
    minor: parseInt(minor, 10),
    patch: /^\d+$/.test(patch) ? parseInt(patch, 10) : 0,
  };
}

export function atLeast(version: Version, bound: VersionBound): boolean {
  const [major, minor, patch] = bound;
  if (version.major !== major) return version.major > major;
  if (minor === undefined) return true;
  if (version.minor !== minor) return version.minor > minor;
  if (patch === undefined) return true;
  return version.patch >= patch;
}

/** `rev-parse --absolute-git-dir` arrived in 2.13. */
export function supportsAbsoluteGitDir(version: Version): boolean {
  return atLeast(version, [2, 13]);
}

/**
 * Run `<command> --version` and parse the version token, e.g.
 * "git version 2.39.3 (Apple Git-145)" → {2, 39, 3}.
 */
export async function detectVersion(
  runner: CommandRunner,
  command: string,
): Promise<Version> {
  const { stdout } = await runner.run({
    command,
    args: ["--version"],
    suppress_stderr: true,
  });
  const token = (stdout[0] ?? "").split(" ")[2] ?? "";
  return parseVersion(token);
}
