/**
 * Capability object shared by every Repository and GitFile.
 *
 * Built once at startup: it pins the git version so version-gated flags are
 * decided from explicit state instead of a process-wide global.
 */

import type { Config } from "./config.js";
import { createProcessRunner } from "./exec-git.js";
import { createLogger, type Logger } from "./logger.js";
import type { CommandRunner, Version } from "./models.js";
import { detectVersion, parseVersion } from "./version.js";

export interface GitContext {
  config: Config;
  logger: Logger;
  runner: CommandRunner;
  version: Version;
}

export interface GitContextDeps {
  logger?: Logger;
  runner?: CommandRunner;
}

export async function createGitContext(
  config: Config,
  deps: GitContextDeps = {},
): Promise<GitContext> {
  const logger = deps.logger ?? createLogger({ level: config.logLevel });
  const runner = deps.runner ?? createProcessRunner(logger);

  const version =
    config.gitVersion === "auto"
      ? await detectVersion(runner, config.gitCommand)
      : parseVersion(config.gitVersion);

  logger.debug("git context ready", { version: `${version.major}.${version.minor}.${version.patch}` });

  return { config, logger, runner, version };
}
