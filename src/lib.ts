// Library entry point
export { blameArgs, notCommittedBlame, parseBlameLine } from "./blame.js";
export type { BlameArgs } from "./blame.js";
export { DEFAULT_CONFIG, configSchema, loadConfig } from "./config.js";
export type { Config } from "./config.js";
export { createGitContext } from "./context.js";
export type { GitContext, GitContextDeps } from "./context.js";
export { diffLines, parseHunks } from "./diff.js";
export type { DiffOptions } from "./diff.js";
export {
  assertSuccess,
  errorMessage,
  GitCommandError,
  GitNotFoundError,
  InvalidVersionError,
  NotAGitRepositoryError,
} from "./errors.js";
export { createProcessRunner, runJob, splitLines } from "./exec-git.js";
export { GitFile, parseLsFiles } from "./file.js";
export { createLogger } from "./logger.js";
export type { Logger, LogLevel, LogMeta } from "./logger.js";
export type * from "./models.js";
export { APPLY_ARGS, createPatch } from "./patch.js";
export { isInGitDir, Repository, RepositoryRegistry } from "./repo.js";
export type { RepoCommandOptions } from "./repo.js";
export { createServer } from "./server.js";
export { atLeast, detectVersion, parseVersion, supportsAbsoluteGitDir } from "./version.js";
