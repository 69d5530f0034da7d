/**
 * Repository handle: toplevel, metadata directory and current-ref label for
 * a working directory, plus repo-scoped command execution.
 */

import { realpath, stat } from "node:fs/promises";
import { resolve, sep } from "node:path";
import type { Config } from "./config.js";
import type { GitContext } from "./context.js";
import { GitNotFoundError } from "./errors.js";
import { splitFields } from "./exec-git.js";
import type { Logger } from "./logger.js";
import type { JobResult, RepoInfo } from "./models.js";
import { supportsAbsoluteGitDir } from "./version.js";

/** Prepended to every invocation. */
export const GLOBAL_ARGS = ["--no-pager", "--literal-pathspecs", "-c", "gc.auto=0"];

const REBASE_DIRS = ["rebase-merge", "rebase-apply"];

export interface RepoCommandOptions {
  input_lines?: string[];
  suppress_stderr?: boolean;
  encoding?: string;
}

/**
 * True when any component of `path` is a `.git` directory. Files in there
 * belong to git itself and are never attached to.
 */
export function isInGitDir(path: string): boolean {
  return path.split(/[\\/]/).includes(".git");
}

function isUnder(dir: string, root: string): boolean {
  const base = root.endsWith(sep) ? root.slice(0, -1) : root;
  return dir === base || dir.startsWith(base + sep);
}

export async function dirExists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

async function processAbbrevHead(
  ctx: GitContext,
  command: string,
  cwd: string,
  gitdir: string,
  head: string,
): Promise<string> {
  let label = head;

  if (head === "HEAD") {
    // Detached or unborn; empty output means there are no commits yet
    const { stdout } = await ctx.runner.run({
      command,
      args: [...GLOBAL_ARGS, "rev-parse", "--short", "HEAD"],
      cwd,
      suppress_stderr: true,
    });
    label = stdout[0] ?? "";
  }

  for (const dir of REBASE_DIRS) {
    if (await dirExists(resolve(gitdir, dir))) {
      return label + "(rebasing)";
    }
  }
  return label;
}

interface ResolvedLocation {
  toplevel: string;
  gitdir: string;
  abbrev_head: string;
}

async function queryRepoInfo(
  ctx: GitContext,
  dir: string,
  command: string,
): Promise<ResolvedLocation | undefined> {
  const absolute = supportsAbsoluteGitDir(ctx.version);
  const { stdout } = await ctx.runner.run({
    command,
    args: [
      ...GLOBAL_ARGS,
      "rev-parse",
      "--show-toplevel",
      absolute ? "--absolute-git-dir" : "--git-dir",
      "--abbrev-ref",
      "HEAD",
    ],
    cwd: dir,
    suppress_stderr: true,
  });

  const [toplevel, rawGitdir, head] = stdout;
  if (!toplevel || !rawGitdir) {
    return undefined;
  }

  const gitdir = absolute ? rawGitdir : await realpath(resolve(dir, rawGitdir));
  const abbrev_head = await processAbbrevHead(ctx, command, dir, gitdir, head ?? "");
  return { toplevel, gitdir, abbrev_head };
}

async function isTrackedByDotfiles(ctx: GitContext, dir: string): Promise<boolean> {
  const { enable, command, home } = ctx.config.dotfiles;
  if (!enable || !isUnder(dir, home)) return false;

  try {
    const { stdout } = await ctx.runner.run({
      command,
      args: ["ls-files", dir],
      cwd: dir,
      suppress_stderr: true,
    });
    return stdout.length > 0;
  } catch (err) {
    if (err instanceof GitNotFoundError) {
      ctx.logger.debug("dotfiles command unavailable", { command });
      return false;
    }
    throw err;
  }
}

export class Repository implements RepoInfo {
  private constructor(
    private readonly ctx: GitContext,
    /** `git`, or the dotfiles command when the fallback matched. */
    readonly gitCommand: string,
    readonly toplevel: string,
    readonly gitdir: string,
    public abbrev_head: string,
    readonly username: string,
  ) {}

  /**
   * Locate the repository containing `dir`.
   *
   * @returns undefined when neither git nor the dotfiles fallback knows `dir`
   */
  static async resolve(ctx: GitContext, dir: string): Promise<Repository | undefined> {
    let command = ctx.config.gitCommand;
    let location = await queryRepoInfo(ctx, dir, command);

    if (!location && (await isTrackedByDotfiles(ctx, dir))) {
      command = ctx.config.dotfiles.command;
      location = await queryRepoInfo(ctx, dir, command);
    }

    if (!location) {
      ctx.logger.debug("no repository found", { dir });
      return undefined;
    }

    const { stdout } = await ctx.runner.run({
      command,
      args: [...GLOBAL_ARGS, "config", "user.name"],
      cwd: location.toplevel,
      suppress_stderr: true,
    });

    return new Repository(
      ctx,
      command,
      location.toplevel,
      location.gitdir,
      location.abbrev_head,
      stdout[0] ?? "",
    );
  }

  get context(): GitContext {
    return this.ctx;
  }

  get logger(): Logger {
    return this.ctx.logger;
  }

  get config(): Config {
    return this.ctx.config;
  }

  /**
   * Run a command scoped to this repository's gitdir and work tree.
   */
  command(args: string[], options: RepoCommandOptions = {}): Promise<JobResult> {
    return this.ctx.runner.run({
      command: this.gitCommand,
      args: [
        ...GLOBAL_ARGS,
        `--git-dir=${this.gitdir}`,
        `--work-tree=${this.toplevel}`,
        ...args,
      ],
      cwd: this.toplevel,
      ...options,
    });
  }

  /**
   * Recompute the ref label (e.g. after a checkout) without re-resolving
   * toplevel and gitdir.
   */
  async updateAbbrevHead(): Promise<string> {
    const { stdout } = await this.command(["rev-parse", "--abbrev-ref", "HEAD"], {
      suppress_stderr: true,
    });
    this.abbrev_head = await processAbbrevHead(
      this.ctx,
      this.gitCommand,
      this.toplevel,
      this.gitdir,
      stdout[0] ?? "",
    );
    return this.abbrev_head;
  }

  /**
   * Paths whose working tree differs from the index.
   */
  async filesChanged(): Promise<string[]> {
    const { stdout } = await this.command(["status", "--porcelain", "-z", "--ignore-submodules"]);
    const entries = splitFields(stdout);
    const files: string[] = [];

    for (let i = 0; i < entries.length; i++) {
      const entry = entries[i];
      if (entry[1] === "M") {
        files.push(entry.slice(3));
      }
      // Renames and copies are followed by their origin
      if (entry[0] === "R" || entry[0] === "C") {
        i++;
      }
    }
    return files;
  }

  /**
   * Content of `revision:path` (or any object name git show accepts).
   */
  async getShowText(object: string, encoding = "utf-8"): Promise<string[]> {
    const { stdout } = await this.command(["show", object], {
      suppress_stderr: true,
      encoding,
    });
    return stdout;
  }

  info(): RepoInfo {
    return {
      toplevel: this.toplevel,
      gitdir: this.gitdir,
      abbrev_head: this.abbrev_head,
      username: this.username,
    };
  }
}

/**
 * Shares one Repository per gitdir across every file attached to it.
 */
export class RepositoryRegistry {
  private readonly repos = new Map<string, Repository>();

  constructor(private readonly ctx: GitContext) {}

  async get(dir: string): Promise<Repository | undefined> {
    const repo = await Repository.resolve(this.ctx, dir);
    if (!repo) return undefined;

    const existing = this.repos.get(repo.gitdir);
    if (existing) return existing;

    this.repos.set(repo.gitdir, repo);
    return repo;
  }

  get size(): number {
    return this.repos.size;
  }
}
