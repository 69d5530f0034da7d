/**
 * Per-file index snapshot and index-mutating operations.
 *
 * A GitFile is owned by whoever attached to the file. It holds a shared,
 * non-owning reference to its Repository; every operation is a repo-scoped
 * git invocation, and state is only updated after that invocation resolves.
 */

import { existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { blameArgs, notCommittedBlame, parseBlameLine } from "./blame.js";
import type { GitContext } from "./context.js";
import { assertSuccess } from "./errors.js";
import { splitFields } from "./exec-git.js";
import { diffLines, type DiffOptions } from "./diff.js";
import type { BlameInfo, FileProps, Hunk } from "./models.js";
import { APPLY_ARGS, createPatch } from "./patch.js";
import { isInGitDir, Repository, type RepositoryRegistry } from "./repo.js";

const DEFAULT_MODE_BITS = "100644";

/** Printed by `ls-files --others` when probing a directory that does not exist. */
const MISSING_DIR_WARNING = /^warning: could not open directory .*: No such file or directory/;

/**
 * Parse `ls-files --stage --others --eol` output for a single path.
 *
 * Tracked: `<mode> <hash> <stage>\t<i/eol w/eol attr/...>\t<path>`
 * Untracked: `<i/ w/eol attr/...>\t<path>`
 */
export function parseLsFiles(lines: readonly string[]): FileProps {
  const props: FileProps = { has_conflicts: false, i_crlf: false, w_crlf: false };

  for (const line of lines) {
    const parts = line.split("\t");
    if (parts.length > 2) {
      const eol = parts[1].trim().split(/\s+/);
      props.i_crlf = eol[0] === "i/crlf";
      props.w_crlf = eol[1] === "w/crlf";
      props.relpath = parts[2];

      const [mode, hash, stage] = parts[0].trim().split(/\s+/);
      if (parseInt(stage, 10) <= 1) {
        props.mode_bits = mode;
        props.object_name = hash;
      } else {
        props.has_conflicts = true;
      }
    } else if (parts.length === 2) {
      props.relpath = parts[1];
    }
  }

  return props;
}

export class GitFile implements FileProps {
  relpath?: string;
  orig_relpath?: string;
  object_name?: string;
  mode_bits?: string;
  has_conflicts = false;
  i_crlf = false;
  w_crlf = false;

  constructor(
    readonly repo: Repository,
    /** Absolute path of the working file. */
    public file: string,
    readonly encoding = "utf-8",
  ) {}

  /**
   * Attach to `file`.
   *
   * @returns undefined when the path is inside a `.git` directory or no
   *          repository contains it
   */
  static async open(
    ctx: GitContext,
    file: string,
    options: { encoding?: string; registry?: RepositoryRegistry } = {},
  ): Promise<GitFile | undefined> {
    if (isInGitDir(file)) {
      ctx.logger.debug("in git dir", { file });
      return undefined;
    }

    const dir = dirname(file);
    const repo = options.registry
      ? await options.registry.get(dir)
      : await Repository.resolve(ctx, dir);
    if (!repo) return undefined;

    const obj = new GitFile(repo, file, options.encoding);
    await obj.updateFileInfo(true);
    return obj;
  }

  props(): FileProps {
    return {
      relpath: this.relpath,
      orig_relpath: this.orig_relpath,
      object_name: this.object_name,
      mode_bits: this.mode_bits,
      has_conflicts: this.has_conflicts,
      i_crlf: this.i_crlf,
      w_crlf: this.w_crlf,
    };
  }

  async fileInfo(file = this.file): Promise<FileProps> {
    const { stdout, stderr } = await this.repo.command(
      [
        "-c",
        "core.quotepath=off",
        "ls-files",
        "--stage",
        "--others",
        "--exclude-standard",
        "--eol",
        file,
      ],
      { suppress_stderr: true },
    );

    if (stderr && !MISSING_DIR_WARNING.test(stderr)) {
      this.repo.logger.warn(stderr.trimEnd(), { file });
    }

    return parseLsFiles(stdout);
  }

  /**
   * Refresh the snapshot from the index.
   *
   * @returns true when the blob hash changed since the previous snapshot
   */
  async updateFileInfo(updateRelpath = false): Promise<boolean> {
    const oldObjectName = this.object_name;
    const props = await this.fileInfo();

    if (updateRelpath) {
      this.relpath = props.relpath;
    }
    this.object_name = props.object_name;
    this.mode_bits = props.mode_bits;
    this.has_conflicts = props.has_conflicts;
    this.i_crlf = props.i_crlf;
    this.w_crlf = props.w_crlf;

    return oldObjectName !== this.object_name;
  }

  /**
   * Make sure there is a single stage-0 entry to stage against: untracked
   * files get an intent-to-add entry, conflicted files are reset to their
   * common ancestor.
   */
  async ensureFileInIndex(): Promise<void> {
    if (this.object_name && !this.has_conflicts) return;

    if (!this.object_name) {
      await this.repo.command(["add", "--intent-to-add", "--", this.file]);
    } else {
      const info = `${this.mode_bits ?? DEFAULT_MODE_BITS},${this.object_name},${this.relpath ?? ""}`;
      await this.repo.command(["update-index", "--add", "--cacheinfo", info]);
    }

    await this.updateFileInfo();
  }

  /**
   * Replace the staged content wholesale with `lines`.
   */
  async stageLines(lines: string[]): Promise<void> {
    const hashArgs = ["hash-object", "-w", "--stdin"];
    const { stdout } = assertSuccess(
      hashArgs,
      await this.repo.command(hashArgs, { input_lines: lines }),
    );
    const newObject = stdout[0];

    const info = `${this.mode_bits ?? DEFAULT_MODE_BITS},${newObject},${this.relpath ?? ""}`;
    await this.repo.command(["update-index", "--add", "--cacheinfo", info]);
  }

  /**
   * Apply `hunks` to the index only. With `invert`, take them back out.
   */
  async stageHunks(hunks: readonly Hunk[], invert = false): Promise<void> {
    await this.ensureFileInIndex();

    const patch = createPatch(
      this.relpath ?? "",
      hunks,
      this.mode_bits ?? DEFAULT_MODE_BITS,
      invert,
    );
    await this.repo.command(APPLY_ARGS, { input_lines: patch });
  }

  async unstageFile(): Promise<void> {
    await this.repo.command(["reset", "--quiet", "--", this.file]);
  }

  /**
   * Lines of `<revision>:<relpath>`; revision "" reads the index.
   *
   * Lines gain a trailing CR when the blob has LF endings but the working
   * copy has CRLF, so they compare equal to the live buffer.
   */
  async getShowText(revision = ""): Promise<string[]> {
    if (!this.relpath) return [];

    const lines = await this.repo.getShowText(`${revision}:${this.relpath}`, this.encoding);
    if (!this.i_crlf && this.w_crlf) {
      return lines.map((line) => line + "\r");
    }
    return lines;
  }

  /**
   * Follow a staged rename of this file.
   *
   * @returns the new relpath when one was adopted
   */
  async hasMoved(): Promise<string | undefined> {
    const { stdout } = await this.repo.command(["diff", "--name-status", "-z", "-C", "--cached"]);
    const origRelpath = this.orig_relpath ?? this.relpath;

    // Each entry is a status field then one path, or two for renames and copies
    const fields = splitFields(stdout);
    const targets: string[] = [];
    for (let i = 0; i < fields.length; ) {
      const status = fields[i];
      if ((status.startsWith("R") || status.startsWith("C")) && i + 2 < fields.length) {
        if (fields[i + 1] === origRelpath) {
          targets.push(fields[i + 2]);
        }
        i += 3;
      } else {
        i += 2;
      }
    }

    if (targets.length === 0) return undefined;
    if (targets.length > 1) {
      this.repo.logger.debug("several entries share the same origin, taking the first", {
        origin: origRelpath,
        candidates: targets,
      });
    }

    const newRelpath = targets[0];
    this.orig_relpath = origRelpath;
    this.relpath = newRelpath;
    this.file = join(this.repo.toplevel, newRelpath);
    return newRelpath;
  }

  /**
   * Blame line `lineNumber` of `lines` (the buffer, not the file on disk).
   *
   * @returns undefined when git printed nothing, e.g. for a line past the end
   */
  async runBlame(
    lines: string[],
    lineNumber: number,
    ignoreWhitespace = false,
  ): Promise<BlameInfo | undefined> {
    if (!this.object_name || this.repo.abbrev_head === "") {
      return notCommittedBlame(this.relpath, lineNumber);
    }

    const ignoreRevsFile = join(this.repo.toplevel, this.repo.config.blameIgnoreRevsFile);
    const args = blameArgs({
      file: this.file,
      line_number: lineNumber,
      ignore_whitespace: ignoreWhitespace,
      ignore_revs_file: existsSync(ignoreRevsFile) ? ignoreRevsFile : undefined,
    });

    const { stdout } = await this.repo.command(args, {
      input_lines: lines,
      suppress_stderr: true,
    });
    return parseBlameLine(stdout);
  }

  /**
   * Hunks between the staged blob and `lines`.
   */
  async diffIndex(lines: readonly string[], options?: DiffOptions): Promise<Hunk[]> {
    const staged = await this.getShowText();
    return diffLines(this.repo.context, staged, lines, options);
  }
}
