/**
 * Zero-context diff parsing and a git-backed hunk source.
 *
 * Runs `git diff --no-index --patch-with-raw --unified=0` over two temporary
 * files and parses the hunks into the structures the patch stager consumes.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { GitContext } from "./context.js";
import { GitCommandError } from "./errors.js";
import type { Hunk, HunkRange, HunkType } from "./models.js";
import { GLOBAL_ARGS } from "./repo.js";

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

export interface DiffOptions {
  indentHeuristic?: boolean;
  algorithm?: "myers" | "minimal" | "patience" | "histogram";
}

function hunkType(removed: HunkRange, added: HunkRange): HunkType {
  if (removed.count === 0) return "add";
  if (added.count === 0) return "delete";
  return "change";
}

/**
 * Parse every hunk of a unified diff. File headers, raw-format lines and
 * anything before the first `@@` are skipped.
 */
export function parseHunks(diffText: string): Hunk[] {
  if (!diffText.trim()) return [];

  const hunks: Hunk[] = [];
  const lines = diffText.split("\n");

  let i = 0;
  while (i < lines.length) {
    const headerMatch = HUNK_HEADER.exec(lines[i]);
    if (!headerMatch) {
      i++;
      continue;
    }

    const removed: HunkRange = {
      start: parseInt(headerMatch[1], 10),
      count: headerMatch[2] !== undefined ? parseInt(headerMatch[2], 10) : 1,
      lines: [],
    };
    const added: HunkRange = {
      start: parseInt(headerMatch[3], 10),
      count: headerMatch[4] !== undefined ? parseInt(headerMatch[4], 10) : 1,
      lines: [],
    };

    // The marker applies to whichever side's line precedes it
    let last: HunkRange | undefined;
    i++;
    while (i < lines.length && !lines[i].startsWith("@@") && !lines[i].startsWith("diff --git ")) {
      const line = lines[i];
      if (line.startsWith("-")) {
        removed.lines.push(line.slice(1));
        last = removed;
      } else if (line.startsWith("+")) {
        added.lines.push(line.slice(1));
        last = added;
      } else if (line.startsWith("\\") && last) {
        last.no_nl_at_eof = true;
      }
      i++;
    }

    hunks.push({ type: hunkType(removed, added), removed, added });
  }

  return hunks;
}

function toFileContent(lines: readonly string[]): string {
  return lines.map((line) => line + "\n").join("");
}

/**
 * Compute hunks turning `oldLines` into `newLines`.
 *
 * @throws GitCommandError when git diff exits with anything but 0 or 1
 */
export async function diffLines(
  ctx: GitContext,
  oldLines: readonly string[],
  newLines: readonly string[],
  options: DiffOptions = {},
): Promise<Hunk[]> {
  const dir = await mkdtemp(join(tmpdir(), "gitfile-state-"));
  const oldFile = join(dir, "old");
  const newFile = join(dir, "new");

  try {
    await writeFile(oldFile, toFileContent(oldLines));
    await writeFile(newFile, toFileContent(newLines));

    const args = [
      ...GLOBAL_ARGS,
      "-c",
      "core.safecrlf=false",
      "diff",
      "--no-index",
      "--color=never",
      options.indentHeuristic ? "--indent-heuristic" : "--no-indent-heuristic",
      `--diff-algorithm=${options.algorithm ?? "myers"}`,
      "--patch-with-raw",
      "--unified=0",
      oldFile,
      newFile,
    ];

    const result = await ctx.runner.run({
      command: ctx.config.gitCommand,
      args,
      cwd: dir,
    });

    // --no-index exits 1 when the files differ
    if (result.exitCode > 1) {
      throw new GitCommandError(args, result.exitCode, result.stderr);
    }

    return parseHunks(result.stdout.join("\n"));
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
