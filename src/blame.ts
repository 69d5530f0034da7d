/**
 * Single-line blame against in-memory buffer content.
 *
 * Runs `git blame --contents - -L <n>,+1 --line-porcelain` with the buffer on
 * stdin and parses the one porcelain block it prints.
 */

import type { BlameInfo } from "./models.js";

export const NOT_COMMITTED_NAME = "Not Committed Yet";
export const NOT_COMMITTED_MAIL = "<not.committed.yet>";
export const NULL_SHA = "0000000000000000000000000000000000000000";

export interface BlameArgs {
  /** Path handed to git blame (absolute or relative to the toplevel). */
  file: string;
  line_number: number;
  ignore_whitespace?: boolean;
  /** Passed as --ignore-revs-file when set. */
  ignore_revs_file?: string;
}

type StringField =
  | "author"
  | "author_mail"
  | "author_tz"
  | "committer"
  | "committer_mail"
  | "committer_tz"
  | "summary"
  | "filename";

const STRING_FIELDS: ReadonlySet<string> = new Set<StringField>([
  "author",
  "author_mail",
  "author_tz",
  "committer",
  "committer_mail",
  "committer_tz",
  "summary",
  "filename",
]);

function isStringField(key: string): key is StringField {
  return STRING_FIELDS.has(key);
}

/**
 * Build the argv (after the subcommand prefix) for a one-line blame.
 */
export function blameArgs(args: BlameArgs): string[] {
  const argv = [
    "blame",
    "--contents",
    "-",
    "-L",
    `${args.line_number},+1`,
    "--line-porcelain",
  ];

  if (args.ignore_whitespace) {
    argv.push("-w");
  }
  if (args.ignore_revs_file) {
    argv.push("--ignore-revs-file", args.ignore_revs_file);
  }

  argv.push("--", args.file);
  return argv;
}

/**
 * Parse one `--line-porcelain` block.
 *
 * The first line is `<sha> <orig-line> <final-line> [<num-lines>]`; every
 * following line not starting with a tab is `<key> <value>`.
 *
 * @returns undefined when blame printed nothing
 */
export function parseBlameLine(output: readonly string[]): BlameInfo | undefined {
  if (output.length === 0) return undefined;

  const [sha, origLnum, finalLnum] = output[0].split(" ");
  const info: BlameInfo = {
    sha,
    abbrev_sha: sha.slice(0, 8),
    orig_lnum: parseInt(origLnum, 10),
    final_lnum: parseInt(finalLnum, 10),
    extra: {},
  };

  for (const line of output.slice(1)) {
    // Tab-prefixed lines are the blamed content
    if (line.startsWith("\t")) continue;

    const space = line.indexOf(" ");
    const rawKey = space === -1 ? line : line.slice(0, space);
    const value = space === -1 ? "" : line.slice(space + 1);
    const key = rawKey.replace(/-/g, "_");

    if (isStringField(key)) {
      info[key] = value;
    } else if (key === "author_time") {
      info.author_time = parseInt(value, 10);
    } else if (key === "committer_time") {
      info.committer_time = parseInt(value, 10);
    } else if (key === "previous") {
      const [previousSha, previousFilename] = value.split(" ");
      info.previous_sha = previousSha;
      info.previous_filename = previousFilename;
    } else if (key === "boundary") {
      info.boundary = true;
    } else if (key.length > 0) {
      info.extra[key] = value;
    }
  }

  return info;
}

/**
 * Placeholder for lines no commit has touched yet.
 */
export function notCommittedBlame(
  relpath: string | undefined,
  lineNumber: number,
  now: Date = new Date(),
): BlameInfo {
  const time = Math.floor(now.getTime() / 1000);
  return {
    sha: NULL_SHA,
    abbrev_sha: NULL_SHA.slice(0, 8),
    orig_lnum: lineNumber,
    final_lnum: lineNumber,
    author: NOT_COMMITTED_NAME,
    author_mail: NOT_COMMITTED_MAIL,
    author_time: time,
    committer: NOT_COMMITTED_NAME,
    committer_mail: NOT_COMMITTED_MAIL,
    committer_time: time,
    summary: `Version of ${relpath ?? "file"} from working tree`,
    extra: {},
  };
}
