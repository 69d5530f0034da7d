/**
 * gitfile-state data models.
 *
 * Field names follow the snake_case used on the wire (MCP structured content)
 * so records can be returned to clients unchanged.
 */

// ---------------------------------------------------------------------------
// Process invocation
// ---------------------------------------------------------------------------

export interface JobSpec {
  command: string;
  args: string[];
  cwd?: string;
  /** Written to stdin, one line each followed by "\n", then stdin is closed. */
  input_lines?: string[];
  suppress_stderr?: boolean;
  /** Decoder label for stdout. Defaults to utf-8. */
  encoding?: string;
}

export interface JobResult {
  stdout: string[];
  stderr: string;
  exitCode: number;
}

export interface CommandRunner {
  run(spec: JobSpec): Promise<JobResult>;
}

// ---------------------------------------------------------------------------
// Version gate
// ---------------------------------------------------------------------------

export interface Version {
  major: number;
  minor: number;
  patch: number;
}

/** [major, minor?, patch?] — omitted trailing components are unconstrained. */
export type VersionBound =
  | [major: number]
  | [major: number, minor: number]
  | [major: number, minor: number, patch: number];

// ---------------------------------------------------------------------------
// Repository / file state
// ---------------------------------------------------------------------------

export interface RepoInfo {
  toplevel: string;
  gitdir: string;
  abbrev_head: string;
  username: string;
}

export interface FileProps {
  relpath?: string;
  orig_relpath?: string;
  /** Absent when the path is untracked. */
  object_name?: string;
  mode_bits?: string;
  has_conflicts: boolean;
  i_crlf: boolean;
  w_crlf: boolean;
}

// ---------------------------------------------------------------------------
// Hunks (produced by the diff collaborator, consumed by the patch stager)
// ---------------------------------------------------------------------------

export interface HunkRange {
  start: number;
  count: number;
  lines: string[];
  no_nl_at_eof?: boolean;
}

export type HunkType = "add" | "delete" | "change";

export interface Hunk {
  type: HunkType;
  removed: HunkRange;
  added: HunkRange;
}

// ---------------------------------------------------------------------------
// Blame
// ---------------------------------------------------------------------------

export interface BlameInfo {
  sha: string;
  abbrev_sha: string;
  orig_lnum: number;
  final_lnum: number;
  author?: string;
  author_mail?: string;
  author_time?: number;
  author_tz?: string;
  committer?: string;
  committer_mail?: string;
  committer_time?: number;
  committer_tz?: string;
  summary?: string;
  filename?: string;
  previous_sha?: string;
  previous_filename?: string;
  boundary?: boolean;
  /** Porcelain keys with no dedicated field, already underscore-normalised. */
  extra: Record<string, string>;
}
