/**
 * Zero-context unified patches for staging arbitrary hunks into the index.
 *
 * Hunks are applied in order with `git apply --cached --unidiff-zero`, which
 * locates each hunk by its new-side start. That start is the pre-image start
 * shifted by the line delta of every earlier hunk in the same patch.
 */

import type { Hunk, HunkRange } from "./models.js";

const NO_NEWLINE_MARKER = "\\ No newline at end of file";

export const APPLY_ARGS = ["apply", "--whitespace=nowarn", "--cached", "--unidiff-zero", "-"];

function pushLines(out: string[], prefix: string, range: HunkRange): void {
  for (const line of range.lines) {
    out.push(prefix + line);
  }
  if (range.no_nl_at_eof && range.lines.length > 0) {
    out.push(NO_NEWLINE_MARKER);
  }
}

/**
 * Build the patch body for `hunks` against `relpath`.
 *
 * With `invert`, added and removed swap roles so the same hunks computed for
 * staging can take the change back out of the index.
 */
export function createPatch(
  relpath: string,
  hunks: readonly Hunk[],
  modeBits: string,
  invert = false,
): string[] {
  const results = [
    `diff --git a/${relpath} b/${relpath}`,
    `index 000000..000000 ${modeBits}`,
    `--- a/${relpath}`,
    `+++ b/${relpath}`,
  ];

  let offset = 0;

  for (const hunk of hunks) {
    const pre = invert ? hunk.added : hunk.removed;
    const post = invert ? hunk.removed : hunk.added;

    // A zero-length range names the line it follows
    const start = pre.count === 0 ? pre.start + 1 : pre.start;

    results.push(`@@ -${start},${pre.count} +${start + offset},${post.count} @@`);
    pushLines(results, "-", pre);
    pushLines(results, "+", post);

    offset += post.count - pre.count;
  }

  return results;
}
