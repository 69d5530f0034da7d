/**
 * Child-process execution for git (and git-compatible wrappers such as yadm).
 *
 * Every call returns a promise that settles when the process closes, so only
 * the awaiting task is suspended. Exit codes are surfaced, never interpreted.
 */

import { spawn } from "node:child_process";
import { existsSync } from "node:fs";
import { GitNotFoundError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { CommandRunner, JobResult, JobSpec } from "./models.js";

/**
 * Split process output on "\n", dropping the empty element a trailing
 * newline leaves behind.
 */
export function splitLines(output: string): string[] {
  const lines = output.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

/**
 * Fields of `-z` output. Paths are printed verbatim there, unquoted, so a
 * newline inside one was split by splitLines and is joined back here.
 */
export function splitFields(lines: readonly string[]): string[] {
  const fields = lines.join("\n").split("\0");
  if (fields[fields.length - 1] === "") {
    fields.pop();
  }
  return fields;
}

/**
 * Spawn `spec.command` and collect its output.
 *
 * @throws GitNotFoundError if the binary cannot be spawned
 */
export function runJob(spec: JobSpec, logger: Logger): Promise<JobResult> {
  // Fail on unknown labels before anything is spawned
  const decoder = new TextDecoder(spec.encoding ?? "utf-8");

  return new Promise<JobResult>((resolve, reject) => {
    const proc = spawn(spec.command, spec.args, {
      cwd: spec.cwd,
      shell: false,
      stdio: ["pipe", "pipe", "pipe"],
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    proc.stdout.on("data", (data: Buffer) => {
      stdoutChunks.push(data);
    });

    proc.stderr.on("data", (data: Buffer) => {
      stderrChunks.push(data);
    });

    proc.on("error", (err: NodeJS.ErrnoException) => {
      // spawn reports a missing cwd as ENOENT too
      if (err.code === "ENOENT" && (!spec.cwd || existsSync(spec.cwd))) {
        reject(new GitNotFoundError(spec.command));
      } else {
        reject(err);
      }
    });

    proc.on("close", (code) => {
      const stdout = decoder.decode(Buffer.concat(stdoutChunks));
      const stderr = Buffer.concat(stderrChunks).toString("utf8");

      if (stderr.length > 0 && !spec.suppress_stderr) {
        logger.warn(stderr.trimEnd(), {
          command: `${spec.command} ${spec.args.join(" ")}`,
        });
      }

      resolve({
        stdout: splitLines(stdout),
        stderr,
        exitCode: code ?? 1,
      });
    });

    // A process that exits without reading stdin raises EPIPE here; the
    // close handler still reports its result.
    proc.stdin.on("error", (err: NodeJS.ErrnoException) => {
      logger.debug("stdin closed early", { code: err.code });
    });

    if (spec.input_lines) {
      for (const line of spec.input_lines) {
        proc.stdin.write(line + "\n");
      }
    }
    proc.stdin.end();
  });
}

/**
 * CommandRunner backed by real child processes.
 */
export function createProcessRunner(logger: Logger): CommandRunner {
  return {
    run: (spec) => runJob(spec, logger),
  };
}
