/**
 * gitfile-state MCP server factory.
 *
 * Creates and configures the McpServer with all tool registrations.
 * Separated from index.ts so tests can connect to it in process.
 */

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { loadConfig } from "./config.js";
import { createGitContext, type GitContext } from "./context.js";
import { diffLines } from "./diff.js";
import { errorMessage, NotAGitRepositoryError } from "./errors.js";
import { splitLines } from "./exec-git.js";
import { GitFile } from "./file.js";
import type { Hunk } from "./models.js";
import { dirExists, RepositoryRegistry, type Repository } from "./repo.js";

export interface ServerDeps {
  /** Defaults to a context built from environment configuration. */
  context?: () => Promise<GitContext>;
}

// ---------------------------------------------------------------------------
// Shared schemas & helpers
// ---------------------------------------------------------------------------

const pathArg = z
  .string()
  .describe("File path, absolute or relative to the server's working directory");

const hunkIndexesArg = z
  .array(z.number().int().nonnegative())
  .optional()
  .describe("Zero-based indexes of the hunks to use (default: all)");

function jsonResult(value: Record<string, unknown>): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(value, null, 2) }],
    structuredContent: value,
  };
}

function errorResult(error: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: errorMessage(error) }],
    isError: true,
  };
}

function selectHunks(hunks: Hunk[], indexes: number[] | undefined): Hunk[] {
  if (!indexes) return hunks;
  const unknown = indexes.filter((i) => i >= hunks.length);
  if (unknown.length > 0) {
    throw new Error(`Unknown hunk indexes: ${unknown.join(", ")} (file has ${hunks.length})`);
  }
  return indexes.map((i) => hunks[i]);
}

async function readBuffer(file: string): Promise<string[]> {
  return splitLines(await readFile(file, "utf8"));
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a fully-configured gitfile-state MCP server.
 */
export function createServer(deps: ServerDeps = {}): McpServer {
  const server = new McpServer({
    name: "gitfile-state",
    version: "0.1.0",
  });

  const makeContext = deps.context ?? (() => createGitContext(loadConfig()));
  let contextPromise: Promise<GitContext> | undefined;
  let registry: RepositoryRegistry | undefined;
  const attached = new Map<string, GitFile>();

  function getContext(): Promise<GitContext> {
    contextPromise ??= makeContext().catch((error: unknown) => {
      // Retry on the next call instead of caching the failure
      contextPromise = undefined;
      throw error;
    });
    return contextPromise;
  }

  async function getRegistry(): Promise<RepositoryRegistry> {
    const ctx = await getContext();
    registry ??= new RepositoryRegistry(ctx);
    return registry;
  }

  async function repoFor(path: string): Promise<Repository> {
    const target = resolve(path);
    const dir = (await dirExists(target)) ? target : dirname(target);
    const repo = await (await getRegistry()).get(dir);
    if (!repo) throw new NotAGitRepositoryError(target);
    return repo;
  }

  /**
   * Attach to `path` once; later calls refresh the cached snapshot.
   */
  async function attach(path: string): Promise<GitFile> {
    const file = resolve(path);
    const existing = attached.get(file);
    if (existing) {
      await existing.updateFileInfo();
      return existing;
    }

    const obj = await GitFile.open(await getContext(), file, {
      registry: await getRegistry(),
    });
    if (!obj) throw new NotAGitRepositoryError(file);
    attached.set(file, obj);
    return obj;
  }

  // -------------------------------------------------------------------------
  // Tool: repo_info
  // -------------------------------------------------------------------------

  server.registerTool(
    "repo_info",
    {
      description:
        "Resolve the repository containing a path: toplevel, git dir, abbreviated HEAD label and configured user name.",
      inputSchema: { path: pathArg },
    },
    async ({ path }) => {
      try {
        const repo = await repoFor(path);
        await repo.updateAbbrevHead();
        return jsonResult({ ...repo.info() });
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // Tool: files_changed
  // -------------------------------------------------------------------------

  server.registerTool(
    "files_changed",
    {
      description:
        "List paths (relative to the toplevel) whose working tree differs from the index.",
      inputSchema: { path: pathArg },
    },
    async ({ path }) => {
      try {
        const repo = await repoFor(path);
        return jsonResult({ files: await repo.filesChanged() });
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // Tool: file_info
  // -------------------------------------------------------------------------

  server.registerTool(
    "file_info",
    {
      description:
        "Index snapshot for one file: blob hash, mode bits, conflict flag, line-ending flags and rename origin.",
      inputSchema: { path: pathArg },
    },
    async ({ path }) => {
      try {
        const file = await attach(path);
        return jsonResult({ ...file.props(), file: file.file });
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // Tool: show_text
  // -------------------------------------------------------------------------

  server.registerTool(
    "show_text",
    {
      description:
        "Content of the file at a revision. An empty revision reads the index.",
      inputSchema: {
        path: pathArg,
        revision: z
          .string()
          .optional()
          .describe("Revision such as HEAD or a commit sha (default: the index)"),
      },
    },
    async ({ path, revision }) => {
      try {
        const file = await attach(path);
        return jsonResult({ lines: await file.getShowText(revision ?? "") });
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // Tool: blame_line
  // -------------------------------------------------------------------------

  server.registerTool(
    "blame_line",
    {
      description:
        "Blame a single line of the file's current working content. Untracked files and repositories without commits yield a 'Not Committed Yet' record.",
      inputSchema: {
        path: pathArg,
        line: z.number().int().positive().describe("1-based line number"),
        ignore_whitespace: z
          .boolean()
          .optional()
          .describe("Ignore whitespace-only changes (default false)"),
      },
    },
    async ({ path, line, ignore_whitespace }) => {
      try {
        const file = await attach(path);
        const blame = await file.runBlame(
          await readBuffer(file.file),
          line,
          ignore_whitespace ?? false,
        );
        return jsonResult({ blame: blame ?? null });
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // Tool: stage_hunks
  // -------------------------------------------------------------------------

  server.registerTool(
    "stage_hunks",
    {
      description:
        "Stage hunks of the working file into the index without touching the working tree.",
      inputSchema: { path: pathArg, hunk_indexes: hunkIndexesArg },
    },
    async ({ path, hunk_indexes }) => {
      try {
        const file = await attach(path);
        await file.ensureFileInIndex();
        const hunks = await file.diffIndex(await readBuffer(file.file));
        const selected = selectHunks(hunks, hunk_indexes);
        if (selected.length > 0) {
          await file.stageHunks(selected);
        }
        await file.updateFileInfo();
        return jsonResult({ staged: selected.length, object_name: file.object_name ?? null });
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // Tool: unstage_hunks
  // -------------------------------------------------------------------------

  server.registerTool(
    "unstage_hunks",
    {
      description:
        "Take staged hunks (differences between HEAD and the index) back out of the index.",
      inputSchema: { path: pathArg, hunk_indexes: hunkIndexesArg },
    },
    async ({ path, hunk_indexes }) => {
      try {
        const file = await attach(path);
        const head = await file.getShowText("HEAD");
        const staged = await file.getShowText();
        const hunks = await diffLines(file.repo.context, head, staged);
        const selected = selectHunks(hunks, hunk_indexes);
        if (selected.length > 0) {
          await file.stageHunks(selected, true);
        }
        await file.updateFileInfo();
        return jsonResult({ unstaged: selected.length, object_name: file.object_name ?? null });
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // Tool: stage_lines
  // -------------------------------------------------------------------------

  server.registerTool(
    "stage_lines",
    {
      description: "Replace the file's staged content wholesale with the given lines.",
      inputSchema: {
        path: pathArg,
        lines: z.array(z.string()).describe("New staged content, one entry per line"),
      },
    },
    async ({ path, lines }) => {
      try {
        const file = await attach(path);
        await file.stageLines(lines);
        await file.updateFileInfo();
        return jsonResult({ object_name: file.object_name ?? null });
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // Tool: unstage_file
  // -------------------------------------------------------------------------

  server.registerTool(
    "unstage_file",
    {
      description: "Reset the file's index entry to its committed state.",
      inputSchema: { path: pathArg },
    },
    async ({ path }) => {
      try {
        const file = await attach(path);
        await file.unstageFile();
        await file.updateFileInfo();
        return jsonResult({ object_name: file.object_name ?? null });
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // Tool: detect_rename
  // -------------------------------------------------------------------------

  server.registerTool(
    "detect_rename",
    {
      description:
        "Check the staged diff for a rename of this file and follow it. Returns the new relative path, or null.",
      inputSchema: { path: pathArg },
    },
    async ({ path }) => {
      try {
        const file = await attach(path);
        const moved = await file.hasMoved();
        if (moved) {
          // Later calls name the file by its new path
          attached.delete(resolve(path));
          attached.set(file.file, file);
          await file.updateFileInfo();
        }
        return jsonResult({ new_relpath: moved ?? null, file: file.file });
      } catch (error) {
        return errorResult(error);
      }
    },
  );

  return server;
}
