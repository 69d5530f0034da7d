import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, realpathSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { GitNotFoundError } from "../../src/errors.js";
import { GLOBAL_ARGS, isInGitDir, Repository, RepositoryRegistry } from "../../src/repo.js";
import { FakeRunner, fakeContext, withRepo } from "../helpers/fake-runner.js";

describe("isInGitDir", () => {
  it("matches any .git path component", () => {
    expect(isInGitDir("/repo/.git/COMMIT_EDITMSG")).toBe(true);
    expect(isInGitDir("/repo/.git")).toBe(true);
    expect(isInGitDir("C:\\repo\\.git\\config")).toBe(true);
  });

  it("does not match lookalikes", () => {
    expect(isInGitDir("/repo/.gitignore")).toBe(false);
    expect(isInGitDir("/repo/src/my.git/file")).toBe(false);
  });
});

describe("Repository.resolve", () => {
  it("resolves toplevel, gitdir, head and user in one pass", async () => {
    const ctx = fakeContext(withRepo(new FakeRunner()));
    const repo = await Repository.resolve(ctx, "/repo/src");

    expect(repo?.info()).toEqual({
      toplevel: "/repo",
      gitdir: "/repo/.git",
      abbrev_head: "main",
      username: "Test",
    });
    expect(ctx.runner.calls[0]).toEqual({
      command: "git",
      args: [
        ...GLOBAL_ARGS,
        "rev-parse",
        "--show-toplevel",
        "--absolute-git-dir",
        "--abbrev-ref",
        "HEAD",
      ],
      cwd: "/repo/src",
      suppress_stderr: true,
    });
  });

  it("uses the short hash when HEAD is detached", async () => {
    const runner = withRepo(new FakeRunner(), "HEAD").on("rev-parse --short HEAD", {
      stdout: ["abc1234"],
    });
    const repo = await Repository.resolve(fakeContext(runner), "/repo");

    expect(repo?.abbrev_head).toBe("abc1234");
  });

  it("leaves the label empty when there are no commits", async () => {
    const runner = withRepo(new FakeRunner(), "HEAD").on("rev-parse --short HEAD", {
      stdout: [],
      stderr: "fatal: ambiguous argument 'HEAD'\n",
      exitCode: 128,
    });
    const repo = await Repository.resolve(fakeContext(runner), "/repo");

    expect(repo?.abbrev_head).toBe("");
  });

  it("returns undefined outside any repository", async () => {
    const ctx = fakeContext(new FakeRunner());
    await expect(Repository.resolve(ctx, "/tmp/elsewhere")).resolves.toBeUndefined();
    expect(ctx.runner.invocations()).toEqual([
      "rev-parse --show-toplevel --absolute-git-dir --abbrev-ref HEAD",
    ]);
  });

  describe("with a real metadata directory", () => {
    let dir: string;

    beforeEach(() => {
      dir = realpathSync(mkdtempSync(join(tmpdir(), "gitfile-state-repo-")));
      mkdirSync(join(dir, ".git"));
    });

    afterEach(() => rmSync(dir, { recursive: true, force: true }));

    it("appends (rebasing) while a rebase is in progress", async () => {
      mkdirSync(join(dir, ".git", "rebase-merge"));
      const runner = new FakeRunner()
        .on("rev-parse --show-toplevel", { stdout: [dir, join(dir, ".git"), "HEAD"] })
        .on("rev-parse --short HEAD", { stdout: ["abc1234"] });

      const repo = await Repository.resolve(fakeContext(runner), dir);
      expect(repo?.abbrev_head).toBe("abc1234(rebasing)");
    });

    it("appends (rebasing) to a branch label too", async () => {
      mkdirSync(join(dir, ".git", "rebase-apply"));
      const runner = new FakeRunner().on("rev-parse --show-toplevel", {
        stdout: [dir, join(dir, ".git"), "main"],
      });

      const repo = await Repository.resolve(fakeContext(runner), dir);
      expect(repo?.abbrev_head).toBe("main(rebasing)");
    });

    it("canonicalises a relative --git-dir on git older than 2.13", async () => {
      const runner = new FakeRunner().on("rev-parse --show-toplevel", {
        stdout: [dir, ".git", "main"],
      });
      const ctx = fakeContext(runner, { version: { major: 2, minor: 12, patch: 0 } });

      const repo = await Repository.resolve(ctx, dir);
      expect(repo?.gitdir).toBe(join(dir, ".git"));
      expect(ctx.runner.invocations()[0]).toBe(
        "rev-parse --show-toplevel --git-dir --abbrev-ref HEAD",
      );
    });
  });
});

describe("dotfiles fallback", () => {
  const dotfiles = { enable: true, command: "yadm", home: "/home/jane" };

  it("retries with the dotfiles command when it tracks the path", async () => {
    const runner = new FakeRunner()
      .onCommand("yadm", "ls-files", { stdout: ["/home/jane/.config/app/settings.json"] })
      .onCommand("yadm", "rev-parse --show-toplevel", {
        stdout: ["/home/jane", "/home/jane/.local/share/yadm/repo.git", "main"],
      });
    const ctx = fakeContext(runner, { config: { dotfiles } });

    const repo = await Repository.resolve(ctx, "/home/jane/.config/app");

    expect(repo?.gitCommand).toBe("yadm");
    expect(repo?.gitdir).toBe("/home/jane/.local/share/yadm/repo.git");
    expect(runner.calls.map((c) => c.command)).toEqual(["git", "yadm", "yadm", "yadm"]);
  });

  it("is not consulted outside the home directory", async () => {
    const runner = new FakeRunner();
    const ctx = fakeContext(runner, { config: { dotfiles } });

    await expect(Repository.resolve(ctx, "/srv/data")).resolves.toBeUndefined();
    expect(runner.calls.map((c) => c.command)).toEqual(["git"]);
  });

  it("is not consulted when disabled", async () => {
    const runner = new FakeRunner();
    const ctx = fakeContext(runner, { config: { dotfiles: { ...dotfiles, enable: false } } });

    await expect(Repository.resolve(ctx, "/home/jane/.config")).resolves.toBeUndefined();
    expect(runner.calls).toHaveLength(1);
  });

  it("treats a missing dotfiles binary as untracked", async () => {
    const runner = new FakeRunner();
    runner.run = async (spec) => {
      if (spec.command === "yadm") throw new GitNotFoundError("yadm");
      return { stdout: [], stderr: "", exitCode: 128 };
    };
    const ctx = fakeContext(runner, { config: { dotfiles } });

    await expect(Repository.resolve(ctx, "/home/jane/.config")).resolves.toBeUndefined();
  });
});

describe("Repository commands", () => {
  let runner: FakeRunner;
  let repo: Repository;

  beforeEach(async () => {
    runner = withRepo(new FakeRunner());
    const resolved = await Repository.resolve(fakeContext(runner), "/repo");
    if (!resolved) throw new Error("repository did not resolve");
    repo = resolved;
    runner.calls.length = 0;
  });

  it("scopes commands to the gitdir and work tree", async () => {
    await repo.command(["status"], { suppress_stderr: true });

    expect(runner.calls[0]).toEqual({
      command: "git",
      args: [...GLOBAL_ARGS, "--git-dir=/repo/.git", "--work-tree=/repo", "status"],
      cwd: "/repo",
      suppress_stderr: true,
    });
  });

  it("lists files whose work tree differs from the index", async () => {
    runner.on("status --porcelain -z --ignore-submodules", {
      stdout: [" M src/a.ts\0M  src/b.ts\0MM src/c.ts\0?? d.ts\0A  e.ts\0AM f.ts\0"],
    });

    await expect(repo.filesChanged()).resolves.toEqual(["src/a.ts", "src/c.ts", "f.ts"]);
  });

  it("returns changed paths verbatim, without quoting", async () => {
    runner.on("status --porcelain -z --ignore-submodules", {
      // splitLines has already cut the name holding a newline
      stdout: [" M café.txt\0 M with space.txt\0 M line", "break.txt\0"],
    });

    await expect(repo.filesChanged()).resolves.toEqual([
      "café.txt",
      "with space.txt",
      "line\nbreak.txt",
    ]);
  });

  it("skips the origin field of renames", async () => {
    runner.on("status --porcelain -z --ignore-submodules", {
      stdout: ["RM new.ts\0aM.ts\0 M other.ts\0"],
    });

    await expect(repo.filesChanged()).resolves.toEqual(["new.ts", "other.ts"]);
  });

  it("reads objects with the requested encoding", async () => {
    runner.on("show", { stdout: ["one", "two"] });

    await expect(repo.getShowText("HEAD:src/a.ts", "latin1")).resolves.toEqual(["one", "two"]);
    expect(runner.calls[0].encoding).toBe("latin1");
    expect(runner.calls[0].suppress_stderr).toBe(true);
    expect(runner.invocations()).toEqual(["show HEAD:src/a.ts"]);
  });

  it("refreshes the label without re-resolving", async () => {
    runner.on("rev-parse --abbrev-ref HEAD", { stdout: ["feature"] });

    await expect(repo.updateAbbrevHead()).resolves.toBe("feature");
    expect(repo.abbrev_head).toBe("feature");
    expect(repo.toplevel).toBe("/repo");
    expect(runner.invocations()).toEqual(["rev-parse --abbrev-ref HEAD"]);
  });
});

describe("RepositoryRegistry", () => {
  it("shares one Repository per gitdir", async () => {
    const registry = new RepositoryRegistry(fakeContext(withRepo(new FakeRunner())));

    const first = await registry.get("/repo/src");
    const second = await registry.get("/repo/lib");

    expect(first).toBeDefined();
    expect(second).toBe(first);
    expect(registry.size).toBe(1);
  });
});
