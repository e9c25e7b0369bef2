import { describe, it, expect, vi } from "vitest";
import { createGit, parseNameStatus, type GitResult, type GitRunner } from "../git";
import { ExternalToolError, NotARepositoryError } from "../../lib/errors";
import { classify } from "../../lib/classifier";

function result(stdout: string, exitCode = 0, stderr = ""): GitResult {
  return { stdout, stderr, exitCode };
}

describe("parseNameStatus", () => {
  it("parses additions, renames and copies", () => {
    const raw = "M\0src/a.ts\0R087\0old/x.ts\0new/x.ts\0C100\0a.ts\0b.ts\0A\0docs/指南.md\0";

    expect(parseNameStatus(raw)).toEqual([
      { status: "M", path: "src/a.ts" },
      { status: "R", oldPath: "old/x.ts", path: "new/x.ts" },
      { status: "C", oldPath: "a.ts", path: "b.ts" },
      { status: "A", path: "docs/指南.md" },
    ]);
  });

  it("keeps quotes, tabs and backslashes in paths verbatim", () => {
    const raw = 'A\0docs/say "hi".md\0M\0src/tab\there.ts\0A\0notes\\raw.txt\0';

    expect(parseNameStatus(raw)).toEqual([
      { status: "A", path: 'docs/say "hi".md' },
      { status: "M", path: "src/tab\there.ts" },
      { status: "A", path: "notes\\raw.txt" },
    ]);
  });

  it("returns nothing for empty output", () => {
    expect(parseNameStatus("")).toEqual([]);
  });
});

describe("createGit", () => {
  it("runs every command against the given repository", async () => {
    const runner = vi.fn<GitRunner>(async () => result("/work/demo\n"));
    const git = createGit("/work/demo", runner);

    await expect(git.getRepoRoot()).resolves.toBe("/work/demo");
    expect(runner).toHaveBeenCalledWith("/work/demo", ["rev-parse", "--show-toplevel"]);
  });

  it("reports untracked files as changes", async () => {
    const clean = createGit("/work/demo", async () => result(""));
    const dirty = createGit("/work/demo", async () => result("?? notes.txt\n"));

    await expect(clean.hasChanges()).resolves.toBe(false);
    await expect(dirty.hasChanges()).resolves.toBe(true);
  });

  it("passes --no-verify and both messages to git commit", async () => {
    const runner = vi.fn<GitRunner>(async () => result("[main abc1234] fix(api): X\n"));
    const git = createGit("/work/demo", runner);

    await git.commit({ header: "fix(api): X", body: "简介: Y", noVerify: true });

    expect(runner).toHaveBeenCalledWith("/work/demo", [
      "commit",
      "--no-verify",
      "-m",
      "fix(api): X",
      "-m",
      "简介: Y",
    ]);
  });

  it("surfaces git's stderr when a command fails", async () => {
    const git = createGit("/work/demo", async () => result("", 1, "pre-commit hook rejected\n"));

    const error = await git.commit({ header: "h", body: "b" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalToolError);
    expect(error).toMatchObject({
      command: "git commit",
      details: "pre-commit hook rejected",
      message: "git commit failed: pre-commit hook rejected",
      exitCode: 1,
    });
  });

  it("rejects paths outside a work tree", async () => {
    const git = createGit("/tmp", async () =>
      result("", 128, "fatal: not a git repository (or any of the parent directories): .git")
    );

    const error = await git.ensureRepository().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(NotARepositoryError);
    expect(error).toMatchObject({ exitCode: 2 });
  });

  it("reads staged paths NUL-separated", async () => {
    const runner = vi.fn<GitRunner>(async () => result('A\0docs/say "hi".md\0'));
    const git = createGit("/work/demo", runner);

    const changes = await git.getStagedChanges();

    expect(changes).toEqual([{ status: "A", path: 'docs/say "hi".md' }]);
    expect(classify({ changes, paths: changes.map((c) => c.path), diff: "" }).type).toBe("docs");
    expect(runner).toHaveBeenCalledWith("/work/demo", ["diff", "--cached", "--name-status", "-z", "-M"]);
  });

  it.each([
    ["hasChanges", "git status --porcelain"],
    ["getStagedChanges", "git diff --cached --name-status -z -M"],
    ["getStagedDiff", "git diff --cached --unified=1 --no-color"],
    ["getHeadShortSha", "git rev-parse --short HEAD"],
  ] as const)("fails %s instead of reading empty output", async (method, command) => {
    const git = createGit("/work/demo", async () => result("", 128, "fatal: index file corrupt\n"));

    const pending = git[method]();

    await expect(pending).rejects.toBeInstanceOf(ExternalToolError);
    await expect(pending).rejects.toMatchObject({
      message: `${command} failed: fatal: index file corrupt`,
      exitCode: 1,
    });
  });
});
