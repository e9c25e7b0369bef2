import { execFile } from "child_process";
import { promisify } from "util";
import { ExternalToolError, NotARepositoryError } from "../lib/errors";
import type { FileChange } from "../types/commit";

const execFileAsync = promisify(execFile);

export interface GitResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Runs `git -C <repoPath> <args>` and resolves with its output, whatever the
 * exit code. Rejects only when git itself cannot be started.
 */
export type GitRunner = (repoPath: string, args: string[]) => Promise<GitResult>;

interface ExecFailure extends Error {
  code?: number | string;
  stdout?: string;
  stderr?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error && ("code" in error || "stdout" in error);
}

/**
 * Default runner backed by the git executable on PATH
 */
export const execGit: GitRunner = async (repoPath, args) => {
  try {
    const { stdout, stderr } = await execFileAsync("git", ["-C", repoPath, ...args], {
      encoding: "utf8",
      maxBuffer: 64 * 1024 * 1024,
    });
    return { stdout, stderr, exitCode: 0 };
  } catch (error) {
    if (isExecFailure(error) && typeof error.code === "number") {
      return {
        stdout: error.stdout ?? "",
        stderr: error.stderr ?? "",
        exitCode: error.code,
      };
    }
    // ENOENT and friends: git is not installed or not on PATH
    throw new ExternalToolError("git", error instanceof Error ? error.message : String(error));
  }
};

export interface CommitRequest {
  header: string;
  body: string;
  noVerify?: boolean;
}

/**
 * Git operations the pipeline needs, bound to one repository
 */
export interface Git {
  readonly repoPath: string;
  ensureRepository(): Promise<void>;
  getRepoRoot(): Promise<string>;
  hasChanges(): Promise<boolean>;
  stageAll(): Promise<void>;
  getStagedChanges(): Promise<FileChange[]>;
  getStagedDiff(): Promise<string>;
  commit(request: CommitRequest): Promise<string>;
  getHeadShortSha(): Promise<string>;
}

/**
 * Human-readable command for error messages, without the commit message
 */
function describeCommand(args: string[]): string {
  const messageIndex = args.indexOf("-m");
  const shown = messageIndex === -1 ? args : args.slice(0, messageIndex);
  return ["git", ...shown].join(" ");
}

export function normalizePath(path: string): string {
  return path.replace(/\\/g, "/").trim();
}

/**
 * Parse `git diff --name-status -z` output. Fields are NUL-separated and
 * paths come through verbatim, never C-quoted. Renames and copies (R100,
 * C075) carry the old path before the new one.
 */
export function parseNameStatus(raw: string): FileChange[] {
  const fields = raw.split("\0");
  const changes: FileChange[] = [];
  let i = 0;

  while (i < fields.length) {
    const code = fields[i].trim();
    i += 1;
    if (!code) continue;

    const status = code.charAt(0);
    if (status === "R" || status === "C") {
      if (i + 1 >= fields.length) break;
      changes.push({ status, oldPath: fields[i], path: fields[i + 1] });
      i += 2;
    } else {
      if (i >= fields.length) break;
      changes.push({ status, path: fields[i] });
      i += 1;
    }
  }

  return changes;
}

/**
 * Create git helpers for the repository at `repoPath`
 */
export function createGit(repoPath: string, runner: GitRunner = execGit): Git {
  async function git(args: string[]): Promise<string> {
    const result = await runner(repoPath, args);

    if (result.exitCode !== 0) {
      const details = result.stderr.trim() || result.stdout.trim();
      throw new ExternalToolError(describeCommand(args), details);
    }

    return result.stdout;
  }

  return {
    repoPath,

    async ensureRepository() {
      const result = await runner(repoPath, ["rev-parse", "--is-inside-work-tree"]);
      if (result.exitCode !== 0 || result.stdout.trim() !== "true") {
        throw new NotARepositoryError(repoPath, result.stderr.trim());
      }
    },

    async getRepoRoot() {
      return (await git(["rev-parse", "--show-toplevel"])).trim();
    },

    async hasChanges() {
      // Untracked files count as changes too
      const output = await git(["status", "--porcelain"]);
      return output.trim().length > 0;
    },

    async stageAll() {
      await git(["add", "-A"]);
    },

    async getStagedChanges() {
      const output = await git(["diff", "--cached", "--name-status", "-z", "-M"]);
      return parseNameStatus(output);
    },

    async getStagedDiff() {
      return git(["diff", "--cached", "--unified=1", "--no-color"]);
    },

    async commit({ header, body, noVerify }) {
      const args = ["commit"];
      if (noVerify) {
        args.push("--no-verify");
      }
      args.push("-m", header, "-m", body);
      return (await git(args)).trim();
    },

    async getHeadShortSha() {
      return (await git(["rev-parse", "--short", "HEAD"])).trim();
    },
  };
}
