/**
 * Type definitions shared by the classify-and-commit pipeline
 */

/**
 * Conventional Commit types accepted in the header
 */
export const COMMIT_TYPES = [
  "feat",
  "fix",
  "refactor",
  "docs",
  "style",
  "test",
  "chore",
  "perf",
  "ci",
  "build",
  "revert",
] as const;

export type CommitType = (typeof COMMIT_TYPES)[number];

export function isCommitType(value: string): value is CommitType {
  return (COMMIT_TYPES as readonly string[]).includes(value);
}

/**
 * The four fields a commit message is built from
 */
export interface CommitDescriptor {
  type: CommitType;
  /** Conventional Commit scope, e.g. `api` */
  scope: string;
  /** Short Chinese summary used as the header subject */
  theme: string;
  /** Longer Chinese explanation placed in the body */
  intro: string;
}

export type DescriptorOverrides = Partial<CommitDescriptor>;

/** Which classifier produced the fields that were not overridden */
export type DescriptorSource = "rules" | "ai";

/**
 * A single entry of `git diff --cached --name-status`
 */
export interface FileChange {
  /** Status letter: A, M, D, R, C, T, ... */
  status: string;
  /** Path relative to repo root (the new path for renames and copies) */
  path: string;
  /** Source path of a rename or copy */
  oldPath?: string;
}

/**
 * Snapshot of the index taken once per run
 */
export interface ChangeSet {
  changes: FileChange[];
  paths: string[];
  diff: string;
}

export interface ChangeCounts {
  added: number;
  modified: number;
  deleted: number;
  renamed: number;
}

export interface AiSettings {
  enabled: boolean;
  required: boolean;
  model: string;
  baseUrl: string;
  timeoutSeconds: number;
  apiKey?: string;
}

/**
 * Fully resolved settings for one run
 */
export interface RunConfig {
  repoPath: string;
  dryRun: boolean;
  noStage: boolean;
  noVerify: boolean;
  overrides: DescriptorOverrides;
  /** Number of paths listed in the generated intro */
  maxFiles: number;
  ai: AiSettings;
}

/**
 * Options as parsed from the command line, before config files are merged
 */
export interface CommitOptions {
  repo: string;
  dryRun: boolean;
  /** `false` when `--no-stage` is given */
  stage: boolean;
  /** `false` when `--no-verify` is given */
  verify: boolean;
  /** `false` when `--no-ai` is given */
  ai: boolean;
  aiRequired: boolean;
  aiTimeout?: number;
  maxFiles?: number;
  type?: CommitType;
  scope?: string;
  theme?: string;
  intro?: string;
}
