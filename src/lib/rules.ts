/**
 * Path and keyword rules used by the local classifier
 *
 * Paths are compared lower-cased with backslashes turned into slashes.
 * Callers may pass their own `ClassificationRules` to `classify()`.
 */

import { normalizePath } from "../utils/git";

export interface ClassificationRules {
  isDocs(path: string): boolean;
  isTest(path: string): boolean;
  isCi(path: string): boolean;
  isBuild(path: string): boolean;
  isStyle(path: string): boolean;
  isPerf(path: string): boolean;
  fixKeywords: readonly string[];
  refactorKeywords: readonly string[];
  perfKeywords: readonly string[];
  /** Basenames that always count as root-level files when inferring the scope */
  rootScopeBasenames: ReadonlySet<string>;
}

const DOC_EXTENSIONS = new Set([".md", ".rst", ".adoc", ".txt"]);
const DOC_BASENAMES = new Set(["readme.md", "changelog.md", "license", "license.md"]);
const DOC_DIRECTORIES = new Set(["docs", "doc", "documentation"]);

const TEST_DIRECTORIES = new Set(["test", "tests", "testing", "__tests__", "spec", "specs", "e2e"]);
const TEST_SUFFIXES = [
  "_test.py",
  ".spec.ts",
  ".spec.tsx",
  ".spec.js",
  ".spec.jsx",
  ".test.ts",
  ".test.tsx",
  ".test.js",
  ".test.jsx",
];

const STYLE_EXTENSIONS = new Set([".css", ".scss", ".sass", ".less", ".styl"]);
const STYLE_CONFIG_BASENAMES = new Set([
  ".editorconfig",
  ".prettierrc",
  ".stylelintrc",
  ".eslintrc",
  ".eslintrc.js",
  ".eslintrc.cjs",
  ".eslintrc.json",
]);

const BUILD_BASENAMES = new Set([
  "makefile",
  "dockerfile",
  "docker-compose.yml",
  "docker-compose.yaml",
  "package.json",
  "pnpm-lock.yaml",
  "yarn.lock",
  "package-lock.json",
  "pom.xml",
  "build.gradle",
  "build.gradle.kts",
  "gradle.properties",
  "pyproject.toml",
  "requirements.txt",
  "tsconfig.json",
]);
const BUILD_CONFIG_PREFIXES = ["vite.config", "webpack.config", "rollup.config"];

const CI_PATH_PREFIXES = [
  ".github/workflows/",
  ".gitlab-ci.yml",
  ".circleci/",
  "azure-pipelines.yml",
  "azure-pipelines.yaml",
  "jenkinsfile",
];
const CI_BASENAMES = new Set(["jenkinsfile", ".gitlab-ci.yml"]);

export const ROOT_SCOPE_BASENAMES: ReadonlySet<string> = new Set([
  ".gitignore",
  ".gitattributes",
  ".npmrc",
  ".nvmrc",
  "readme.md",
  "license",
  "license.md",
]);

export const FIX_KEYWORDS = [
  "fix",
  "bug",
  "hotfix",
  "crash",
  "error",
  "exception",
  "null",
  "patch",
  "修复",
  "错误",
  "异常",
] as const;

export const REFACTOR_KEYWORDS = ["refactor", "cleanup", "restructure", "rename", "重构", "整理"] as const;

export const PERF_KEYWORDS = ["perf", "performance", "optimiz", "benchmark", "性能", "优化"] as const;

function lower(path: string): string {
  return normalizePath(path).toLowerCase();
}

export function splitPath(path: string): string[] {
  return normalizePath(path)
    .split("/")
    .filter((part) => part.length > 0);
}

export function basename(path: string): string {
  const parts = splitPath(path);
  return (parts[parts.length - 1] ?? "").toLowerCase();
}

/**
 * Lower-cased extension including the dot; dotfiles such as `.gitignore` have none
 */
export function extension(path: string): string {
  const name = basename(path);
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(dot) : "";
}

export function isDocs(path: string): boolean {
  const parts = splitPath(lower(path));
  return (
    DOC_EXTENSIONS.has(extension(path)) ||
    DOC_BASENAMES.has(basename(path)) ||
    parts.some((part) => DOC_DIRECTORIES.has(part))
  );
}

export function isTest(path: string): boolean {
  const parts = splitPath(lower(path));
  if (parts.some((part) => TEST_DIRECTORIES.has(part))) {
    return true;
  }
  const name = basename(path);
  return name.startsWith("test_") || TEST_SUFFIXES.some((suffix) => name.endsWith(suffix));
}

export function isCi(path: string): boolean {
  const p = lower(path);
  return CI_PATH_PREFIXES.some((prefix) => p.startsWith(prefix)) || CI_BASENAMES.has(basename(p));
}

export function isBuild(path: string): boolean {
  const name = basename(path);
  if (BUILD_BASENAMES.has(name)) {
    return true;
  }
  return (
    splitPath(lower(path)).includes("build") ||
    BUILD_CONFIG_PREFIXES.some((prefix) => name.startsWith(prefix))
  );
}

export function isStyle(path: string): boolean {
  return STYLE_EXTENSIONS.has(extension(path)) || STYLE_CONFIG_BASENAMES.has(basename(path));
}

export function isPerf(path: string): boolean {
  const p = lower(path);
  return p.includes("perf") || p.includes("benchmark");
}

export function hasKeyword(text: string, keywords: readonly string[]): boolean {
  const lowered = text.toLowerCase();
  return keywords.some((keyword) => lowered.includes(keyword));
}

const DIFF_HEADER_PREFIXES = ["diff --git ", "index ", "@@ ", "--- ", "+++ "];

/**
 * Added and removed lines of a unified diff, without the +/- marker and
 * without file headers, lower-cased
 */
export function extractContentSignal(diff: string): string {
  const lines: string[] = [];

  for (const line of diff.split("\n")) {
    if (DIFF_HEADER_PREFIXES.some((prefix) => line.startsWith(prefix))) continue;
    if (line.startsWith("+") || line.startsWith("-")) {
      lines.push(line.slice(1));
    }
  }

  return lines.join("\n").toLowerCase();
}

export const defaultRules: ClassificationRules = {
  isDocs,
  isTest,
  isCi,
  isBuild,
  isStyle,
  isPerf,
  fixKeywords: FIX_KEYWORDS,
  refactorKeywords: REFACTOR_KEYWORDS,
  perfKeywords: PERF_KEYWORDS,
  rootScopeBasenames: ROOT_SCOPE_BASENAMES,
};
