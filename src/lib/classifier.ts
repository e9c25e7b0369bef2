/**
 * Local, rule-based classification of staged changes
 *
 * Each field is derived in order (type, scope, theme, intro) and later
 * fields see the final value of earlier ones, so `--type docs` also yields
 * the `docs` scope unless a scope is given too.
 */

import {
  basename,
  defaultRules,
  extractContentSignal,
  hasKeyword,
  splitPath,
  type ClassificationRules,
} from "./rules";
import type {
  ChangeCounts,
  ChangeSet,
  CommitDescriptor,
  CommitType,
  DescriptorOverrides,
  FileChange,
} from "../types/commit";

export const DEFAULT_SCOPE = "repo";
export const MULTI_SCOPE = "multi";
export const DEFAULT_MAX_FILES = 5;

export interface ClassifyOptions {
  /** Number of paths listed in the intro */
  maxFiles?: number;
  rules?: ClassificationRules;
}

export function countChanges(changes: FileChange[]): ChangeCounts {
  const counts: ChangeCounts = { added: 0, modified: 0, deleted: 0, renamed: 0 };

  for (const change of changes) {
    switch (change.status) {
      case "A":
      case "C":
        counts.added += 1;
        break;
      case "D":
        counts.deleted += 1;
        break;
      case "R":
        counts.renamed += 1;
        break;
      default:
        counts.modified += 1;
        break;
    }
  }

  return counts;
}

export function inferType(
  paths: string[],
  diff: string,
  counts: ChangeCounts,
  rules: ClassificationRules = defaultRules
): CommitType {
  if (paths.length === 0) {
    return "chore";
  }

  if (diff.toLowerCase().includes("this reverts commit")) {
    return "revert";
  }

  if (paths.every(rules.isDocs)) return "docs";
  if (paths.every(rules.isTest)) return "test";
  if (paths.every(rules.isCi)) return "ci";
  if (paths.every(rules.isBuild)) return "build";
  if (paths.every(rules.isStyle)) return "style";

  const signal = `${paths.join(" ").toLowerCase()}\n${extractContentSignal(diff)}`;

  if (paths.some(rules.isPerf) || hasKeyword(signal, rules.perfKeywords)) {
    return "perf";
  }
  if (hasKeyword(signal, rules.fixKeywords)) {
    return "fix";
  }
  if (hasKeyword(signal, rules.refactorKeywords)) {
    return "refactor";
  }

  return counts.added > 0 ? "feat" : "chore";
}

/**
 * Reduce a scope to `[a-z0-9._-]`, falling back to `repo`
 */
export function sanitizeScope(scope: string): string {
  const cleaned = scope
    .replace(/[^a-zA-Z0-9._-]+/g, "-")
    .replace(/^[-.]+|[-.]+$/g, "")
    .toLowerCase();
  return cleaned || DEFAULT_SCOPE;
}

export function inferScope(
  paths: string[],
  type: CommitType,
  rules: ClassificationRules = defaultRules
): string {
  if (paths.length === 0) {
    return DEFAULT_SCOPE;
  }

  if (type === "ci" || type === "docs" || type === "build") {
    return type;
  }

  const tops = new Set<string>();

  for (const path of paths) {
    const parts = splitPath(path);
    if (parts.length <= 1 || rules.rootScopeBasenames.has(basename(path))) {
      continue;
    }
    // `.vscode/settings.json` belongs to `vscode`
    const top = parts[0].replace(/^\.+/, "") || parts[0];
    tops.add(top);
  }

  if (tops.size === 1) {
    const [only] = tops;
    return sanitizeScope(only);
  }
  if (tops.size > 1) {
    return MULTI_SCOPE;
  }
  return DEFAULT_SCOPE;
}

export function inferTheme(scope: string, counts: ChangeCounts, type: CommitType): string {
  const { added, modified, deleted, renamed } = counts;

  if (type === "revert") {
    return "回滚上一轮改动";
  }
  if (added > 0 && modified === 0 && deleted === 0 && renamed === 0) {
    return `新增${scope}相关内容`;
  }
  if (deleted > 0 && added === 0 && modified === 0) {
    return `移除${scope}冗余内容`;
  }
  if (renamed > 0 && added === 0) {
    return `整理${scope}文件结构`;
  }
  if (modified > 0 && added === 0) {
    return `完善${scope}相关实现`;
  }
  return `同步${scope}相关改动`;
}

export function inferIntro(
  scope: string,
  counts: ChangeCounts,
  paths: string[],
  maxFiles: number = DEFAULT_MAX_FILES
): string {
  const total = paths.length;
  const preview = paths.slice(0, maxFiles).join("，");
  const suffix = total > maxFiles ? ` 等${total}个文件` : "";

  return (
    `对${total}个文件进行了变更（新增${counts.added}、修改${counts.modified}、删除${counts.deleted}、重命名${counts.renamed}），` +
    `主要集中在${scope}范围，涉及${preview}${suffix}。`
  );
}

/**
 * Derive a complete descriptor from the change set. Supplied overrides are
 * used verbatim and feed into the fields derived after them.
 */
export function classify(
  changeSet: ChangeSet,
  overrides: DescriptorOverrides = {},
  options: ClassifyOptions = {}
): CommitDescriptor {
  const { maxFiles = DEFAULT_MAX_FILES, rules = defaultRules } = options;
  const { paths, diff } = changeSet;
  const counts = countChanges(changeSet.changes);

  const type = overrides.type ?? inferType(paths, diff, counts, rules);
  const scope = overrides.scope ?? inferScope(paths, type, rules);
  const theme = overrides.theme ?? inferTheme(scope, counts, type);
  const intro = overrides.intro ?? inferIntro(scope, counts, paths, maxFiles);

  return { type, scope, theme, intro };
}

/**
 * Replace descriptor fields with every override that was supplied
 */
export function applyOverrides(
  descriptor: CommitDescriptor,
  overrides: DescriptorOverrides
): CommitDescriptor {
  return {
    type: overrides.type ?? descriptor.type,
    scope: overrides.scope ?? descriptor.scope,
    theme: overrides.theme ?? descriptor.theme,
    intro: overrides.intro ?? descriptor.intro,
  };
}

export function hasAllOverrides(overrides: DescriptorOverrides): boolean {
  return (
    overrides.type !== undefined &&
    overrides.scope !== undefined &&
    overrides.theme !== undefined &&
    overrides.intro !== undefined
  );
}
