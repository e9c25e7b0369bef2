import chalk from "chalk";
import ora from "ora";
import { resolve } from "path";
import { createGit, type GitRunner } from "../utils/git";
import { loadConfig, resolveRunConfig } from "../lib/config";
import { applyOverrides, classify, hasAllOverrides } from "../lib/classifier";
import { classifyWithAi, createDeepSeekRequester, type CompletionRequester } from "../lib/ai";
import { formatCommitMessage } from "../lib/message";
import { AiClassificationError, NoChangesError, NoStagedChangesError } from "../lib/errors";
import type { ClassificationRules } from "../lib/rules";
import type {
  AiSettings,
  ChangeSet,
  CommitDescriptor,
  CommitOptions,
  DescriptorSource,
  RunConfig,
} from "../types/commit";

/**
 * Collaborators that tests replace with in-process fakes
 */
export interface CommitDependencies {
  runner?: GitRunner;
  createRequester?: (settings: AiSettings) => CompletionRequester;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  rules?: ClassificationRules;
}

export interface CommitResult {
  config: RunConfig;
  descriptor: CommitDescriptor;
  source: DescriptorSource;
  header: string;
  body: string;
  /** Short SHA of the new commit; absent on dry-run */
  sha?: string;
}

const SOURCE_LABELS: Record<DescriptorSource, string> = {
  rules: "本地规则",
  ai: "DeepSeek AI",
};

/**
 * Main commit command
 * - Stages everything unless --no-stage
 * - Classifies the staged changes into type/scope/theme/intro
 * - Prints the descriptor and commits it unless --dry-run
 *
 * Failures are thrown as CncommitError subclasses; the CLI maps them to
 * exit codes.
 */
export async function commitCommand(
  options: CommitOptions,
  deps: CommitDependencies = {}
): Promise<CommitResult> {
  const git = createGit(resolve(options.repo), deps.runner);
  await git.ensureRepository();

  const repoRoot = await git.getRepoRoot();
  const config = resolveRunConfig(
    options,
    loadConfig({ repoRoot, homeDir: deps.homeDir }),
    deps.env
  );

  if (!(await git.hasChanges())) {
    throw new NoChangesError();
  }

  if (!config.noStage) {
    const spinner = ora("正在暂存全部变更...").start();
    try {
      await git.stageAll();
    } catch (error) {
      spinner.fail("暂存失败");
      throw error;
    }
    spinner.succeed("已暂存全部变更");
  }

  const changes = await git.getStagedChanges();
  if (changes.length === 0) {
    throw new NoStagedChangesError();
  }

  console.log(chalk.green("\n已暂存变更:"));
  changes.forEach((change) => {
    console.log(chalk.green(`  ${change.status} ${change.path}`));
  });

  const changeSet: ChangeSet = {
    changes,
    paths: changes.map((change) => change.path),
    diff: await git.getStagedDiff(),
  };

  let descriptor = classify(changeSet, config.overrides, {
    maxFiles: config.maxFiles,
    rules: deps.rules,
  });
  let source: DescriptorSource = "rules";

  if (config.ai.enabled && !hasAllOverrides(config.overrides)) {
    const aiDescriptor = await tryAiClassification(config, changeSet, deps);
    if (aiDescriptor) {
      descriptor = applyOverrides(aiDescriptor, config.overrides);
      source = "ai";
    }
  }

  const { header, body } = formatCommitMessage(descriptor);

  console.log(chalk.cyan("\n已生成提交描述:"));
  console.log(`类型: ${descriptor.type}`);
  console.log(`作用域: ${descriptor.scope}`);
  console.log(`主题: ${descriptor.theme}`);
  console.log(`简介: ${descriptor.intro}`);
  console.log(chalk.dim(`来源: ${SOURCE_LABELS[source]}`));
  console.log(chalk.white(`commit: ${header}`));

  if (config.dryRun) {
    console.log(chalk.yellow("dry-run: 未执行 git commit。"));
    return { config, descriptor, source, header, body };
  }

  const spinner = ora("正在提交...").start();
  try {
    const output = await git.commit({ header, body, noVerify: config.noVerify });
    const sha = await git.getHeadShortSha();
    spinner.succeed(`提交完成: ${sha}`);
    console.log(chalk.dim(output));
    return { config, descriptor, source, header, body, sha };
  } catch (error) {
    spinner.fail("提交失败");
    throw error;
  }
}

/**
 * Ask the AI classifier; returns null (after a warning) when it fails and
 * falling back to local rules is allowed
 */
async function tryAiClassification(
  config: RunConfig,
  changeSet: ChangeSet,
  deps: CommitDependencies
): Promise<CommitDescriptor | null> {
  const spinner = ora("正在请求 DeepSeek 生成提交描述...").start();

  try {
    const createRequester = deps.createRequester ?? createDeepSeekRequester;
    const descriptor = await classifyWithAi(config.repoPath, changeSet, createRequester(config.ai));
    spinner.succeed("DeepSeek 已生成提交描述");
    return descriptor;
  } catch (error) {
    spinner.fail("DeepSeek 调用失败");
    if (!(error instanceof AiClassificationError) || config.ai.required) {
      throw error;
    }
    console.error(chalk.yellow(`提示: DeepSeek 不可用，已回退本地规则。原因: ${error.message}`));
    return null;
  }
}
