import chalk from "chalk";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { commitCommand, type CommitDependencies } from "./commands/commit";
import { CncommitError, NoChangesError, UsageError, getErrorMessage } from "./lib/errors";
import { COMMIT_TYPES, type CommitOptions, type CommitType } from "./types/commit";

export const VERSION = "1.0.0";

type ProgramOptions = {
  repo: string;
  dryRun: boolean;
  stage: boolean;
  verify: boolean;
  ai: boolean;
  aiRequired: boolean;
  aiTimeout?: number;
  maxFiles?: number;
  type?: CommitType;
  scope?: string;
  theme?: string;
  intro?: string;
};

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("需要 >= 1 的整数");
  }
  return parsed;
}

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("需要大于 0 的数字");
  }
  return parsed;
}

/**
 * Build the commander program. Errors are thrown instead of exiting the
 * process so callers decide how to report them.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("cncommit")
    .description("自动分析 git diff，生成中文提交描述并执行 commit")
    .version(VERSION)
    .option("--repo <path>", "目标仓库路径", ".")
    .option("--dry-run", "只生成描述，不执行 commit", false)
    .option("--no-stage", "不自动执行 git add -A")
    .option("--no-verify", "提交时添加 --no-verify")
    .addOption(new Option("--type <type>", "手动指定提交类型").choices(COMMIT_TYPES))
    .option("--scope <scope>", "手动指定作用域")
    .option("--theme <theme>", "手动指定主题")
    .option("--intro <intro>", "手动指定简介")
    .option("--max-files <n>", "简介中展示的最多文件数 (默认 5)", parsePositiveInt)
    .option("--no-ai", "禁用 DeepSeek，使用本地规则")
    .option("--ai-required", "强制要求 DeepSeek 成功，否则退出", false)
    .option("--ai-timeout <seconds>", "DeepSeek 请求超时秒数 (默认 30)", parsePositiveNumber)
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      // Reported by main() as a UsageError instead
      outputError: () => undefined,
    });

  return program;
}

/**
 * Parse arguments (without the node and script entries). Returns undefined
 * when --help or --version was handled.
 */
export function parseArgs(argv: string[], program: Command = createProgram()): CommitOptions | undefined {
  try {
    program.parse(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.exitCode === 0) {
        return undefined;
      }
      throw new UsageError(error.message.replace(/^error: /, ""));
    }
    throw error;
  }

  if (program.args.length > 0) {
    throw new UsageError(`too many arguments. Expected 0 arguments but got ${program.args.length}.`);
  }

  const opts = program.opts<ProgramOptions>();
  return {
    repo: opts.repo,
    dryRun: opts.dryRun,
    stage: opts.stage,
    verify: opts.verify,
    ai: opts.ai,
    aiRequired: opts.aiRequired,
    aiTimeout: opts.aiTimeout,
    maxFiles: opts.maxFiles,
    type: opts.type,
    scope: opts.scope,
    theme: opts.theme,
    intro: opts.intro,
  };
}

/**
 * Print an error the way the CLI reports it and return the exit code
 */
export function reportError(error: unknown): number {
  if (error instanceof NoChangesError) {
    console.log(chalk.yellow(error.message));
    return error.exitCode;
  }
  if (error instanceof CncommitError) {
    console.error(chalk.red(`错误: ${error.message}`));
    return error.exitCode;
  }
  console.error(chalk.red(`错误: ${getErrorMessage(error)}`));
  return 1;
}

export async function main(argv: string[], deps: CommitDependencies = {}): Promise<number> {
  try {
    const options = parseArgs(argv);
    if (!options) {
      return 0;
    }
    await commitCommand(options, deps);
    return 0;
  } catch (error) {
    return reportError(error);
  }
}
