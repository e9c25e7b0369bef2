/**
 * Error classes for the commit pipeline
 *
 * Every error carries the process exit code the CLI should end with.
 */

export class CncommitError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/**
 * Bad or unknown command-line arguments
 */
export class UsageError extends CncommitError {
  constructor(message: string) {
    super(message, 2);
  }
}

export class ConfigError extends CncommitError {
  readonly file: string;

  constructor(file: string, message: string) {
    super(`配置文件无效 ${file}: ${message}`, 2);
    this.file = file;
  }
}

/**
 * Working tree and index are both clean. Reported as a notice, exit 0.
 */
export class NoChangesError extends CncommitError {
  constructor() {
    super("没有可提交的变更。", 0);
  }
}

export class NoStagedChangesError extends CncommitError {
  constructor() {
    super("没有已暂存变更，无法生成提交信息。", 1);
  }
}

/**
 * A git invocation exited non-zero; `details` is its stderr (or stdout)
 */
export class ExternalToolError extends CncommitError {
  readonly command: string;
  readonly details: string;

  constructor(command: string, details: string, exitCode = 1) {
    super(details ? `${command} failed: ${details}` : `${command} failed`, exitCode);
    this.command = command;
    this.details = details;
  }
}

export class NotARepositoryError extends ExternalToolError {
  constructor(repoPath: string, details: string) {
    super(`git -C ${repoPath} rev-parse --is-inside-work-tree`, details, 2);
  }
}

export class InvalidDescriptorError extends CncommitError {
  readonly field: string;

  constructor(field: string) {
    super(`提交描述字段 ${field} 不能为空`, 2);
    this.field = field;
  }
}

export class AiClassificationError extends CncommitError {
  constructor(message: string) {
    super(message, 2);
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
