/**
 * Configuration file management for cncommit
 *
 * Reads global ~/.cncommit/config.json and project .cncommit/config.json.
 * Project config overrides global config; neither file is ever created.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join, resolve } from "path";
import { z } from "zod";
import { ConfigError } from "./errors";
import type { CommitOptions, RunConfig } from "../types/commit";

const CONFIG_DIR = ".cncommit";
const JSON_CONFIG_FILE = "config.json";

export const API_KEY_ENV = "DEEPSEEK_API_KEY";

const commitConfigSchema = z.object({
  /** Run `git add -A` before reading the index */
  autoStage: z.boolean(),
  noVerify: z.boolean(),
  maxFiles: z.number().int().min(1),
});

const aiConfigSchema = z.object({
  enabled: z.boolean(),
  /** Fail instead of falling back to local rules */
  required: z.boolean(),
  model: z.string().min(1),
  baseUrl: z.string().url(),
  timeoutSeconds: z.number().positive(),
});

export const configSchema = z.object({
  commit: commitConfigSchema,
  ai: aiConfigSchema,
});

/** Shape of a config file: every key optional */
export const configFileSchema = z
  .object({
    commit: commitConfigSchema.partial(),
    ai: aiConfigSchema.partial(),
  })
  .partial();

export type CncommitConfig = z.infer<typeof configSchema>;
export type CncommitConfigFile = z.infer<typeof configFileSchema>;

export const DEFAULT_CONFIG: CncommitConfig = {
  commit: {
    autoStage: true,
    noVerify: false,
    maxFiles: 5,
  },
  ai: {
    enabled: true,
    required: false,
    model: "deepseek-chat",
    baseUrl: "https://api.deepseek.com",
    timeoutSeconds: 30,
  },
};

export function getGlobalConfigPath(homeDir: string = homedir()): string {
  return join(homeDir, CONFIG_DIR, JSON_CONFIG_FILE);
}

export function getProjectConfigPath(repoRoot: string): string {
  return join(repoRoot, CONFIG_DIR, JSON_CONFIG_FILE);
}

/**
 * Merge a config file over a complete config, section by section
 */
export function mergeConfig(base: CncommitConfig, override: CncommitConfigFile): CncommitConfig {
  return {
    commit: { ...base.commit, ...override.commit },
    ai: { ...base.ai, ...override.ai },
  };
}

/**
 * Read and validate one config file. Returns null when the file does not exist.
 */
export function readConfigFile(path: string): CncommitConfigFile | null {
  if (!existsSync(path)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(path, error instanceof Error ? error.message : String(error));
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(path, details);
  }

  return parsed.data;
}

export interface LoadConfigOptions {
  /** Repository root holding the project .cncommit directory */
  repoRoot?: string;
  homeDir?: string;
}

/**
 * Get the config with layered loading:
 * 1. Start with defaults
 * 2. Merge global ~/.cncommit/config.json (if exists)
 * 3. Merge project .cncommit/config.json (if exists)
 */
export function loadConfig(options: LoadConfigOptions = {}): CncommitConfig {
  let config = DEFAULT_CONFIG;

  const globalConfig = readConfigFile(getGlobalConfigPath(options.homeDir));
  if (globalConfig) {
    config = mergeConfig(config, globalConfig);
  }

  if (options.repoRoot) {
    const projectConfig = readConfigFile(getProjectConfigPath(options.repoRoot));
    if (projectConfig) {
      config = mergeConfig(config, projectConfig);
    }
  }

  return config;
}

/**
 * Combine command-line options with file config. Flags only ever tighten:
 * `--no-stage` wins over `autoStage: true`, but not the other way round.
 */
export function resolveRunConfig(
  options: CommitOptions,
  config: CncommitConfig,
  env: NodeJS.ProcessEnv = process.env
): RunConfig {
  const apiKey = env[API_KEY_ENV]?.trim() || undefined;

  const overrides: RunConfig["overrides"] = {};
  if (options.type !== undefined) overrides.type = options.type;
  if (options.scope !== undefined) overrides.scope = options.scope;
  if (options.theme !== undefined) overrides.theme = options.theme;
  if (options.intro !== undefined) overrides.intro = options.intro;

  return Object.freeze({
    repoPath: resolve(options.repo),
    dryRun: options.dryRun,
    noStage: !options.stage || !config.commit.autoStage,
    noVerify: !options.verify || config.commit.noVerify,
    overrides: Object.freeze(overrides),
    maxFiles: options.maxFiles ?? config.commit.maxFiles,
    ai: Object.freeze({
      enabled: options.ai && config.ai.enabled && apiKey !== undefined,
      required: options.aiRequired || config.ai.required,
      model: config.ai.model,
      baseUrl: config.ai.baseUrl,
      timeoutSeconds: options.aiTimeout ?? config.ai.timeoutSeconds,
      apiKey,
    }),
  });
}
