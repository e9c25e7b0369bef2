// Main exports for programmatic usage
export { commitCommand } from "./commands/commit";
export type { CommitDependencies, CommitResult } from "./commands/commit";
export { createProgram, parseArgs, main } from "./program";
export * from "./utils/git";
export * from "./lib/classifier";
export * from "./lib/rules";
export * from "./lib/message";
export * from "./lib/config";
export * from "./lib/ai";
export * from "./lib/errors";
export * from "./types/commit";
