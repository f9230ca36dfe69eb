/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export { VERSION, showHelp, parseArgs, runCli } from "./cli/index.js";
export type * from "./types.js";
export {
  CONFIG_FILE_NAME,
  findConfig,
  loadConfig,
  resolveConfig,
  validateConfig,
} from "./config.js";
export {
  emitCommand,
  resolveTargets,
  outputStem,
  type EmitSummary,
} from "./commands/emit.js";
