import type { Command } from "commander";
import chalk from "chalk";
import { loadConfig, parseConcurrency, parseLogLevel, type ConfigOverrides, type ResolvedConfig } from "./config.js";
import { isJsonMode } from "./cli-context.js";
import { createLogger, type Logger, type LogLevel } from "./logger.js";
import type { Clock } from "./ports/clock.js";
import type { HttpClient } from "./ports/http.js";

/**
 * What every command needs from the outside world. Tests pass fakes.
 */
export interface CommandDeps {
  http: HttpClient;
  clock?: Clock;
  env?: NodeJS.ProcessEnv;
}

/** Raw option values as commander hands them over */
export interface ConfigCommandOptions {
  config?: string;
  outputDir?: string;
  metadataFile?: string;
  catalogUrl?: string;
  theme?: string;
  concurrency?: string;
  logLevel?: string;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Register the options shared by commands that read the resolved config.
 */
export function addConfigOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "Config file to use instead of the user/system files")
    .option("-o, --output-dir <dir>", "Directory the CSV files are written to")
    .option("--metadata-file <path>", "Snapshot file (default: metadata.json in the output dir)")
    .option("--catalog-url <url>", "Catalog endpoint to read")
    .option("--theme <theme>", "Catalog theme to select")
    .option("--concurrency <n>", "Datasets processed at once")
    .option("--log-level <level>", "debug, info, warn or error")
    .option("--json", "Print machine-readable JSON")
    .option("-q, --quiet", "Hide spinners and progress");
}

/**
 * Turn flag strings into typed overrides. Throws VALIDATION_INVALID_OPTION.
 */
export function overridesFromOptions(options: ConfigCommandOptions): ConfigOverrides {
  return {
    outputDir: options.outputDir,
    metadataFile: options.metadataFile,
    catalogUrl: options.catalogUrl,
    theme: options.theme,
    concurrency: options.concurrency === undefined ? undefined : parseConcurrency(options.concurrency),
    logLevel: options.logLevel === undefined ? undefined : parseLogLevel(options.logLevel),
  };
}

export function resolveCommandConfig(
  options: ConfigCommandOptions,
  env: NodeJS.ProcessEnv = process.env
): { config: ResolvedConfig; sources: string[] } {
  return loadConfig(options.config, overridesFromOptions(options), env);
}

/**
 * Logger for a command run. Under --json, info and debug lines would mix
 * with the JSON document on stdout, so the level is raised to warn.
 */
export function createCommandLogger(config: ResolvedConfig): Logger {
  const level: LogLevel =
    isJsonMode() && (config.logLevel === "debug" || config.logLevel === "info") ? "warn" : config.logLevel;
  return createLogger({ level, json: config.logJson, color: chalk.level > 0 });
}
