import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { availableParallelism, homedir } from "os";
import { join } from "path";
import { invalidConfig, invalidOption } from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";
import { isLogLevel, type LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path */
export const SYSTEM_CONFIG_PATH = "/etc/hospital-data/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "hospital-data", "config.yaml");

export const METADATA_FILENAME = "metadata.json";

export const MAX_CONCURRENCY = 64;

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  catalogUrl: "https://data.cms.gov/provider-data/api/1/metastore/schemas/dataset/items",
  theme: "Hospitals",
  outputDir: "cms_hospitals_data",
  logLevel: "info",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

export const ConfigFileSchema = z
  .object({
    catalog: z
      .object({
        url: z.string().url().optional(),
        theme: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    output: z
      .object({
        dir: z.string().min(1).optional(),
        metadataFile: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    concurrency: z.number().int().min(1).max(MAX_CONCURRENCY).optional(),
    logging: z
      .object({
        level: z.enum(["debug", "info", "warn", "error"]).optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  catalogUrl: string;
  theme: string;
  outputDir: string;
  /** Defaults to metadata.json inside outputDir */
  metadataFile: string;
  concurrency: number;
  logLevel: LogLevel;
  logJson: boolean;
}

/** Values set explicitly by flags or environment; undefined means unset */
export type ConfigOverrides = Partial<ResolvedConfig>;

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if the file doesn't exist; throws if it is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`Cannot read file: ${errorMessage(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`Invalid YAML: ${errorMessage(err)}`]);
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
    );
    throw invalidConfig(path, issues);
  }

  return result.data;
}

function fromConfigFile(source: ConfigFile): ConfigOverrides {
  return {
    catalogUrl: source.catalog?.url,
    theme: source.catalog?.theme,
    outputDir: source.output?.dir,
    metadataFile: source.output?.metadataFile,
    concurrency: source.concurrency,
    logLevel: source.logging?.level,
    logJson: source.logging?.json,
  };
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Parse a concurrency flag or env value.
 */
export function parseConcurrency(value: string, source = "--concurrency"): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1 || n > MAX_CONCURRENCY) {
    throw invalidOption(source, value, `Use a whole number between 1 and ${MAX_CONCURRENCY}`);
  }
  return n;
}

export function parseLogLevel(value: string, source = "--log-level"): LogLevel {
  if (!isLogLevel(value)) {
    throw invalidOption(source, value, "Choose from: debug, info, warn, error");
  }
  return value;
}

function parseBoolean(value: string): boolean {
  return value === "1" || value.toLowerCase() === "true";
}

/**
 * Read overrides from HOSPITAL_DATA_* environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  return {
    catalogUrl: env.HOSPITAL_DATA_CATALOG_URL || undefined,
    theme: env.HOSPITAL_DATA_THEME || undefined,
    outputDir: env.HOSPITAL_DATA_OUTPUT_DIR || undefined,
    metadataFile: env.HOSPITAL_DATA_METADATA_FILE || undefined,
    concurrency: env.HOSPITAL_DATA_CONCURRENCY
      ? parseConcurrency(env.HOSPITAL_DATA_CONCURRENCY, "HOSPITAL_DATA_CONCURRENCY")
      : undefined,
    logLevel: env.HOSPITAL_DATA_LOG_LEVEL
      ? parseLogLevel(env.HOSPITAL_DATA_LOG_LEVEL, "HOSPITAL_DATA_LOG_LEVEL")
      : undefined,
    logJson: env.HOSPITAL_DATA_LOG_JSON ? parseBoolean(env.HOSPITAL_DATA_LOG_JSON) : undefined,
  };
}

export function defaultConcurrency(): number {
  return Math.min(availableParallelism(), MAX_CONCURRENCY);
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > environment > user config > system config > defaults
 */
export function resolveConfig(
  cliOptions: ConfigOverrides = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  envOptions: ConfigOverrides = {}
): ResolvedConfig {
  const merged: ConfigOverrides = {
    ...(systemConfig ? filterUndefined(fromConfigFile(systemConfig)) : {}),
    ...(userConfig ? filterUndefined(fromConfigFile(userConfig)) : {}),
    ...filterUndefined(envOptions),
    ...filterUndefined(cliOptions),
  };

  const outputDir = merged.outputDir ?? CONFIG_DEFAULTS.outputDir;

  return {
    catalogUrl: merged.catalogUrl ?? CONFIG_DEFAULTS.catalogUrl,
    theme: merged.theme ?? CONFIG_DEFAULTS.theme,
    outputDir,
    metadataFile: merged.metadataFile ?? join(outputDir, METADATA_FILENAME),
    concurrency: merged.concurrency ?? defaultConcurrency(),
    logLevel: merged.logLevel ?? CONFIG_DEFAULTS.logLevel,
    logJson: merged.logJson ?? CONFIG_DEFAULTS.logJson,
  };
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Config file given with --config; replaces the user/system lookup
 * @returns The resolved config and the config files that were read
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (!userConfig) {
      throw invalidConfig(explicitPath, ["File not found"]);
    }
    sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig, configFromEnv(env));

  return { config, sources };
}
