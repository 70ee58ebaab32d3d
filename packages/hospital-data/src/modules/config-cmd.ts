import type { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { errorMessage, isCLIError } from "../lib/errors/types.js";
import { outputSuccess, type ConfigShowJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# hospital-data configuration
# Place at ~/.config/hospital-data/config.yaml (user) or
# /etc/hospital-data/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. Environment variables (HOSPITAL_DATA_*)
# 3. User config
# 4. System config
# 5. Built-in defaults

catalog:
  # Provider-data metastore listing
  url: "https://data.cms.gov/provider-data/api/1/metastore/schemas/dataset/items"

  # Entries whose theme contains this text are downloaded
  theme: Hospitals

output:
  # Where the normalized CSV files go (--output-dir)
  dir: cms_hospitals_data

  # Snapshot of the last downloaded version of each file
  # Defaults to metadata.json inside the output directory
  # metadataFile: "/var/lib/hospital-data/metadata.json"

# Datasets processed at once (1-64); defaults to the number of CPUs
# concurrency: 8

logging:
  # Log level: debug, info, warn, error
  level: info

  # Output JSON logs (recommended for cron/systemd)
  json: false
`;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage hospital-data configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/hospital-data/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${errorMessage(error)}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config
        ? [options.config]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ Invalid: ${errorMessage(error)}`));
          if (isCLIError(error) && error.details) {
            for (const issue of error.details.split("\n")) {
              console.error(chalk.gray(`    ${issue}`));
            }
          }
          hasErrors = true;
        }
      }

      if (!foundAny && !options.config) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'hospital-data config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .option("--json", "Print machine-readable JSON")
    .action((options: { config?: string; json?: boolean }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);

        if (options.json) {
          outputSuccess<ConfigShowJson>({ effective: { ...resolved }, sources });
          return;
        }

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));

        if (sources.length > 0) {
          console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
        } else {
          console.log(chalk.gray("Sources: (defaults only)"));
        }

        console.log();
        console.log(chalk.bold("Catalog:"));
        console.log(`  url:            ${resolved.catalogUrl}`);
        console.log(`  theme:          ${resolved.theme}`);

        console.log();
        console.log(chalk.bold("Output:"));
        console.log(`  dir:            ${resolved.outputDir}`);
        console.log(`  metadataFile:   ${resolved.metadataFile}`);

        console.log();
        console.log(chalk.bold("Processing:"));
        console.log(`  concurrency:    ${resolved.concurrency}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:          ${resolved.logLevel}`);
        console.log(`  json:           ${resolved.logJson}`);
      } catch (error) {
        console.error(chalk.red(`Failed to load config: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
