import type { Command } from "commander";
import { existsSync } from "fs";
import { join } from "path";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import {
  addConfigOptions,
  resolveCommandConfig,
  createCommandLogger,
  type CommandDeps,
  type ConfigCommandOptions,
} from "../lib/command-config.js";
import { isJsonMode } from "../lib/cli-context.js";
import { renderError } from "../lib/errors/renderer.js";
import { maybeOutputJson, type StatusJson } from "../lib/json-output.js";
import { createFileMetadataStore, type MetadataSnapshot } from "../lib/metadata-store.js";

/**
 * Snapshot entries sorted by filename, flagged when the CSV is gone.
 */
export function statusEntries(snapshot: Readonly<MetadataSnapshot>, outputDir: string): StatusJson["entries"] {
  return Object.keys(snapshot)
    .sort()
    .map((filename) => ({
      filename,
      modified: snapshot[filename],
      present: existsSync(join(outputDir, filename)),
    }));
}

export function registerStatusCommand(program: Command, deps: Pick<CommandDeps, "env">): void {
  addConfigOptions(
    program.command("status").description("Show what the last sync recorded")
  ).action(async (options: ConfigCommandOptions) => {
    try {
      const { config } = resolveCommandConfig(options, deps.env);
      const logger = createCommandLogger(config);
      const exists = existsSync(config.metadataFile);
      const snapshot = await createFileMetadataStore(config.metadataFile, logger).load();
      const entries = statusEntries(snapshot, config.outputDir);

      if (maybeOutputJson<StatusJson>({ metadataFile: config.metadataFile, exists, entries })) {
        return;
      }

      if (!exists) {
        console.log(chalk.yellow(`No metadata at ${config.metadataFile}.`));
        console.log(chalk.gray("Run 'hospital-data sync' to download the datasets."));
        return;
      }

      const table = new CliTable3({
        head: [chalk.cyan("File"), chalk.cyan("Modified"), chalk.cyan("On disk")],
      });
      for (const entry of entries) {
        table.push([entry.filename, entry.modified ?? "-", entry.present ? chalk.green("yes") : chalk.red("missing")]);
      }

      console.log(chalk.gray(`Metadata: ${config.metadataFile}`));
      console.log(table.toString());
    } catch (error) {
      renderError(error, isJsonMode());
      process.exitCode = 1;
    }
  });
}
