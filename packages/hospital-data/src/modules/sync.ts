import type { Command } from "commander";
import chalk from "chalk";
import {
  addConfigOptions,
  createCommandLogger,
  resolveCommandConfig,
  type CommandDeps,
  type ConfigCommandOptions,
} from "../lib/command-config.js";
import { isJsonMode } from "../lib/cli-context.js";
import { renderError } from "../lib/errors/renderer.js";
import { maybeOutputJson, type SyncSummaryJson } from "../lib/json-output.js";
import { createPipelineFromConfig, type PipelineSummary } from "../lib/pipeline.js";
import { createSpinner } from "../lib/spinner.js";

interface SyncOptions extends ConfigCommandOptions {
  dryRun?: boolean;
}

function formatDuration(ms: number): string {
  return ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Human-readable run summary, one line per failure.
 */
export function formatSummary(summary: PipelineSummary, outputDir: string, dryRun: boolean): string[] {
  const lines: string[] = [];
  const duration = chalk.gray(`(${formatDuration(summary.durationMs)})`);

  if (dryRun) {
    lines.push(
      `${chalk.cyan("Dry run:")} ${summary.pending} to download, ${summary.unchanged} unchanged ${duration}`
    );
    for (const outcome of summary.outcomes) {
      if (outcome.status === "pending") {
        lines.push(`  ${chalk.cyan("+")} ${outcome.filename}`);
      }
    }
  } else {
    const mark = summary.failed > 0 ? chalk.yellow("!") : chalk.green("✓");
    lines.push(
      `${mark} ${summary.updated} updated, ${summary.unchanged} unchanged, ${summary.failed} failed ${duration}`
    );
    if (summary.updated > 0) {
      lines.push(chalk.gray(`  Files written to ${outputDir}`));
    }
  }

  for (const outcome of summary.outcomes) {
    if (outcome.status === "failed") {
      lines.push(`  ${chalk.red("✗")} ${outcome.filename ?? "(no filename)"}: ${outcome.error}`);
    }
  }

  return lines;
}

export function registerSyncCommand(program: Command, deps: CommandDeps): void {
  addConfigOptions(
    program
      .command("sync", { isDefault: true })
      .description("Download new and changed hospital datasets")
      .option("--dry-run", "Show what would be downloaded without writing anything")
  ).action(async (options: SyncOptions) => {
    const spinner = createSpinner();
    try {
      const { config } = resolveCommandConfig(options, deps.env);
      const logger = createCommandLogger(config);
      const dryRun = options.dryRun ?? false;

      spinner.start(`Fetching ${config.theme} catalog`);
      const pipeline = createPipelineFromConfig(
        config,
        { http: deps.http, logger, clock: deps.clock },
        {
          dryRun,
          onProgress: (_outcome, settled, total) => {
            spinner.text = `Processing datasets ${settled}/${total}`;
          },
        }
      );
      const summary = await pipeline.run();
      spinner.stop();

      const json: SyncSummaryJson = {
        outputDir: config.outputDir,
        metadataFile: config.metadataFile,
        dryRun,
        datasets: summary.outcomes,
        summary: {
          total: summary.outcomes.length,
          updated: summary.updated,
          unchanged: summary.unchanged,
          pending: summary.pending,
          failed: summary.failed,
        },
      };

      if (!maybeOutputJson(json, { duration: summary.durationMs })) {
        for (const line of formatSummary(summary, config.outputDir, dryRun)) {
          console.log(line);
        }
      }

      if (summary.failed > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      spinner.fail("Sync failed");
      renderError(error, isJsonMode());
      process.exitCode = 1;
    }
  });
}
