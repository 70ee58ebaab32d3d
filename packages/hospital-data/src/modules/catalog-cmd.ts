import type { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { createCatalogFetcher, type DatasetDescriptor } from "../lib/catalog.js";
import {
  addConfigOptions,
  createCommandLogger,
  resolveCommandConfig,
  type CommandDeps,
  type ConfigCommandOptions,
} from "../lib/command-config.js";
import { isJsonMode } from "../lib/cli-context.js";
import { downloadUrlOf, filenameFromUrl } from "../lib/dataset-processor.js";
import { renderError } from "../lib/errors/renderer.js";
import { maybeOutputJson, type CatalogListJson, type CatalogStatus } from "../lib/json-output.js";
import { createFileMetadataStore, type MetadataSnapshot } from "../lib/metadata-store.js";
import { createSpinner } from "../lib/spinner.js";

type CatalogRow = CatalogListJson["datasets"][number];

/**
 * Compare a catalog entry against the snapshot the way a sync would.
 */
export function catalogStatus(
  filename: string | null,
  modified: string | undefined,
  snapshot: Readonly<MetadataSnapshot>
): CatalogStatus {
  if (filename === null) return "no-url";
  if (!Object.hasOwn(snapshot, filename)) return "new";
  return snapshot[filename] === (modified ?? null) ? "unchanged" : "changed";
}

export function toCatalogRows(
  descriptors: readonly DatasetDescriptor[],
  snapshot: Readonly<MetadataSnapshot>
): CatalogRow[] {
  return descriptors.map((descriptor) => {
    const downloadUrl = downloadUrlOf(descriptor);
    const filename = downloadUrl ? filenameFromUrl(downloadUrl) : null;
    return {
      identifier: descriptor.identifier,
      title: descriptor.title,
      filename,
      modified: descriptor.modified,
      downloadUrl,
      status: catalogStatus(filename, descriptor.modified, snapshot),
    };
  });
}

const STATUS_COLORS: Record<CatalogStatus, (text: string) => string> = {
  new: chalk.green,
  changed: chalk.yellow,
  unchanged: chalk.gray,
  "no-url": chalk.red,
};

function printCatalogTable(rows: readonly CatalogRow[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("Title"), chalk.cyan("File"), chalk.cyan("Modified"), chalk.cyan("Status")],
    colWidths: [45, 30, 12, 11],
    wordWrap: true,
  });

  for (const row of rows) {
    table.push([row.title, row.filename ?? "-", row.modified ?? "-", STATUS_COLORS[row.status](row.status)]);
  }

  console.log(table.toString());
}

export function registerCatalogCommand(program: Command, deps: CommandDeps): void {
  addConfigOptions(
    program.command("catalog").description("List the datasets a sync would consider")
  ).action(async (options: ConfigCommandOptions) => {
    const spinner = createSpinner();
    try {
      const { config } = resolveCommandConfig(options, deps.env);
      const logger = createCommandLogger(config);

      spinner.start(`Fetching ${config.theme} catalog`);
      const fetcher = createCatalogFetcher({
        http: deps.http,
        url: config.catalogUrl,
        theme: config.theme,
        logger: logger.child({ component: "catalog" }),
      });
      const [descriptors, snapshot] = await Promise.all([
        fetcher.fetch(),
        createFileMetadataStore(config.metadataFile, logger).load(),
      ]);
      spinner.stop();

      const rows = toCatalogRows(descriptors, snapshot);
      if (maybeOutputJson<CatalogListJson>({ theme: config.theme, datasets: rows })) {
        return;
      }

      if (rows.length === 0) {
        console.log(chalk.yellow(`No datasets match theme "${config.theme}".`));
        return;
      }

      printCatalogTable(rows);
      const pending = rows.filter((r) => r.status === "new" || r.status === "changed").length;
      console.log(chalk.gray(`\n${rows.length} datasets, ${pending} to download`));
    } catch (error) {
      spinner.fail("Could not list the catalog");
      renderError(error, isJsonMode());
      process.exitCode = 1;
    }
  });
}
