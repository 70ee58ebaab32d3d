import { Command } from "commander";
import { readFileSync } from "fs";
import { initContext } from "./lib/cli-context.js";
import { nodeFetchHttpClient, systemClock } from "./lib/adapters/index.js";
import type { CommandDeps } from "./lib/command-config.js";
import { errorMessage } from "./lib/errors/types.js";
import { registerCatalogCommand } from "./modules/catalog-cmd.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerStatusCommand } from "./modules/status.js";
import { registerSyncCommand } from "./modules/sync.js";

export { createPipeline, createPipelineFromConfig, mergeOutcomes } from "./lib/pipeline.js";
export type { Pipeline, PipelineOptions, PipelineSummary } from "./lib/pipeline.js";
export { createCatalogFetcher, matchesTheme } from "./lib/catalog.js";
export type { CatalogFetcher, DatasetDescriptor } from "./lib/catalog.js";
export { createDatasetProcessor, filenameFromUrl, normalizeCsv } from "./lib/dataset-processor.js";
export type { DatasetProcessor, ProcessOutcome } from "./lib/dataset-processor.js";
export { createFileMetadataStore, createMemoryMetadataStore } from "./lib/metadata-store.js";
export type { MetadataSnapshot, MetadataStore } from "./lib/metadata-store.js";
export { normalizeColumnName, normalizeHeaders } from "./lib/normalize.js";
export { loadConfig, resolveConfig } from "./lib/config.js";
export type { ResolvedConfig } from "./lib/config.js";
export { createLogger } from "./lib/logger.js";
export type { Logger } from "./lib/logger.js";
export { CLIError, RemoteError } from "./lib/errors/types.js";
export type { ErrorCode } from "./lib/errors/types.js";
export { createNodeFetchHttpClient } from "./lib/adapters/index.js";
export type { HttpClient, HttpResponse, Clock } from "./lib/ports/index.js";

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export function createProgram(deps: CommandDeps): Command {
  const program = new Command()
    .name("hospital-data")
    .description("Download and normalize CMS provider-data hospital datasets")
    .version(readVersion());

  registerSyncCommand(program, deps);
  registerCatalogCommand(program, deps);
  registerStatusCommand(program, deps);
  registerConfigCommands(program);

  return program;
}

export async function main(
  argv = process.argv,
  deps: CommandDeps = { http: nodeFetchHttpClient, clock: systemClock }
): Promise<void> {
  initContext(argv, deps.env);
  const program = createProgram(deps);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    console.error(errorMessage(error));
    process.exitCode = 1;
  }
}
