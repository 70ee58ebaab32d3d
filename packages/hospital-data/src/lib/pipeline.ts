import { mkdir } from "fs/promises";
import type { CatalogFetcher, DatasetDescriptor } from "./catalog.js";
import { createCatalogFetcher } from "./catalog.js";
import type { ResolvedConfig } from "./config.js";
import {
  createDatasetProcessor,
  downloadUrlOf,
  filenameFromUrl,
  type DatasetProcessor,
  type ProcessOutcome,
} from "./dataset-processor.js";
import { createFileMetadataStore, type MetadataSnapshot, type MetadataStore } from "./metadata-store.js";
import { createQueue, type TaskResult } from "./queue.js";
import { errorMessage } from "./errors/types.js";
import { createNoopLogger, type Logger } from "./logger.js";
import type { Clock } from "./ports/clock.js";
import type { HttpClient } from "./ports/http.js";
import { systemClock } from "./adapters/system-clock.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PipelineOptions {
  outputDir: string;
  concurrency: number;
  catalog: CatalogFetcher;
  metadataStore: MetadataStore;
  processor: DatasetProcessor;
  logger?: Logger;
  clock?: Clock;
  /** Leave the snapshot and output directory untouched */
  dryRun?: boolean;
  /** Called as each dataset finishes */
  onProgress?: (outcome: ProcessOutcome, settled: number, total: number) => void;
}

export interface PipelineSummary {
  outcomes: ProcessOutcome[];
  updated: number;
  unchanged: number;
  failed: number;
  pending: number;
  /** Snapshot after merging this run's downloads */
  snapshot: MetadataSnapshot;
  /** False in dry-run mode */
  saved: boolean;
  durationMs: number;
}

export interface Pipeline {
  run(): Promise<PipelineSummary>;
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/**
 * Copy `prior` and record every successful download in it. Skipped,
 * pending and failed outcomes leave their entries as they were.
 */
export function mergeOutcomes(
  prior: Readonly<MetadataSnapshot>,
  outcomes: readonly ProcessOutcome[]
): MetadataSnapshot {
  const next: MetadataSnapshot = { ...prior };
  for (const outcome of outcomes) {
    if (outcome.status === "updated") {
      next[outcome.filename] = outcome.modified;
    }
  }
  return next;
}

// The processor reports its own failures; this is a crash inside it
function crashOutcome(descriptor: DatasetDescriptor, error: unknown): ProcessOutcome {
  const url = downloadUrlOf(descriptor);
  return {
    status: "failed",
    filename: url ? filenameFromUrl(url) : null,
    code: "UNKNOWN_ERROR",
    error: errorMessage(error),
  };
}

function toOutcome(result: TaskResult<ProcessOutcome>, descriptor: DatasetDescriptor): ProcessOutcome {
  return result.status === "fulfilled" ? result.value : crashOutcome(descriptor, result.error);
}

function countBy(outcomes: readonly ProcessOutcome[], status: ProcessOutcome["status"]): number {
  return outcomes.filter((o) => o.status === status).length;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/**
 * Fetch the catalog, process every dataset on a bounded queue, and save
 * the merged snapshot once at the end. Only this function touches the
 * snapshot; workers just return outcomes.
 */
export function createPipeline({
  outputDir,
  concurrency,
  catalog,
  metadataStore,
  processor,
  logger = createNoopLogger(),
  clock = systemClock,
  dryRun = false,
  onProgress,
}: PipelineOptions): Pipeline {
  return {
    async run() {
      const startedAt = clock.now();

      if (!dryRun) {
        await mkdir(outputDir, { recursive: true });
      }

      const prior = await metadataStore.load();
      const descriptors = await catalog.fetch();

      const queue = createQueue<ProcessOutcome>({
        concurrency,
        logger: logger.child({ component: "queue" }),
        now: () => clock.now(),
      });

      let settled = 0;
      const byTaskId = new Map<string, { index: number; descriptor: DatasetDescriptor }>();
      descriptors.forEach((descriptor, index) => {
        const id = `${index}:${descriptor.title}`;
        byTaskId.set(id, { index, descriptor });
        queue.enqueue({
          id,
          execute: async () => {
            let outcome: ProcessOutcome;
            try {
              outcome = await processor.process(descriptor, prior);
            } catch (err) {
              outcome = crashOutcome(descriptor, err);
            }
            settled += 1;
            onProgress?.(outcome, settled, descriptors.length);
            return outcome;
          },
        });
      });

      // Report in catalog order, not settlement order
      const slots: Array<ProcessOutcome | undefined> = new Array(descriptors.length);
      for (const result of await queue.drain()) {
        const task = byTaskId.get(result.id);
        if (task) slots[task.index] = toOutcome(result, task.descriptor);
      }
      const outcomes = slots.filter((o): o is ProcessOutcome => o !== undefined);

      const snapshot = mergeOutcomes(prior, outcomes);
      if (!dryRun) {
        await metadataStore.save(snapshot);
      }

      const summary: PipelineSummary = {
        outcomes,
        updated: countBy(outcomes, "updated"),
        unchanged: countBy(outcomes, "unchanged"),
        failed: countBy(outcomes, "failed"),
        pending: countBy(outcomes, "pending"),
        snapshot,
        saved: !dryRun,
        durationMs: clock.now() - startedAt,
      };

      logger.info("Sync finished", {
        datasets: descriptors.length,
        updated: summary.updated,
        unchanged: summary.unchanged,
        failed: summary.failed,
        pending: summary.pending,
        durationMs: summary.durationMs,
      });

      return summary;
    },
  };
}

export interface PipelineDeps {
  http: HttpClient;
  logger?: Logger;
  clock?: Clock;
}

/**
 * Wire the file-backed store, catalog fetcher and processor from config.
 */
export function createPipelineFromConfig(
  config: ResolvedConfig,
  { http, logger = createNoopLogger(), clock }: PipelineDeps,
  { dryRun = false, onProgress }: Pick<PipelineOptions, "dryRun" | "onProgress"> = {}
): Pipeline {
  return createPipeline({
    outputDir: config.outputDir,
    concurrency: config.concurrency,
    catalog: createCatalogFetcher({
      http,
      url: config.catalogUrl,
      theme: config.theme,
      logger: logger.child({ component: "catalog" }),
    }),
    metadataStore: createFileMetadataStore(config.metadataFile, logger.child({ component: "metadata" })),
    processor: createDatasetProcessor({
      http,
      outputDir: config.outputDir,
      logger: logger.child({ component: "dataset" }),
      dryRun,
    }),
    logger,
    clock,
    dryRun,
    onProgress,
  });
}
