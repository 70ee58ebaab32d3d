import { join } from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import type { DatasetDescriptor } from "./catalog.js";
import type { MetadataSnapshot } from "./metadata-store.js";
import type { HttpClient } from "./ports/http.js";
import { writeFileAtomic } from "./atomic-write.js";
import { normalizeHeaders } from "./normalize.js";
import {
  datasetHttpError,
  invalidCsv,
  missingDownloadUrl,
  writeFailed,
} from "./errors/catalog.js";
import { errorMessage, isCLIError, type ErrorCode } from "./errors/types.js";
import { createNoopLogger, type Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ProcessOutcome =
  | {
      status: "updated";
      filename: string;
      /** null when the catalog entry carried no modified stamp */
      modified: string | null;
      path: string;
      rows: number;
    }
  | { status: "unchanged"; filename: string; modified: string | null }
  | { status: "pending"; filename: string; modified: string | null }
  | {
      status: "failed";
      /** null when no filename could be derived from the entry */
      filename: string | null;
      code: ErrorCode;
      error: string;
    };

export interface DatasetProcessorOptions {
  http: HttpClient;
  /** Directory output files are written to */
  outputDir: string;
  logger?: Logger;
  /** Decide and report, but fetch and write nothing */
  dryRun?: boolean;
}

export interface DatasetProcessor {
  process(descriptor: DatasetDescriptor, prior: Readonly<MetadataSnapshot>): Promise<ProcessOutcome>;
}

export interface NormalizedTable {
  headers: string[];
  rows: string[][];
}

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

/**
 * Last path segment of a download URL, used verbatim as the output name.
 * Returns null when the URL is unparseable or ends in a slash.
 */
export function filenameFromUrl(downloadUrl: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(downloadUrl).pathname;
  } catch {
    return null;
  }

  const segment = pathname.split("/").pop() ?? "";
  if (segment === "" || segment === "." || segment === "..") {
    return null;
  }
  return segment;
}

export function downloadUrlOf(descriptor: DatasetDescriptor): string | undefined {
  return descriptor.distribution?.[0]?.downloadURL || undefined;
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
  );
}

/**
 * Parse CSV text and rewrite its header row. Data rows come back as-is,
 * except that rows shorter than the header are padded with empty cells.
 * Rows with more fields than the header fail.
 */
export function normalizeCsv(content: string, filename: string): NormalizedTable {
  let records: unknown;
  try {
    records = parse(content, { bom: true, skip_empty_lines: true, relax_column_count_less: true });
  } catch (err) {
    throw invalidCsv(filename, err);
  }

  if (!isStringMatrix(records) || records.length === 0) {
    throw invalidCsv(filename, "No header row");
  }

  const [header, ...rows] = records;
  return {
    headers: normalizeHeaders(header),
    rows: rows.map((row) =>
      row.length < header.length ? [...row, ...new Array<string>(header.length - row.length).fill("")] : row
    ),
  };
}

export function serializeCsv(table: NormalizedTable): string {
  return stringify([table.headers, ...table.rows]);
}

// ---------------------------------------------------------------------------
// Processor
// ---------------------------------------------------------------------------

/**
 * Download, normalize and store one catalog entry. Every failure is
 * returned as a `failed` outcome, never thrown, so one bad dataset
 * cannot take down the run.
 */
export function createDatasetProcessor({
  http,
  outputDir,
  logger = createNoopLogger(),
  dryRun = false,
}: DatasetProcessorOptions): DatasetProcessor {
  async function downloadAndWrite(
    descriptor: DatasetDescriptor,
    downloadUrl: string,
    filename: string,
    log: Logger
  ): Promise<ProcessOutcome> {
    log.info("Downloading", { title: descriptor.title, url: downloadUrl });
    const response = await http.get(downloadUrl);
    if (!response.ok) {
      throw datasetHttpError(downloadUrl, response.status, response.statusText);
    }

    const table = normalizeCsv(response.body, filename);
    const path = join(outputDir, filename);

    try {
      await writeFileAtomic(path, serializeCsv(table));
    } catch (err) {
      throw writeFailed(path, err);
    }

    log.info("Saved", { path, rows: table.rows.length });
    return {
      status: "updated",
      filename,
      modified: descriptor.modified ?? null,
      path,
      rows: table.rows.length,
    };
  }

  return {
    async process(descriptor, prior) {
      const downloadUrl = downloadUrlOf(descriptor);
      const filename = downloadUrl ? filenameFromUrl(downloadUrl) : null;

      if (!downloadUrl || !filename) {
        const error = missingDownloadUrl(descriptor.title);
        logger.error("Failed to process dataset", { title: descriptor.title, error: error.message });
        return { status: "failed", filename: null, code: error.code, error: error.message };
      }

      const log = logger.child({ filename });
      const modified = descriptor.modified ?? null;

      // A missing stamp is recorded as null and matches only another null
      if (Object.hasOwn(prior, filename) && prior[filename] === modified) {
        log.info("Skipping (unchanged)", { modified });
        return { status: "unchanged", filename, modified };
      }

      if (dryRun) {
        log.info("Would download", { title: descriptor.title, url: downloadUrl });
        return { status: "pending", filename, modified };
      }

      try {
        return await downloadAndWrite(descriptor, downloadUrl, filename, log);
      } catch (err) {
        const code: ErrorCode = isCLIError(err) ? err.code : "UNKNOWN_ERROR";
        const message = errorMessage(err);
        const details = isCLIError(err) ? err.details : undefined;
        log.error("Failed to process dataset", { code, error: message, details });
        return { status: "failed", filename, code, error: message };
      }
    },
  };
}
