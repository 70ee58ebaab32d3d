/**
 * JSON output utilities for machine-readable CLI output.
 * Errors go through renderError in errors/renderer.ts.
 */

import { isJsonMode } from "./cli-context.js";
import type { ProcessOutcome } from "./dataset-processor.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface SyncSummaryJson {
  outputDir: string;
  metadataFile: string;
  dryRun: boolean;
  datasets: ProcessOutcome[];
  summary: {
    total: number;
    updated: number;
    unchanged: number;
    pending: number;
    failed: number;
  };
}

export type CatalogStatus = "new" | "changed" | "unchanged" | "no-url";

export interface CatalogListJson {
  theme: string;
  datasets: Array<{
    identifier?: string;
    title: string;
    filename: string | null;
    modified?: string;
    downloadUrl?: string;
    status: CatalogStatus;
  }>;
}

export interface StatusJson {
  metadataFile: string;
  exists: boolean;
  entries: Array<{
    filename: string;
    modified: string | null;
    present: boolean;
  }>;
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Conditionally output JSON or return false for human output.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
