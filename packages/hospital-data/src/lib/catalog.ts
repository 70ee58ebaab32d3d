import { z } from "zod";
import type { HttpClient } from "./ports/http.js";
import { catalogHttpError, catalogInvalidResponse } from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";
import { createNoopLogger, type Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * One entry of the provider-data metastore listing. Only the fields the
 * sync reads are declared; everything else passes through untouched.
 */
export const DatasetDescriptorSchema = z
  .object({
    identifier: z.string().optional(),
    title: z.string(),
    theme: z.union([z.string(), z.array(z.string())]).optional(),
    /** Opaque; only ever compared for equality */
    modified: z.string().optional(),
    distribution: z
      .array(z.object({ downloadURL: z.string().optional() }).passthrough())
      .optional(),
  })
  .passthrough();

export type DatasetDescriptor = z.infer<typeof DatasetDescriptorSchema>;

export interface CatalogFetcher {
  /** Fetch the catalog and keep the entries matching the configured theme */
  fetch(): Promise<DatasetDescriptor[]>;
}

export interface CatalogFetcherOptions {
  http: HttpClient;
  url: string;
  theme: string;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Filtering
// ---------------------------------------------------------------------------

/**
 * True when the entry's theme mentions `theme`. A string theme is matched
 * as a substring, a list theme element by element. Anything else,
 * including a missing theme, does not match.
 */
export function matchesTheme(entry: unknown, theme: string): boolean {
  if (typeof entry !== "object" || entry === null || !("theme" in entry)) {
    return false;
  }

  const value = entry.theme;
  if (typeof value === "string") {
    return value.includes(theme);
  }
  if (Array.isArray(value)) {
    return value.some((item) => typeof item === "string" && item.includes(theme));
  }
  return false;
}

// ---------------------------------------------------------------------------
// Fetcher
// ---------------------------------------------------------------------------

export function createCatalogFetcher({
  http,
  url,
  theme,
  logger = createNoopLogger(),
}: CatalogFetcherOptions): CatalogFetcher {
  return {
    async fetch() {
      logger.debug("Fetching catalog", { url });
      const response = await http.get(url);

      if (!response.ok) {
        throw catalogHttpError(url, response.status, response.statusText);
      }

      let payload: unknown;
      try {
        payload = JSON.parse(response.body);
      } catch (err) {
        throw catalogInvalidResponse(
          url,
          `Body is not JSON: ${errorMessage(err)}`,
          err instanceof Error ? err : undefined
        );
      }

      if (!Array.isArray(payload)) {
        throw catalogInvalidResponse(url, `Expected an array, got ${payload === null ? "null" : typeof payload}`);
      }

      const descriptors: DatasetDescriptor[] = [];
      for (const entry of payload) {
        if (!matchesTheme(entry, theme)) continue;

        const parsed = DatasetDescriptorSchema.safeParse(entry);
        if (!parsed.success) {
          logger.warn("Skipping malformed catalog entry", {
            issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
          });
          continue;
        }
        descriptors.push(parsed.data);
      }

      logger.info("Catalog fetched", {
        total: payload.length,
        matching: descriptors.length,
        theme,
      });
      return descriptors;
    },
  };
}
