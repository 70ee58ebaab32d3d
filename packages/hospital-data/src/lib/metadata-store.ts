import { readFile } from "fs/promises";
import { z } from "zod";
import { writeFileAtomic } from "./atomic-write.js";
import { metadataInvalid, metadataNotReadable } from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";
import { createNoopLogger, type Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Output filename -> `modified` value of the catalog entry last written;
 * null when that entry carried no stamp
 */
export type MetadataSnapshot = Record<string, string | null>;

export interface MetadataStore {
  /** Read the snapshot; `{}` when nothing has been saved yet */
  load(): Promise<MetadataSnapshot>;
  /** Replace the stored snapshot */
  save(snapshot: MetadataSnapshot): Promise<void>;
}

const SnapshotSchema = z.record(z.string(), z.string().nullable());

// ---------------------------------------------------------------------------
// File-backed store
// ---------------------------------------------------------------------------

function isNotFound(error: unknown): boolean {
  return error instanceof Error && (error as NodeJS.ErrnoException).code === "ENOENT";
}

/**
 * Parse and validate snapshot JSON. Throws METADATA_INVALID on anything
 * other than an object of string or null values.
 */
export function parseSnapshot(content: string, path: string): MetadataSnapshot {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw metadataInvalid(path, `Invalid JSON: ${errorMessage(err)}`);
  }

  const result = SnapshotSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    throw metadataInvalid(path, issues);
  }

  return result.data;
}

export function serializeSnapshot(snapshot: MetadataSnapshot): string {
  return `${JSON.stringify(snapshot, null, 2)}\n`;
}

/**
 * Store the snapshot as pretty-printed JSON at `path`.
 */
export function createFileMetadataStore(
  path: string,
  logger: Logger = createNoopLogger()
): MetadataStore {
  return {
    async load() {
      let content: string;
      try {
        content = await readFile(path, "utf-8");
      } catch (err) {
        if (isNotFound(err)) {
          logger.debug("No metadata file yet, starting empty", { path });
          return {};
        }
        throw metadataNotReadable(path, err);
      }

      const snapshot = parseSnapshot(content, path);
      logger.debug("Loaded metadata", { path, entries: Object.keys(snapshot).length });
      return snapshot;
    },

    async save(snapshot) {
      await writeFileAtomic(path, serializeSnapshot(snapshot));
      logger.debug("Saved metadata", { path, entries: Object.keys(snapshot).length });
    },
  };
}

/**
 * In-memory store, for dry runs and tests.
 */
export function createMemoryMetadataStore(initial: MetadataSnapshot = {}): MetadataStore & {
  saves: MetadataSnapshot[];
} {
  let current: MetadataSnapshot = { ...initial };
  const saves: MetadataSnapshot[] = [];
  return {
    saves,
    async load() {
      return { ...current };
    },
    async save(snapshot) {
      current = { ...snapshot };
      saves.push({ ...snapshot });
    },
  };
}
