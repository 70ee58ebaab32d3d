import { CLIError, RemoteError, errorMessage } from "./types.js";

/**
 * Factory functions so every failure of a kind reads the same way.
 */

// ============================================================================
// Catalog Errors
// ============================================================================

export function catalogHttpError(url: string, status: number, statusText: string): RemoteError {
  return new RemoteError(
    "CATALOG_HTTP_ERROR",
    `Catalog request failed (${status} ${statusText})`.trim(),
    url,
    {
      status,
      suggestion:
        status >= 500
          ? "The catalog service is having trouble. Try again later"
          : "Check the catalog URL in your config or --catalog-url",
      details: url,
    }
  );
}

export function catalogInvalidResponse(url: string, reason: string, cause?: Error): RemoteError {
  return new RemoteError("CATALOG_INVALID_RESPONSE", "Catalog response is not a JSON array", url, {
    suggestion: "Make sure the catalog URL points at the metastore dataset items endpoint",
    details: reason,
    cause,
  });
}

// ============================================================================
// Dataset Errors
// ============================================================================

export function missingDownloadUrl(title: string): CLIError {
  return new CLIError("DATASET_NO_DOWNLOAD_URL", `Dataset "${title}" has no download URL`);
}

export function datasetHttpError(url: string, status: number, statusText: string): RemoteError {
  return new RemoteError(
    "DATASET_HTTP_ERROR",
    `Download failed (${status} ${statusText})`.trim(),
    url,
    { status, details: url }
  );
}

export function invalidCsv(filename: string, cause: unknown): CLIError {
  return new CLIError("DATASET_INVALID_CSV", `Could not parse ${filename} as CSV`, {
    details: errorMessage(cause),
    cause: cause instanceof Error ? cause : undefined,
  });
}

export function writeFailed(path: string, cause: unknown): CLIError {
  return new CLIError("DATASET_WRITE_FAILED", `Could not write ${path}`, {
    suggestion: "Check that the output directory is writable and the disk is not full",
    details: errorMessage(cause),
    cause: cause instanceof Error ? cause : undefined,
  });
}

// ============================================================================
// Metadata Errors
// ============================================================================

export function metadataInvalid(path: string, reason: string): CLIError {
  return new CLIError("METADATA_INVALID", `Metadata file is corrupt: ${path}`, {
    suggestion:
      "Fix or delete the file. Deleting it makes the next run download every dataset again",
    details: reason,
  });
}

export function metadataNotReadable(path: string, cause: unknown): CLIError {
  return new CLIError("METADATA_NOT_READABLE", `Can't read metadata file ${path}`, {
    suggestion: "Check file permissions",
    details: errorMessage(cause),
    cause: cause instanceof Error ? cause : undefined,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOption(option: string, value: string, expected: string): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid value for ${option}: "${value}"`, {
    suggestion: expected,
  });
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file has errors: ${path}`, {
    suggestion: "Fix the issues below and try again",
    example: "hospital-data config validate",
    details: issues.join("\n"),
  });
}

// ============================================================================
// Network / Generic
// ============================================================================

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

export function networkUnreachable(url: string, cause: unknown): RemoteError {
  return new RemoteError("NETWORK_UNREACHABLE", `Can't reach ${hostOf(url)}`, url, {
    suggestion: "Check your internet connection and try again",
    details: errorMessage(cause),
    cause: cause instanceof Error ? cause : undefined,
  });
}

export function unknownError(error: unknown): CLIError {
  return new CLIError("UNKNOWN_ERROR", errorMessage(error), {
    cause: error instanceof Error ? error : undefined,
  });
}
