/**
 * Error codes for every failure the CLI reports.
 */
export type ErrorCode =
  // Catalog errors
  | "CATALOG_HTTP_ERROR"
  | "CATALOG_INVALID_RESPONSE"
  // Dataset errors
  | "DATASET_NO_DOWNLOAD_URL"
  | "DATASET_HTTP_ERROR"
  | "DATASET_INVALID_CSV"
  | "DATASET_WRITE_FAILED"
  // Metadata errors
  | "METADATA_INVALID"
  | "METADATA_NOT_READABLE"
  // Validation errors
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  // Network errors
  | "NETWORK_UNREACHABLE"
  // Generic
  | "UNKNOWN_ERROR";

export interface CLIErrorOptions {
  suggestion?: string;
  example?: string;
  details?: string;
  cause?: Error;
}

/**
 * Error carrying a stable code plus optional next-step hints for the user.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;

  constructor(code: ErrorCode, message: string, options?: CLIErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
  }
}

/**
 * A remote endpoint could not be reached or answered with something unusable.
 */
export class RemoteError extends CLIError {
  readonly url: string;
  /** HTTP status, absent when the request never got a response */
  readonly status?: number;

  constructor(
    code: ErrorCode,
    message: string,
    url: string,
    options?: CLIErrorOptions & { status?: number }
  ) {
    super(code, message, options);
    this.name = "RemoteError";
    this.url = url;
    this.status = options?.status;
  }
}

export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
