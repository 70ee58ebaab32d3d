/**
 * Global CLI context for output options shared by every command.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function envFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json") || envFlag(env.HOSPITAL_DATA_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q") || envFlag(env.HOSPITAL_DATA_QUIET)) {
    currentContext.quiet = true;
  }

  return currentContext;
}

export function getContext(): CLIContext {
  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
