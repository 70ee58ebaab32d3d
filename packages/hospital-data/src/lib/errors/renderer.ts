import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { unknownError } from "./catalog.js";

const SYM = {
  error: "✗",
  arrow: "→",
};

function getTerminalWidth(): number {
  return Math.min(process.stdout.columns || 80, 80);
}

/**
 * Greedy word wrap. Continuation lines get `indent` prepended.
 */
export function wrapText(text: string, maxWidth: number, indent = ""): string[] {
  const lines: string[] = [];
  let currentLine = "";

  for (const word of text.split(" ")) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

/**
 * Lines printed for an error in human-readable mode.
 */
export function formatError(error: CLIError, width = getTerminalWidth()): string[] {
  const output: string[] = [""];

  const [first = "", ...rest] = wrapText(error.message, width - 4, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(first)}`);
  for (const line of rest) {
    output.push(`  ${chalk.red(line)}`);
  }

  if (error.details) {
    output.push("");
    for (const detail of error.details.split("\n")) {
      for (const line of wrapText(detail, width - 4, "  ")) {
        output.push(`  ${chalk.dim(line)}`);
      }
    }
  }

  if (error.suggestion) {
    output.push("");
    const [head = "", ...tail] = wrapText(error.suggestion, width - 4, "  ");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${head}`);
    for (const line of tail) {
      output.push(`  ${line}`);
    }
  }

  if (error.example) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
  }

  output.push("");
  return output;
}

/**
 * Plain object for `--json` error output, without undefined fields.
 */
export function errorToJson(error: CLIError): Record<string, unknown> {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    example: error.example,
    details: error.details,
  };
  return Object.fromEntries(Object.entries(output).filter(([, v]) => v !== undefined));
}

/**
 * Print any thrown value to stderr, as JSON when `json` is set.
 */
export function renderError(error: unknown, json: boolean): void {
  const cliError = isCLIError(error) ? error : unknownError(error);

  if (json) {
    console.error(JSON.stringify(errorToJson(cliError), null, 2));
    return;
  }

  for (const line of formatError(cliError)) {
    console.error(line);
  }
}

export { CLIError, isCLIError };
