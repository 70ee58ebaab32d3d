/**
 * Progress spinner for the catalog and download phases. Writes to stderr
 * so stdout stays clean for tables and JSON.
 */

import ora, { type Ora } from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  fail(text?: string): Spinner;
  text: string;
}

/**
 * No-op spinner for quiet/JSON mode and non-TTY stderr.
 */
class SilentSpinner implements Spinner {
  text = "";

  start(_text?: string): Spinner {
    return this;
  }

  stop(): Spinner {
    return this;
  }

  fail(_text?: string): Spinner {
    return this;
  }
}

class OraSpinner implements Spinner {
  private ora: Ora;

  constructor(text?: string) {
    this.ora = ora({ text, stream: process.stderr });
  }

  get text(): string {
    return this.ora.text;
  }

  set text(value: string) {
    this.ora.text = value;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  fail(text?: string): Spinner {
    // Only an active spinner has a line to replace
    if (this.ora.isSpinning) this.ora.fail(text);
    return this;
  }
}

export function createSpinner(text?: string): Spinner {
  if (isQuietMode() || isJsonMode() || !process.stderr.isTTY) {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}
