/**
 * Spinner wrapper that respects quiet/JSON mode.
 * Spinners render on stderr so stdout stays clean for piping.
 */

import ora, { type Ora } from "ora";
import { isQuietMode } from "./cli-context.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  text: string;
  readonly isSpinning: boolean;
}

/**
 * No-op spinner for quiet/JSON mode.
 */
class SilentSpinner implements Spinner {
  text: string;
  isSpinning = false;

  constructor(text = "") {
    this.text = text;
  }

  start(text?: string): Spinner {
    if (text !== undefined) this.text = text;
    this.isSpinning = true;
    return this;
  }

  stop(): Spinner {
    this.isSpinning = false;
    return this;
  }

  succeed(_text?: string): Spinner {
    return this.stop();
  }

  fail(_text?: string): Spinner {
    return this.stop();
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

  get isSpinning(): boolean {
    return this.ora.isSpinning;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  succeed(text?: string): Spinner {
    this.ora.succeed(text);
    return this;
  }

  fail(text?: string): Spinner {
    this.ora.fail(text);
    return this;
  }
}

/**
 * Create a spinner that respects quiet/JSON mode.
 */
export function createSpinner(text?: string): Spinner {
  if (isQuietMode()) {
    return new SilentSpinner(text);
  }
  return new OraSpinner(text);
}

/**
 * Log a progress line to stderr unless quiet.
 */
export function logProgress(message: string): void {
  if (!isQuietMode()) {
    console.error(message);
  }
}
