import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";

const SYM = {
  error: "✗",
  arrow: "→",
  prompt: "$",
};

/**
 * Get terminal width, with fallback for non-TTY.
 */
function getTerminalWidth(): number {
  return process.stderr.columns || 80;
}

/**
 * Wrap text to fit within a given width. Explicit line breaks are kept.
 */
export function wrapText(text: string, maxWidth: number): string[] {
  const lines: string[] = [];

  for (const paragraph of text.split("\n")) {
    let currentLine = "";
    for (const word of paragraph.split(" ")) {
      const testLine = currentLine ? `${currentLine} ${word}` : word;
      if (testLine.length <= maxWidth) {
        currentLine = testLine;
      } else {
        if (currentLine) lines.push(currentLine);
        currentLine = word;
      }
    }
    lines.push(currentLine);
  }

  return lines;
}

/**
 * Build the static (human-readable) error lines.
 */
export function formatStaticError(error: CLIError, width = getTerminalWidth()): string[] {
  const termWidth = Math.min(width, 80);
  const output: string[] = [""];

  const [first, ...rest] = wrapText(error.message, termWidth - 4);
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(first)}`);
  for (const line of rest) {
    output.push(`  ${chalk.red(line)}`);
  }

  if (error.details) {
    output.push("");
    for (const line of wrapText(error.details, termWidth - 4)) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  const examples = error.examples?.length ? error.examples : error.example ? [error.example] : [];

  if (error.suggestion || examples.length > 0) {
    output.push("");

    if (error.suggestion) {
      const [head, ...tail] = wrapText(error.suggestion, termWidth - 4);
      output.push(`  ${chalk.yellow(SYM.arrow)} ${head}`);
      for (const line of tail) {
        output.push(`    ${line}`);
      }
    }

    if (examples.length === 1) {
      output.push("");
      output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(examples[0])}`);
    } else if (examples.length > 1) {
      output.push("");
      output.push(`  ${chalk.dim("Examples:")}`);
      for (const ex of examples.slice(0, 3)) {
        output.push(`    ${chalk.cyan(`${SYM.prompt} ${ex}`)}`);
      }
    }
  }

  if (error.docs) {
    output.push("");
    output.push(`  ${chalk.dim("Docs:")} ${chalk.blue.underline(error.docs)}`);
  }

  output.push("");
  return output;
}

/**
 * Build the JSON error document.
 */
export function formatJSONError(error: CLIError): Record<string, unknown> {
  const output = {
    success: false,
    error: {
      code: error.code,
      exitCode: error.exitCode,
      message: error.message,
      suggestion: error.suggestion,
      example: error.example,
      examples: error.examples,
      docs: error.docs,
      details: error.details,
    },
  };

  return {
    ...output,
    error: Object.fromEntries(
      Object.entries(output.error).filter(([, v]) => v !== undefined)
    ),
  };
}

/**
 * Render an error to stderr based on the current output mode.
 */
export function renderError(error: CLIError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  switch (outputMode) {
    case "json":
      console.error(JSON.stringify(formatJSONError(error), null, 2));
      break;
    case "static":
    case "tui":
      for (const line of formatStaticError(error)) {
        console.error(line);
      }
      break;
  }
}

/**
 * Convert an unknown error to a CLIError.
 */
export function toCLIError(error: unknown): CLIError {
  if (isCLIError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new CLIError("UNKNOWN_ERROR", message, {
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * Render any thrown value and return the exit code the process should use.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): number {
  const cliError = toCLIError(error);
  renderError(cliError, mode);
  return cliError.exitCode;
}

export { CLIError, isCLIError };
