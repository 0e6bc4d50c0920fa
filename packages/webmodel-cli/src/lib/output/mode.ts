/**
 * Output mode detection for determining how to render CLI output.
 */

import { isJsonMode } from "../cli-context.js";

export type OutputMode = "tui" | "static" | "json";

/**
 * Detect the appropriate output mode from the CLI context and environment.
 *
 * - `tui`: Interactive terminal (spinners, colors)
 * - `static`: Plain text output (for CI, pipes, non-interactive)
 * - `json`: Structured JSON output for scripting
 */
export function getOutputMode(
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = process.stdout.isTTY === true
): OutputMode {
  if (isJsonMode()) {
    return "json";
  }

  if (env.CI || env.WEBMODEL_NON_INTERACTIVE) {
    return "static";
  }

  // Piped output
  if (!isTTY) {
    return "static";
  }

  if (env.TERM === "dumb") {
    return "static";
  }

  return "tui";
}
