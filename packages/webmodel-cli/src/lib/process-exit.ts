import { constants } from "os";
import type { ProcessResult } from "./ports/process-runner.js";

/**
 * Exit status as a shell reports it: the child's code, or 128 plus the
 * signal number when it was killed.
 */
export function exitCodeOf(result: ProcessResult): number {
  if (result.exitCode !== null) return result.exitCode;
  if (result.signal) {
    const entry = Object.entries(constants.signals).find(([name]) => name === result.signal);
    return 128 + (entry?.[1] ?? 0);
  }
  return 1;
}
