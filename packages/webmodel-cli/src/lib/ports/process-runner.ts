/**
 * Where the child's stdout goes. `stderr` keeps our stdout clean when it
 * carries a JSON result.
 */
export type ProcessOutput = "inherit" | "stderr" | "ignore";

export interface RunOptions {
  cwd?: string;
  output?: ProcessOutput;
}

export interface ProcessResult {
  /** Null when the process was terminated by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Runs external programs (tar, the converter).
 */
export interface ProcessRunner {
  /** Run to completion without a shell. Rejects only if the program can't be started. */
  run(command: string, args: string[], options?: RunOptions): Promise<ProcessResult>;
}
