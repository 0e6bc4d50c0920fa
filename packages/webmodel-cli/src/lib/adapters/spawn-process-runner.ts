import { spawn, type StdioOptions } from "child_process";
import type { ProcessOutput, ProcessResult, ProcessRunner } from "../ports/process-runner.js";
import { spawnFailed } from "../errors/catalog.js";

function stdioFor(output: ProcessOutput): StdioOptions {
  switch (output) {
    case "inherit":
      return ["ignore", "inherit", "inherit"];
    case "stderr":
      // child stdout onto our stderr (fd 2)
      return ["ignore", 2, "inherit"];
    case "ignore":
      return "ignore";
  }
}

/**
 * Real process runner using child_process.spawn (no shell).
 */
export const spawnProcessRunner: ProcessRunner = {
  run(command, args, options = {}): Promise<ProcessResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        stdio: stdioFor(options.output ?? "inherit"),
        shell: false,
      });

      child.once("error", (error) => {
        reject(spawnFailed(command, error.message));
      });

      child.once("close", (exitCode, signal) => {
        resolve({ exitCode, signal });
      });
    });
  },
};
