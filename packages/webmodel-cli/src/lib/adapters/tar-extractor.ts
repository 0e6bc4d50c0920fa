import type { ArchiveExtractor } from "../ports/archive-extractor.js";
import type { ProcessOutput, ProcessRunner } from "../ports/process-runner.js";
import { extractFailed } from "../errors/catalog.js";
import { exitCodeOf } from "../process-exit.js";

/**
 * tar flags for an archive name: gzip for .tar.gz/.tgz, auto otherwise.
 */
export function tarArgs(archivePath: string, destDir: string): string[] {
  const gzip = /\.(tar\.gz|tgz)$/i.test(archivePath);
  return [gzip ? "-xzf" : "-xf", archivePath, "-C", destDir];
}

/**
 * Archive extractor delegating to the system tar.
 */
export function createTarExtractor(
  runner: ProcessRunner,
  options: { command?: string; output?: ProcessOutput } = {}
): ArchiveExtractor {
  const command = options.command ?? "tar";

  return {
    async extract(archivePath: string, destDir: string): Promise<void> {
      const result = await runner.run(command, tarArgs(archivePath, destDir), {
        output: options.output,
      });
      const code = exitCodeOf(result);
      if (code !== 0) {
        throw extractFailed(archivePath, code);
      }
    },
  };
}
