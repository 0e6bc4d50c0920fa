/**
 * Abstraction for unpacking a downloaded archive.
 */
export interface ArchiveExtractor {
  /**
   * Extract archivePath into destDir, overwriting same-named entries.
   * Rejects with a CLIError carrying the extractor's exit code.
   */
  extract(archivePath: string, destDir: string): Promise<void>;
}
