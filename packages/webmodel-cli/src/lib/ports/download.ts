/**
 * Abstraction for file download operations.
 * Allows testing without actual network requests.
 */
export interface DownloadService {
  /**
   * Download a file from URL to local path with a single GET.
   * Rejects with a CLIError whose exitCode identifies the failure.
   */
  download(url: string, outputPath: string): Promise<void>;
}
