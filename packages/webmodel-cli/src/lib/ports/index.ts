export type { DownloadService } from "./download.js";
export type { ToolLocator } from "./tool-locator.js";
export type { ProcessRunner, ProcessResult, ProcessOutput, RunOptions } from "./process-runner.js";
export type { ArchiveExtractor } from "./archive-extractor.js";
