export { createFetchDownloadService, fetchDownloadService } from "./fetch-download.js";
export { createPathToolLocator, pathToolLocator } from "./path-tool-locator.js";
export { spawnProcessRunner } from "./spawn-process-runner.js";
export { createTarExtractor } from "./tar-extractor.js";
