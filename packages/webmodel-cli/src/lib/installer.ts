import { mkdir, stat } from "fs/promises";
import { join, posix, resolve } from "path";
import type { InstallConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type {
  ArchiveExtractor,
  DownloadService,
  ProcessOutput,
  ProcessRunner,
  ToolLocator,
} from "./ports/index.js";
import { buildConverterArgs } from "./converter.js";
import { resolveSourcePattern } from "./source-pattern.js";
import { exitCodeOf } from "./process-exit.js";
import { conversionFailed, sourceNotFound, toolNotFound } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type InstallStep = "check" | "locate" | "prepare" | "download" | "extract" | "convert";

export interface InstallDeps {
  downloader: DownloadService;
  extractor: ArchiveExtractor;
  runner: ProcessRunner;
  locator: ToolLocator;
  logger: Logger;
}

export interface InstallOptions {
  /** Base for relative workDir/outputDir (defaults to process.cwd()) */
  cwd?: string;
  /** Called as each step begins */
  onStep?: (step: InstallStep, detail: string) => void;
  /** Where the converter's stdout goes */
  converterOutput?: ProcessOutput;
}

export interface AlreadyInstalled {
  status: "already-installed";
  outputDir: string;
}

export interface Installed {
  status: "installed";
  workDir: string;
  outputDir: string;
  archivePath: string;
  /** Extracted directory handed to the converter, relative to workDir */
  sourceDir: string;
  converterPath: string;
  converterArgs: string[];
}

export type InstallResult = AlreadyInstalled | Installed;

const FALLBACK_ARCHIVE_NAME = "archive.tar.gz";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * File name the archive is saved under: the configured name, else the last
 * segment of the URL path, reduced to a plain file name.
 */
export function archiveFileNameFor(config: Pick<InstallConfig, "archiveUrl" | "archiveFileName">): string {
  if (config.archiveFileName) return config.archiveFileName;

  let pathname: string;
  try {
    pathname = new URL(config.archiveUrl).pathname;
  } catch {
    return FALLBACK_ARCHIVE_NAME;
  }

  let decoded: string;
  try {
    decoded = decodeURIComponent(posix.basename(pathname));
  } catch {
    decoded = posix.basename(pathname);
  }

  // an encoded separator must not lead the archive out of workDir
  const name = posix.basename(decoded);
  if (!name || name === "." || name === ".." || name.includes("\\")) {
    return FALLBACK_ARCHIVE_NAME;
  }
  return name;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Whether a previous run counts as complete. "directory" only checks that
 * the output directory exists; its contents are never looked at.
 */
export async function isInstalled(
  config: Pick<InstallConfig, "completionCheck" | "markerFile">,
  outputDir: string
): Promise<boolean> {
  if (!(await isDirectory(outputDir))) return false;
  if (config.completionCheck === "marker") {
    return exists(join(outputDir, config.markerFile));
  }
  return true;
}

// ---------------------------------------------------------------------------
// Procedure
// ---------------------------------------------------------------------------

/**
 * Provision the web model: guard on existing output, guard on the converter
 * being installed, then download, extract and convert.
 *
 * Nothing is cleaned up on failure; a re-run downloads into the same
 * working directory again.
 */
export async function runInstall(
  config: InstallConfig,
  deps: InstallDeps,
  options: InstallOptions = {}
): Promise<InstallResult> {
  const cwd = options.cwd ?? process.cwd();
  const workDir = resolve(cwd, config.workDir);
  const outputDir = resolve(cwd, config.outputDir);
  const logger = deps.logger.child({ component: "installer" });
  const step = (name: InstallStep, detail: string) => {
    logger.debug("Step started", { step: name, detail });
    options.onStep?.(name, detail);
  };

  step("check", outputDir);
  if (await isInstalled(config, outputDir)) {
    logger.info("Already installed", { outputDir });
    return { status: "already-installed", outputDir };
  }

  step("locate", config.converter);
  const converterPath = await deps.locator.locate(config.converter);
  if (!converterPath) {
    throw toolNotFound(config.converter);
  }
  logger.debug("Converter found", { converterPath });

  step("prepare", workDir);
  await mkdir(workDir, { recursive: true });

  const archivePath = join(workDir, archiveFileNameFor(config));
  step("download", config.archiveUrl);
  await deps.downloader.download(config.archiveUrl, archivePath);
  logger.info("Archive downloaded", { archivePath });

  step("extract", archivePath);
  await deps.extractor.extract(archivePath, workDir);

  const candidates = await resolveSourcePattern(workDir, config.sourcePattern);
  const sourceDir = candidates.at(-1);
  if (sourceDir === undefined) {
    throw sourceNotFound(config.sourcePattern, workDir);
  }
  if (candidates.length > 1) {
    logger.warn("Several directories match the source pattern; using the last", {
      pattern: config.sourcePattern,
      candidates,
      sourceDir,
    });
  }

  const converterArgs = buildConverterArgs(config, workDir, sourceDir, outputDir);
  step("convert", `${config.converter} ${converterArgs.join(" ")}`);
  const result = await deps.runner.run(converterPath, converterArgs, {
    cwd: workDir,
    output: options.converterOutput,
  });
  const code = exitCodeOf(result);
  if (code !== 0) {
    throw conversionFailed(config.converter, code);
  }

  logger.info("Conversion finished", { outputDir });

  return {
    status: "installed",
    workDir,
    outputDir,
    archivePath,
    sourceDir,
    converterPath,
    converterArgs,
  };
}
