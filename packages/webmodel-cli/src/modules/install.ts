/**
 * Install command - download the model archive and convert it for the web.
 * Default command: `webmodel` with no arguments runs it.
 */

import { Command, Option } from "commander";
import chalk from "chalk";
import { loadConfig, type ResolvedConfig } from "../lib/config.js";
import {
  consoleSink,
  createLogger,
  LOG_LEVEL_NAMES,
  stderrSink,
  type LogLevel,
} from "../lib/logger.js";
import { createSpinner, logProgress } from "../lib/spinner.js";
import { isJsonMode } from "../lib/cli-context.js";
import { outputSuccess, type InstallResultJson } from "../lib/json-output.js";
import { invalidOption } from "../lib/errors/catalog.js";
import { runInstall, type InstallDeps, type InstallResult, type InstallStep } from "../lib/installer.js";
import {
  createTarExtractor,
  fetchDownloadService,
  pathToolLocator,
  spawnProcessRunner,
} from "../lib/adapters/index.js";

export type InstallServices = Omit<InstallDeps, "logger">;

/** Where config files are looked up; tests point these at temp dirs */
export interface CommandEnv {
  cwd?: string;
  userConfigPath?: string;
}

export interface InstallCommandOptions {
  workDir?: string;
  outputDir?: string;
  url?: string;
  converter?: string;
  config?: string;
  logLevel?: LogLevel;
  logJson?: boolean;
}

export function defaultInstallServices(): InstallServices {
  return {
    downloader: fetchDownloadService,
    extractor: createTarExtractor(spawnProcessRunner),
    runner: spawnProcessRunner,
    locator: pathToolLocator,
  };
}

export function registerInstallCommand(
  program: Command,
  services: InstallServices = defaultInstallServices(),
  env: CommandEnv = {}
): void {
  program
    .command("install", { isDefault: true })
    .description("Download the model archive and convert it into a web model")
    .option("--work-dir <dir>", "Directory for the downloaded and extracted archive")
    .option("--output-dir <dir>", "Directory the converted model is written to")
    .option("--url <url>", "Archive URL")
    .option("--converter <command>", "Converter executable to run")
    .option("-c, --config <path>", "Config file to use instead of ./webmodel.yaml")
    .addOption(
      new Option("--log-level <level>", "Log level").choices([...LOG_LEVEL_NAMES])
    )
    .option("--log-json", "Emit logs as JSON lines")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("What it does:")}
  ${chalk.yellow("•")} Exits immediately if the output directory already exists
  ${chalk.yellow("•")} Fails with exit code 1 if the converter is not on PATH
  ${chalk.yellow("•")} Downloads and extracts the archive into the working directory
  ${chalk.yellow("•")} Runs the converter into the output directory

${chalk.bold.cyan("Examples:")}
  webmodel                                ${chalk.gray("Install with ./webmodel.yaml or defaults")}
  webmodel install --output-dir public/model
  webmodel install --json                 ${chalk.gray("Output the result as JSON")}
`
    )
    .action(async (options: InstallCommandOptions) => {
      await runInstallCommand(options, services, env);
    });
}

function cliOverrides(options: InstallCommandOptions): Partial<ResolvedConfig> {
  if (options.url !== undefined && !URL.canParse(options.url)) {
    throw invalidOption("url", `not an absolute URL: ${options.url}`);
  }

  return {
    workDir: options.workDir,
    outputDir: options.outputDir,
    archiveUrl: options.url,
    converter: options.converter,
    logLevel: options.logLevel,
    logJson: options.logJson,
  };
}

export function toInstallResultJson(result: InstallResult): InstallResultJson {
  if (result.status === "already-installed") {
    return { status: result.status, outputDir: result.outputDir };
  }
  return {
    status: result.status,
    outputDir: result.outputDir,
    workDir: result.workDir,
    archivePath: result.archivePath,
    sourceDir: result.sourceDir,
    converter: { path: result.converterPath, args: result.converterArgs },
  };
}

export async function runInstallCommand(
  options: InstallCommandOptions,
  services: InstallServices,
  env: CommandEnv = {}
): Promise<InstallResult> {
  const { config } = loadConfig({
    explicitPath: options.config,
    cwd: env.cwd,
    userConfigPath: env.userConfigPath,
    cliOptions: cliOverrides(options),
  });

  const logger = createLogger({
    level: config.logLevel,
    json: config.logJson,
    // stdout carries only the result document in JSON mode
    sink: isJsonMode() ? stderrSink : consoleSink,
  });
  const spinner = createSpinner();

  const onStep = (step: InstallStep, detail: string) => {
    switch (step) {
      case "download":
        spinner.start(`Downloading ${detail}`);
        break;
      case "extract":
        spinner.succeed("Downloaded archive");
        spinner.start("Extracting archive");
        break;
      case "convert":
        spinner.succeed("Extracted archive");
        // no spinner here; the converter writes to the terminal itself
        logProgress(chalk.dim(`$ ${detail}`));
        break;
      default:
        break;
    }
  };

  let result: InstallResult;
  try {
    result = await runInstall(
      config,
      { ...services, logger },
      {
        cwd: env.cwd,
        onStep,
        converterOutput: isJsonMode() ? "stderr" : "inherit",
      }
    );
  } catch (error) {
    if (spinner.isSpinning) spinner.fail();
    throw error;
  }

  if (isJsonMode()) {
    outputSuccess(toInstallResultJson(result));
    return result;
  }

  if (result.status === "already-installed") {
    console.log(chalk.green(`✓ Already installed: ${result.outputDir}`));
  } else {
    console.log(chalk.green(`✓ Web model written to ${result.outputDir}`));
  }

  return result;
}
