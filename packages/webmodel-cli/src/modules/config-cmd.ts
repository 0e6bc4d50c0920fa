import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname, join, resolve } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  PROJECT_CONFIG_FILENAME,
  USER_CONFIG_PATH,
} from "../lib/config.js";
import { isJsonMode } from "../lib/cli-context.js";
import { invalidOption } from "../lib/errors/catalog.js";
import { renderError, renderUnknownError, toCLIError } from "../lib/errors/renderer.js";
import type { CLIError } from "../lib/errors/types.js";
import {
  outputSuccess,
  type ConfigShowJson,
  type ConfigValidateJson,
} from "../lib/json-output.js";
import type { CommandEnv } from "./install.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

export const EXAMPLE_CONFIG = `# webmodel configuration
# Place at ./${PROJECT_CONFIG_FILENAME} (project) or ~/.config/webmodel/config.yaml (user)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. Project config (./${PROJECT_CONFIG_FILENAME}, or --config <path>)
# 3. User config (~/.config/webmodel/config.yaml)
# 4. Built-in defaults

install:
  # Scratch directory for the downloaded and extracted archive (never cleaned up)
  workDir: model

  # Converted model destination
  outputDir: web_model

  # "directory": an existing outputDir counts as installed
  # "marker": outputDir must also contain markerFile
  completionCheck: directory
  markerFile: model.json

archive:
  # Tarball with the exported model
  url: "https://example.com/models/mnist_saved_model.tar.gz"

  # Saved under this name inside workDir (default: last segment of the URL)
  # fileName: saved_model.tar.gz

  # Directory inside workDir handed to the converter; * matches one path segment.
  # When several directories match, the last one in sorted order is used.
  sourcePattern: "export/*"

converter:
  command: tensorflowjs_converter
  inputFormat: tf_saved_model
  savedModelTags:
    - serve
  outputNodeNames:
    - probabilities
    - classes

logging:
  # Log level: debug, info, warn, error
  level: warn

  # Output JSON log lines
  json: false
`;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command, env: CommandEnv = {}): void {
  const cwd = () => env.cwd ?? process.cwd();
  const userConfigPath = env.userConfigPath ?? USER_CONFIG_PATH;

  const config = program
    .command("config")
    .description("Manage webmodel configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option("-u, --user", `Create the user config at ${USER_CONFIG_PATH}`)
    .action((options: { user?: boolean }) => {
      const targetPath = options.user
        ? userConfigPath
        : join(cwd(), PROJECT_CONFIG_FILENAME);

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(
          chalk.red(`Failed to create config: ${error instanceof Error ? error.message : String(error)}`)
        );
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const json = isJsonMode();
      const pathsToCheck = options.config
        ? [resolve(cwd(), options.config)]
        : [userConfigPath, join(cwd(), PROJECT_CONFIG_FILENAME)];

      const files: ConfigValidateJson["files"] = [];
      let firstError: CLIError | undefined;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            firstError = firstError ?? invalidOption("config", `no such file: ${path}`);
            if (!json) console.error(chalk.red(`File not found: ${path}`));
          }
          continue;
        }

        foundAny = true;
        if (!json) console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          files.push({ path, valid: true });
          if (!json) console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          const cliError = toCLIError(error);
          firstError = firstError ?? cliError;
          files.push({ path, valid: false, ...(cliError.details ? { details: cliError.details } : {}) });
          if (!json) {
            const details = cliError.details ? `\n${cliError.details}` : "";
            console.error(chalk.red(`  ✗ Invalid: ${cliError.message}${details}`));
          }
        }
      }

      if (json) {
        if (firstError) {
          renderError(firstError, "json");
          process.exitCode = firstError.exitCode;
        } else {
          const result: ConfigValidateJson = { files };
          outputSuccess(result);
        }
        return;
      }

      if (!foundAny && !options.config) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'webmodel config init' to create one.`));
      } else if (firstError) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig({
          explicitPath: options.config,
          cwd: cwd(),
          userConfigPath,
        });

        if (isJsonMode()) {
          const result: ConfigShowJson = { effective: { ...resolved }, sources };
          outputSuccess(result);
          return;
        }

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));

        if (sources.length > 0) {
          console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
        } else {
          console.log(chalk.gray("Sources: (defaults only)"));
        }

        console.log();
        console.log(chalk.bold("Install:"));
        console.log(`  workDir:          ${resolved.workDir}`);
        console.log(`  outputDir:        ${resolved.outputDir}`);
        console.log(`  completionCheck:  ${resolved.completionCheck}`);
        if (resolved.completionCheck === "marker") {
          console.log(`  markerFile:       ${resolved.markerFile}`);
        }

        console.log();
        console.log(chalk.bold("Archive:"));
        console.log(`  url:              ${resolved.archiveUrl}`);
        console.log(`  fileName:         ${resolved.archiveFileName ?? "(from URL)"}`);
        console.log(`  sourcePattern:    ${resolved.sourcePattern}`);

        console.log();
        console.log(chalk.bold("Converter:"));
        console.log(`  command:          ${resolved.converter}`);
        console.log(`  inputFormat:      ${resolved.inputFormat}`);
        console.log(`  savedModelTags:   ${resolved.savedModelTags.join(",")}`);
        console.log(`  outputNodeNames:  ${resolved.outputNodeNames.join(",") || "(none)"}`);

        console.log();
        console.log(chalk.bold("Logging:"));
        console.log(`  level:            ${resolved.logLevel}`);
        console.log(`  json:             ${resolved.logJson}`);
      } catch (error) {
        process.exitCode = renderUnknownError(error);
      }
    });
}
