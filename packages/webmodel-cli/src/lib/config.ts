import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join, resolve } from "path";
import { invalidConfig, invalidOption } from "./errors/catalog.js";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Project configuration file, looked up in the current directory */
export const PROJECT_CONFIG_FILENAME = "webmodel.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "webmodel",
  "config.yaml"
);

export const COMPLETION_CHECKS = ["directory", "marker"] as const;
export type CompletionCheck = (typeof COMPLETION_CHECKS)[number];

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  workDir: "model",
  outputDir: "web_model",
  archiveUrl: "https://example.com/models/mnist_saved_model.tar.gz",
  sourcePattern: "export/*",
  converter: "tensorflowjs_converter",
  inputFormat: "tf_saved_model",
  savedModelTags: ["serve"],
  outputNodeNames: ["probabilities", "classes"],
  completionCheck: "directory",
  markerFile: "model.json",
  logLevel: "warn",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const nonEmpty = z.string().min(1);

/** Complete configuration file schema */
export const ConfigFileSchema = z
  .object({
    install: z
      .object({
        workDir: nonEmpty.optional(),
        outputDir: nonEmpty.optional(),
        completionCheck: z.enum(COMPLETION_CHECKS).optional(),
        markerFile: nonEmpty.optional(),
      })
      .strict()
      .optional(),
    archive: z
      .object({
        url: z.string().url().optional(),
        fileName: nonEmpty.regex(/^[^/\\]+$/, "must be a plain file name").optional(),
        sourcePattern: nonEmpty.optional(),
      })
      .strict()
      .optional(),
    converter: z
      .object({
        command: nonEmpty.optional(),
        inputFormat: nonEmpty.optional(),
        savedModelTags: z.array(nonEmpty).min(1).optional(),
        outputNodeNames: z.array(nonEmpty).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(LOG_LEVEL_NAMES).optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Everything the install procedure needs, with all defaults applied */
export interface InstallConfig {
  /** Scratch directory holding the archive and its extracted contents */
  workDir: string;
  /** Converter destination; its presence means "installed" */
  outputDir: string;
  archiveUrl: string;
  /** Defaults to the last segment of the archive URL */
  archiveFileName?: string;
  /** Directory inside workDir handed to the converter, `*` per segment */
  sourcePattern: string;
  /** Converter binary, looked up on PATH */
  converter: string;
  inputFormat: string;
  savedModelTags: string[];
  outputNodeNames: string[];
  completionCheck: CompletionCheck;
  /** File that must exist in outputDir when completionCheck is "marker" */
  markerFile: string;
}

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig extends InstallConfig {
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if the file doesn't exist.
 * Throws a CLIError listing every issue if the file is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${err instanceof Error ? err.message : String(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${err instanceof Error ? err.message : String(err)}`]);
  }

  // Empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    );
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  const { install, archive, converter, logging } = source;

  if (install?.workDir !== undefined) target.workDir = install.workDir;
  if (install?.outputDir !== undefined) target.outputDir = install.outputDir;
  if (install?.completionCheck !== undefined) {
    target.completionCheck = install.completionCheck;
  }
  if (install?.markerFile !== undefined) target.markerFile = install.markerFile;

  if (archive?.url !== undefined) target.archiveUrl = archive.url;
  if (archive?.fileName !== undefined) target.archiveFileName = archive.fileName;
  if (archive?.sourcePattern !== undefined) {
    target.sourcePattern = archive.sourcePattern;
  }

  if (converter?.command !== undefined) target.converter = converter.command;
  if (converter?.inputFormat !== undefined) {
    target.inputFormat = converter.inputFormat;
  }
  if (converter?.savedModelTags !== undefined) {
    target.savedModelTags = [...converter.savedModelTags];
  }
  if (converter?.outputNodeNames !== undefined) {
    target.outputNodeNames = [...converter.outputNodeNames];
  }

  if (logging?.level !== undefined) target.logLevel = logging.level;
  if (logging?.json !== undefined) target.logJson = logging.json;
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > Project config > User config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  projectConfig: ConfigFile | undefined = undefined,
  userConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  const config: ResolvedConfig = {
    workDir: CONFIG_DEFAULTS.workDir,
    outputDir: CONFIG_DEFAULTS.outputDir,
    archiveUrl: CONFIG_DEFAULTS.archiveUrl,
    sourcePattern: CONFIG_DEFAULTS.sourcePattern,
    converter: CONFIG_DEFAULTS.converter,
    inputFormat: CONFIG_DEFAULTS.inputFormat,
    savedModelTags: [...CONFIG_DEFAULTS.savedModelTags],
    outputNodeNames: [...CONFIG_DEFAULTS.outputNodeNames],
    completionCheck: CONFIG_DEFAULTS.completionCheck,
    markerFile: CONFIG_DEFAULTS.markerFile,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  if (projectConfig) {
    applyConfigFile(config, projectConfig);
  }

  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

export interface LoadConfigOptions {
  /** Path given with --config; replaces the project file lookup */
  explicitPath?: string;
  /** Directory the project file is looked up in */
  cwd?: string;
  userConfigPath?: string;
  cliOptions?: Partial<ResolvedConfig>;
}

/**
 * Load configuration from all sources.
 *
 * @returns The resolved config and the files that were loaded, lowest
 *   precedence first
 */
export function loadConfig(options: LoadConfigOptions = {}): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];
  const userConfigPath = options.userConfigPath ?? USER_CONFIG_PATH;

  const userConfig = loadConfigFile(userConfigPath);
  if (userConfig) sources.push(userConfigPath);

  let projectPath: string;
  if (options.explicitPath) {
    projectPath = resolve(options.cwd ?? process.cwd(), options.explicitPath);
    if (!existsSync(projectPath)) {
      throw invalidOption("config", `no such file: ${projectPath}`);
    }
  } else {
    projectPath = join(options.cwd ?? process.cwd(), PROJECT_CONFIG_FILENAME);
  }

  const projectConfig = loadConfigFile(projectPath);
  if (projectConfig) sources.push(projectPath);

  const config = resolveConfig(options.cliOptions ?? {}, projectConfig, userConfig);

  return { config, sources };
}
