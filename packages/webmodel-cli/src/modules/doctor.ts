/**
 * Doctor command - diagnostics before an install.
 * Verifies Node.js, the converter and tar on PATH, the output directory
 * and that the archive URL answers.
 */

import { Command } from "commander";
import chalk from "chalk";
import os from "os";
import { resolve } from "path";
import { loadConfig, type ResolvedConfig } from "../lib/config.js";
import { createSpinner } from "../lib/spinner.js";
import { isJsonMode } from "../lib/cli-context.js";
import { outputSuccess, type CheckStatus, type DoctorResultJson } from "../lib/json-output.js";
import { isInstalled } from "../lib/installer.js";
import { checksFailed } from "../lib/errors/catalog.js";
import { renderError } from "../lib/errors/renderer.js";
import { getCliVersion } from "../lib/version.js";
import { errorCodeOf } from "../lib/adapters/fetch-download.js";
import { pathToolLocator } from "../lib/adapters/path-tool-locator.js";
import type { ToolLocator } from "../lib/ports/tool-locator.js";
import type { CommandEnv } from "./install.js";

interface CheckResult {
  name: string;
  status: CheckStatus;
  message: string;
  details?: string;
}

export interface DoctorServices {
  locator: ToolLocator;
  fetchImpl: typeof fetch;
}

const MIN_NODE_MAJOR = 20;
const REACHABILITY_TIMEOUT_MS = 10000;

export function registerDoctorCommand(
  program: Command,
  services: DoctorServices = { locator: pathToolLocator, fetchImpl: globalThis.fetch },
  env: CommandEnv = {}
): void {
  program
    .command("doctor")
    .description("Check that everything an install needs is in place")
    .option("--verbose", "Show detailed diagnostic information")
    .option("-c, --config <path>", "Config file to use instead of ./webmodel.yaml")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("What it checks:")}
  ${chalk.yellow("•")} Node.js version compatibility
  ${chalk.yellow("•")} Converter and tar on PATH
  ${chalk.yellow("•")} Whether the output directory already exists
  ${chalk.yellow("•")} Archive URL reachability

${chalk.bold.cyan("Examples:")}
  webmodel doctor              ${chalk.gray("Run all diagnostic checks")}
  webmodel doctor --verbose    ${chalk.gray("Show detailed information")}
  webmodel doctor --json       ${chalk.gray("Output as JSON for scripting")}
`
    )
    .action(async (options: { verbose?: boolean; config?: string }) => {
      await runDoctor(services, env, options);
    });
}

export function checkNodeVersion(version: string = process.version): CheckResult {
  const major = parseInt(version.replace(/^v/, "").split(".")[0] ?? "", 10);
  if (major >= MIN_NODE_MAJOR) {
    return { name: "Node.js version", status: "pass", message: `Node.js ${version}` };
  }
  return {
    name: "Node.js version",
    status: "fail",
    message: `Node.js ${version} (requires >= ${MIN_NODE_MAJOR})`,
    details: `Upgrade Node.js to version ${MIN_NODE_MAJOR} or higher`,
  };
}

async function checkTool(locator: ToolLocator, name: string, label: string): Promise<CheckResult> {
  const path = await locator.locate(name);
  if (path) {
    return { name: label, status: "pass", message: `${name} found`, details: path };
  }
  return {
    name: label,
    status: "fail",
    message: `${name} not found on PATH`,
    details: `Install ${name} and make sure your PATH includes it`,
  };
}

async function checkArchiveUrl(
  fetchImpl: typeof fetch,
  url: string
): Promise<{ check: CheckResult; reachable: boolean; latencyMs?: number }> {
  const name = "Archive URL";
  const startTime = Date.now();
  try {
    const response = await fetchImpl(url, {
      method: "HEAD",
      redirect: "follow",
      signal: AbortSignal.timeout(REACHABILITY_TIMEOUT_MS),
    });
    const latencyMs = Date.now() - startTime;
    if (response.ok) {
      return {
        check: { name, status: "pass", message: `Reachable (${latencyMs}ms)`, details: url },
        reachable: true,
        latencyMs,
      };
    }
    return {
      check: {
        name,
        status: "fail",
        message: `Server returned ${response.status}`,
        details: url,
      },
      reachable: false,
      latencyMs,
    };
  } catch (error) {
    return {
      check: {
        name,
        status: "fail",
        message: `Cannot connect to ${url}`,
        details: errorCodeOf(error) ?? (error instanceof Error ? error.message : "Network error"),
      },
      reachable: false,
    };
  }
}

async function checkOutputDir(config: ResolvedConfig, cwd: string): Promise<CheckResult> {
  const outputDir = resolve(cwd, config.outputDir);
  if (await isInstalled(config, outputDir)) {
    return {
      name: "Output directory",
      status: "pass",
      message: "Already installed",
      details: outputDir,
    };
  }
  return {
    name: "Output directory",
    status: "warn",
    message: "Not installed yet",
    details: `Run: webmodel install (writes ${outputDir})`,
  };
}

export async function runDoctor(
  services: DoctorServices,
  env: CommandEnv,
  options: { verbose?: boolean; config?: string }
): Promise<DoctorResultJson> {
  const verbose = options.verbose ?? false;
  const cwd = env.cwd ?? process.cwd();
  const spinner = createSpinner("Running diagnostics...").start();
  const checks: CheckResult[] = [checkNodeVersion()];

  let config: ResolvedConfig | undefined;
  try {
    const loaded = loadConfig({
      explicitPath: options.config,
      cwd,
      userConfigPath: env.userConfigPath,
    });
    config = loaded.config;
    checks.push({
      name: "Configuration",
      status: "pass",
      message: loaded.sources.length > 0 ? "Config loaded" : "Using defaults",
      details: loaded.sources.join(", ") || undefined,
    });
  } catch (error) {
    checks.push({
      name: "Configuration",
      status: "fail",
      message: error instanceof Error ? error.message : String(error),
    });
  }

  let network: DoctorResultJson["network"] = { archiveUrl: "", reachable: false };

  if (config) {
    checks.push(await checkTool(services.locator, config.converter, "Converter"));
    checks.push(await checkTool(services.locator, "tar", "Archive tool"));
    checks.push(await checkOutputDir(config, cwd));

    spinner.text = "Checking archive URL...";
    const url = await checkArchiveUrl(services.fetchImpl, config.archiveUrl);
    checks.push(url.check);
    network = {
      archiveUrl: config.archiveUrl,
      reachable: url.reachable,
      ...(url.latencyMs !== undefined && { latencyMs: url.latencyMs }),
    };
  }

  spinner.stop();

  const result: DoctorResultJson = {
    checks: checks.map((c) => ({
      name: c.name,
      status: c.status,
      message: c.message,
      ...(c.details ? { details: c.details } : {}),
    })),
    system: {
      os: `${os.platform()} ${os.release()}`,
      nodeVersion: process.version,
      cliVersion: getCliVersion(),
    },
    network,
  };

  const failed = checks.filter((c) => c.status === "fail");
  const failCount = failed.length;
  if (failCount > 0) {
    process.exitCode = 1;
  }

  if (isJsonMode()) {
    if (failCount > 0) {
      renderError(checksFailed(failed.map((c) => `${c.name}: ${c.message}`)), "json");
    } else {
      outputSuccess(result);
    }
    return result;
  }

  console.log("");
  console.log(chalk.bold.cyan("Diagnostics Report"));
  console.log(chalk.dim("─".repeat(50)));

  for (const check of checks) {
    const icon = check.status === "pass" ? chalk.green("✓") :
                 check.status === "warn" ? chalk.yellow("⚠") :
                 chalk.red("✗");
    console.log(`${icon} ${chalk.bold(check.name)}: ${check.message}`);
    if (verbose && check.details) {
      console.log(chalk.dim(`    ${check.details}`));
    }
  }

  console.log("");
  console.log(chalk.dim("─".repeat(50)));
  console.log(chalk.bold("System Information:"));
  console.log(`  OS: ${result.system.os}`);
  console.log(`  Node.js: ${result.system.nodeVersion}`);
  console.log(`  CLI: v${result.system.cliVersion}`);

  const passCount = checks.filter((c) => c.status === "pass").length;
  const warnCount = checks.filter((c) => c.status === "warn").length;

  console.log("");
  if (failCount > 0) {
    console.log(chalk.red(`✗ ${failCount} check(s) failed`));
  } else if (warnCount > 0) {
    console.log(chalk.yellow(`⚠ ${passCount} passed, ${warnCount} warning(s)`));
  } else {
    console.log(chalk.green(`✓ All ${passCount} checks passed`));
  }

  if (!verbose && (failCount > 0 || warnCount > 0)) {
    console.log(chalk.dim("\nRun with --verbose for more details"));
  }

  return result;
}
