import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { createProgram, main } from "./cli.js";
import { resetContext } from "./lib/cli-context.js";
import { getCliVersion } from "./lib/version.js";

describe("cli", () => {
  let root: string;
  let configPath: string;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "webmodel-cli-"));
    configPath = join(root, "webmodel.test.yaml");
    writeFileSync(
      configPath,
      [
        "install:",
        `  workDir: ${JSON.stringify(join(root, "model"))}`,
        `  outputDir: ${JSON.stringify(join(root, "web_model"))}`,
        "archive:",
        '  url: "https://models.test/mnist_saved_model.tar.gz"',
        "converter:",
        "  command: webmodel-test-missing-converter",
        "",
      ].join("\n")
    );
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetContext();
    process.exitCode = undefined;
    rmSync(root, { recursive: true, force: true });
  });

  it("reads its version from package.json", () => {
    expect(getCliVersion()).toBe("0.1.0");
    expect(createProgram().version()).toBe("0.1.0");
  });

  it("registers the commands", () => {
    expect(createProgram().commands.map((c) => c.name())).toEqual(["install", "doctor", "config"]);
  });

  it("exits 1 with a JSON error when the converter is missing", async () => {
    await main(["node", "webmodel", "--json", "install", "--config", configPath]);

    expect(process.exitCode).toBe(1);
    const lastError = consoleErrorSpy.mock.calls[consoleErrorSpy.mock.calls.length - 1]?.[0];
    expect(JSON.parse(String(lastError))).toEqual({
      success: false,
      error: {
        code: "TOOL_NOT_FOUND",
        exitCode: 1,
        message: "webmodel-test-missing-converter is not installed or not on PATH",
        suggestion: "Install webmodel-test-missing-converter and make sure your PATH includes it",
      },
    });
    expect(consoleLogSpy).not.toHaveBeenCalled();
  });

  it("succeeds without a converter when the output already exists", async () => {
    mkdirSync(join(root, "web_model"));

    await main(["node", "webmodel", "--json", "--config", configPath]);

    expect(process.exitCode).toBeUndefined();
    expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual({
      success: true,
      data: { status: "already-installed", outputDir: join(root, "web_model") },
    });
  });
});
