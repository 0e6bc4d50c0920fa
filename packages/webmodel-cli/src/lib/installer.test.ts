import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join, resolve } from "path";
import { archiveFileNameFor, isInstalled, runInstall, type InstallStep } from "./installer.js";
import { resolveConfig, type InstallConfig } from "./config.js";
import { createNoopLogger } from "./logger.js";
import { connectionFailed, extractFailed } from "./errors/catalog.js";
import { CLIError } from "./errors/types.js";
import type { ProcessResult, RunOptions } from "./ports/index.js";

const EXPORT_DIR = join("export", "1700000000");

function createFakes() {
  const downloader = {
    download: vi.fn(async (_url: string, outputPath: string) => {
      writeFileSync(outputPath, "archive-bytes");
    }),
  };
  const extractor = {
    extract: vi.fn(async (_archivePath: string, destDir: string) => {
      mkdirSync(join(destDir, EXPORT_DIR), { recursive: true });
      writeFileSync(join(destDir, EXPORT_DIR, "saved_model.pb"), "graph");
    }),
  };
  const runner = {
    run: vi.fn(
      async (_command: string, args: string[], options?: RunOptions): Promise<ProcessResult> => {
        const outputDir = resolve(options?.cwd ?? ".", args[args.length - 1]);
        mkdirSync(outputDir, { recursive: true });
        writeFileSync(join(outputDir, "model.json"), "{}");
        return { exitCode: 0, signal: null };
      }
    ),
  };
  const locator = {
    locate: vi.fn(async (name: string): Promise<string | undefined> => `/opt/tools/${name}`),
  };
  return { downloader, extractor, runner, locator, logger: createNoopLogger() };
}

describe("installer", () => {
  let root: string;
  let config: InstallConfig;
  let fakes: ReturnType<typeof createFakes>;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "webmodel-installer-"));
    config = resolveConfig({
      archiveUrl: "https://models.test/mnist/mnist_saved_model.tar.gz",
    });
    fakes = createFakes();
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe("already installed", () => {
    it("returns without touching network, disk or PATH", async () => {
      mkdirSync(join(root, "web_model"));
      writeFileSync(join(root, "web_model", "keep.txt"), "existing");

      const result = await runInstall(config, fakes, { cwd: root });

      expect(result).toEqual({
        status: "already-installed",
        outputDir: join(root, "web_model"),
      });
      expect(fakes.locator.locate).not.toHaveBeenCalled();
      expect(fakes.downloader.download).not.toHaveBeenCalled();
      expect(existsSync(join(root, "model"))).toBe(false);
      expect(readFileSync(join(root, "web_model", "keep.txt"), "utf-8")).toBe("existing");
    });

    it("treats an empty output directory as installed", async () => {
      mkdirSync(join(root, "web_model"));

      const result = await runInstall(config, fakes, { cwd: root });

      expect(result.status).toBe("already-installed");
    });

    it("does not count a regular file at the output path", async () => {
      writeFileSync(join(root, "web_model"), "not a directory");
      fakes.locator.locate.mockResolvedValue(undefined);

      await expect(runInstall(config, fakes, { cwd: root })).rejects.toMatchObject({
        code: "TOOL_NOT_FOUND",
      });
    });
  });

  describe("missing converter", () => {
    it("fails with exit code 1 before any download", async () => {
      fakes.locator.locate.mockResolvedValue(undefined);

      const error = await runInstall(config, fakes, { cwd: root }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CLIError);
      expect(error).toMatchObject({
        code: "TOOL_NOT_FOUND",
        exitCode: 1,
        message: "tensorflowjs_converter is not installed or not on PATH",
      });
      expect(fakes.locator.locate).toHaveBeenCalledWith("tensorflowjs_converter");
      expect(fakes.downloader.download).not.toHaveBeenCalled();
      expect(existsSync(join(root, "model"))).toBe(false);
    });
  });

  describe("happy path", () => {
    it("downloads, extracts and converts into the output directory", async () => {
      const result = await runInstall(config, fakes, { cwd: root });

      const workDir = join(root, "model");
      const archivePath = join(workDir, "mnist_saved_model.tar.gz");
      const expectedArgs = [
        "--input_format=tf_saved_model",
        "--output_node_names=probabilities,classes",
        "--saved_model_tags=serve",
        EXPORT_DIR,
        join("..", "web_model"),
      ];

      expect(result).toEqual({
        status: "installed",
        workDir,
        outputDir: join(root, "web_model"),
        archivePath,
        sourceDir: EXPORT_DIR,
        converterPath: "/opt/tools/tensorflowjs_converter",
        converterArgs: expectedArgs,
      });
      expect(fakes.downloader.download).toHaveBeenCalledWith(
        "https://models.test/mnist/mnist_saved_model.tar.gz",
        archivePath
      );
      expect(fakes.extractor.extract).toHaveBeenCalledWith(archivePath, workDir);
      expect(fakes.runner.run).toHaveBeenCalledWith(
        "/opt/tools/tensorflowjs_converter",
        expectedArgs,
        expect.objectContaining({ cwd: workDir })
      );
      expect(existsSync(join(root, "web_model", "model.json"))).toBe(true);
      expect(existsSync(join(workDir, EXPORT_DIR, "saved_model.pb"))).toBe(true);
      expect(readFileSync(archivePath, "utf-8")).toBe("archive-bytes");
    });

    it("reports steps in order", async () => {
      const steps: InstallStep[] = [];

      await runInstall(config, fakes, { cwd: root, onStep: (step) => steps.push(step) });

      expect(steps).toEqual(["check", "locate", "prepare", "download", "extract", "convert"]);
    });

    it("creates missing parent directories of the working directory", async () => {
      config.workDir = join("cache", "models", "mnist");

      const result = await runInstall(config, fakes, { cwd: root });

      expect(result.status).toBe("installed");
      expect(existsSync(join(root, "cache", "models", "mnist", EXPORT_DIR))).toBe(true);
    });

    it("uses the last matching export directory", async () => {
      fakes.extractor.extract.mockImplementation(async (_archive: string, destDir: string) => {
        mkdirSync(join(destDir, "export", "1700000000"), { recursive: true });
        mkdirSync(join(destDir, "export", "1800000000"), { recursive: true });
      });

      const result = await runInstall(config, fakes, { cwd: root });

      expect(result).toMatchObject({ sourceDir: join("export", "1800000000") });
    });

    it("picks the highest version number, not the last string", async () => {
      fakes.extractor.extract.mockImplementation(async (_archive: string, destDir: string) => {
        for (const version of ["1", "9", "10"]) {
          mkdirSync(join(destDir, "export", version), { recursive: true });
        }
      });

      const result = await runInstall(config, fakes, { cwd: root });

      expect(result).toMatchObject({ sourceDir: join("export", "10") });
    });

    it("keeps the archive inside the working directory for encoded separators", async () => {
      config.archiveUrl = "https://models.test/..%2F..%2Fmnist.tar.gz";

      const result = await runInstall(config, fakes, { cwd: root });

      expect(result).toMatchObject({ archivePath: join(root, "model", "mnist.tar.gz") });
      expect(fakes.downloader.download).toHaveBeenCalledWith(
        "https://models.test/..%2F..%2Fmnist.tar.gz",
        join(root, "model", "mnist.tar.gz")
      );
      expect(existsSync(join(root, "mnist.tar.gz"))).toBe(false);
    });

    it("passes the converter output mode through", async () => {
      await runInstall(config, fakes, { cwd: root, converterOutput: "stderr" });

      expect(fakes.runner.run).toHaveBeenCalledWith(
        expect.any(String),
        expect.any(Array),
        { cwd: join(root, "model"), output: "stderr" }
      );
    });
  });

  describe("step failures", () => {
    it("propagates the download exit code and never creates the output directory", async () => {
      fakes.downloader.download.mockRejectedValue(
        connectionFailed("https://models.test/mnist/mnist_saved_model.tar.gz")
      );

      await expect(runInstall(config, fakes, { cwd: root })).rejects.toMatchObject({
        code: "DOWNLOAD_CONNECTION_FAILED",
        exitCode: 7,
      });
      expect(fakes.extractor.extract).not.toHaveBeenCalled();
      expect(existsSync(join(root, "web_model"))).toBe(false);
      // working directory is left behind
      expect(existsSync(join(root, "model"))).toBe(true);
    });

    it("propagates the extractor exit code", async () => {
      const archivePath = join(root, "model", "mnist_saved_model.tar.gz");
      fakes.extractor.extract.mockRejectedValue(extractFailed(archivePath, 2));

      await expect(runInstall(config, fakes, { cwd: root })).rejects.toMatchObject({
        code: "EXTRACT_FAILED",
        exitCode: 2,
      });
      expect(fakes.runner.run).not.toHaveBeenCalled();
    });

    it("fails when nothing matches the source pattern", async () => {
      fakes.extractor.extract.mockResolvedValue(undefined);

      await expect(runInstall(config, fakes, { cwd: root })).rejects.toMatchObject({
        code: "EXTRACT_SOURCE_NOT_FOUND",
        exitCode: 1,
      });
      expect(fakes.runner.run).not.toHaveBeenCalled();
    });

    it("propagates the converter exit code", async () => {
      fakes.runner.run.mockResolvedValue({ exitCode: 3, signal: null });

      await expect(runInstall(config, fakes, { cwd: root })).rejects.toMatchObject({
        code: "CONVERT_FAILED",
        exitCode: 3,
      });
    });

    it("maps a converter killed by a signal to 128 + signal number", async () => {
      fakes.runner.run.mockResolvedValue({ exitCode: null, signal: "SIGKILL" });

      await expect(runInstall(config, fakes, { cwd: root })).rejects.toMatchObject({
        exitCode: 137,
      });
    });

    it("downloads again on the next run after a failure", async () => {
      fakes.runner.run.mockResolvedValueOnce({ exitCode: 1, signal: null });

      await expect(runInstall(config, fakes, { cwd: root })).rejects.toBeInstanceOf(CLIError);
      const result = await runInstall(config, fakes, { cwd: root });

      expect(result.status).toBe("installed");
      expect(fakes.downloader.download).toHaveBeenCalledTimes(2);
    });
  });

  describe("marker completion check", () => {
    beforeEach(() => {
      config.completionCheck = "marker";
    });

    it("reinstalls when the marker file is missing", async () => {
      mkdirSync(join(root, "web_model"));

      const result = await runInstall(config, fakes, { cwd: root });

      expect(result.status).toBe("installed");
      expect(fakes.downloader.download).toHaveBeenCalledTimes(1);
    });

    it("skips when the marker file exists", async () => {
      mkdirSync(join(root, "web_model"));
      writeFileSync(join(root, "web_model", "model.json"), "{}");

      const result = await runInstall(config, fakes, { cwd: root });

      expect(result.status).toBe("already-installed");
    });
  });

  describe("isInstalled", () => {
    it("is false when the output directory is absent", async () => {
      expect(await isInstalled(config, join(root, "web_model"))).toBe(false);
    });
  });

  describe("archiveFileNameFor", () => {
    it("uses the last URL path segment", () => {
      expect(
        archiveFileNameFor({ archiveUrl: "https://models.test/a/b/mnist.tgz?sig=abc" })
      ).toBe("mnist.tgz");
    });

    it("decodes percent-encoded names", () => {
      expect(
        archiveFileNameFor({ archiveUrl: "https://models.test/model%20v1.tar.gz" })
      ).toBe("model v1.tar.gz");
    });

    it("strips encoded directory parts", () => {
      expect(
        archiveFileNameFor({ archiveUrl: "https://models.test/..%2F..%2Fevil.tar.gz" })
      ).toBe("evil.tar.gz");
      expect(archiveFileNameFor({ archiveUrl: "https://models.test/a%2Fb.tar.gz" })).toBe(
        "b.tar.gz"
      );
    });

    it("falls back for names that are not plain file names", () => {
      expect(archiveFileNameFor({ archiveUrl: "https://models.test/a%5Cb.tgz" })).toBe(
        "archive.tar.gz"
      );
      expect(archiveFileNameFor({ archiveUrl: "https://models.test/x/%2E%2E" })).toBe(
        "archive.tar.gz"
      );
    });

    it("falls back when the URL has no file name", () => {
      expect(archiveFileNameFor({ archiveUrl: "https://models.test/" })).toBe("archive.tar.gz");
    });

    it("prefers the configured file name", () => {
      expect(
        archiveFileNameFor({
          archiveUrl: "https://models.test/download?id=7",
          archiveFileName: "saved_model.tar.gz",
        })
      ).toBe("saved_model.tar.gz");
    });
  });
});
