import { createWriteStream } from "fs";
import { Writable } from "stream";
import type { DownloadService } from "../ports/download.js";
import {
  connectionFailed,
  downloadTimeout,
  hostNotFound,
  httpError,
  writeFailed,
} from "../errors/catalog.js";
import { isCLIError, type CLIError } from "../errors/types.js";

const HOST_NOT_FOUND_CODES = new Set(["ENOTFOUND", "EAI_AGAIN"]);
const TIMEOUT_CODES = new Set([
  "ETIMEDOUT",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

/**
 * Dig the system error code out of a fetch failure.
 * undici wraps it as `TypeError("fetch failed", { cause })`.
 */
export function errorCodeOf(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 4 && current; depth++) {
    if (
      typeof current === "object" &&
      current !== null &&
      "code" in current &&
      typeof current.code === "string"
    ) {
      return current.code;
    }
    current = current instanceof Error ? current.cause : undefined;
  }
  return undefined;
}

/**
 * Map a network-level failure to the CLIError for its exit code.
 */
export function classifyNetworkError(url: string, error: unknown): CLIError {
  if (isCLIError(error)) return error;

  const code = errorCodeOf(error);
  const details = code ?? (error instanceof Error ? error.message : String(error));

  if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
    return downloadTimeout(url);
  }
  if (code && HOST_NOT_FOUND_CODES.has(code)) {
    return hostNotFound(url, details);
  }
  if (code && TIMEOUT_CODES.has(code)) {
    return downloadTimeout(url);
  }
  return connectionFailed(url, details);
}

/**
 * Create a download service using fetch.
 * The body is streamed to disk; nothing is buffered in memory.
 */
export function createFetchDownloadService(
  fetchImpl: typeof fetch = globalThis.fetch
): DownloadService {
  return {
    async download(url: string, outputPath: string): Promise<void> {
      let response: Response;
      try {
        response = await fetchImpl(url, { redirect: "follow" });
      } catch (error) {
        throw classifyNetworkError(url, error);
      }

      if (!response.ok) {
        throw httpError(url, response.status, response.statusText);
      }

      const body = response.body;
      if (!body) {
        throw connectionFailed(url, "No response body");
      }

      const fileStream = createWriteStream(outputPath);
      let writeError: Error | undefined;
      fileStream.once("error", (error) => {
        writeError = error;
      });

      try {
        await body.pipeTo(Writable.toWeb(fileStream) as WritableStream<Uint8Array>);
      } catch (error) {
        if (writeError) {
          throw writeFailed(outputPath, writeError.message);
        }
        throw classifyNetworkError(url, error);
      }
    },
  };
}

/**
 * Default download service instance.
 */
export const fetchDownloadService = createFetchDownloadService();
