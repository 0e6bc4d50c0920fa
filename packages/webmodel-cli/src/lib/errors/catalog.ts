import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Exit codes of the download errors follow the usual transfer-tool codes so
 * scripts wrapping the CLI can tell the failures apart.
 */

export const EXIT_TOOL_NOT_FOUND = 1;
export const EXIT_HOST_NOT_FOUND = 6;
export const EXIT_CONNECTION_FAILED = 7;
export const EXIT_HTTP_ERROR = 22;
export const EXIT_WRITE_FAILED = 23;
export const EXIT_TIMEOUT = 28;
export const EXIT_SPAWN_FAILED = 127;

// ============================================================================
// Dependency Errors
// ============================================================================

export function toolNotFound(tool: string): CLIError {
  return new CLIError("TOOL_NOT_FOUND", `${tool} is not installed or not on PATH`, {
    exitCode: EXIT_TOOL_NOT_FOUND,
    suggestion: `Install ${tool} and make sure your PATH includes it`,
    example: tool === "tensorflowjs_converter" ? "pip install tensorflowjs" : undefined,
  });
}

// ============================================================================
// Download Errors
// ============================================================================

export function hostNotFound(url: string, details?: string): CLIError {
  return new CLIError("DOWNLOAD_HOST_NOT_FOUND", `Can't resolve host for ${url}`, {
    exitCode: EXIT_HOST_NOT_FOUND,
    suggestion: "Check your internet connection and the archive URL",
    details,
  });
}

export function connectionFailed(url: string, details?: string): CLIError {
  return new CLIError("DOWNLOAD_CONNECTION_FAILED", `Can't connect to ${url}`, {
    exitCode: EXIT_CONNECTION_FAILED,
    suggestion: "Check your internet connection and try again",
    details,
  });
}

export function httpError(url: string, status: number, statusText: string): CLIError {
  const reason = statusText ? `${status} ${statusText}` : String(status);
  return new CLIError("DOWNLOAD_HTTP_ERROR", `Download failed (${reason})`, {
    exitCode: EXIT_HTTP_ERROR,
    suggestion: "Check the archive URL in your config or pass --url",
    details: url,
  });
}

export function writeFailed(path: string, details?: string): CLIError {
  return new CLIError("DOWNLOAD_WRITE_FAILED", `Can't write "${path}"`, {
    exitCode: EXIT_WRITE_FAILED,
    suggestion: "Check disk space and permissions on the working directory",
    details,
  });
}

export function downloadTimeout(url: string): CLIError {
  return new CLIError("DOWNLOAD_TIMEOUT", `Download timed out: ${url}`, {
    exitCode: EXIT_TIMEOUT,
    suggestion: "The server might be busy. Try again in a moment",
  });
}

// ============================================================================
// Extraction Errors
// ============================================================================

export function extractFailed(archivePath: string, exitCode: number): CLIError {
  return new CLIError("EXTRACT_FAILED", `Couldn't extract "${archivePath}"`, {
    exitCode,
    suggestion: "The archive may be incomplete. Delete it and run again",
    details: `tar exited with code ${exitCode}`,
  });
}

export function sourceNotFound(pattern: string, baseDir: string): CLIError {
  return new CLIError("EXTRACT_SOURCE_NOT_FOUND", `Nothing in the archive matches "${pattern}"`, {
    suggestion: "Check sourcePattern in your config against the archive layout",
    details: baseDir,
  });
}

// ============================================================================
// Conversion Errors
// ============================================================================

export function conversionFailed(tool: string, exitCode: number): CLIError {
  return new CLIError("CONVERT_FAILED", `${tool} failed`, {
    exitCode,
    details: `${tool} exited with code ${exitCode}`,
  });
}

// ============================================================================
// Process Errors
// ============================================================================

export function spawnFailed(command: string, details?: string): CLIError {
  return new CLIError("PROCESS_SPAWN_FAILED", `Couldn't start ${command}`, {
    exitCode: EXIT_SPAWN_FAILED,
    suggestion: `Check that ${command} is installed and executable`,
    details,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
  });
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file has errors: ${path}`, {
    suggestion: "Fix the issues below and try again",
    example: "webmodel config validate",
    details,
  });
}

// ============================================================================
// Diagnostics Errors
// ============================================================================

export function checksFailed(failures: string[]): CLIError {
  return new CLIError("DOCTOR_CHECKS_FAILED", `${failures.length} check(s) failed`, {
    suggestion: "Fix the failed checks and run doctor again",
    example: "webmodel doctor --verbose",
    details: failures.map((f) => `• ${f}`).join("\n"),
  });
}
