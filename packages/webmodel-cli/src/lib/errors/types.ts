/**
 * Error codes for all CLI error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Dependency errors
  | "TOOL_NOT_FOUND"
  // Download errors
  | "DOWNLOAD_HOST_NOT_FOUND"
  | "DOWNLOAD_CONNECTION_FAILED"
  | "DOWNLOAD_HTTP_ERROR"
  | "DOWNLOAD_WRITE_FAILED"
  | "DOWNLOAD_TIMEOUT"
  // Extraction errors
  | "EXTRACT_FAILED"
  | "EXTRACT_SOURCE_NOT_FOUND"
  // Conversion errors
  | "CONVERT_FAILED"
  // Process errors
  | "PROCESS_SPAWN_FAILED"
  // Validation errors
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  // Diagnostics
  | "DOCTOR_CHECKS_FAILED"
  // Generic
  | "UNKNOWN_ERROR";

/**
 * Extended Error class for CLI-specific errors with helpful context.
 * `exitCode` is the process exit status the CLI terminates with.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly exitCode: number;
  readonly suggestion?: string;
  readonly example?: string;
  readonly examples?: string[];
  readonly docs?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      exitCode?: number;
      suggestion?: string;
      example?: string;
      examples?: string[];
      docs?: string;
      details?: string;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.exitCode = options?.exitCode ?? 1;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.examples = options?.examples;
    this.docs = options?.docs;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}
