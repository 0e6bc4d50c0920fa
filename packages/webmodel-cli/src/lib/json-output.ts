/**
 * JSON output utilities for machine-readable CLI output.
 * Errors use the same envelope; see formatJSONError in errors/renderer.ts.
 */

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface InstallResultJson {
  status: "already-installed" | "installed";
  outputDir: string;
  workDir?: string;
  archivePath?: string;
  sourceDir?: string;
  converter?: {
    path: string;
    args: string[];
  };
}

export type CheckStatus = "pass" | "fail" | "warn";

export interface DoctorResultJson {
  checks: Array<{
    name: string;
    status: CheckStatus;
    message: string;
    details?: string;
  }>;
  system: {
    os: string;
    nodeVersion: string;
    cliVersion: string;
  };
  network: {
    archiveUrl: string;
    reachable: boolean;
    latencyMs?: number;
  };
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

export interface ConfigValidateJson {
  files: Array<{ path: string; valid: boolean; details?: string }>;
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}
