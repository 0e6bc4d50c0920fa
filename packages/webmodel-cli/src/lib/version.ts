import { readFileSync } from "fs";
import { z } from "zod";

const PackageJsonSchema = z.object({ version: z.string() });

let cachedVersion: string | undefined;

/**
 * CLI version from package.json (two levels up from both src/lib and dist/lib).
 */
export function getCliVersion(): string {
  if (cachedVersion === undefined) {
    try {
      const raw = readFileSync(new URL("../../package.json", import.meta.url), "utf-8");
      cachedVersion = PackageJsonSchema.parse(JSON.parse(raw)).version;
    } catch {
      cachedVersion = "0.0.0";
    }
  }
  return cachedVersion;
}
