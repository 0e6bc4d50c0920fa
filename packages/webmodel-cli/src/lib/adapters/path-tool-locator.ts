import { constants } from "fs";
import { access, stat } from "fs/promises";
import { delimiter, isAbsolute, join, resolve, sep } from "path";
import type { ToolLocator } from "../ports/tool-locator.js";

export interface PathToolLocatorOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  cwd?: string;
}

async function isExecutableFile(path: string, platform: NodeJS.Platform): Promise<boolean> {
  try {
    const stats = await stat(path);
    if (!stats.isFile()) return false;
    // Windows has no execute bit; PATHEXT decides instead
    if (platform === "win32") return true;
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function candidateNames(name: string, env: NodeJS.ProcessEnv, platform: NodeJS.Platform): string[] {
  if (platform !== "win32") return [name];
  const extensions = (env.PATHEXT ?? ".COM;.EXE;.BAT;.CMD")
    .split(";")
    .filter(Boolean);
  return [name, ...extensions.map((ext) => `${name}${ext.toLowerCase()}`)];
}

/**
 * Resolve executables the way a shell does: scan PATH entries in order.
 * A name containing a path separator is checked as-is, relative to cwd.
 */
export function createPathToolLocator(options: PathToolLocatorOptions = {}): ToolLocator {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;

  return {
    async locate(name: string): Promise<string | undefined> {
      if (!name) return undefined;

      const names = candidateNames(name, env, platform);

      if (name.includes("/") || name.includes(sep)) {
        const base = isAbsolute(name) ? name : resolve(options.cwd ?? process.cwd(), name);
        for (const candidate of candidateNames(base, env, platform)) {
          if (await isExecutableFile(candidate, platform)) return candidate;
        }
        return undefined;
      }

      const dirs = (env.PATH ?? env.Path ?? "").split(delimiter).filter(Boolean);
      for (const dir of dirs) {
        for (const candidate of names) {
          const fullPath = join(dir, candidate);
          if (await isExecutableFile(fullPath, platform)) {
            return isAbsolute(fullPath) ? fullPath : resolve(options.cwd ?? process.cwd(), fullPath);
          }
        }
      }

      return undefined;
    },
  };
}

/**
 * Default tool locator using the current process environment.
 */
export const pathToolLocator = createPathToolLocator();
