import type { Dirent } from "fs";
import { readdir, stat } from "fs/promises";
import { join } from "path";

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.+?^${}()|[\]\\]/g, "\\$&");
}

/** Digit runs compare by value, so "10" sorts after "9" */
function compareNatural(a: string, b: string): number {
  return a.localeCompare(b, "en", { numeric: true });
}

/**
 * Compile a single path segment; `*` matches any run of characters.
 */
export function segmentMatcher(segment: string): (name: string) => boolean {
  const regex = new RegExp(`^${segment.split("*").map(escapeRegExp).join(".*")}$`);
  const matchesHidden = segment.startsWith(".");
  return (name) => (matchesHidden || !name.startsWith(".")) && regex.test(name);
}

/**
 * Find the directories under baseDir matching pattern, as paths relative to
 * baseDir, sorted ascending with numeric runs compared by value. Only
 * directories match.
 *
 * @example
 * await resolveSourcePattern("model", "export/*"); // ["export/1712345678"]
 */
export async function resolveSourcePattern(baseDir: string, pattern: string): Promise<string[]> {
  const segments = pattern.split(/[\\/]+/).filter((s) => s !== "" && s !== ".");

  if (segments.length === 0) {
    return (await isDirectory(baseDir)) ? ["."] : [];
  }

  let matches = [""];

  for (const segment of segments) {
    const next: string[] = [];

    if (!segment.includes("*")) {
      for (const current of matches) {
        const candidate = current ? join(current, segment) : segment;
        if (await isDirectory(join(baseDir, candidate))) next.push(candidate);
      }
    } else {
      const matcher = segmentMatcher(segment);
      for (const current of matches) {
        let entries: Dirent[];
        try {
          entries = await readdir(join(baseDir, current), { withFileTypes: true });
        } catch {
          continue;
        }
        for (const entry of entries) {
          if (!matcher(entry.name)) continue;
          const candidate = current ? join(current, entry.name) : entry.name;
          if (
            entry.isDirectory() ||
            (entry.isSymbolicLink() && (await isDirectory(join(baseDir, candidate))))
          ) {
            next.push(candidate);
          }
        }
      }
    }

    matches = next;
    if (matches.length === 0) break;
  }

  return matches.sort(compareNatural);
}
