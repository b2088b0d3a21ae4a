import { readFileSync } from "node:fs";

/**
 * Walk a list of `package.json` paths, relative to the calling module, and
 * return the first non-empty `.version` string found.
 *
 * @param importMetaUrl  `import.meta.url` of the calling module.
 * @param candidates     Relative paths to `package.json` files to try.
 */
export function resolvePackageVersion(importMetaUrl: string, candidates: string[]): string {
  for (const candidate of candidates) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(new URL(candidate, importMetaUrl), "utf-8"));
    } catch {
      continue;
    }
    if (parsed !== null && typeof parsed === "object" && "version" in parsed) {
      const { version } = parsed;
      if (typeof version === "string" && version.length > 0) return version;
    }
  }
  return "unknown";
}
