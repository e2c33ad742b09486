import path from "node:path";
import { isWithinRoot, toRelativePosix } from "../ingest/file-discovery.js";

/**
 * Rewrites path-like exclusion tokens as prefixes relative to the target.
 * A token is tried against the project root first, then the target; tokens
 * that land outside the target pass through with their slashes trimmed.
 * Bare directory names are left alone.
 */
export function normalizeExcludeTokens(
  tokens: readonly string[],
  projectRoot: string,
  targetDir: string,
): string[] {
  const normalized: string[] = [];

  for (const raw of tokens) {
    const token = raw.trim().replace(/\\/g, "/");
    if (!token) {
      continue;
    }

    if (!token.includes("/") && !token.startsWith(".")) {
      normalized.push(token);
      continue;
    }

    const candidates = [
      path.resolve(projectRoot, token),
      path.resolve(targetDir, token),
    ];
    const inside = candidates.find((candidate) =>
      isWithinRoot(targetDir, candidate),
    );

    if (inside !== undefined) {
      const relative = trimSlashes(toRelativePosix(targetDir, inside));
      // The target itself cannot be excluded from its own dump.
      if (!relative) {
        continue;
      }
      // A single segment keeps its prefix meaning through a trailing slash.
      const keepPrefix = token.includes("/") && !relative.includes("/");
      normalized.push(keepPrefix ? `${relative}/` : relative);
      continue;
    }

    const fallback = trimSlashes(token);
    if (fallback) {
      normalized.push(fallback);
    }
  }

  return normalized;
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, "");
}
