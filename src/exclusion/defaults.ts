import type { ExclusionDefaults } from "./types.js";

export const DEFAULT_EXCLUDE_NAMES = [
  ".git",
  "vendor",
  "node_modules",
  "storage",
  "var",
  ".idea",
  ".vscode",
  "__pycache__",
  ".pytest_cache",
  ".sass-cache",
  "coverage",
  ".cache",
  ".DS_Store",
] as const;

// Relative to the target directory.
export const DEFAULT_EXCLUDE_PREFIXES = [
  "bootstrap/cache",
  "public/build",
  "dist",
  "build",
] as const;

export const DEFAULT_EXCLUSIONS: ExclusionDefaults = {
  names: DEFAULT_EXCLUDE_NAMES,
  prefixes: DEFAULT_EXCLUDE_PREFIXES,
};
