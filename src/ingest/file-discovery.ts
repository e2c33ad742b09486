import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import {
  isDirectoryExcluded,
  isExcluded,
} from "../exclusion/exclusion-matcher.js";
import type { ExclusionRuleSet } from "../exclusion/types.js";
import { matchesExtensions } from "./file-classifier.js";
import type { CandidateFile, ExtensionPolicy } from "./types.js";

export type UnreadableDirectoryHandler = (
  dirPath: string,
  error: unknown,
) => void;

export interface WalkOptions {
  readonly policy: ExtensionPolicy;
  readonly rules: ExclusionRuleSet;
  readonly onUnreadable?: UnreadableDirectoryHandler;
}

interface WalkContext extends WalkOptions {
  readonly targetDir: string;
  readonly files: CandidateFile[];
}

export async function walkFiles(
  targetDir: string,
  options: WalkOptions,
): Promise<CandidateFile[]> {
  const files: CandidateFile[] = [];
  await walkDirectory(targetDir, [], { ...options, targetDir, files });
  return sortCandidates(files);
}

async function walkDirectory(
  currentPath: string,
  relativeParts: readonly string[],
  context: WalkContext,
): Promise<void> {
  const { directories, files } = await readSortedEntries(
    currentPath,
    context.onUnreadable,
  );

  for (const fileName of files) {
    const parts = [...relativeParts, fileName];
    if (isExcluded(context.rules, parts)) {
      continue;
    }
    if (
      context.policy.kind === "extensions" &&
      !matchesExtensions(fileName, context.policy.extensions)
    ) {
      continue;
    }
    context.files.push({
      absolutePath: path.join(currentPath, fileName),
      relativePath: parts.join("/"),
    });
  }

  for (const dirName of directories) {
    const parts = [...relativeParts, dirName];
    if (isDirectoryExcluded(context.rules, parts)) {
      continue;
    }
    await walkDirectory(path.join(currentPath, dirName), parts, context);
  }
}

export interface SortedEntries {
  readonly directories: string[];
  readonly files: string[];
}

/**
 * Lists a directory split into subdirectories and files, each sorted by
 * code unit. Symbolic links to files count as files; links to directories
 * are never followed. A directory that cannot be read lists as empty.
 */
export async function readSortedEntries(
  dirPath: string,
  onUnreadable?: UnreadableDirectoryHandler,
): Promise<SortedEntries> {
  let dirents: Dirent[];
  try {
    dirents = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    onUnreadable?.(dirPath, error);
    return { directories: [], files: [] };
  }
  const directories: string[] = [];
  const files: string[] = [];

  for (const dirent of dirents) {
    if (dirent.isDirectory()) {
      directories.push(dirent.name);
      continue;
    }
    if (await isRegularFile(dirPath, dirent)) {
      files.push(dirent.name);
    }
  }

  directories.sort(compareCodeUnits);
  files.sort(compareCodeUnits);
  return { directories, files };
}

async function isRegularFile(dirPath: string, dirent: Dirent): Promise<boolean> {
  if (dirent.isFile()) {
    return true;
  }
  if (!dirent.isSymbolicLink()) {
    return false;
  }
  try {
    const stats = await fs.stat(path.join(dirPath, dirent.name));
    return stats.isFile();
  } catch {
    return false;
  }
}

export function sortCandidates(files: readonly CandidateFile[]): CandidateFile[] {
  return [...files].sort((a, b) =>
    compareCodeUnits(a.relativePath, b.relativePath),
  );
}

export function compareCodeUnits(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

export function toRelativePosix(rootPath: string, absolutePath: string): string {
  const relative = path.relative(rootPath, absolutePath);
  return relative.split(path.sep).join(path.posix.sep);
}

export function isWithinRoot(rootPath: string, targetPath: string): boolean {
  const relative = path.relative(rootPath, targetPath);
  // Names such as "..notes" are children, not parents.
  return (
    relative !== ".." &&
    !relative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(relative)
  );
}
