import path from "node:path";
import {
  isDirectoryExcluded,
  isExcluded,
} from "../exclusion/exclusion-matcher.js";
import type { ExclusionRuleSet } from "../exclusion/types.js";
import {
  compareCodeUnits,
  readSortedEntries,
  type UnreadableDirectoryHandler,
} from "../ingest/file-discovery.js";

export const TRUNCATION_MARKER = "  ...(structure truncated)...";

export interface StructureEntry {
  readonly relativePath: string;
  readonly isDirectory: boolean;
  readonly excluded: boolean;
}

export interface StructureOptions {
  readonly targetDir: string;
  readonly rules: ExclusionRuleSet;
  /** 0 means unlimited. */
  readonly maxEntries?: number;
  readonly includeExcluded?: boolean;
  readonly onUnreadable?: UnreadableDirectoryHandler;
}

export interface StructureListing {
  readonly entries: readonly StructureEntry[];
  readonly truncated: boolean;
}

class EntryCollector {
  readonly entries: StructureEntry[] = [];
  truncated = false;

  constructor(private readonly maxEntries: number) {}

  /** Returns false once the cap is reached and traversal must stop. */
  add(entry: StructureEntry): boolean {
    if (this.truncated) {
      return false;
    }
    this.entries.push(entry);
    if (this.maxEntries > 0 && this.entries.length >= this.maxEntries) {
      this.truncated = true;
      return false;
    }
    return true;
  }
}

export async function collectStructure(
  options: StructureOptions,
): Promise<StructureListing> {
  const collector = new EntryCollector(options.maxEntries ?? 0);
  await visitDirectory(options.targetDir, [], options, collector);
  const entries = [...collector.entries].sort((a, b) =>
    compareCodeUnits(sortKey(a), sortKey(b)),
  );
  return { entries, truncated: collector.truncated };
}

export async function renderStructure(
  options: StructureOptions,
): Promise<string[]> {
  const listing = await collectStructure(options);
  const lines = [`${path.basename(options.targetDir)}/`];
  for (const entry of listing.entries) {
    lines.push(renderEntry(entry));
  }
  if (listing.truncated) {
    lines.push(TRUNCATION_MARKER);
  }
  return lines;
}

export function renderEntry(entry: StructureEntry): string {
  const parts = entry.relativePath.split("/");
  const name = parts[parts.length - 1] ?? entry.relativePath;
  const indent = "  ".repeat(Math.max(0, parts.length - 1));
  return `${indent}${name}${entry.isDirectory ? "/" : ""}`;
}

// Directories sort as "name/" so their children stay directly beneath them.
function sortKey(entry: StructureEntry): string {
  return entry.isDirectory ? `${entry.relativePath}/` : entry.relativePath;
}

/**
 * Records a directory's subdirectories, then its files, then descends into
 * each kept subdirectory. Returns false once the entry cap stops traversal.
 */
async function visitDirectory(
  currentPath: string,
  relativeParts: readonly string[],
  options: StructureOptions,
  collector: EntryCollector,
): Promise<boolean> {
  const { directories, files } = await readSortedEntries(
    currentPath,
    options.onUnreadable,
  );
  const descend: string[] = [];

  for (const dirName of directories) {
    const parts = [...relativeParts, dirName];
    const excluded = isDirectoryExcluded(options.rules, parts);
    if (excluded && !options.includeExcluded) {
      continue;
    }
    const added = collector.add({
      relativePath: parts.join("/"),
      isDirectory: true,
      excluded,
    });
    if (!added) {
      return false;
    }
    if (!excluded) {
      descend.push(dirName);
    }
  }

  for (const fileName of files) {
    const parts = [...relativeParts, fileName];
    if (isExcluded(options.rules, parts)) {
      continue;
    }
    const added = collector.add({
      relativePath: parts.join("/"),
      isDirectory: false,
      excluded: false,
    });
    if (!added) {
      return false;
    }
  }

  for (const dirName of descend) {
    const keepGoing = await visitDirectory(
      path.join(currentPath, dirName),
      [...relativeParts, dirName],
      options,
      collector,
    );
    if (!keepGoing) {
      return false;
    }
  }
  return true;
}
