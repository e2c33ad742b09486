import fs from "node:fs/promises";
import path from "node:path";
import { simpleGit } from "simple-git";
import { isExcluded, toRelativeParts } from "../exclusion/exclusion-matcher.js";
import { isBinaryExtension } from "./binary-classifier.js";
import { matchesExtensions } from "./file-classifier.js";
import {
  isWithinRoot,
  sortCandidates,
  toRelativePosix,
} from "./file-discovery.js";
import type {
  CandidateFile,
  ExtensionPolicy,
  TrackedFileLister,
} from "./types.js";
import type { ExclusionRuleSet } from "../exclusion/types.js";

export const gitTrackedFileLister: TrackedFileLister = {
  async listTrackedFiles(projectRoot, targetPath) {
    try {
      const output = await simpleGit({ baseDir: projectRoot }).raw([
        "ls-files",
        "-z",
        "--",
        targetPath,
      ]);
      return output.split("\0").filter((line) => line.trim().length > 0);
    } catch {
      return null;
    }
  },
};

export async function isGitRepository(projectRoot: string): Promise<boolean> {
  try {
    await fs.stat(path.join(projectRoot, ".git"));
    return true;
  } catch {
    return false;
  }
}

export interface TrackedCollectOptions {
  readonly projectRoot: string;
  readonly targetDir: string;
  readonly policy: ExtensionPolicy;
  readonly rules: ExclusionRuleSet;
  readonly binaryExtensions: ReadonlySet<string>;
  readonly lister: TrackedFileLister;
}

/**
 * Collects tracked files under the target. Resolves to null when the target
 * lies outside the project or the listing is unavailable.
 */
export async function collectTrackedFiles(
  options: TrackedCollectOptions,
): Promise<CandidateFile[] | null> {
  if (!isWithinRoot(options.projectRoot, options.targetDir)) {
    return null;
  }

  const targetPath = toRelativePosix(options.projectRoot, options.targetDir) || ".";
  const tracked = await options.lister.listTrackedFiles(
    options.projectRoot,
    targetPath,
  );
  if (!tracked) {
    return null;
  }

  const files: CandidateFile[] = [];
  for (const trackedPath of tracked) {
    const absolutePath = path.resolve(options.projectRoot, trackedPath);
    if (!(await isFile(absolutePath))) {
      continue;
    }
    if (!isWithinRoot(options.targetDir, absolutePath)) {
      continue;
    }

    const relativePath = toRelativePosix(options.targetDir, absolutePath);
    if (isExcluded(options.rules, toRelativeParts(relativePath))) {
      continue;
    }

    const fileName = path.basename(absolutePath);
    if (options.policy.kind === "all-text") {
      // The classifier makes the real decision when the file is written.
      if (isBinaryExtension(fileName, options.binaryExtensions)) {
        continue;
      }
    } else if (!matchesExtensions(fileName, options.policy.extensions)) {
      continue;
    }

    files.push({ absolutePath, relativePath });
  }

  return sortCandidates(files);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}
