import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ConfigurationError } from "../errors.js";
import type { ResolvedTarget } from "./types.js";

export async function resolveTarget(
  project: string,
  target: string,
): Promise<ResolvedTarget> {
  const projectRoot = path.resolve(expandHome(project));
  await assertDirectory(projectRoot, "Project directory");

  const trimmed = target.trim();
  const isWholeProject = trimmed === "" || trimmed === "." || trimmed === "./";
  const targetDir = isWholeProject
    ? projectRoot
    : path.resolve(projectRoot, expandHome(trimmed));
  await assertDirectory(targetDir, "Target directory");

  return {
    projectRoot,
    targetDir,
    isWholeProject: isWholeProject || targetDir === projectRoot,
  };
}

export function expandHome(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/") || input.startsWith("~\\")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

async function assertDirectory(dirPath: string, label: string): Promise<void> {
  let stats: Awaited<ReturnType<typeof fs.stat>>;
  try {
    stats = await fs.stat(dirPath);
  } catch {
    throw new ConfigurationError(`${label} not found: ${dirPath}`);
  }

  if (!stats.isDirectory()) {
    throw new ConfigurationError(`${label} is not a directory: ${dirPath}`);
  }
}
