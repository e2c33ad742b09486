import { BINARY_EXTENSIONS } from "./binary-classifier.js";
import { walkFiles } from "./file-discovery.js";
import { collectTrackedFiles, gitTrackedFileLister } from "./tracked-files.js";
import type { CollectOptions, CollectionResult } from "./types.js";

export async function collectFiles(
  options: CollectOptions,
): Promise<CollectionResult> {
  if (options.useTrackedListing) {
    const tracked = await collectTrackedFiles({
      projectRoot: options.projectRoot,
      targetDir: options.targetDir,
      policy: options.policy,
      rules: options.rules,
      binaryExtensions: options.binaryExtensions ?? BINARY_EXTENSIONS,
      lister: options.lister ?? gitTrackedFileLister,
    });
    if (tracked && tracked.length > 0) {
      return { files: tracked, strategy: "git" };
    }
  }

  const files = await walkFiles(options.targetDir, {
    policy: options.policy,
    rules: options.rules,
    onUnreadable: options.onUnreadable,
  });
  return { files, strategy: "walk" };
}
