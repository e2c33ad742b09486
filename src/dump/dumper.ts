import fs from "node:fs/promises";
import { buildExclusionRules } from "../exclusion/exclusion-matcher.js";
import {
  DEFAULT_BINARY_SETTINGS,
  classifyFile,
} from "../ingest/binary-classifier.js";
import { collectFiles } from "../ingest/file-collector.js";
import { resolveTarget } from "../ingest/repo-loader.js";
import { isGitRepository } from "../ingest/tracked-files.js";
import type {
  BinarySettings,
  CandidateFile,
  CollectionStrategy,
  ExtensionPolicy,
  ResolvedTarget,
  TrackedFileLister,
} from "../ingest/types.js";
import {
  renderFileSection,
  renderFooter,
  renderHeader,
  renderStructureBlock,
  type DumpCounters,
  type OutputFormat,
} from "../output/document-renderer.js";
import { SplitWriter, isOwnOutput } from "../output/split-writer.js";
import { renderStructure } from "../structure/structure-renderer.js";

export interface DumpSettings {
  readonly outputPath: string;
  readonly format: OutputFormat;
  readonly policy: ExtensionPolicy;
  /** Directory names and target-relative path prefixes. */
  readonly exclude?: readonly string[];
  readonly forceWalk?: boolean;
  /** Per-file size cap in bytes, 0 for none. */
  readonly maxBytes?: number;
  readonly structure?: boolean;
  readonly structureMax?: number;
  readonly includeExcluded?: boolean;
  /** Part size budget in bytes, 0 for a single output file. */
  readonly splitBytes?: number;
  readonly binary?: BinarySettings;
  readonly lister?: TrackedFileLister;
  readonly log?: (message: string) => void;
}

export interface DumpOptions extends DumpSettings {
  readonly projectRoot: string;
  /** Relative to the project root, or "." for all of it. */
  readonly targetDir: string;
}

export interface DumpResult extends DumpCounters {
  readonly strategy: CollectionStrategy;
  readonly parts: readonly string[];
}

interface MutableCounters {
  written: number;
  skippedBinary: number;
  skippedLarge: number;
}

export async function runDump(options: DumpOptions): Promise<DumpResult> {
  const target = await resolveTarget(options.projectRoot, options.targetDir);
  return dumpTarget(target, options);
}

/** Dumps a target that {@link resolveTarget} has already checked. */
export async function dumpTarget(
  target: ResolvedTarget,
  options: DumpSettings,
): Promise<DumpResult> {
  const log = options.log ?? (() => undefined);
  const { projectRoot, targetDir } = target;
  const onUnreadable = (dirPath: string, error: unknown) => {
    const reason = error instanceof Error ? error.message : String(error);
    log(`Skipped unreadable directory ${dirPath}: ${reason}`);
  };
  const rules = buildExclusionRules(options.exclude ?? []);
  const binary = options.binary ?? DEFAULT_BINARY_SETTINGS;
  const useTrackedListing =
    !options.forceWalk && (await isGitRepository(projectRoot));

  const collection = await collectFiles({
    projectRoot,
    targetDir,
    policy: options.policy,
    rules,
    useTrackedListing,
    binaryExtensions: binary.extensions,
    lister: options.lister,
    onUnreadable,
  });
  const files = collection.files.filter(
    (file) => !isOwnOutput(file.absolutePath, options.outputPath),
  );
  log(
    `Collected ${files.length} file(s) via ${collection.strategy === "git" ? "git ls-files" : "filesystem walk"}`,
  );

  const writer = await SplitWriter.open(options.outputPath, {
    budgetBytes: options.splitBytes ?? 0,
    onRotate: (partPath) => log(`Continuing in ${partPath}`),
  });

  const counters: MutableCounters = {
    written: 0,
    skippedBinary: 0,
    skippedLarge: 0,
  };
  try {
    await writer.write(
      renderHeader({ targetDir, outputPath: writer.outputPath }),
    );

    if (options.structure ?? true) {
      const lines = await renderStructure({
        targetDir,
        rules,
        maxEntries: options.structureMax ?? 0,
        includeExcluded: options.includeExcluded ?? false,
        onUnreadable,
      });
      await writer.write(renderStructureBlock(lines));
    }

    for (const file of files) {
      await writeFile(writer, file, options, binary, counters);
    }

    await writer.write(
      renderFooter({
        ...counters,
        sizeCapped: (options.maxBytes ?? 0) > 0,
        strategy: collection.strategy,
        allText: options.policy.kind === "all-text",
      }),
    );
  } finally {
    await writer.close();
  }

  log(
    `Wrote ${counters.written} file(s), skipped ${counters.skippedBinary} binary and ${counters.skippedLarge} oversized`,
  );
  return { ...counters, strategy: collection.strategy, parts: writer.parts };
}

async function writeFile(
  writer: SplitWriter,
  file: CandidateFile,
  options: DumpSettings,
  binary: BinarySettings,
  counters: MutableCounters,
): Promise<void> {
  const maxBytes = options.maxBytes ?? 0;
  let sizeBytes: number;
  try {
    sizeBytes = (await fs.stat(file.absolutePath)).size;
  } catch {
    counters.skippedBinary += 1;
    return;
  }

  if (maxBytes > 0 && sizeBytes > maxBytes) {
    counters.skippedLarge += 1;
    return;
  }

  const classification = await classifyFile(file.absolutePath, binary);
  if (classification.kind === "binary") {
    counters.skippedBinary += 1;
    return;
  }

  await writer.write(
    renderFileSection(
      { relativePath: file.relativePath, content: classification.content },
      options.format,
    ),
  );
  counters.written += 1;
}
