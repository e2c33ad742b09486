import path from "node:path";
import { loadConfig, resolveBinarySettings } from "../config/config-loader.js";
import { dumpTarget, type DumpResult } from "../dump/dumper.js";
import { ConfigurationError } from "../errors.js";
import { parseExcludeTokens } from "../exclusion/exclusion-matcher.js";
import {
  DEFAULT_TEXT_EXTENSIONS,
  extensionPolicy,
} from "../ingest/file-classifier.js";
import { expandHome, resolveTarget } from "../ingest/repo-loader.js";
import type {
  ExtensionPolicy,
  ResolvedTarget,
  TrackedFileLister,
} from "../ingest/types.js";
import type { OutputFormat } from "../output/document-renderer.js";
import { normalizeExcludeTokens } from "./exclude-normalizer.js";

const BYTES_PER_MB = 1024 * 1024;

export interface DumpCommandOptions {
  readonly project?: string;
  readonly target?: string;
  readonly output?: string;
  readonly format?: string;
  /** Comma-separated extension list. */
  readonly ext?: string;
  readonly allText?: boolean;
  /** Comma-separated names and paths. */
  readonly exclude?: string;
  readonly allFiles?: boolean;
  readonly maxBytes?: number;
  readonly structure?: boolean;
  readonly structureMax?: number;
  readonly includeExcluded?: boolean;
  readonly splitBytes?: number;
  readonly splitMb?: number;
  readonly config?: string;
  readonly cwd?: string;
  readonly lister?: TrackedFileLister;
  readonly log?: (message: string) => void;
}

export interface DumpCommandResult extends DumpResult {
  readonly outputPath: string;
  readonly configPath: string | null;
}

export async function runDumpCommand(
  options: DumpCommandOptions,
): Promise<DumpCommandResult> {
  const cwd = options.cwd ?? process.cwd();
  const resolved = await resolveTarget(
    path.resolve(cwd, expandHome(options.project ?? ".")),
    options.target ?? ".",
  );
  const { config, path: configPath } = await loadConfig({
    projectRoot: resolved.projectRoot,
    configPath: options.config
      ? path.resolve(cwd, expandHome(options.config))
      : undefined,
  });
  if (configPath) {
    options.log?.(`Using configuration ${configPath}`);
  }

  const format = parseFormat(options.format ?? config.format ?? "md");
  const outputPath = resolveOutputPath(resolved, format, options.output, cwd);
  const policy = resolvePolicy(
    options.allText ?? config.allText ?? false,
    options.ext !== undefined ? parseExcludeTokens(options.ext) : config.ext,
  );
  const exclude = normalizeExcludeTokens(
    [
      ...(config.exclude ?? []),
      ...parseExcludeTokens(options.exclude ?? ""),
    ],
    resolved.projectRoot,
    resolved.targetDir,
  );

  const result = await dumpTarget(resolved, {
    outputPath,
    format,
    policy,
    exclude,
    forceWalk: options.allFiles ?? config.allFiles ?? false,
    maxBytes: options.maxBytes ?? config.maxBytes ?? 0,
    structure: options.structure ?? config.structure ?? true,
    structureMax: options.structureMax ?? config.structureMax ?? 0,
    includeExcluded: options.includeExcluded ?? config.includeExcluded ?? false,
    splitBytes: resolveSplitBudget(
      options.splitBytes ?? config.splitBytes,
      options.splitMb ?? config.splitMb,
    ),
    binary: resolveBinarySettings(config.binary),
    lister: options.lister,
    log: options.log,
  });

  return { ...result, outputPath, configPath };
}

export function parseFormat(value: string): OutputFormat {
  if (value === "md" || value === "txt") {
    return value;
  }
  throw new ConfigurationError(`Unsupported format: ${value}`);
}

/** Bytes win over megabytes when both are set. */
export function resolveSplitBudget(
  splitBytes: number | undefined,
  splitMb: number | undefined,
): number {
  if (splitBytes !== undefined && splitBytes > 0) {
    return splitBytes;
  }
  if (splitMb !== undefined && splitMb > 0) {
    return splitMb * BYTES_PER_MB;
  }
  return 0;
}

export function resolveOutputPath(
  target: ResolvedTarget,
  format: OutputFormat,
  output: string | undefined,
  cwd: string,
): string {
  if (output) {
    return path.resolve(cwd, expandHome(output));
  }
  const baseName = target.isWholeProject
    ? "project"
    : path.basename(target.targetDir);
  return path.join(target.projectRoot, `${baseName}_dump.${format}`);
}

function resolvePolicy(
  allText: boolean,
  extensions: readonly string[] | undefined,
): ExtensionPolicy {
  if (allText) {
    return { kind: "all-text" };
  }
  const policy = extensionPolicy(extensions ?? DEFAULT_TEXT_EXTENSIONS);
  if (policy.kind === "extensions" && policy.extensions.length === 0) {
    throw new ConfigurationError(
      "No extensions to include. Pass --ext or use --all-text.",
    );
  }
  return policy;
}
