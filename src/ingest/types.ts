import type { ExclusionRuleSet } from "../exclusion/types.js";

export interface CandidateFile {
  readonly absolutePath: string;
  readonly relativePath: string;
}

export type ExtensionPolicy =
  | { readonly kind: "extensions"; readonly extensions: readonly string[] }
  | { readonly kind: "all-text" };

export type CollectionStrategy = "git" | "walk";

export interface CollectionResult {
  readonly files: readonly CandidateFile[];
  readonly strategy: CollectionStrategy;
}

export interface TrackedFileLister {
  /**
   * Lists tracked paths relative to `projectRoot` under `targetPath`.
   * Resolves to null when the listing is unavailable.
   */
  listTrackedFiles(
    projectRoot: string,
    targetPath: string,
  ): Promise<string[] | null>;
}

export interface CollectOptions {
  readonly projectRoot: string;
  readonly targetDir: string;
  readonly policy: ExtensionPolicy;
  readonly rules: ExclusionRuleSet;
  readonly useTrackedListing: boolean;
  readonly binaryExtensions?: ReadonlySet<string>;
  readonly lister?: TrackedFileLister;
  readonly onUnreadable?: (dirPath: string, error: unknown) => void;
}

export interface BinarySettings {
  readonly extensions: ReadonlySet<string>;
  readonly sniffBytes: number;
  readonly minSampleBytes: number;
  readonly highByteRatio: number;
}

export type BinaryReason =
  | "extension"
  | "mime-type"
  | "unreadable"
  | "nul-byte"
  | "high-byte-ratio";

export type Classification =
  | { readonly kind: "binary"; readonly reason: BinaryReason }
  | { readonly kind: "text"; readonly content: string };

export interface ResolvedTarget {
  readonly projectRoot: string;
  readonly targetDir: string;
  readonly isWholeProject: boolean;
}
