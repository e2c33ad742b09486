import type { OutputFormat } from "../output/document-renderer.js";

export interface BinaryConfig {
  readonly extensions?: readonly string[];
  readonly sniffBytes?: number;
  readonly minSampleBytes?: number;
  readonly highByteRatio?: number;
}

/** Project defaults read from `.dirdump.yaml`; every field is optional. */
export interface DumpConfig {
  readonly format?: OutputFormat;
  readonly ext?: readonly string[];
  readonly allText?: boolean;
  readonly exclude?: readonly string[];
  readonly allFiles?: boolean;
  readonly maxBytes?: number;
  readonly structure?: boolean;
  readonly structureMax?: number;
  readonly includeExcluded?: boolean;
  readonly splitBytes?: number;
  readonly splitMb?: number;
  readonly binary?: BinaryConfig;
}

export interface LoadedConfig {
  readonly config: DumpConfig;
  /** Null when no configuration file was found. */
  readonly path: string | null;
}
