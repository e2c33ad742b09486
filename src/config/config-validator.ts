import { ConfigurationError } from "../errors.js";
import type { BinaryConfig, DumpConfig } from "./types.js";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

const CONFIG_KEYS = new Set([
  "format",
  "ext",
  "all_text",
  "exclude",
  "all_files",
  "max_bytes",
  "structure",
  "structure_max",
  "include_excluded",
  "split_bytes",
  "split_mb",
  "binary",
]);
const BINARY_KEYS = new Set([
  "extensions",
  "sniff_bytes",
  "min_sample_bytes",
  "high_byte_ratio",
]);

/**
 * Validate a parsed configuration document. All problems are collected and
 * reported in one error.
 */
export function validateConfig(input: unknown, source: string): DumpConfig {
  if (input === null || input === undefined) {
    return {};
  }

  const errors: string[] = [];
  const config = parseConfig(input, errors);
  if (errors.length > 0) {
    throw new ConfigurationError(
      `Invalid configuration in ${source}: ${errors.join("; ")}`,
    );
  }
  return config;
}

function parseConfig(input: unknown, errors: string[]): DumpConfig {
  if (!isRecord(input)) {
    errors.push("configuration must be an object");
    return {};
  }
  assertNoExtraKeys(input, CONFIG_KEYS, "configuration", errors);

  const config: Mutable<DumpConfig> = {};
  if (input.format !== undefined) {
    if (input.format === "md" || input.format === "txt") {
      config.format = input.format;
    } else {
      errors.push("format must be 'md' or 'txt'");
    }
  }

  config.ext = parseOptionalList(input.ext, "ext", errors);
  config.exclude = parseOptionalList(input.exclude, "exclude", errors);
  config.allText = parseOptionalBoolean(input.all_text, "all_text", errors);
  config.allFiles = parseOptionalBoolean(input.all_files, "all_files", errors);
  config.structure = parseOptionalBoolean(input.structure, "structure", errors);
  config.includeExcluded = parseOptionalBoolean(
    input.include_excluded,
    "include_excluded",
    errors,
  );
  config.maxBytes = parseOptionalCount(input.max_bytes, "max_bytes", errors);
  config.structureMax = parseOptionalCount(
    input.structure_max,
    "structure_max",
    errors,
  );
  config.splitBytes = parseOptionalCount(
    input.split_bytes,
    "split_bytes",
    errors,
  );
  config.splitMb = parseOptionalCount(input.split_mb, "split_mb", errors);

  if (input.binary !== undefined) {
    config.binary = parseBinary(input.binary, errors);
  }

  return config;
}

function parseBinary(input: unknown, errors: string[]): BinaryConfig {
  if (!isRecord(input)) {
    errors.push("binary must be an object");
    return {};
  }
  assertNoExtraKeys(input, BINARY_KEYS, "binary", errors);

  const binary: Mutable<BinaryConfig> = {
    extensions: parseOptionalList(input.extensions, "binary.extensions", errors),
    sniffBytes: parseOptionalCount(
      input.sniff_bytes,
      "binary.sniff_bytes",
      errors,
    ),
    minSampleBytes: parseOptionalCount(
      input.min_sample_bytes,
      "binary.min_sample_bytes",
      errors,
    ),
  };

  if (input.sniff_bytes !== undefined && binary.sniffBytes === 0) {
    errors.push("binary.sniff_bytes must be greater than 0");
  }

  const ratio = input.high_byte_ratio;
  if (ratio !== undefined) {
    if (typeof ratio !== "number" || ratio < 0 || ratio > 1) {
      errors.push("binary.high_byte_ratio must be a number between 0 and 1");
    } else {
      binary.highByteRatio = ratio;
    }
  }

  return binary;
}

/** Accepts a YAML list or a comma-separated string. */
function parseOptionalList(
  input: unknown,
  path: string,
  errors: string[],
): string[] | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input === "string") {
    return input
      .split(",")
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  }
  if (!Array.isArray(input)) {
    errors.push(`${path} must be an array or a comma-separated string`);
    return undefined;
  }
  const values: string[] = [];
  input.forEach((entry, index) => {
    if (typeof entry !== "string") {
      errors.push(`${path}[${index}] must be a string`);
      return;
    }
    values.push(entry);
  });
  return values;
}

function parseOptionalBoolean(
  input: unknown,
  path: string,
  errors: string[],
): boolean | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input !== "boolean") {
    errors.push(`${path} must be a boolean`);
    return undefined;
  }
  return input;
}

function parseOptionalCount(
  input: unknown,
  path: string,
  errors: string[],
): number | undefined {
  if (input === undefined) {
    return undefined;
  }
  if (typeof input !== "number" || !Number.isInteger(input) || input < 0) {
    errors.push(`${path} must be a non-negative integer`);
    return undefined;
  }
  return input;
}

function assertNoExtraKeys(
  input: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  path: string,
  errors: string[],
): void {
  for (const key of Object.keys(input)) {
    if (!allowed.has(key)) {
      errors.push(`${path} contains unsupported field '${key}'`);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
