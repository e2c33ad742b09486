import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigurationError, isErrnoException } from "../errors.js";
import { DEFAULT_BINARY_SETTINGS } from "../ingest/binary-classifier.js";
import { parseExtensions } from "../ingest/file-classifier.js";
import type { BinarySettings } from "../ingest/types.js";
import { validateConfig } from "./config-validator.js";
import type { BinaryConfig, LoadedConfig } from "./types.js";

export const DEFAULT_CONFIG_FILE = ".dirdump.yaml";

export interface LoadConfigOptions {
  readonly projectRoot: string;
  /** An explicit path must exist; the default file is optional. */
  readonly configPath?: string;
}

export async function loadConfig(
  options: LoadConfigOptions,
): Promise<LoadedConfig> {
  const explicit = Boolean(options.configPath);
  const configPath = options.configPath
    ? path.resolve(options.configPath)
    : path.join(options.projectRoot, DEFAULT_CONFIG_FILE);

  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (!explicit && isErrnoException(error) && error.code === "ENOENT") {
      return { config: {}, path: null };
    }
    throw new ConfigurationError(
      `Unable to read configuration file: ${configPath}`,
    );
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(
      `Invalid YAML in configuration file ${configPath}: ${reason}`,
    );
  }

  return { config: validateConfig(doc, configPath), path: configPath };
}

export function resolveBinarySettings(
  config: BinaryConfig | undefined,
): BinarySettings {
  if (!config) {
    return DEFAULT_BINARY_SETTINGS;
  }
  return {
    extensions: config.extensions
      ? new Set(parseExtensions(config.extensions))
      : DEFAULT_BINARY_SETTINGS.extensions,
    sniffBytes: config.sniffBytes ?? DEFAULT_BINARY_SETTINGS.sniffBytes,
    minSampleBytes:
      config.minSampleBytes ?? DEFAULT_BINARY_SETTINGS.minSampleBytes,
    highByteRatio: config.highByteRatio ?? DEFAULT_BINARY_SETTINGS.highByteRatio,
  };
}
