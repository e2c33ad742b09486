export {
  BINARY_EXTENSIONS,
  DEFAULT_BINARY_SETTINGS,
  classifyFile,
  decodeText,
  isBinaryExtension,
  isBinaryMimeType,
  sniffBinary,
} from "./binary-classifier.js";
export {
  DEFAULT_TEXT_EXTENSIONS,
  extensionPolicy,
  languageFromPath,
  matchesExtensions,
  parseExtensions,
} from "./file-classifier.js";
export { collectFiles } from "./file-collector.js";
export { readSortedEntries, walkFiles } from "./file-discovery.js";
export { resolveTarget } from "./repo-loader.js";
export {
  collectTrackedFiles,
  gitTrackedFileLister,
  isGitRepository,
} from "./tracked-files.js";
export type {
  BinarySettings,
  CandidateFile,
  Classification,
  CollectionResult,
  CollectionStrategy,
  ExtensionPolicy,
  ResolvedTarget,
  TrackedFileLister,
} from "./types.js";
