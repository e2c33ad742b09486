export {
  buildExclusionRules,
  isDirectoryExcluded,
  isExcluded,
  parseExcludeTokens,
  parseExclusionRule,
  toRelativeParts,
} from "./exclusion-matcher.js";
export {
  DEFAULT_EXCLUDE_NAMES,
  DEFAULT_EXCLUDE_PREFIXES,
  DEFAULT_EXCLUSIONS,
} from "./defaults.js";
export type {
  ExclusionDefaults,
  ExclusionRule,
  ExclusionRuleSet,
  NameRule,
  PrefixRule,
} from "./types.js";
