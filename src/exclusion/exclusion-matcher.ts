import { DEFAULT_EXCLUSIONS } from "./defaults.js";
import type {
  ExclusionDefaults,
  ExclusionRule,
  ExclusionRuleSet,
  PrefixRule,
} from "./types.js";

export function parseExcludeTokens(csv: string): string[] {
  return csv
    .split(",")
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

export function parseExclusionRule(token: string): ExclusionRule | null {
  const normalized = token.trim().replace(/\\/g, "/");
  if (!normalized) {
    return null;
  }

  if (!normalized.includes("/")) {
    return { kind: "name", name: normalized };
  }

  const segments = normalized.split("/").filter((segment) => segment !== "");
  if (segments.length === 0) {
    return null;
  }
  return { kind: "prefix", segments };
}

/**
 * Builds the rule set for one run. Built-in defaults come first, then the
 * user tokens; prefixes keep the order they were first seen in.
 */
export function buildExclusionRules(
  tokens: readonly string[] = [],
  defaults: ExclusionDefaults = DEFAULT_EXCLUSIONS,
): ExclusionRuleSet {
  const names = new Set<string>(defaults.names);
  const prefixes: PrefixRule[] = [];
  const seenPrefixes = new Set<string>();

  const addPrefix = (rule: PrefixRule): void => {
    const key = rule.segments.join("/");
    if (seenPrefixes.has(key)) {
      return;
    }
    seenPrefixes.add(key);
    prefixes.push(rule);
  };

  for (const prefix of defaults.prefixes) {
    const rule = parseExclusionRule(prefix.includes("/") ? prefix : `${prefix}/`);
    if (rule?.kind === "prefix") {
      addPrefix(rule);
    }
  }

  for (const token of tokens) {
    const rule = parseExclusionRule(token);
    if (!rule) {
      continue;
    }
    if (rule.kind === "name") {
      names.add(rule.name);
    } else {
      addPrefix(rule);
    }
  }

  return Object.freeze({ names, prefixes: Object.freeze(prefixes) });
}

export function isExcluded(
  rules: ExclusionRuleSet,
  relativeParts: readonly string[],
): boolean {
  for (const part of relativeParts.slice(0, -1)) {
    if (rules.names.has(part)) {
      return true;
    }
  }
  return matchesPrefix(rules, relativeParts);
}

// A directory's own name counts as a directory segment.
export function isDirectoryExcluded(
  rules: ExclusionRuleSet,
  relativeParts: readonly string[],
): boolean {
  if (relativeParts.some((part) => rules.names.has(part))) {
    return true;
  }
  return matchesPrefix(rules, relativeParts);
}

function matchesPrefix(
  rules: ExclusionRuleSet,
  relativeParts: readonly string[],
): boolean {
  const joined = relativeParts.join("/");
  for (const prefix of rules.prefixes) {
    const prefixPath = prefix.segments.join("/");
    if (joined === prefixPath || joined.startsWith(`${prefixPath}/`)) {
      return true;
    }
  }
  return false;
}

export function toRelativeParts(relativePath: string): string[] {
  return relativePath.split("/").filter((part) => part !== "");
}
