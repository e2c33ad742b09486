export interface NameRule {
  readonly kind: "name";
  readonly name: string;
}

export interface PrefixRule {
  readonly kind: "prefix";
  readonly segments: readonly string[];
}

export type ExclusionRule = NameRule | PrefixRule;

export interface ExclusionRuleSet {
  readonly names: ReadonlySet<string>;
  readonly prefixes: readonly PrefixRule[];
}

export interface ExclusionDefaults {
  readonly names: readonly string[];
  readonly prefixes: readonly string[];
}
