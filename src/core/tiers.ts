/**
 * VPC Atlas — Tier Classifier
 *
 * Assigns subnets to network tiers with ordered, case-insensitive glob
 * rules. First matching rule wins; no match means "unclassified".
 */

import type { Resource, Tier } from "../types.js";

// =============================================================================
// Rules
// =============================================================================

/** One classification rule: any matching pattern assigns the tier. */
export type TierRule = {
  tier: Exclude<Tier, "unclassified">;
  patterns: string[];
};

export const DEFAULT_TIER_RULES: readonly TierRule[] = [
  { tier: "presentation", patterns: ["*public*", "*dmz*"] },
  { tier: "application", patterns: ["*private*", "*app*"] },
  { tier: "restricted", patterns: ["*db*", "*data*"] },
];

/** Tiers that take part in north-south ordering, top to bottom. */
export const RANKED_TIERS: readonly Tier[] = ["presentation", "application", "restricted"];

/** Position of a tier in the stack, or null for unclassified. */
export function tierRank(tier: Tier): number | null {
  const idx = RANKED_TIERS.indexOf(tier);
  return idx >= 0 ? idx : null;
}

// =============================================================================
// Glob Matching
// =============================================================================

/**
 * Compile a glob into an anchored, case-insensitive regular expression.
 * `*` matches any run of characters, `?` exactly one; everything else is
 * literal.
 */
export function compileGlob(pattern: string): RegExp {
  let source = "";
  for (const ch of pattern) {
    if (ch === "*") source += ".*";
    else if (ch === "?") source += ".";
    else source += ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
  }
  return new RegExp(`^${source}$`, "is");
}

// =============================================================================
// Classifier
// =============================================================================

/** Subset of a subnet the classifier reads. */
export type ClassifiableSubnet = Pick<Resource, "id" | "name" | "tags">;

export type TierClassifier = (subnet: ClassifiableSubnet) => Tier;

/**
 * Build a pure classifier from ordered rules.
 *
 * The subnet is matched on its Name tag, falling back to its name and
 * then its id when neither is set.
 */
export function createTierClassifier(rules: readonly TierRule[] = DEFAULT_TIER_RULES): TierClassifier {
  const compiled = rules.map((rule) => ({
    tier: rule.tier,
    patterns: rule.patterns.map(compileGlob),
  }));

  return (subnet) => {
    const value = subnetLabel(subnet);

    for (const rule of compiled) {
      for (const pattern of rule.patterns) {
        if (pattern.test(value)) return rule.tier;
      }
    }
    return "unclassified";
  };
}

/** The value a subnet is classified by. */
export function subnetLabel(subnet: ClassifiableSubnet): string {
  const tag = subnet.tags["Name"];
  if (tag) return tag;
  return subnet.name || subnet.id;
}
