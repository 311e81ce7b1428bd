import Fuse from "fuse.js";
import skillSynonyms from "@shared/data/skill-synonyms.json";
import { normalizeSkill, normalizeSkills } from "./normalizer";

export const SKILL_EXPANSION_MODES = ["none", "synonyms", "fuzzy"] as const;
export type SkillExpansionMode = (typeof SKILL_EXPANSION_MODES)[number];

/**
 * Decides whether a provider's skills cover one required skill.
 * Both sides arrive trimmed and lower-cased.
 */
export interface SkillExpander {
  readonly name: string;
  covers(requiredSkill: string, providerSkills: readonly string[]): boolean;
}

export const exactSkillExpander: SkillExpander = {
  name: "exact",
  covers: (requiredSkill, providerSkills) => providerSkills.includes(requiredSkill),
};

/**
 * Treats every term in a synonym group as interchangeable
 * ("plumber" covers "plumbing" and vice versa).
 */
export class SynonymSkillExpander implements SkillExpander {
  readonly name = "synonyms";
  private readonly groups = new Map<string, Set<string>>();

  constructor(synonyms: Readonly<Record<string, readonly string[]>> = skillSynonyms) {
    for (const [canonical, alternatives] of Object.entries(synonyms)) {
      const terms = [canonical, ...alternatives].map(normalizeSkill);
      for (const term of terms) {
        const group = this.groups.get(term) ?? new Set<string>([term]);
        for (const related of terms) group.add(related);
        this.groups.set(term, group);
      }
    }
  }

  equivalents(skill: string): ReadonlySet<string> {
    return this.groups.get(skill) ?? new Set([skill]);
  }

  covers(requiredSkill: string, providerSkills: readonly string[]): boolean {
    const accepted = this.equivalents(requiredSkill);
    return providerSkills.some((skill) => accepted.has(skill));
  }
}

/**
 * Approximate string matching for misspelt tags ("electrcal" vs "electrical").
 */
export class FuzzySkillExpander implements SkillExpander {
  readonly name = "fuzzy";

  constructor(private readonly threshold = 0.3) {}

  covers(requiredSkill: string, providerSkills: readonly string[]): boolean {
    if (providerSkills.includes(requiredSkill)) return true;
    if (providerSkills.length === 0) return false;

    const fuse = new Fuse([...providerSkills], {
      threshold: this.threshold,
      ignoreLocation: true,
      isCaseSensitive: false,
    });
    return fuse.search(requiredSkill).length > 0;
  }
}

export function createSkillExpander(mode: SkillExpansionMode): SkillExpander {
  switch (mode) {
    case "synonyms":
      return new SynonymSkillExpander();
    case "fuzzy":
      return new FuzzySkillExpander();
    case "none":
      return exactSkillExpander;
  }
}

/**
 * |R ∩ P| / |R|, with the intersection decided by the expander.
 * An empty requirement has nothing to violate and scores 1.
 */
export function scoreSkillMatch(
  requiredSkills: readonly string[],
  providerSkills: readonly string[],
  expander: SkillExpander = exactSkillExpander,
): number {
  const required = normalizeSkills(requiredSkills);
  if (required.length === 0) return 1;

  const offered = normalizeSkills(providerSkills);
  const covered = required.filter((skill) => expander.covers(skill, offered));
  return covered.length / required.length;
}
