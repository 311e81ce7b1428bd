import { z } from "zod";
import { COMPONENT_KEYS, type ComponentKey, type ComponentWeights } from "@shared/schema";
import { fromZodError, MatchValidationError, WeightConfigurationError, type ValidationIssue } from "./errors";
import { validateWeights, WEIGHT_PROFILE_NAMES, WEIGHT_PROFILES } from "./services/matching/aggregator";
import { assertTopK, DEFAULT_TOP_K } from "./services/matching/ranker";
import { SKILL_EXPANSION_MODES, type SkillExpansionMode } from "./services/matching/skill-matcher";
import { SCORING_STRATEGIES, type ScoringStrategyName } from "./services/matching/strategy";

export interface MatchingConfig {
  strategy: ScoringStrategyName;
  weights: ComponentWeights;
  defaultTopK: number;
  defaultServiceRadiusKm: number;
  requireCategoryMatch: boolean; // drop providers outside the job's category before scoring
  skillRequiredCategories: readonly string[];
  skillExpansion: SkillExpansionMode;
  verbose: boolean;
}

export const DEFAULT_SKILL_REQUIRED_CATEGORIES = ["electrical", "plumbing", "hvac", "automotive", "tech"];

export const DEFAULT_MATCHING_CONFIG: Readonly<MatchingConfig> = {
  strategy: "heuristic",
  weights: WEIGHT_PROFILES.default,
  defaultTopK: DEFAULT_TOP_K,
  defaultServiceRadiusKm: 25,
  requireCategoryMatch: false,
  skillRequiredCategories: DEFAULT_SKILL_REQUIRED_CATEGORIES,
  skillExpansion: "none",
  verbose: false,
};

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((value) => value === "true" || value === "1");

const csvList = z
  .string()
  .optional()
  .transform((value) =>
    value === undefined
      ? undefined
      : value
          .split(",")
          .map((entry) => entry.trim().toLowerCase())
          .filter(Boolean),
  );

const envSchema = z.object({
  MATCH_STRATEGY: z.enum(SCORING_STRATEGIES).default("heuristic"),
  MATCH_WEIGHT_PROFILE: z.enum(WEIGHT_PROFILE_NAMES).default("default"),
  MATCH_WEIGHTS: z.string().optional(),
  MATCH_TOP_K: z.coerce.number().int().positive().default(DEFAULT_TOP_K),
  MATCH_DEFAULT_RADIUS_KM: z.coerce.number().positive().default(25),
  MATCH_REQUIRE_CATEGORY: booleanFlag,
  MATCH_SKILL_REQUIRED_CATEGORIES: csvList,
  MATCH_SKILL_EXPANSION: z.enum(SKILL_EXPANSION_MODES).default("none"),
  MATCH_VERBOSE: booleanFlag,
});

/**
 * Parses "skill=0.3,location=0.2,..." into a full weight set. Every component
 * has to be named exactly once.
 */
export function parseWeightList(value: string): ComponentWeights {
  const issues: ValidationIssue[] = [];
  const weights: Partial<Record<ComponentKey, number>> = {};

  for (const entry of value.split(",")) {
    const [rawKey, rawWeight] = entry.split("=").map((part) => part.trim());
    const key = COMPONENT_KEYS.find((candidate) => candidate === rawKey);
    if (!key) {
      issues.push({ field: "MATCH_WEIGHTS", message: `Unknown weight "${rawKey ?? ""}"` });
      continue;
    }
    const weight = Number(rawWeight);
    if (rawWeight === undefined || rawWeight === "" || Number.isNaN(weight)) {
      issues.push({ field: `weights.${key}`, message: `Weight for ${key} is not a number` });
      continue;
    }
    weights[key] = weight;
  }

  const missing = COMPONENT_KEYS.filter((key) => weights[key] === undefined);
  if (missing.length > 0) {
    issues.push({ field: "MATCH_WEIGHTS", message: `Missing weights: ${missing.join(", ")}` });
  }
  if (issues.length > 0) throw new WeightConfigurationError(issues);

  return validateWeights({
    skill: weights.skill ?? 0,
    location: weights.location ?? 0,
    budget: weights.budget ?? 0,
    availability: weights.availability ?? 0,
    quality: weights.quality ?? 0,
  });
}

/**
 * Fill in defaults and validate once. Weights and the default top_k are
 * checked here so no scoring call ever sees a broken configuration.
 */
export function resolveMatchingConfig(overrides: Partial<MatchingConfig> = {}): MatchingConfig {
  const config: MatchingConfig = { ...DEFAULT_MATCHING_CONFIG, ...overrides };
  assertTopK(config.defaultTopK);
  if (!(config.defaultServiceRadiusKm > 0)) {
    throw new MatchValidationError([
      { field: "defaultServiceRadiusKm", message: "Default service radius must be positive" },
    ]);
  }
  return {
    ...config,
    weights: validateWeights(config.weights),
    skillRequiredCategories: config.skillRequiredCategories.map((category) => category.trim().toLowerCase()),
  };
}

export function loadMatchingConfig(env: NodeJS.ProcessEnv = process.env): MatchingConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) throw fromZodError(parsed.error, "env");

  const vars = parsed.data;
  const weights = vars.MATCH_WEIGHTS
    ? parseWeightList(vars.MATCH_WEIGHTS)
    : WEIGHT_PROFILES[vars.MATCH_WEIGHT_PROFILE];

  return resolveMatchingConfig({
    strategy: vars.MATCH_STRATEGY,
    weights,
    defaultTopK: vars.MATCH_TOP_K,
    defaultServiceRadiusKm: vars.MATCH_DEFAULT_RADIUS_KM,
    requireCategoryMatch: vars.MATCH_REQUIRE_CATEGORY,
    skillRequiredCategories: vars.MATCH_SKILL_REQUIRED_CATEGORIES ?? DEFAULT_SKILL_REQUIRED_CATEGORIES,
    skillExpansion: vars.MATCH_SKILL_EXPANSION,
    verbose: vars.MATCH_VERBOSE,
  });
}
