import {
  COMPONENT_KEYS,
  WEIGHT_SUM_TOLERANCE,
  weightTotal,
  type ComponentKey,
  type ComponentScores,
  type ComponentWeights,
  type MatchResult,
} from "@shared/schema";
import { WeightConfigurationError, type ValidationIssue } from "../../errors";
import { clamp01 } from "./score-utils";

export const WEIGHT_PROFILE_NAMES = ["default", "balanced", "proximity", "budget_conscious"] as const;
export type WeightProfileName = (typeof WEIGHT_PROFILE_NAMES)[number];

// Weight profiles; each must sum to 1.0
export const WEIGHT_PROFILES: Readonly<Record<WeightProfileName, Readonly<ComponentWeights>>> = {
  default: { skill: 0.3, location: 0.15, budget: 0.15, availability: 0.25, quality: 0.15 },
  balanced: { skill: 0.3, location: 0.2, budget: 0.2, availability: 0.15, quality: 0.15 },
  proximity: { skill: 0.25, location: 0.3, budget: 0.1, availability: 0.2, quality: 0.15 },
  budget_conscious: { skill: 0.25, location: 0.1, budget: 0.3, availability: 0.2, quality: 0.15 },
};

const COMPONENT_SCORE_FIELDS: Record<ComponentKey, keyof ComponentScores> = {
  skill: "skillMatch",
  location: "locationScore",
  budget: "budgetCompatibility",
  availability: "availabilityScore",
  quality: "qualityScore",
};

export function componentScore(scores: ComponentScores, key: ComponentKey): number {
  return scores[COMPONENT_SCORE_FIELDS[key]];
}

/**
 * Checked once when a configuration is built, never per scoring call.
 */
export function validateWeights(weights: Readonly<Record<ComponentKey, number>>): ComponentWeights {
  const issues: ValidationIssue[] = [];

  for (const key of COMPONENT_KEYS) {
    const weight = weights[key];
    if (typeof weight !== "number" || !Number.isFinite(weight)) {
      issues.push({ field: `weights.${key}`, message: "Weight must be a finite number" });
    } else if (weight < 0) {
      issues.push({ field: `weights.${key}`, message: "Weights must not be negative" });
    }
  }

  if (issues.length === 0) {
    const total = weightTotal(weights);
    if (Math.abs(total - 1) > WEIGHT_SUM_TOLERANCE) {
      issues.push({ field: "weights", message: `Weights must sum to 1.0, got ${total}` });
    }
  }

  if (issues.length > 0) throw new WeightConfigurationError(issues);

  return {
    skill: weights.skill,
    location: weights.location,
    budget: weights.budget,
    availability: weights.availability,
    quality: weights.quality,
  };
}

export function aggregateScore(scores: ComponentScores, weights: ComponentWeights): number {
  const total = COMPONENT_KEYS.reduce(
    (sum, key) => sum + weights[key] * componentScore(scores, key),
    0,
  );
  return clamp01(total);
}

/**
 * The single canonical result for one provider. The explanation is filled in
 * by the explainer once the candidate survives ranking.
 */
export function aggregate(
  providerId: string,
  scores: ComponentScores,
  weights: ComponentWeights,
): MatchResult {
  return {
    providerId,
    ...scores,
    matchScore: aggregateScore(scores, weights),
    explanation: "",
  };
}
