import {
  COMPONENT_KEYS,
  type ComponentKey,
  type ComponentScores,
  type ConfidenceLevel,
  type MatchResult,
} from "@shared/schema";
import { componentScore } from "./aggregator";

export const STRONG_THRESHOLD = 0.8;
export const WEAK_THRESHOLD = 0.3;

const STRENGTH_PHRASES: Record<ComponentKey, string> = {
  skill: "strong skill match",
  location: "nearby location",
  budget: "rate within budget",
  availability: "available when needed",
  quality: "proven track record",
};

const WEAKNESS_PHRASES: Record<ComponentKey, string> = {
  skill: "limited skill overlap",
  location: "outside service area",
  budget: "budget mismatch",
  availability: "unavailable when needed",
  quality: "limited track record",
};

const NEUTRAL_EXPLANATION = "Moderate fit across all factors";

interface RankedFactor {
  key: ComponentKey;
  score: number;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

// Stable sort keeps the component order for equal scores
function factors(scores: ComponentScores): RankedFactor[] {
  return COMPONENT_KEYS.map((key) => ({ key, score: componentScore(scores, key) }));
}

/**
 * One- or two-factor summary from fixed thresholds:
 *   two strengths       -> "Strong skill match and nearby location"
 *   strength + weakness -> "Available when needed but budget mismatch"
 *   weaknesses only     -> "Outside service area and unavailable when needed"
 */
export function explainScores(scores: ComponentScores): string {
  const all = factors(scores);
  const strengths = all
    .filter((factor) => factor.score >= STRONG_THRESHOLD)
    .sort((a, b) => b.score - a.score);
  const weaknesses = all
    .filter((factor) => factor.score <= WEAK_THRESHOLD)
    .sort((a, b) => a.score - b.score);

  const [topStrength, secondStrength] = strengths;
  const [topWeakness, secondWeakness] = weaknesses;

  if (topStrength && secondStrength) {
    return `${capitalize(STRENGTH_PHRASES[topStrength.key])} and ${STRENGTH_PHRASES[secondStrength.key]}`;
  }
  if (topStrength && topWeakness) {
    return `${capitalize(STRENGTH_PHRASES[topStrength.key])} but ${WEAKNESS_PHRASES[topWeakness.key]}`;
  }
  if (topStrength) {
    return capitalize(STRENGTH_PHRASES[topStrength.key]);
  }
  if (topWeakness && secondWeakness) {
    return `${capitalize(WEAKNESS_PHRASES[topWeakness.key])} and ${WEAKNESS_PHRASES[secondWeakness.key]}`;
  }
  if (topWeakness) {
    return capitalize(WEAKNESS_PHRASES[topWeakness.key]);
  }
  return NEUTRAL_EXPLANATION;
}

export function annotate(result: MatchResult): MatchResult {
  return { ...result, explanation: explainScores(result) };
}

export function confidenceLevel(matchScore: number): ConfidenceLevel {
  if (matchScore >= 0.8) return "Very High";
  if (matchScore >= 0.6) return "High";
  if (matchScore >= 0.4) return "Medium";
  return "Low";
}
