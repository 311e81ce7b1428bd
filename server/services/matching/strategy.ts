import type { ComponentScores, JobRequirement, Provider } from "@shared/schema";
import { scoreAvailability } from "./availability-scorer";
import { scoreBudget, scoreBudgetBanded } from "./budget-scorer";
import { scoreLocation, scoreLocationBanded } from "./geo-scorer";
import { scoreQuality } from "./quality-scorer";
import { exactSkillExpander, scoreSkillMatch, type SkillExpander } from "./skill-matcher";

export const SCORING_STRATEGIES = ["heuristic", "banded"] as const;
export type ScoringStrategyName = (typeof SCORING_STRATEGIES)[number];

export interface ScoringContext {
  skillExpander: SkillExpander;
}

/**
 * Produces the five component scores for one job/provider pair.
 * Implementations must be pure: no shared mutable state between calls.
 */
export interface ScoringStrategy {
  readonly name: ScoringStrategyName;
  score(job: JobRequirement, provider: Provider, context?: ScoringContext): ComponentScores;
}

export class HeuristicScoringStrategy implements ScoringStrategy {
  readonly name = "heuristic";

  score(job: JobRequirement, provider: Provider, context?: ScoringContext): ComponentScores {
    return {
      skillMatch: scoreSkillMatch(
        job.requiredSkills,
        provider.skills,
        context?.skillExpander ?? exactSkillExpander,
      ),
      locationScore: scoreLocation(job.location, provider.location, provider.serviceRadiusKm),
      budgetCompatibility: scoreBudget(job.budgetMin, job.budgetMax, provider.hourlyRate),
      availabilityScore: scoreAvailability(provider.availability, job.urgency, job.postedAt),
      qualityScore: scoreQuality(provider),
    };
  }
}

/**
 * Stepped distance and over-budget bands; skill, availability and quality
 * are scored exactly as in the heuristic strategy.
 */
export class BandedScoringStrategy implements ScoringStrategy {
  readonly name = "banded";
  private readonly base = new HeuristicScoringStrategy();

  score(job: JobRequirement, provider: Provider, context?: ScoringContext): ComponentScores {
    return {
      ...this.base.score(job, provider, context),
      locationScore: scoreLocationBanded(job.location, provider.location, provider.serviceRadiusKm),
      budgetCompatibility: scoreBudgetBanded(job.budgetMin, job.budgetMax, provider.hourlyRate),
    };
  }
}

export function createScoringStrategy(name: ScoringStrategyName): ScoringStrategy {
  switch (name) {
    case "heuristic":
      return new HeuristicScoringStrategy();
    case "banded":
      return new BandedScoringStrategy();
  }
}
