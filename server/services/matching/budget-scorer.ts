import { clamp01 } from "./score-utils";

/**
 * Compatibility between a budget range and an hourly rate.
 *
 * Inside the range scores 1. Below it the score falls linearly to 0 at half
 * of budgetMin; above it the score falls linearly to 0 at twice budgetMax.
 * Both edges are continuous with the in-range plateau.
 */
export function scoreBudget(budgetMin: number, budgetMax: number, hourlyRate: number): number {
  if (hourlyRate >= budgetMin && hourlyRate <= budgetMax) return 1;

  if (hourlyRate < budgetMin) {
    return scoreUnderBudget(budgetMin, hourlyRate);
  }

  if (budgetMax <= 0) return 0;
  return clamp01((2 * budgetMax - hourlyRate) / budgetMax);
}

/**
 * Stepped over-budget penalty: within 20% over keeps 0.7, within 50% over
 * keeps 0.4, anything further 0.1. Under budget decays as in scoreBudget.
 */
export function scoreBudgetBanded(budgetMin: number, budgetMax: number, hourlyRate: number): number {
  if (hourlyRate >= budgetMin && hourlyRate <= budgetMax) return 1;
  if (hourlyRate < budgetMin) return scoreUnderBudget(budgetMin, hourlyRate);

  if (budgetMax <= 0) return 0.1;
  const overage = (hourlyRate - budgetMax) / budgetMax;
  if (overage <= 0.2) return 0.7;
  if (overage <= 0.5) return 0.4;
  return 0.1;
}

function scoreUnderBudget(budgetMin: number, hourlyRate: number): number {
  const floor = budgetMin / 2;
  return clamp01((hourlyRate - floor) / (budgetMin - floor));
}
