import { z } from "zod";
import type { Provider } from "@shared/schema";
import marketRates from "@shared/data/market-rates.json";

const rateBandSchema = z.object({
  min: z.number().nonnegative(),
  max: z.number().nonnegative(),
  avg: z.number().positive(),
});

const marketTableSchema = z.object({
  categories: z.record(rateBandSchema),
  defaultAverage: z.number().positive(),
});

export type MarketTable = z.infer<typeof marketTableSchema>;

const DEFAULT_MARKET: MarketTable = marketTableSchema.parse(marketRates);

// Experience premium is capped at +30%
const MAX_EXPERIENCE_PREMIUM = 0.3;

export interface RateSuggestion {
  currentRate: number;
  suggestedRate: number;
  marketAverage: number;
  difference: number;
  percentageChange: number;
  recommendation: string;
}

export type PricingInput = Pick<Provider, "category" | "rating" | "completedJobs" | "hourlyRate">;

export function pricingRecommendation(percentageChange: number): string {
  if (percentageChange > 15) return "Rate is well below market value, a substantial increase is justified";
  if (percentageChange > 5) return "A modest increase would bring the rate in line with the market";
  if (percentageChange > -5) return "Rate is in line with the market";
  if (percentageChange > -15) return "A slight reduction would make the rate more competitive";
  return "Rate is well above market value for this category";
}

/**
 * Market average for the provider's category, scaled by rating
 * (0.8x at 0 stars up to 1.2x at 5) and by completed jobs.
 */
export function suggestProviderRate(provider: PricingInput, market: MarketTable = DEFAULT_MARKET): RateSuggestion {
  const category = provider.category.trim().toLowerCase();
  const marketAverage = market.categories[category]?.avg ?? market.defaultAverage;

  const qualityMultiplier = 0.8 + (Math.min(provider.rating, 5) / 5) * 0.4;
  const experienceMultiplier = 1 + Math.min(provider.completedJobs / 100, MAX_EXPERIENCE_PREMIUM);
  const suggestedRate = marketAverage * qualityMultiplier * experienceMultiplier;

  const difference = suggestedRate - provider.hourlyRate;
  const percentageChange = provider.hourlyRate > 0 ? (difference / provider.hourlyRate) * 100 : 0;

  return {
    currentRate: provider.hourlyRate,
    suggestedRate: Math.round(suggestedRate * 100) / 100,
    marketAverage,
    difference: Math.round(difference * 100) / 100,
    percentageChange: Math.round(percentageChange * 10) / 10,
    recommendation: pricingRecommendation(percentageChange),
  };
}
