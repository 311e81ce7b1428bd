import { describe, it, expect } from "vitest";
import { pricingRecommendation, suggestProviderRate } from "../pricing-advisor";

describe("suggestProviderRate", () => {
  it("scales the category average by rating and experience", () => {
    const suggestion = suggestProviderRate({ category: "Electrical", rating: 4.5, completedJobs: 40, hourlyRate: 100 });

    expect(suggestion.marketAverage).toBe(85);
    expect(suggestion.suggestedRate).toBe(128.18);
    expect(suggestion.difference).toBe(28.18);
    expect(suggestion.percentageChange).toBe(28.2);
    expect(suggestion.recommendation).toBe(pricingRecommendation(28.2));
  });

  it("uses the default average for unknown categories", () => {
    const suggestion = suggestProviderRate({ category: "pet care", rating: 5, completedJobs: 0, hourlyRate: 60 });

    expect(suggestion.marketAverage).toBe(50);
    expect(suggestion.suggestedRate).toBe(60);
    expect(suggestion.percentageChange).toBe(0);
    expect(suggestion.recommendation).toBe("Rate is in line with the market");
  });

  it("caps the experience premium", () => {
    const veteran = suggestProviderRate({ category: "cleaning", rating: 5, completedJobs: 500, hourlyRate: 40 });
    // 40 * 1.2 * 1.3
    expect(veteran.suggestedRate).toBe(62.4);
  });

  it("reports no change for a zero rate", () => {
    expect(suggestProviderRate({ category: "tech", rating: 3, completedJobs: 10, hourlyRate: 0 }).percentageChange).toBe(0);
  });
});

describe("pricingRecommendation", () => {
  it("buckets the percentage change", () => {
    expect(pricingRecommendation(20)).toBe("Rate is well below market value, a substantial increase is justified");
    expect(pricingRecommendation(10)).toBe("A modest increase would bring the rate in line with the market");
    expect(pricingRecommendation(0)).toBe("Rate is in line with the market");
    expect(pricingRecommendation(-10)).toBe("A slight reduction would make the rate more competitive");
    expect(pricingRecommendation(-20)).toBe("Rate is well above market value for this category");
  });
});
