import { describe, it, expect } from "vitest";
import type { ComponentScores, ComponentWeights } from "@shared/schema";
import { WeightConfigurationError } from "../../../errors";
import { aggregate, aggregateScore, validateWeights, WEIGHT_PROFILE_NAMES, WEIGHT_PROFILES } from "../aggregator";

const perfect: ComponentScores = {
  skillMatch: 1,
  locationScore: 1,
  budgetCompatibility: 1,
  availabilityScore: 1,
  qualityScore: 1,
};

function weightError(weights: ComponentWeights): WeightConfigurationError {
  try {
    validateWeights(weights);
  } catch (error) {
    if (error instanceof WeightConfigurationError) return error;
    throw error;
  }
  throw new Error("expected a WeightConfigurationError");
}

describe("validateWeights", () => {
  it.each(WEIGHT_PROFILE_NAMES)("accepts the %s profile", (name) => {
    expect(validateWeights(WEIGHT_PROFILES[name])).toEqual(WEIGHT_PROFILES[name]);
  });

  it("rejects weights that do not sum to 1", () => {
    const error = weightError({ skill: 0.3, location: 0.15, budget: 0.15, availability: 0.15, quality: 0.15 });
    expect(error.fields).toEqual(["weights"]);
    expect(error.issues[0]?.message.startsWith("Weights must sum to 1.0, got ")).toBe(true);
  });

  it("rejects negative weights by field", () => {
    const error = weightError({ skill: -0.1, location: 0.3, budget: 0.3, availability: 0.3, quality: 0.2 });
    expect(error.fields).toEqual(["weights.skill"]);
  });

  it("rejects non-finite weights", () => {
    const error = weightError({ skill: Number.NaN, location: 0.25, budget: 0.25, availability: 0.25, quality: 0.25 });
    expect(error.fields).toEqual(["weights.skill"]);
  });

  it("tolerates floating point drift in the sum", () => {
    expect(() =>
      validateWeights({ skill: 0.1, location: 0.2, budget: 0.3, availability: 0.2, quality: 0.2 }),
    ).not.toThrow();
  });
});

describe("aggregateScore", () => {
  it("is 1 for perfect component scores", () => {
    expect(aggregateScore(perfect, WEIGHT_PROFILES.default)).toBeCloseTo(1, 9);
  });

  it("is the weighted sum of components", () => {
    const scores = { ...perfect, skillMatch: 0.5, availabilityScore: 0 };
    // 0.3*0.5 + 0.15 + 0.15 + 0.25*0 + 0.15
    expect(aggregateScore(scores, WEIGHT_PROFILES.default)).toBeCloseTo(0.6, 9);
  });

  it("follows a single dominant weight", () => {
    const skillOnly = { skill: 1, location: 0, budget: 0, availability: 0, quality: 0 };
    expect(aggregateScore({ ...perfect, skillMatch: 0.4 }, skillOnly)).toBe(0.4);
  });
});

describe("aggregate", () => {
  it("builds an unexplained result carrying every component", () => {
    const result = aggregate("p-1", perfect, WEIGHT_PROFILES.balanced);
    expect(result.providerId).toBe("p-1");
    expect(result.skillMatch).toBe(1);
    expect(result.explanation).toBe("");
    expect(result.matchScore).toBeCloseTo(1, 9);
  });
});
