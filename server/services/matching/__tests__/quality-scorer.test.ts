import { describe, it, expect } from "vitest";
import {
  NEUTRAL_SUB_SCORE,
  ratingSubScore,
  responsivenessSubScore,
  scoreQuality,
  volumeSubScore,
} from "../quality-scorer";

describe("quality sub-scores", () => {
  it("scales ratings out of five", () => {
    expect(ratingSubScore(4.5)).toBe(0.9);
    expect(ratingSubScore(5)).toBe(1);
  });

  it("scores an unrated provider's rating as 0", () => {
    expect(ratingSubScore(0)).toBe(0);
  });

  it("gives providers without completed jobs a neutral volume sub-score", () => {
    expect(volumeSubScore(0)).toBe(NEUTRAL_SUB_SCORE);
  });

  it("saturates job volume at fifty jobs", () => {
    expect(volumeSubScore(25)).toBe(0.5);
    expect(volumeSubScore(50)).toBe(1);
    expect(volumeSubScore(400)).toBe(1);
  });

  it("rewards faster responses", () => {
    expect(responsivenessSubScore(0)).toBe(1);
    expect(responsivenessSubScore(3)).toBe(0.25);
  });
});

describe("scoreQuality", () => {
  it("blends rating, volume and responsiveness", () => {
    expect(scoreQuality({ rating: 4.5, completedJobs: 25, responseTimeHours: 2 })).toBeCloseTo(0.45 + 0.15 + 0.2 / 3, 9);
  });

  it("tops out at 1", () => {
    expect(scoreQuality({ rating: 5, completedJobs: 80, responseTimeHours: 0 })).toBeCloseTo(1, 9);
  });

  it("ranks a brand-new provider above a poorly reviewed one", () => {
    const newcomer = scoreQuality({ rating: 0, completedJobs: 0, responseTimeHours: 24 });
    const poorlyReviewed = scoreQuality({ rating: 1, completedJobs: 1, responseTimeHours: 24 });

    expect(newcomer).toBeCloseTo(0.158, 9);
    expect(newcomer).toBeGreaterThan(poorlyReviewed);
  });
});
