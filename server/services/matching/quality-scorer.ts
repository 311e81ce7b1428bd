import type { Provider } from "@shared/schema";
import { clamp01 } from "./score-utils";

export const QUALITY_SUB_WEIGHTS = {
  rating: 0.5,
  volume: 0.3,
  responsiveness: 0.2,
} as const;

// Volume sub-score for providers with no completed jobs yet
export const NEUTRAL_SUB_SCORE = 0.5;
export const VOLUME_SATURATION_JOBS = 50;

// Unrated providers (0) score 0 here
export function ratingSubScore(rating: number): number {
  return clamp01(rating / 5);
}

export function volumeSubScore(completedJobs: number): number {
  if (completedJobs <= 0) return NEUTRAL_SUB_SCORE;
  return Math.min(1, completedJobs / VOLUME_SATURATION_JOBS);
}

export function responsivenessSubScore(responseTimeHours: number): number {
  return 1 / (1 + Math.max(0, responseTimeHours));
}

export function scoreQuality(
  provider: Pick<Provider, "rating" | "completedJobs" | "responseTimeHours">,
): number {
  return clamp01(
    QUALITY_SUB_WEIGHTS.rating * ratingSubScore(provider.rating) +
      QUALITY_SUB_WEIGHTS.volume * volumeSubScore(provider.completedJobs) +
      QUALITY_SUB_WEIGHTS.responsiveness * responsivenessSubScore(provider.responseTimeHours),
  );
}
