export * from "@shared/schema";
export * from "./errors";
export * from "./config";
export {
  ALGORITHM_VERSION,
  ProviderMatcher,
  toMatchView,
  type AlgorithmReport,
  type AsyncMatchOptions,
  type MatchOptions,
  type RankOptions,
} from "./services/matcher-service";
export { analyzeJobDescription, COMPLEXITY_LEVELS, type Complexity, type JobAnalysis } from "./services/job-analyzer";
export {
  pricingRecommendation,
  suggestProviderRate,
  type PricingInput,
  type RateSuggestion,
} from "./services/pricing-advisor";
export { WEIGHT_PROFILES, WEIGHT_PROFILE_NAMES, type WeightProfileName } from "./services/matching/aggregator";
export { explainScores, confidenceLevel } from "./services/matching/explainer";
export { haversineDistanceKm } from "./services/matching/geo-scorer";
export { createScoringStrategy, type ScoringStrategy, type ScoringStrategyName } from "./services/matching/strategy";
export { createSkillExpander, type SkillExpander, type SkillExpansionMode } from "./services/matching/skill-matcher";
