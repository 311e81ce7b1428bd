import { setImmediate as yieldToEventLoop } from "timers/promises";
import type {
  ComponentWeights,
  JobRequirement,
  MatchResponse,
  MatchResult,
  Provider,
  ProviderMatchView,
} from "@shared/schema";
import { resolveMatchingConfig, loadMatchingConfig, type MatchingConfig } from "../config";
import { MatchCancelledError } from "../errors";
import { aggregate, validateWeights } from "./matching/aggregator";
import { annotate, confidenceLevel, STRONG_THRESHOLD, WEAK_THRESHOLD } from "./matching/explainer";
import { normalizeMatchRequest, type NormalizedMatchRequest } from "./matching/normalizer";
import { assertTopK, rankMatches } from "./matching/ranker";
import { toPercentage } from "./matching/score-utils";
import { createSkillExpander, type SkillExpander } from "./matching/skill-matcher";
import { createScoringStrategy, type ScoringStrategy } from "./matching/strategy";

export const ALGORITHM_VERSION = "2.1.0";

export interface MatchOptions {
  /** Clock used when a job carries no posting timestamp. */
  now?: Date;
}

export interface AsyncMatchOptions extends MatchOptions {
  signal?: AbortSignal;
  chunkSize?: number;
}

export interface RankOptions {
  topK?: number;
  weights?: ComponentWeights;
}

export interface AlgorithmReport {
  version: string;
  strategy: string;
  weights: ComponentWeights;
  defaultTopK: number;
  thresholds: { strong: number; weak: number };
  skillExpansion: string;
  requireCategoryMatch: boolean;
}

const DEFAULT_CHUNK_SIZE = 250;

export function toMatchView(result: MatchResult): ProviderMatchView {
  return {
    provider_id: result.providerId,
    match_score: toPercentage(result.matchScore),
    skill_match: toPercentage(result.skillMatch),
    location_score: toPercentage(result.locationScore),
    budget_compatibility: toPercentage(result.budgetCompatibility),
    availability_score: toPercentage(result.availabilityScore),
    quality_score: toPercentage(result.qualityScore),
    confidence_level: confidenceLevel(result.matchScore),
    explanation: result.explanation,
  };
}

/**
 * Ranks candidate providers for one job. Stateless between calls: the only
 * shared data is the configuration, validated once in the constructor and
 * never mutated afterwards.
 */
export class ProviderMatcher {
  private readonly config: Readonly<MatchingConfig>;
  private readonly strategy: ScoringStrategy;
  private readonly skillExpander: SkillExpander;

  constructor(config: Partial<MatchingConfig> = {}) {
    this.config = Object.freeze(resolveMatchingConfig(config));
    this.strategy = createScoringStrategy(this.config.strategy);
    this.skillExpander = createSkillExpander(this.config.skillExpansion);
  }

  static fromEnv(env: NodeJS.ProcessEnv = process.env): ProviderMatcher {
    return new ProviderMatcher(loadMatchingConfig(env));
  }

  /**
   * Validate, score, rank and explain. Throws MatchValidationError before
   * any scoring when the request is malformed.
   */
  findMatches(request: unknown, options: MatchOptions = {}): MatchResponse {
    const prepared = this.prepare(request, options);
    const weights = prepared.weights ?? this.config.weights;
    const results = prepared.providers.map((provider) => this.score(prepared.job, provider, weights));
    return this.respond(prepared, results);
  }

  /**
   * Same result as findMatches, scored in chunks so a large batch does not
   * hold the event loop. Aborting the signal cancels the batch at the next
   * chunk boundary.
   */
  async findMatchesAsync(request: unknown, options: AsyncMatchOptions = {}): Promise<MatchResponse> {
    const prepared = this.prepare(request, options);
    const weights = prepared.weights ?? this.config.weights;
    const chunkSize = Math.max(1, Math.floor(options.chunkSize ?? DEFAULT_CHUNK_SIZE));
    const results: MatchResult[] = [];

    for (let start = 0; start < prepared.providers.length; start += chunkSize) {
      if (options.signal?.aborted) throw new MatchCancelledError(results.length);

      for (const provider of prepared.providers.slice(start, start + chunkSize)) {
        results.push(this.score(prepared.job, provider, weights));
      }

      if (start + chunkSize < prepared.providers.length) {
        await yieldToEventLoop();
      }
    }

    if (options.signal?.aborted) throw new MatchCancelledError(results.length);
    return this.respond(prepared, results);
  }

  /**
   * Typed entry point for callers that already hold canonical records.
   * Caller-supplied weights are validated before anything is scored.
   */
  rankProviders(job: JobRequirement, providers: readonly Provider[], options: RankOptions = {}): MatchResult[] {
    const weights = options.weights ? validateWeights(options.weights) : this.config.weights;
    const topK = options.topK ?? this.config.defaultTopK;
    assertTopK(topK);
    const candidates = this.eligible(job, providers);
    const results = candidates.map((provider) => this.score(job, provider, weights));
    return rankMatches(results, topK).map(annotate);
  }

  scoreProvider(job: JobRequirement, provider: Provider, weights?: ComponentWeights): MatchResult {
    return this.score(job, provider, weights ? validateWeights(weights) : this.config.weights);
  }

  private score(job: JobRequirement, provider: Provider, weights: ComponentWeights): MatchResult {
    if (this.config.verbose && !provider.location) {
      console.warn(`⚠️ Provider ${provider.id} has no usable location, location score forced to 0`);
    }
    const scores = this.strategy.score(job, provider, { skillExpander: this.skillExpander });
    return aggregate(provider.id, scores, weights);
  }

  describeAlgorithm(): AlgorithmReport {
    return {
      version: ALGORITHM_VERSION,
      strategy: this.strategy.name,
      weights: { ...this.config.weights },
      defaultTopK: this.config.defaultTopK,
      thresholds: { strong: STRONG_THRESHOLD, weak: WEAK_THRESHOLD },
      skillExpansion: this.skillExpander.name,
      requireCategoryMatch: this.config.requireCategoryMatch,
    };
  }

  private prepare(request: unknown, options: MatchOptions): NormalizedMatchRequest {
    const prepared = normalizeMatchRequest(request, {
      now: options.now,
      defaultServiceRadiusKm: this.config.defaultServiceRadiusKm,
      skillRequiredCategories: this.config.skillRequiredCategories,
    });
    const providers = this.eligible(prepared.job, prepared.providers);

    if (this.config.verbose) {
      console.log(
        `🎯 Matching job ${prepared.job.id} against ${providers.length} provider(s) using ${this.strategy.name} scoring`,
      );
    }
    return { ...prepared, providers };
  }

  private eligible(job: JobRequirement, providers: readonly Provider[]): Provider[] {
    if (!this.config.requireCategoryMatch) return [...providers];
    return providers.filter((provider) => provider.category === job.category);
  }

  private respond(prepared: NormalizedMatchRequest, results: MatchResult[]): MatchResponse {
    const ranked = rankMatches(results, prepared.topK ?? this.config.defaultTopK).map(annotate);

    if (this.config.verbose) {
      console.log(`✅ Job ${prepared.job.id}: ${ranked.length} of ${results.length} provider(s) returned`);
    }

    return {
      job_id: prepared.job.id,
      matches: ranked.map(toMatchView),
      matches_found: ranked.length,
    };
  }
}
