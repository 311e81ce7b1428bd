import {
  DAYS_OF_WEEK,
  jobInputSchema,
  locationInputSchema,
  matchRequestSchema,
  providerInputSchema,
  type ComponentWeights,
  type DayOfWeek,
  type GeoPoint,
  type JobRequirement,
  type ParsedJob,
  type ParsedProvider,
  type Provider,
} from "@shared/schema";
import { fromZodError, MatchValidationError } from "../../errors";

export interface NormalizerOptions {
  now?: Date;
  defaultServiceRadiusKm: number;
  skillRequiredCategories: readonly string[];
}

export interface NormalizedMatchRequest {
  job: JobRequirement;
  providers: Provider[];
  topK?: number;
  weights?: ComponentWeights;
}

const DEFAULT_RESPONSE_TIME_HOURS = 24;
const DEFAULT_QUALITY_SCORE = 0.5;
const MAX_RATING = 5;

const FULL_DAY_NAMES: Record<DayOfWeek, string> = {
  sun: "sunday",
  mon: "monday",
  tue: "tuesday",
  wed: "wednesday",
  thu: "thursday",
  fri: "friday",
  sat: "saturday",
};

export function normalizeSkill(skill: string): string {
  return skill.trim().toLowerCase().replace(/\s+/g, " ");
}

/**
 * Trim, lower-case and de-duplicate skill tags, keeping first-seen order.
 */
export function normalizeSkills(skills: readonly string[] | undefined): string[] {
  if (!skills) return [];
  const seen = new Set<string>();
  for (const skill of skills) {
    const normalized = normalizeSkill(skill);
    if (normalized) seen.add(normalized);
  }
  return Array.from(seen);
}

export function parseDayToken(token: string): DayOfWeek | null {
  const value = token.trim().toLowerCase();
  for (const day of DAYS_OF_WEEK) {
    if (value === day || value === FULL_DAY_NAMES[day]) return day;
  }
  return null;
}

/**
 * Availability fails closed: anything missing or unreadable counts as unavailable.
 */
export function normalizeAvailability(raw: unknown): Record<DayOfWeek, boolean> {
  const availability: Record<DayOfWeek, boolean> = {
    sun: false,
    mon: false,
    tue: false,
    wed: false,
    thu: false,
    fri: false,
    sat: false,
  };

  if (!isPlainRecord(raw)) return availability;

  for (const [key, value] of Object.entries(raw)) {
    const day = parseDayToken(key);
    if (day && value === true) availability[day] = true;
  }
  return availability;
}

export function normalizeLocation(raw: unknown): GeoPoint | null {
  const parsed = locationInputSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function toJobRequirement(job: ParsedJob, options: NormalizerOptions): JobRequirement {
  const category = job.category.trim().toLowerCase();
  const requiredSkills = normalizeSkills(job.skills);

  const demandsSkills = options.skillRequiredCategories.some(
    (entry) => entry.trim().toLowerCase() === category,
  );
  if (demandsSkills && requiredSkills.length === 0) {
    throw new MatchValidationError([
      {
        field: "job.skills",
        message: `Category "${category}" requires at least one skill tag`,
      },
    ]);
  }

  return {
    id: job.id,
    title: job.title,
    description: job.description,
    category,
    budgetMin: job.budget_min,
    budgetMax: job.budget_max,
    location: job.location,
    urgency: job.urgency,
    requiredSkills,
    postedAt: job.posted_at ?? options.now ?? new Date(),
  };
}

export function toProvider(provider: ParsedProvider, options: NormalizerOptions): Provider {
  return {
    id: provider.id,
    name: provider.name.trim(),
    category: provider.category.trim().toLowerCase(),
    skills: normalizeSkills(provider.skills),
    location: normalizeLocation(provider.location),
    rating: Math.min(provider.rating ?? 0, MAX_RATING),
    completedJobs: provider.completed_jobs ?? 0,
    hourlyRate: provider.hourly_rate,
    serviceRadiusKm: provider.service_radius_km ?? options.defaultServiceRadiusKm,
    availability: normalizeAvailability(provider.availability),
    responseTimeHours: provider.response_time_hours ?? DEFAULT_RESPONSE_TIME_HOURS,
    qualityScore: Math.min(provider.quality_score ?? DEFAULT_QUALITY_SCORE, 1),
  };
}

export function normalizeJob(raw: unknown, options: NormalizerOptions): JobRequirement {
  const parsed = jobInputSchema.safeParse(raw);
  if (!parsed.success) throw fromZodError(parsed.error, "job");
  return toJobRequirement(parsed.data, options);
}

export function normalizeProvider(raw: unknown, options: NormalizerOptions): Provider {
  const parsed = providerInputSchema.safeParse(raw);
  if (!parsed.success) throw fromZodError(parsed.error, "provider");
  return toProvider(parsed.data, options);
}

/**
 * Validate a whole match request up front. Any structural problem rejects the
 * request before a single provider is scored.
 */
export function normalizeMatchRequest(raw: unknown, options: NormalizerOptions): NormalizedMatchRequest {
  const parsed = matchRequestSchema.safeParse(raw);
  if (!parsed.success) throw fromZodError(parsed.error);

  const { job, providers, top_k, weights } = parsed.data;
  return {
    job: toJobRequirement(job, options),
    providers: providers.map((provider) => toProvider(provider, options)),
    topK: top_k,
    weights,
  };
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
