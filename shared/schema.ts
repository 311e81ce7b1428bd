import { z } from "zod";

// Enumerated value sets
export const URGENCY_LEVELS = ["low", "medium", "high", "urgent"] as const;
export type Urgency = (typeof URGENCY_LEVELS)[number];

// Ordered to line up with Date#getUTCDay()
export const DAYS_OF_WEEK = ["sun", "mon", "tue", "wed", "thu", "fri", "sat"] as const;
export type DayOfWeek = (typeof DAYS_OF_WEEK)[number];

export const COMPONENT_KEYS = ["skill", "location", "budget", "availability", "quality"] as const;
export type ComponentKey = (typeof COMPONENT_KEYS)[number];

// Vocabulary used by older job postings
const LEGACY_URGENCY: Record<string, Urgency> = {
  asap: "urgent",
  week: "high",
  month: "medium",
  flexible: "low",
};

export const WEIGHT_SUM_TOLERANCE = 1e-6;

export const urgencySchema = z
  .string()
  .trim()
  .toLowerCase()
  .transform((value) => LEGACY_URGENCY[value] ?? value)
  .pipe(z.enum(URGENCY_LEVELS));

export const identifierSchema = z
  .union([z.string().trim().min(1, "Identifier must not be empty"), z.number().int()])
  .transform((value) => String(value));

// Location schema - [lat, lng] or { lat, lng }
export const locationInputSchema = z
  .union([
    z.tuple([z.number(), z.number()]),
    z.object({ lat: z.number(), lng: z.number() }),
  ])
  .transform((value) => (Array.isArray(value) ? { lat: value[0], lng: value[1] } : value))
  .refine((point) => isValidCoordinate(point.lat, point.lng), {
    message: "Latitude must be within [-90, 90] and longitude within [-180, 180]",
  });

export const timestampSchema = z
  .union([z.string().trim().min(1), z.number().nonnegative()])
  .refine((value) => !Number.isNaN(new Date(value).getTime()), {
    message: "Must be an ISO-8601 timestamp or epoch milliseconds",
  })
  .transform((value) => new Date(value));

// Job schema - one open service request
export const jobInputSchema = z
  .object({
    id: identifierSchema,
    title: z.string().trim().min(1, "Title is required"),
    description: z.string().default(""),
    category: z.string().trim().min(1, "Category is required"),
    budget_min: z.number().nonnegative("budget_min must not be negative"),
    budget_max: z.number().nonnegative("budget_max must not be negative"),
    location: locationInputSchema,
    urgency: urgencySchema,
    skills: z.array(z.string()).default([]),
    posted_at: timestampSchema.optional(),
  })
  .refine((job) => job.budget_min <= job.budget_max, {
    message: "budget_min must not exceed budget_max",
    path: ["budget_min"],
  });

// Provider schema - location and availability stay loose; bad values are penalised, not rejected
export const providerInputSchema = z.object({
  id: identifierSchema,
  name: z.string().default(""),
  category: z.string().default(""),
  skills: z.array(z.string()).optional(),
  location: z.unknown().optional(),
  rating: z.number().nonnegative().optional(), // 0 = no reviews yet
  completed_jobs: z.number().int().nonnegative().optional(),
  hourly_rate: z.number().nonnegative("hourly_rate must not be negative"),
  service_radius_km: z.number().positive("service_radius_km must be positive").optional(),
  availability: z.unknown().optional(), // day token -> boolean
  response_time_hours: z.number().nonnegative().optional(),
  quality_score: z.number().nonnegative().optional(), // independent composite, 0..1
});

export const weightsSchema = z
  .object({
    skill: z.number().nonnegative("Weights must not be negative"),
    location: z.number().nonnegative("Weights must not be negative"),
    budget: z.number().nonnegative("Weights must not be negative"),
    availability: z.number().nonnegative("Weights must not be negative"),
    quality: z.number().nonnegative("Weights must not be negative"),
  })
  .strict()
  .refine((weights) => Math.abs(weightTotal(weights) - 1) <= WEIGHT_SUM_TOLERANCE, {
    message: "Weights must sum to 1.0",
  });

export const matchRequestSchema = z.object({
  job: jobInputSchema,
  providers: z.array(providerInputSchema).default([]),
  top_k: z
    .number()
    .int("top_k must be a positive integer")
    .positive("top_k must be a positive integer")
    .optional(),
  weights: weightsSchema.optional(),
});

export type JobInput = z.input<typeof jobInputSchema>;
export type ProviderInput = z.input<typeof providerInputSchema>;
export type MatchRequest = z.input<typeof matchRequestSchema>;
export type ParsedMatchRequest = z.output<typeof matchRequestSchema>;
export type ParsedJob = z.output<typeof jobInputSchema>;
export type ParsedProvider = z.output<typeof providerInputSchema>;
export type ComponentWeights = z.output<typeof weightsSchema>;

export interface GeoPoint {
  lat: number;
  lng: number;
}

// Canonical job requirement - immutable once scoring begins
export interface JobRequirement {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly category: string; // lower-cased
  readonly budgetMin: number;
  readonly budgetMax: number;
  readonly location: GeoPoint;
  readonly urgency: Urgency;
  readonly requiredSkills: readonly string[]; // trimmed, lower-cased, de-duplicated
  readonly postedAt: Date;
}

// Canonical provider snapshot - never mutated by the engine
export interface Provider {
  readonly id: string;
  readonly name: string;
  readonly category: string;
  readonly skills: readonly string[];
  readonly location: GeoPoint | null; // null = geographically unscoreable
  readonly rating: number; // 0..5
  readonly completedJobs: number;
  readonly hourlyRate: number;
  readonly serviceRadiusKm: number;
  readonly availability: Readonly<Record<DayOfWeek, boolean>>;
  readonly responseTimeHours: number;
  readonly qualityScore: number; // 0..1
}

export interface ComponentScores {
  skillMatch: number;
  locationScore: number;
  budgetCompatibility: number;
  availabilityScore: number;
  qualityScore: number;
}

export interface MatchResult extends ComponentScores {
  providerId: string;
  matchScore: number;
  explanation: string;
}

export type ConfidenceLevel = "Very High" | "High" | "Medium" | "Low";

// External response - scores as percentages with one decimal place
export interface ProviderMatchView {
  provider_id: string;
  match_score: number;
  skill_match: number;
  location_score: number;
  budget_compatibility: number;
  availability_score: number;
  quality_score: number;
  confidence_level: ConfidenceLevel;
  explanation: string;
}

export interface MatchResponse {
  job_id: string;
  matches: ProviderMatchView[];
  matches_found: number;
}

export function isValidCoordinate(lat: number, lng: number): boolean {
  return (
    Number.isFinite(lat) &&
    Number.isFinite(lng) &&
    lat >= -90 &&
    lat <= 90 &&
    lng >= -180 &&
    lng <= 180
  );
}

export function weightTotal(weights: Record<ComponentKey, number>): number {
  return COMPONENT_KEYS.reduce((sum, key) => sum + weights[key], 0);
}
