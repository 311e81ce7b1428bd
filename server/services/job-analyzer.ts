import { z } from "zod";
import { URGENCY_LEVELS, type Urgency } from "@shared/schema";
import jobKeywords from "@shared/data/job-keywords.json";

export const COMPLEXITY_LEVELS = ["simple", "medium", "complex"] as const;
export type Complexity = (typeof COMPLEXITY_LEVELS)[number];

const keywordTableSchema = z.object({
  urgency: z.array(z.object({ level: z.enum(URGENCY_LEVELS), keywords: z.array(z.string()) })),
  complexity: z.array(z.object({ level: z.enum(COMPLEXITY_LEVELS), keywords: z.array(z.string()) })),
  skills: z.record(z.array(z.string())),
  baseRates: z.record(z.number().positive()),
  defaultRate: z.number().positive(),
  effort: z.object({
    simple: z.object({ hours: z.number().positive(), multiplier: z.number().positive() }),
    medium: z.object({ hours: z.number().positive(), multiplier: z.number().positive() }),
    complex: z.object({ hours: z.number().positive(), multiplier: z.number().positive() }),
  }),
});

export type KeywordTable = z.infer<typeof keywordTableSchema>;

const DEFAULT_TABLE: KeywordTable = keywordTableSchema.parse(jobKeywords);

// Applied to the estimate on both sides to form the budget range
const BUDGET_SPREAD = 0.3;

export interface JobAnalysis {
  urgency: Urgency;
  complexity: Complexity;
  skills: string[];
  estimatedHours: number;
  budgetEstimate: number;
  budgetRange: [number, number];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Keywords match at the start of a word, so "complete" also catches "completely"
function mentions(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => new RegExp(`\\b${escapeRegExp(keyword.toLowerCase())}`).test(text));
}

function roundCurrency(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Keyword-driven reading of a free-text job description. Tables are checked
 * in order and the first hit wins; nothing matched falls back to low urgency
 * and medium complexity.
 */
export function analyzeJobDescription(description: string, table: KeywordTable = DEFAULT_TABLE): JobAnalysis {
  const text = description.toLowerCase();

  const urgency = table.urgency.find((entry) => mentions(text, entry.keywords))?.level ?? "low";
  const complexity = table.complexity.find((entry) => mentions(text, entry.keywords))?.level ?? "medium";
  const skills = Object.entries(table.skills)
    .filter(([, patterns]) => mentions(text, patterns))
    .map(([skill]) => skill);

  const averageRate =
    skills.length > 0
      ? skills.reduce((sum, skill) => sum + (table.baseRates[skill] ?? table.defaultRate), 0) / skills.length
      : table.defaultRate;

  const { hours, multiplier } = table.effort[complexity];
  const budgetEstimate = roundCurrency(averageRate * hours * multiplier);

  return {
    urgency,
    complexity,
    skills,
    estimatedHours: hours,
    budgetEstimate,
    budgetRange: [
      roundCurrency(budgetEstimate * (1 - BUDGET_SPREAD)),
      roundCurrency(budgetEstimate * (1 + BUDGET_SPREAD)),
    ],
  };
}
