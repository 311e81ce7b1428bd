import { InvalidArgumentError } from "../../errors";

export const DEFAULT_TOP_K = 5;

export interface Rankable {
  providerId: string;
  matchScore: number;
  qualityScore: number;
}

const NUMERIC_ID = /^\d+$/;

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Lower identifier first, as a total order: all-digit ids sort before every
 * other id and among themselves by length, then code unit ("9" before "10");
 * everything else by code unit so the order never depends on locale.
 */
export function compareProviderIds(a: string, b: string): number {
  const aNumeric = NUMERIC_ID.test(a);
  const bNumeric = NUMERIC_ID.test(b);

  if (aNumeric !== bNumeric) return aNumeric ? -1 : 1;
  if (aNumeric && a.length !== b.length) return a.length - b.length;
  return compareCodeUnits(a, b);
}

export function compareMatches(a: Rankable, b: Rankable): number {
  if (a.matchScore !== b.matchScore) return b.matchScore - a.matchScore;
  if (a.qualityScore !== b.qualityScore) return b.qualityScore - a.qualityScore;
  return compareProviderIds(a.providerId, b.providerId);
}

export function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new InvalidArgumentError("top_k", `top_k must be a positive integer, got ${topK}`);
  }
}

/**
 * Sorts a copy of the results and truncates it to topK. The input array is
 * left untouched; asking for more than exist returns them all.
 */
export function rankMatches<T extends Rankable>(results: readonly T[], topK: number = DEFAULT_TOP_K): T[] {
  assertTopK(topK);
  return [...results].sort(compareMatches).slice(0, topK);
}
