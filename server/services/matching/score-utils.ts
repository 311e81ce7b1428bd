export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

// 0..1 -> 0..100 with one decimal place
export function toPercentage(score: number): number {
  return Math.round(clamp01(score) * 1000) / 10;
}
