import type { GeoPoint } from "@shared/schema";

export const EARTH_RADIUS_KM = 6371;

// Stepped proximity bands used by the banded strategy: [max km, score]
const DISTANCE_BANDS: ReadonlyArray<readonly [number, number]> = [
  [5, 1.0],
  [15, 0.8],
  [30, 0.6],
  [50, 0.4],
];
const BEYOND_BANDS_SCORE = 0.2;

function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Great-circle distance in kilometres (haversine).
 * The haversine term is clamped into [0, 1] so rounding near antipodal
 * or polar points cannot push asin() out of its domain.
 */
export function haversineDistanceKm(from: GeoPoint, to: GeoPoint): number {
  const φ1 = toRadians(from.lat);
  const φ2 = toRadians(to.lat);
  const Δφ = toRadians(to.lat - from.lat);
  const Δλ = toRadians(to.lng - from.lng);

  const h =
    Math.sin(Δφ / 2) ** 2 +
    Math.cos(φ1) * Math.cos(φ2) * Math.sin(Δλ / 2) ** 2;
  const clamped = Math.min(1, Math.max(0, h));

  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(clamped));
}

/**
 * Linear decay against the provider's service radius: 1 at the job site,
 * 0 once the distance reaches the radius. Unscoreable locations score 0.
 */
export function scoreLocation(
  jobLocation: GeoPoint,
  providerLocation: GeoPoint | null,
  serviceRadiusKm: number,
): number {
  if (!providerLocation || !(serviceRadiusKm > 0)) return 0;

  const distance = haversineDistanceKm(jobLocation, providerLocation);
  return Math.max(0, 1 - distance / serviceRadiusKm);
}

export function scoreLocationBanded(
  jobLocation: GeoPoint,
  providerLocation: GeoPoint | null,
  serviceRadiusKm: number,
): number {
  if (!providerLocation || !(serviceRadiusKm > 0)) return 0;

  const distance = haversineDistanceKm(jobLocation, providerLocation);
  if (distance >= serviceRadiusKm) return 0;

  for (const [maxKm, score] of DISTANCE_BANDS) {
    if (distance <= maxKm) return score;
  }
  return BEYOND_BANDS_SCORE;
}
