import type { GpxPoint } from './types';

export const EARTH_RADIUS_METERS = 6371000;

const toRadians = (deg: number) => deg * Math.PI / 180;

/**
 * Calculate 2D distance between two coordinate pairs using Haversine formula
 * Returns distance in meters
 */
export function haversineDistance(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  const φ1 = toRadians(lat1);
  const φ2 = toRadians(lat2);
  const Δφ = toRadians(lat2 - lat1);
  const Δλ = toRadians(lon2 - lon1);

  const a = Math.sin(Δφ / 2) ** 2 +
            Math.cos(φ1) * Math.cos(φ2) * Math.sin(Δλ / 2) ** 2;
  // Rounding can push a past 1 near antipodes
  const h = Math.min(1, Math.max(0, a));
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.sqrt(h));
}

/**
 * Calculate distance between two GpxPoints (2D, ignoring elevation)
 */
export function pointToPointDistance(p1: GpxPoint, p2: GpxPoint): number {
  return haversineDistance(p1.lat, p1.lon, p2.lat, p2.lon);
}

/**
 * Initial great-circle bearing from p1 towards p2, in degrees [0, 360)
 */
export function initialBearing(p1: GpxPoint, p2: GpxPoint): number {
  const φ1 = toRadians(p1.lat);
  const φ2 = toRadians(p2.lat);
  const Δλ = toRadians(p2.lon - p1.lon);

  const y = Math.sin(Δλ) * Math.cos(φ2);
  const x = Math.cos(φ1) * Math.sin(φ2) -
            Math.sin(φ1) * Math.cos(φ2) * Math.cos(Δλ);
  const θ = Math.atan2(y, x) * 180 / Math.PI;
  return (θ + 360) % 360;
}
