/**
 * Travel Time Estimation
 *
 * Deterministic straight-line approximation used by the scheduler. No routing
 * service is consulted: minutes grow monotonically with haversine distance.
 */

import type { TravelTimeConfig } from '../config/schema';
import type { GeoPoint } from '../engine/types';

const EARTH_RADIUS_KM = 6371;

export function haversineKm(a: GeoPoint, b: GeoPoint): number {
  const dLat = ((b.lat - a.lat) * Math.PI) / 180;
  const dLon = ((b.lon - a.lon) * Math.PI) / 180;
  const lat1 = (a.lat * Math.PI) / 180;
  const lat2 = (b.lat * Math.PI) / 180;
  const sinHalfLat = Math.sin(dLat / 2);
  const sinHalfLon = Math.sin(dLon / 2);
  const component = sinHalfLat * sinHalfLat + sinHalfLon * sinHalfLon * Math.cos(lat1) * Math.cos(lat2);
  const clamped = Math.min(1, Math.max(0, component));
  return EARTH_RADIUS_KM * 2 * Math.asin(Math.sqrt(clamped));
}

/**
 * Minutes to get from `from` to `to`.
 *
 * - same point: 0
 * - either side unknown: `unknownLocationMinutes`
 * - otherwise: ceil(overheadMinutes + km * minutesPerKm)
 */
export function estimateTravelMinutes(
  from: GeoPoint | undefined,
  to: GeoPoint | undefined,
  config: TravelTimeConfig
): number {
  if (!from || !to) return config.unknownLocationMinutes;
  const km = haversineKm(from, to);
  if (km === 0) return 0;
  return Math.ceil(config.overheadMinutes + km * config.minutesPerKm);
}
