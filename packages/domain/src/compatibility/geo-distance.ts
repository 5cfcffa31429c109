/**
 * Great-circle distance between two coordinates
 *
 * @module domain/compatibility/geo-distance
 */

export const EARTH_RADIUS_KM = 6371;

export interface GeoPoint {
  readonly latitude: number;
  readonly longitude: number;
}

type Coordinates = {
  latitude: number | null | undefined;
  longitude: number | null | undefined;
};

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/**
 * Build a point only when both coordinates are present
 */
export function toGeoPoint(
  latitude: number | null | undefined,
  longitude: number | null | undefined
): GeoPoint | null {
  if (latitude === null || latitude === undefined) return null;
  if (longitude === null || longitude === undefined) return null;
  return { latitude, longitude };
}

/**
 * Haversine distance in kilometers
 */
export function haversineDistanceKm(from: GeoPoint, to: GeoPoint): number {
  const dLat = toRadians(to.latitude - from.latitude);
  const dLon = toRadians(to.longitude - from.longitude);

  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(from.latitude)) * Math.cos(toRadians(to.latitude)) * Math.sin(dLon / 2) ** 2;
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_KM * c;
}

/**
 * Distance between two parties, or null when any coordinate is missing.
 * Callers apply their own fallback.
 */
export function distanceBetweenKm(
  from: Partial<Coordinates>,
  to: Partial<Coordinates>
): number | null {
  const a = toGeoPoint(from.latitude, from.longitude);
  const b = toGeoPoint(to.latitude, to.longitude);
  return a && b ? haversineDistanceKm(a, b) : null;
}
