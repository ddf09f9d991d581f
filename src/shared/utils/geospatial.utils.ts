/**
 * =============================================================================
 * GEOSPATIAL UTILITIES - Haversine Distance Calculations
 * =============================================================================
 *
 * Pure functions, O(1), no I/O.
 * Single source of truth for distances used by the route planner and the
 * map renderer.
 *
 * =============================================================================
 */

/**
 * (latitude, longitude) in degrees
 */
export type GeoPoint = readonly [latitude: number, longitude: number];

/**
 * Mean Earth radius
 */
export const EARTH_RADIUS_KM = 6371.0;

/**
 * Great-circle distance between two points using the Haversine formula
 *
 * Symmetric, and zero only for identical points.
 *
 * @returns Distance in kilometers
 */
export function distanceKm(a: GeoPoint, b: GeoPoint): number {
  const [lat1, lng1] = a;
  const [lat2, lng2] = b;

  const dLat = toRadians(lat2 - lat1);
  const dLng = toRadians(lng2 - lng1);

  // rounding can push h past 1 for antipodal points
  const h = Math.min(
    1,
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
      Math.cos(toRadians(lat1)) *
        Math.cos(toRadians(lat2)) *
        Math.sin(dLng / 2) *
        Math.sin(dLng / 2)
  );

  const c = 2 * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));

  return EARTH_RADIUS_KM * c;
}

/**
 * Midpoint of the straight segment between two points (plain average of the
 * coordinates, good enough for placing a label on a city-scale map)
 */
export function midpoint(a: GeoPoint, b: GeoPoint): GeoPoint {
  return [(a[0] + b[0]) / 2, (a[1] + b[1]) / 2];
}

/**
 * Mean of a non-empty list of points
 */
export function centroid(points: readonly GeoPoint[]): GeoPoint {
  let latSum = 0;
  let lngSum = 0;
  for (const [lat, lng] of points) {
    latSum += lat;
    lngSum += lng;
  }
  return [latSum / points.length, lngSum / points.length];
}

/**
 * Round to a fixed number of decimals (distances are reported to 2)
 */
export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * Convert degrees to radians
 */
function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}
