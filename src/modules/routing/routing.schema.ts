/**
 * =============================================================================
 * ROUTING MODULE - TYPES
 * =============================================================================
 *
 * KEY CONCEPTS:
 * - RoutePlan: visiting order over an employee's locations + total length
 * - RouteStop: one resolved stop with the leg that leads into it
 *
 * EXAMPLE:
 * Locations: [Madhapur, Ameerpet, Kondapur], depot Madhapur
 *
 *   route:      [Madhapur, Kondapur, Ameerpet]
 *   distanceKm: 14.87
 *   dropped:    []
 * =============================================================================
 */

import { GeoPoint } from '../../shared/utils/geospatial.utils';

/**
 * Result of planning one employee's route
 */
export interface RoutePlan {
  /** Location keys in visiting order; first is the start */
  route: string[];
  /** Sum of leg distances, rounded to 2 decimals */
  distanceKm: number;
  /** Input keys with no geocache entry, in input order */
  dropped: string[];
}

export type StopRole = 'origin' | 'waypoint' | 'terminus';

/**
 * A stop ready for drawing
 */
export interface RouteStop {
  /** 0-based position in the route */
  index: number;
  location: string;
  point: GeoPoint;
  role: StopRole;
  /** Leg from the previous stop (absent on the first stop) */
  segmentKm?: number;
  segmentMidpoint?: GeoPoint;
}

/**
 * Presentation hints passed through to a renderer
 */
export interface RouteRenderOptions {
  title?: string;
  totalDistanceKm?: number;
}

/**
 * External visualization collaborator.
 * Receives a non-empty ordered stop list and returns an opaque artifact.
 */
export interface RouteRenderer {
  render(stops: readonly RouteStop[], options: RouteRenderOptions): string;
}
