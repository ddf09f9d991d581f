/**
 * =============================================================================
 * ROUTING SERVICE - Greedy nearest-neighbour route planning
 * =============================================================================
 *
 * Builds a visiting order over a set of location keys:
 *
 *   1. Resolve keys through the geocache (unknown keys → `dropped`)
 *   2. Start at the depot when it is one of the resolved keys, otherwise at
 *      the first resolved key in caller order
 *   3. Repeatedly move to the strictly nearest unvisited key
 *
 * Not a TSP solver: the result is a valid path over every resolved key,
 * not the shortest one. O(n²) distance evaluations.
 *
 * DETERMINISM:
 * Candidates are scanned in caller order from a plain array, so ties go to
 * the key the caller listed first and identical inputs give identical
 * routes.
 * =============================================================================
 */

import { GeoPoint, distanceKm, midpoint, roundTo } from '../../shared/utils/geospatial.utils';
import { ROUTING } from '../../core/constants';
import { Geocache } from '../geocache/geocache.service';
import { RoutePlan, RouteRenderOptions, RouteRenderer, RouteStop } from './routing.schema';

interface RouteNode {
  key: string;
  point: GeoPoint;
}

/**
 * Resolve keys in caller order. Repeated keys are kept once.
 */
function resolveNodes(
  locations: readonly string[],
  geocache: Geocache
): { nodes: RouteNode[]; dropped: string[] } {
  const seen = new Set<string>();
  const nodes: RouteNode[] = [];
  const dropped: string[] = [];

  for (const key of locations) {
    if (seen.has(key)) continue;
    seen.add(key);

    const point = geocache.lookup(key);
    if (point) {
      nodes.push({ key, point });
    } else {
      dropped.push(key);
    }
  }

  return { nodes, dropped };
}

/**
 * Plan a route over `locations` starting from `depot` when possible
 */
export function planRoute(
  locations: readonly string[],
  geocache: Geocache,
  depot?: string
): RoutePlan {
  const { nodes, dropped } = resolveNodes(locations, geocache);
  if (nodes.length === 0) {
    return { route: [], distanceKm: 0, dropped };
  }

  const depotIndex = depot === undefined ? -1 : nodes.findIndex(node => node.key === depot);
  const startIndex = depotIndex >= 0 ? depotIndex : 0;

  const visited = new Array<boolean>(nodes.length).fill(false);
  visited[startIndex] = true;

  let current = nodes[startIndex];
  const route = [current.key];
  let total = 0;

  for (let step = 1; step < nodes.length; step++) {
    // first unvisited key is the fallback when no distance is finite
    let nearest = visited.indexOf(false);
    let nearestDistance = Infinity;

    for (let i = 0; i < nodes.length; i++) {
      if (visited[i]) continue;
      const raw = distanceKm(current.point, nodes[i].point);
      const d = Number.isFinite(raw) ? raw : Infinity;
      // strict comparison: first minimum in caller order wins
      if (d < nearestDistance) {
        nearestDistance = d;
        nearest = i;
      }
    }

    visited[nearest] = true;
    current = nodes[nearest];
    route.push(current.key);
    if (Number.isFinite(nearestDistance)) {
      total += nearestDistance;
    }
  }

  return {
    route,
    distanceKm: roundTo(total, ROUTING.DISTANCE_DECIMALS),
    dropped
  };
}

/**
 * Turn an ordered route into drawable stops (origin / waypoints / terminus)
 * with per-leg distances. Keys missing from the geocache are skipped.
 */
export function buildRouteStops(route: readonly string[], geocache: Geocache): RouteStop[] {
  const resolved = resolveNodes(route, geocache).nodes;
  const last = resolved.length - 1;

  return resolved.map((node, index): RouteStop => {
    const stop: RouteStop = {
      index,
      location: node.key,
      point: node.point,
      role: index === 0 ? 'origin' : index === last ? 'terminus' : 'waypoint'
    };

    if (index > 0) {
      const previous = resolved[index - 1].point;
      stop.segmentKm = roundTo(distanceKm(previous, node.point), ROUTING.DISTANCE_DECIMALS);
      stop.segmentMidpoint = midpoint(previous, node.point);
    }

    return stop;
  });
}

/**
 * Hand stops to the renderer. Returns null when there is nothing to draw,
 * which callers must report as a failure rather than an empty success.
 */
export function renderRoute(
  stops: readonly RouteStop[],
  renderer: RouteRenderer,
  options: RouteRenderOptions = {}
): string | null {
  if (stops.length === 0) {
    return null;
  }
  return renderer.render(stops, options);
}
