/**
 * =============================================================================
 * ROUTING MODULE
 * =============================================================================
 *
 * - planRoute(): greedy nearest-neighbour visiting order
 * - buildRouteStops() / renderRoute(): drawable stops handed to a renderer
 * - LeafletHtmlRenderer: standalone HTML map
 *
 * Pure functions over an injected Geocache; no I/O.
 * =============================================================================
 */

export * from './routing.service';
export * from './routing.schema';
export * from './leaflet-html.renderer';
