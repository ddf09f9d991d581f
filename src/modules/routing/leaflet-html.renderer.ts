/**
 * =============================================================================
 * LEAFLET HTML RENDERER
 * =============================================================================
 *
 * Renders a route as a standalone HTML page backed by Leaflet + OSM tiles.
 *
 * - origin: green circle, waypoints: blue, terminus: red
 * - red polyline through the stops in order
 * - small black marker at each leg midpoint, popup "<km> km"
 *
 * Stop data is embedded as JSON and drawn client-side, so location names are
 * never spliced into markup.
 * =============================================================================
 */

import { ROUTING } from '../../core/constants';
import { centroid } from '../../shared/utils/geospatial.utils';
import { RouteRenderOptions, RouteRenderer, RouteStop, StopRole } from './routing.schema';

const LEAFLET_VERSION = '1.9.4';
const LEAFLET_BASE = `https://unpkg.com/leaflet@${LEAFLET_VERSION}/dist`;

export const STOP_COLORS: Readonly<Record<StopRole, string>> = {
  origin: 'green',
  waypoint: 'blue',
  terminus: 'red'
};

interface MapPayload {
  center: readonly [number, number];
  zoom: number;
  stops: Array<{
    label: string;
    location: string;
    point: readonly [number, number];
    color: string;
  }>;
  segments: Array<{
    point: readonly [number, number];
    label: string;
  }>;
}

/**
 * HTML-escape text placed in element content or attributes
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * JSON safe to embed inside a <script> element
 */
export function toScriptJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

export function buildMapPayload(stops: readonly RouteStop[]): MapPayload {
  const segments: MapPayload['segments'] = [];
  for (const stop of stops) {
    if (stop.segmentMidpoint !== undefined && stop.segmentKm !== undefined) {
      segments.push({ point: stop.segmentMidpoint, label: `${stop.segmentKm} km` });
    }
  }

  return {
    center: centroid(stops.map(stop => stop.point)),
    zoom: ROUTING.MAP_ZOOM,
    stops: stops.map(stop => ({
      label: `Stop ${stop.index + 1}`,
      location: stop.location,
      point: stop.point,
      color: STOP_COLORS[stop.role]
    })),
    segments
  };
}

export class LeafletHtmlRenderer implements RouteRenderer {
  render(stops: readonly RouteStop[], options: RouteRenderOptions): string {
    const heading = options.title ?? 'Route';
    const title = escapeHtml(
      options.totalDistanceKm === undefined ? heading : `${heading} (${options.totalDistanceKm} km)`
    );
    const payload = toScriptJson(buildMapPayload(stops));

    return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${title}</title>
<link rel="stylesheet" href="${LEAFLET_BASE}/leaflet.css">
<script src="${LEAFLET_BASE}/leaflet.js"></script>
<style>html, body, #map { height: 100%; margin: 0; }</style>
</head>
<body>
<div id="map"></div>
<script>
var data = ${payload};
var map = L.map('map').setView(data.center, data.zoom);
L.tileLayer('https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png', {
  attribution: '&copy; OpenStreetMap contributors'
}).addTo(map);
data.stops.forEach(function (stop) {
  var popup = document.createElement('span');
  popup.textContent = stop.label + ': ' + stop.location;
  L.circleMarker(stop.point, { radius: 8, color: stop.color, fillColor: stop.color, fillOpacity: 0.9 })
    .bindPopup(popup)
    .bindTooltip(stop.label)
    .addTo(map);
});
L.polyline(data.stops.map(function (stop) { return stop.point; }), { color: 'red', weight: 3, opacity: 0.8 }).addTo(map);
data.segments.forEach(function (segment) {
  L.circleMarker(segment.point, { radius: 3, color: 'black', fillColor: 'black', fillOpacity: 1 })
    .bindPopup(segment.label)
    .addTo(map);
});
</script>
</body>
</html>
`;
  }
}
