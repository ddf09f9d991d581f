/**
 * =============================================================================
 * LEAFLET HTML RENDERER - Unit Tests
 * =============================================================================
 */

import { Geocache } from '../modules/geocache/geocache.service';
import {
  LeafletHtmlRenderer,
  buildMapPayload,
  buildRouteStops,
  escapeHtml,
  toScriptJson
} from '../modules/routing';

const geocache = Geocache.fromEntries({
  A: [0, 0],
  B: [0, 1],
  C: [0, 3],
  '</script><b>': [0, 2]
});

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;'
    );
  });
});

describe('toScriptJson', () => {
  it('cannot close the surrounding script element', () => {
    expect(toScriptJson({ name: '</script>' })).toBe('{"name":"\\u003c/script>"}');
  });

  it('escapes line and paragraph separators', () => {
    expect(toScriptJson('a\u2028b\u2029c')).toBe('"a\\u2028b\\u2029c"');
  });
});

describe('buildMapPayload', () => {
  it('colours stops by role and labels each leg', () => {
    const payload = buildMapPayload(buildRouteStops(['A', 'B', 'C'], geocache));

    expect(payload.zoom).toBe(12);
    expect(payload.center[0]).toBe(0);
    expect(payload.center[1]).toBeCloseTo(4 / 3, 10);
    expect(payload.stops).toEqual([
      { label: 'Stop 1', location: 'A', point: [0, 0], color: 'green' },
      { label: 'Stop 2', location: 'B', point: [0, 1], color: 'blue' },
      { label: 'Stop 3', location: 'C', point: [0, 3], color: 'red' }
    ]);
    expect(payload.segments).toEqual([
      { point: [0, 0.5], label: '111.19 km' },
      { point: [0, 2], label: '222.39 km' }
    ]);
  });
});

describe('LeafletHtmlRenderer', () => {
  const renderer = new LeafletHtmlRenderer();

  it('renders a standalone page with an escaped title', () => {
    const html = renderer.render(buildRouteStops(['A', 'B'], geocache), {
      title: 'Route for <Ravi>',
      totalDistanceKm: 111.19
    });

    expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
    expect(html).toContain('<title>Route for &lt;Ravi&gt; (111.19 km)</title>');
    expect(html).toContain('https://unpkg.com/leaflet@1.9.4/dist/leaflet.js');
  });

  it('embeds location names without breaking out of the script', () => {
    const html = renderer.render(buildRouteStops(['A', '</script><b>'], geocache), {});

    expect(html).toContain('"location":"\\u003c/script>\\u003cb>"');
    expect(html).not.toContain('</script><b>');
  });
});
