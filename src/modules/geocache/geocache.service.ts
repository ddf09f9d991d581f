/**
 * =============================================================================
 * GEOCACHE - Location key → coordinates lookup
 * =============================================================================
 *
 * Static lookup table backing every distance calculation.
 *
 * LIFECYCLE:
 * - Built once at startup from the first candidate file that parses
 * - Immutable afterwards; safe to share between concurrent requests
 * - Passed explicitly to the route planner and renderer (no module global),
 *   so tests can build a synthetic cache with fromEntries()
 *
 * FAILURE MODES:
 * - Missing / unreadable / invalid candidate → skipped, next one tried
 * - No usable candidate → empty cache; routing degrades to "no coordinates"
 * =============================================================================
 */

import * as fs from 'fs';
import { logger } from '../../shared/services/logger.service';
import { GeoPoint } from '../../shared/utils/geospatial.utils';
import { validateSchema } from '../../shared/utils/validation.utils';
import { geocacheFileSchema } from './geocache.schema';

export class Geocache {
  private readonly points: ReadonlyMap<string, GeoPoint>;

  private constructor(
    points: Map<string, GeoPoint>,
    /** File the cache was loaded from, null when built in memory or empty */
    public readonly source: string | null
  ) {
    this.points = points;
    Object.freeze(this);
  }

  // ===========================================================================
  // FACTORIES
  // ===========================================================================

  static empty(): Geocache {
    return new Geocache(new Map(), null);
  }

  /**
   * Build from an in-memory mapping.
   * Throws ValidationError when a value is not a valid [lat, lon] pair.
   */
  static fromEntries(entries: Record<string, readonly [number, number]>): Geocache {
    const parsed = validateSchema(geocacheFileSchema, entries);
    return new Geocache(toPointMap(parsed), null);
  }

  /**
   * Scan candidate files in order and load the first one that parses
   */
  static fromCandidates(candidates: readonly string[]): Geocache {
    for (const candidate of candidates) {
      if (!fs.existsSync(candidate)) {
        continue;
      }

      try {
        const raw: unknown = JSON.parse(fs.readFileSync(candidate, 'utf-8'));
        const result = geocacheFileSchema.safeParse(raw);
        if (!result.success) {
          logger.warn('Geocache candidate has invalid entries, skipping', {
            file: candidate,
            issues: result.error.errors.slice(0, 3).map(issue => `${issue.path.join('.')}: ${issue.message}`)
          });
          continue;
        }

        const cache = new Geocache(toPointMap(result.data), candidate);
        logger.info('Geocache loaded', { file: candidate, locations: cache.size });
        return cache;
      } catch (error) {
        logger.warn('Geocache candidate unreadable, skipping', {
          file: candidate,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    logger.warn('No geocache file found; all locations will be unroutable', { candidates });
    return Geocache.empty();
  }

  // ===========================================================================
  // LOOKUPS
  // ===========================================================================

  lookup(locationKey: string): GeoPoint | undefined {
    return this.points.get(locationKey);
  }

  get size(): number {
    return this.points.size;
  }
}

function toPointMap(entries: Record<string, [number, number]>): Map<string, GeoPoint> {
  const points = new Map<string, GeoPoint>();
  for (const [key, [lat, lng]] of Object.entries(entries)) {
    points.set(key, Object.freeze([lat, lng] as const));
  }
  return points;
}
