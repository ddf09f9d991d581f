/**
 * =============================================================================
 * GEOCACHE MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * On-disk format: a JSON object mapping location key → [latitude, longitude]
 *
 *   { "Madhapur": [17.4483, 78.3915], "Kukatpally": [17.4948, 78.3996] }
 * =============================================================================
 */

import { z } from 'zod';

export const geoPointSchema = z.tuple([
  z.number().min(-90).max(90),
  z.number().min(-180).max(180)
]);

export const geocacheFileSchema = z.record(z.string().min(1), geoPointSchema);

export type GeocacheFile = z.infer<typeof geocacheFileSchema>;
