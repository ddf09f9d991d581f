/**
 * =============================================================================
 * HEALTH CHECK ROUTES
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /health      - Quick health check plus geocache size
 * - GET /health/live - Liveness check (is the process running?)
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { config } from '../../config/environment';
import { Geocache } from '../../modules/geocache/geocache.service';

export function createHealthRouter(geocache: Geocache): Router {
  const router = Router();

  // Track server start time
  const startTime = Date.now();

  /**
   * Basic health check
   * Reports degraded when no geocache was loaded (every route would be empty)
   */
  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: geocache.size > 0 ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: config.nodeEnv,
      geocache: {
        locations: geocache.size,
        source: geocache.source
      }
    });
  });

  /**
   * Liveness check - is the process alive?
   */
  router.get('/health/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      pid: process.pid,
      uptime: Math.floor((Date.now() - startTime) / 1000)
    });
  });

  return router;
}
