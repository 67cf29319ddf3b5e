/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

import type { Clock } from '@/lib/clock.js';
import { systemClock } from '@/lib/clock.js';

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: { clock?: Clock } = {}): Hono {
  const clock = deps.clock ?? systemClock;
  const app = new Hono();

  /**
   * GET /health
   * Liveness only; does not touch the database
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: clock().toISOString(),
      version: 'v1',
    });
  });

  return app;
}
