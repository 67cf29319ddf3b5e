/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as requestLogger } from 'hono/logger';

import type { Clock } from '@/lib/clock.js';
import type { Logger } from '@/lib/logger.js';
import { createLogger } from '@/lib/logger.js';
import type { ActorContext } from '@/types/index.js';

import { createAdminMiddleware } from './middleware/admin.js';
import type { TokenVerifier } from './middleware/auth.js';
import {
  createAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
import { createAuthRoutes } from './routes/auth.js';
import { createHealthRoutes } from './routes/health.js';
import { createSubscriptionRoutes } from './routes/subscription.js';
import type { ApiServices } from './types.js';

/**
 * App configuration
 */
interface AppConfig {
  supabaseClient: TokenVerifier;
  services: ApiServices;
  allowedOrigins?: string[];
  logger?: Logger;
  clock?: Clock;
}

/**
 * Paths under /api/v1/subscriptions that need a signed-in user
 */
const USER_SUBSCRIPTION_PATHS = [
  'subscribe',
  'active',
  'history',
  'cancel',
  'upgrade',
] as const;

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { supabaseClient, services, allowedOrigins } = config;
  const logger = config.logger ?? createLogger();
  const app = new Hono();

  // Global middleware
  app.use(
    '*',
    requestLogger((message) => {
      logger.info(message);
    })
  );
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  const publicMiddleware = createPublicMiddleware();
  const authMiddleware = createAuthMiddleware({ supabaseClient, logger });
  const adminMiddleware = createAdminMiddleware();

  // Public routes (no auth)
  app.use('/api/v1/health', publicMiddleware);
  app.route('/api/v1', createHealthRoutes({ clock: config.clock }));

  app.use('/api/v1/auth/*', publicMiddleware);
  app.route(
    '/api/v1',
    createAuthRoutes({ userService: services.userService })
  );

  // Subscription routes: catalog reads are public, plan creation is admin-only
  app.on('GET', '/api/v1/subscriptions/plans', publicMiddleware);
  app.on('POST', '/api/v1/subscriptions/plans', authMiddleware, adminMiddleware);
  for (const path of USER_SUBSCRIPTION_PATHS) {
    app.use(`/api/v1/subscriptions/${path}`, authMiddleware);
  }
  app.route(
    '/api/v1',
    createSubscriptionRoutes({
      planService: services.planService,
      subscriptionService: services.subscriptionService,
      historyService: services.historyService,
    })
  );

  // 404 handler
  app.notFound((c) => {
    const actor: ActorContext | undefined = c.get('actor');
    const requestId = actor?.requestId ?? 'unknown';

    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId,
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    const actor: ActorContext | undefined = c.get('actor');
    const requestId = actor?.requestId ?? 'unknown';
    logger.error('Unhandled error', err, {
      requestId,
      method: c.req.method,
      path: c.req.path,
    });

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
