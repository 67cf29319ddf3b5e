/**
 * Application Entry Point
 *
 * Loads configuration, wires services, seeds the plan catalog and starts the
 * Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import { loadConfig } from './lib/config.js';
import { createChildLogger, createLogger } from './lib/logger.js';
import {
  createSupabaseAdmin,
  createSupabaseAuthClient,
} from './lib/supabase.js';
import {
  createAuditService,
  createAuditServiceDb,
  createHistoryService,
  createHistoryServiceDb,
  createPlanService,
  createPlanServiceDb,
  createSubscriptionService,
  createSubscriptionServiceDb,
  createUserService,
  createUserServiceDb,
  createUserServiceIdentity,
} from './services/index.js';
import { SYSTEM_ACTOR } from './types/index.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  // Supabase clients
  const supabase = createSupabaseAdmin(config);
  const supabaseAuth = createSupabaseAuthClient(config);

  // Wire all services
  const auditService = createAuditService({ db: createAuditServiceDb(supabase) });

  const planService = createPlanService({
    db: createPlanServiceDb(supabase),
    auditService,
    logger: createChildLogger(logger, { service: 'plans' }),
  });

  const subscriptionService = createSubscriptionService({
    db: createSubscriptionServiceDb(supabase),
    auditService,
    logger: createChildLogger(logger, { service: 'subscriptions' }),
  });

  const historyService = createHistoryService({
    db: createHistoryServiceDb(supabase),
    logger: createChildLogger(logger, { service: 'history' }),
  });

  const userService = createUserService({
    db: createUserServiceDb(supabase),
    identity: createUserServiceIdentity({ admin: supabase, auth: supabaseAuth }),
    auditService,
    logger: createChildLogger(logger, { service: 'users' }),
  });

  // Bootstrap data
  const seeded = await planService.seedDefaultPlans(SYSTEM_ACTOR);
  if (!seeded.success) {
    throw new Error(`Plan seeding failed: ${seeded.error.message}`);
  }

  if (config.admin.password !== undefined) {
    const admin = await userService.ensureAdminUser(SYSTEM_ACTOR, {
      username: config.admin.username,
      email: config.admin.email,
      password: config.admin.password,
    });
    if (!admin.success) {
      logger.warn('Admin bootstrap skipped', { error: admin.error });
    }
  } else {
    logger.info('ADMIN_PASSWORD not set; admin bootstrap skipped');
  }

  // Create the API application
  const app = createApp({
    supabaseClient: supabase,
    services: { planService, subscriptionService, historyService, userService },
    allowedOrigins: config.allowedOrigins,
    logger,
  });

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info('Server started', {
      port: info.port,
      environment: config.nodeEnv,
    });
  });
}

main().catch((err: unknown) => {
  createLogger().error('Startup failed', err);
  process.exit(1);
});
