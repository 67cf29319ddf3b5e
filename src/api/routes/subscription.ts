/**
 * Subscription Routes
 * Plan catalog, subscription lifecycle and history endpoints
 *
 * Auth is applied in app.ts:
 * - GET  /subscriptions/plans          public
 * - POST /subscriptions/plans          auth + admin
 * - everything else                    auth
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type {
  HistoryService,
  PlanService,
  SubscriptionService,
} from '@/services/index.js';
import type {
  LedgerEntry,
  Plan,
  SubscriptionDetail,
  SubscriptionHistoryItem,
  SubscriptionReceipt,
} from '@/types/index.js';
import {
  DEFAULT_PER_PAGE,
  MAX_DURATION_MONTHS,
  MAX_PAGE,
  MAX_PLAN_PRICE,
  hasCentPrecision,
  parseFeatureList,
} from '@/types/index.js';

import {
  errorResponse,
  getActor,
  getRequestId,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

interface SubscriptionRoutesDeps {
  planService: Pick<PlanService, 'listPlans' | 'createPlan'>;
  subscriptionService: SubscriptionService;
  historyService: HistoryService;
}

// Zod Schemas
const createPlanSchema = z.object({
  name: z.string().trim().min(1, 'Plan name is required').max(100),
  price: z
    .number()
    .finite()
    .min(0, 'Price must be zero or more')
    .max(MAX_PLAN_PRICE, `Price must be at most ${MAX_PLAN_PRICE}`)
    .refine(hasCentPrecision, 'Price must have at most two decimal places'),
  description: z.string().max(1000).optional(),
  features: z.union([z.array(z.string()), z.string()]).optional(),
});

const subscribeSchema = z.object({
  planId: z.string().uuid('planId must be a UUID'),
  durationMonths: z
    .number()
    .int('durationMonths must be a whole number')
    .min(1)
    .max(MAX_DURATION_MONTHS)
    .optional(),
});

const historyQuerySchema = z.object({
  page: z.coerce
    .number()
    .int()
    .min(1, 'page must be 1 or more')
    .max(MAX_PAGE, `page must be at most ${MAX_PAGE}`)
    .default(1),
  per_page: z.coerce
    .number()
    .int()
    .min(1, 'per_page must be 1 or more')
    .default(DEFAULT_PER_PAGE),
});

/**
 * Format date to ISO string
 */
function formatDate(date: Date | null): string | null {
  return date !== null ? date.toISOString() : null;
}

function serializePlan(plan: Plan) {
  return {
    id: plan.id,
    name: plan.name,
    price: plan.price,
    description: plan.description,
    features: plan.features,
    createdAt: plan.createdAt.toISOString(),
  };
}

function serializeEntry(entry: LedgerEntry) {
  return {
    id: entry.id,
    planId: entry.planId,
    startDate: entry.startDate.toISOString(),
    endDate: formatDate(entry.endDate),
    isActive: entry.isActive,
    createdAt: entry.createdAt.toISOString(),
  };
}

function serializeDetail(detail: SubscriptionDetail) {
  return {
    ...serializeEntry(detail),
    planName: detail.planName,
    planPrice: detail.planPrice,
  };
}

function serializeHistoryItem(item: SubscriptionHistoryItem) {
  return {
    ...serializeDetail(item),
    isExpired: item.isExpired,
  };
}

function serializeReceipt(receipt: SubscriptionReceipt) {
  return {
    subscriptionId: receipt.subscriptionId,
    planId: receipt.planId,
    planName: receipt.planName,
    startDate: receipt.startDate.toISOString(),
    endDate: receipt.endDate.toISOString(),
    replacedSubscriptionId: receipt.replacedSubscriptionId,
  };
}

/**
 * Create subscription routes
 */
export function createSubscriptionRoutes(deps: SubscriptionRoutesDeps): Hono {
  const { planService, subscriptionService, historyService } = deps;
  const app = new Hono();

  /**
   * GET /subscriptions/plans
   * All plans, cheapest first
   */
  app.get('/subscriptions/plans', async (c) => {
    const requestId = getRequestId(c);

    const result = await planService.listPlans(getActor(c));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data.map(serializePlan), requestId);
  });

  /**
   * POST /subscriptions/plans
   * Create a plan (admin)
   */
  app.post('/subscriptions/plans', async (c) => {
    const requestId = getRequestId(c);

    const validation = createPlanSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }
    const body = validation.data;

    const result = await planService.createPlan(getActor(c), {
      name: body.name,
      price: body.price,
      ...(body.description !== undefined && { description: body.description }),
      ...(body.features !== undefined && {
        features:
          typeof body.features === 'string'
            ? parseFeatureList(body.features)
            : body.features,
      }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, serializePlan(result.data), requestId, 201);
  });

  /**
   * POST /subscriptions/subscribe
   */
  app.post('/subscriptions/subscribe', async (c) => {
    const requestId = getRequestId(c);

    const validation = subscribeSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }

    const result = await subscriptionService.subscribe(
      getActor(c),
      validation.data
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, serializeReceipt(result.data), requestId, 201);
  });

  /**
   * GET /subscriptions/active
   */
  app.get('/subscriptions/active', async (c) => {
    const requestId = getRequestId(c);

    const result = await historyService.getActive(getActor(c));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, serializeDetail(result.data), requestId);
  });

  /**
   * GET /subscriptions/history?page&per_page
   */
  app.get('/subscriptions/history', async (c) => {
    const requestId = getRequestId(c);

    const validation = historyQuerySchema.safeParse({
      page: c.req.query('page'),
      per_page: c.req.query('per_page'),
    });
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }

    const result = await historyService.getHistory(getActor(c), {
      page: validation.data.page,
      perPage: validation.data.per_page,
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const history = result.data;
    return successResponse(
      c,
      {
        subscriptions: history.subscriptions.map(serializeHistoryItem),
        total: history.total,
        page: history.page,
        perPage: history.perPage,
        pages: history.pages,
      },
      requestId
    );
  });

  /**
   * POST /subscriptions/cancel
   */
  app.post('/subscriptions/cancel', async (c) => {
    const requestId = getRequestId(c);

    const result = await subscriptionService.cancel(getActor(c));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, serializeEntry(result.data), requestId);
  });

  /**
   * POST /subscriptions/upgrade
   * 201 when a first subscription was created, 200 when one was replaced
   */
  app.post('/subscriptions/upgrade', async (c) => {
    const requestId = getRequestId(c);

    const validation = subscribeSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(c, validation.error, requestId);
    }

    const result = await subscriptionService.upgrade(
      getActor(c),
      validation.data
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      serializeReceipt(result.data.receipt),
      requestId,
      result.data.replaced ? 200 : 201
    );
  });

  return app;
}
