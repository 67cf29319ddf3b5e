/**
 * PlanService Implementation
 *
 * SCOPE: The plan catalog - purchasable tiers, read-mostly reference data
 *
 * GUARDRAILS:
 * - Plan names are unique
 * - Plans are never updated or deleted
 * - Who may create plans is decided by the admin middleware, not here
 * - Seeding only touches an empty catalog
 *
 * Dependencies: AuditService
 */

import type { Logger } from '@/lib/logger.js';
import { createLogger } from '@/lib/logger.js';
import type {
  ActorContext,
  AuditEvent,
  CreatePlanParams,
  Plan,
  Result,
} from '@/types/index.js';
import {
  FEATURE_SEPARATOR,
  MAX_PLAN_PRICE,
  hasCentPrecision,
  success,
  failure,
} from '@/types/index.js';

import { DEFAULT_PLANS } from './plan.defaults.js';

/**
 * Outcome of a plan insert
 */
export type PlanInsertResult =
  | { status: 'created'; plan: Plan }
  | { status: 'conflict' };

/**
 * Database abstraction interface for PlanService
 */
export interface PlanServiceDb {
  listPlans: () => Promise<Plan[]>;
  getPlanByName: (name: string) => Promise<Plan | null>;
  insertPlan: (params: Required<CreatePlanParams>) => Promise<PlanInsertResult>;
  countPlans: () => Promise<number>;
  /**
   * Insert plans in one statement, skipping names that already exist.
   * Returns the number of rows inserted.
   */
  insertPlansIgnoringDuplicates: (
    plans: readonly Required<CreatePlanParams>[]
  ) => Promise<number>;
}

/**
 * Minimal AuditService interface
 */
export interface PlanServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * PlanService interface
 */
export interface PlanService {
  listPlans(actor: ActorContext): Promise<Result<Plan[]>>;
  createPlan(
    actor: ActorContext,
    params: CreatePlanParams
  ): Promise<Result<Plan>>;
  seedDefaultPlans(actor: ActorContext): Promise<Result<{ seeded: number }>>;
}

/**
 * Create PlanService instance
 */
export function createPlanService(deps: {
  db: PlanServiceDb;
  auditService: PlanServiceAudit;
  logger?: Logger;
}): PlanService {
  const { db, auditService } = deps;
  const logger = deps.logger ?? createLogger();

  function validatePlan(
    params: CreatePlanParams
  ): Result<Required<CreatePlanParams>> {
    const name = params.name.trim();
    if (name === '') {
      return failure('VALIDATION_ERROR', 'Plan name is required');
    }
    if (!Number.isFinite(params.price) || params.price < 0) {
      return failure('VALIDATION_ERROR', 'Plan price must be zero or more');
    }
    if (params.price > MAX_PLAN_PRICE) {
      return failure(
        'VALIDATION_ERROR',
        `Plan price must be at most ${MAX_PLAN_PRICE}`,
        { price: params.price }
      );
    }
    if (!hasCentPrecision(params.price)) {
      return failure(
        'VALIDATION_ERROR',
        'Plan price must have at most two decimal places',
        { price: params.price }
      );
    }
    const features = params.features ?? [];
    const invalid = features.find((f) => f.includes(FEATURE_SEPARATOR));
    if (invalid !== undefined) {
      return failure(
        'VALIDATION_ERROR',
        `Feature names cannot contain "${FEATURE_SEPARATOR}"`,
        { feature: invalid }
      );
    }
    return success({
      name,
      price: params.price,
      description: params.description?.trim() ?? '',
      features,
    });
  }

  return {
    async listPlans(_actor: ActorContext): Promise<Result<Plan[]>> {
      const plans = await db.listPlans();
      return success(plans);
    },

    async createPlan(
      actor: ActorContext,
      params: CreatePlanParams
    ): Promise<Result<Plan>> {
      const validation = validatePlan(params);
      if (!validation.success) {
        return validation;
      }
      const plan = validation.data;

      const existing = await db.getPlanByName(plan.name);
      if (existing !== null) {
        return failure('CONFLICT', 'Plan with this name already exists', {
          name: plan.name,
        });
      }

      // The unique constraint still decides when two admins race on a name
      const inserted = await db.insertPlan(plan);
      if (inserted.status === 'conflict') {
        return failure('CONFLICT', 'Plan with this name already exists', {
          name: plan.name,
        });
      }

      const auditResult = await auditService.log(actor, {
        action: 'plan.created',
        resourceType: 'plan',
        resourceId: inserted.plan.id,
        details: { name: plan.name, price: plan.price },
      });
      if (!auditResult.success) {
        logger.warn('Audit log write failed', {
          action: 'plan.created',
          error: auditResult.error,
        });
      }

      return success(inserted.plan);
    },

    async seedDefaultPlans(
      _actor: ActorContext
    ): Promise<Result<{ seeded: number }>> {
      const count = await db.countPlans();
      if (count > 0) {
        logger.debug('Plan catalog already populated', { count });
        return success({ seeded: 0 });
      }

      const seeded = await db.insertPlansIgnoringDuplicates(DEFAULT_PLANS);
      logger.info('Seeded default plans', { seeded });
      return success({ seeded });
    },
  };
}
