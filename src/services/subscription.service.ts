/**
 * SubscriptionService Implementation
 *
 * SCOPE: Subscription lifecycle - subscribe, cancel, upgrade
 *
 * Per-user state machine:
 *   NoActiveSubscription <-> HasActiveSubscription(planId, endDate)
 *
 * GUARDRAILS:
 * - At most one active, unexpired ledger row per user
 * - The acting user is always actor.userId, never a request field
 * - Every invariant-bearing write is one atomic ledger call; a lost race is
 *   re-evaluated from a fresh read, never forced through
 * - Expiry is evaluated against the service clock on every read
 *
 * Dependencies: AuditService
 */

import type { Clock } from '@/lib/clock.js';
import { systemClock } from '@/lib/clock.js';
import type { Logger } from '@/lib/logger.js';
import { createLogger } from '@/lib/logger.js';
import type {
  ActorContext,
  AuditEvent,
  Failure,
  LedgerEntry,
  LedgerInsertParams,
  LedgerWriteResult,
  Plan,
  Result,
  SubscribeParams,
  SubscriptionDetail,
  SubscriptionReceipt,
} from '@/types/index.js';
import {
  DEFAULT_DURATION_MONTHS,
  MAX_DURATION_MONTHS,
  computeEndDate,
  success,
  failure,
} from '@/types/index.js';

/**
 * Attempts per write before giving up with CONFLICT
 */
export const MAX_WRITE_ATTEMPTS = 3;

/**
 * Rows requested by the active lookup. More than one means the invariant was
 * broken somewhere; the first row wins.
 */
export const ACTIVE_LOOKUP_LIMIT = 2;

/**
 * Database abstraction interface for SubscriptionService
 */
export interface SubscriptionServiceDb {
  getPlan: (planId: string) => Promise<Plan | null>;
  /**
   * Rows that are active and unexpired at asOf, oldest first
   */
  findActiveSubscriptions: (
    userId: string,
    asOf: Date,
    limit: number
  ) => Promise<SubscriptionDetail[]>;
  /**
   * Deactivate stale rows and insert the new row, atomically.
   * Resolves 'conflict' when another active row holds the user's slot.
   */
  createSubscription: (params: LedgerInsertParams) => Promise<LedgerWriteResult>;
  /**
   * Cancel currentSubscriptionId, deactivate stale rows and insert the new
   * row, atomically. Resolves 'superseded' when the current row is no longer
   * active.
   */
  replaceActiveSubscription: (
    params: LedgerInsertParams & { currentSubscriptionId: string }
  ) => Promise<LedgerWriteResult>;
  /**
   * Single conditional update. Null when nothing matched.
   */
  cancelActiveSubscription: (
    userId: string,
    asOf: Date
  ) => Promise<LedgerEntry | null>;
}

/**
 * Minimal AuditService interface
 */
export interface SubscriptionServiceAudit {
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
}

/**
 * Outcome of an upgrade. replaced is false when the user had no active
 * subscription and a fresh one was created.
 */
export interface UpgradeOutcome {
  receipt: SubscriptionReceipt;
  replaced: boolean;
}

/**
 * SubscriptionService interface
 */
export interface SubscriptionService {
  subscribe(
    actor: ActorContext,
    params: SubscribeParams
  ): Promise<Result<SubscriptionReceipt>>;
  cancel(actor: ActorContext): Promise<Result<LedgerEntry>>;
  upgrade(
    actor: ActorContext,
    params: SubscribeParams
  ): Promise<Result<UpgradeOutcome>>;
}

/**
 * Pick the authoritative active row from an active lookup.
 * Logs when the lookup shows more than one.
 */
export function selectActiveSubscription(
  rows: SubscriptionDetail[],
  userId: string,
  logger: Logger
): SubscriptionDetail | null {
  const [first] = rows;
  if (first === undefined) {
    return null;
  }
  if (rows.length > 1) {
    logger.warn('Multiple active subscriptions found', {
      userId,
      subscriptionIds: rows.map((row) => row.id),
      using: first.id,
    });
  }
  return first;
}

/**
 * Create SubscriptionService instance
 */
export function createSubscriptionService(deps: {
  db: SubscriptionServiceDb;
  auditService: SubscriptionServiceAudit;
  logger?: Logger;
  clock?: Clock;
}): SubscriptionService {
  const { db, auditService } = deps;
  const logger = deps.logger ?? createLogger();
  const clock = deps.clock ?? systemClock;

  // ─────────────────────────────────────────────────────────────
  // HELPER FUNCTIONS
  // ─────────────────────────────────────────────────────────────

  function requireUserId(actor: ActorContext): Result<string> {
    if (actor.userId === undefined) {
      return failure('UNAUTHORIZED', 'Authentication required');
    }
    return success(actor.userId);
  }

  function resolveDuration(durationMonths: number | undefined): Result<number> {
    const months = durationMonths ?? DEFAULT_DURATION_MONTHS;
    if (
      !Number.isInteger(months) ||
      months < 1 ||
      months > MAX_DURATION_MONTHS
    ) {
      return failure(
        'VALIDATION_ERROR',
        `durationMonths must be a whole number between 1 and ${MAX_DURATION_MONTHS}`,
        { durationMonths: months }
      );
    }
    return success(months);
  }

  async function findActive(
    userId: string,
    asOf: Date
  ): Promise<SubscriptionDetail | null> {
    const rows = await db.findActiveSubscriptions(
      userId,
      asOf,
      ACTIVE_LOOKUP_LIMIT
    );
    return selectActiveSubscription(rows, userId, logger);
  }

  function buildInsert(
    userId: string,
    planId: string,
    now: Date,
    months: number
  ): LedgerInsertParams {
    return {
      userId,
      planId,
      startDate: now,
      endDate: computeEndDate(now, months),
    };
  }

  function buildReceipt(
    entry: LedgerEntry,
    insert: LedgerInsertParams,
    plan: Plan,
    replacedSubscriptionId: string | null
  ): SubscriptionReceipt {
    return {
      subscriptionId: entry.id,
      planId: plan.id,
      planName: plan.name,
      startDate: entry.startDate,
      endDate: entry.endDate ?? insert.endDate,
      replacedSubscriptionId,
    };
  }

  async function audit(actor: ActorContext, event: AuditEvent): Promise<void> {
    const result = await auditService.log(actor, event);
    if (!result.success) {
      logger.warn('Audit log write failed', {
        action: event.action,
        error: result.error,
      });
    }
  }

  function retriesExhausted(userId: string, operation: string): Failure {
    logger.warn('Subscription write retries exhausted', {
      userId,
      operation,
      attempts: MAX_WRITE_ATTEMPTS,
    });
    return failure(
      'CONFLICT',
      'Subscription changed concurrently, please retry',
      { attempts: MAX_WRITE_ATTEMPTS }
    );
  }

  function planNotFound(planId: string): Failure {
    return failure('NOT_FOUND', 'Plan not found', { planId });
  }

  // ─────────────────────────────────────────────────────────────
  // SERVICE IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  return {
    async subscribe(
      actor: ActorContext,
      params: SubscribeParams
    ): Promise<Result<SubscriptionReceipt>> {
      const userIdResult = requireUserId(actor);
      if (!userIdResult.success) {
        return userIdResult;
      }
      const userId = userIdResult.data;

      const duration = resolveDuration(params.durationMonths);
      if (!duration.success) {
        return duration;
      }

      const plan = await db.getPlan(params.planId);
      if (plan === null) {
        return planNotFound(params.planId);
      }

      for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
        const now = clock();
        const active = await findActive(userId, now);
        if (active !== null) {
          return failure(
            'ACTIVE_SUBSCRIPTION_EXISTS',
            'You already have an active subscription',
            {
              planName: active.planName,
              expiresAt: active.endDate?.toISOString() ?? null,
            }
          );
        }

        const insert = buildInsert(userId, plan.id, now, duration.data);
        const written = await db.createSubscription(insert);
        if (written.status !== 'created') {
          logger.debug('Subscription write lost a race', {
            userId,
            attempt,
            status: written.status,
          });
          continue;
        }

        const receipt = buildReceipt(written.subscription, insert, plan, null);
        await audit(actor, {
          action: 'subscription.created',
          resourceType: 'subscription',
          resourceId: receipt.subscriptionId,
          details: {
            planId: plan.id,
            durationMonths: duration.data,
            endDate: receipt.endDate.toISOString(),
          },
        });
        return success(receipt);
      }

      return retriesExhausted(userId, 'subscribe');
    },

    async cancel(actor: ActorContext): Promise<Result<LedgerEntry>> {
      const userIdResult = requireUserId(actor);
      if (!userIdResult.success) {
        return userIdResult;
      }
      const userId = userIdResult.data;

      const cancelled = await db.cancelActiveSubscription(userId, clock());
      if (cancelled === null) {
        return failure('NOT_FOUND', 'No active subscription found');
      }

      await audit(actor, {
        action: 'subscription.cancelled',
        resourceType: 'subscription',
        resourceId: cancelled.id,
        details: { planId: cancelled.planId },
      });
      return success(cancelled);
    },

    async upgrade(
      actor: ActorContext,
      params: SubscribeParams
    ): Promise<Result<UpgradeOutcome>> {
      const userIdResult = requireUserId(actor);
      if (!userIdResult.success) {
        return userIdResult;
      }
      const userId = userIdResult.data;

      const duration = resolveDuration(params.durationMonths);
      if (!duration.success) {
        return duration;
      }

      const plan = await db.getPlan(params.planId);
      if (plan === null) {
        return planNotFound(params.planId);
      }

      for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
        const now = clock();
        const active = await findActive(userId, now);
        if (active !== null && active.planId === plan.id) {
          return failure(
            'ALREADY_SUBSCRIBED',
            'You are already subscribed to this plan',
            {
              planName: active.planName,
              expiresAt: active.endDate?.toISOString() ?? null,
            }
          );
        }

        const insert = buildInsert(userId, plan.id, now, duration.data);
        const written =
          active === null
            ? await db.createSubscription(insert)
            : await db.replaceActiveSubscription({
                ...insert,
                currentSubscriptionId: active.id,
              });
        if (written.status !== 'created') {
          logger.debug('Subscription write lost a race', {
            userId,
            attempt,
            status: written.status,
          });
          continue;
        }

        const replacedId = active?.id ?? null;
        const receipt = buildReceipt(
          written.subscription,
          insert,
          plan,
          replacedId
        );
        await audit(actor, {
          action: 'subscription.upgraded',
          resourceType: 'subscription',
          resourceId: receipt.subscriptionId,
          details: {
            planId: plan.id,
            previousPlanId: active?.planId ?? null,
            replacedSubscriptionId: replacedId,
            durationMonths: duration.data,
          },
        });
        return success({ receipt, replaced: active !== null });
      }

      return retriesExhausted(userId, 'upgrade');
    },
  };
}
