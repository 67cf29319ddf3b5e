/**
 * HistoryService Implementation
 *
 * SCOPE: Read side of the subscription ledger - active lookup and history
 *
 * GUARDRAILS:
 * - Reads always apply the time bound; a stale row is never reported active
 * - A user only ever sees their own rows
 * - perPage is clamped to MAX_PER_PAGE
 * - Offsets past MAX_PAGE_OFFSET are never sent to the database
 */

import type { Clock } from '@/lib/clock.js';
import { systemClock } from '@/lib/clock.js';
import type { Logger } from '@/lib/logger.js';
import { createLogger } from '@/lib/logger.js';
import type {
  ActorContext,
  PageParams,
  Result,
  SubscriptionDetail,
  SubscriptionHistoryPage,
} from '@/types/index.js';
import {
  MAX_PAGE_OFFSET,
  countPages,
  isSubscriptionExpired,
  normalizePageParams,
  pageOffset,
  success,
  failure,
} from '@/types/index.js';

import {
  ACTIVE_LOOKUP_LIMIT,
  selectActiveSubscription,
} from './subscription.service.js';

/**
 * Database abstraction interface for HistoryService
 */
export interface HistoryServiceDb {
  findActiveSubscriptions: (
    userId: string,
    asOf: Date,
    limit: number
  ) => Promise<SubscriptionDetail[]>;
  /**
   * All of the user's rows, newest created first (ties by id desc)
   */
  listSubscriptionHistory: (
    userId: string,
    range: { limit: number; offset: number }
  ) => Promise<SubscriptionDetail[]>;
  countSubscriptions: (userId: string) => Promise<number>;
}

/**
 * HistoryService interface
 */
export interface HistoryService {
  getActive(actor: ActorContext): Promise<Result<SubscriptionDetail>>;
  getHistory(
    actor: ActorContext,
    params: Partial<PageParams>
  ): Promise<Result<SubscriptionHistoryPage>>;
}

/**
 * Create HistoryService instance
 */
export function createHistoryService(deps: {
  db: HistoryServiceDb;
  logger?: Logger;
  clock?: Clock;
}): HistoryService {
  const { db } = deps;
  const logger = deps.logger ?? createLogger();
  const clock = deps.clock ?? systemClock;

  return {
    async getActive(actor: ActorContext): Promise<Result<SubscriptionDetail>> {
      if (actor.userId === undefined) {
        return failure('UNAUTHORIZED', 'Authentication required');
      }

      const rows = await db.findActiveSubscriptions(
        actor.userId,
        clock(),
        ACTIVE_LOOKUP_LIMIT
      );
      const active = selectActiveSubscription(rows, actor.userId, logger);
      if (active === null) {
        return failure('NOT_FOUND', 'No active subscription found');
      }
      return success(active);
    },

    async getHistory(
      actor: ActorContext,
      params: Partial<PageParams>
    ): Promise<Result<SubscriptionHistoryPage>> {
      if (actor.userId === undefined) {
        return failure('UNAUTHORIZED', 'Authentication required');
      }

      const paging = normalizePageParams(params);
      const offset = pageOffset(paging);
      // Nothing lives past the largest offset the query accepts
      const [rows, total] = await Promise.all([
        offset > MAX_PAGE_OFFSET
          ? Promise.resolve<SubscriptionDetail[]>([])
          : db.listSubscriptionHistory(actor.userId, {
              limit: paging.perPage,
              offset,
            }),
        db.countSubscriptions(actor.userId),
      ]);

      const now = clock();
      return success({
        subscriptions: rows.map((row) => ({
          ...row,
          isExpired: isSubscriptionExpired(row, now),
        })),
        total,
        page: paging.page,
        perPage: paging.perPage,
        pages: countPages(total, paging.perPage),
      });
    },
  };
}
