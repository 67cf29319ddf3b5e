/**
 * Subscription Ledger Database Adapters
 * Implements SubscriptionServiceDb and HistoryServiceDb using Supabase
 *
 * Hot reads and invariant-bearing writes go through the SQL functions in
 * supabase/migrations/001_subscription_ledger.sql; each call runs as one
 * transaction.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { isUniqueViolation, storageError } from '@/lib/errors.js';
import { parseRow } from '@/lib/rows.js';
import type {
  LedgerEntry,
  LedgerInsertParams,
  LedgerWriteResult,
  Plan,
  SubscriptionDetail,
} from '@/types/index.js';

import type { HistoryServiceDb } from './history.service.js';
import { PLAN_COLUMNS, mapRowToPlan, planRowSchema } from './plan.db.js';
import type { SubscriptionServiceDb } from './subscription.service.js';

/**
 * Database row types
 */
const ledgerRowSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  plan_id: z.string(),
  start_date: z.string(),
  end_date: z.string().nullable(),
  is_active: z.boolean(),
  created_at: z.string(),
});

const detailRowSchema = ledgerRowSchema.extend({
  plan_name: z.string(),
  plan_price: z.coerce.number(),
});

type LedgerRow = z.infer<typeof ledgerRowSchema>;
type DetailRow = z.infer<typeof detailRowSchema>;

/**
 * Map database row to LedgerEntry
 */
function mapRowToEntry(row: LedgerRow): LedgerEntry {
  return {
    id: row.id,
    userId: row.user_id,
    planId: row.plan_id,
    startDate: new Date(row.start_date),
    endDate: row.end_date !== null ? new Date(row.end_date) : null,
    isActive: row.is_active,
    createdAt: new Date(row.created_at),
  };
}

function mapRowToDetail(row: DetailRow): SubscriptionDetail {
  return {
    ...mapRowToEntry(row),
    planName: row.plan_name,
    planPrice: row.plan_price,
  };
}

async function findActiveSubscriptions(
  supabase: SupabaseClient,
  userId: string,
  asOf: Date,
  limit: number
): Promise<SubscriptionDetail[]> {
  const { data, error } = await supabase.rpc('active_subscriptions', {
    p_user_id: userId,
    p_as_of: asOf.toISOString(),
    p_limit: limit,
  });

  if (error !== null) {
    throw storageError('find active subscription', error);
  }

  return parseRow(detailRowSchema.array(), data, 'subscription rows').map(
    mapRowToDetail
  );
}

/**
 * Interpret the rows returned by a guarded write
 */
function toWriteResult(
  data: unknown,
  operation: string,
  emptyMeans: 'superseded' | null
): LedgerWriteResult {
  const rows = parseRow(ledgerRowSchema.array(), data, 'subscription rows');
  const [row] = rows;
  if (row === undefined) {
    if (emptyMeans === null) {
      throw storageError(operation, { message: 'no row returned' });
    }
    return { status: emptyMeans };
  }
  return { status: 'created', subscription: mapRowToEntry(row) };
}

/**
 * Create SubscriptionServiceDb implementation using Supabase
 */
export function createSubscriptionServiceDb(
  supabase: SupabaseClient
): SubscriptionServiceDb {
  return {
    async getPlan(planId: string): Promise<Plan | null> {
      const { data, error } = await supabase
        .from('subscription_plans')
        .select(PLAN_COLUMNS)
        .eq('id', planId)
        .maybeSingle();

      if (error !== null) {
        throw storageError('get plan', error);
      }
      if (data === null) {
        return null;
      }

      return mapRowToPlan(parseRow(planRowSchema, data, 'plan row'));
    },

    findActiveSubscriptions(userId, asOf, limit) {
      return findActiveSubscriptions(supabase, userId, asOf, limit);
    },

    async createSubscription(
      params: LedgerInsertParams
    ): Promise<LedgerWriteResult> {
      const { data, error } = await supabase.rpc('create_subscription', {
        p_user_id: params.userId,
        p_plan_id: params.planId,
        p_start_date: params.startDate.toISOString(),
        p_end_date: params.endDate.toISOString(),
      });

      if (error !== null) {
        if (isUniqueViolation(error)) {
          return { status: 'conflict' };
        }
        throw storageError('create subscription', error);
      }

      return toWriteResult(data, 'create subscription', null);
    },

    async replaceActiveSubscription(
      params: LedgerInsertParams & { currentSubscriptionId: string }
    ): Promise<LedgerWriteResult> {
      const { data, error } = await supabase.rpc(
        'replace_active_subscription',
        {
          p_user_id: params.userId,
          p_current_subscription_id: params.currentSubscriptionId,
          p_plan_id: params.planId,
          p_start_date: params.startDate.toISOString(),
          p_end_date: params.endDate.toISOString(),
        }
      );

      if (error !== null) {
        if (isUniqueViolation(error)) {
          return { status: 'conflict' };
        }
        throw storageError('replace subscription', error);
      }

      return toWriteResult(data, 'replace subscription', 'superseded');
    },

    async cancelActiveSubscription(
      userId: string,
      asOf: Date
    ): Promise<LedgerEntry | null> {
      const { data, error } = await supabase.rpc('cancel_active_subscription', {
        p_user_id: userId,
        p_as_of: asOf.toISOString(),
      });

      if (error !== null) {
        throw storageError('cancel subscription', error);
      }

      const [row] = parseRow(ledgerRowSchema.array(), data, 'subscription rows');
      return row !== undefined ? mapRowToEntry(row) : null;
    },
  };
}

/**
 * Create HistoryServiceDb implementation using Supabase
 */
export function createHistoryServiceDb(
  supabase: SupabaseClient
): HistoryServiceDb {
  return {
    findActiveSubscriptions(userId, asOf, limit) {
      return findActiveSubscriptions(supabase, userId, asOf, limit);
    },

    async listSubscriptionHistory(
      userId: string,
      range: { limit: number; offset: number }
    ): Promise<SubscriptionDetail[]> {
      const { data, error } = await supabase.rpc('subscription_history', {
        p_user_id: userId,
        p_limit: range.limit,
        p_offset: range.offset,
      });

      if (error !== null) {
        throw storageError('list subscription history', error);
      }

      return parseRow(detailRowSchema.array(), data, 'subscription rows').map(
        mapRowToDetail
      );
    },

    async countSubscriptions(userId: string): Promise<number> {
      const { count, error } = await supabase
        .from('user_subscriptions')
        .select('id', { count: 'exact', head: true })
        .eq('user_id', userId);

      if (error !== null) {
        throw storageError('count subscriptions', error);
      }

      return count ?? 0;
    },
  };
}
