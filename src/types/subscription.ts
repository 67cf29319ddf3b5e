/**
 * Subscription Ledger Types
 *
 * A ledger entry is one row of a user's subscription history. Rows are never
 * deleted; cancellation flips isActive and stamps endDate.
 *
 * Active predicate: isActive && (endDate === null || endDate > now)
 */

/**
 * Length of one billing block. Durations are whole months counted as 30-day
 * blocks, not calendar months.
 */
export const SUBSCRIPTION_BLOCK_DAYS = 30;

export const DEFAULT_DURATION_MONTHS = 1;
export const MAX_DURATION_MONTHS = 120;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface LedgerEntry {
  id: string;
  userId: string;
  planId: string;
  startDate: Date;
  endDate: Date | null;
  isActive: boolean;
  createdAt: Date;
}

/**
 * Ledger entry joined with catalog data for display
 */
export interface SubscriptionDetail extends LedgerEntry {
  planName: string;
  planPrice: number;
}

/**
 * History item: stored flag plus expiry evaluated at read time
 */
export interface SubscriptionHistoryItem extends SubscriptionDetail {
  isExpired: boolean;
}

export interface SubscriptionHistoryPage {
  subscriptions: SubscriptionHistoryItem[];
  total: number;
  page: number;
  perPage: number;
  pages: number;
}

/**
 * Returned by subscribe and upgrade
 */
export interface SubscriptionReceipt {
  subscriptionId: string;
  planId: string;
  planName: string;
  startDate: Date;
  endDate: Date;
  replacedSubscriptionId: string | null;
}

export interface SubscribeParams {
  planId: string;
  durationMonths?: number;
}

/**
 * Values written for a new ledger row
 */
export interface LedgerInsertParams {
  userId: string;
  planId: string;
  startDate: Date;
  endDate: Date;
}

/**
 * Outcome of an invariant-guarded ledger write
 * - created: the row was inserted and is the user's only active row
 * - conflict: another active row holds the user's slot
 * - superseded: the row being replaced was no longer active
 */
export type LedgerWriteResult =
  | { status: 'created'; subscription: LedgerEntry }
  | { status: 'conflict' }
  | { status: 'superseded' };

export function computeEndDate(startDate: Date, durationMonths: number): Date {
  return new Date(
    startDate.getTime() +
      durationMonths * SUBSCRIPTION_BLOCK_DAYS * MS_PER_DAY
  );
}

export function isSubscriptionExpired(
  entry: Pick<LedgerEntry, 'endDate'>,
  now: Date
): boolean {
  return entry.endDate !== null && entry.endDate.getTime() <= now.getTime();
}

export function isSubscriptionActive(
  entry: Pick<LedgerEntry, 'endDate' | 'isActive'>,
  now: Date
): boolean {
  return entry.isActive && !isSubscriptionExpired(entry, now);
}
