/**
 * In-process stand-in for the Postgres ledger
 *
 * Implements the same *Db interfaces as the Supabase adapters with the
 * semantics of the SQL functions in supabase/migrations: each write runs to
 * completion synchronously, and the partial unique index on active rows is
 * enforced by rejecting the write with 'conflict'.
 */

import type { HistoryServiceDb } from '@/services/history.service.js';
import type { PlanServiceDb } from '@/services/plan.service.js';
import type { SubscriptionServiceDb } from '@/services/subscription.service.js';
import type {
  AuditEvent,
  CreatePlanParams,
  LedgerEntry,
  LedgerInsertParams,
  LedgerWriteResult,
  Plan,
  Result,
  SubscriptionDetail,
  ActorContext,
} from '@/types/index.js';
import {
  isSubscriptionActive,
  parseFeatureList,
  serializeFeatureList,
  success,
} from '@/types/index.js';

export interface InMemoryLedger {
  plans: Plan[];
  rows: LedgerEntry[];
  planDb: PlanServiceDb;
  subscriptionDb: SubscriptionServiceDb;
  historyDb: HistoryServiceDb;
  /**
   * Insert a row directly, bypassing every guard
   */
  insertRow(row: Omit<LedgerEntry, 'id'> & { id?: string }): LedgerEntry;
  activeRows(userId: string, now: Date): LedgerEntry[];
}

function compareAsc(a: LedgerEntry, b: LedgerEntry): number {
  const byCreated = a.createdAt.getTime() - b.createdAt.getTime();
  if (byCreated !== 0) {
    return byCreated;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function isStale(row: LedgerEntry, asOf: Date): boolean {
  return (
    row.isActive &&
    row.endDate !== null &&
    row.endDate.getTime() <= asOf.getTime()
  );
}

function copyEntry(row: LedgerEntry): LedgerEntry {
  return { ...row };
}

export function createInMemoryLedger(): InMemoryLedger {
  const plans: Plan[] = [];
  const rows: LedgerEntry[] = [];
  let planSeq = 0;
  let rowSeq = 0;

  function nextRowId(): string {
    rowSeq += 1;
    return `sub-${String(rowSeq).padStart(4, '0')}`;
  }

  function storePlan(params: Required<CreatePlanParams>): Plan {
    planSeq += 1;
    const plan: Plan = {
      id: `plan-${String(planSeq).padStart(4, '0')}`,
      name: params.name,
      price: params.price,
      description: params.description,
      features: parseFeatureList(serializeFeatureList(params.features)),
      createdAt: new Date(),
    };
    plans.push(plan);
    return plan;
  }

  function toDetail(row: LedgerEntry): SubscriptionDetail {
    const plan = plans.find((p) => p.id === row.planId);
    if (plan === undefined) {
      throw new Error(`Ledger row ${row.id} references unknown plan`);
    }
    return { ...row, planName: plan.name, planPrice: plan.price };
  }

  function activeRows(userId: string, asOf: Date): LedgerEntry[] {
    return rows
      .filter((row) => row.userId === userId && isSubscriptionActive(row, asOf))
      .sort(compareAsc);
  }

  function deactivateStale(userId: string, asOf: Date): void {
    for (const row of rows) {
      if (row.userId === userId && isStale(row, asOf)) {
        row.isActive = false;
      }
    }
  }

  function insert(params: LedgerInsertParams): LedgerEntry {
    const row: LedgerEntry = {
      id: nextRowId(),
      userId: params.userId,
      planId: params.planId,
      startDate: params.startDate,
      endDate: params.endDate,
      isActive: true,
      createdAt: params.startDate,
    };
    rows.push(row);
    return copyEntry(row);
  }

  /**
   * Active rows left after stale cleanup, other than excludeId
   */
  function blockingRows(
    userId: string,
    asOf: Date,
    excludeId: string | null
  ): LedgerEntry[] {
    return rows.filter(
      (row) =>
        row.userId === userId &&
        row.isActive &&
        row.id !== excludeId &&
        !isStale(row, asOf)
    );
  }

  const planDb: PlanServiceDb = {
    async listPlans() {
      return [...plans].sort((a, b) =>
        a.price !== b.price ? a.price - b.price : a.name < b.name ? -1 : 1
      );
    },
    async getPlanByName(name) {
      return plans.find((p) => p.name === name) ?? null;
    },
    async insertPlan(params) {
      if (plans.some((p) => p.name === params.name)) {
        return { status: 'conflict' };
      }
      return { status: 'created', plan: storePlan(params) };
    },
    async countPlans() {
      return plans.length;
    },
    async insertPlansIgnoringDuplicates(batch) {
      let inserted = 0;
      for (const params of batch) {
        if (!plans.some((p) => p.name === params.name)) {
          storePlan(params);
          inserted += 1;
        }
      }
      return inserted;
    },
  };

  async function findActiveSubscriptions(
    userId: string,
    asOf: Date,
    limit: number
  ): Promise<SubscriptionDetail[]> {
    return activeRows(userId, asOf).slice(0, limit).map(toDetail);
  }

  const subscriptionDb: SubscriptionServiceDb = {
    async getPlan(planId) {
      return plans.find((p) => p.id === planId) ?? null;
    },

    findActiveSubscriptions,

    async createSubscription(params): Promise<LedgerWriteResult> {
      if (blockingRows(params.userId, params.startDate, null).length > 0) {
        return { status: 'conflict' };
      }
      deactivateStale(params.userId, params.startDate);
      return { status: 'created', subscription: insert(params) };
    },

    async replaceActiveSubscription(params): Promise<LedgerWriteResult> {
      const current = rows.find(
        (row) =>
          row.id === params.currentSubscriptionId &&
          row.userId === params.userId &&
          isSubscriptionActive(row, params.startDate)
      );
      if (current === undefined) {
        return { status: 'superseded' };
      }
      if (
        blockingRows(params.userId, params.startDate, current.id).length > 0
      ) {
        return { status: 'conflict' };
      }

      current.isActive = false;
      current.endDate = params.startDate;
      deactivateStale(params.userId, params.startDate);
      return { status: 'created', subscription: insert(params) };
    },

    async cancelActiveSubscription(userId, asOf) {
      const matched = activeRows(userId, asOf);
      for (const row of matched) {
        row.isActive = false;
        row.endDate = asOf;
      }
      const [first] = matched;
      return first !== undefined ? copyEntry(first) : null;
    },
  };

  const historyDb: HistoryServiceDb = {
    findActiveSubscriptions,

    async listSubscriptionHistory(userId, range) {
      return rows
        .filter((row) => row.userId === userId)
        .sort((a, b) => compareAsc(b, a))
        .slice(range.offset, range.offset + range.limit)
        .map(toDetail);
    },

    async countSubscriptions(userId) {
      return rows.filter((row) => row.userId === userId).length;
    },
  };

  return {
    plans,
    rows,
    planDb,
    subscriptionDb,
    historyDb,
    insertRow(row) {
      const stored: LedgerEntry = { ...row, id: row.id ?? nextRowId() };
      rows.push(stored);
      return copyEntry(stored);
    },
    activeRows,
  };
}

/**
 * Audit stand-in that records events
 */
export function createRecordingAudit(): {
  events: Array<{ actor: ActorContext; event: AuditEvent }>;
  log: (actor: ActorContext, event: AuditEvent) => Promise<Result<void>>;
} {
  const events: Array<{ actor: ActorContext; event: AuditEvent }> = [];
  return {
    events,
    async log(actor, event) {
      events.push({ actor, event });
      return success(undefined);
    },
  };
}
