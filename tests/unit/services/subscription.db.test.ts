/**
 * Subscription Ledger Adapter Tests
 * Drives the real Supabase client against a fetch spy
 */

import { describe, it, expect, beforeEach } from 'vitest';

import { StorageError } from '@/lib/errors.js';
import type { HistoryServiceDb } from '@/services/history.service.js';
import {
  createHistoryServiceDb,
  createSubscriptionServiceDb,
} from '@/services/subscription.db.js';
import type { SubscriptionServiceDb } from '@/services/subscription.service.js';

import type { FetchMock } from '../../mocks/index.js';
import {
  countResponse,
  createFetchMock,
  createTestSupabaseClient,
  errorResponse,
  jsonResponse,
  recordedRequest,
} from '../../mocks/index.js';
import {
  OTHER_PLAN_ID,
  TEST_PLAN_ID,
  TEST_USER_ID,
  makeDetail,
  makeEntry,
  makePlan,
} from '../../helpers/test-utils.js';

const LEDGER_ROW = {
  id: 'sub-1',
  user_id: TEST_USER_ID,
  plan_id: TEST_PLAN_ID,
  start_date: '2025-01-01T00:00:00+00:00',
  end_date: '2025-01-31T00:00:00+00:00',
  is_active: true,
  created_at: '2025-01-01T00:00:00+00:00',
};

const DETAIL_ROW = { ...LEDGER_ROW, plan_name: 'Pro', plan_price: '100.00' };

const PLAN_ROW = {
  id: TEST_PLAN_ID,
  name: 'Pro',
  price: 100,
  description: 'Full access with all features',
  features: 'Unlimited API calls;Advanced analytics',
  created_at: '2024-12-01T00:00:00+00:00',
};

const INSERT = {
  userId: TEST_USER_ID,
  planId: TEST_PLAN_ID,
  startDate: new Date('2025-01-01T00:00:00.000Z'),
  endDate: new Date('2025-01-31T00:00:00.000Z'),
};

describe('createSubscriptionServiceDb', () => {
  let fetchMock: FetchMock;
  let db: SubscriptionServiceDb;

  beforeEach(() => {
    fetchMock = createFetchMock();
    db = createSubscriptionServiceDb(createTestSupabaseClient(fetchMock));
  });

  describe('getPlan', () => {
    it('should select the plan by id', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([PLAN_ROW]));

      const plan = await db.getPlan(TEST_PLAN_ID);

      expect(plan).toEqual(makePlan());
      const request = recordedRequest(fetchMock);
      expect(request.method).toBe('GET');
      expect(request.url.pathname).toBe('/rest/v1/subscription_plans');
      expect(request.url.searchParams.get('id')).toBe(`eq.${TEST_PLAN_ID}`);
    });

    it('should return null for an unknown id', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      expect(await db.getPlan(OTHER_PLAN_ID)).toBeNull();
    });
  });

  describe('findActiveSubscriptions', () => {
    it('should call active_subscriptions with the time bound', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([DETAIL_ROW]));

      const rows = await db.findActiveSubscriptions(
        TEST_USER_ID,
        new Date('2025-01-10T00:00:00.000Z'),
        2
      );

      expect(rows).toEqual([makeDetail()]);
      const request = recordedRequest(fetchMock);
      expect(request.method).toBe('POST');
      expect(request.url.pathname).toBe('/rest/v1/rpc/active_subscriptions');
      expect(request.body).toEqual({
        p_user_id: TEST_USER_ID,
        p_as_of: '2025-01-10T00:00:00.000Z',
        p_limit: 2,
      });
    });

    it('should map a null end date', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse([{ ...DETAIL_ROW, end_date: null }])
      );

      const [row] = await db.findActiveSubscriptions(
        TEST_USER_ID,
        new Date('2025-01-10T00:00:00.000Z'),
        2
      );

      expect(row?.endDate).toBeNull();
    });

    it('should reject a malformed row', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse([{ ...DETAIL_ROW, is_active: 'yes' }])
      );

      await expect(
        db.findActiveSubscriptions(TEST_USER_ID, new Date(), 2)
      ).rejects.toThrow('Malformed subscription rows');
    });
  });

  describe('createSubscription', () => {
    it('should call create_subscription and return the new row', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([LEDGER_ROW]));

      const result = await db.createSubscription(INSERT);

      expect(result).toEqual({ status: 'created', subscription: makeEntry() });
      const request = recordedRequest(fetchMock);
      expect(request.url.pathname).toBe('/rest/v1/rpc/create_subscription');
      expect(request.body).toEqual({
        p_user_id: TEST_USER_ID,
        p_plan_id: TEST_PLAN_ID,
        p_start_date: '2025-01-01T00:00:00.000Z',
        p_end_date: '2025-01-31T00:00:00.000Z',
      });
    });

    it('should report a unique violation as a conflict', async () => {
      fetchMock.mockResolvedValueOnce(
        errorResponse(
          {
            code: '23505',
            message:
              'duplicate key value violates unique constraint "user_subscriptions_one_active"',
          },
          409
        )
      );

      expect(await db.createSubscription(INSERT)).toEqual({
        status: 'conflict',
      });
    });

    it('should throw StorageError for any other failure', async () => {
      fetchMock.mockResolvedValueOnce(
        errorResponse({ code: '40P01', message: 'deadlock detected' }, 500)
      );

      const promise = db.createSubscription(INSERT);

      await expect(promise).rejects.toBeInstanceOf(StorageError);
      await expect(promise).rejects.toThrow(
        'Failed to create subscription: deadlock detected'
      );
    });

    it('should throw when no row comes back', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      await expect(db.createSubscription(INSERT)).rejects.toThrow(
        'Failed to create subscription: no row returned'
      );
    });
  });

  describe('replaceActiveSubscription', () => {
    it('should pass the row being replaced', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse([{ ...LEDGER_ROW, id: 'sub-2', plan_id: OTHER_PLAN_ID }])
      );

      const result = await db.replaceActiveSubscription({
        ...INSERT,
        planId: OTHER_PLAN_ID,
        currentSubscriptionId: 'sub-1',
      });

      expect(result).toEqual({
        status: 'created',
        subscription: makeEntry({ id: 'sub-2', planId: OTHER_PLAN_ID }),
      });
      const request = recordedRequest(fetchMock);
      expect(request.url.pathname).toBe(
        '/rest/v1/rpc/replace_active_subscription'
      );
      expect(request.body).toEqual({
        p_user_id: TEST_USER_ID,
        p_current_subscription_id: 'sub-1',
        p_plan_id: OTHER_PLAN_ID,
        p_start_date: '2025-01-01T00:00:00.000Z',
        p_end_date: '2025-01-31T00:00:00.000Z',
      });
    });

    it('should report an empty result as superseded', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      const result = await db.replaceActiveSubscription({
        ...INSERT,
        currentSubscriptionId: 'sub-gone',
      });

      expect(result).toEqual({ status: 'superseded' });
    });

    it('should report a unique violation as a conflict', async () => {
      fetchMock.mockResolvedValueOnce(
        errorResponse({ code: '23505', message: 'duplicate key' }, 409)
      );

      const result = await db.replaceActiveSubscription({
        ...INSERT,
        currentSubscriptionId: 'sub-1',
      });

      expect(result).toEqual({ status: 'conflict' });
    });
  });

  describe('cancelActiveSubscription', () => {
    it('should return the cancelled row', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse([
          {
            ...LEDGER_ROW,
            is_active: false,
            end_date: '2025-01-10T00:00:00+00:00',
          },
        ])
      );

      const cancelled = await db.cancelActiveSubscription(
        TEST_USER_ID,
        new Date('2025-01-10T00:00:00.000Z')
      );

      expect(cancelled).toEqual(
        makeEntry({
          isActive: false,
          endDate: new Date('2025-01-10T00:00:00.000Z'),
        })
      );
      expect(recordedRequest(fetchMock).body).toEqual({
        p_user_id: TEST_USER_ID,
        p_as_of: '2025-01-10T00:00:00.000Z',
      });
    });

    it('should return null when nothing matched', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([]));

      expect(
        await db.cancelActiveSubscription(TEST_USER_ID, new Date())
      ).toBeNull();
    });
  });
});

describe('createHistoryServiceDb', () => {
  let fetchMock: FetchMock;
  let db: HistoryServiceDb;

  beforeEach(() => {
    fetchMock = createFetchMock();
    db = createHistoryServiceDb(createTestSupabaseClient(fetchMock));
  });

  it('should page through subscription_history', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse([DETAIL_ROW]));

    const rows = await db.listSubscriptionHistory(TEST_USER_ID, {
      limit: 10,
      offset: 20,
    });

    expect(rows).toEqual([makeDetail()]);
    const request = recordedRequest(fetchMock);
    expect(request.url.pathname).toBe('/rest/v1/rpc/subscription_history');
    expect(request.body).toEqual({
      p_user_id: TEST_USER_ID,
      p_limit: 10,
      p_offset: 20,
    });
  });

  it('should count the user rows with a head request', async () => {
    fetchMock.mockResolvedValueOnce(countResponse(42));

    const total = await db.countSubscriptions(TEST_USER_ID);

    expect(total).toBe(42);
    const request = recordedRequest(fetchMock);
    expect(request.method).toBe('HEAD');
    expect(request.url.pathname).toBe('/rest/v1/user_subscriptions');
    expect(request.url.searchParams.get('user_id')).toBe(`eq.${TEST_USER_ID}`);
  });

  it('should throw StorageError when the count fails', async () => {
    fetchMock.mockResolvedValueOnce(
      errorResponse({ code: '57014', message: 'canceling statement' }, 500)
    );

    await expect(db.countSubscriptions(TEST_USER_ID)).rejects.toThrow(
      StorageError
    );
  });
});
