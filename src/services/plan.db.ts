/**
 * PlanService Database Adapter
 * Implements PlanServiceDb interface using the Supabase query builder
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { isUniqueViolation, storageError } from '@/lib/errors.js';
import { parseRow } from '@/lib/rows.js';
import type { CreatePlanParams, Plan } from '@/types/index.js';
import { parseFeatureList, serializeFeatureList } from '@/types/index.js';

import type { PlanInsertResult, PlanServiceDb } from './plan.service.js';

export const PLAN_COLUMNS = 'id, name, price, description, features, created_at';

/**
 * Database row shape. numeric(10,2) may arrive as a number or a string.
 */
export const planRowSchema = z.object({
  id: z.string(),
  name: z.string(),
  price: z.coerce.number(),
  description: z.string().nullable(),
  features: z.string().nullable(),
  created_at: z.string(),
});

export type PlanRow = z.infer<typeof planRowSchema>;

export function mapRowToPlan(row: PlanRow): Plan {
  return {
    id: row.id,
    name: row.name,
    price: row.price,
    description: row.description ?? '',
    features: parseFeatureList(row.features),
    createdAt: new Date(row.created_at),
  };
}

function toInsertRow(params: Required<CreatePlanParams>): Record<string, unknown> {
  return {
    name: params.name,
    price: params.price,
    description: params.description,
    features: serializeFeatureList(params.features),
  };
}

/**
 * Create PlanServiceDb implementation using Supabase
 */
export function createPlanServiceDb(supabase: SupabaseClient): PlanServiceDb {
  return {
    /**
     * All plans, cheapest first
     */
    async listPlans(): Promise<Plan[]> {
      const { data, error } = await supabase
        .from('subscription_plans')
        .select(PLAN_COLUMNS)
        .order('price', { ascending: true })
        .order('name', { ascending: true });

      if (error !== null) {
        throw storageError('list plans', error);
      }

      return parseRow(planRowSchema.array(), data, 'plan rows').map(
        mapRowToPlan
      );
    },

    async getPlanByName(name: string): Promise<Plan | null> {
      const { data, error } = await supabase
        .from('subscription_plans')
        .select(PLAN_COLUMNS)
        .eq('name', name)
        .maybeSingle();

      if (error !== null) {
        throw storageError('get plan by name', error);
      }
      if (data === null) {
        return null;
      }

      return mapRowToPlan(parseRow(planRowSchema, data, 'plan row'));
    },

    async insertPlan(
      params: Required<CreatePlanParams>
    ): Promise<PlanInsertResult> {
      const { data, error } = await supabase
        .from('subscription_plans')
        .insert(toInsertRow(params))
        .select(PLAN_COLUMNS)
        .single();

      if (error !== null) {
        if (isUniqueViolation(error)) {
          return { status: 'conflict' };
        }
        throw storageError('create plan', error);
      }

      return {
        status: 'created',
        plan: mapRowToPlan(parseRow(planRowSchema, data, 'plan row')),
      };
    },

    async countPlans(): Promise<number> {
      const { count, error } = await supabase
        .from('subscription_plans')
        .select('id', { count: 'exact', head: true });

      if (error !== null) {
        throw storageError('count plans', error);
      }

      return count ?? 0;
    },

    /**
     * Batch insert with ON CONFLICT (name) DO NOTHING
     */
    async insertPlansIgnoringDuplicates(
      plans: readonly Required<CreatePlanParams>[]
    ): Promise<number> {
      const { data, error } = await supabase
        .from('subscription_plans')
        .upsert(plans.map(toInsertRow), {
          onConflict: 'name',
          ignoreDuplicates: true,
        })
        .select('id');

      if (error !== null) {
        throw storageError('seed plans', error);
      }

      return parseRow(z.array(z.object({ id: z.string() })), data, 'plan ids')
        .length;
    },
  };
}
