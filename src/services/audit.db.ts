/**
 * AuditService Database Adapter
 * Implements AuditServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { storageError } from '@/lib/errors.js';
import { parseRow } from '@/lib/rows.js';
import type { AuditLogEntry } from '@/types/index.js';

import type { AuditServiceDb } from './audit.service.js';

const insertedRowSchema = z.object({ id: z.string() });

/**
 * Create AuditServiceDb implementation using Supabase
 */
export function createAuditServiceDb(supabase: SupabaseClient): AuditServiceDb {
  return {
    async insertLog(entry: AuditLogEntry): Promise<{ id: string }> {
      const { data, error } = await supabase
        .from('audit_logs')
        .insert({
          actor_id: entry.actorId,
          actor_type: entry.actorType,
          action: entry.action,
          resource_type: entry.resourceType,
          resource_id: entry.resourceId,
          details: entry.details,
          ip_address: entry.ipAddress,
          user_agent: entry.userAgent,
          request_id: entry.requestId,
        })
        .select('id')
        .single();

      if (error !== null) {
        throw storageError('insert audit log', error);
      }

      return parseRow(insertedRowSchema, data, 'audit log row');
    },
  };
}
