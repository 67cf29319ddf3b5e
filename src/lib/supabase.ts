/**
 * Supabase Client Configuration
 *
 * Two clients with different jobs:
 * - admin (service key): all table access, RPC, and auth.admin user creation
 * - auth (anon key): password sign-in only, so a signed-in session never
 *   replaces the service key on the admin client
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { Config } from './config.js';

const SERVER_AUTH_OPTIONS = {
  autoRefreshToken: false,
  persistSession: false,
  detectSessionInUrl: false,
};

/**
 * Create a Supabase admin client that bypasses RLS
 * NEVER expose this to user-facing code
 */
export function createSupabaseAdmin(
  config: Pick<Config, 'supabaseUrl' | 'supabaseServiceKey'>
): SupabaseClient {
  return createClient(config.supabaseUrl, config.supabaseServiceKey, {
    auth: SERVER_AUTH_OPTIONS,
  });
}

/**
 * Create a client used only to exchange a password for a session
 */
export function createSupabaseAuthClient(
  config: Pick<Config, 'supabaseUrl' | 'supabaseAnonKey'>
): SupabaseClient {
  return createClient(config.supabaseUrl, config.supabaseAnonKey, {
    auth: SERVER_AUTH_OPTIONS,
  });
}
