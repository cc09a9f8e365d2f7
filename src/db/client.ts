/**
 * News Reader — Supabase Client
 *
 * Service-role client (bypasses RLS), created on demand from
 * configuration. Importing this module never throws.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseSettings {
  url: string;
  serviceRoleKey: string;
}

// ============================================================
// CLIENT INSTANCES
// ============================================================

/**
 * Admin Supabase client for the article table.
 */
export function createSupabaseClient(settings: SupabaseSettings): SupabaseClient {
  return createClient(settings.url, settings.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

// ============================================================
// ERRORS
// ============================================================

/**
 * Handle Supabase errors consistently
 */
export function handleSupabaseError(error: unknown): Error {
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return new Error(`Supabase error: ${error.message}${code ? ` (code: ${code})` : ''}`, {
      cause: error,
    });
  }
  return new Error('Unknown Supabase error');
}
