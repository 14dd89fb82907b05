/**
 * Supabase client for the technician roster
 *
 * Read-only: the dispatch service only ever selects from the roster table.
 * The client is created lazily so a process without Supabase settings never
 * touches it.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { config, type AppConfig } from './config';

let _rosterClient: SupabaseClient | null = null;

/**
 * Check if the roster database is configured
 */
export function isRosterDBConfigured(appConfig: AppConfig = config): boolean {
  return !!(appConfig.supabaseUrl && appConfig.supabaseServiceRoleKey);
}

function createRosterClient(appConfig: AppConfig): SupabaseClient {
  if (!appConfig.supabaseUrl) {
    throw new Error('SUPABASE_URL not configured');
  }
  if (!appConfig.supabaseServiceRoleKey) {
    throw new Error('SUPABASE_SERVICE_ROLE_KEY not configured');
  }

  return createClient(appConfig.supabaseUrl, appConfig.supabaseServiceRoleKey, {
    auth: { persistSession: false },
  });
}

/**
 * Get the roster database client. Throws if Supabase is not configured.
 */
export function getRosterClient(appConfig: AppConfig = config): SupabaseClient {
  if (!_rosterClient) {
    _rosterClient = createRosterClient(appConfig);
  }
  return _rosterClient;
}

/**
 * Get the roster database URL (masked for logging)
 */
export function getRosterDBUrl(appConfig: AppConfig = config): string {
  if (!appConfig.supabaseUrl) return 'NOT CONFIGURED';
  try {
    const url = new URL(appConfig.supabaseUrl);
    return `${url.protocol}//${url.hostname.substring(0, 12)}...`;
  } catch {
    return 'INVALID URL';
  }
}
