/**
 * Centralized Configuration Module
 *
 * Reads environment variables with sensible defaults.
 * Provides typed configuration object for the entire application.
 */

import dotenv from 'dotenv';

dotenv.config();

export type RosterSourceKind = 'supabase' | 'csv' | 'none';

export interface AppConfig {
  // API Server Configuration
  apiPort: number;
  corsOrigin: string;

  // Kakao APIs (directions + address search)
  kakaoApiKey: string;
  kakaoDirectionsUrl: string;
  kakaoGeocodeUrl: string;

  // Travel Time Configuration
  distanceTimeoutMs: number;
  distanceMaxRetries: number;
  distanceRetryBaseMs: number;
  distanceSentinelMinutes: number;
  distanceCacheSize: number;
  estimateMinutesPerKm: number;
  geocodeCacheSize: number;

  // System rule defaults (overridable per request)
  workStart: string;
  workEnd: string;
  maxPreassignDays: number;
  defaultBufferMin: number;

  // Roster Configuration
  rosterSource: RosterSourceKind;
  rosterCsvUrl: string;
  rosterCsvPath: string;
  supabaseUrl: string;
  supabaseServiceRoleKey: string;
  rosterTable: string;
  rosterRefreshEnabled: boolean;
  rosterRefreshMinutes: number;
}

type Env = Record<string, string | undefined>;

/**
 * Parse an integer no smaller than min, falling back to the default on garbage
 */
function parseIntOr(value: string | undefined, fallback: number, name: string, min = 0): number {
  if (value === undefined || value.trim() === '') return fallback;

  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < min) {
    console.warn(`Invalid ${name} value: ${value}, using ${fallback}`);
    return fallback;
  }
  return parsed;
}

function parseFloatOr(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') return fallback;

  const parsed = parseFloat(value);
  if (Number.isNaN(parsed) || parsed <= 0) {
    console.warn(`Invalid ${name} value: ${value}, using ${fallback}`);
    return fallback;
  }
  return parsed;
}

/**
 * Validate HH:mm format, defaulting when the value is missing or malformed
 */
function parseClock(value: string | undefined, fallback: string, name: string): string {
  if (!value || value.trim() === '') return fallback;

  const trimmed = value.trim();
  if (!/^\d{1,2}:\d{2}$/.test(trimmed)) {
    console.warn(`Invalid ${name} format: ${value}, using ${fallback}`);
    return fallback;
  }
  return trimmed;
}

/**
 * Roster source, inferred from whichever source is configured when not set explicitly
 */
function parseRosterSource(env: Env): RosterSourceKind {
  const explicit = (env.ROSTER_SOURCE || '').toLowerCase().trim();
  if (explicit === 'supabase' || explicit === 'csv' || explicit === 'none') return explicit;

  if (explicit) {
    console.warn(`Unknown ROSTER_SOURCE value: ${env.ROSTER_SOURCE}, inferring from environment`);
  }

  if (env.ROSTER_CSV_URL || env.ROSTER_CSV_PATH) return 'csv';
  if (env.SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY) return 'supabase';
  return 'none';
}

/**
 * Get configuration object with validation
 */
export function getConfig(env: Env = process.env): AppConfig {
  const kakaoApiKey = env.KAKAO_API_KEY || '';

  return {
    apiPort: parseIntOr(env.API_PORT, 3001, 'API_PORT'),
    corsOrigin: env.CORS_ORIGIN || 'http://localhost:3000',
    kakaoApiKey,
    kakaoDirectionsUrl: env.KAKAO_DIRECTIONS_URL || 'https://apis-navi.kakaomobility.com/v1/directions',
    kakaoGeocodeUrl: env.KAKAO_GEOCODE_URL || 'https://dapi.kakao.com/v2/local/search/address.json',
    distanceTimeoutMs: parseIntOr(env.DISTANCE_TIMEOUT_MS, 5000, 'DISTANCE_TIMEOUT_MS'),
    distanceMaxRetries: parseIntOr(env.DISTANCE_MAX_RETRIES, 2, 'DISTANCE_MAX_RETRIES'),
    distanceRetryBaseMs: parseIntOr(env.DISTANCE_RETRY_BASE_MS, 500, 'DISTANCE_RETRY_BASE_MS'),
    distanceSentinelMinutes: parseIntOr(env.DISTANCE_SENTINEL_MINUTES, 9999, 'DISTANCE_SENTINEL_MINUTES'),
    distanceCacheSize: parseIntOr(env.DISTANCE_CACHE_SIZE, 500, 'DISTANCE_CACHE_SIZE'),
    estimateMinutesPerKm: parseFloatOr(env.ESTIMATE_MINUTES_PER_KM, 2.0, 'ESTIMATE_MINUTES_PER_KM'),
    geocodeCacheSize: parseIntOr(env.GEOCODE_CACHE_SIZE, 1000, 'GEOCODE_CACHE_SIZE'),
    workStart: parseClock(env.WORK_START, '09:00', 'WORK_START'),
    workEnd: parseClock(env.WORK_END, '18:00', 'WORK_END'),
    maxPreassignDays: parseIntOr(env.MAX_PREASSIGN_DAYS, 3, 'MAX_PREASSIGN_DAYS', 1),
    defaultBufferMin: parseIntOr(env.DEFAULT_BUFFER_MIN, 30, 'DEFAULT_BUFFER_MIN'),
    rosterSource: parseRosterSource(env),
    rosterCsvUrl: env.ROSTER_CSV_URL || '',
    rosterCsvPath: env.ROSTER_CSV_PATH || '',
    supabaseUrl: env.SUPABASE_URL || '',
    supabaseServiceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY || '',
    rosterTable: env.ROSTER_TABLE || 'technicians',
    rosterRefreshEnabled: env.ROSTER_REFRESH_ENABLED !== 'false',
    rosterRefreshMinutes: parseIntOr(env.ROSTER_REFRESH_MINUTES, 10, 'ROSTER_REFRESH_MINUTES'),
  };
}

// Export singleton config instance
export const config = getConfig();
