import { describe, it, expect, vi, afterEach } from 'vitest';
import { getConfig } from '../src/lib/config';
import { defaultSystemRules, createDistanceProvider, createGeocoder } from '../src/lib/services';
import { UnconfiguredGeocoder, CachingGeocoder } from '../src/lib/geocoding/geocode';
import { formatClock, isIsoDate, parseClock, splitLocalDateTime } from '../src/lib/time';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('getConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = getConfig({});

    expect(config).toMatchObject({
      apiPort: 3001,
      corsOrigin: 'http://localhost:3000',
      kakaoApiKey: '',
      distanceTimeoutMs: 5000,
      distanceMaxRetries: 2,
      distanceRetryBaseMs: 500,
      distanceSentinelMinutes: 9999,
      distanceCacheSize: 500,
      estimateMinutesPerKm: 2,
      geocodeCacheSize: 1000,
      workStart: '09:00',
      workEnd: '18:00',
      maxPreassignDays: 3,
      defaultBufferMin: 30,
      rosterSource: 'none',
      rosterTable: 'technicians',
      rosterRefreshEnabled: true,
      rosterRefreshMinutes: 10,
    });
  });

  it('warns and falls back on malformed numbers and times', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const config = getConfig({ API_PORT: 'abc', WORK_END: '6pm', ESTIMATE_MINUTES_PER_KM: '-1' });

    expect(config.apiPort).toBe(3001);
    expect(config.workEnd).toBe('18:00');
    expect(config.estimateMinutesPerKm).toBe(2);
    expect(warn).toHaveBeenCalledWith('Invalid API_PORT value: abc, using 3001');
  });

  it('keeps the day limit at one or more', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    expect(getConfig({ MAX_PREASSIGN_DAYS: '0' }).maxPreassignDays).toBe(3);
    expect(getConfig({ MAX_PREASSIGN_DAYS: '1' }).maxPreassignDays).toBe(1);
    expect(warn).toHaveBeenCalledWith('Invalid MAX_PREASSIGN_DAYS value: 0, using 3');
  });

  it('infers the roster source', () => {
    expect(getConfig({ ROSTER_CSV_URL: 'https://sheets.test/x.csv' }).rosterSource).toBe('csv');
    expect(getConfig({ SUPABASE_URL: 'https://x.supabase.co', SUPABASE_SERVICE_ROLE_KEY: 'test-secret' }).rosterSource).toBe('supabase');
    expect(getConfig({ ROSTER_SOURCE: 'none', ROSTER_CSV_PATH: 'roster.csv' }).rosterSource).toBe('none');
  });

  it('turns the refresh off only for an explicit false', () => {
    expect(getConfig({ ROSTER_REFRESH_ENABLED: 'false' }).rosterRefreshEnabled).toBe(false);
    expect(getConfig({ ROSTER_REFRESH_ENABLED: '0' }).rosterRefreshEnabled).toBe(true);
  });
});

describe('services', () => {
  it('builds default rules from configuration', () => {
    expect(defaultSystemRules(getConfig({ WORK_START: '08:30', MAX_PREASSIGN_DAYS: '5' }))).toEqual({
      workStart: '08:30',
      workEnd: '18:00',
      maxPreassignDays: 5,
      defaultBufferMin: 30,
    });
  });

  it('uses straight-line estimates and no geocoding without an API key', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const config = getConfig({ ESTIMATE_MINUTES_PER_KM: '1' });

    const provider = createDistanceProvider(config);
    const minutes = await provider.travelMinutes({ lat: 37.5, lng: 127.0 }, { lat: 37.6, lng: 127.0 });

    expect(minutes).toBe(11.1);
    expect(provider.sentinelMinutes).toBe(9999);
    expect(createGeocoder(config)).toBeInstanceOf(UnconfiguredGeocoder);
    expect(createGeocoder(getConfig({ KAKAO_API_KEY: 'test-secret' }))).toBeInstanceOf(CachingGeocoder);
  });
});

describe('time helpers', () => {
  it('parses and formats clock times', () => {
    expect(parseClock('9:05')).toBe(545);
    expect(parseClock('24:00')).toBeNull();
    expect(parseClock('09:60')).toBeNull();
    expect(formatClock(545)).toBe('09:05');
    expect(formatClock(25 * 60 + 30)).toBe('25:30');
  });

  it('validates calendar dates', () => {
    expect(isIsoDate('2028-02-29')).toBe(true);
    expect(isIsoDate('2026-02-29')).toBe(false);
    expect(isIsoDate('2026-3-1')).toBe(false);
  });

  it('splits local date-times', () => {
    expect(splitLocalDateTime('2026-03-02T14:30:00')).toEqual({ date: '2026-03-02', minutes: 870 });
    expect(splitLocalDateTime('2026-03-02 08:15')).toEqual({ date: '2026-03-02', minutes: 495 });
    expect(splitLocalDateTime('yesterday')).toBeNull();
  });
});
