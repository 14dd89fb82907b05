import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../src/api/app';
import { RosterStore } from '../src/lib/roster/rosterStore';
import type { RosterSource, TechnicianRecord } from '../src/lib/roster/sources';
import type { ServiceDeps } from '../src/lib/services';
import { FakeDistanceProvider, FakeGeocoder, job, technician } from './helpers/fakes';

class SwitchableSource implements RosterSource {
  readonly kind = 'csv' as const;
  records: TechnicianRecord[] = [
    { technician_id: 'R1', service_types: ['입주청소'], overtime_allowed: true, home_lat: 37.5, home_lng: 127.0 },
  ];
  failure: string | null = null;

  async load(): Promise<TechnicianRecord[]> {
    if (this.failure) throw new Error(this.failure);
    return this.records;
  }
}

const source = new SwitchableSource();
const deps: ServiceDeps = {
  rosterStore: new RosterStore(source),
  distance: new FakeDistanceProvider(),
  geocoder: new FakeGeocoder(),
  defaultRules: { workStart: '09:00', workEnd: '18:00', maxPreassignDays: 3, defaultBufferMin: 30 },
  sentinelMinutes: 9999,
};

let server: Server;
let baseUrl = '';

beforeAll(async () => {
  await deps.rosterStore.init();
  server = createApp(deps, 'http://localhost:3000').listen(0);
  await new Promise<void>(resolve => server.once('listening', () => resolve()));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('Server is not listening on a TCP port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
});

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  source.failure = null;
});

afterEach(() => {
  vi.restoreAllMocks();
});

function post(path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

describe('GET /api/health', () => {
  it('reports the roster snapshot', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'ok',
      roster: { loaded: true, technicianCount: 1, source: 'csv' },
    });
  });
});

describe('POST /api/assign', () => {
  it('assigns jobs against the supplied technicians', async () => {
    const res = await post('/api/assign', {
      jobs: [job('J1', { time_fixed: true, fixed_start_time: '10:00' })],
      technicians: [technician('T1')],
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      summary: { total_jobs: 1, assigned: 1, failed: 0, deferred: 0 },
      assigned_jobs: [
        {
          job_id: 'J1',
          technician_id: 'T1',
          start_time: '10:00',
          end_time: '12:00',
          time_status: 'fixed',
          travel_time_minutes: 0,
        },
      ],
    });
  });

  it('falls back to the roster snapshot', async () => {
    const res = await post('/api/assign', { jobs: [job('J1', { time_fixed: true, fixed_start_time: '10:00' })] });
    expect(await res.json()).toMatchObject({ assigned_jobs: [{ job_id: 'J1', technician_id: 'R1' }] });
  });

  it('reports failed records in the response', async () => {
    const res = await post('/api/assign', {
      jobs: [job('J1', { date: undefined })],
      technicians: [technician('T1')],
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      assigned_jobs: [],
      failed_jobs: [
        {
          job_id: 'J1',
          date: null,
          service_type: '입주청소',
          reason: 'MISSING_REQUIRED_FIELD',
          detail: 'Missing required fields: date',
          missing_fields: ['date'],
        },
      ],
    });
  });

  it('rejects a request with no technicians', async () => {
    const res = await post('/api/assign', { jobs: [job('J1')], technicians: [] });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: 'No technicians available',
      details: ['1 job(s) could not be assigned'],
    });
  });

  it('rejects a malformed body', async () => {
    const res = await post('/api/assign', { jobs: 'J1' });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: 'Malformed request body',
      details: ['jobs: Expected array, received string'],
    });
  });

  it('rejects invalid system rules', async () => {
    const res = await post('/api/assign', {
      jobs: [job('J1')],
      technicians: [technician('T1')],
      system_rules: { work_start: '18:00', work_end: '09:00' },
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ success: false, error: 'Invalid system_rules' });
  });

  it('answers unparseable JSON with 400', async () => {
    const res = await post('/api/assign', '{"jobs": [');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: true });
  });
});

describe('POST /api/assign/single', () => {
  it('returns the nearest technician', async () => {
    const res = await post('/api/assign/single', {
      job: job('J1', { lng: 127.05, slot_type: 'AFTERNOON' }),
      technicians: [technician('FAR', { home_lat: 38.0 }), technician('NEAR', { name: 'Kim' })],
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      technician: { technician_id: 'NEAR', name: 'Kim', phone: null, area: null },
      assignment: {
        job_id: 'J1',
        technician_id: 'NEAR',
        start_time: null,
        time_status: 'to_be_confirmed',
        travel_time_minutes: 5,
      },
    });
  });

  it('rejects an invalid job with 422', async () => {
    const res = await post('/api/assign/single', { job: job('J1', { date: undefined }), technicians: [technician('T1')] });

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      success: false,
      error: { code: 'MISSING_REQUIRED_FIELD', message: 'Missing required fields: date' },
    });
  });

  it('reports when nobody offers the service', async () => {
    const res = await post('/api/assign/single', {
      job: job('J1', { service_type: '사무실청소' }),
      technicians: [technician('T1')],
    });
    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ success: false, error: { code: 'SERVICE_TYPE_MISMATCH' } });
  });
});

describe('roster routes', () => {
  it('reloads the roster on demand', async () => {
    const res = await post('/api/roster/refresh', {});
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ success: true, technicianCount: 1 });
  });

  it('keeps serving the stale roster when a reload fails', async () => {
    source.failure = 'sheet offline';

    const res = await post('/api/roster/refresh', {});

    expect(res.status).toBe(502);
    expect(await res.json()).toMatchObject({ success: false, error: 'sheet offline', technicianCount: 1 });

    const status = await fetch(`${baseUrl}/api/roster/status`);
    expect(await status.json()).toMatchObject({ loaded: true, technicianCount: 1, lastError: 'sheet offline' });
  });
});
