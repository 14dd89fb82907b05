/**
 * Assignment Input Validation
 *
 * Turns raw request records into validated jobs, technicians and state seeds.
 * Top-level shape problems are fatal (InputValidationError). Anything wrong with
 * a single record only affects that record: a bad job is rejected with a
 * field-specific reason, a bad technician is skipped.
 *
 * Address locations are geocoded here so the engine only ever sees coordinates.
 */

import { z } from 'zod';
import { isIsoDate, parseClock, splitLocalDateTime } from '../time';
import { isGeocodeError, toCoordinates, type GeocodeError, type GeocodeResult, type Geocoder } from '../geocoding/geocode';
import {
  DEFAULT_SYSTEM_RULES,
  type Coordinates,
  type Job,
  type LocationInput,
  type RejectedJob,
  type SkippedTechnician,
  type SlotType,
  type SystemRules,
  type Technician,
  type TechnicianStateSeed,
  type TimeInterval,
} from './models';

export class InputValidationError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'InputValidationError';
  }
}

const clockString = z
  .string()
  .refine(value => parseClock(value) !== null, { message: 'must be HH:MM' });

// A number, or a string of digits; booleans, null and empty strings are rejected
const wholeNumber = z
  .union([z.number(), z.string().trim().regex(/^\d+$/, 'must be a whole number')])
  .pipe(z.coerce.number().int());

export const SystemRulesSchema = z
  .object({
    work_start: clockString.optional(),
    work_end: clockString.optional(),
    max_preassign_days: wholeNumber.pipe(z.number().min(1)).optional(),
    default_buffer_min: wholeNumber.pipe(z.number().min(0)).optional(),
  })
  .passthrough();

export const AssignRequestSchema = z.object({
  jobs: z.array(z.unknown()),
  technicians: z.array(z.unknown()).nullish(),
  technician_states: z.array(z.unknown()).nullish(),
  system_rules: SystemRulesSchema.nullish(),
});

export const SingleJobRequestSchema = z.object({
  job: z.record(z.unknown()),
  technicians: z.array(z.unknown()).nullish(),
  system_rules: SystemRulesSchema.nullish(),
});

export type AssignRequest = z.infer<typeof AssignRequestSchema>;
export type SingleJobRequest = z.infer<typeof SingleJobRequestSchema>;

/**
 * Parses a request body against a schema, converting zod issues into an InputValidationError
 */
export function parseRequest<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new InputValidationError('Malformed request body', issues);
  }
  return result.data;
}

/**
 * Resolves system rules: request values, then configured defaults
 */
export function resolveSystemRules(
  raw: z.infer<typeof SystemRulesSchema> | null | undefined,
  defaults: SystemRules = DEFAULT_SYSTEM_RULES
): SystemRules {
  const rules: SystemRules = {
    workStart: raw?.work_start?.trim() ?? defaults.workStart,
    workEnd: raw?.work_end?.trim() ?? defaults.workEnd,
    maxPreassignDays: raw?.max_preassign_days ?? defaults.maxPreassignDays,
    defaultBufferMin: raw?.default_buffer_min ?? defaults.defaultBufferMin,
  };

  const start = parseClock(rules.workStart);
  const end = parseClock(rules.workEnd);
  if (start === null || end === null || start >= end) {
    throw new InputValidationError('Invalid system_rules', [
      `work_start (${rules.workStart}) must be an HH:MM time before work_end (${rules.workEnd})`,
    ]);
  }

  return rules;
}

// ==================== Field readers ====================

type RawRecord = Record<string, unknown>;
const INVALID = 'invalid' as const;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

/**
 * Identifiers and names: strings, or numbers written without quotes
 */
function readString(record: RawRecord, key: string): string | null {
  const value = record[key];
  if (typeof value === 'string') return value.trim() || null;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

function readNumber(record: RawRecord, key: string): number | null | typeof INVALID {
  const value = record[key];
  if (isBlank(value)) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : INVALID;
  if (typeof value === 'string') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : INVALID;
  }
  return INVALID;
}

export function parseBooleanLike(value: unknown): boolean | null | typeof INVALID {
  if (isBlank(value)) return null;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'on', 'yes', 'y'].includes(normalized)) return true;
    if (['false', '0', 'off', 'no', 'n'].includes(normalized)) return false;
  }
  return INVALID;
}

function readServiceTypes(value: unknown): string[] | null | typeof INVALID {
  if (isBlank(value)) return null;

  let items: unknown[];
  if (Array.isArray(value)) {
    items = value;
  } else if (typeof value === 'string') {
    items = value.split(',');
  } else {
    return INVALID;
  }

  const types: string[] = [];
  for (const item of items) {
    if (typeof item !== 'string') return INVALID;
    const trimmed = item.trim();
    if (trimmed && !types.includes(trimmed)) types.push(trimmed);
  }
  return types.length > 0 ? types : null;
}

function isValidCoordinate(lat: number, lng: number): boolean {
  return lat >= -90 && lat <= 90 && lng >= -180 && lng <= 180;
}

/**
 * Reads a location from lat/lng keys, an address key, or a nested location value.
 * Coordinates win when both are present.
 */
function readLocation(
  record: RawRecord,
  keys: { lat: string; lng: string; address: string[] }
): LocationInput | null | typeof INVALID {
  const lat = readNumber(record, keys.lat);
  const lng = readNumber(record, keys.lng);

  if (lat !== null || lng !== null) {
    if (typeof lat === 'number' && typeof lng === 'number' && isValidCoordinate(lat, lng)) {
      return { kind: 'coordinates', lat, lng };
    }
    return INVALID;
  }

  for (const key of keys.address) {
    const value = record[key];
    if (typeof value === 'string' && value.trim()) {
      return { kind: 'address', address: value.trim() };
    }
    if (isRecord(value)) {
      const nested = readLocation(value, { lat: 'lat', lng: 'lng', address: ['address'] });
      if (nested !== null) return nested;
    }
  }

  return null;
}

function readSlotType(value: unknown): SlotType | null {
  if (typeof value !== 'string' || !value.trim()) return null;
  const normalized = value.trim().toUpperCase();
  if (normalized === 'MORNING' || normalized === 'AFTERNOON' || normalized === 'ALLDAY') {
    return normalized;
  }
  return 'ALLDAY';
}

async function resolveLocation(
  location: LocationInput,
  geocoder: Geocoder
): Promise<{ coords: Coordinates } | { error: string }> {
  if (location.kind === 'coordinates') {
    return { coords: { lat: location.lat, lng: location.lng } };
  }

  let result: GeocodeResult | GeocodeError;
  try {
    result = await geocoder.geocode(location.address);
  } catch (error) {
    // One unresolvable address fails its own record, not the run
    const message = error instanceof Error ? error.message : String(error);
    return { error: `Could not resolve address "${location.address}": ${message}` };
  }
  if (isGeocodeError(result)) {
    return { error: `Could not resolve address "${location.address}": ${result.message}` };
  }
  return { coords: toCoordinates(result) };
}

// ==================== Jobs ====================

const UNKNOWN_JOB_ID = 'UNKNOWN';

type JobDraft = Omit<Job, 'location'> & { location: LocationInput };

function rejectJob(
  record: RawRecord | null,
  reason: RejectedJob['reason'],
  detail: string,
  missingFields?: string[]
): RejectedJob {
  const rejected: RejectedJob = {
    jobId: (record && readString(record, 'job_id')) || UNKNOWN_JOB_ID,
    date: record ? readString(record, 'date') : null,
    serviceType: record ? readString(record, 'service_type') : null,
    reason,
    detail,
  };
  if (missingFields && missingFields.length > 0) {
    rejected.missingFields = missingFields;
  }
  return rejected;
}

/**
 * Structural checks for one job record. No I/O.
 */
export function parseJobRecord(raw: unknown, index: number): { ok: true; draft: JobDraft } | { ok: false; rejected: RejectedJob } {
  if (!isRecord(raw)) {
    return { ok: false, rejected: rejectJob(null, 'INVALID_RECORD', `Job at index ${index} is not an object`) };
  }

  const timeFixed = parseBooleanLike(raw.time_fixed);
  const fixedStartRaw = readString(raw, 'fixed_start_time');

  if (timeFixed === true && !fixedStartRaw) {
    return {
      ok: false,
      rejected: rejectJob(raw, 'FIXED_TIME_MISSING', 'time_fixed is true but fixed_start_time is missing', ['fixed_start_time']),
    };
  }

  const jobId = readString(raw, 'job_id');
  const serviceType = readString(raw, 'service_type');
  const date = readString(raw, 'date');
  const duration = readNumber(raw, 'duration_min');
  const location = readLocation(raw, { lat: 'lat', lng: 'lng', address: ['address', 'location'] });

  const missing: string[] = [];
  if (!jobId) missing.push('job_id');
  if (!serviceType) missing.push('service_type');
  if (location === null) missing.push('location');
  if (!date) missing.push('date');
  if (duration === null) missing.push('duration_min');

  if (missing.length > 0) {
    return {
      ok: false,
      rejected: rejectJob(raw, 'MISSING_REQUIRED_FIELD', `Missing required fields: ${missing.join(', ')}`, missing),
    };
  }

  if (location === INVALID || location === null) {
    return { ok: false, rejected: rejectJob(raw, 'INVALID_FIELD', 'location: lat/lng must be valid coordinates') };
  }
  if (!date || !isIsoDate(date)) {
    return { ok: false, rejected: rejectJob(raw, 'INVALID_FIELD', `date: expected YYYY-MM-DD, got "${date}"`) };
  }
  if (duration === INVALID || duration === null || !Number.isInteger(duration) || duration <= 0) {
    return { ok: false, rejected: rejectJob(raw, 'INVALID_FIELD', 'duration_min: must be a positive whole number of minutes') };
  }
  if (timeFixed === INVALID) {
    return { ok: false, rejected: rejectJob(raw, 'INVALID_FIELD', 'time_fixed: must be a boolean') };
  }

  let fixedStartMin: number | null = null;
  if (timeFixed === true && fixedStartRaw) {
    fixedStartMin = parseClock(fixedStartRaw);
    if (fixedStartMin === null) {
      return { ok: false, rejected: rejectJob(raw, 'INVALID_FIELD', `fixed_start_time: expected HH:MM, got "${fixedStartRaw}"`) };
    }
  }

  return {
    ok: true,
    draft: {
      jobId: jobId || UNKNOWN_JOB_ID,
      serviceType: serviceType || '',
      location,
      date,
      durationMin: duration,
      timeFixed: timeFixed === true,
      fixedStartMin,
      slotType: timeFixed === true ? null : readSlotType(raw.slot_type),
      inputIndex: index,
    },
  };
}

/**
 * Validates every job record and geocodes address locations
 */
export async function resolveJobs(
  rawJobs: unknown[],
  geocoder: Geocoder
): Promise<{ jobs: Job[]; rejected: RejectedJob[] }> {
  const jobs: Job[] = [];
  const rejected: RejectedJob[] = [];

  for (let index = 0; index < rawJobs.length; index++) {
    const raw = rawJobs[index];
    const parsed = parseJobRecord(raw, index);
    if (!parsed.ok) {
      rejected.push(parsed.rejected);
      continue;
    }

    const resolved = await resolveLocation(parsed.draft.location, geocoder);
    if ('error' in resolved) {
      rejected.push(rejectJob(isRecord(raw) ? raw : null, 'LOCATION_UNRESOLVED', resolved.error));
      continue;
    }

    jobs.push({ ...parsed.draft, location: resolved.coords });
  }

  return { jobs, rejected };
}

// ==================== Technicians ====================

type TechnicianDraft = Omit<Technician, 'home'> & { home: LocationInput };

function skipTechnician(
  record: RawRecord | null,
  reason: SkippedTechnician['reason'],
  detail: string,
  missingFields?: string[]
): SkippedTechnician {
  const skipped: SkippedTechnician = {
    technicianId: (record && readString(record, 'technician_id')) || 'UNKNOWN',
    reason,
    detail,
  };
  if (missingFields && missingFields.length > 0) {
    skipped.missingFields = missingFields;
  }
  return skipped;
}

export function parseTechnicianRecord(raw: unknown): { ok: true; draft: TechnicianDraft } | { ok: false; skipped: SkippedTechnician } {
  if (!isRecord(raw)) {
    return { ok: false, skipped: skipTechnician(null, 'INVALID_FIELD', 'Technician record is not an object') };
  }

  const technicianId = readString(raw, 'technician_id');
  const home = readLocation(raw, { lat: 'home_lat', lng: 'home_lng', address: ['home_address', 'home_location'] });
  const serviceTypes = readServiceTypes(raw.service_types);
  const overtimeAllowed = parseBooleanLike(raw.overtime_allowed);

  const missing: string[] = [];
  if (!technicianId) missing.push('technician_id');
  if (home === null) missing.push('home_location');
  if (serviceTypes === null) missing.push('service_types');
  if (overtimeAllowed === null) missing.push('overtime_allowed');

  if (missing.length > 0) {
    return {
      ok: false,
      skipped: skipTechnician(raw, 'MISSING_REQUIRED_FIELD', `Missing required fields: ${missing.join(', ')}`, missing),
    };
  }

  if (home === INVALID || home === null) {
    return { ok: false, skipped: skipTechnician(raw, 'INVALID_FIELD', 'home_location: home_lat/home_lng must be valid coordinates') };
  }
  if (serviceTypes === INVALID || serviceTypes === null) {
    return { ok: false, skipped: skipTechnician(raw, 'INVALID_FIELD', 'service_types: must be a list of strings') };
  }
  if (overtimeAllowed === INVALID || overtimeAllowed === null) {
    return { ok: false, skipped: skipTechnician(raw, 'INVALID_FIELD', 'overtime_allowed: must be a boolean') };
  }

  const draft: TechnicianDraft = {
    technicianId: technicianId || 'UNKNOWN',
    home,
    serviceTypes,
    overtimeAllowed,
  };

  const name = readString(raw, 'name');
  const phone = readString(raw, 'phone');
  const area = readString(raw, 'area');
  const priority = readNumber(raw, 'priority');
  if (name) draft.name = name;
  if (phone) draft.phone = phone;
  if (area) draft.area = area;
  if (typeof priority === 'number') draft.priority = priority;

  return { ok: true, draft };
}

/**
 * Validates technicians and geocodes home addresses. Incomplete or duplicate
 * technicians are excluded and reported, never failed per job.
 */
export async function resolveTechnicians(
  rawTechnicians: readonly unknown[],
  geocoder: Geocoder
): Promise<{ technicians: Technician[]; skipped: SkippedTechnician[] }> {
  const technicians: Technician[] = [];
  const skipped: SkippedTechnician[] = [];
  const seen = new Set<string>();

  for (const raw of rawTechnicians) {
    const parsed = parseTechnicianRecord(raw);
    if (!parsed.ok) {
      skipped.push(parsed.skipped);
      continue;
    }

    const { draft } = parsed;
    if (seen.has(draft.technicianId)) {
      skipped.push({
        technicianId: draft.technicianId,
        reason: 'INVALID_FIELD',
        detail: `technician_id: duplicate id ${draft.technicianId}`,
      });
      continue;
    }

    const resolved = await resolveLocation(draft.home, geocoder);
    if ('error' in resolved) {
      skipped.push({ technicianId: draft.technicianId, reason: 'LOCATION_UNRESOLVED', detail: resolved.error });
      continue;
    }

    seen.add(draft.technicianId);
    technicians.push({ ...draft, home: resolved.coords });
  }

  return { technicians, skipped };
}

// ==================== Technician state seeds ====================

function readCommitment(raw: unknown): { date: string; interval: TimeInterval } | null {
  if (!isRecord(raw)) return null;

  const date = readString(raw, 'date');
  const start = readString(raw, 'start_time');
  const end = readString(raw, 'end_time');
  if (!date || !isIsoDate(date) || !start || !end) return null;

  const startMin = parseClock(start);
  const endMin = parseClock(end);
  if (startMin === null || endMin === null || endMin <= startMin) return null;

  const jobId = readString(raw, 'job_id');
  return { date, interval: jobId ? { startMin, endMin, jobId } : { startMin, endMin } };
}

/**
 * Parses optional pre-existing technician commitments. Unusable entries are
 * dropped with a warning; they never fail the run.
 */
export async function resolveStateSeeds(
  rawStates: readonly unknown[],
  geocoder: Geocoder
): Promise<TechnicianStateSeed[]> {
  const seeds: TechnicianStateSeed[] = [];

  for (const raw of rawStates) {
    if (!isRecord(raw)) {
      console.warn('⚠️  Ignoring technician state that is not an object');
      continue;
    }

    const technicianId = readString(raw, 'technician_id');
    if (!technicianId) {
      console.warn('⚠️  Ignoring technician state without technician_id');
      continue;
    }

    let currentLocation: Coordinates | null = null;
    const location = readLocation(raw, { lat: 'last_lat', lng: 'last_lng', address: ['last_address', 'last_location'] });
    if (location === INVALID) {
      console.warn(`⚠️  Ignoring invalid last location for technician ${technicianId}`);
    } else if (location !== null) {
      const resolved = await resolveLocation(location, geocoder);
      if ('error' in resolved) {
        console.warn(`⚠️  ${resolved.error} (technician ${technicianId}), using home location`);
      } else {
        currentLocation = resolved.coords;
      }
    }

    const commitments: TechnicianStateSeed['commitments'] = [];

    const lastEnd = readString(raw, 'last_end_time');
    if (lastEnd) {
      const split = splitLocalDateTime(lastEnd);
      if (split && split.minutes > 0) {
        // Busy from midnight until the previous job ends
        commitments.push({ date: split.date, interval: { startMin: 0, endMin: split.minutes } });
      } else if (!split) {
        console.warn(`⚠️  Ignoring unparseable last_end_time "${lastEnd}" for technician ${technicianId}`);
      }
    }

    const rawCommitments = raw.commitments;
    if (Array.isArray(rawCommitments)) {
      for (const entry of rawCommitments) {
        const commitment = readCommitment(entry);
        if (commitment) {
          commitments.push(commitment);
        } else {
          console.warn(`⚠️  Ignoring malformed commitment for technician ${technicianId}`);
        }
      }
    }

    seeds.push({ technicianId, currentLocation, commitments });
  }

  return seeds;
}
