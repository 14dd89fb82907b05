/**
 * Assignment data model.
 *
 * Jobs and technicians are input-only. TechnicianState is the only thing an
 * assignment run mutates, and it lives for exactly one run.
 */

export type Coordinates = { lat: number; lng: number };

/**
 * Where a job or a technician's home is, before geocoding
 */
export type LocationInput =
  | { kind: 'coordinates'; lat: number; lng: number }
  | { kind: 'address'; address: string };

export type SlotType = 'MORNING' | 'AFTERNOON' | 'ALLDAY';

export interface Job {
  jobId: string;
  serviceType: string;
  location: Coordinates;
  date: string; // YYYY-MM-DD
  durationMin: number;
  timeFixed: boolean;
  fixedStartMin: number | null; // minutes from midnight, set iff timeFixed
  slotType: SlotType | null;
  inputIndex: number; // position in the request, keeps sort stable
}

export interface Technician {
  technicianId: string;
  home: Coordinates;
  serviceTypes: string[];
  overtimeAllowed: boolean;
  name?: string;
  phone?: string;
  area?: string;
  priority?: number;
}

export interface SystemRules {
  workStart: string; // HH:MM
  workEnd: string; // HH:MM
  maxPreassignDays: number;
  defaultBufferMin: number;
}

export const DEFAULT_SYSTEM_RULES: SystemRules = {
  workStart: '09:00',
  workEnd: '18:00',
  maxPreassignDays: 3,
  defaultBufferMin: 30,
};

/**
 * Half-open [startMin, endMin) interval on one date
 */
export interface TimeInterval {
  startMin: number;
  endMin: number;
  jobId?: string;
}

/**
 * Pre-existing commitments handed in by the caller
 */
export interface TechnicianStateSeed {
  technicianId: string;
  currentLocation: Coordinates | null;
  commitments: Array<{ date: string; interval: TimeInterval }>;
}

export interface TechnicianState {
  technicianId: string;
  currentLocation: Coordinates;
  commitmentsByDate: Map<string, TimeInterval[]>;
  assignedDates: Set<string>;
}

export type TimeStatus = 'fixed' | 'estimated' | 'to_be_confirmed';

export interface Assignment {
  readonly job: Job;
  readonly technicianId: string;
  readonly startMin: number;
  readonly endMin: number;
  readonly timeStatus: TimeStatus;
  readonly travelMinutes: number;
}

export type JobFailureReason =
  | 'FIXED_TIME_MISSING'
  | 'MISSING_REQUIRED_FIELD'
  | 'INVALID_FIELD'
  | 'INVALID_RECORD'
  | 'LOCATION_UNRESOLVED'
  | 'SERVICE_TYPE_MISMATCH'
  | 'NO_TECHNICIAN_AVAILABLE'
  | 'OVERTIME_NOT_ALLOWED'
  | 'TIME_CONFLICT';

export type JobDeferralReason = 'MAX_PREASSIGN_DAYS_EXCEEDED';

/**
 * A job that did not get a technician. Carries whatever identifying fields the
 * input had, since a rejected record may be incomplete.
 */
export interface RejectedJob {
  jobId: string;
  date: string | null;
  serviceType: string | null;
  reason: JobFailureReason | JobDeferralReason;
  detail: string;
  missingFields?: string[];
}

export type TechnicianSkipReason = 'MISSING_REQUIRED_FIELD' | 'INVALID_FIELD' | 'LOCATION_UNRESOLVED';

export interface SkippedTechnician {
  technicianId: string;
  reason: TechnicianSkipReason;
  detail: string;
  missingFields?: string[];
}

export interface AssignmentResult {
  assigned: Assignment[];
  failed: RejectedJob[];
  deferred: RejectedJob[];
  skippedTechnicians: SkippedTechnician[];
}

export function canHandleService(technician: Technician, serviceType: string): boolean {
  return technician.serviceTypes.includes(serviceType);
}
