/**
 * Assignment Engine
 *
 * Greedy, per-day placement of cleaning jobs onto technicians:
 * 1. Validate jobs and technicians, resolving every location to coordinates
 * 2. Sort jobs by date, then fixed start (unfixed last, input order kept)
 * 3. For each job: filter by service type and day limit, look up travel for
 *    all candidates in parallel, place the job, reject conflicts and
 *    disallowed overtime, pick the lowest travel time (ties by technician id)
 * 4. Commit the winner's interval, date and location before the next job
 *
 * TechnicianState is created per run and never shared between runs.
 */

import { parseClock } from '../time';
import { UnconfiguredGeocoder, type Geocoder } from '../geocoding/geocode';
import { DEFAULT_SENTINEL_MINUTES, type DistanceProvider } from '../travel/distanceProvider';
import { resolveJobs, resolveStateSeeds, resolveTechnicians } from './validation';
import {
  canHandleService,
  type Assignment,
  type AssignmentResult,
  type Job,
  type RejectedJob,
  type SlotType,
  type SystemRules,
  type Technician,
  type TechnicianState,
  type TechnicianStateSeed,
  type TimeInterval,
  type TimeStatus,
} from './models';

const NOON_MIN = 12 * 60;

export interface AssignmentDeps {
  distance: DistanceProvider;
  geocoder?: Geocoder;
  /** Travel times at or above this are treated as unknown */
  sentinelMinutes?: number;
}

export interface AssignmentInput {
  jobs: readonly unknown[];
  technicians: readonly unknown[];
  technicianStates?: readonly unknown[];
  rules: SystemRules;
}

export interface ResolvedRules {
  workStartMin: number;
  workEndMin: number;
  maxPreassignDays: number;
  bufferMin: number;
}

export type CandidateOutcome =
  | { ok: true; startMin: number; endMin: number; timeStatus: TimeStatus }
  | { ok: false; reason: 'TIME_CONFLICT' | 'OVERTIME_NOT_ALLOWED' };

/**
 * Runs one full assignment from raw request records
 */
export async function assign(input: AssignmentInput, deps: AssignmentDeps): Promise<AssignmentResult> {
  const geocoder = deps.geocoder ?? new UnconfiguredGeocoder();

  const { jobs, rejected } = await resolveJobs([...input.jobs], geocoder);
  const { technicians, skipped } = await resolveTechnicians(input.technicians, geocoder);
  const seeds = await resolveStateSeeds(input.technicianStates ?? [], geocoder);

  if (skipped.length > 0) {
    console.log(`⚠️  Skipped ${skipped.length} technician(s) with incomplete data`);
  }

  const placement = await placeJobs(jobs, technicians, seeds, input.rules, deps.distance, {
    sentinelMinutes: deps.sentinelMinutes,
  });

  const result: AssignmentResult = {
    assigned: placement.assigned,
    failed: [...rejected, ...placement.failed],
    deferred: placement.deferred,
    skippedTechnicians: skipped,
  };

  console.log(
    `✅ Assignment run: ${result.assigned.length} assigned, ${result.failed.length} failed, ${result.deferred.length} deferred`
  );

  return result;
}

/**
 * Places already-validated jobs. Every job ends up in exactly one of the three buckets.
 */
export async function placeJobs(
  jobs: readonly Job[],
  technicians: readonly Technician[],
  seeds: readonly TechnicianStateSeed[],
  rules: SystemRules,
  distance: DistanceProvider,
  options: { sentinelMinutes?: number } = {}
): Promise<Pick<AssignmentResult, 'assigned' | 'failed' | 'deferred'>> {
  const resolved = resolveRules(rules);
  const sentinel = options.sentinelMinutes ?? DEFAULT_SENTINEL_MINUTES;
  const states = initStates(technicians, seeds);

  const assigned: Assignment[] = [];
  const failed: RejectedJob[] = [];
  const deferred: RejectedJob[] = [];

  for (const job of sortJobs(jobs)) {
    if (technicians.length === 0) {
      failed.push(rejection(job, 'NO_TECHNICIAN_AVAILABLE', 'No technicians available'));
      continue;
    }

    const eligible = technicians.filter(t => canHandleService(t, job.serviceType));
    if (eligible.length === 0) {
      failed.push(rejection(job, 'SERVICE_TYPE_MISMATCH', `No technician offers service type "${job.serviceType}"`));
      continue;
    }

    const candidates = eligible.filter(t => withinDayLimit(stateOf(states, t), job.date, resolved.maxPreassignDays));
    if (candidates.length === 0) {
      deferred.push(
        rejection(
          job,
          'MAX_PREASSIGN_DAYS_EXCEEDED',
          `Every eligible technician already has ${resolved.maxPreassignDays} scheduled day(s)`
        )
      );
      continue;
    }

    // All lookups for this job finish before anything is selected
    const travelTimes = await Promise.all(
      candidates.map(t => distance.travelMinutes(stateOf(states, t).currentLocation, job.location))
    );

    const survivors: Array<{ technician: Technician; travel: number; outcome: Extract<CandidateOutcome, { ok: true }> }> = [];
    let overtimeRejected = 0;
    let conflictRejected = 0;

    candidates.forEach((technician, index) => {
      const travel = travelTimes[index];
      const commitments = stateOf(states, technician).commitmentsByDate.get(job.date) ?? [];
      const outcome = evaluateCandidate(job, technician, travel, commitments, resolved, sentinel);
      if (outcome.ok) {
        survivors.push({ technician, travel, outcome });
      } else if (outcome.reason === 'OVERTIME_NOT_ALLOWED') {
        overtimeRejected++;
      } else {
        conflictRejected++;
      }
    });

    if (survivors.length === 0) {
      failed.push(
        overtimeRejected > 0
          ? rejection(job, 'OVERTIME_NOT_ALLOWED', `Job would end after ${rules.workEnd} and no candidate allows overtime`)
          : rejection(job, 'TIME_CONFLICT', `All ${conflictRejected} candidate(s) have conflicting commitments on ${job.date}`)
      );
      continue;
    }

    survivors.sort((a, b) => a.travel - b.travel || compareIds(a.technician.technicianId, b.technician.technicianId));
    const winner = survivors[0];

    const state = stateOf(states, winner.technician);
    commit(state, job, { startMin: winner.outcome.startMin, endMin: winner.outcome.endMin, jobId: job.jobId });

    assigned.push({
      job,
      technicianId: winner.technician.technicianId,
      startMin: winner.outcome.startMin,
      endMin: winner.outcome.endMin,
      timeStatus: winner.outcome.timeStatus,
      travelMinutes: winner.travel,
    });
  }

  return { assigned, failed, deferred };
}

/**
 * Decides when one technician would do one job, or why they can't.
 * `commitments` are the technician's intervals on the job's date, sorted by start.
 */
export function evaluateCandidate(
  job: Job,
  technician: Technician,
  travelMinutes: number,
  commitments: readonly TimeInterval[],
  rules: ResolvedRules,
  sentinelMinutes: number = DEFAULT_SENTINEL_MINUTES
): CandidateOutcome {
  let startMin: number;
  let timeStatus: TimeStatus;

  if (job.timeFixed && job.fixedStartMin !== null) {
    startMin = job.fixedStartMin;
    timeStatus = 'fixed';
  } else {
    const travel = travelMinutes < sentinelMinutes ? travelMinutes : 0;
    startMin = findEarliestStart(commitments, slotStart(job.slotType, rules), job.durationMin, rules.bufferMin, travel);
    timeStatus = commitments.length === 0 ? 'to_be_confirmed' : 'estimated';
  }

  const endMin = startMin + job.durationMin;

  if (commitments.some(c => overlaps(startMin, endMin, c, rules.bufferMin))) {
    return { ok: false, reason: 'TIME_CONFLICT' };
  }
  if (endMin > rules.workEndMin && !technician.overtimeAllowed) {
    return { ok: false, reason: 'OVERTIME_NOT_ALLOWED' };
  }

  return { ok: true, startMin, endMin, timeStatus };
}

/**
 * Earliest start at or after windowStart that clears every commitment by the buffer.
 * Moving past a commitment also adds the travel time to the new job.
 */
export function findEarliestStart(
  commitments: readonly TimeInterval[],
  windowStart: number,
  durationMin: number,
  bufferMin: number,
  travelMinutes: number
): number {
  let start = windowStart;
  for (const commitment of commitments) {
    if (start + durationMin + bufferMin <= commitment.startMin) break;
    if (start < commitment.endMin + bufferMin) {
      start = Math.max(start, commitment.endMin + bufferMin + travelMinutes);
    }
  }
  return start;
}

/**
 * Half-open overlap with the buffer applied on both sides
 */
export function overlaps(startMin: number, endMin: number, other: TimeInterval, bufferMin: number): boolean {
  return startMin < other.endMin + bufferMin && other.startMin < endMin + bufferMin;
}

/**
 * Where the earliest-start search begins for a slot hint. The hint is soft: a job
 * that no longer fits inside its slot moves to the next feasible time that day.
 */
export function slotStart(slotType: SlotType | null, rules: ResolvedRules): number {
  return slotType === 'AFTERNOON' ? Math.max(NOON_MIN, rules.workStartMin) : rules.workStartMin;
}

export function resolveRules(rules: SystemRules): ResolvedRules {
  const workStartMin = parseClock(rules.workStart);
  const workEndMin = parseClock(rules.workEnd);
  if (workStartMin === null || workEndMin === null) {
    throw new Error(`Invalid working hours: ${rules.workStart}-${rules.workEnd}`);
  }
  return {
    workStartMin,
    workEndMin,
    maxPreassignDays: rules.maxPreassignDays,
    bufferMin: rules.defaultBufferMin,
  };
}

/**
 * Date, then fixed start; unfixed jobs after fixed ones; input order breaks ties
 */
export function sortJobs(jobs: readonly Job[]): Job[] {
  return [...jobs].sort((a, b) => {
    if (a.date !== b.date) return a.date < b.date ? -1 : 1;
    const aKey = a.fixedStartMin ?? Number.POSITIVE_INFINITY;
    const bKey = b.fixedStartMin ?? Number.POSITIVE_INFINITY;
    if (aKey !== bKey) return aKey < bKey ? -1 : 1;
    return a.inputIndex - b.inputIndex;
  });
}

export function withinDayLimit(state: TechnicianState, date: string, maxDays: number): boolean {
  const days = state.assignedDates.has(date) ? state.assignedDates.size : state.assignedDates.size + 1;
  return days <= maxDays;
}

export function initStates(
  technicians: readonly Technician[],
  seeds: readonly TechnicianStateSeed[]
): Map<string, TechnicianState> {
  const states = new Map<string, TechnicianState>();
  for (const technician of technicians) {
    states.set(technician.technicianId, {
      technicianId: technician.technicianId,
      currentLocation: technician.home,
      commitmentsByDate: new Map(),
      assignedDates: new Set(),
    });
  }

  for (const seed of seeds) {
    const state = states.get(seed.technicianId);
    if (!state) continue; // not on this run's roster

    if (seed.currentLocation) {
      state.currentLocation = seed.currentLocation;
    }
    for (const { date, interval } of seed.commitments) {
      insertInterval(state, date, interval);
    }
  }

  return states;
}

function commit(state: TechnicianState, job: Job, interval: TimeInterval): void {
  insertInterval(state, job.date, interval);
  state.currentLocation = job.location;
}

function insertInterval(state: TechnicianState, date: string, interval: TimeInterval): void {
  const list = state.commitmentsByDate.get(date) ?? [];
  list.push(interval);
  list.sort((a, b) => a.startMin - b.startMin || a.endMin - b.endMin);
  state.commitmentsByDate.set(date, list);
  state.assignedDates.add(date);
}

function stateOf(states: Map<string, TechnicianState>, technician: Technician): TechnicianState {
  const state = states.get(technician.technicianId);
  if (!state) {
    throw new Error(`No state for technician ${technician.technicianId}`);
  }
  return state;
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function rejection(job: Job, reason: RejectedJob['reason'], detail: string): RejectedJob {
  return {
    jobId: job.jobId,
    date: job.date,
    serviceType: job.serviceType,
    reason,
    detail,
  };
}
