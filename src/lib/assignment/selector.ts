import { DEFAULT_SENTINEL_MINUTES, type DistanceProvider } from '../travel/distanceProvider';
import { evaluateCandidate, resolveRules } from './engine';
import {
  canHandleService,
  type Assignment,
  type Job,
  type JobFailureReason,
  type SystemRules,
  type Technician,
} from './models';

export type SelectionResult =
  | { ok: true; technician: Technician; assignment: Assignment }
  | { ok: false; reason: JobFailureReason; message: string };

/**
 * Picks the best technician for a single job against fresh state: travel from
 * home, no existing commitments and no day limit. Nothing is remembered between calls.
 */
export async function selectTechnician(
  job: Job,
  technicians: readonly Technician[],
  rules: SystemRules,
  distance: DistanceProvider,
  sentinelMinutes: number = DEFAULT_SENTINEL_MINUTES
): Promise<SelectionResult> {
  if (technicians.length === 0) {
    return { ok: false, reason: 'NO_TECHNICIAN_AVAILABLE', message: 'No technicians available' };
  }

  const eligible = technicians.filter(t => canHandleService(t, job.serviceType));
  if (eligible.length === 0) {
    return {
      ok: false,
      reason: 'SERVICE_TYPE_MISMATCH',
      message: `No technician offers service type "${job.serviceType}"`,
    };
  }

  const resolved = resolveRules(rules);
  const travelTimes = await Promise.all(eligible.map(t => distance.travelMinutes(t.home, job.location)));

  let best: { technician: Technician; assignment: Assignment } | null = null;

  for (let index = 0; index < eligible.length; index++) {
    const technician = eligible[index];
    const travel = travelTimes[index];
    const outcome = evaluateCandidate(job, technician, travel, [], resolved, sentinelMinutes);
    if (!outcome.ok) continue;

    const better =
      best === null ||
      travel < best.assignment.travelMinutes ||
      (travel === best.assignment.travelMinutes && technician.technicianId < best.technician.technicianId);

    if (better) {
      best = {
        technician,
        assignment: {
          job,
          technicianId: technician.technicianId,
          startMin: outcome.startMin,
          endMin: outcome.endMin,
          timeStatus: outcome.timeStatus,
          travelMinutes: travel,
        },
      };
    }
  }

  if (best === null) {
    return {
      ok: false,
      reason: 'OVERTIME_NOT_ALLOWED',
      message: `Job would end after ${rules.workEnd} and no eligible technician allows overtime`,
    };
  }

  return { ok: true, ...best };
}
