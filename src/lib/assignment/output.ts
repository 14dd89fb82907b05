/**
 * Wire format for assignment results
 */

import { formatClock } from '../time';
import type { Assignment, AssignmentResult, RejectedJob, SkippedTechnician, TimeStatus } from './models';

export const TO_BE_CONFIRMED_MEMO = 'Time to be confirmed - call customer the day before';

export interface AssignedJobRecord {
  job_id: string;
  technician_id: string;
  date: string;
  service_type: string;
  lat: number;
  lng: number;
  duration_min: number;
  start_time: string | null;
  end_time: string | null;
  time_status: TimeStatus;
  travel_time_minutes: number;
  memo?: string;
}

export interface RejectedJobRecord {
  job_id: string;
  date: string | null;
  service_type: string | null;
  reason: string;
  detail: string;
  missing_fields?: string[];
}

export interface SkippedTechnicianRecord {
  technician_id: string;
  reason: string;
  detail: string;
  missing_fields?: string[];
}

export interface AssignmentSummary {
  total_jobs: number;
  assigned: number;
  failed: number;
  deferred: number;
}

export interface AssignResponse {
  success: true;
  assigned_jobs: AssignedJobRecord[];
  failed_jobs: RejectedJobRecord[];
  deferred_jobs: RejectedJobRecord[];
  skipped_technicians: SkippedTechnicianRecord[];
  summary: AssignmentSummary;
  human_message: string;
}

export function toAssignedRecord(assignment: Assignment): AssignedJobRecord {
  const { job } = assignment;
  const confirmed = assignment.timeStatus !== 'to_be_confirmed';

  const record: AssignedJobRecord = {
    job_id: job.jobId,
    technician_id: assignment.technicianId,
    date: job.date,
    service_type: job.serviceType,
    lat: job.location.lat,
    lng: job.location.lng,
    duration_min: job.durationMin,
    start_time: confirmed ? formatClock(assignment.startMin) : null,
    end_time: confirmed ? formatClock(assignment.endMin) : null,
    time_status: assignment.timeStatus,
    travel_time_minutes: assignment.travelMinutes,
  };

  if (!confirmed) {
    record.memo = TO_BE_CONFIRMED_MEMO;
  }
  return record;
}

export function toRejectedRecord(job: RejectedJob): RejectedJobRecord {
  const record: RejectedJobRecord = {
    job_id: job.jobId,
    date: job.date,
    service_type: job.serviceType,
    reason: job.reason,
    detail: job.detail,
  };
  if (job.missingFields) record.missing_fields = job.missingFields;
  return record;
}

export function toSkippedRecord(technician: SkippedTechnician): SkippedTechnicianRecord {
  const record: SkippedTechnicianRecord = {
    technician_id: technician.technicianId,
    reason: technician.reason,
    detail: technician.detail,
  };
  if (technician.missingFields) record.missing_fields = technician.missingFields;
  return record;
}

export function summarize(result: AssignmentResult): AssignmentSummary {
  return {
    total_jobs: result.assigned.length + result.failed.length + result.deferred.length,
    assigned: result.assigned.length,
    failed: result.failed.length,
    deferred: result.deferred.length,
  };
}

/**
 * Short plain-text report for notifications and logs
 */
export function buildHumanMessage(result: AssignmentResult): string {
  const summary = summarize(result);
  if (summary.total_jobs === 0) {
    return 'No jobs to assign.';
  }

  const lines: string[] = [
    '📋 Assignment summary',
    `- Total jobs: ${summary.total_jobs}`,
    `- Assigned: ${summary.assigned}`,
    `- Failed: ${summary.failed}`,
    `- Deferred (day limit): ${summary.deferred}`,
  ];

  if (result.failed.length > 0) {
    lines.push('', '⚠️ Failed jobs:');
    for (const job of result.failed.slice(0, 5)) {
      lines.push(`  • ${job.jobId}: ${job.reason} (${job.detail})`);
    }
    if (result.failed.length > 5) {
      lines.push(`  ... and ${result.failed.length - 5} more`);
    }
  }

  if (result.deferred.length > 0) {
    lines.push('', '⏰ Deferred to a later run:');
    for (const job of result.deferred.slice(0, 3)) {
      lines.push(`  • ${job.jobId}: ${job.date ?? 'no date'}`);
    }
    if (result.deferred.length > 3) {
      lines.push(`  ... and ${result.deferred.length - 3} more`);
    }
  }

  if (result.skippedTechnicians.length > 0) {
    lines.push('', `⚠️ Skipped technicians: ${result.skippedTechnicians.length}`);
    for (const technician of result.skippedTechnicians.slice(0, 3)) {
      lines.push(`  • ${technician.technicianId}: ${technician.reason}`);
    }
    if (result.skippedTechnicians.length > 3) {
      lines.push(`  ... and ${result.skippedTechnicians.length - 3} more`);
    }
  }

  return lines.join('\n');
}

export function toAssignResponse(result: AssignmentResult): AssignResponse {
  return {
    success: true,
    assigned_jobs: result.assigned.map(toAssignedRecord),
    failed_jobs: result.failed.map(toRejectedRecord),
    deferred_jobs: result.deferred.map(toRejectedRecord),
    skipped_technicians: result.skippedTechnicians.map(toSkippedRecord),
    summary: summarize(result),
    human_message: buildHumanMessage(result),
  };
}

/**
 * Fixed-width console table of a run, one line per job
 */
export function renderAssignmentTable(response: AssignResponse): string {
  const width = 100;
  const lines: string[] = [
    'Job'.padEnd(15) + 'Outcome'.padEnd(12) + 'Technician'.padEnd(15) + 'Date'.padEnd(12) + 'Time'.padEnd(16) + 'Detail',
    '-'.repeat(width),
  ];

  for (const job of response.assigned_jobs) {
    const time = job.start_time && job.end_time ? `${job.start_time}-${job.end_time}` : 'TBC';
    lines.push(
      job.job_id.padEnd(15) +
      'ASSIGNED'.padEnd(12) +
      job.technician_id.padEnd(15) +
      job.date.padEnd(12) +
      time.padEnd(16) +
      `${job.travel_time_minutes} min travel`
    );
  }

  for (const [outcome, jobs] of [['FAILED', response.failed_jobs], ['DEFERRED', response.deferred_jobs]] as const) {
    for (const job of jobs) {
      lines.push(
        job.job_id.padEnd(15) +
        outcome.padEnd(12) +
        '-'.padEnd(15) +
        (job.date ?? '-').padEnd(12) +
        '-'.padEnd(16) +
        job.reason
      );
    }
  }

  return lines.join('\n');
}
