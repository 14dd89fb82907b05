/**
 * Assignment API Routes
 *
 * Batch assignment for a set of jobs, and interactive single-job selection.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { assign } from '../../lib/assignment/engine';
import { selectTechnician } from '../../lib/assignment/selector';
import { toAssignedRecord, toAssignResponse } from '../../lib/assignment/output';
import {
  AssignRequestSchema,
  InputValidationError,
  parseRequest,
  resolveJobs,
  resolveSystemRules,
  resolveTechnicians,
  SingleJobRequestSchema,
} from '../../lib/assignment/validation';
import type { ServiceDeps } from '../../lib/services';

function sendValidationError(res: Response, error: InputValidationError): void {
  res.status(400).json({
    success: false,
    error: error.message,
    details: error.issues,
  });
}

export function createAssignmentRouter(deps: ServiceDeps): Router {
  const router = Router();

  /**
   * POST /api/assign
   * Assign a batch of jobs. Technicians default to the roster snapshot.
   */
  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseRequest(AssignRequestSchema, req.body);
      const rules = resolveSystemRules(body.system_rules, deps.defaultRules);

      // Taken once; a roster refresh during this run does not affect it
      const technicians = body.technicians ?? deps.rosterStore.currentRoster();

      if (technicians.length === 0) {
        return res.status(400).json({
          success: false,
          error: 'No technicians available',
          details: [`${body.jobs.length} job(s) could not be assigned`],
        });
      }

      console.log(`[API] Assigning ${body.jobs.length} jobs across ${technicians.length} technicians`);

      const result = await assign(
        {
          jobs: body.jobs,
          technicians,
          technicianStates: body.technician_states ?? [],
          rules,
        },
        {
          distance: deps.distance,
          geocoder: deps.geocoder,
          sentinelMinutes: deps.sentinelMinutes,
        }
      );

      res.json(toAssignResponse(result));
    } catch (error) {
      if (error instanceof InputValidationError) {
        return sendValidationError(res, error);
      }
      console.error('[API] Error running assignment:', error);
      next(error);
    }
  });

  /**
   * POST /api/assign/single
   * Best technician for one job, with no state carried between calls
   */
  router.post('/single', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseRequest(SingleJobRequestSchema, req.body);
      const rules = resolveSystemRules(body.system_rules, deps.defaultRules);

      const { jobs, rejected } = await resolveJobs([body.job], deps.geocoder);
      const job = jobs[0];
      if (!job) {
        const reason = rejected[0];
        return res.status(422).json({
          success: false,
          error: {
            code: reason ? reason.reason : 'INVALID_RECORD',
            message: reason ? reason.detail : 'Job could not be validated',
          },
        });
      }

      const { technicians } = await resolveTechnicians(
        body.technicians ?? deps.rosterStore.currentRoster(),
        deps.geocoder
      );

      const selection = await selectTechnician(job, technicians, rules, deps.distance, deps.sentinelMinutes);

      if (!selection.ok) {
        return res.status(422).json({
          success: false,
          error: { code: selection.reason, message: selection.message },
        });
      }

      const { technician, assignment } = selection;
      res.json({
        success: true,
        technician: {
          technician_id: technician.technicianId,
          name: technician.name ?? null,
          phone: technician.phone ?? null,
          area: technician.area ?? null,
        },
        assignment: toAssignedRecord(assignment),
      });
    } catch (error) {
      if (error instanceof InputValidationError) {
        return sendValidationError(res, error);
      }
      console.error('[API] Error selecting technician:', error);
      next(error);
    }
  });

  return router;
}
