/**
 * Roster API Routes
 */

import { Router, Request, Response } from 'express';
import type { RosterStore } from '../../lib/roster/rosterStore';

export function createRosterRouter(store: RosterStore): Router {
  const router = Router();

  /**
   * GET /api/roster/status
   */
  router.get('/status', (req: Request, res: Response) => {
    res.json(store.status());
  });

  /**
   * POST /api/roster/refresh
   * Force an immediate reload from the roster source
   */
  router.post('/refresh', async (req: Request, res: Response) => {
    console.log('[API] Roster refresh triggered via API');

    try {
      await store.refresh();
      const status = store.status();
      res.json({
        success: true,
        technicianCount: status.technicianCount,
        lastLoadedAt: status.lastLoadedAt,
      });
    } catch (error) {
      // Stale snapshot is still served
      const status = store.status();
      res.status(502).json({
        success: false,
        error: error instanceof Error ? error.message : String(error),
        technicianCount: status.technicianCount,
        lastLoadedAt: status.lastLoadedAt,
      });
    }
  });

  return router;
}
