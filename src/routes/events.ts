// =============================================================================
// SEALED RATINGS — Event Log Routes
//
//   GET /api/events         — events after a sequence, ascending
//   GET /api/events/verify  — recompute the hash chain
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { listEvents, verifyEventChain } from '../services/ratings/events';
import { RatingContext } from '../types/context';

const eventsQuery = z.object({
  afterSequence: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export function createEventRoutes(ctx: RatingContext): Router {
  const router = Router();

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = eventsQuery.parse(req.query);
      res.json({ events: await listEvents(ctx, query) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/verify', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await verifyEventChain(ctx));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
