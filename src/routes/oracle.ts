// =============================================================================
// SEALED RATINGS — Oracle Routes
//
//   POST /api/oracle/callback  — decryption callback (no token; the proof
//                                authenticates the relay)
//   GET  /api/oracle/pending   — pending requests (auditor, admin)
//   POST /api/oracle/expire    — expire stale requests (admin)
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { config } from '../config';
import { authenticate } from '../middleware/authenticate';
import { authorize } from '../middleware/access-policy';
import {
  RATING_CALLBACK_SELECTOR,
  expirePendingRequests,
  listPendingRequests,
  onDecryptionCallback,
} from '../services/ratings/correlation';
import { RatingContext } from '../types/context';
import { presentOutcome } from './presenters';

const callbackBody = z.object({
  requestId: z.number().int().nonnegative(),
  callbackSelector: z.string().optional(),
  payload: z.string(),
  proof: z.string(),
});

const pendingQuery = z.object({
  status: z.enum(['requested', 'resolved', 'expired']).optional(),
});

const expireBody = z.object({
  olderThanSeconds: z.number().int().nonnegative().optional(),
});

export function createOracleRoutes(ctx: RatingContext): Router {
  const router = Router();

  router.post('/callback', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = callbackBody.parse(req.body);
      if (body.callbackSelector !== undefined && body.callbackSelector !== RATING_CALLBACK_SELECTOR) {
        res.status(400).json({ error: `Unsupported callback selector: ${body.callbackSelector}` });
        return;
      }

      const outcome = await onDecryptionCallback(ctx, body);
      res.json(presentOutcome(outcome));
    } catch (err) {
      next(err);
    }
  });

  router.get(
    '/pending',
    authenticate,
    authorize('listPending'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const query = pendingQuery.parse(req.query);
        res.json({ requests: await listPendingRequests(ctx, query) });
      } catch (err) {
        next(err);
      }
    }
  );

  router.post(
    '/expire',
    authenticate,
    authorize('expirePending'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = expireBody.parse(req.body ?? {});
        const olderThanSeconds = body.olderThanSeconds ?? config.oracle.pendingTtlSeconds;
        if (body.olderThanSeconds === undefined && olderThanSeconds === 0) {
          res.status(400).json({ error: 'Pending request expiry is disabled; pass olderThanSeconds' });
          return;
        }

        const cutoff = new Date(ctx.clock().getTime() - olderThanSeconds * 1000);
        const expired = await expirePendingRequests(ctx, cutoff);
        res.json({ cutoff: cutoff.toISOString(), expired });
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
