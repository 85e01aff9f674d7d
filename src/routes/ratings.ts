// =============================================================================
// SEALED RATINGS — Rating Routes
//
//   POST /api/ratings             — submit encrypted rating (rater)
//   GET  /api/ratings             — list records
//   GET  /api/ratings/:id         — one record
//   GET  /api/ratings/:id/reveal  — reveal slot (default triple until revealed)
//   POST /api/ratings/:id/reveal  — request decryption (rater, auditor, admin)
//
// Reveals are asynchronous: the POST answers 202 with the pending request;
// clients poll the GET or follow RecordRevealed on /api/events.
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { authenticate } from '../middleware/authenticate';
import { authorize } from '../middleware/access-policy';
import { ProtocolError } from '../services/errors';
import { requestReveal } from '../services/ratings/correlation';
import { getRecord, getReveal, listRecords, submit } from '../services/ratings/records';
import { SUBJECT_ID_PATTERN } from '../services/ratings/subjects';
import { RatingContext } from '../types/context';

const submitBody = z.object({
  subjectId: z.string().regex(SUBJECT_ID_PATTERN),
  encryptedScore: z.string().min(1),
  encryptedTags: z.string().min(1),
});

const listQuery = z.object({
  subjectId: z.string().regex(SUBJECT_ID_PATTERN).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
});

const recordParams = z.object({ id: z.coerce.number().int().positive() });

export function createRatingRoutes(ctx: RatingContext): Router {
  const router = Router();

  router.post(
    '/',
    authenticate,
    authorize('submitRating'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = submitBody.parse(req.body);
        const record = await submit(ctx, body);
        res.status(201).json(record);
      } catch (err) {
        next(err);
      }
    }
  );

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuery.parse(req.query);
      res.json({ records: await listRecords(ctx, query) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = recordParams.parse(req.params);
      const record = await getRecord(ctx, id);
      if (!record) {
        throw new ProtocolError('RecordNotFound', `Record ${id} does not exist`);
      }
      res.json(record);
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id/reveal', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = recordParams.parse(req.params);
      res.json({ recordId: id, ...(await getReveal(ctx, id)) });
    } catch (err) {
      next(err);
    }
  });

  router.post(
    '/:id/reveal',
    authenticate,
    authorize('revealRecord'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { id } = recordParams.parse(req.params);
        const request = await requestReveal(ctx, id);
        res.status(202).json(request);
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
