// =============================================================================
// SEALED RATINGS — Subject Routes
//
//   POST /api/subjects                           — register (subject: own id, admin: any)
//   GET  /api/subjects                           — list
//   GET  /api/subjects/:id                       — subject + aggregate summary
//   GET  /api/subjects/:id/aggregate             — encrypted score sum
//   POST /api/subjects/:id/aggregate/reveal      — request aggregate decryption
//   GET  /api/subjects/:id/aggregate/disclosure  — latest decrypted sum
// =============================================================================

/// <reference path="../types/express.d.ts" />

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { authenticate } from '../middleware/authenticate';
import { authorize } from '../middleware/access-policy';
import { ProtocolError } from '../services/errors';
import {
  getAggregateDisclosure,
  getEncryptedAggregate,
  getSubjectAggregate,
} from '../services/ratings/aggregates';
import { requestSubjectAggregateReveal } from '../services/ratings/correlation';
import { SUBJECT_ID_PATTERN, getSubject, listSubjects, registerSubject } from '../services/ratings/subjects';
import { RatingContext } from '../types/context';
import { presentAggregate, presentDisclosure } from './presenters';

const registerBody = z.object({
  id: z.string().regex(SUBJECT_ID_PATTERN),
  displayName: z.string().trim().min(1).max(200),
});

const subjectParams = z.object({ id: z.string().regex(SUBJECT_ID_PATTERN) });

export function createSubjectRoutes(ctx: RatingContext): Router {
  const router = Router();

  router.post(
    '/',
    authenticate,
    authorize('registerSubject'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const body = registerBody.parse(req.body);
        const subject = await registerSubject(ctx, body.id, body.displayName);
        res.status(201).json(subject);
      } catch (err) {
        next(err);
      }
    }
  );

  router.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ subjects: await listSubjects(ctx) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = subjectParams.parse(req.params);
      const subject = await getSubject(ctx, id);
      if (!subject) {
        throw new ProtocolError('SubjectNotFound', `Subject ${id} is not registered`);
      }

      const aggregate = await getSubjectAggregate(ctx, id);
      res.json({
        ...subject,
        aggregate: aggregate ? presentAggregate(aggregate, ctx.fhe.isInitialized(aggregate.encryptedScoreSum)) : null,
      });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id/aggregate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = subjectParams.parse(req.params);
      const encryptedScoreSum = await getEncryptedAggregate(ctx, id);
      res.json({
        subjectId: id,
        encryptedScoreSum,
        initialized: ctx.fhe.isInitialized(encryptedScoreSum),
      });
    } catch (err) {
      next(err);
    }
  });

  router.post(
    '/:id/aggregate/reveal',
    authenticate,
    authorize('revealAggregate'),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { id } = subjectParams.parse(req.params);
        const request = await requestSubjectAggregateReveal(ctx, id);
        res.status(202).json(request);
      } catch (err) {
        next(err);
      }
    }
  );

  router.get('/:id/aggregate/disclosure', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = subjectParams.parse(req.params);
      const disclosure = await getAggregateDisclosure(ctx, id);
      if (!disclosure) {
        res.status(404).json({ error: `No aggregate disclosure for subject ${id} yet` });
        return;
      }
      res.json(presentDisclosure(disclosure));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
