// =============================================================================
// SEALED RATINGS — Encryption Parameter Routes
//
//   GET /api/fhe/parameters — Paillier modulus and X25519 tag key for clients
// =============================================================================

import { Router, Request, Response } from 'express';
import { RatingContext } from '../types/context';

export function createFheRoutes(ctx: RatingContext): Router {
  const router = Router();

  router.get('/parameters', (_req: Request, res: Response) => {
    res.json(ctx.fhe.publicParameters());
  });

  return router;
}
