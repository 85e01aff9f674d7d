// =============================================================================
// SEALED RATINGS — Access Policies
//
// One policy per mutating ledger action. A policy names the roles that may
// always perform it, and optionally lets a `subject` perform it on its own
// id, read from the route's `:id` or from the body's `id`.
//
//   router.post('/:id/aggregate/reveal', authenticate, authorize('revealAggregate'), …)
//
// Must be mounted AFTER authenticate.
// =============================================================================

/// <reference path="../types/express.d.ts" />

import { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { UserRole } from '../types/roles';

export type LedgerAction =
  | 'registerSubject'
  | 'submitRating'
  | 'revealRecord'
  | 'revealAggregate'
  | 'listPending'
  | 'expirePending';

export interface AccessPolicy {
  roles: readonly UserRole[];
  ownSubject?: {
    from: 'param' | 'body';
    /** Error for a subject acting on another id */
    denied: string;
  };
}

export const ACCESS_POLICIES: Record<LedgerAction, AccessPolicy> = {
  registerSubject: {
    roles: ['admin'],
    ownSubject: { from: 'body', denied: 'Subjects may only register their own id' },
  },
  submitRating: { roles: ['rater'] },
  // Any rater may ask; the result is public once the oracle answers.
  revealRecord: { roles: ['rater', 'auditor', 'admin'] },
  revealAggregate: {
    roles: ['auditor', 'admin'],
    ownSubject: { from: 'param', denied: 'Subjects may only reveal their own aggregate' },
  },
  listPending: { roles: ['auditor', 'admin'] },
  expirePending: { roles: ['admin'] },
};

const bodyId = z.object({ id: z.string() });

function targetSubjectId(req: Request, from: 'param' | 'body'): string | null {
  if (from === 'param') return req.params.id ?? null;
  const parsed = bodyId.safeParse(req.body);
  return parsed.success ? parsed.data.id : null;
}

/** Who may perform `action`, as reported in a 403 */
export function describePolicy(action: LedgerAction): string[] {
  const policy = ACCESS_POLICIES[action];
  return policy.ownSubject ? [...policy.roles, 'subject (own id)'] : [...policy.roles];
}

export function authorize(action: LedgerAction) {
  const policy = ACCESS_POLICIES[action];

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.user) {
      res.status(401).json({ error: 'Authentication required' });
      return;
    }
    const { roles, id } = req.user;

    if (roles.some((r) => policy.roles.includes(r))) {
      next();
      return;
    }

    if (policy.ownSubject && roles.includes('subject')) {
      if (targetSubjectId(req, policy.ownSubject.from) === id) {
        next();
        return;
      }
      res.status(403).json({ error: policy.ownSubject.denied });
      return;
    }

    res.status(403).json({
      error: 'Insufficient permissions',
      action,
      required: describePolicy(action),
      current: roles,
    });
  };
}
