// =============================================================================
// SEALED RATINGS — Authentication Middleware
//
// Verifies the HS256 bearer token and attaches the caller identity to the
// request. Tokens are stateless: there is no session table to consult.
// =============================================================================

/// <reference path="../types/express.d.ts" />

import { Request, Response, NextFunction } from 'express';
import jwt, { JwtPayload } from 'jsonwebtoken';
import { config } from '../config';
import { AuthenticatedUser } from '../types/auth';
import { UserRole, isUserRole } from '../types/roles';

/** Issue a bearer token for `sub` with the given roles. */
export function signAccessToken(
  sub: string,
  roles: UserRole[],
  expiresInSeconds: number = config.jwt.expirySeconds,
  secret: string = config.jwt.secret,
): string {
  return jwt.sign({ roles }, secret, { subject: sub, expiresIn: expiresInSeconds, algorithm: 'HS256' });
}

function toUser(decoded: string | JwtPayload): AuthenticatedUser | null {
  if (typeof decoded === 'string') return null;
  const roles: unknown = decoded.roles;
  if (typeof decoded.sub !== 'string' || decoded.sub === '') return null;
  if (!Array.isArray(roles) || !roles.every(isUserRole)) return null;
  return { id: decoded.sub, roles };
}

/**
 * Authenticate incoming requests via JWT Bearer token.
 * Enforces a valid HS256 signature, expiry, and a well-formed sub/roles claim.
 */
export function authenticate(req: Request, res: Response, next: NextFunction): void {
  const authHeader = req.headers.authorization;
  if (!authHeader?.startsWith('Bearer ')) {
    res.status(401).json({ error: 'Authentication required' });
    return;
  }

  const token = authHeader.slice(7);

  try {
    const user = toUser(jwt.verify(token, config.jwt.secret, { algorithms: ['HS256'] }));
    if (!user) {
      res.status(401).json({ error: 'Invalid token claims' });
      return;
    }

    req.user = user;
    next();
  } catch (err: unknown) {
    if (err instanceof jwt.TokenExpiredError) {
      res.status(401).json({ error: 'Token expired' });
    } else if (err instanceof jwt.JsonWebTokenError) {
      res.status(401).json({ error: 'Invalid token' });
    } else {
      next(err);
    }
  }
}
