// =============================================================================
// SEALED RATINGS — Request Hygiene & Error Mapping
//
// Covers:
//   - Request ID for tracing (X-Request-ID)
//   - Body sanitization (null-byte stripping, size check)
//   - Error mapping: protocol rejections, body validation, fatal errors
//
// Headers, CORS and rate limiting come from helmet, cors and
// express-rate-limit in app.ts.
// =============================================================================

/// <reference path="../types/express.d.ts" />

import { Request, Response, NextFunction, RequestHandler, ErrorRequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { ZodError } from 'zod';
import { isProtocolError } from '../services/errors';

const MAX_BODY_BYTES = 1024 * 1024;

// ── Input Validation ───────────────────────────────────────────────────

/**
 * Request body size limit and basic sanitization.
 */
export function requestSanitization(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const contentLength = parseInt(req.get('Content-Length') || '0', 10);
    if (contentLength > MAX_BODY_BYTES) {
      res.status(413).json({ error: 'Request body too large' });
      return;
    }

    // Strip null bytes from string values in body
    req.body = stripNullBytes(req.body);

    next();
  };
}

function stripNullBytes(value: unknown): unknown {
  if (typeof value === 'string') return value.replace(/\0/g, '');
  if (Array.isArray(value)) return value.map(stripNullBytes);
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) out[key] = stripNullBytes(inner);
    return out;
  }
  return value;
}

// ── Request ID ─────────────────────────────────────────────────────────

/**
 * Assign a unique request ID for tracing.
 */
export function requestId(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const id = req.get('X-Request-ID') || uuidv4();
    res.set('X-Request-ID', id);
    req.requestId = id;
    next();
  };
}

// ── Error Handler ──────────────────────────────────────────────────────

/**
 * Global error handler. Protocol rejections map to their status with a
 * machine-readable reason; anything else is a 500 that never leaks a
 * stack trace in production.
 */
export function errorHandler(): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isProtocolError(err)) {
      res.status(err.status).json({ error: err.message, reason: err.reason });
      return;
    }

    if (err instanceof ZodError) {
      res.status(400).json({ error: 'Invalid request', details: err.issues });
      return;
    }

    // express.json() rejects unparseable bodies with a SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    const isProd = process.env.NODE_ENV === 'production';
    const message = err instanceof Error ? err.message : String(err);
    const stack = err instanceof Error ? err.stack : undefined;

    console.error(`[Server] Unhandled error (request ${req.requestId ?? '-'}): ${message}`, isProd ? '' : stack);

    res.status(500).json({
      error: isProd ? 'Internal server error' : message,
    });
  };
}
