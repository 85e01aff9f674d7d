// =============================================================================
// SEALED RATINGS — HTTP Application
//
// Route architecture:
//
//   /api/health      — Health check (unauthenticated)
//   /api/fhe/*       — Public encryption parameters
//   /api/subjects/*  — Subject registry, aggregates, aggregate reveals
//   /api/ratings/*   — Encrypted record store, record reveals
//   /api/oracle/*    — Decryption callback + pending-request administration
//   /api/events/*    — Append-only event log
//
// Reads are public. Mutations carry a bearer token, except the oracle
// callback, which is authenticated by its decryption proof.
// =============================================================================

import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { config } from './config';
import { errorHandler, requestId, requestSanitization } from './middleware/security';
import { createEventRoutes } from './routes/events';
import { createFheRoutes } from './routes/fhe';
import { createOracleRoutes } from './routes/oracle';
import { createRatingRoutes } from './routes/ratings';
import { createSubjectRoutes } from './routes/subjects';
import { RatingContext } from './types/context';

export const SERVICE_NAME = 'sealed-ratings';
export const SERVICE_VERSION = '0.1.0';

export interface AppOptions {
  /** Requests per minute per IP on the API routes */
  apiRateLimit?: number;
  /** Requests per minute per IP on the oracle callback */
  callbackRateLimit?: number;
}

export function createApp(ctx: RatingContext, options: AppOptions = {}): Express {
  const app = express();

  // ── Security Middleware ──────────────────────────────────────────────

  app.use(helmet());
  app.use(cors({
    origin: config.nodeEnv === 'development' ? '*' : undefined,
  }));
  app.use(express.json({ limit: '1mb' }));

  app.use(requestId());           // Unique request ID for tracing
  app.use(requestSanitization()); // Null-byte stripping, size validation

  const apiLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minute
    max: options.apiRateLimit ?? config.rateLimit.apiMax,
    standardHeaders: true,
    legacyHeaders: false,
  });

  // The relay may burst after an outage; it gets its own budget.
  const callbackLimiter = rateLimit({
    windowMs: 1 * 60 * 1000,
    max: options.callbackRateLimit ?? config.rateLimit.callbackMax,
    standardHeaders: true,
    legacyHeaders: false,
  });

  // ── Routes ───────────────────────────────────────────────────────────

  const startTime = Date.now();

  app.get('/api/health', async (_req, res) => {
    const checks: Record<string, { status: string; latencyMs?: number; outstanding?: number }> = {};

    const ledgerStart = Date.now();
    try {
      await ctx.store.ping();
      checks.ledger = { status: 'healthy', latencyMs: Date.now() - ledgerStart };
    } catch (err: unknown) {
      console.warn('[Server] Ledger health check failed:', err instanceof Error ? err.message : err);
      checks.ledger = { status: 'unhealthy', latencyMs: Date.now() - ledgerStart };
    }

    checks.oracle = { status: 'healthy', outstanding: ctx.oracle.outstanding() };

    const allHealthy = checks.ledger.status === 'healthy';

    res.status(allHealthy ? 200 : 503).json({
      status: allHealthy ? 'healthy' : 'degraded',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/oracle/callback', callbackLimiter);
  app.use(['/api/oracle/pending', '/api/oracle/expire'], apiLimiter);
  app.use('/api/fhe', apiLimiter, createFheRoutes(ctx));
  app.use('/api/subjects', apiLimiter, createSubjectRoutes(ctx));
  app.use('/api/ratings', apiLimiter, createRatingRoutes(ctx));
  app.use('/api/oracle', createOracleRoutes(ctx));
  app.use('/api/events', apiLimiter, createEventRoutes(ctx));

  // ── 404 Handler ──────────────────────────────────────────────────────

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // ── Error Handler ────────────────────────────────────────────────────

  app.use(errorHandler());

  return app;
}
