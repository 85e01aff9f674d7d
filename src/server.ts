// =============================================================================
// SEALED RATINGS — Main Server
// Encrypted rating ledger with oracle-style reveal
//
// Startup: build the ledger store (applying the schema on postgres), the
// development homomorphic provider and decryption oracle, then listen.
// When PENDING_REQUEST_TTL_SECONDS > 0 a sweep expires stale requests.
// =============================================================================

import { createApp, SERVICE_VERSION } from './app';
import { config } from './config';
import { createRatingStackFromConfig } from './services/context';
import { expirePendingRequests } from './services/ratings/correlation';

async function main(): Promise<void> {
  const { ctx, oracle } = await createRatingStackFromConfig(config);
  const app = createApp(ctx);

  let sweep: NodeJS.Timeout | null = null;
  const ttlSeconds = config.oracle.pendingTtlSeconds;
  if (ttlSeconds > 0) {
    sweep = setInterval(() => {
      const cutoff = new Date(ctx.clock().getTime() - ttlSeconds * 1000);
      expirePendingRequests(ctx, cutoff).catch((err: unknown) => {
        console.error('[Server] Expiry sweep failed:', err instanceof Error ? err.message : err);
      });
    }, Math.min(ttlSeconds * 1000, 60000));
  }

  const server = app.listen(config.port, () => {
    console.log(`
╔══════════════════════════════════════════════════════════════╗
║  SEALED RATINGS — Encrypted Rating Ledger                    ║
║  Version ${SERVICE_VERSION.padEnd(52)}║
║                                                              ║
║  Port:     ${String(config.port).padEnd(50)}║
║  Env:      ${config.nodeEnv.padEnd(50)}║
║  Ledger:   ${config.ledger.backend.padEnd(50)}║
║  Oracle:   ${config.oracle.delivery.padEnd(50)}║
║  Expiry:   ${(ttlSeconds > 0 ? `${ttlSeconds}s` : 'disabled').padEnd(50)}║
╚══════════════════════════════════════════════════════════════╝
  `);
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    if (sweep) clearInterval(sweep);
    oracle.close();
    server.close(() => {
      ctx.store.close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error('[Server] Ledger close failed:', err instanceof Error ? err.message : err);
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error('[Server] Startup failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
