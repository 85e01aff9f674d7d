// =============================================================================
// SEALED RATINGS — Service Wiring
//
// Builds the ledger store, the development homomorphic provider and the
// development decryption oracle, and connects the oracle's callback
// selector to the correlation protocol (in process) or to the HTTP relay.
//
// Startup against an existing ledger:
//   1. the key fingerprint must match the one the ledger recorded
//   2. request ids continue above the highest mapped id
//   3. requests still outstanding are queued with the oracle again
// =============================================================================

import { AppConfig, OracleDelivery } from '../config';
import { createPool } from '../db/pool';
import { applySchema } from '../db/migrate';
import { RatingContext } from '../types/context';
import { SoftFheKeyring, SoftFheProvider } from './fhe/soft-fhe';
import { KeyMaterial, bindKeysToLedger, loadOrCreateKeyMaterial } from './keys';
import { ILedgerStore } from './ledger/store';
import { MemoryLedgerStore } from './ledger/memory-store';
import { PgLedgerStore } from './ledger/pg-store';
import { FetchLike, createHttpCallbackRelay } from './oracle/relay';
import { SoftDecryptionOracle } from './oracle/soft-oracle';
import { RATING_CALLBACK_SELECTOR, onDecryptionCallback } from './ratings/correlation';

export interface RatingStackOptions {
  store: ILedgerStore;
  keys: KeyMaterial;
  delivery: OracleDelivery;
  /** Relay target when delivery is 'http' */
  callbackUrl?: string;
  /** Deliver callbacks on a timer; otherwise the caller drives oracle.fulfill() */
  autoFulfill: boolean;
  fulfillDelayMs: number;
  clock?: () => Date;
  fetchImpl?: FetchLike;
}

export interface RatingStack {
  ctx: RatingContext;
  oracle: SoftDecryptionOracle;
  keyring: SoftFheKeyring;
}

export async function createRatingStack(options: RatingStackOptions): Promise<RatingStack> {
  if (options.delivery === 'http' && !options.callbackUrl) {
    throw new Error('HTTP oracle delivery needs a callback URL');
  }
  await bindKeysToLedger(options.store, options.keys);

  const { keyring, signingKey } = options.keys;
  const oracle = new SoftDecryptionOracle(keyring, signingKey, {
    autoFulfill: options.autoFulfill,
    fulfillDelayMs: options.fulfillDelayMs,
  });

  const ctx: RatingContext = {
    store: options.store,
    fhe: SoftFheProvider.fromKeyring(keyring),
    oracle,
    clock: options.clock ?? (() => new Date()),
  };

  if (options.delivery === 'http' && options.callbackUrl) {
    oracle.registerCallback(RATING_CALLBACK_SELECTOR, createHttpCallbackRelay(options.callbackUrl, options.fetchImpl));
  } else {
    oracle.registerCallback(RATING_CALLBACK_SELECTOR, (callback) => onDecryptionCallback(ctx, callback));
  }

  await resumeOutstanding(ctx, oracle);

  return { ctx, oracle, keyring };
}

/**
 * Continue request ids above every mapped id and hand requests that were
 * outstanding at shutdown back to the oracle. An aggregate reveal whose
 * aggregate has moved on since it was issued is left for expiry.
 */
async function resumeOutstanding(ctx: RatingContext, oracle: SoftDecryptionOracle): Promise<void> {
  const resumable = await ctx.store.read(async (reader) => {
    const mapped = await reader.listPending();
    const queue: Array<{ requestId: number; handles: string[] }> = [];
    for (const request of mapped) {
      if (request.status !== 'requested') continue;
      if (request.kind === 'record_reveal') {
        const record = await reader.getRecord(request.recordId);
        if (record) queue.push({ requestId: request.requestId, handles: [record.encryptedScore, record.encryptedTags] });
      } else {
        const aggregate = await reader.getAggregate(request.subjectId);
        if (aggregate && aggregate.ratingCount === request.ratingCount) {
          queue.push({ requestId: request.requestId, handles: [aggregate.encryptedScoreSum] });
        } else {
          console.warn(`[Oracle] Request ${request.requestId} not resumed: aggregate of ${request.subjectId} has changed`);
        }
      }
    }
    const highest = mapped.reduce((max, request) => Math.max(max, request.requestId), 0);
    return { highest, queue };
  });

  if (resumable.highest > 0) {
    oracle.resumeAfter(resumable.highest);
    console.log(`[Oracle] Resuming request ids after ${resumable.highest}`);
  }
  for (const { requestId, handles } of resumable.queue) {
    oracle.restore(requestId, handles, RATING_CALLBACK_SELECTOR);
  }
  if (resumable.queue.length > 0) {
    console.log(`[Oracle] Re-queued ${resumable.queue.length} outstanding request(s)`);
  }
}

export async function createLedgerStore(appConfig: AppConfig): Promise<ILedgerStore> {
  if (appConfig.ledger.backend === 'memory') {
    console.warn('[Ledger] Using the in-memory ledger; state is lost on restart');
    return new MemoryLedgerStore();
  }

  const pool = createPool(appConfig.db.connectionString);
  await applySchema(pool, appConfig.db.schemaPath);
  return new PgLedgerStore(pool);
}

export async function createRatingStackFromConfig(appConfig: AppConfig): Promise<RatingStack> {
  return createRatingStack({
    store: await createLedgerStore(appConfig),
    keys: await loadOrCreateKeyMaterial(appConfig.fhe.keyFile, appConfig.fhe.modulusBits),
    delivery: appConfig.oracle.delivery,
    callbackUrl: appConfig.oracle.callbackUrl,
    autoFulfill: true,
    fulfillDelayMs: appConfig.oracle.fulfillDelayMs,
  });
}
