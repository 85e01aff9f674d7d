// =============================================================================
// SEALED RATINGS — Test Helpers
//
// In-process stack: in-memory ledger, development homomorphic provider and
// a decryption oracle the test drives by hand (no timers). The oracle's
// signing key is exposed so tests can sign arbitrary payloads.
// =============================================================================

import { signAccessToken } from '../src/middleware/authenticate';
import { RatingStack, RatingStackOptions, createRatingStack } from '../src/services/context';
import { encryptRating } from '../src/services/fhe/client';
import { KeyMaterial, generateKeyMaterial } from '../src/services/keys';
import { MemoryLedgerStore } from '../src/services/ledger/memory-store';
import { OracleSigningKey } from '../src/services/oracle/proof';
import { CallbackOutcome, onDecryptionCallback } from '../src/services/ratings/correlation';
import { submit } from '../src/services/ratings/records';
import { registerSubject } from '../src/services/ratings/subjects';
import { EncryptedRecord } from '../src/types/ratings';
import { UserRole } from '../src/types/roles';

/** Small modulus keeps key generation fast; sums stay far below it */
export const TEST_MODULUS_BITS = 256;

export const T0 = new Date('2026-03-02T09:00:00.000Z');

export class TestClock {
  private current: number;

  constructor(start: Date = T0) {
    this.current = start.getTime();
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface TestStack extends RatingStack {
  clock: TestClock;
  signingKey: OracleSigningKey;
  keys: KeyMaterial;
}

/**
 * Pass `store` and `keys` from an earlier stack to start again on the same
 * ledger.
 */
export async function createTestStack(
  overrides: Partial<Pick<RatingStackOptions, 'store' | 'keys' | 'delivery' | 'callbackUrl' | 'fetchImpl'>> = {},
): Promise<TestStack> {
  const clock = new TestClock();
  const keys = overrides.keys ?? generateKeyMaterial(TEST_MODULUS_BITS);
  const stack = await createRatingStack({
    store: overrides.store ?? new MemoryLedgerStore(),
    keys,
    delivery: overrides.delivery ?? 'in-process',
    callbackUrl: overrides.callbackUrl,
    fetchImpl: overrides.fetchImpl,
    autoFulfill: false,
    fulfillDelayMs: 0,
    clock: clock.now,
  });
  return { ...stack, clock, keys, signingKey: keys.signingKey };
}

/** Register a subject and submit one encrypted rating for it. */
export async function rate(
  stack: TestStack,
  subjectId: string,
  score: number,
  tags: string,
): Promise<EncryptedRecord> {
  if (!(await stack.ctx.store.read((reader) => reader.getSubject(subjectId)))) {
    await registerSubject(stack.ctx, subjectId, `Driver ${subjectId}`);
  }
  const encrypted = encryptRating(stack.ctx.fhe.publicParameters(), score, tags);
  return submit(stack.ctx, { subjectId, ...encrypted });
}

/** Decrypt, sign and deliver a queued request straight to the protocol. */
export async function deliver(stack: TestStack, requestId: number): Promise<CallbackOutcome> {
  return onDecryptionCallback(stack.ctx, stack.oracle.buildCallback(requestId));
}

export function tokenFor(sub: string, ...roles: UserRole[]): string {
  return signAccessToken(sub, roles);
}

export function bearer(token: string): { Authorization: string } {
  return { Authorization: `Bearer ${token}` };
}
