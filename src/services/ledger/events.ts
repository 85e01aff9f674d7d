// =============================================================================
// SEALED RATINGS — Event Log Chaining
//
// Append-only log consumed by external observers (clients, indexers).
// Each event carries a SHA-512 hash over its own content and the previous
// event's hash, so any rewrite of history breaks the chain from that
// point on.
// =============================================================================

import { createHash } from 'crypto';
import { z } from 'zod';
import { LedgerEvent, LedgerEventInput } from '../../types/ratings';
import { stableStringify } from './stable-json';

const requestKind = z.enum(['record_reveal', 'aggregate_reveal']);
const positiveInt = z.number().int().positive();

const eventInputSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('SubjectRegistered'),
    payload: z.object({ subjectId: z.string() }),
  }),
  z.object({
    type: z.literal('RecordCreated'),
    payload: z.object({ id: positiveInt, subjectId: z.string(), timestamp: z.string() }),
  }),
  z.object({
    type: z.literal('DecryptionRequested'),
    payload: z.object({
      requestId: positiveInt,
      kind: requestKind,
      id: z.union([positiveInt, z.string()]),
    }),
  }),
  z.object({
    type: z.literal('RecordRevealed'),
    payload: z.object({ id: positiveInt, requestId: positiveInt }),
  }),
  z.object({
    type: z.literal('AggregateDecrypted'),
    payload: z.object({ subjectId: z.string(), requestId: positiveInt }),
  }),
  z.object({
    type: z.literal('DecryptionRequestExpired'),
    payload: z.object({ requestId: positiveInt, kind: requestKind }),
  }),
]);

/**
 * Validate a stored (type, payload) pair.
 * @throws ZodError when the row does not match a known event shape
 */
export function parseLedgerEventInput(type: string, payload: unknown): LedgerEventInput {
  return eventInputSchema.parse({ type, payload });
}

export function computeEventHash(fields: {
  sequence: number;
  type: string;
  payload: unknown;
  occurredAt: Date;
  previousHash: string | null;
}): string {
  return createHash('sha512')
    .update(stableStringify({
      sequence: fields.sequence,
      type: fields.type,
      payload: fields.payload,
      occurredAt: fields.occurredAt.toISOString(),
      previousHash: fields.previousHash,
    }))
    .digest('hex');
}

/** Attach sequence, timestamp and chain hash to an event. */
export function sealEvent(
  input: LedgerEventInput,
  sequence: number,
  previousHash: string | null,
  occurredAt: Date,
): LedgerEvent {
  const hash = computeEventHash({
    sequence,
    type: input.type,
    payload: input.payload,
    occurredAt,
    previousHash,
  });
  return { ...input, sequence, occurredAt, previousHash, hash };
}

export interface ChainVerification {
  valid: boolean;
  checked: number;
  /** Sequence of the first event that fails verification */
  brokenAt: number | null;
}

/**
 * Verify a contiguous run of events. `previousHash` is the hash of the
 * event just before the run (null when the run starts at sequence 1).
 */
export function verifyEventRun(events: LedgerEvent[], previousHash: string | null): ChainVerification {
  let expectedPrevious = previousHash;
  let expectedSequence = events.length > 0 ? events[0].sequence : 1;

  for (const [index, event] of events.entries()) {
    const recomputed = computeEventHash(event);
    if (
      event.sequence !== expectedSequence ||
      event.previousHash !== expectedPrevious ||
      event.hash !== recomputed
    ) {
      return { valid: false, checked: index, brokenAt: event.sequence };
    }
    expectedPrevious = event.hash;
    expectedSequence += 1;
  }

  return { valid: true, checked: events.length, brokenAt: null };
}
