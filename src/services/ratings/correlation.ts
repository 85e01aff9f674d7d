// =============================================================================
// SEALED RATINGS — Decryption Correlation Protocol
//
// Request side: hand ciphertext handles to the oracle, keep the returned
// requestId → target mapping as a `requested` row, return immediately.
// The oracle is asked only after every precondition has passed, but its
// request cannot be withdrawn: if the transaction then rolls back, the
// eventual callback finds no row and is rejected as UnknownRequest,
// changing nothing.
//
// Callback side, one transaction, strictly in this order:
//   a. look up the requested row     → UnknownRequest / RequestExpired
//   b. verify the oracle proof       → InvalidProof
//   c. decode the payload by kind    → MalformedPayload
//   d. commit the reveal or disclosure
//   e. mark the row resolved
//   f. append the completion event
//
// The pending row is the exactly-once device: once resolved, the same
// requestId is UnknownRequest. A rejection in a–c writes nothing, so the
// row stays `requested`.
// =============================================================================

import { DecryptionCallback } from '../../types/fhe';
import { RatingContext } from '../../types/context';
import {
  AggregateDisclosure,
  AggregateRevealRequest,
  PendingDecryptionRequest,
  PendingRequestStatus,
  RecordRevealRequest,
} from '../../types/ratings';
import { ProtocolError } from '../errors';
import { LedgerTransaction } from '../ledger/store';
import { decodeAggregateSum, decodeRecordReveal } from '../oracle/payload';
import { foldRevealIntoAggregate } from './aggregates';

/** Callback entry point the oracle delivers rating decryptions to */
export const RATING_CALLBACK_SELECTOR = 'onDecryptionCallback(uint256,bytes,bytes)';

export type CallbackOutcome =
  | { outcome: 'record_revealed'; requestId: number; recordId: number; score: number; tags: string }
  | { outcome: 'duplicate_ignored'; requestId: number; recordId: number }
  | { outcome: 'aggregate_disclosed'; requestId: number; disclosure: AggregateDisclosure };

async function issueRequest(
  ctx: RatingContext,
  tx: LedgerTransaction,
  handles: string[],
): Promise<{ requestId: number; requestedAt: Date }> {
  const requestId = await ctx.oracle.requestDecryption(handles, RATING_CALLBACK_SELECTOR);
  if (!Number.isSafeInteger(requestId) || requestId <= 0) {
    throw new Error(`Decryption oracle returned an invalid request id: ${requestId}`);
  }
  // A mapped id is never remapped; insertPending throws on a collision.
  if (await tx.getPending(requestId)) {
    throw new Error(`Decryption oracle reissued request id ${requestId}`);
  }
  return { requestId, requestedAt: ctx.clock() };
}

// ── Requests ───────────────────────────────────────────────────────────

export async function requestReveal(ctx: RatingContext, recordId: number): Promise<RecordRevealRequest> {
  return ctx.store.transaction(async (tx) => {
    const record = await tx.getRecord(recordId);
    if (!record) {
      throw new ProtocolError('RecordNotFound', `Record ${recordId} does not exist`);
    }
    const reveal = await tx.getReveal(recordId);
    if (reveal && reveal.revealed) {
      throw new ProtocolError('AlreadyRevealed', `Record ${recordId} is already revealed`);
    }

    const { requestId, requestedAt } = await issueRequest(ctx, tx, [record.encryptedScore, record.encryptedTags]);
    const request: RecordRevealRequest = {
      kind: 'record_reveal',
      requestId,
      recordId,
      status: 'requested',
      requestedAt,
      settledAt: null,
    };

    await tx.insertPending(request);
    await tx.appendEvent(
      { type: 'DecryptionRequested', payload: { requestId, kind: request.kind, id: recordId } },
      requestedAt,
    );

    console.log(`[Correlation] Request ${requestId} issued: reveal record ${recordId}`);
    return request;
  });
}

export async function requestSubjectAggregateReveal(
  ctx: RatingContext,
  subjectId: string,
): Promise<AggregateRevealRequest> {
  return ctx.store.transaction(async (tx) => {
    const aggregate = await tx.getAggregate(subjectId);
    if (!aggregate || !ctx.fhe.isInitialized(aggregate.encryptedScoreSum)) {
      throw new ProtocolError('SubjectNotFound', `Subject ${subjectId} has no aggregate to reveal`);
    }

    const { requestId, requestedAt } = await issueRequest(ctx, tx, [aggregate.encryptedScoreSum]);
    const request: AggregateRevealRequest = {
      kind: 'aggregate_reveal',
      requestId,
      subjectId,
      ratingCount: aggregate.ratingCount,
      status: 'requested',
      requestedAt,
      settledAt: null,
    };

    await tx.insertPending(request);
    await tx.appendEvent(
      { type: 'DecryptionRequested', payload: { requestId, kind: request.kind, id: subjectId } },
      requestedAt,
    );

    console.log(`[Correlation] Request ${requestId} issued: reveal aggregate of ${subjectId}`);
    return request;
  });
}

// ── Callback ───────────────────────────────────────────────────────────

async function commitRecordReveal(
  ctx: RatingContext,
  tx: LedgerTransaction,
  request: RecordRevealRequest,
  payload: string,
  now: Date,
): Promise<CallbackOutcome> {
  const { score, tags } = decodeRecordReveal(payload);

  const record = await tx.getRecord(request.recordId);
  const current = await tx.getReveal(request.recordId);
  if (!record || !current) {
    throw new Error(`Pending request ${request.requestId} points at missing record ${request.recordId}`);
  }

  if (current.revealed) {
    await tx.settlePending(request.requestId, 'resolved', now);
    console.log(
      `[Correlation] Request ${request.requestId}: record ${request.recordId} already revealed, duplicate ignored`
    );
    return { outcome: 'duplicate_ignored', requestId: request.requestId, recordId: request.recordId };
  }

  await tx.putReveal(request.recordId, { score, tags, revealed: true });
  await foldRevealIntoAggregate(ctx, tx, { recordId: record.id, subjectId: record.subjectId, score, tags }, now);
  await tx.settlePending(request.requestId, 'resolved', now);
  await tx.appendEvent(
    { type: 'RecordRevealed', payload: { id: request.recordId, requestId: request.requestId } },
    now,
  );

  console.log(`[Correlation] Request ${request.requestId}: record ${request.recordId} revealed`);
  return { outcome: 'record_revealed', requestId: request.requestId, recordId: request.recordId, score, tags };
}

async function commitAggregateDisclosure(
  tx: LedgerTransaction,
  request: AggregateRevealRequest,
  payload: string,
  now: Date,
): Promise<CallbackOutcome> {
  const sum = decodeAggregateSum(payload);

  const disclosure: AggregateDisclosure = {
    requestId: request.requestId,
    subjectId: request.subjectId,
    sum,
    ratingCount: request.ratingCount,
    disclosedAt: now,
  };

  await tx.insertDisclosure(disclosure);
  await tx.settlePending(request.requestId, 'resolved', now);
  await tx.appendEvent(
    { type: 'AggregateDecrypted', payload: { subjectId: request.subjectId, requestId: request.requestId } },
    now,
  );

  console.log(`[Correlation] Request ${request.requestId}: aggregate of ${request.subjectId} disclosed`);
  return { outcome: 'aggregate_disclosed', requestId: request.requestId, disclosure };
}

export async function onDecryptionCallback(
  ctx: RatingContext,
  callback: Pick<DecryptionCallback, 'requestId' | 'payload' | 'proof'>,
): Promise<CallbackOutcome> {
  const { requestId, payload, proof } = callback;

  return ctx.store.transaction(async (tx) => {
    // a. correlation lookup; 0 never maps to anything
    const request = Number.isSafeInteger(requestId) && requestId > 0 ? await tx.getPending(requestId) : null;
    if (!request || request.status === 'resolved') {
      console.warn(`[Correlation] Callback rejected: unknown or already resolved request ${requestId}`);
      throw new ProtocolError('UnknownRequest', `No outstanding decryption request ${requestId}`);
    }
    if (request.status === 'expired') {
      console.warn(`[Correlation] Callback rejected: request ${requestId} expired`);
      throw new ProtocolError('RequestExpired', `Decryption request ${requestId} has expired`);
    }

    // b. authenticity before anything reads the payload
    ctx.oracle.checkSignatures(requestId, payload, proof);

    // c–f
    const now = ctx.clock();
    return request.kind === 'record_reveal'
      ? commitRecordReveal(ctx, tx, request, payload, now)
      : commitAggregateDisclosure(tx, request, payload, now);
  });
}

// ── Administration ─────────────────────────────────────────────────────

/**
 * Move every `requested` row issued before `olderThan` to `expired`.
 * Late callbacks for those ids are rejected with RequestExpired.
 */
export async function expirePendingRequests(
  ctx: RatingContext,
  olderThan: Date,
): Promise<PendingDecryptionRequest[]> {
  return ctx.store.transaction(async (tx) => {
    const now = ctx.clock();
    const stale = (await tx.listPending('requested'))
      .filter((request) => request.requestedAt.getTime() < olderThan.getTime());

    for (const request of stale) {
      await tx.settlePending(request.requestId, 'expired', now);
      await tx.appendEvent(
        { type: 'DecryptionRequestExpired', payload: { requestId: request.requestId, kind: request.kind } },
        now,
      );
    }

    if (stale.length > 0) {
      console.log(`[Correlation] Expired ${stale.length} pending request(s) issued before ${olderThan.toISOString()}`);
    }
    return stale.map((request): PendingDecryptionRequest => ({ ...request, status: 'expired', settledAt: now }));
  });
}

export async function listPendingRequests(
  ctx: RatingContext,
  filter: { status?: PendingRequestStatus } = {},
): Promise<PendingDecryptionRequest[]> {
  return ctx.store.read((reader) => reader.listPending(filter.status));
}
