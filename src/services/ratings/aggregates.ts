// =============================================================================
// SEALED RATINGS — Aggregation Ledger
//
// Per-subject running homomorphic sum, plaintext rating count and tag
// fingerprint log. Derived state: the only writer is
// foldRevealIntoAggregate, called from the reveal commit.
// =============================================================================

import { createHash } from 'crypto';
import { CiphertextHandle } from '../../types/fhe';
import { RatingContext } from '../../types/context';
import { AggregateDisclosure, SubjectAggregate } from '../../types/ratings';
import { UNINITIALIZED_HANDLE } from '../fhe/handles';
import { LedgerTransaction } from '../ledger/store';

export function fingerprintTags(tags: string): string {
  return createHash('sha256').update(tags, 'utf-8').digest('hex');
}

/** Encrypted score sum of a subject; the uninitialized sentinel when nothing has been folded in. */
export async function getEncryptedAggregate(ctx: RatingContext, subjectId: string): Promise<CiphertextHandle> {
  const aggregate = await ctx.store.read((reader) => reader.getAggregate(subjectId));
  return aggregate ? aggregate.encryptedScoreSum : UNINITIALIZED_HANDLE;
}

export async function getSubjectAggregate(ctx: RatingContext, subjectId: string): Promise<SubjectAggregate | null> {
  return ctx.store.read((reader) => reader.getAggregate(subjectId));
}

export interface DisclosureView extends AggregateDisclosure {
  /** sum / ratingCount, null when the count is zero */
  average: number | null;
}

export async function getAggregateDisclosure(
  ctx: RatingContext,
  subjectId: string,
): Promise<DisclosureView | null> {
  const disclosure = await ctx.store.read((reader) => reader.getLatestDisclosure(subjectId));
  if (!disclosure) return null;
  return {
    ...disclosure,
    average: disclosure.ratingCount > 0 ? Number(disclosure.sum) / disclosure.ratingCount : null,
  };
}

/**
 * Add a revealed score to the subject's encrypted sum, bump the count and
 * log the tag fingerprint. Runs inside the reveal-commit transaction.
 */
export async function foldRevealIntoAggregate(
  ctx: RatingContext,
  tx: LedgerTransaction,
  reveal: { recordId: number; subjectId: string; score: number; tags: string },
  at: Date,
): Promise<SubjectAggregate> {
  const current = await tx.getAggregate(reveal.subjectId);
  const previousSum = current ? current.encryptedScoreSum : UNINITIALIZED_HANDLE;
  const contribution = ctx.fhe.encode(BigInt(reveal.score));

  const encryptedScoreSum = ctx.fhe.isInitialized(previousSum)
    ? ctx.fhe.add(previousSum, contribution)
    : contribution;
  const ratingCount = (current ? current.ratingCount : 0) + 1;
  const fingerprint = { recordId: reveal.recordId, fingerprint: fingerprintTags(reveal.tags) };

  await tx.putAggregate({ subjectId: reveal.subjectId, encryptedScoreSum, ratingCount, updatedAt: at });
  await tx.appendTagFingerprint(reveal.subjectId, fingerprint);

  return {
    subjectId: reveal.subjectId,
    encryptedScoreSum,
    ratingCount,
    tagFingerprints: [...(current ? current.tagFingerprints : []), fingerprint],
    updatedAt: at,
  };
}
