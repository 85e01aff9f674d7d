// =============================================================================
// SEALED RATINGS — Encrypted Record Store
//
// Ratings arrive as two ciphertext handles and get the next sequential id.
// Each record starts with the default reveal slot (0, "", false) that only
// the correlation protocol may fill.
// =============================================================================

import { CiphertextHandle } from '../../types/fhe';
import { RatingContext } from '../../types/context';
import { EncryptedRecord, RevealState, UNREVEALED } from '../../types/ratings';
import { ProtocolError } from '../errors';

export interface SubmitRatingInput {
  subjectId: string;
  encryptedScore: CiphertextHandle;
  encryptedTags: CiphertextHandle;
}

/**
 * Store an encrypted rating and return the created record.
 * Record ids run 1, 2, 3, … without gaps or reuse.
 */
export async function submit(ctx: RatingContext, input: SubmitRatingInput): Promise<EncryptedRecord> {
  if (!ctx.fhe.isWellFormed(input.encryptedScore, 'u32')) {
    throw new ProtocolError('MalformedCiphertext', 'encryptedScore is not a well-formed u32 ciphertext handle');
  }
  if (!ctx.fhe.isWellFormed(input.encryptedTags, 'text')) {
    throw new ProtocolError('MalformedCiphertext', 'encryptedTags is not a well-formed text ciphertext handle');
  }

  return ctx.store.transaction(async (tx) => {
    if (!(await tx.getSubject(input.subjectId))) {
      throw new ProtocolError('SubjectNotFound', `Subject ${input.subjectId} is not registered`);
    }

    const record: EncryptedRecord = {
      id: await tx.allocateRecordId(),
      subjectId: input.subjectId,
      encryptedScore: input.encryptedScore,
      encryptedTags: input.encryptedTags,
      createdAt: ctx.clock(),
    };

    await tx.insertRecord(record);
    await tx.appendEvent(
      {
        type: 'RecordCreated',
        payload: { id: record.id, subjectId: record.subjectId, timestamp: record.createdAt.toISOString() },
      },
      record.createdAt,
    );

    console.log(`[Ledger] Record ${record.id} created for subject ${record.subjectId}`);
    return record;
  });
}

/** Reveal slot of a record; the default triple for unknown records. */
export async function getReveal(ctx: RatingContext, recordId: number): Promise<RevealState> {
  const reveal = await ctx.store.read((reader) => reader.getReveal(recordId));
  return reveal ?? { ...UNREVEALED };
}

export async function getRecord(ctx: RatingContext, recordId: number): Promise<EncryptedRecord | null> {
  return ctx.store.read((reader) => reader.getRecord(recordId));
}

export async function listRecords(
  ctx: RatingContext,
  filter: { subjectId?: string; limit?: number; offset?: number },
): Promise<EncryptedRecord[]> {
  return ctx.store.read((reader) =>
    reader.listRecords({
      subjectId: filter.subjectId,
      limit: filter.limit ?? 50,
      offset: filter.offset ?? 0,
    })
  );
}
