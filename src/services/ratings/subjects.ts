// =============================================================================
// SEALED RATINGS — Subject Registry
//
// Rated parties (drivers). Registering a subject opens its aggregate with
// an uninitialized encrypted sum and a zero count.
// =============================================================================

import { RatingContext } from '../../types/context';
import { Subject } from '../../types/ratings';
import { ProtocolError } from '../errors';
import { UNINITIALIZED_HANDLE } from '../fhe/handles';

export const SUBJECT_ID_PATTERN = /^[A-Za-z0-9_.:-]{1,128}$/;

export async function registerSubject(
  ctx: RatingContext,
  id: string,
  displayName: string,
): Promise<Subject> {
  if (!SUBJECT_ID_PATTERN.test(id)) {
    throw new ProtocolError('InvalidSubjectId', `Invalid subject id: ${JSON.stringify(id)}`);
  }

  return ctx.store.transaction(async (tx) => {
    if (await tx.getSubject(id)) {
      throw new ProtocolError('SubjectAlreadyRegistered', `Subject ${id} is already registered`);
    }

    const subject: Subject = { id, displayName, registeredAt: ctx.clock() };
    await tx.insertSubject(subject);
    await tx.putAggregate({
      subjectId: id,
      encryptedScoreSum: UNINITIALIZED_HANDLE,
      ratingCount: 0,
      updatedAt: null,
    });
    await tx.appendEvent({ type: 'SubjectRegistered', payload: { subjectId: id } }, subject.registeredAt);

    console.log(`[Ledger] Subject registered: ${id}`);
    return subject;
  });
}

export async function getSubject(ctx: RatingContext, id: string): Promise<Subject | null> {
  return ctx.store.read((reader) => reader.getSubject(id));
}

export async function listSubjects(ctx: RatingContext): Promise<Subject[]> {
  return ctx.store.read((reader) => reader.listSubjects());
}
