// =============================================================================
// SEALED RATINGS — Test Suite 02: Encrypted Record Store
//
// Sequential ids, default reveal slots, submit validation and the
// RecordCreated event.
// =============================================================================

import { isProtocolError } from '../src/services/errors';
import { encryptRating } from '../src/services/fhe/client';
import { UNINITIALIZED_HANDLE } from '../src/services/fhe/handles';
import { MemoryLedgerStore } from '../src/services/ledger/memory-store';
import { getRecord, getReveal, listRecords, submit } from '../src/services/ratings/records';
import { registerSubject } from '../src/services/ratings/subjects';
import { listEvents } from '../src/services/ratings/events';
import { T0, TestStack, createTestStack, rate } from './helpers';

let stack: TestStack;

beforeEach(async () => {
  stack = await createTestStack();
});

describe('Record ids', () => {
  test('are strictly increasing from 1 with no gaps', async () => {
    const ids: number[] = [];
    for (let i = 0; i < 6; i++) {
      const record = await rate(stack, i % 2 === 0 ? 'driver-a' : 'driver-b', 3, 'ok');
      ids.push(record.id);
    }
    expect(ids).toEqual([1, 2, 3, 4, 5, 6]);
  });

  test('concurrent submissions still get distinct sequential ids', async () => {
    await registerSubject(stack.ctx, 'driver-a', 'Ana');
    const params = stack.ctx.fhe.publicParameters();

    const records = await Promise.all(
      [1, 2, 3, 4, 5].map((score) =>
        submit(stack.ctx, { subjectId: 'driver-a', ...encryptRating(params, score, `tag-${score}`) })
      )
    );

    expect(records.map((r) => r.id).sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5]);
  });

  test('a rejected submission does not consume an id', async () => {
    await rate(stack, 'driver-a', 4, 'first');

    const params = stack.ctx.fhe.publicParameters();
    await expect(
      submit(stack.ctx, { subjectId: 'nobody', ...encryptRating(params, 2, 'lost') })
    ).rejects.toMatchObject({ reason: 'SubjectNotFound' });

    const next = await rate(stack, 'driver-a', 5, 'second');
    expect(next.id).toBe(2);
  });

  test('a failed transaction rolls back the allocated id', async () => {
    const store = new MemoryLedgerStore();

    await expect(
      store.transaction(async (tx) => {
        await tx.allocateRecordId();
        throw new Error('disk full');
      })
    ).rejects.toThrow('disk full');

    const id = await store.transaction((tx) => tx.allocateRecordId());
    expect(id).toBe(1);
  });
});

describe('Reveal slot', () => {
  test('is (0, "", false) for a record never revealed', async () => {
    const record = await rate(stack, 'driver-a', 5, 'Friendly');
    expect(await getReveal(stack.ctx, record.id)).toEqual({ score: 0, tags: '', revealed: false });
  });

  test('is (0, "", false) for an unknown record id', async () => {
    expect(await getReveal(stack.ctx, 999)).toEqual({ score: 0, tags: '', revealed: false });
    expect(await getReveal(stack.ctx, 0)).toEqual({ score: 0, tags: '', revealed: false });
  });
});

describe('submit', () => {
  test('stores handles, subject and timestamp', async () => {
    await registerSubject(stack.ctx, 'driver-a', 'Ana');
    const encrypted = encryptRating(stack.ctx.fhe.publicParameters(), 4, 'Punctual');

    const record = await submit(stack.ctx, { subjectId: 'driver-a', ...encrypted });

    expect(record).toEqual({
      id: 1,
      subjectId: 'driver-a',
      encryptedScore: encrypted.encryptedScore,
      encryptedTags: encrypted.encryptedTags,
      createdAt: T0,
    });
    expect(await getRecord(stack.ctx, 1)).toEqual(record);
  });

  test('emits RecordCreated with id and timestamp', async () => {
    await rate(stack, 'driver-a', 4, 'Punctual');

    const events = await listEvents(stack.ctx);
    expect(events.map((e) => e.type)).toEqual(['SubjectRegistered', 'RecordCreated']);
    expect(events[1].payload).toEqual({ id: 1, subjectId: 'driver-a', timestamp: T0.toISOString() });
  });

  test('rejects an unregistered subject', async () => {
    const encrypted = encryptRating(stack.ctx.fhe.publicParameters(), 4, 'x');
    const err = await submit(stack.ctx, { subjectId: 'ghost', ...encrypted }).catch((e: unknown) => e);
    expect(isProtocolError(err, 'SubjectNotFound')).toBe(true);
  });

  test('rejects a score handle that is not a u32 ciphertext', async () => {
    await registerSubject(stack.ctx, 'driver-a', 'Ana');
    const encrypted = encryptRating(stack.ctx.fhe.publicParameters(), 4, 'x');

    for (const encryptedScore of [encrypted.encryptedTags, UNINITIALIZED_HANDLE, 'fhe:u32:zz', 'fhe:u32:0']) {
      await expect(
        submit(stack.ctx, { subjectId: 'driver-a', encryptedScore, encryptedTags: encrypted.encryptedTags })
      ).rejects.toMatchObject({ reason: 'MalformedCiphertext' });
    }
  });

  test('rejects a tags handle that is not sealed text', async () => {
    await registerSubject(stack.ctx, 'driver-a', 'Ana');
    const encrypted = encryptRating(stack.ctx.fhe.publicParameters(), 4, 'x');

    for (const encryptedTags of [encrypted.encryptedScore, 'fhe:text:', 'fhe:text:AAAA', 'plain words']) {
      await expect(
        submit(stack.ctx, { subjectId: 'driver-a', encryptedScore: encrypted.encryptedScore, encryptedTags })
      ).rejects.toMatchObject({ reason: 'MalformedCiphertext' });
    }
  });

  test('does not touch the subject aggregate', async () => {
    await rate(stack, 'driver-a', 4, 'x');
    const aggregate = await stack.ctx.store.read((r) => r.getAggregate('driver-a'));
    expect(aggregate).toMatchObject({ encryptedScoreSum: UNINITIALIZED_HANDLE, ratingCount: 0, tagFingerprints: [] });
  });
});

describe('listRecords', () => {
  test('filters by subject and pages in id order', async () => {
    await rate(stack, 'driver-a', 1, 'a1');
    await rate(stack, 'driver-b', 2, 'b1');
    await rate(stack, 'driver-a', 3, 'a2');
    await rate(stack, 'driver-a', 4, 'a3');

    const forA = await listRecords(stack.ctx, { subjectId: 'driver-a' });
    expect(forA.map((r) => r.id)).toEqual([1, 3, 4]);

    const page = await listRecords(stack.ctx, { limit: 2, offset: 1 });
    expect(page.map((r) => r.id)).toEqual([2, 3]);
  });
});

describe('Subject registry', () => {
  test('malformed ids are rejected as InvalidSubjectId and write nothing', async () => {
    for (const id of ['has space', '', 'a'.repeat(129), 'driver/a']) {
      const err = await registerSubject(stack.ctx, id, 'X').catch((e: unknown) => e);
      expect(isProtocolError(err, 'InvalidSubjectId')).toBe(true);
      expect(isProtocolError(err) && err.status).toBe(400);
    }

    expect(await stack.ctx.store.read((r) => r.listSubjects())).toEqual([]);
    expect(await listEvents(stack.ctx)).toEqual([]);
  });

  test('the error names the rejected id', async () => {
    await expect(registerSubject(stack.ctx, 'has space', 'X')).rejects.toThrow('Invalid subject id: "has space"');
  });
});
