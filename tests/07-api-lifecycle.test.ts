// =============================================================================
// SEALED RATINGS — Test Suite 07: HTTP API Lifecycle
//
// Register → encrypt → submit → request reveal → oracle callback → read,
// plus the role checks on each mutating route.
// =============================================================================

import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../src/app';
import { encryptRating } from '../src/services/fhe/client';
import { requestReveal } from '../src/services/ratings/correlation';
import { FhePublicParameters } from '../src/types/fhe';
import { T0, TestStack, bearer, createTestStack, deliver, rate, tokenFor } from './helpers';

let stack: TestStack;
let app: Express;

const admin = bearer(tokenFor('ops-1', 'admin'));
const auditor = bearer(tokenFor('audit-1', 'auditor'));
const rater = bearer(tokenFor('rider-1', 'rater'));
const driverA = bearer(tokenFor('driver-a', 'subject'));
const driverB = bearer(tokenFor('driver-b', 'subject'));

beforeEach(async () => {
  stack = await createTestStack();
  app = createApp(stack.ctx);
});

describe('Subject registration', () => {
  test('a subject registers its own id', async () => {
    const res = await request(app)
      .post('/api/subjects')
      .set(driverA)
      .send({ id: 'driver-a', displayName: 'Ana' });

    expect(res.status).toBe(201);
    expect(res.body).toEqual({ id: 'driver-a', displayName: 'Ana', registeredAt: T0.toISOString() });
  });

  test('a subject cannot register another id', async () => {
    const res = await request(app)
      .post('/api/subjects')
      .set(driverB)
      .send({ id: 'driver-a', displayName: 'Ana' });

    expect(res.status).toBe(403);
    expect(res.body.error).toBe('Subjects may only register their own id');
  });

  test('raters cannot register subjects', async () => {
    const res = await request(app)
      .post('/api/subjects')
      .set(rater)
      .send({ id: 'rider-1', displayName: 'Rider' });

    expect(res.status).toBe(403);
    expect(res.body).toEqual({
      error: 'Insufficient permissions',
      action: 'registerSubject',
      required: ['admin', 'subject (own id)'],
      current: ['rater'],
    });
  });

  test('a subject token without a body id cannot register', async () => {
    const res = await request(app).post('/api/subjects').set(driverA).send({ displayName: 'Ana' });

    expect(res.status).toBe(403);
    expect(res.body.error).toBe('Subjects may only register their own id');
  });

  test('registering twice is a conflict', async () => {
    await request(app).post('/api/subjects').set(admin).send({ id: 'driver-a', displayName: 'Ana' });
    const res = await request(app).post('/api/subjects').set(admin).send({ id: 'driver-a', displayName: 'Ana' });

    expect(res.status).toBe(409);
    expect(res.body.reason).toBe('SubjectAlreadyRegistered');
  });

  test('invalid ids are rejected by validation', async () => {
    const res = await request(app).post('/api/subjects').set(admin).send({ id: 'has space', displayName: 'x' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Invalid request');
  });

  test('unknown subjects are 404', async () => {
    const res = await request(app).get('/api/subjects/ghost');
    expect(res.status).toBe(404);
    expect(res.body.reason).toBe('SubjectNotFound');
  });
});

describe('Rating lifecycle', () => {
  test('submit, request a reveal, deliver and read the plaintext', async () => {
    await request(app).post('/api/subjects').set(admin).send({ id: 'driver-a', displayName: 'Ana' });

    const paramsRes = await request(app).get('/api/fhe/parameters');
    expect(paramsRes.status).toBe(200);
    const params: FhePublicParameters = paramsRes.body;
    const encrypted = encryptRating(params, 4, 'Punctual');

    const forbidden = await request(app)
      .post('/api/ratings')
      .set(driverA)
      .send({ subjectId: 'driver-a', ...encrypted });
    expect(forbidden.status).toBe(403);

    const created = await request(app)
      .post('/api/ratings')
      .set(rater)
      .send({ subjectId: 'driver-a', ...encrypted });
    expect(created.status).toBe(201);
    expect(created.body).toEqual({
      id: 1,
      subjectId: 'driver-a',
      encryptedScore: encrypted.encryptedScore,
      encryptedTags: encrypted.encryptedTags,
      createdAt: T0.toISOString(),
    });

    const before = await request(app).get('/api/ratings/1/reveal');
    expect(before.body).toEqual({ recordId: 1, score: 0, tags: '', revealed: false });

    const requested = await request(app).post('/api/ratings/1/reveal').set(rater);
    expect(requested.status).toBe(202);
    expect(requested.body).toEqual({
      kind: 'record_reveal',
      requestId: 1,
      recordId: 1,
      status: 'requested',
      requestedAt: T0.toISOString(),
      settledAt: null,
    });

    await stack.oracle.fulfill(1);

    const after = await request(app).get('/api/ratings/1/reveal');
    expect(after.body).toEqual({ recordId: 1, score: 4, tags: 'Punctual', revealed: true });

    const again = await request(app).post('/api/ratings/1/reveal').set(auditor);
    expect(again.status).toBe(409);
    expect(again.body.reason).toBe('AlreadyRevealed');
  });

  test('malformed handles are 400 MalformedCiphertext', async () => {
    await request(app).post('/api/subjects').set(admin).send({ id: 'driver-a', displayName: 'Ana' });
    const res = await request(app)
      .post('/api/ratings')
      .set(rater)
      .send({ subjectId: 'driver-a', encryptedScore: 'fhe:u32:zz', encryptedTags: 'fhe:text:AAAA' });

    expect(res.status).toBe(400);
    expect(res.body.reason).toBe('MalformedCiphertext');
  });

  test('record lookups validate their parameters', async () => {
    expect((await request(app).get('/api/ratings/abc')).status).toBe(400);
    expect((await request(app).get('/api/ratings?limit=0')).status).toBe(400);

    const missing = await request(app).get('/api/ratings/99');
    expect(missing.status).toBe(404);
    expect(missing.body.reason).toBe('RecordNotFound');

    const reveal = await request(app).post('/api/ratings/99/reveal').set(rater);
    expect(reveal.status).toBe(404);
    expect(reveal.body.reason).toBe('RecordNotFound');
  });
});

describe('Oracle callback endpoint', () => {
  test('accepts a signed result once', async () => {
    const record = await rate(stack, 'driver-a', 3, 'Quiet ride');
    const pending = await requestReveal(stack.ctx, record.id);
    const callback = stack.oracle.buildCallback(pending.requestId);

    const first = await request(app).post('/api/oracle/callback').send(callback);
    expect(first.status).toBe(200);
    expect(first.body).toEqual({
      outcome: 'record_revealed',
      requestId: pending.requestId,
      recordId: record.id,
      score: 3,
      tags: 'Quiet ride',
    });

    const replay = await request(app).post('/api/oracle/callback').send(callback);
    expect(replay.status).toBe(404);
    expect(replay.body.reason).toBe('UnknownRequest');
  });

  test('a bad proof is 403 InvalidProof and leaves the request pending', async () => {
    const record = await rate(stack, 'driver-a', 3, 'Quiet ride');
    const pending = await requestReveal(stack.ctx, record.id);
    const callback = stack.oracle.buildCallback(pending.requestId);
    const forged = callback.proof.slice(0, -1) + (callback.proof.endsWith('0') ? '1' : '0');

    const res = await request(app).post('/api/oracle/callback').send({ ...callback, proof: forged });
    expect(res.status).toBe(403);
    expect(res.body.reason).toBe('InvalidProof');

    const reveal = await request(app).get(`/api/ratings/${record.id}/reveal`);
    expect(reveal.body.revealed).toBe(false);

    const ok = await request(app).post('/api/oracle/callback').send(callback);
    expect(ok.status).toBe(200);
  });

  test('rejects a foreign callback selector', async () => {
    const record = await rate(stack, 'driver-a', 3, 'Quiet ride');
    const pending = await requestReveal(stack.ctx, record.id);
    const callback = stack.oracle.buildCallback(pending.requestId);

    const res = await request(app)
      .post('/api/oracle/callback')
      .send({ ...callback, callbackSelector: 'somethingElse(uint256)' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Unsupported callback selector: somethingElse(uint256)');
  });

  test('rejects a body without a proof', async () => {
    const res = await request(app).post('/api/oracle/callback').send({ requestId: 1, payload: '0x' });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Invalid request');
  });

  test('rejects unparseable JSON', async () => {
    const res = await request(app)
      .post('/api/oracle/callback')
      .set('Content-Type', 'application/json')
      .send('{"requestId":');
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Malformed JSON body');
  });
});

describe('Aggregate reveal', () => {
  async function rateAndReveal(score: number, tags: string): Promise<void> {
    const record = await rate(stack, 'driver-a', score, tags);
    const pending = await requestReveal(stack.ctx, record.id);
    await deliver(stack, pending.requestId);
  }

  test('the subject reveals its own aggregate and anyone reads the disclosure', async () => {
    await rateAndReveal(4, 'Punctual');
    await rateAndReveal(5, 'Friendly');

    const aggregate = await request(app).get('/api/subjects/driver-a/aggregate');
    expect(aggregate.body).toEqual({
      subjectId: 'driver-a',
      encryptedScoreSum: stack.ctx.fhe.add(stack.ctx.fhe.encode(4n), stack.ctx.fhe.encode(5n)),
      initialized: true,
    });

    const otherSubject = await request(app).post('/api/subjects/driver-a/aggregate/reveal').set(driverB);
    expect(otherSubject.status).toBe(403);
    expect(otherSubject.body).toEqual({ error: 'Subjects may only reveal their own aggregate' });

    const asRater = await request(app).post('/api/subjects/driver-a/aggregate/reveal').set(rater);
    expect(asRater.status).toBe(403);
    expect(asRater.body).toEqual({
      error: 'Insufficient permissions',
      action: 'revealAggregate',
      required: ['auditor', 'admin', 'subject (own id)'],
      current: ['rater'],
    });

    const none = await request(app).get('/api/subjects/driver-a/aggregate/disclosure');
    expect(none.status).toBe(404);

    const requested = await request(app).post('/api/subjects/driver-a/aggregate/reveal').set(driverA);
    expect(requested.status).toBe(202);
    expect(requested.body).toMatchObject({ kind: 'aggregate_reveal', subjectId: 'driver-a', ratingCount: 2 });

    await deliver(stack, requested.body.requestId);

    const disclosure = await request(app).get('/api/subjects/driver-a/aggregate/disclosure');
    expect(disclosure.status).toBe(200);
    expect(disclosure.body).toEqual({
      requestId: requested.body.requestId,
      subjectId: 'driver-a',
      sum: '9',
      ratingCount: 2,
      disclosedAt: T0.toISOString(),
      average: 4.5,
    });
  });

  test('auditors may reveal any aggregate; a missing one is 404', async () => {
    await rateAndReveal(2, 'Late');

    expect((await request(app).post('/api/subjects/driver-a/aggregate/reveal').set(auditor)).status).toBe(202);

    const missing = await request(app).post('/api/subjects/ghost/aggregate/reveal').set(auditor);
    expect(missing.status).toBe(404);
    expect(missing.body.reason).toBe('SubjectNotFound');
  });

  test('subject detail includes the aggregate summary', async () => {
    await rateAndReveal(4, 'Punctual');

    const res = await request(app).get('/api/subjects/driver-a');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      id: 'driver-a',
      aggregate: { subjectId: 'driver-a', initialized: true, ratingCount: 1 },
    });
  });
});

describe('Event log', () => {
  test('lists events in sequence and verifies the chain', async () => {
    const record = await rate(stack, 'driver-a', 4, 'Punctual');
    const pending = await requestReveal(stack.ctx, record.id);
    await deliver(stack, pending.requestId);

    const all = await request(app).get('/api/events');
    expect(all.body.events.map((e: { type: string }) => e.type)).toEqual([
      'SubjectRegistered',
      'RecordCreated',
      'DecryptionRequested',
      'RecordRevealed',
    ]);

    const page = await request(app).get('/api/events?afterSequence=1&limit=1');
    expect(page.body.events).toHaveLength(1);
    expect(page.body.events[0]).toMatchObject({ sequence: 2, type: 'RecordCreated', occurredAt: T0.toISOString() });

    const verify = await request(app).get('/api/events/verify');
    expect(verify.body).toEqual({ valid: true, checked: 4, brokenAt: null });
  });
});

describe('Pending request administration', () => {
  test('listing pending requests needs auditor or admin', async () => {
    const record = await rate(stack, 'driver-a', 4, 'Punctual');
    await requestReveal(stack.ctx, record.id);

    expect((await request(app).get('/api/oracle/pending')).status).toBe(401);
    expect((await request(app).get('/api/oracle/pending').set(rater)).status).toBe(403);
    expect((await request(app).get('/api/oracle/pending?status=bogus').set(auditor)).status).toBe(400);

    const res = await request(app).get('/api/oracle/pending?status=requested').set(auditor);
    expect(res.status).toBe(200);
    expect(res.body.requests).toEqual([
      {
        kind: 'record_reveal',
        requestId: 1,
        recordId: record.id,
        status: 'requested',
        requestedAt: T0.toISOString(),
        settledAt: null,
      },
    ]);
  });

  test('expiring stale requests needs admin; late callbacks are 410', async () => {
    const record = await rate(stack, 'driver-a', 4, 'Punctual');
    const pending = await requestReveal(stack.ctx, record.id);
    const callback = stack.oracle.buildCallback(pending.requestId);

    stack.clock.advance(10000);

    expect((await request(app).post('/api/oracle/expire').set(auditor).send({ olderThanSeconds: 5 })).status)
      .toBe(403);

    const res = await request(app).post('/api/oracle/expire').set(admin).send({ olderThanSeconds: 5 });
    expect(res.status).toBe(200);
    expect(res.body.cutoff).toBe(new Date(T0.getTime() + 5000).toISOString());
    expect(res.body.expired).toEqual([
      {
        kind: 'record_reveal',
        requestId: pending.requestId,
        recordId: record.id,
        status: 'expired',
        requestedAt: T0.toISOString(),
        settledAt: new Date(T0.getTime() + 10000).toISOString(),
      },
    ]);

    const late = await request(app).post('/api/oracle/callback').send(callback);
    expect(late.status).toBe(410);
    expect(late.body.reason).toBe('RequestExpired');
  });

  test('expiry without a window is refused while the TTL is disabled', async () => {
    const res = await request(app).post('/api/oracle/expire').set(admin).send({});
    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Pending request expiry is disabled; pass olderThanSeconds');
  });
});
