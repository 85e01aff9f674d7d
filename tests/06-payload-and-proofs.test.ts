// =============================================================================
// SEALED RATINGS — Test Suite 06: Payloads, Proofs & Relay
//
// ABI payload codec strictness, Ed25519 decryption proofs and HTTP
// delivery of oracle callbacks.
// =============================================================================

import request from 'supertest';
import { Response } from 'node-fetch';
import { createApp } from '../src/app';
import {
  decodeAggregateSum,
  decodeRecordReveal,
  encodeDecryptionPayload,
} from '../src/services/oracle/payload';
import { generateOracleSigningKey, signDecryption, verifyDecryption } from '../src/services/oracle/proof';
import { FetchLike, RelayDeliveryError, createHttpCallbackRelay } from '../src/services/oracle/relay';
import { RATING_CALLBACK_SELECTOR, requestReveal } from '../src/services/ratings/correlation';
import { getReveal } from '../src/services/ratings/records';
import { DecryptionCallback } from '../src/types/fhe';
import { createTestStack, rate } from './helpers';

function mutate(payload: string, change: (bytes: Buffer) => Buffer | void): string {
  const bytes = Buffer.from(payload.slice(2), 'hex');
  const changed = change(bytes);
  return '0x' + (changed instanceof Buffer ? changed : bytes).toString('hex');
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return null;
}

describe('Payload codec', () => {
  test('encodes (uint256, string) as head words, length and padded bytes', () => {
    const payload = encodeDecryptionPayload([4n, 'Punctual']);
    const bytes = Buffer.from(payload.slice(2), 'hex');

    expect(bytes).toHaveLength(128);
    expect(bytes.readUInt32BE(28)).toBe(4);
    expect(bytes.readUInt32BE(60)).toBe(0x40);
    expect(bytes.readUInt32BE(92)).toBe(8);
    expect(bytes.subarray(96, 104).toString('utf-8')).toBe('Punctual');
    expect(bytes.subarray(104).every((b) => b === 0)).toBe(true);
  });

  test('decodes a record reveal', () => {
    expect(decodeRecordReveal(encodeDecryptionPayload([4n, 'Punctual']))).toEqual({ score: 4, tags: 'Punctual' });
    expect(decodeRecordReveal(encodeDecryptionPayload([0n, '']))).toEqual({ score: 0, tags: '' });
    expect(decodeRecordReveal(encodeDecryptionPayload([4294967295n, 'é'.repeat(16)])))
      .toEqual({ score: 4294967295, tags: 'é'.repeat(16) });
  });

  test('decodes an aggregate sum', () => {
    expect(decodeAggregateSum(encodeDecryptionPayload([9n]))).toBe(9n);
    expect(decodeAggregateSum(encodeDecryptionPayload([(1n << 200n) + 3n]))).toBe((1n << 200n) + 3n);
  });

  test('refuses values that do not fit a word', () => {
    expect(() => encodeDecryptionPayload([-1n])).toThrow('uint256');
    expect(() => encodeDecryptionPayload([1n << 256n])).toThrow('uint256');
  });

  const valid = encodeDecryptionPayload([4n, 'Punctual']);

  test.each([
    ['not hex', 'deadbeef'],
    ['odd-length hex', '0xabc'],
    ['too short', '0x' + '00'.repeat(64)],
    ['score above uint32', encodeDecryptionPayload([1n << 32n, 'x'])],
    ['wrong string offset', mutate(valid, (b) => { b[63] = 0x60; })],
    ['length past the end', mutate(valid, (b) => { b[95] = 64; })],
    ['trailing bytes', mutate(valid, (b) => Buffer.concat([b, Buffer.alloc(32)]))],
    ['non-zero padding', mutate(valid, (b) => { b[127] = 1; })],
    ['invalid UTF-8', mutate(encodeDecryptionPayload([1n, 'a']), (b) => { b[96] = 0xff; })],
    ['an aggregate payload', encodeDecryptionPayload([9n])],
  ])('record reveal rejects %s as MalformedPayload', (_label, payload) => {
    expect(thrown(() => decodeRecordReveal(payload))).toMatchObject({ reason: 'MalformedPayload' });
  });

  test('aggregate sum rejects anything but one word', () => {
    for (const payload of [valid, '0x', '0x' + '00'.repeat(31), 'zz']) {
      expect(thrown(() => decodeAggregateSum(payload))).toMatchObject({ reason: 'MalformedPayload' });
    }
  });
});

describe('Decryption proofs', () => {
  const key = generateOracleSigningKey();
  const payload = encodeDecryptionPayload([9n]);

  test('a signature verifies for its own request id and payload', () => {
    const proof = signDecryption(key.privateKey, 7, payload);
    expect(proof).toMatch(/^0x[0-9a-f]{128}$/);
    expect(verifyDecryption(key.publicKey, 7, payload, proof)).toBe(true);
  });

  test('does not verify for another request id', () => {
    const proof = signDecryption(key.privateKey, 7, payload);
    expect(verifyDecryption(key.publicKey, 8, payload, proof)).toBe(false);
  });

  test('does not verify for another payload', () => {
    const proof = signDecryption(key.privateKey, 7, payload);
    expect(verifyDecryption(key.publicKey, 7, encodeDecryptionPayload([10n]), proof)).toBe(false);
  });

  test('does not verify under another key', () => {
    const proof = signDecryption(key.privateKey, 7, payload);
    expect(verifyDecryption(generateOracleSigningKey().publicKey, 7, payload, proof)).toBe(false);
  });

  test('malformed inputs are false, not exceptions', () => {
    const proof = signDecryption(key.privateKey, 7, payload);
    expect(verifyDecryption(key.publicKey, 0, payload, proof)).toBe(false);
    expect(verifyDecryption(key.publicKey, 7, payload, 'not-hex')).toBe(false);
    expect(verifyDecryption(key.publicKey, 7, payload, proof.slice(0, 66))).toBe(false);
    expect(verifyDecryption(key.publicKey, 7, 'nope', proof)).toBe(false);
  });

  test('signing needs a hex payload', () => {
    expect(() => signDecryption(key.privateKey, 7, 'nope')).toThrow('0x-prefixed hex');
  });
});

describe('HTTP callback relay', () => {
  const callback: DecryptionCallback = {
    requestId: 7,
    callbackSelector: RATING_CALLBACK_SELECTOR,
    payload: '0x00',
    proof: '0x01',
  };

  test('POSTs the callback as JSON and resolves with the response body', async () => {
    const calls: Array<{ url: string; method?: string; body: string }> = [];
    const fetchImpl: FetchLike = async (url, init) => {
      calls.push({ url, method: init.method, body: String(init.body) });
      return new Response(JSON.stringify({ outcome: 'record_revealed' }), { status: 200 });
    };

    const relay = createHttpCallbackRelay('http://ledger.test/api/oracle/callback', fetchImpl);

    await expect(relay(callback)).resolves.toEqual({ outcome: 'record_revealed' });
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('http://ledger.test/api/oracle/callback');
    expect(calls[0].method).toBe('POST');
    expect(JSON.parse(calls[0].body)).toEqual(callback);
  });

  test('rejects with RelayDeliveryError on a non-2xx answer', async () => {
    const fetchImpl: FetchLike = async () => new Response('proof rejected', { status: 403 });
    const relay = createHttpCallbackRelay('http://ledger.test/api/oracle/callback', fetchImpl);

    const err = await relay(callback).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RelayDeliveryError);
    expect(err).toMatchObject({ requestId: 7, status: 403 });
    expect(err).toHaveProperty('message', 'Callback for request 7 rejected (403): proof rejected');
  });

  test('a stack with HTTP delivery needs a callback URL', async () => {
    await expect(createTestStack({ delivery: 'http' })).rejects.toThrow('needs a callback URL');
  });

  test('an oracle result travels through the callback endpoint into the ledger', async () => {
    let app: ReturnType<typeof createApp> | undefined;
    const fetchImpl: FetchLike = async (url, init) => {
      if (!app) throw new Error('application not started');
      const res = await request(app)
        .post(new URL(url).pathname)
        .set('Content-Type', 'application/json')
        .send(String(init.body));
      return new Response(JSON.stringify(res.body), { status: res.status });
    };

    const stack = await createTestStack({
      delivery: 'http',
      callbackUrl: 'http://ledger.test/api/oracle/callback',
      fetchImpl,
    });
    app = createApp(stack.ctx);

    const record = await rate(stack, 'driver-a', 5, 'Friendly');
    const reveal = await requestReveal(stack.ctx, record.id);

    await expect(stack.oracle.fulfill(reveal.requestId)).resolves.toEqual({
      outcome: 'record_revealed',
      requestId: reveal.requestId,
      recordId: record.id,
      score: 5,
      tags: 'Friendly',
    });
    expect(await getReveal(stack.ctx, record.id)).toEqual({ score: 5, tags: 'Friendly', revealed: true });
    expect(stack.oracle.outstanding()).toBe(0);
  });
});
