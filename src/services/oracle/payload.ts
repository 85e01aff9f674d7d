// =============================================================================
// SEALED RATINGS — Decryption Payload Codec
//
// Plaintexts travel as ABI-style tuples of 32-byte words:
//
//   record reveal     (uint256 score, string tags)
//                     word0 = score, word1 = 0x40, word2 = byte length,
//                     then the UTF-8 bytes right-padded to a word boundary
//   aggregate reveal  (uint256 sum)
//
// Decoders are strict: any deviation from the canonical encoding is a
// MalformedPayload rejection, never a best-effort parse.
// =============================================================================

import { TextDecoder } from 'util';
import { ProtocolError } from '../errors';

const WORD = 32;
const MAX_UINT256 = (1n << 256n) - 1n;
const MAX_U32 = 0xffffffffn;
const HEX_PAYLOAD = /^0x(?:[0-9a-fA-F]{2})*$/;

export type PayloadValue = bigint | string;

export interface RecordRevealPlaintext {
  score: number;
  tags: string;
}

function word(value: bigint): Buffer {
  if (value < 0n || value > MAX_UINT256) {
    throw new Error('Value does not fit in a uint256 word');
  }
  return Buffer.from(value.toString(16).padStart(WORD * 2, '0'), 'hex');
}

function padded(length: number): number {
  return Math.ceil(length / WORD) * WORD;
}

/** ABI-encode a tuple of uint256 and string values as 0x-prefixed hex. */
export function encodeDecryptionPayload(values: PayloadValue[]): string {
  const head: Buffer[] = [];
  const tail: Buffer[] = [];
  let tailOffset = values.length * WORD;

  for (const value of values) {
    if (typeof value === 'bigint') {
      head.push(word(value));
      continue;
    }
    const bytes = Buffer.from(value, 'utf-8');
    const body = Buffer.alloc(padded(bytes.length));
    bytes.copy(body);
    head.push(word(BigInt(tailOffset)));
    tail.push(word(BigInt(bytes.length)), body);
    tailOffset += WORD + body.length;
  }

  return '0x' + Buffer.concat([...head, ...tail]).toString('hex');
}

export function payloadBytes(payload: string): Buffer | null {
  if (!HEX_PAYLOAD.test(payload)) return null;
  return Buffer.from(payload.slice(2), 'hex');
}

function readWord(bytes: Buffer, index: number): bigint {
  return BigInt('0x' + bytes.subarray(index * WORD, (index + 1) * WORD).toString('hex'));
}

function malformed(detail: string): ProtocolError {
  return new ProtocolError('MalformedPayload', `Malformed decryption payload: ${detail}`);
}

// ── Decoders ───────────────────────────────────────────────────────────

export function decodeRecordReveal(payload: string): RecordRevealPlaintext {
  const bytes = payloadBytes(payload);
  if (!bytes) throw malformed('not 0x-prefixed hex');
  if (bytes.length < 3 * WORD || bytes.length % WORD !== 0) {
    throw malformed(`expected (uint256,string), got ${bytes.length} bytes`);
  }

  const score = readWord(bytes, 0);
  if (score > MAX_U32) throw malformed('score exceeds uint32');

  if (readWord(bytes, 1) !== BigInt(2 * WORD)) throw malformed('unexpected string offset');

  const length = readWord(bytes, 2);
  const available = bytes.length - 3 * WORD;
  if (length > BigInt(available)) throw malformed('string length exceeds payload');
  const tagLength = Number(length);
  if (padded(tagLength) !== available) throw malformed('trailing bytes after string');

  const tagBytes = bytes.subarray(3 * WORD, 3 * WORD + tagLength);
  const padding = bytes.subarray(3 * WORD + tagLength);
  if (padding.some((b) => b !== 0)) throw malformed('non-zero string padding');

  let tags: string;
  try {
    tags = new TextDecoder('utf-8', { fatal: true }).decode(tagBytes);
  } catch {
    throw malformed('tags are not valid UTF-8');
  }

  return { score: Number(score), tags };
}

export function decodeAggregateSum(payload: string): bigint {
  const bytes = payloadBytes(payload);
  if (!bytes) throw malformed('not 0x-prefixed hex');
  if (bytes.length !== WORD) {
    throw malformed(`expected (uint256), got ${bytes.length} bytes`);
  }
  return readWord(bytes, 0);
}
