// =============================================================================
// SEALED RATINGS — Decryption Proofs
//
// The oracle signs every result with Ed25519 over
//   SHA-256("sealed-ratings/decryption:v1" ‖ requestId as u64 BE ‖ payload)
// so a proof cannot be replayed against another request id.
// =============================================================================

import { KeyObject, createHash, generateKeyPairSync, sign, verify } from 'crypto';
import { payloadBytes } from './payload';

const DOMAIN = Buffer.from('sealed-ratings/decryption:v1', 'utf-8');
const SIGNATURE_LENGTH = 64;

export interface OracleSigningKey {
  publicKey: KeyObject;
  privateKey: KeyObject;
}

export function generateOracleSigningKey(): OracleSigningKey {
  return generateKeyPairSync('ed25519');
}

function digest(requestId: number, payload: Buffer): Buffer {
  const id = Buffer.alloc(8);
  id.writeBigUInt64BE(BigInt(requestId));
  return createHash('sha256').update(DOMAIN).update(id).update(payload).digest();
}

export function signDecryption(privateKey: KeyObject, requestId: number, payload: string): string {
  const bytes = payloadBytes(payload);
  if (!bytes) throw new Error('Payload must be 0x-prefixed hex');
  return '0x' + sign(null, digest(requestId, bytes), privateKey).toString('hex');
}

/** False for any malformed input; never throws. */
export function verifyDecryption(
  publicKey: KeyObject,
  requestId: number,
  payload: string,
  proof: string,
): boolean {
  if (!Number.isSafeInteger(requestId) || requestId <= 0) return false;
  const bytes = payloadBytes(payload);
  const signature = payloadBytes(proof);
  if (!bytes || !signature || signature.length !== SIGNATURE_LENGTH) return false;
  return verify(null, digest(requestId, bytes), publicKey, signature);
}
