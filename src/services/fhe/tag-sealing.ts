// =============================================================================
// SEALED RATINGS — Tag Sealing (X25519 + AES-256-GCM)
//
// Tag text is not homomorphic; it is sealed to the decryption oracle's
// X25519 key so that only the oracle can open it on reveal.
//
//   sealed = ephemeralPublic(32) ‖ iv(12) ‖ authTag(16) ‖ ciphertext
//   key    = HKDF-SHA-256(ECDH(ephemeral, oracle), salt = ephemeralPublic)
//
// The fixed AAD binds the ciphertext to its use as rating tags.
// =============================================================================

import {
  KeyObject,
  createCipheriv,
  createDecipheriv,
  createPublicKey,
  diffieHellman,
  generateKeyPairSync,
  hkdfSync,
  randomBytes,
} from 'crypto';

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32;
const PUBLIC_KEY_LENGTH = 32;
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const HKDF_INFO = Buffer.from('sealed-ratings/tags:v1', 'utf-8');
const AAD = Buffer.from('sealed-ratings/rating-tags', 'utf-8');

export const SEALED_HEADER_LENGTH = PUBLIC_KEY_LENGTH + IV_LENGTH + AUTH_TAG_LENGTH;

export interface TagKeypair {
  publicKey: KeyObject;
  privateKey: KeyObject;
}

export function generateTagKeypair(): TagKeypair {
  return generateKeyPairSync('x25519');
}

/** Raw 32-byte X25519 public key, base64url encoded */
export function exportTagPublicKey(key: KeyObject): string {
  const jwk = key.export({ format: 'jwk' });
  if (!jwk.x) {
    throw new Error('Tag key is not an X25519 key');
  }
  return jwk.x;
}

export function importTagPublicKey(raw: string): KeyObject {
  if (Buffer.from(raw, 'base64url').length !== PUBLIC_KEY_LENGTH) {
    throw new Error('X25519 public key must be 32 bytes');
  }
  return createPublicKey({ key: { kty: 'OKP', crv: 'X25519', x: raw }, format: 'jwk' });
}

function deriveKey(sharedSecret: Buffer, ephemeralPublic: Buffer): Buffer {
  return Buffer.from(hkdfSync('sha256', sharedSecret, ephemeralPublic, HKDF_INFO, KEY_LENGTH));
}

/**
 * Seal UTF-8 text to the holder of `recipient`'s private key.
 * Each call uses a fresh ephemeral key and IV.
 */
export function sealText(recipient: KeyObject, plaintext: string): Buffer {
  const ephemeral = generateTagKeypair();
  const ephemeralPublic = Buffer.from(exportTagPublicKey(ephemeral.publicKey), 'base64url');
  const key = deriveKey(
    diffieHellman({ privateKey: ephemeral.privateKey, publicKey: recipient }),
    ephemeralPublic,
  );

  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  cipher.setAAD(AAD);
  const encrypted = Buffer.concat([cipher.update(plaintext, 'utf-8'), cipher.final()]);

  return Buffer.concat([ephemeralPublic, iv, cipher.getAuthTag(), encrypted]);
}

/**
 * Open a sealed blob with the recipient's private key.
 * @throws when the blob is truncated or fails GCM authentication
 */
export function openText(recipient: KeyObject, sealed: Buffer): string {
  if (sealed.length < SEALED_HEADER_LENGTH) {
    throw new Error('Sealed text is truncated');
  }

  const ephemeralPublic = sealed.subarray(0, PUBLIC_KEY_LENGTH);
  const iv = sealed.subarray(PUBLIC_KEY_LENGTH, PUBLIC_KEY_LENGTH + IV_LENGTH);
  const authTag = sealed.subarray(PUBLIC_KEY_LENGTH + IV_LENGTH, SEALED_HEADER_LENGTH);
  const ciphertext = sealed.subarray(SEALED_HEADER_LENGTH);

  const key = deriveKey(
    diffieHellman({
      privateKey: recipient,
      publicKey: importTagPublicKey(ephemeralPublic.toString('base64url')),
    }),
    ephemeralPublic,
  );

  const decipher = createDecipheriv(ALGORITHM, key, iv, { authTagLength: AUTH_TAG_LENGTH });
  decipher.setAuthTag(authTag);
  decipher.setAAD(AAD);

  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf-8');
  } catch {
    throw new Error('GCM authentication failure: sealed tags have been tampered with');
  }
}
