// =============================================================================
// SEALED RATINGS — Ciphertext Handle Format
// =============================================================================

import { CiphertextHandle } from '../../types/fhe';

export const UNINITIALIZED_HANDLE: CiphertextHandle = 'fhe:uninitialized';

const U32_PREFIX = 'fhe:u32:';
const TEXT_PREFIX = 'fhe:text:';

const HEX = /^[0-9a-f]+$/;
const BASE64URL = /^[A-Za-z0-9_-]+$/;

export function formatU32Handle(ciphertext: bigint): CiphertextHandle {
  return U32_PREFIX + ciphertext.toString(16);
}

export function formatTextHandle(sealed: Buffer): CiphertextHandle {
  return TEXT_PREFIX + sealed.toString('base64url');
}

/** Ciphertext integer of a `u32` handle, or null when the handle is not one. */
export function parseU32Handle(handle: CiphertextHandle): bigint | null {
  if (!handle.startsWith(U32_PREFIX)) return null;
  const body = handle.slice(U32_PREFIX.length);
  if (!HEX.test(body)) return null;
  return BigInt('0x' + body);
}

/** Sealed bytes of a `text` handle, or null when the handle is not one. */
export function parseTextHandle(handle: CiphertextHandle): Buffer | null {
  if (!handle.startsWith(TEXT_PREFIX)) return null;
  const body = handle.slice(TEXT_PREFIX.length);
  if (!BASE64URL.test(body)) return null;
  return Buffer.from(body, 'base64url');
}
