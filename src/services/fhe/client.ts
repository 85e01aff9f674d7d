// =============================================================================
// SEALED RATINGS — Client-side Rating Encryption
//
// Everything here runs with published parameters only. Raters encrypt
// locally and submit handles; the plaintext never reaches the service.
// =============================================================================

import { CiphertextHandle, FhePublicParameters } from '../../types/fhe';
import { paillierEncrypt, publicKeyFromModulus } from './paillier';
import { importTagPublicKey, sealText } from './tag-sealing';
import { formatTextHandle, formatU32Handle } from './handles';

export const MAX_SCORE = 0xffffffff;

export interface EncryptedRating {
  encryptedScore: CiphertextHandle;
  encryptedTags: CiphertextHandle;
}

export function encryptScore(parameters: FhePublicParameters, score: number): CiphertextHandle {
  if (!Number.isInteger(score) || score < 0 || score > MAX_SCORE) {
    throw new Error(`Score must be an integer between 0 and ${MAX_SCORE}`);
  }
  const pk = publicKeyFromModulus(BigInt('0x' + parameters.modulus));
  return formatU32Handle(paillierEncrypt(pk, BigInt(score)));
}

export function sealTags(parameters: FhePublicParameters, tags: string): CiphertextHandle {
  return formatTextHandle(sealText(importTagPublicKey(parameters.tagKey), tags));
}

export function encryptRating(
  parameters: FhePublicParameters,
  score: number,
  tags: string,
): EncryptedRating {
  return {
    encryptedScore: encryptScore(parameters, score),
    encryptedTags: sealTags(parameters, tags),
  };
}
