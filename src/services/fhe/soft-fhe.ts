// =============================================================================
// SEALED RATINGS — Development Homomorphic Provider
//
// Architecture:
//   IHomomorphicProvider — what the ledger needs: encode, add, validate
//   SoftFheProvider      — Paillier scores + X25519-sealed tags, holding
//                          public material only
//   SoftFheKeyring       — key material, including the private halves the
//                          development oracle uses to decrypt
//
// Key material is persisted by services/keys.ts; ciphertexts are only
// readable under the keyring they were written for.
// =============================================================================

import { KeyObject } from 'crypto';
import {
  CiphertextHandle,
  CiphertextKind,
  FhePublicParameters,
  IHomomorphicProvider,
} from '../../types/fhe';
import {
  PaillierKeypair,
  PaillierPublicKey,
  generatePaillierKeypair,
  paillierAdd,
  paillierDecrypt,
  paillierEncrypt,
} from './paillier';
import { TagKeypair, SEALED_HEADER_LENGTH, exportTagPublicKey, generateTagKeypair, openText } from './tag-sealing';
import {
  UNINITIALIZED_HANDLE,
  formatU32Handle,
  parseTextHandle,
  parseU32Handle,
} from './handles';

// ── Key Material ───────────────────────────────────────────────────────

export class SoftFheKeyring {
  constructor(
    readonly paillier: PaillierKeypair,
    readonly tags: TagKeypair,
  ) {}

  static generate(modulusBits: number): SoftFheKeyring {
    return new SoftFheKeyring(generatePaillierKeypair(modulusBits), generateTagKeypair());
  }

  /**
   * Decrypt one handle. Integers come back as bigint, text as string.
   * @throws when the handle is malformed or does not authenticate
   */
  decrypt(handle: CiphertextHandle): bigint | string {
    const ciphertext = parseU32Handle(handle);
    if (ciphertext !== null) {
      return paillierDecrypt(this.paillier, ciphertext);
    }
    const sealed = parseTextHandle(handle);
    if (sealed !== null) {
      return openText(this.tags.privateKey, sealed);
    }
    throw new Error(`Cannot decrypt handle: ${handle.slice(0, 24)}`);
  }
}

// ── Provider ───────────────────────────────────────────────────────────

export class SoftFheProvider implements IHomomorphicProvider {
  constructor(
    private readonly publicKey: PaillierPublicKey,
    private readonly tagPublicKey: KeyObject,
  ) {}

  static fromKeyring(keyring: SoftFheKeyring): SoftFheProvider {
    return new SoftFheProvider(keyring.paillier.publicKey, keyring.tags.publicKey);
  }

  encode(plaintext: bigint): CiphertextHandle {
    return formatU32Handle(paillierEncrypt(this.publicKey, plaintext, 1n));
  }

  add(a: CiphertextHandle, b: CiphertextHandle): CiphertextHandle {
    const left = this.ciphertextOf(a);
    const right = this.ciphertextOf(b);
    return formatU32Handle(paillierAdd(this.publicKey, left, right));
  }

  isInitialized(handle: CiphertextHandle): boolean {
    return handle !== UNINITIALIZED_HANDLE && this.isWellFormed(handle, 'u32');
  }

  isWellFormed(handle: CiphertextHandle, kind: CiphertextKind): boolean {
    if (kind === 'u32') {
      const c = parseU32Handle(handle);
      return c !== null && c > 0n && c < this.publicKey.n2;
    }
    const sealed = parseTextHandle(handle);
    return sealed !== null && sealed.length >= SEALED_HEADER_LENGTH;
  }

  publicParameters(): FhePublicParameters {
    return {
      scheme: 'paillier+x25519-aes-256-gcm',
      modulus: this.publicKey.n.toString(16),
      tagKey: exportTagPublicKey(this.tagPublicKey),
    };
  }

  private ciphertextOf(handle: CiphertextHandle): bigint {
    const c = parseU32Handle(handle);
    if (c === null || c <= 0n || c >= this.publicKey.n2) {
      throw new Error('Homomorphic add requires two initialized u32 handles');
    }
    return c;
  }
}
