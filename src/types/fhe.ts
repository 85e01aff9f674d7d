// =============================================================================
// SEALED RATINGS — Homomorphic Capability Types
//
// The homomorphic scheme and the decryption oracle are external trust
// primitives. The ledger only ever sees opaque ciphertext handles, a
// correlation id per decryption, and a signed plaintext payload delivered
// later through a callback.
// =============================================================================

/**
 * Opaque reference to an encrypted value.
 *
 *   fhe:u32:<hex>          additively homomorphic unsigned integer
 *   fhe:text:<base64url>   sealed UTF-8 text (not homomorphic)
 *   fhe:uninitialized      sentinel for "no value yet"
 */
export type CiphertextHandle = string;

export type CiphertextKind = 'u32' | 'text';

/** Published parameters a client needs to encrypt a rating. */
export interface FhePublicParameters {
  scheme: 'paillier+x25519-aes-256-gcm';
  /** Paillier modulus n, lowercase hex */
  modulus: string;
  /** X25519 public key for tag sealing, base64url of the raw 32 bytes */
  tagKey: string;
}

export interface IHomomorphicProvider {
  /** Trivial (deterministic) encryption of a plaintext integer. */
  encode(plaintext: bigint): CiphertextHandle;

  /** Ciphertext of the sum of the two plaintexts. Pure. */
  add(a: CiphertextHandle, b: CiphertextHandle): CiphertextHandle;

  isInitialized(handle: CiphertextHandle): boolean;

  /** Structural check of a client-supplied handle. */
  isWellFormed(handle: CiphertextHandle, kind: CiphertextKind): boolean;

  publicParameters(): FhePublicParameters;
}

// ── Decryption Oracle ──────────────────────────────────────────────────

/** What the oracle relay delivers for one request. */
export interface DecryptionCallback {
  requestId: number;
  callbackSelector: string;
  /** ABI-encoded plaintext values, 0x-prefixed hex */
  payload: string;
  /** Oracle signature over (requestId, payload), hex */
  proof: string;
}

export type DecryptionCallbackHandler = (callback: DecryptionCallback) => Promise<unknown>;

export interface IDecryptionOracle {
  /**
   * Queue a decryption of the given handles. Returns the correlation id
   * immediately (never 0); the plaintext arrives later through the handler
   * registered for `callbackSelector`, at most once under normal operation.
   */
  requestDecryption(handles: CiphertextHandle[], callbackSelector: string): Promise<number>;

  /** Throws a ProtocolError with reason InvalidProof unless the proof verifies. */
  checkSignatures(requestId: number, payload: string, proof: string): void;

  /** Number of requests accepted but not yet delivered. */
  outstanding(): number;
}
