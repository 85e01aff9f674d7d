// =============================================================================
// SEALED RATINGS — Paillier Primitives
//
// Additively homomorphic encryption for scores, using g = n + 1.
//
//   E(m, r) = (1 + m·n) · rⁿ mod n²
//   E(a) · E(b) mod n² = E(a + b)
//
// Development-grade: no constant-time arithmetic. Production deployments
// plug a real FHE provider in behind IHomomorphicProvider.
// =============================================================================

import { generatePrimeSync, randomBytes } from 'crypto';

export interface PaillierPublicKey {
  n: bigint;
  n2: bigint;
}

export interface PaillierPrivateKey {
  lambda: bigint;
  mu: bigint;
}

export interface PaillierKeypair {
  publicKey: PaillierPublicKey;
  privateKey: PaillierPrivateKey;
}

export const MIN_MODULUS_BITS = 128;

// ── Arithmetic ─────────────────────────────────────────────────────────

export function modPow(base: bigint, exp: bigint, mod: bigint): bigint {
  if (mod === 1n) return 0n;
  let b = ((base % mod) + mod) % mod;
  let e = exp;
  let r = 1n;
  while (e > 0n) {
    if (e & 1n) r = (r * b) % mod;
    e >>= 1n;
    b = (b * b) % mod;
  }
  return r;
}

function gcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

function modInv(a: bigint, mod: bigint): bigint {
  let [oldR, r] = [a % mod, mod];
  let [oldS, s] = [1n, 0n];
  while (r !== 0n) {
    const q = oldR / r;
    [oldR, r] = [r, oldR - q * r];
    [oldS, s] = [s, oldS - q * s];
  }
  if (oldR !== 1n) throw new Error('No modular inverse');
  const inv = oldS % mod;
  return inv < 0n ? inv + mod : inv;
}

function randomBelow(n: bigint): bigint {
  const bytes = Math.ceil(n.toString(2).length / 8) + 8;
  return BigInt('0x' + randomBytes(bytes).toString('hex')) % n;
}

function randomCoprime(n: bigint): bigint {
  for (;;) {
    const r = randomBelow(n);
    if (r !== 0n && gcd(r, n) === 1n) return r;
  }
}

// ── Key Generation ─────────────────────────────────────────────────────

export function generatePaillierKeypair(modulusBits: number): PaillierKeypair {
  if (!Number.isInteger(modulusBits) || modulusBits < MIN_MODULUS_BITS || modulusBits % 2 !== 0) {
    throw new Error(`Paillier modulus must be an even bit length >= ${MIN_MODULUS_BITS}`);
  }

  const primeBits = modulusBits / 2;
  let p = 0n;
  let q = 0n;
  let n = 0n;
  for (;;) {
    p = generatePrimeSync(primeBits, { bigint: true });
    q = generatePrimeSync(primeBits, { bigint: true });
    n = p * q;
    // gcd(pq, (p-1)(q-1)) = 1 holds for equal-length distinct primes,
    // the check guards p === q
    if (p !== q && gcd(n, (p - 1n) * (q - 1n)) === 1n) break;
  }

  const lambda = ((p - 1n) * (q - 1n)) / gcd(p - 1n, q - 1n);
  const mu = modInv(lambda % n, n);

  return {
    publicKey: { n, n2: n * n },
    privateKey: { lambda, mu },
  };
}

export function publicKeyFromModulus(n: bigint): PaillierPublicKey {
  if (n <= 3n) throw new Error('Invalid Paillier modulus');
  return { n, n2: n * n };
}

// ── Encryption ─────────────────────────────────────────────────────────

/**
 * Encrypt `m` under `pk`. Omitting `r` draws fresh randomness; `r = 1n`
 * yields the deterministic trivial encryption.
 */
export function paillierEncrypt(pk: PaillierPublicKey, m: bigint, r?: bigint): bigint {
  if (m < 0n || m >= pk.n) throw new Error('Plaintext out of range');
  const rr = r ?? randomCoprime(pk.n);
  const gm = (1n + m * pk.n) % pk.n2;
  return (gm * modPow(rr, pk.n, pk.n2)) % pk.n2;
}

export function paillierDecrypt(keypair: PaillierKeypair, c: bigint): bigint {
  const { publicKey: pk, privateKey: sk } = keypair;
  if (c <= 0n || c >= pk.n2) throw new Error('Ciphertext out of range');
  const u = modPow(c, sk.lambda, pk.n2);
  const l = ((u - 1n) / pk.n) % pk.n;
  return (l * sk.mu) % pk.n;
}

export function paillierAdd(pk: PaillierPublicKey, c1: bigint, c2: bigint): bigint {
  return (c1 * c2) % pk.n2;
}
