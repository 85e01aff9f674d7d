// =============================================================================
// SEALED RATINGS — Ledger Key Material
//
// Every ciphertext in the ledger is bound to the Paillier and tag-sealing
// keys that were live when it was written, and every callback to the
// oracle signing key. The key file keeps them across restarts:
//
//   {
//     "version": 1,
//     "paillier": { "n": hex, "lambda": hex, "mu": hex },
//     "tagPrivateKey": PKCS#8 PEM (X25519),
//     "signingPrivateKey": PKCS#8 PEM (Ed25519)
//   }
//
// The ledger records a fingerprint of the public halves on first start
// and refuses to run under any other keys.
// =============================================================================

import { KeyObject, createHash, createPrivateKey, createPublicKey } from 'crypto';
import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { SoftFheKeyring, SoftFheProvider } from './fhe/soft-fhe';
import { PaillierKeypair, paillierDecrypt, paillierEncrypt, publicKeyFromModulus } from './fhe/paillier';
import { ILedgerStore } from './ledger/store';
import { stableStringify } from './ledger/stable-json';
import { OracleSigningKey, generateOracleSigningKey } from './oracle/proof';

export interface KeyMaterial {
  keyring: SoftFheKeyring;
  signingKey: OracleSigningKey;
}

/** Ledger metadata entry holding the key fingerprint */
export const KEY_FINGERPRINT_META = 'key_fingerprint';

const KEY_FILE_VERSION = 1;

const hexInteger = z.string().regex(/^[0-9a-f]+$/, 'expected lowercase hex');

const keyFileSchema = z.object({
  version: z.literal(KEY_FILE_VERSION),
  paillier: z.object({ n: hexInteger, lambda: hexInteger, mu: hexInteger }),
  tagPrivateKey: z.string().min(1),
  signingPrivateKey: z.string().min(1),
});

export function generateKeyMaterial(modulusBits: number): KeyMaterial {
  return {
    keyring: SoftFheKeyring.generate(modulusBits),
    signingKey: generateOracleSigningKey(),
  };
}

// ── Serialization ──────────────────────────────────────────────────────

function pem(key: KeyObject): string {
  return key.export({ format: 'pem', type: 'pkcs8' }).toString();
}

function privateKeyOfType(source: string, type: 'x25519' | 'ed25519', label: string): KeyObject {
  const key = createPrivateKey(source);
  if (key.asymmetricKeyType !== type) {
    throw new Error(`${label} must be an ${type} key, got ${key.asymmetricKeyType ?? 'unknown'}`);
  }
  return key;
}

export function serializeKeyMaterial(keys: KeyMaterial): string {
  const { paillier, tags } = keys.keyring;
  const file: z.infer<typeof keyFileSchema> = {
    version: KEY_FILE_VERSION,
    paillier: {
      n: paillier.publicKey.n.toString(16),
      lambda: paillier.privateKey.lambda.toString(16),
      mu: paillier.privateKey.mu.toString(16),
    },
    tagPrivateKey: pem(tags.privateKey),
    signingPrivateKey: pem(keys.signingKey.privateKey),
  };
  return JSON.stringify(file, null, 2) + '\n';
}

/**
 * Rebuild key material from a key file's contents.
 * @throws when the file is malformed or its Paillier key does not decrypt
 */
export function parseKeyMaterial(contents: string): KeyMaterial {
  const file = keyFileSchema.parse(JSON.parse(contents));

  const paillier: PaillierKeypair = {
    publicKey: publicKeyFromModulus(BigInt('0x' + file.paillier.n)),
    privateKey: {
      lambda: BigInt('0x' + file.paillier.lambda),
      mu: BigInt('0x' + file.paillier.mu),
    },
  };
  const check = 0x5eedn % paillier.publicKey.n;
  if (paillierDecrypt(paillier, paillierEncrypt(paillier.publicKey, check)) !== check) {
    throw new Error('Paillier private key does not match its modulus');
  }

  const tagPrivateKey = privateKeyOfType(file.tagPrivateKey, 'x25519', 'Tag key');
  const signingPrivateKey = privateKeyOfType(file.signingPrivateKey, 'ed25519', 'Oracle signing key');

  return {
    keyring: new SoftFheKeyring(paillier, {
      publicKey: createPublicKey(tagPrivateKey),
      privateKey: tagPrivateKey,
    }),
    signingKey: {
      publicKey: createPublicKey(signingPrivateKey),
      privateKey: signingPrivateKey,
    },
  };
}

// ── Key File ───────────────────────────────────────────────────────────

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Load the key file, or create it with fresh keys when it does not exist.
 * An existing file is never overwritten.
 */
export async function loadOrCreateKeyMaterial(keyFile: string, modulusBits: number): Promise<KeyMaterial> {
  let contents: string;
  try {
    contents = await readFile(keyFile, 'utf-8');
  } catch (err: unknown) {
    if (!isMissingFile(err)) throw err;

    const keys = generateKeyMaterial(modulusBits);
    await mkdir(path.dirname(keyFile), { recursive: true });
    await writeFile(keyFile, serializeKeyMaterial(keys), { mode: 0o600, flag: 'wx' });
    console.warn(`[Keys] No key file at ${keyFile}; generated new ${modulusBits}-bit key material`);
    return keys;
  }

  try {
    const keys = parseKeyMaterial(contents);
    console.log(`[Keys] Loaded key material from ${keyFile}`);
    return keys;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Key file ${keyFile} is invalid: ${message}`);
  }
}

// ── Fingerprint ────────────────────────────────────────────────────────

function rawPublicKey(key: KeyObject): string {
  const jwk = key.export({ format: 'jwk' });
  if (!jwk.x) throw new Error('Expected an OKP public key');
  return jwk.x;
}

/** SHA-256 over the public halves: modulus, tag key and oracle verification key */
export function keyFingerprint(keys: KeyMaterial): string {
  const params = SoftFheProvider.fromKeyring(keys.keyring).publicParameters();
  return createHash('sha256')
    .update(stableStringify({ ...params, oracleKey: rawPublicKey(keys.signingKey.publicKey) }))
    .digest('hex');
}

/**
 * Record the fingerprint in an empty ledger, or check it against the one
 * already recorded.
 * @throws when the ledger was written under other keys
 */
export async function bindKeysToLedger(store: ILedgerStore, keys: KeyMaterial): Promise<string> {
  const fingerprint = keyFingerprint(keys);
  await store.transaction(async (tx) => {
    const recorded = await tx.getMeta(KEY_FINGERPRINT_META);
    if (recorded === null) {
      await tx.putMeta(KEY_FINGERPRINT_META, fingerprint);
      console.log(`[Keys] Ledger bound to key fingerprint ${fingerprint.slice(0, 16)}`);
    } else if (recorded !== fingerprint) {
      throw new Error(
        `Ledger was written under different key material (fingerprint ${recorded.slice(0, 16)}, ` +
          `loaded ${fingerprint.slice(0, 16)}); restore the original key file`
      );
    }
  });
  return fingerprint;
}
