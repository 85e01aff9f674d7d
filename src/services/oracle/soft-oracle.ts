// =============================================================================
// SEALED RATINGS — Development Decryption Oracle
//
// Stands in for an external threshold-decryption network:
//   1. requestDecryption queues the handles and returns a correlation id
//   2. later (timer, or an explicit fulfill) the oracle decrypts, encodes
//      the plaintexts as an ABI tuple and signs them
//   3. the signed result goes to the handler registered for the request's
//      callback selector (the protocol itself, or an HTTP relay)
//
// A request is delivered at most once. A request whose ciphertexts cannot
// be decrypted is dropped and never delivered; the ledger keeps its
// pending row until expiry.
// =============================================================================

import {
  CiphertextHandle,
  DecryptionCallback,
  DecryptionCallbackHandler,
  IDecryptionOracle,
} from '../../types/fhe';
import { ProtocolError } from '../errors';
import { SoftFheKeyring } from '../fhe/soft-fhe';
import { encodeDecryptionPayload } from './payload';
import { OracleSigningKey, signDecryption, verifyDecryption } from './proof';

export interface SoftOracleOptions {
  /** Deliver automatically after `fulfillDelayMs`; otherwise wait for fulfill() */
  autoFulfill: boolean;
  fulfillDelayMs: number;
}

interface QueuedDecryption {
  requestId: number;
  handles: CiphertextHandle[];
  callbackSelector: string;
  queuedAt: Date;
}

export class SoftDecryptionOracle implements IDecryptionOracle {
  private nextRequestId = 1;
  private readonly queue = new Map<number, QueuedDecryption>();
  private readonly handlers = new Map<string, DecryptionCallbackHandler>();
  private readonly timers = new Set<NodeJS.Timeout>();

  constructor(
    private readonly keyring: SoftFheKeyring,
    private readonly signingKey: OracleSigningKey,
    private readonly options: SoftOracleOptions,
  ) {}

  /**
   * Never issue an id at or below `requestId`. Used at startup so ids do
   * not collide with requests a persistent ledger already maps.
   */
  resumeAfter(requestId: number): void {
    this.nextRequestId = Math.max(this.nextRequestId, requestId + 1);
  }

  registerCallback(callbackSelector: string, handler: DecryptionCallbackHandler): void {
    this.handlers.set(callbackSelector, handler);
  }

  async requestDecryption(handles: CiphertextHandle[], callbackSelector: string): Promise<number> {
    if (handles.length === 0) {
      throw new Error('Decryption request needs at least one ciphertext handle');
    }
    if (!this.handlers.has(callbackSelector)) {
      throw new Error(`No callback registered for selector "${callbackSelector}"`);
    }

    const requestId = this.nextRequestId++;
    this.enqueue(requestId, handles, callbackSelector);
    return requestId;
  }

  /**
   * Queue a request the ledger mapped before a restart, under its original
   * id. Later ids are issued above it.
   */
  restore(requestId: number, handles: CiphertextHandle[], callbackSelector: string): void {
    if (this.queue.has(requestId)) {
      throw new Error(`Request ${requestId} is already queued`);
    }
    this.resumeAfter(requestId);
    this.enqueue(requestId, handles, callbackSelector);
  }

  private enqueue(requestId: number, handles: CiphertextHandle[], callbackSelector: string): void {
    this.queue.set(requestId, {
      requestId,
      handles: [...handles],
      callbackSelector,
      queuedAt: new Date(),
    });

    if (this.options.autoFulfill) {
      const timer = setTimeout(() => {
        this.timers.delete(timer);
        this.fulfill(requestId).catch((err: unknown) => {
          const message = err instanceof Error ? err.message : String(err);
          console.warn(`[Oracle] Delivery of request ${requestId} failed: ${message}`);
        });
      }, this.options.fulfillDelayMs);
      this.timers.add(timer);
    }
  }

  checkSignatures(requestId: number, payload: string, proof: string): void {
    if (!verifyDecryption(this.signingKey.publicKey, requestId, payload, proof)) {
      throw new ProtocolError('InvalidProof', `Decryption proof does not verify for request ${requestId}`);
    }
  }

  outstanding(): number {
    return this.queue.size;
  }

  queuedRequestIds(): number[] {
    return [...this.queue.keys()].sort((a, b) => a - b);
  }

  /**
   * Decrypt and sign a queued request without delivering it.
   * @throws when the request is not queued or its ciphertexts do not decrypt
   */
  buildCallback(requestId: number): DecryptionCallback {
    const queued = this.queue.get(requestId);
    if (!queued) {
      throw new Error(`Request ${requestId} is not queued`);
    }

    const plaintexts = queued.handles.map((handle) => this.keyring.decrypt(handle));
    const payload = encodeDecryptionPayload(plaintexts);

    return {
      requestId,
      callbackSelector: queued.callbackSelector,
      payload,
      proof: signDecryption(this.signingKey.privateKey, requestId, payload),
    };
  }

  /**
   * Deliver one queued request to its handler and return the handler's
   * result. The request leaves the queue before delivery, so a failing
   * handler is not retried.
   */
  async fulfill(requestId: number): Promise<unknown> {
    let callback: DecryptionCallback;
    try {
      callback = this.buildCallback(requestId);
    } finally {
      this.queue.delete(requestId);
    }

    const handler = this.handlers.get(callback.callbackSelector);
    if (!handler) {
      throw new Error(`No callback registered for selector "${callback.callbackSelector}"`);
    }
    return handler(callback);
  }

  /**
   * Deliver every queued request in id order. Requests that fail to decrypt
   * or whose handler rejects are logged and skipped.
   */
  async fulfillAll(): Promise<unknown[]> {
    const results: unknown[] = [];
    for (const requestId of this.queuedRequestIds()) {
      try {
        results.push(await this.fulfill(requestId));
      } catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err);
        console.warn(`[Oracle] Request ${requestId} dropped: ${message}`);
      }
    }
    return results;
  }

  /** Cancel scheduled deliveries. Queued requests stay queued. */
  close(): void {
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
  }
}
