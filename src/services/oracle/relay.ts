// =============================================================================
// SEALED RATINGS — Oracle Callback Relay
//
// Delivers oracle results to the ledger's callback endpoint over HTTP,
// the way an external relayer would. In-process delivery needs no relay:
// the oracle calls the protocol handler directly.
// =============================================================================

import fetch, { RequestInit, Response } from 'node-fetch';
import { DecryptionCallback, DecryptionCallbackHandler } from '../../types/fhe';

const DELIVERY_TIMEOUT_MS = 5000;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export class RelayDeliveryError extends Error {
  constructor(readonly requestId: number, readonly status: number, detail: string) {
    super(`Callback for request ${requestId} rejected (${status}): ${detail}`);
    this.name = 'RelayDeliveryError';
  }
}

/**
 * Handler that POSTs each callback as JSON to `callbackUrl`.
 * Resolves with the endpoint's JSON body; rejects on any non-2xx answer.
 */
export function createHttpCallbackRelay(
  callbackUrl: string,
  fetchImpl: FetchLike = fetch,
): DecryptionCallbackHandler {
  return async (callback: DecryptionCallback): Promise<unknown> => {
    const response = await fetchImpl(callbackUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(callback),
      timeout: DELIVERY_TIMEOUT_MS,
    });

    if (!response.ok) {
      const detail = await response.text().catch(() => response.statusText);
      throw new RelayDeliveryError(callback.requestId, response.status, detail);
    }

    console.log(`[Relay] Delivered callback for request ${callback.requestId} → ${response.status}`);
    return response.json();
  };
}
