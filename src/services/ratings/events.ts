// =============================================================================
// SEALED RATINGS — Event Log Queries
// =============================================================================

import { RatingContext } from '../../types/context';
import { LedgerEvent } from '../../types/ratings';
import { ChainVerification, verifyEventRun } from '../ledger/events';

const VERIFY_PAGE_SIZE = 500;

export async function listEvents(
  ctx: RatingContext,
  filter: { afterSequence?: number; limit?: number } = {},
): Promise<LedgerEvent[]> {
  return ctx.store.read((reader) =>
    reader.listEvents({ afterSequence: filter.afterSequence ?? 0, limit: filter.limit ?? 100 })
  );
}

/**
 * Recompute every event hash from sequence 1 and check each link.
 * Reports the first sequence that does not verify.
 */
export async function verifyEventChain(ctx: RatingContext): Promise<ChainVerification> {
  return ctx.store.read(async (reader) => {
    let afterSequence = 0;
    let previousHash: string | null = null;
    let checked = 0;

    for (;;) {
      const page = await reader.listEvents({ afterSequence, limit: VERIFY_PAGE_SIZE });
      if (page.length === 0) break;

      const result = verifyEventRun(page, previousHash);
      if (page[0].sequence !== afterSequence + 1) {
        return { valid: false, checked, brokenAt: afterSequence + 1 };
      }
      if (!result.valid) {
        return { valid: false, checked: checked + result.checked, brokenAt: result.brokenAt };
      }

      checked += result.checked;
      const last = page[page.length - 1];
      afterSequence = last.sequence;
      previousHash = last.hash;
    }

    return { valid: true, checked, brokenAt: null };
  });
}
