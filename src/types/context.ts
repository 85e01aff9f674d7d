// =============================================================================
// SEALED RATINGS — Service Context
//
// Collaborators every rating operation runs against. Built once at
// startup (src/services/context.ts) or per test.
// =============================================================================

import { ILedgerStore } from '../services/ledger/store';
import { IDecryptionOracle, IHomomorphicProvider } from './fhe';

export interface RatingContext {
  store: ILedgerStore;
  fhe: IHomomorphicProvider;
  oracle: IDecryptionOracle;
  /** Source of timestamps for records, requests and events */
  clock: () => Date;
}
