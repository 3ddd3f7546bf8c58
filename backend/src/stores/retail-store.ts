import type { CleaningSummary, RetailDataset } from '../types/retail.js';

/**
 * Where the three base relations live. `clean` must be atomic: either every
 * cleaning step is applied or none is.
 */
export interface RetailStore {
  ping(): Promise<string>;
  loadDataset(): Promise<RetailDataset>;
  clean(): Promise<CleaningSummary>;
}
