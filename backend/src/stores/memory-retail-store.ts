import { promises as fsp } from 'node:fs';
import { preconditionFailed, translateStoreError } from '../errors.js';
import { auditProductNulls, deduplicateSales, normalizeLocations } from '../services/cleaning.js';
import { datasetSchema, type CleaningSummary, type RetailDataset } from '../types/retail.js';
import type { RetailStore } from './retail-store.js';

export class MemoryRetailStore implements RetailStore {
  private dataset: RetailDataset;

  constructor(dataset: RetailDataset) {
    this.dataset = {
      customers: [...dataset.customers],
      products: [...dataset.products],
      sales: [...dataset.sales],
    };
  }

  static fromUnknown(input: unknown): MemoryRetailStore {
    try {
      return new MemoryRetailStore(datasetSchema.parse(input));
    } catch (error) {
      throw translateStoreError(error, 'load dataset');
    }
  }

  static async fromFile(filePath: string): Promise<MemoryRetailStore> {
    let raw: string;
    try {
      raw = await fsp.readFile(filePath, 'utf8');
    } catch (error) {
      throw translateStoreError(error, `read ${filePath}`);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw preconditionFailed(`parse ${filePath}: not valid JSON`, undefined, error);
    }
    return MemoryRetailStore.fromUnknown(parsed);
  }

  async ping(): Promise<string> {
    return new Date().toISOString();
  }

  async loadDataset(): Promise<RetailDataset> {
    return {
      customers: [...this.dataset.customers],
      products: [...this.dataset.products],
      sales: [...this.dataset.sales],
    };
  }

  async clean(): Promise<CleaningSummary> {
    const productNulls = auditProductNulls(this.dataset.products);
    const locations = normalizeLocations(this.dataset.customers);
    const dedup = deduplicateSales(this.dataset.sales);

    this.dataset = {
      customers: locations.customers,
      products: this.dataset.products,
      sales: dedup.sales,
    };

    return {
      product_nulls: productNulls,
      locations_normalized: locations.normalized,
      duplicates_removed: dedup.removedTransactionIds.length,
      removed_transaction_ids: dedup.removedTransactionIds,
    };
  }
}
