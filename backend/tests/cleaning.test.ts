import { describe, expect, it } from 'vitest';
import {
  auditProductNulls,
  deduplicateSales,
  duplicateKey,
  isBlankLocation,
  normalizeLocations,
} from '../src/services/cleaning.js';
import { customer, loadFixture, product, sale } from './helpers.js';

describe('auditProductNulls', () => {
  it('counts missing values per column', () => {
    const { products } = loadFixture();
    expect(auditProductNulls(products)).toEqual({
      missing_price: 1,
      missing_product_name: 1,
      missing_category: 1,
      missing_stock_level: 1,
    });
  });

  it('reports zeros for an empty or complete catalogue', () => {
    const zeros = {
      missing_price: 0,
      missing_product_name: 0,
      missing_category: 0,
      missing_stock_level: 0,
    };
    expect(auditProductNulls([])).toEqual(zeros);
    expect(auditProductNulls([product({ product_id: 1 })])).toEqual(zeros);
  });
});

describe('normalizeLocations', () => {
  it('replaces null and empty locations with BLANK', () => {
    const { customers } = loadFixture();
    const result = normalizeLocations(customers);
    expect(result.normalized).toBe(2);
    expect(result.customers.map((row) => row.location)).toEqual(['Lagos', 'BLANK', 'BLANK', 'Abuja', 'Lagos']);
  });

  it('leaves whitespace-only locations untouched', () => {
    const result = normalizeLocations([customer({ customer_id: 1, location: ' ' })]);
    expect(result.normalized).toBe(0);
    expect(result.customers[0].location).toBe(' ');
  });

  it('is idempotent', () => {
    const once = normalizeLocations(loadFixture().customers);
    const twice = normalizeLocations(once.customers);
    expect(twice.customers).toEqual(once.customers);
    expect(twice.normalized).toBe(0);
  });

  it('does not mutate its input', () => {
    const input = [customer({ customer_id: 1, location: null })];
    normalizeLocations(input);
    expect(input[0].location).toBeNull();
  });
});

describe('isBlankLocation', () => {
  it('treats only null and the empty string as blank', () => {
    expect(isBlankLocation(null)).toBe(true);
    expect(isBlankLocation('')).toBe(true);
    expect(isBlankLocation('BLANK')).toBe(false);
  });
});

describe('deduplicateSales', () => {
  it('keeps the lower transaction id of two identical purchases', () => {
    const first = sale({
      transaction_id: 1,
      customer_id: 1,
      product_id: 10,
      transaction_date: '2023-01-01',
      quantity_purchased: 2,
      price: 5,
    });
    const duplicate = { ...first, transaction_id: 2, quantity_purchased: 3 };

    const result = deduplicateSales([first, duplicate]);

    expect(result.sales).toEqual([first]);
    expect(result.removedTransactionIds).toEqual([2]);
  });

  it('keeps the minimum id even when it appears later in the input', () => {
    const result = deduplicateSales([
      sale({ transaction_id: 7 }),
      sale({ transaction_id: 9 }),
      sale({ transaction_id: 3 }),
    ]);
    expect(result.sales.map((row) => row.transaction_id)).toEqual([3]);
    expect(result.removedTransactionIds).toEqual([7, 9]);
  });

  it('treats a different date, customer or product as a different purchase', () => {
    const rows = [
      sale({ transaction_id: 1 }),
      sale({ transaction_id: 2, transaction_date: '2023-01-02' }),
      sale({ transaction_id: 3, customer_id: 2 }),
      sale({ transaction_id: 4, product_id: 11 }),
    ];
    expect(deduplicateSales(rows).sales).toEqual(rows);
  });

  it('leaves exactly one row per product, customer and date', () => {
    const { sales } = loadFixture();
    const result = deduplicateSales(sales);
    const keys = result.sales.map(duplicateKey);

    expect(new Set(keys).size).toBe(keys.length);
    expect(result.sales).toHaveLength(9);
    expect(result.removedTransactionIds).toEqual([101]);
    expect(new Set(sales.map(duplicateKey))).toEqual(new Set(keys));
  });
});
