import { beforeEach, describe, expect, it, vi } from 'vitest';
import { HttpError } from '../src/errors.js';
import { PgRetailStore } from '../src/stores/pg-retail-store.js';
import { rejectionOf } from './helpers.js';

const db = vi.hoisted(() => ({
  query: vi.fn(),
  withTransaction: vi.fn(),
}));

vi.mock('../src/db.js', () => db);

const fakeClient = { name: 'transaction-client' };

function result<T>(rows: T[], rowCount = rows.length) {
  return { rows, rowCount };
}

function pgError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('PgRetailStore', () => {
  beforeEach(() => {
    db.query.mockReset();
    db.withTransaction.mockReset();
    db.withTransaction.mockImplementation(async (fn: (client: unknown) => Promise<unknown>) => fn(fakeClient));
  });

  describe('loadDataset', () => {
    it('converts numeric and date columns and validates every row', async () => {
      db.query
        .mockResolvedValueOnce(
          result([{ customer_id: 1, age: 33, gender: 'F', location: null, join_date: '2022-05-01' }])
        )
        .mockResolvedValueOnce(
          result([{ product_id: 10, product_name: 'Lamp', category: 'Home', stock_level: null, price: '19.90' }])
        )
        .mockResolvedValueOnce(
          result([
            {
              transaction_id: '500',
              customer_id: 1,
              product_id: 10,
              quantity_purchased: 2,
              transaction_date: '2023-04-01',
              price: '19.90',
            },
          ])
        );

      const dataset = await new PgRetailStore().loadDataset();

      expect(dataset).toEqual({
        customers: [{ customer_id: 1, age: 33, gender: 'F', location: null, join_date: '2022-05-01' }],
        products: [{ product_id: 10, product_name: 'Lamp', category: 'Home', stock_level: null, price: 19.9 }],
        sales: [
          {
            transaction_id: 500,
            customer_id: 1,
            product_id: 10,
            quantity_purchased: 2,
            transaction_date: '2023-04-01',
            price: 19.9,
          },
        ],
      });
      expect(db.query).toHaveBeenCalledTimes(3);
      expect(db.query.mock.calls[0][0]).toContain('from customer');
      expect(db.query.mock.calls[2][0]).toContain('transaction_date::text as transaction_date');
    });

    it('reports a missing column as a precondition failure', async () => {
      db.query.mockRejectedValueOnce(pgError('42703', 'column "age" does not exist'));

      const error = await rejectionOf(new PgRetailStore().loadDataset());

      expect(error).toBeInstanceOf(HttpError);
      expect(error instanceof HttpError && error.statusCode).toBe(422);
      expect(error instanceof HttpError && error.message).toBe('load dataset: column "age" does not exist');
    });

    it('reports a row with a missing required value as a precondition failure', async () => {
      db.query
        .mockResolvedValueOnce(result([{ customer_id: 1, age: null, gender: null, location: null, join_date: null }]))
        .mockResolvedValueOnce(result([]))
        .mockResolvedValueOnce(result([]));

      const error = await rejectionOf(new PgRetailStore().loadDataset());

      expect(error instanceof HttpError && error.statusCode).toBe(422);
    });
  });

  describe('clean', () => {
    it('audits, normalizes and deduplicates inside one transaction', async () => {
      db.query
        .mockResolvedValueOnce(
          result([
            { missing_price: '2', missing_product_name: '0', missing_category: '1', missing_stock_level: '3' },
          ])
        )
        .mockResolvedValueOnce(result([], 4))
        .mockResolvedValueOnce(result([{ transaction_id: 12 }, { transaction_id: 7 }]));

      const summary = await new PgRetailStore().clean();

      expect(summary).toEqual({
        product_nulls: { missing_price: 2, missing_product_name: 0, missing_category: 1, missing_stock_level: 3 },
        locations_normalized: 4,
        duplicates_removed: 2,
        removed_transaction_ids: [7, 12],
      });
      expect(db.withTransaction).toHaveBeenCalledTimes(1);
      for (const call of db.query.mock.calls) {
        expect(call[2]).toBe(fakeClient);
      }
      expect(db.query.mock.calls[1][1]).toEqual(['BLANK']);
      expect(db.query.mock.calls[2][0]).toContain('min(transaction_id) as keep_id');
    });

    it('surfaces a failed statement as a storage failure', async () => {
      const cause = pgError('40P01', 'deadlock detected');
      db.query.mockRejectedValueOnce(cause);

      const error = await rejectionOf(new PgRetailStore().clean());

      expect(error instanceof HttpError && error.statusCode).toBe(503);
      expect(error instanceof HttpError && error.cause).toBe(cause);
    });
  });

  it('returns the database clock from ping', async () => {
    db.query.mockResolvedValueOnce(result([{ now: '2024-01-01 00:00:00+00' }]));
    await expect(new PgRetailStore().ping()).resolves.toBe('2024-01-01 00:00:00+00');
  });
});
