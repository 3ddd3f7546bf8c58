import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  datasetSchema,
  type Customer,
  type Product,
  type RetailDataset,
  type SalesTransaction,
} from '../src/types/retail.js';

const fixturePath = fileURLToPath(new URL('./fixtures/retail-dataset.json', import.meta.url));

export function loadFixture(): RetailDataset {
  return datasetSchema.parse(JSON.parse(readFileSync(fixturePath, 'utf8')));
}

export function customer(overrides: Partial<Customer> & Pick<Customer, 'customer_id'>): Customer {
  return {
    age: 30,
    gender: null,
    location: 'Lagos',
    join_date: '2022-01-01',
    ...overrides,
  };
}

export function product(overrides: Partial<Product> & Pick<Product, 'product_id'>): Product {
  return {
    product_name: `Product ${overrides.product_id}`,
    category: 'General',
    stock_level: 10,
    price: 10,
    ...overrides,
  };
}

export function sale(
  overrides: Partial<SalesTransaction> & Pick<SalesTransaction, 'transaction_id'>
): SalesTransaction {
  return {
    customer_id: 1,
    product_id: 10,
    quantity_purchased: 1,
    transaction_date: '2023-01-01',
    price: 10,
    ...overrides,
  };
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected promise to reject');
}
