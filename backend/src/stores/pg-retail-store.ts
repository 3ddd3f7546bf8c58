import { query, withTransaction } from '../db.js';
import { translateStoreError } from '../errors.js';
import {
  LOCATION_SENTINEL,
  customerSchema,
  productSchema,
  saleSchema,
  type CleaningSummary,
  type ProductNullAudit,
  type RetailDataset,
} from '../types/retail.js';
import { toNumeric } from '../utils/numeric.js';
import type { RetailStore } from './retail-store.js';

type NumericColumn = string | number | null;

type CustomerRow = {
  customer_id: NumericColumn;
  age: NumericColumn;
  gender: string | null;
  location: string | null;
  join_date: string | null;
};

type ProductRow = {
  product_id: NumericColumn;
  product_name: string | null;
  category: string | null;
  stock_level: NumericColumn;
  price: NumericColumn;
};

type SaleRow = {
  transaction_id: NumericColumn;
  customer_id: NumericColumn;
  product_id: NumericColumn;
  quantity_purchased: NumericColumn;
  transaction_date: string | null;
  price: NumericColumn;
};

type NullAuditRow = {
  missing_price: string;
  missing_product_name: string;
  missing_category: string;
  missing_stock_level: string;
};

function mapCustomer(row: CustomerRow) {
  return customerSchema.parse({
    ...row,
    customer_id: toNumeric(row.customer_id),
    age: toNumeric(row.age),
  });
}

function mapProduct(row: ProductRow) {
  return productSchema.parse({
    ...row,
    product_id: toNumeric(row.product_id),
    stock_level: toNumeric(row.stock_level),
    price: toNumeric(row.price),
  });
}

function mapSale(row: SaleRow) {
  return saleSchema.parse({
    ...row,
    transaction_id: toNumeric(row.transaction_id),
    customer_id: toNumeric(row.customer_id),
    product_id: toNumeric(row.product_id),
    quantity_purchased: toNumeric(row.quantity_purchased),
    price: toNumeric(row.price),
  });
}

function mapNullAudit(row: NullAuditRow | undefined): ProductNullAudit {
  return {
    missing_price: toNumeric(row?.missing_price) ?? 0,
    missing_product_name: toNumeric(row?.missing_product_name) ?? 0,
    missing_category: toNumeric(row?.missing_category) ?? 0,
    missing_stock_level: toNumeric(row?.missing_stock_level) ?? 0,
  };
}

export class PgRetailStore implements RetailStore {
  async ping(): Promise<string> {
    try {
      const { rows } = await query<{ now: string }>('select now()::text as now');
      return rows[0].now;
    } catch (error) {
      throw translateStoreError(error, 'ping');
    }
  }

  async loadDataset(): Promise<RetailDataset> {
    try {
      const customers = await query<CustomerRow>(
        `select customer_id, age, gender, location, join_date::text as join_date
         from customer
         order by customer_id`
      );
      const products = await query<ProductRow>(
        `select product_id, product_name, category, stock_level, price
         from product
         order by product_id`
      );
      const sales = await query<SaleRow>(
        `select transaction_id, customer_id, product_id, quantity_purchased,
                transaction_date::text as transaction_date, price
         from sale
         order by transaction_id`
      );
      return {
        customers: customers.rows.map(mapCustomer),
        products: products.rows.map(mapProduct),
        sales: sales.rows.map(mapSale),
      };
    } catch (error) {
      throw translateStoreError(error, 'load dataset');
    }
  }

  async clean(): Promise<CleaningSummary> {
    try {
      return await withTransaction(async (client) => {
        const audit = await query<NullAuditRow>(
          `select
             count(*) filter (where price is null) as missing_price,
             count(*) filter (where product_name is null) as missing_product_name,
             count(*) filter (where category is null) as missing_category,
             count(*) filter (where stock_level is null) as missing_stock_level
           from product`,
          [],
          client
        );

        const normalized = await query(
          `update customer
           set location = $1
           where location is null or location = ''`,
          [LOCATION_SENTINEL],
          client
        );

        const removed = await query<{ transaction_id: NumericColumn }>(
          `delete from sale s
           using (
             select product_id, customer_id, transaction_date, min(transaction_id) as keep_id
             from sale
             group by product_id, customer_id, transaction_date
           ) keep
           where s.product_id = keep.product_id
             and s.customer_id = keep.customer_id
             and s.transaction_date = keep.transaction_date
             and s.transaction_id <> keep.keep_id
           returning s.transaction_id`,
          [],
          client
        );

        const removedIds = removed.rows
          .map((row) => toNumeric(row.transaction_id))
          .filter((id): id is number => id !== null)
          .sort((a, b) => a - b);

        return {
          product_nulls: mapNullAudit(audit.rows[0]),
          locations_normalized: normalized.rowCount ?? 0,
          duplicates_removed: removedIds.length,
          removed_transaction_ids: removedIds,
        };
      });
    } catch (error) {
      throw translateStoreError(error, 'cleaning');
    }
  }
}
