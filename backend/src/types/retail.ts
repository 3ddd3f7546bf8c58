import { z } from 'zod';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const customerSchema = z.object({
  customer_id: z.number().int(),
  age: z.number().int().nonnegative(),
  gender: z.string().nullable(),
  location: z.string().nullable(),
  join_date: isoDate.nullable(),
});

export const productSchema = z.object({
  product_id: z.number().int(),
  product_name: z.string().nullable(),
  category: z.string().nullable(),
  stock_level: z.number().int().nullable(),
  price: z.number().nullable(),
});

export const saleSchema = z.object({
  transaction_id: z.number().int(),
  customer_id: z.number().int(),
  product_id: z.number().int(),
  quantity_purchased: z.number().int(),
  transaction_date: isoDate,
  price: z.number(),
});

export const datasetSchema = z.object({
  customers: z.array(customerSchema),
  products: z.array(productSchema),
  sales: z.array(saleSchema),
});

export type Customer = z.infer<typeof customerSchema>;
export type Product = z.infer<typeof productSchema>;
export type SalesTransaction = z.infer<typeof saleSchema>;
export type RetailDataset = z.infer<typeof datasetSchema>;

export const LOCATION_SENTINEL = 'BLANK';

export type ExtremeTag = 'Highest' | 'Lowest';

export type ProductNullAudit = {
  missing_price: number;
  missing_product_name: number;
  missing_category: number;
  missing_stock_level: number;
};

export type CleaningSummary = {
  product_nulls: ProductNullAudit;
  locations_normalized: number;
  duplicates_removed: number;
  removed_transaction_ids: number[];
};
