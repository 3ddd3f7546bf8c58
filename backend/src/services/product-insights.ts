import type { ExtremeTag, Product, SalesTransaction } from '../types/retail.js';
import { joinSalesToProducts, type SaleWithProduct } from './joins.js';
import { chain, compareBy, rankWithinPartitions, type Comparator } from './ranking.js';

export type Tagged<T extends object> = T & { extreme: ExtremeTag };

export type CategoryBestSeller = SaleWithProduct & { category_rank: number };

function pickExtremes<T extends object>(rows: readonly T[], highest: Comparator<T>, lowest: Comparator<T>): Tagged<T>[] {
  if (rows.length === 0) return [];
  const tag = (row: T, extreme: ExtremeTag): Tagged<T> => ({ ...row, extreme });
  return [tag([...rows].sort(highest)[0], 'Highest'), tag([...rows].sort(lowest)[0], 'Lowest')];
}

/** Ties go to the lowest product id. Products without a price are skipped. */
export function extremePrices(products: readonly Product[]): Tagged<Product>[] {
  const priced = products.filter((product) => product.price !== null);
  const byId = compareBy<Product>((product) => product.product_id);
  return pickExtremes(
    priced,
    chain([compareBy<Product>((product) => product.price, 'desc'), byId]),
    chain([compareBy<Product>((product) => product.price, 'asc'), byId])
  );
}

/** Transaction-level extremes, not per-product totals. Ties go to the lowest transaction id. */
export function extremeQuantities(
  sales: readonly SalesTransaction[],
  products: readonly Product[]
): Tagged<SaleWithProduct>[] {
  const joined = joinSalesToProducts(sales, products);
  const byId = compareBy<SaleWithProduct>((row) => row.transaction_id);
  return pickExtremes(
    joined,
    chain([compareBy<SaleWithProduct>((row) => row.quantity_purchased, 'desc'), byId]),
    chain([compareBy<SaleWithProduct>((row) => row.quantity_purchased, 'asc'), byId])
  );
}

export function bestSellersByCategory(
  sales: readonly SalesTransaction[],
  products: readonly Product[]
): CategoryBestSeller[] {
  const ranked = rankWithinPartitions<SaleWithProduct>(joinSalesToProducts(sales, products), {
    partitionBy: (row) => row.category,
    orderBy: [
      compareBy<SaleWithProduct>((row) => row.quantity_purchased, 'desc'),
      compareBy<SaleWithProduct>((row) => row.transaction_id),
    ],
  });
  return ranked
    .filter((entry) => entry.rank === 1)
    .map((entry) => ({ ...entry.row, category_rank: entry.rank }))
    .sort(compareBy<CategoryBestSeller>((row) => row.category));
}
