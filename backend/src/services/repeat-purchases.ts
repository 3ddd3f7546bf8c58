import type { Customer, Product, SalesTransaction } from '../types/retail.js';
import { indexBy } from './joins.js';
import { chain, compareBy, groupBy } from './ranking.js';

export type RepeatPurchase = {
  customer_id: number;
  product_id: number;
  age: number;
  product_name: string | null;
  category: string | null;
  purchase_count: number;
};

/** Customer/product pairs bought in two or more transactions. */
export function repeatPurchases(
  customers: readonly Customer[],
  products: readonly Product[],
  sales: readonly SalesTransaction[]
): RepeatPurchase[] {
  const customerById = indexBy(customers, (customer) => customer.customer_id);
  const productById = indexBy(products, (product) => product.product_id);
  const pairs = groupBy(sales, (sale) => `${sale.customer_id}|${sale.product_id}`);

  const rows: RepeatPurchase[] = [];
  for (const group of pairs.values()) {
    if (group.length < 2) continue;
    const { customer_id, product_id } = group[0];
    const customer = customerById.get(customer_id);
    const product = productById.get(product_id);
    if (!customer || !product) continue;
    rows.push({
      customer_id,
      product_id,
      age: customer.age,
      product_name: product.product_name,
      category: product.category,
      purchase_count: group.length,
    });
  }

  return rows.sort(
    chain<RepeatPurchase>([
      compareBy((row) => row.purchase_count, 'desc'),
      compareBy((row) => row.customer_id),
      compareBy((row) => row.product_id),
    ])
  );
}
