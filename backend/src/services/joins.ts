import type { Customer, Product, SalesTransaction } from '../types/retail.js';

export type SaleWithProduct = SalesTransaction & {
  product_name: string | null;
  category: string | null;
  list_price: number | null;
};

export type SaleWithCustomer = SalesTransaction & {
  age: number;
  gender: string | null;
  location: string | null;
};

export function indexBy<T, K>(rows: readonly T[], key: (row: T) => K): Map<K, T> {
  return new Map(rows.map((row) => [key(row), row]));
}

// Both joins are inner joins: a sale whose customer or product is unknown is dropped.

export function joinSalesToProducts(
  sales: readonly SalesTransaction[],
  products: readonly Product[]
): SaleWithProduct[] {
  const byId = indexBy(products, (product) => product.product_id);
  const joined: SaleWithProduct[] = [];
  for (const sale of sales) {
    const product = byId.get(sale.product_id);
    if (!product) continue;
    joined.push({
      ...sale,
      product_name: product.product_name,
      category: product.category,
      list_price: product.price,
    });
  }
  return joined;
}

export function joinSalesToCustomers(
  sales: readonly SalesTransaction[],
  customers: readonly Customer[]
): SaleWithCustomer[] {
  const byId = indexBy(customers, (customer) => customer.customer_id);
  const joined: SaleWithCustomer[] = [];
  for (const sale of sales) {
    const customer = byId.get(sale.customer_id);
    if (!customer) continue;
    joined.push({
      ...sale,
      age: customer.age,
      gender: customer.gender,
      location: customer.location,
    });
  }
  return joined;
}

export function saleValue(sale: Pick<SalesTransaction, 'quantity_purchased' | 'price'>): number {
  return sale.quantity_purchased * sale.price;
}
