import {
  LOCATION_SENTINEL,
  type Customer,
  type Product,
  type ProductNullAudit,
  type SalesTransaction,
} from '../types/retail.js';

export function auditProductNulls(products: readonly Product[]): ProductNullAudit {
  const audit: ProductNullAudit = {
    missing_price: 0,
    missing_product_name: 0,
    missing_category: 0,
    missing_stock_level: 0,
  };
  for (const product of products) {
    if (product.price === null) audit.missing_price += 1;
    if (product.product_name === null) audit.missing_product_name += 1;
    if (product.category === null) audit.missing_category += 1;
    if (product.stock_level === null) audit.missing_stock_level += 1;
  }
  return audit;
}

export function isBlankLocation(location: string | null): boolean {
  return location === null || location === '';
}

export type LocationNormalization = {
  customers: Customer[];
  normalized: number;
};

export function normalizeLocations(customers: readonly Customer[]): LocationNormalization {
  let normalized = 0;
  const result = customers.map((customer) => {
    if (!isBlankLocation(customer.location)) {
      return customer;
    }
    normalized += 1;
    return { ...customer, location: LOCATION_SENTINEL };
  });
  return { customers: result, normalized };
}

export function duplicateKey(sale: SalesTransaction): string {
  return `${sale.product_id}|${sale.customer_id}|${sale.transaction_date}`;
}

export type SalesDeduplication = {
  sales: SalesTransaction[];
  removedTransactionIds: number[];
};

/**
 * Keeps, for each (product, customer, date), the transaction with the lowest id.
 * Surviving rows stay in input order.
 */
export function deduplicateSales(sales: readonly SalesTransaction[]): SalesDeduplication {
  const representative = new Map<string, number>();
  for (const sale of sales) {
    const key = duplicateKey(sale);
    const current = representative.get(key);
    if (current === undefined || sale.transaction_id < current) {
      representative.set(key, sale.transaction_id);
    }
  }

  const kept: SalesTransaction[] = [];
  const removedTransactionIds: number[] = [];
  for (const sale of sales) {
    if (representative.get(duplicateKey(sale)) === sale.transaction_id) {
      kept.push(sale);
    } else {
      removedTransactionIds.push(sale.transaction_id);
    }
  }
  removedTransactionIds.sort((a, b) => a - b);
  return { sales: kept, removedTransactionIds };
}
