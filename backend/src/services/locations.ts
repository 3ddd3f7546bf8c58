import type { Customer, ExtremeTag, SalesTransaction } from '../types/retail.js';
import { isBlankLocation } from './cleaning.js';
import { joinSalesToCustomers, saleValue, type SaleWithCustomer } from './joins.js';
import { chain, compareBy, concatSequences, groupBy, rankWithinPartitions, type Comparator } from './ranking.js';
import { roundCents } from '../utils/numeric.js';

export type LocationSales = {
  location: string;
  total_sales: number;
};

export type LocationProductTotal = {
  location: string;
  product_id: number;
  total_sales: number;
  customer_ids: string;
};

export type LocationProductExtreme = LocationProductTotal & {
  sales_rank: ExtremeTag;
};

type LocatedSale = SaleWithCustomer & { location: string };

function locatedSales(customers: readonly Customer[], sales: readonly SalesTransaction[]): LocatedSale[] {
  const located: LocatedSale[] = [];
  for (const sale of joinSalesToCustomers(sales, customers)) {
    const { location } = sale;
    if (location === null || isBlankLocation(location)) continue;
    located.push({ ...sale, location });
  }
  return located;
}

/** Null and empty locations are excluded; the BLANK sentinel is a location like any other. */
export function salesByLocation(
  customers: readonly Customer[],
  sales: readonly SalesTransaction[]
): LocationSales[] {
  const rows: LocationSales[] = [];
  for (const [location, group] of groupBy(locatedSales(customers, sales), (sale) => sale.location)) {
    rows.push({ location, total_sales: roundCents(group.reduce((acc, sale) => acc + saleValue(sale), 0)) });
  }
  return rows.sort(
    chain<LocationSales>([compareBy((row) => row.total_sales, 'desc'), compareBy((row) => row.location)])
  );
}

export function productTotalsByLocation(
  customers: readonly Customer[],
  sales: readonly SalesTransaction[]
): LocationProductTotal[] {
  const pairs = groupBy(locatedSales(customers, sales), (sale) => `${sale.location}|${sale.product_id}`);
  const totals: LocationProductTotal[] = [];
  for (const group of pairs.values()) {
    const buyers = [...new Set(group.map((sale) => sale.customer_id))].sort((a, b) => a - b);
    totals.push({
      location: group[0].location,
      product_id: group[0].product_id,
      total_sales: roundCents(group.reduce((acc, sale) => acc + saleValue(sale), 0)),
      customer_ids: buyers.join(','),
    });
  }
  return totals;
}

function* rankedFirst(
  totals: readonly LocationProductTotal[],
  order: Comparator<LocationProductTotal>,
  tag: ExtremeTag
): Generator<LocationProductExtreme> {
  const ranked = rankWithinPartitions(totals, {
    partitionBy: (row) => row.location,
    orderBy: [order, compareBy((row) => row.product_id)],
  });
  const winners = ranked
    .filter((entry) => entry.rank === 1)
    .map((entry) => entry.row)
    .sort(compareBy<LocationProductTotal>((row) => row.location));
  for (const row of winners) {
    yield { sales_rank: tag, ...row };
  }
}

/**
 * Best and worst product by sales value in every location. All "Highest" rows
 * come first, then all "Lowest" rows; a location with a single product appears
 * in both.
 */
export function locationProductExtremes(
  customers: readonly Customer[],
  sales: readonly SalesTransaction[]
): LocationProductExtreme[] {
  const totals = productTotalsByLocation(customers, sales);
  return [
    ...concatSequences(
      rankedFirst(totals, compareBy((row) => row.total_sales, 'desc'), 'Highest'),
      rankedFirst(totals, compareBy((row) => row.total_sales, 'asc'), 'Lowest')
    ),
  ];
}
