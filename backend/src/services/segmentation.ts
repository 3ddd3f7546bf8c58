import type { SalesTransaction } from '../types/retail.js';
import { saleValue } from './joins.js';
import { chain, compareBy, groupBy, topPerPartition } from './ranking.js';
import { roundCents } from '../utils/numeric.js';

export type Segment = 'High Spender' | 'Medium Spender' | 'Low Spender' | 'Occasional Buyer';

export type CustomerSummary = {
  customer_id: number;
  transaction_count: number;
  total_spent: number;
  total_quantity: number;
};

export type SegmentedCustomer = CustomerSummary & {
  segment: Segment;
  segment_rank: number;
};

export type SegmentOptions = {
  topN?: number;
};

export const DEFAULT_SEGMENT_TOP_N = 3;

// Lower bounds, checked highest first. Ranges are half-open: 4999.50 is Low, 5000 is Medium.
const SEGMENT_FLOORS: ReadonlyArray<[Segment, number]> = [
  ['High Spender', 10_000],
  ['Medium Spender', 5_000],
  ['Low Spender', 1_000],
];

export function segmentFor(totalSpent: number): Segment {
  for (const [segment, floor] of SEGMENT_FLOORS) {
    if (totalSpent >= floor) return segment;
  }
  return 'Occasional Buyer';
}

export function summarizeCustomers(sales: readonly SalesTransaction[]): CustomerSummary[] {
  const summaries: CustomerSummary[] = [];
  for (const [customerId, rows] of groupBy(sales, (sale) => sale.customer_id)) {
    const transactions = new Set(rows.map((sale) => sale.transaction_id));
    summaries.push({
      customer_id: customerId,
      transaction_count: transactions.size,
      total_spent: roundCents(rows.reduce((acc, sale) => acc + saleValue(sale), 0)),
      total_quantity: rows.reduce((acc, sale) => acc + sale.quantity_purchased, 0),
    });
  }
  return summaries;
}

/** Top spenders of each segment, ordered by segment name then rank. */
export function customerSegments(
  sales: readonly SalesTransaction[],
  options: SegmentOptions = {}
): SegmentedCustomer[] {
  const topN = options.topN ?? DEFAULT_SEGMENT_TOP_N;
  const classified = summarizeCustomers(sales).map((summary) => ({
    ...summary,
    segment: segmentFor(summary.total_spent),
  }));

  return topPerPartition(
    classified,
    {
      partitionBy: (row) => row.segment,
      orderBy: [compareBy((row) => row.total_spent, 'desc'), compareBy((row) => row.customer_id)],
    },
    topN
  )
    .map(({ row, rank }) => ({ ...row, segment_rank: rank }))
    .sort(
      chain<SegmentedCustomer>([compareBy((row) => row.segment), compareBy((row) => row.segment_rank)])
    );
}
