import type { Customer, SalesTransaction } from '../types/retail.js';
import { joinSalesToCustomers, saleValue } from './joins.js';
import { roundCents } from '../utils/numeric.js';

export const AGE_BANDS = ['Teen', 'Young Adult', 'Adult', 'Senior'] as const;

export type AgeBand = (typeof AGE_BANDS)[number];

export type AgeBandSpending = {
  age_band: AgeBand;
  total_quantity: number;
  total_spending: number;
};

// Inclusive upper bounds; Senior is open-ended.
const BAND_UPPER_BOUNDS: ReadonlyArray<[AgeBand, number]> = [
  ['Teen', 18],
  ['Young Adult', 35],
  ['Adult', 55],
];

export function ageBand(age: number): AgeBand {
  for (const [band, upper] of BAND_UPPER_BOUNDS) {
    if (age <= upper) return band;
  }
  return 'Senior';
}

export function spendingByAgeBand(
  customers: readonly Customer[],
  sales: readonly SalesTransaction[]
): AgeBandSpending[] {
  const totals = new Map<AgeBand, { quantity: number; spending: number }>();
  for (const sale of joinSalesToCustomers(sales, customers)) {
    const band = ageBand(sale.age);
    const current = totals.get(band) ?? { quantity: 0, spending: 0 };
    current.quantity += sale.quantity_purchased;
    current.spending += saleValue(sale);
    totals.set(band, current);
  }

  return AGE_BANDS.filter((band) => totals.has(band))
    .map((band) => {
      const { quantity, spending } = totals.get(band) ?? { quantity: 0, spending: 0 };
      return { age_band: band, total_quantity: quantity, total_spending: roundCents(spending) };
    })
    .sort((a, b) => b.total_spending - a.total_spending);
}
