import { notFound } from '../errors.js';
import type { RetailDataset } from '../types/retail.js';
import { auditProductNulls } from './cleaning.js';
import { spendingByAgeBand } from './demographics.js';
import { locationProductExtremes, salesByLocation } from './locations.js';
import { bestSellersByCategory, extremePrices, extremeQuantities } from './product-insights.js';
import { repeatPurchases } from './repeat-purchases.js';
import { customerSegments } from './segmentation.js';

export type ReportOptions = {
  topN?: number;
};

export type ReportRow = Record<string, unknown>;

export type ReportDefinition = {
  description: string;
  run: (dataset: RetailDataset, options: ReportOptions) => ReportRow[];
};

export const REPORTS = {
  'product-null-audit': {
    description: 'Missing price, name, category and stock level counts across products',
    run: ({ products }) => [auditProductNulls(products)],
  },
  'extreme-prices': {
    description: 'Most and least expensive product',
    run: ({ products }) => extremePrices(products),
  },
  'extreme-quantities': {
    description: 'Transactions with the largest and smallest quantity purchased',
    run: ({ sales, products }) => extremeQuantities(sales, products),
  },
  'category-best-sellers': {
    description: 'Highest-quantity transaction in each product category',
    run: ({ sales, products }) => bestSellersByCategory(sales, products),
  },
  'age-band-spending': {
    description: 'Quantity and spending per customer age band',
    run: ({ customers, sales }) => spendingByAgeBand(customers, sales),
  },
  'repeat-purchases': {
    description: 'Customers who bought the same product more than once',
    run: ({ customers, products, sales }) => repeatPurchases(customers, products, sales),
  },
  'customer-segments': {
    description: 'Top spenders in each spending segment',
    run: ({ sales }, options) => customerSegments(sales, { topN: options.topN }),
  },
  'location-sales': {
    description: 'Total sales value per customer location',
    run: ({ customers, sales }) => salesByLocation(customers, sales),
  },
  'location-product-extremes': {
    description: 'Best and worst selling product in each location',
    run: ({ customers, sales }) => locationProductExtremes(customers, sales),
  },
} satisfies Record<string, ReportDefinition>;

export type ReportName = keyof typeof REPORTS;

export const REPORT_NAMES = Object.keys(REPORTS).filter(isReportName);

export function isReportName(name: string): name is ReportName {
  return Object.prototype.hasOwnProperty.call(REPORTS, name);
}

export function runReport(name: string, dataset: RetailDataset, options: ReportOptions = {}): ReportRow[] {
  if (!isReportName(name)) {
    throw notFound(`unknown report: ${name}`);
  }
  const definition: ReportDefinition = REPORTS[name];
  return definition.run(dataset, options);
}
