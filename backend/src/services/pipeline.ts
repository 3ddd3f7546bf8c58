import type { RetailStore } from '../stores/retail-store.js';
import type { CleaningSummary } from '../types/retail.js';
import { REPORT_NAMES, runReport, type ReportName, type ReportOptions, type ReportRow } from './reports.js';

export type PipelineOptions = ReportOptions & {
  clean?: boolean;
  reports?: readonly ReportName[];
};

export type PipelineResult = {
  cleaning: CleaningSummary | null;
  reports: Partial<Record<ReportName, ReportRow[]>>;
};

/**
 * Cleaning commits before the dataset is loaded, so every report sees the
 * cleaned relations.
 */
export async function runReportingPipeline(
  store: RetailStore,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const { clean = true, reports = REPORT_NAMES, ...reportOptions } = options;

  let cleaning: CleaningSummary | null = null;
  if (clean) {
    cleaning = await store.clean();
    console.log(
      `[pipeline] cleaning done: ${cleaning.locations_normalized} locations normalized, ${cleaning.duplicates_removed} duplicate sales removed`
    );
  }

  const dataset = await store.loadDataset();
  console.log(
    `[pipeline] loaded ${dataset.customers.length} customers, ${dataset.products.length} products, ${dataset.sales.length} sales`
  );

  const results: PipelineResult['reports'] = {};
  for (const name of reports) {
    const rows = runReport(name, dataset, reportOptions);
    results[name] = rows;
    console.log(`[pipeline] ${name}: ${rows.length} rows`);
  }

  return { cleaning, reports: results };
}
