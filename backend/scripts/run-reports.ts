import { promises as fsp } from 'node:fs';
import path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig } from '../src/config.js';
import { closePool } from '../src/db.js';
import { HttpError } from '../src/errors.js';
import { runReportingPipeline } from '../src/services/pipeline.js';
import { REPORT_NAMES, isReportName, type ReportName, type ReportRow } from '../src/services/reports.js';
import { MemoryRetailStore } from '../src/stores/memory-retail-store.js';
import { PgRetailStore } from '../src/stores/pg-retail-store.js';
import type { RetailStore } from '../src/stores/retail-store.js';
import { toCsv } from '../src/utils/csv.js';

type OutputFormat = 'json' | 'csv' | 'table';

type CliOptions = {
  input?: string;
  report: ReportName[];
  format: OutputFormat;
  out?: string;
  top?: number;
  skipCleaning?: boolean;
};

function parseReportName(value: string, previous: ReportName[]): ReportName[] {
  if (!isReportName(value)) {
    throw new InvalidArgumentError(`unknown report, expected one of: ${REPORT_NAMES.join(', ')}`);
  }
  return [...previous, value];
}

function parseFormat(value: string): OutputFormat {
  if (value === 'json' || value === 'csv' || value === 'table') return value;
  throw new InvalidArgumentError('expected json, csv or table');
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('expected a positive integer');
  }
  return parsed;
}

function render(rows: ReportRow[], format: OutputFormat): string {
  return format === 'csv' ? toCsv(rows) : `${JSON.stringify(rows, null, 2)}\n`;
}

async function emit(name: string, rows: ReportRow[], options: CliOptions): Promise<void> {
  if (options.format === 'table') {
    console.log(`\n${name}`);
    console.table(rows);
    return;
  }
  if (options.out) {
    const file = path.join(options.out, `${name}.${options.format}`);
    await fsp.writeFile(file, render(rows, options.format), 'utf8');
    console.log(`[reports] wrote ${file}`);
    return;
  }
  process.stdout.write(`# ${name}\n${render(rows, options.format)}`);
}

async function main(argv: string[]): Promise<void> {
  const program = new Command();

  program
    .name('run-reports')
    .description('Clean the retail tables and run the analytical reports')
    .option('-i, --input <file>', 'read customers, products and sales from a JSON file instead of PostgreSQL')
    .option('-r, --report <name>', 'report to run (repeatable, default: all)', parseReportName, [])
    .option('-f, --format <format>', 'json, csv or table', parseFormat, 'table')
    .option('-o, --out <dir>', 'write one file per report into this directory')
    .option('-t, --top <n>', 'customers kept per spending segment', parsePositiveInt)
    .option('--skip-cleaning', 'run reports on the tables as they are');

  program.parse(argv);
  const options = program.opts<CliOptions>();
  const config = loadConfig();

  const store: RetailStore = options.input
    ? await MemoryRetailStore.fromFile(options.input)
    : new PgRetailStore();

  if (options.out) {
    await fsp.mkdir(options.out, { recursive: true });
  }

  try {
    const result = await runReportingPipeline(store, {
      clean: !options.skipCleaning,
      reports: options.report.length > 0 ? options.report : REPORT_NAMES,
      topN: options.top ?? config.segmentTopN,
    });
    if (result.cleaning) {
      const { product_nulls, locations_normalized, duplicates_removed } = result.cleaning;
      await emit('cleaning', [{ ...product_nulls, locations_normalized, duplicates_removed }], options);
    }
    for (const [name, rows] of Object.entries(result.reports)) {
      if (rows) {
        await emit(name, rows, options);
      }
    }
  } finally {
    await closePool();
  }
}

main(process.argv).catch((error: unknown) => {
  if (error instanceof HttpError) {
    console.error(`[reports] ${error.message}`);
    if (error.details !== undefined) {
      console.error(JSON.stringify(error.details, null, 2));
    }
  } else {
    console.error('[reports] failed', error);
  }
  process.exitCode = 1;
});
