import { Router } from 'express';
import { z } from 'zod';
import { notFound } from '../errors.js';
import { REPORTS, REPORT_NAMES, isReportName, runReport } from '../services/reports.js';
import type { RetailStore } from '../stores/retail-store.js';
import { jsonRoute } from '../utils/async-handler.js';

const reportQuerySchema = z.object({
  top: z.coerce.number().int().min(1).max(100).optional(),
});

export function createReportsRouter(store: RetailStore, defaults: { topN: number }): Router {
  const router = Router();

  router.get(
    '/',
    jsonRoute(async () =>
      REPORT_NAMES.map((name) => ({ name, description: REPORTS[name].description }))
    )
  );

  router.get(
    '/:name',
    jsonRoute(async (req) => {
      const { name } = req.params;
      if (!isReportName(name)) {
        throw notFound(`unknown report: ${name}`);
      }
      const { top } = reportQuerySchema.parse(req.query);
      const dataset = await store.loadDataset();
      return { report: name, rows: runReport(name, dataset, { topN: top ?? defaults.topN }) };
    })
  );

  return router;
}
