import { Router } from 'express';
import { z } from 'zod';
import { runReportingPipeline } from '../services/pipeline.js';
import { isReportName, type ReportName } from '../services/reports.js';
import type { RetailStore } from '../stores/retail-store.js';
import { jsonRoute } from '../utils/async-handler.js';

const reportNameSchema = z.custom<ReportName>(
  (value) => typeof value === 'string' && isReportName(value),
  { message: 'unknown report' }
);

const runPipelineSchema = z.object({
  clean: z.boolean().optional(),
  reports: z.array(reportNameSchema).min(1).optional(),
  top: z.number().int().min(1).max(100).optional(),
});

export function createPipelineRouter(store: RetailStore, defaults: { topN: number }): Router {
  const router = Router();

  router.post(
    '/',
    jsonRoute(async (req) => {
      const payload = runPipelineSchema.parse(req.body ?? {});
      return runReportingPipeline(store, {
        clean: payload.clean,
        reports: payload.reports,
        topN: payload.top ?? defaults.topN,
      });
    })
  );

  return router;
}
