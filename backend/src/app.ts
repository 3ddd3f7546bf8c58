import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import YAML from 'yaml';
import { z } from 'zod';
import { createHealthRouter } from './routes/health.js';
import { createReportsRouter } from './routes/reports.js';
import { createCleaningRouter } from './routes/cleaning.js';
import { createPipelineRouter } from './routes/pipeline.js';
import { errorHandler } from './middleware/error-handler.js';
import { DEFAULT_SEGMENT_TOP_N } from './services/segmentation.js';
import type { RetailStore } from './stores/retail-store.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const openApiPath = path.resolve(currentDir, '../openapi/openapi.yaml');

export type AppOptions = {
  store: RetailStore;
  segmentTopN?: number;
  accessLog?: boolean;
};

export function createApp({ store, segmentTopN = DEFAULT_SEGMENT_TOP_N, accessLog = true }: AppOptions): Express {
  const openApiDocument = z.record(z.unknown()).parse(YAML.parse(readFileSync(openApiPath, 'utf8')));
  const defaults = { topN: segmentTopN };

  const app = express();
  app.set('trust proxy', true);
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  if (accessLog) {
    app.use(morgan('combined'));
  }

  app.use('/api/v1/health', createHealthRouter(store));
  app.use('/api/docs', swaggerUi.serve, swaggerUi.setup(openApiDocument));
  app.get('/api/v1/openapi.json', (_req, res) => {
    res.json(openApiDocument);
  });

  app.use('/api/v1/reports', createReportsRouter(store, defaults));
  app.use('/api/v1/cleaning', createCleaningRouter(store));
  app.use('/api/v1/pipeline', createPipelineRouter(store, defaults));

  app.use(errorHandler);

  return app;
}
