import { Router } from 'express';
import type { RetailStore } from '../stores/retail-store.js';
import { jsonRoute } from '../utils/async-handler.js';

export function createHealthRouter(store: RetailStore): Router {
  const router = Router();

  router.get(
    '/',
    jsonRoute(async () => ({ status: 'ok', time: await store.ping() }))
  );

  return router;
}
