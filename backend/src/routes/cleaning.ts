import { Router } from 'express';
import type { RetailStore } from '../stores/retail-store.js';
import { jsonRoute } from '../utils/async-handler.js';

export function createCleaningRouter(store: RetailStore): Router {
  const router = Router();

  router.post(
    '/',
    jsonRoute(async () => {
      const summary = await store.clean();
      console.log(
        `[api] cleaning: ${summary.locations_normalized} locations normalized, ${summary.duplicates_removed} duplicates removed`
      );
      return summary;
    })
  );

  return router;
}
