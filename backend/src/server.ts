import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { PgRetailStore } from './stores/pg-retail-store.js';

const config = loadConfig();
const app = createApp({ store: new PgRetailStore(), segmentTopN: config.segmentTopN });

app.listen(config.apiPort, () => {
  console.log(`[api] up on :${config.apiPort}`);
});
