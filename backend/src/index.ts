export * from './types/retail.js';
export * from './services/ranking.js';
export * from './services/cleaning.js';
export * from './services/joins.js';
export * from './services/product-insights.js';
export * from './services/demographics.js';
export * from './services/repeat-purchases.js';
export * from './services/segmentation.js';
export * from './services/locations.js';
export * from './services/reports.js';
export * from './services/pipeline.js';
export type { RetailStore } from './stores/retail-store.js';
export { PgRetailStore } from './stores/pg-retail-store.js';
export { MemoryRetailStore } from './stores/memory-retail-store.js';
export { HttpError, preconditionFailed, storageFailure } from './errors.js';
export { createApp } from './app.js';
