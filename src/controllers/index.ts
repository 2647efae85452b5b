export { healthController, HealthController } from './health.controller';
export { ReconcileController } from './reconcile.controller';
export { SearchController, searchQuerySchema } from './search.controller';
export {
  ReconciliationController,
  batchRequestSchema,
  toBatchQueries,
  MAX_SYNC_BATCH_SIZE,
  type BatchRequest,
} from './reconciliation.controller';
