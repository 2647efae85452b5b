import { Router } from 'express';
import {
  HealthController,
  ReconciliationController,
  SearchController,
} from '../controllers';
import createHealthRoutes from './health.routes';
import createReconciliationRoutes from './reconciliation.routes';
import createSearchRoutes from './search.routes';

export interface ApiControllers {
  health: HealthController;
  search: SearchController;
  reconciliation: ReconciliationController;
}

export function createRoutes(controllers: ApiControllers, uploadDir: string): Router {
  const router = Router();

  // Health check routes
  router.use('/health', createHealthRoutes(controllers.health));

  // Single product search
  router.use('/search', createSearchRoutes(controllers.search));

  // Batch reconciliation (synchronous batch, CSV upload + job status)
  router.use('/reconciliation', createReconciliationRoutes(controllers.reconciliation, uploadDir));

  return router;
}

export { createReconcileRoutes } from './reconcile.routes';

export default createRoutes;
