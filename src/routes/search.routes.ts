import { Router } from 'express';
import { SearchController } from '../controllers';

export function createSearchRoutes(controller: SearchController): Router {
  const router = Router();

  /**
   * @route   GET /search
   * @desc    Reconcile one product name
   * @access  Public
   *
   * Query params:
   * - query: string (required)
   * - brand: string (optional brand hint)
   * - limit: number (optional, clamped to 5..30)
   */
  router.get('/', controller.search);

  return router;
}

export default createSearchRoutes;
