/**
 * Reconciliation Protocol Routes
 *
 * Mounted at the server root so that protocol clients can be pointed at
 * `http://host:port/reconcile`.
 */

import { Router } from 'express';
import { ReconcileController } from '../controllers';

export function createReconcileRoutes(controller: ReconcileController): Router {
  const router = Router();

  /**
   * @route   GET /reconcile
   * @desc    Service manifest; reconciles when `queries` is present
   * @access  Public
   */
  router.get('/', controller.get);

  /**
   * @route   POST /reconcile
   * @desc    Reconcile a map of keyed queries
   * @access  Public
   *
   * Request:
   * - { "queries": { "q0": { "query": "mlk", "brand": "..." } } }
   * - { "q0": { "query": "mlk" } }
   * - form field queries=<JSON string>
   */
  router.post('/', controller.post);

  return router;
}

export default createReconcileRoutes;
