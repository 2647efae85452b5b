import { Router } from 'express';
import { HealthController } from '../controllers';

export function createHealthRoutes(controller: HealthController): Router {
  const router = Router();

  /**
   * @route   GET /health
   * @desc    Basic health check
   * @access  Public
   */
  router.get('/', controller.getHealth);

  /**
   * @route   GET /health/ready
   * @desc    Readiness check (reports background job availability)
   * @access  Public
   */
  router.get('/ready', controller.getReadiness);

  /**
   * @route   GET /health/live
   * @desc    Liveness check
   * @access  Public
   */
  router.get('/live', controller.getLiveness);

  return router;
}

export default createHealthRoutes;
