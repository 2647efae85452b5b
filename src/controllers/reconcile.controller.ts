import { Request, Response } from 'express';
import type { ReconciliationService } from '../services/reconciliation.service';
import {
  parseReconcileRequest,
  serviceManifest,
  toReconcileResponse,
} from '../services/protocolAdapter.service';
import { asyncHandler } from '../utils';

/**
 * Reconciliation protocol controller.
 * Answers in the protocol's own JSON shape, without the API envelope.
 */
export class ReconcileController {
  constructor(
    private readonly reconciler: ReconciliationService,
    private readonly catalogBaseUrl: string
  ) {}

  /**
   * GET /reconcile
   * Service manifest, or a reconciliation when `queries` is given
   */
  get = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    if (req.query.queries === undefined) {
      res.json(serviceManifest(this.catalogBaseUrl));
      return;
    }

    await this.respond({ queries: req.query.queries }, res);
  });

  /**
   * POST /reconcile
   * JSON body, or form-encoded `queries` holding the JSON string
   */
  post = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    await this.respond(req.body, res);
  });

  private async respond(body: unknown, res: Response): Promise<void> {
    const queries = parseReconcileRequest(body);
    const report = await this.reconciler.reconcileBatch(queries);
    res.json(toReconcileResponse(report.outcomes));
  }
}

export default ReconcileController;
