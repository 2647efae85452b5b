import { Request, Response } from 'express';
import { z } from 'zod';
import type { Query } from '../matching/types';
import type { BatchJobService } from '../services/batchJob.service';
import { toCsv } from '../services/cleaningLog.service';
import { parseBatchLines } from '../services/protocolAdapter.service';
import type { ReconciliationService } from '../services/reconciliation.service';
import { AppError, asyncHandler, Logging, sendCsv, sendSuccess } from '../utils';

/**
 * Upper bound on a synchronous batch; larger lists go through /upload
 */
export const MAX_SYNC_BATCH_SIZE = 500;

const batchItemSchema = z.object({
  id: z.string().trim().min(1).optional(),
  query: z.string(),
  brand: z.string().optional(),
  limit: z.number().int().positive().optional(),
});

export const batchRequestSchema = z.union([
  z.object({ queries: z.array(batchItemSchema).min(1, 'queries must not be empty') }),
  z.object({ lines: z.string() }),
]);

export type BatchRequest = z.infer<typeof batchRequestSchema>;

/**
 * Maps a batch request to engine queries. Items without an id get
 * `item-<n>` by position.
 *
 * @throws AppError (400) for duplicate ids, an empty or oversized batch
 */
export function toBatchQueries(request: BatchRequest): Query[] {
  const queries: Query[] =
    'lines' in request
      ? parseBatchLines(request.lines)
      : request.queries.map((item, index) => ({
          id: item.id ?? `item-${index + 1}`,
          rawText: item.query,
          brand: item.brand,
          limit: item.limit,
        }));

  if (queries.length === 0) {
    throw AppError.badRequest('No input: provide at least one product name');
  }

  if (queries.length > MAX_SYNC_BATCH_SIZE) {
    throw AppError.badRequest(
      `Batch of ${queries.length} exceeds ${MAX_SYNC_BATCH_SIZE} items; upload a CSV instead`
    );
  }

  const ids = new Set(queries.map((query) => query.id));
  if (ids.size !== queries.length) {
    throw AppError.badRequest('Query ids must be unique within a batch');
  }

  return queries;
}

/**
 * Batch reconciliation controller
 */
export class ReconciliationController {
  constructor(
    private readonly reconciler: ReconciliationService,
    private readonly jobs: BatchJobService
  ) {}

  /**
   * POST /reconciliation/batch[?format=csv]
   */
  reconcileBatch = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const queries = toBatchQueries(batchRequestSchema.parse(req.body));
    const report = await this.reconciler.reconcileBatch(queries);

    if (req.query.format === 'csv') {
      sendCsv(res, toCsv(report.cleaningLog), 'cleaning-log.csv');
      return;
    }

    sendSuccess(
      res,
      { summary: report.summary, results: report.outcomes, cleaningLog: report.cleaningLog },
      `Reconciled ${report.summary.total} quer${report.summary.total === 1 ? 'y' : 'ies'}`
    );
  });

  /**
   * POST /reconciliation/upload
   */
  upload = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    Logging.info('📥 CSV Upload request received');

    if (!req.file) {
      Logging.warn('❌ Upload rejected: No file provided');
      throw AppError.badRequest('No file uploaded. Please upload a CSV file.');
    }

    const { originalname, path: filePath, size } = req.file;
    Logging.info(`📄 File received: ${originalname} (${(size / 1024).toFixed(2)} KB)`);

    const batchId = await this.jobs.submit(filePath, originalname);

    sendSuccess(res, { batchId }, 'File uploaded successfully. Processing started.', 202);
  });

  /**
   * GET /reconciliation/:batchId
   */
  getStatus = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const status = await this.jobs.getStatus(req.params.batchId);

    if (!status) {
      throw AppError.notFound('Reconciliation batch not found');
    }

    sendSuccess(res, status, 'Batch status retrieved');
  });

  /**
   * GET /reconciliation/:batchId/download
   */
  download = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { batchId } = req.params;
    const entries = await this.jobs.getCleaningLog(batchId);
    sendCsv(res, toCsv(entries), `cleaning-log-${batchId}.csv`);
  });
}

export default ReconciliationController;
