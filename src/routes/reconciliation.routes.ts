/**
 * Reconciliation API Routes
 *
 * Endpoints for batch reconciliation and background CSV jobs.
 * These routes handle HTTP concerns only - business logic is delegated to services.
 *
 * Endpoints:
 * - POST /batch - Reconcile a list of product names synchronously
 * - POST /upload - Upload a product CSV for background reconciliation
 * - GET /:batchId - Get background job status and progress
 * - GET /:batchId/download - Download the cleaning log as CSV
 */

import { Router, Request } from 'express';
import multer from 'multer';
import { existsSync, mkdirSync } from 'fs';
import { ReconciliationController } from '../controllers';
import { commonSchemas, validateRequest } from '../middlewares';
import { AppError } from '../utils';

// ============================================
// Multer Configuration
// ============================================

export const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

/**
 * File filter to only accept CSV files
 */
const fileFilter = (_req: Request, file: Express.Multer.File, cb: multer.FileFilterCallback) => {
  const allowedMimeTypes = ['text/csv', 'application/csv', 'text/plain', 'application/vnd.ms-excel'];
  const mimeTypeOk = allowedMimeTypes.includes(file.mimetype);
  const extensionOk = file.originalname.toLowerCase().endsWith('.csv');

  if (mimeTypeOk || extensionOk) {
    cb(null, true);
  } else {
    cb(AppError.badRequest('Only CSV files are allowed'));
  }
};

/**
 * Multer upload middleware storing files on disk, so that the worker can
 * stream them
 */
function createUploadMiddleware(uploadDir: string): multer.Multer {
  if (!existsSync(uploadDir)) {
    mkdirSync(uploadDir, { recursive: true });
  }

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, uploadDir);
    },
    filename: (_req, _file, cb) => {
      const uniqueSuffix = `${Date.now()}-${Math.round(Math.random() * 1e9)}`;
      cb(null, `products_${uniqueSuffix}.csv`);
    },
  });

  return multer({
    storage,
    fileFilter,
    limits: {
      fileSize: MAX_UPLOAD_BYTES,
      files: 1,
    },
  });
}

// ============================================
// Routes
// ============================================

export function createReconciliationRoutes(
  controller: ReconciliationController,
  uploadDir: string
): Router {
  const router = Router();
  const upload = createUploadMiddleware(uploadDir);

  /**
   * @route   POST /api/reconciliation/batch
   * @desc    Reconcile product names synchronously
   * @access  Public
   *
   * Request:
   * - { queries: [{ id?, query, brand?, limit? }] }
   * - { lines: "whole milk, brand\nketchup" }
   *
   * Query params:
   * - format: "csv" to receive the cleaning log as CSV
   */
  router.post('/batch', controller.reconcileBatch);

  /**
   * @route   POST /api/reconciliation/upload
   * @desc    Upload a product CSV for background reconciliation
   * @access  Public
   *
   * Request:
   * - Content-Type: multipart/form-data
   * - Field name: "file"
   *
   * Response:
   * - 202 Accepted: { batchId: string }
   * - 503 Service Unavailable: background processing offline
   */
  router.post('/upload', upload.single('file'), controller.upload);

  /**
   * @route   GET /api/reconciliation/:batchId
   * @desc    Get background job status and progress
   * @access  Public
   */
  router.get('/:batchId', validateRequest({ params: commonSchemas.batchId }), controller.getStatus);

  /**
   * @route   GET /api/reconciliation/:batchId/download
   * @desc    Download the cleaning log as CSV
   * @access  Public
   */
  router.get(
    '/:batchId/download',
    validateRequest({ params: commonSchemas.batchId }),
    controller.download
  );

  return router;
}

export default createReconciliationRoutes;
