import { Request, Response } from 'express';
import { z } from 'zod';
import type { ReconciliationService } from '../services/reconciliation.service';
import { asyncHandler, sendSuccess } from '../utils';

export const searchQuerySchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
  brand: z.string().trim().optional(),
  limit: z.coerce.number().int().positive().optional(),
});

/**
 * Single product search controller
 */
export class SearchController {
  constructor(private readonly reconciler: ReconciliationService) {}

  /**
   * GET /search?query=&brand=&limit=
   */
  search = asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const { query, brand, limit } = searchQuerySchema.parse(req.query);

    const result = await this.reconciler.reconcileQuery({
      id: 'search',
      rawText: query,
      brand: brand || undefined,
      limit,
    });

    sendSuccess(
      res,
      { query, brand: brand || null, matches: result.matches },
      `${result.matches.length} match(es) found`
    );
  });
}

export default SearchController;
