import { Request, Response } from 'express';
import { logger } from '../utils';

/**
 * Handle 404 - Route not found
 */
export const notFound = (req: Request, res: Response): void => {
  logger.debug(`No route for ${req.method} ${req.originalUrl}`);

  res.status(404).json({
    success: false,
    error: 'Route not found',
    path: req.originalUrl,
    timestamp: new Date().toISOString(),
  });
};

export default notFound;
