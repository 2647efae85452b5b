import { Request } from 'express';
import morgan, { StreamOptions } from 'morgan';
import { logger } from '../utils';
import { env } from '../config';

// Morgan stream for Winston
const stream: StreamOptions = {
  write: (message: string) => {
    logger.info(message.trim());
  },
};

// Quiet in tests; liveness probes are noise in production
const skip = (req: Request): boolean => {
  if (env.NODE_ENV === 'test') return true;
  return env.NODE_ENV === 'production' && req.originalUrl.startsWith(`${env.API_PREFIX}/health`);
};

export const requestLogger = morgan(
  env.NODE_ENV === 'production' ? 'combined' : 'dev',
  { stream, skip }
);

export default requestLogger;
