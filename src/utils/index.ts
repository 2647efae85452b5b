export { default as logger, Logging } from './logger';
export { sendSuccess, sendError, sendCsv } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError } from './AppError';
export { errorMessage } from './errorMessage';
