/**
 * Error taxonomy for the reconciliation pipeline.
 *
 * Every pipeline error carries an ErrorKind so the batch orchestrator can
 * turn it into a BatchOutcome failure without inspecting messages.
 */

import { AppError } from '../utils/AppError';
import { errorMessage } from '../utils/errorMessage';
import type { ErrorKind } from './types';

export abstract class ReconciliationError extends AppError {
  public abstract readonly kind: ErrorKind;
}

/**
 * Raw text empty or whitespace-only. Never retried.
 */
export class InvalidQueryError extends ReconciliationError {
  public readonly kind = 'INVALID_QUERY' as const;

  constructor(message = 'Query text is empty') {
    super(message, 400);
  }
}

/**
 * Maps anything thrown inside a pipeline to an ErrorKind and a detail message.
 */
export function classifyError(error: unknown): { kind: ErrorKind; detail: string } {
  if (error instanceof ReconciliationError) {
    return { kind: error.kind, detail: error.message };
  }

  return {
    kind: 'INTERNAL',
    detail: errorMessage(error),
  };
}
