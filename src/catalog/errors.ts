/**
 * Failures of the external catalog.
 *
 * - UpstreamTimeoutError: the call exceeded its deadline (retried)
 * - UpstreamUnavailableError: network failure or 5xx (not retried by the core)
 * - UpstreamRejectedError: 4xx, the request itself is wrong (never retried)
 */

import { ReconciliationError } from '../matching/errors';

export class UpstreamTimeoutError extends ReconciliationError {
  public readonly kind = 'UPSTREAM_TIMEOUT' as const;

  constructor(message = 'Catalog request timed out') {
    super(message, 504);
  }
}

export class UpstreamUnavailableError extends ReconciliationError {
  public readonly kind = 'UPSTREAM_UNAVAILABLE' as const;

  constructor(message = 'Catalog is unavailable') {
    super(message, 503);
  }
}

export class UpstreamRejectedError extends ReconciliationError {
  public readonly kind = 'UPSTREAM_REJECTED' as const;
  public readonly upstreamStatus: number;

  constructor(upstreamStatus: number, message = `Catalog rejected the request (${upstreamStatus})`) {
    super(message, 502);
    this.upstreamStatus = upstreamStatus;
  }
}
