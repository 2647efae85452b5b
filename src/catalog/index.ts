/**
 * Catalog access: the Candidate Provider contract, its timeout/retry
 * wrapper and the Open Food Facts implementation.
 */

export {
  candidateRecordSchema,
  parseCandidateRecords,
  type CandidateProvider,
} from './candidateProvider';
export { ResilientCandidateProvider, dedupeCandidates, type RetryPolicy } from './resilientProvider';
export {
  OpenFoodFactsProvider,
  toUpstreamError,
  type OpenFoodFactsOptions,
} from './openFoodFacts.provider';
export { UpstreamRejectedError, UpstreamTimeoutError, UpstreamUnavailableError } from './errors';
