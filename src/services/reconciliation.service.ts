/**
 * Reconciliation Service
 *
 * Wires the engine together for one catalog:
 *   raw query → normalize → fetch candidates → score → select
 *
 * Holds only immutable state (configuration, brand vocabulary and the
 * shared provider client), so concurrent pipelines never share mutable data.
 */

import {
  OpenFoodFactsProvider,
  ResilientCandidateProvider,
  type CandidateProvider,
} from '../catalog';
import { env, reconcilerConfigFromEnv } from '../config';
import {
  buildBrandVocabulary,
  explainScore,
  normalizeQuery,
  scoreCandidateWithBreakdown,
  selectMatches,
  type BatchOutcome,
  type CleaningLogEntry,
  type NormalizedQuery,
  type Query,
  type ReconcilerConfig,
  type ReconciliationResult,
  type ScoreBreakdown,
  type ScoredCandidate,
} from '../matching';
import { logger } from '../utils';
import { reconcileBatch } from './batchOrchestrator.service';
import { CleaningLogRecorder, type CleaningLogSummary } from './cleaningLog.service';

export interface BatchReport {
  outcomes: BatchOutcome[];
  cleaningLog: CleaningLogEntry[];
  summary: CleaningLogSummary;
}

export interface ReconciliationServiceOptions {
  /** Replaces the backoff sleep of the retry policy */
  sleep?: (ms: number) => Promise<void>;
}

export class ReconciliationService {
  private readonly provider: CandidateProvider;
  private readonly brandVocabulary: ReadonlySet<string>;

  constructor(
    provider: CandidateProvider,
    public readonly config: ReconcilerConfig,
    options: ReconciliationServiceOptions = {}
  ) {
    this.provider = new ResilientCandidateProvider(provider, {
      timeoutMs: config.catalogTimeoutMs,
      retryCount: config.retryCount,
      backoffBaseMs: config.backoffBaseMs,
      sleep: options.sleep,
    });
    this.brandVocabulary = buildBrandVocabulary(config.brandVocabulary, config.punctuation);
  }

  /**
   * @throws InvalidQueryError
   */
  normalize(query: Query): NormalizedQuery {
    return normalizeQuery(query, {
      punctuation: this.config.punctuation,
      brandVocabulary: this.brandVocabulary,
    });
  }

  /**
   * Reconciles a single query.
   *
   * @throws InvalidQueryError | UpstreamTimeoutError | UpstreamUnavailableError | UpstreamRejectedError
   */
  async reconcileQuery(query: Query): Promise<ReconciliationResult> {
    const normalized = this.normalize(query);

    // Punctuation-only text: nothing to search for
    if (!normalized.canonicalText) {
      return { queryId: query.id, matches: [] };
    }

    const candidates = await this.provider.fetch(normalized, this.config.candidateFetchLimit);

    const scoring = {
      brandBonus: this.config.brandBonus,
      brandPenalty: this.config.brandPenalty,
      punctuation: this.config.punctuation,
    };

    const scored: ScoredCandidate[] = [];
    let best: { breakdown: ScoreBreakdown; name: string } | undefined;
    for (const candidate of candidates) {
      const breakdown = scoreCandidateWithBreakdown(normalized, candidate, scoring);
      if (!best || breakdown.finalScore > best.breakdown.finalScore) {
        best = { breakdown, name: candidate.displayName };
      }
      scored.push({ candidate, score: breakdown.finalScore });
    }

    const result = selectMatches(query.id, scored, {
      scoreThreshold: this.config.scoreThreshold,
      autoMatchThreshold: this.config.autoMatchThreshold,
      ambiguityEpsilon: this.config.ambiguityEpsilon,
      topN: query.limit ?? this.config.topN,
    });

    if (best) {
      logger.debug(
        `"${normalized.canonicalText}" → "${best.name}": ${explainScore(best.breakdown)}`
      );
    }

    return result;
  }

  /**
   * Reconciles many queries with bounded concurrency. Never throws for a
   * single query's failure.
   */
  async reconcileBatch(
    queries: readonly Query[],
    concurrencyLimit: number = this.config.concurrencyLimit
  ): Promise<BatchReport> {
    const recorder = new CleaningLogRecorder();
    const outcomes = await reconcileBatch(
      queries,
      concurrencyLimit,
      (query) => this.reconcileQuery(query),
      recorder
    );

    return {
      outcomes,
      cleaningLog: recorder.entries(),
      summary: recorder.summary(),
    };
  }
}

/**
 * Builds the service against the Open Food Facts catalog from environment
 * configuration.
 *
 * @throws ConfigError
 */
export function createReconciliationService(): {
  service: ReconciliationService;
  catalog: OpenFoodFactsProvider;
} {
  const catalog = new OpenFoodFactsProvider({
    baseUrl: env.CATALOG_BASE_URL,
    userAgent: env.CATALOG_USER_AGENT,
    timeoutMs: env.CATALOG_TIMEOUT_MS,
  });

  return { service: new ReconciliationService(catalog, reconcilerConfigFromEnv()), catalog };
}

export default ReconciliationService;
