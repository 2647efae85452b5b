import { readFileSync } from 'fs';
import { join } from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import {
  DEFAULT_AMBIGUITY_EPSILON,
  DEFAULT_AUTO_MATCH_THRESHOLD,
  DEFAULT_BACKOFF_BASE_MS,
  DEFAULT_BRAND_BONUS,
  DEFAULT_BRAND_PENALTY,
  DEFAULT_CANDIDATE_FETCH_LIMIT,
  DEFAULT_CATALOG_TIMEOUT_MS,
  DEFAULT_CONCURRENCY_LIMIT,
  DEFAULT_PUNCTUATION,
  DEFAULT_RETRY_COUNT,
  DEFAULT_SCORE_THRESHOLD,
  DEFAULT_TOP_N,
  MAX_CANDIDATE_FETCH_LIMIT,
  MAX_RETRY_COUNT,
  TOP_N_MAX,
  TOP_N_MIN,
} from '../matching/constants';
import type { ReconcilerConfig } from '../matching/types';
import type { EnvConfig } from '../types';
import { errorMessage } from '../utils/errorMessage';

dotenv.config();

/**
 * Malformed configuration. Fatal: the process must not accept work.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

function formatIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

// ============================================
// Environment
// ============================================

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  CORS_ORIGIN: z
    .string()
    .default('*')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean)
    ),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(300),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  // Redis (OPTIONAL - only background CSV jobs need it)
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  // Catalog
  CATALOG_BASE_URL: z.string().url().default('https://world.openfoodfacts.org'),
  CATALOG_USER_AGENT: z.string().default('product-reconciliation-backend/1.0'),
  CATALOG_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_CATALOG_TIMEOUT_MS),
  CATALOG_RETRY_COUNT: z.coerce.number().int().min(0).default(DEFAULT_RETRY_COUNT),
  CATALOG_BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(DEFAULT_BACKOFF_BASE_MS),
  CATALOG_FETCH_LIMIT: z.coerce.number().int().default(DEFAULT_CANDIDATE_FETCH_LIMIT),
  CATALOG_STARTUP_CHECK: booleanString.default('true'),
  // Matching
  SCORE_THRESHOLD: z.coerce.number().default(DEFAULT_SCORE_THRESHOLD),
  AUTO_MATCH_THRESHOLD: z.coerce.number().default(DEFAULT_AUTO_MATCH_THRESHOLD),
  AMBIGUITY_EPSILON: z.coerce.number().default(DEFAULT_AMBIGUITY_EPSILON),
  TOP_N: z.coerce.number().int().default(DEFAULT_TOP_N),
  CONCURRENCY_LIMIT: z.coerce.number().int().default(DEFAULT_CONCURRENCY_LIMIT),
  BRAND_BONUS: z.coerce.number().default(DEFAULT_BRAND_BONUS),
  BRAND_PENALTY: z.coerce.number().default(DEFAULT_BRAND_PENALTY),
  BRAND_VOCABULARY_PATH: z.string().default(join(__dirname, '..', '..', 'data', 'brands.json')),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(2),
});

/**
 * Parses environment variables into a typed, frozen configuration.
 *
 * @throws ConfigError
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  return Object.freeze(parsed.data);
}

export const env = loadEnv();

// ============================================
// Engine configuration
// ============================================

const unitInterval = z.number().min(0).max(1);

const reconcilerConfigSchema = z
  .object({
    scoreThreshold: unitInterval,
    autoMatchThreshold: unitInterval,
    ambiguityEpsilon: unitInterval,
    topN: z.number().int().min(TOP_N_MIN).max(TOP_N_MAX),
    concurrencyLimit: z.number().int().min(1),
    candidateFetchLimit: z.number().int().min(1).max(MAX_CANDIDATE_FETCH_LIMIT),
    retryCount: z.number().int().min(0).max(MAX_RETRY_COUNT),
    backoffBaseMs: z.number().min(0),
    catalogTimeoutMs: z.number().positive(),
    brandBonus: unitInterval,
    brandPenalty: unitInterval,
    punctuation: z.string(),
    brandVocabulary: z.array(z.string()),
  })
  .refine((config) => config.autoMatchThreshold > config.scoreThreshold, {
    message: 'autoMatchThreshold must be greater than scoreThreshold',
    path: ['autoMatchThreshold'],
  });

export const DEFAULT_RECONCILER_CONFIG: ReconcilerConfig = Object.freeze({
  scoreThreshold: DEFAULT_SCORE_THRESHOLD,
  autoMatchThreshold: DEFAULT_AUTO_MATCH_THRESHOLD,
  ambiguityEpsilon: DEFAULT_AMBIGUITY_EPSILON,
  topN: DEFAULT_TOP_N,
  concurrencyLimit: DEFAULT_CONCURRENCY_LIMIT,
  candidateFetchLimit: DEFAULT_CANDIDATE_FETCH_LIMIT,
  retryCount: DEFAULT_RETRY_COUNT,
  backoffBaseMs: DEFAULT_BACKOFF_BASE_MS,
  catalogTimeoutMs: DEFAULT_CATALOG_TIMEOUT_MS,
  brandBonus: DEFAULT_BRAND_BONUS,
  brandPenalty: DEFAULT_BRAND_PENALTY,
  punctuation: DEFAULT_PUNCTUATION,
  brandVocabulary: Object.freeze([]),
});

/**
 * Builds the immutable engine configuration from defaults plus overrides.
 *
 * @throws ConfigError
 */
export function createReconcilerConfig(overrides: Partial<ReconcilerConfig> = {}): ReconcilerConfig {
  const parsed = reconcilerConfigSchema.safeParse({ ...DEFAULT_RECONCILER_CONFIG, ...overrides });
  if (!parsed.success) {
    throw new ConfigError(`Invalid reconciler configuration: ${formatIssues(parsed.error)}`);
  }

  return Object.freeze({
    ...parsed.data,
    brandVocabulary: Object.freeze([...parsed.data.brandVocabulary]),
  });
}

/**
 * Reads the known-brand vocabulary (a JSON array of strings).
 *
 * @throws ConfigError
 */
export function loadBrandVocabulary(filePath: string): string[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot read brand vocabulary at ${filePath}: ${errorMessage(error, 'unknown error')}`
    );
  }

  const parsed = z.array(z.string()).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Brand vocabulary at ${filePath} must be an array of strings`);
  }
  return parsed.data;
}

/**
 * Engine configuration derived from the environment.
 */
export function reconcilerConfigFromEnv(source: EnvConfig = env): ReconcilerConfig {
  return createReconcilerConfig({
    scoreThreshold: source.SCORE_THRESHOLD,
    autoMatchThreshold: source.AUTO_MATCH_THRESHOLD,
    ambiguityEpsilon: source.AMBIGUITY_EPSILON,
    topN: source.TOP_N,
    concurrencyLimit: source.CONCURRENCY_LIMIT,
    candidateFetchLimit: source.CATALOG_FETCH_LIMIT,
    retryCount: source.CATALOG_RETRY_COUNT,
    backoffBaseMs: source.CATALOG_BACKOFF_BASE_MS,
    catalogTimeoutMs: source.CATALOG_TIMEOUT_MS,
    brandBonus: source.BRAND_BONUS,
    brandPenalty: source.BRAND_PENALTY,
    brandVocabulary: loadBrandVocabulary(source.BRAND_VOCABULARY_PATH),
  });
}

export default env;
