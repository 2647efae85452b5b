import { Request, Response, NextFunction } from 'express';

// Environment configuration type
export interface EnvConfig {
  readonly NODE_ENV: 'development' | 'production' | 'test';
  readonly PORT: number;
  readonly HOST: string;
  readonly API_PREFIX: string;
  readonly CORS_ORIGIN: string[];
  readonly RATE_LIMIT_WINDOW_MS: number;
  readonly RATE_LIMIT_MAX_REQUESTS: number;
  readonly LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'debug';
  // Redis (OPTIONAL - synchronous endpoints work without Redis)
  readonly REDIS_HOST: string;
  readonly REDIS_PORT: number;
  // Catalog
  readonly CATALOG_BASE_URL: string;
  readonly CATALOG_USER_AGENT: string;
  readonly CATALOG_TIMEOUT_MS: number;
  readonly CATALOG_RETRY_COUNT: number;
  readonly CATALOG_BACKOFF_BASE_MS: number;
  readonly CATALOG_FETCH_LIMIT: number;
  readonly CATALOG_STARTUP_CHECK: boolean;
  // Matching
  readonly SCORE_THRESHOLD: number;
  readonly AUTO_MATCH_THRESHOLD: number;
  readonly AMBIGUITY_EPSILON: number;
  readonly TOP_N: number;
  readonly CONCURRENCY_LIMIT: number;
  readonly BRAND_BONUS: number;
  readonly BRAND_PENALTY: number;
  readonly BRAND_VOCABULARY_PATH: string;
  readonly WORKER_CONCURRENCY: number;
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  timestamp: string;
}

// Express extended types
export type AsyncHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
}
