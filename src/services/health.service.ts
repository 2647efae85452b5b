import { HealthCheckResponse } from '../types';
import { env } from '../config';
import { isRedisAvailable } from '../redis';

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor(private readonly isJobQueueAvailable: () => boolean = isRedisAvailable) {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  /**
   * Get health status
   */
  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  /**
   * Check if the service is ready.
   * Background jobs are reported but do not gate readiness: synchronous
   * reconciliation runs without Redis.
   */
  async checkReadiness(): Promise<{ ready: boolean; checks: Record<string, boolean> }> {
    const checks: Record<string, boolean> = {
      server: true,
      backgroundJobs: this.isJobQueueAvailable(),
    };

    return { ready: checks.server, checks };
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;
