export { healthService, HealthService } from './health.service';
export * from './reconciliation.service';
export * from './batchOrchestrator.service';
export * from './cleaningLog.service';
export * from './protocolAdapter.service';
export * from './batchJob.service';
