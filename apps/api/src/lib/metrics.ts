import { Counter, Gauge, Histogram, collectDefaultMetrics, register } from 'prom-client';

collectDefaultMetrics({
  prefix: 'biasmeter_',
});

export const httpRequestsTotal = new Counter({
  name: 'biasmeter_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'endpoint', 'status_code'],
});

export const httpRequestDuration = new Histogram({
  name: 'biasmeter_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'endpoint'],
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
});

export const cacheOperationsTotal = new Counter({
  name: 'biasmeter_cache_operations_total',
  help: 'Total number of extraction cache operations',
  labelNames: ['operation'],
});

export const cacheSize = new Gauge({
  name: 'biasmeter_cache_size',
  help: 'Current number of items in the extraction cache',
});

export const extractionAttemptsTotal = new Counter({
  name: 'biasmeter_extraction_attempts_total',
  help: 'Total number of text extraction attempts per strategy',
  labelNames: ['strategy', 'success'],
});

export const extractionDuration = new Histogram({
  name: 'biasmeter_extraction_duration_seconds',
  help: 'Text extraction stage duration in seconds',
  labelNames: ['strategy'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30],
});

export const extractionOutcomesTotal = new Counter({
  name: 'biasmeter_extraction_outcomes_total',
  help: 'Final outcome of each extraction',
  labelNames: ['outcome'],
});

export const analyzerInvocationsTotal = new Counter({
  name: 'biasmeter_analyzer_invocations_total',
  help: 'Total number of external analyzer invocations',
  labelNames: ['kind', 'outcome'],
});

export const analyzerDuration = new Histogram({
  name: 'biasmeter_analyzer_duration_seconds',
  help: 'External analyzer run time in seconds',
  labelNames: ['kind'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
});

export const historyRecordsTotal = new Counter({
  name: 'biasmeter_history_records_total',
  help: 'Total number of persisted analysis history records',
});

export const externalServiceHealthCheck = new Gauge({
  name: 'biasmeter_external_service_health',
  help: 'Health status of external services (1=healthy, 0=unhealthy)',
  labelNames: ['service'],
});

export function trackHttpRequest(
  method: string,
  endpoint: string,
  statusCode: number,
  durationMs: number
): void {
  httpRequestsTotal.inc({ method, endpoint, status_code: statusCode.toString() });
  httpRequestDuration.observe({ method, endpoint }, durationMs / 1000);
}

export function trackCacheHit(): void {
  cacheOperationsTotal.inc({ operation: 'hit' });
}

export function trackCacheMiss(): void {
  cacheOperationsTotal.inc({ operation: 'miss' });
}

export function trackCacheSet(): void {
  cacheOperationsTotal.inc({ operation: 'set' });
}

export function updateCacheSize(size: number): void {
  cacheSize.set(size);
}

export function trackExtractionAttempt(
  strategy: string,
  success: boolean,
  durationMs: number
): void {
  extractionAttemptsTotal.inc({ strategy, success: success.toString() });
  extractionDuration.observe({ strategy }, durationMs / 1000);
}

export function trackExtractionOutcome(outcome: string): void {
  extractionOutcomesTotal.inc({ outcome });
}

export function trackAnalyzerInvocation(kind: string, outcome: string, durationMs: number): void {
  analyzerInvocationsTotal.inc({ kind, outcome });
  analyzerDuration.observe({ kind }, durationMs / 1000);
}

export function trackHistoryRecord(): void {
  historyRecordsTotal.inc();
}

export function updateExternalServiceHealth(service: string, healthy: boolean): void {
  externalServiceHealthCheck.set({ service }, healthy ? 1 : 0);
}

export { register };
