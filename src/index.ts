/**
 * Public surface of the snapshot pipeline
 */

export { AnalyticsReportsClient } from './analytics/reports-client';
export { type AccessTokenSource, OAuthTokenProvider } from './analytics/token-provider';
export { BULK_QUERY_ID, foldTrafficOutcomes, MetricsFetcher, type MetricsSnapshot } from './analytics/metrics-fetcher';
export { CatalogApiClient } from './catalog/client';
export { DetailFetcher, type DetailFetchResult } from './catalog/detail-fetcher';
export { CatalogEnumerator } from './catalog/enumerator';
export {
  classifyDuration,
  describeDuration,
  formatDuration,
  parseDuration,
  SHORT_FORM_MAX_SECONDS
} from './classifier/duration';
export { type AppConfig, Configuration, uploadsPlaylistFor } from './config';
export { loadPipelineConfig } from './config/yaml-loader';
export * from './orchestrator';
export { createApp, startServer } from './server';
export { type Row, SqliteTableStore, type TableStore } from './storage/sqlite-store';
export {
  SnapshotWriter,
  toAnalyticsRows,
  toMetadataRows,
  toStatsRows,
  toTrafficRows,
  type WriteOutcome
} from './storage/snapshot-writer';
export * from './types/snapshot';
export * from './utils/errors';
export { createLogger, Logger, LogLevel } from './utils/logger';
export { RetryPolicy, isTransientError } from './utils/retry';
