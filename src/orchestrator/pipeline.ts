import { randomUUID } from 'node:crypto';
import { MetricsFetcher } from '../analytics/metrics-fetcher';
import { AnalyticsReportsClient } from '../analytics/reports-client';
import { OAuthTokenProvider } from '../analytics/token-provider';
import { CatalogApiClient } from '../catalog/client';
import { DetailFetcher } from '../catalog/detail-fetcher';
import { CatalogEnumerator } from '../catalog/enumerator';
import type { AppConfig } from '../config';
import type { PipelineFile, RetrySettings } from '../config/yaml-types';
import type { TableStore } from '../storage/sqlite-store';
import { SnapshotWriter } from '../storage/snapshot-writer';
import type { RunSummary } from '../types/snapshot';
import { ConfigurationError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import { type RetryConfig, RetryPolicy } from '../utils/retry';
import type { BackfillDependencies } from './backfill';
import { type PipelineDependencies, SnapshotOrchestrator } from './snapshot-orchestrator';

/**
 * Endpoint overrides, used by tests to point at local stand-ins
 */
export interface ApiEndpoints {
  dataApi?: string;
  analyticsApi?: string;
  oauth?: string;
}

export interface PipelineContext {
  config: Pick<AppConfig, 'apiKey' | 'playlistId' | 'oauth' | 'lookbackDays' | 'timeZone'>;
  pipeline: PipelineFile;
  store: TableStore;
  logger: Logger;
  endpoints?: ApiEndpoints;
  /** Overrides for tests; default retry sleeps use real timers */
  retryOverrides?: Pick<RetryConfig, 'sleep' | 'random'>;
  now?: () => Date;
}

export function toRetryPolicy(
  settings: RetrySettings,
  overrides: Pick<RetryConfig, 'sleep' | 'random'> = {}
): RetryPolicy {
  return new RetryPolicy({
    maxAttempts: settings.attempts,
    initialDelay: settings.base_delay_ms,
    maxDelay: settings.max_delay_ms,
    factor: settings.factor,
    jitter: settings.jitter,
    ...overrides
  });
}

/**
 * Metrics collaborators, or undefined when no OAuth credentials are configured
 */
function createMetricsFetcher(context: PipelineContext, logger: Logger): MetricsFetcher | undefined {
  const { oauth } = context.config;
  if (!oauth) {
    return undefined;
  }

  const { analytics } = context.pipeline;
  const tokens = new OAuthTokenProvider(oauth, {
    baseUrl: context.endpoints?.oauth,
    timeoutMs: analytics.timeout_ms,
    logger
  });
  const reports = new AnalyticsReportsClient(tokens, {
    baseUrl: context.endpoints?.analyticsApi,
    timeoutMs: analytics.timeout_ms,
    logger
  });
  return new MetricsFetcher(reports, {
    maxResults: analytics.max_results,
    retryPolicy: toRetryPolicy(analytics.retries, context.retryOverrides),
    logger
  });
}

/**
 * Fresh collaborators for one run, all bound to its run logger
 */
export function createPipelineDependencies(context: PipelineContext, runId: string): PipelineDependencies {
  const logger = context.logger.forRun(runId);
  const { catalog } = context.pipeline;

  const catalogClient = new CatalogApiClient({
    apiKey: context.config.apiKey,
    baseUrl: context.endpoints?.dataApi,
    timeoutMs: catalog.timeout_ms,
    logger
  });
  const catalogRetry = toRetryPolicy(catalog.retries, context.retryOverrides);

  return {
    enumerator: new CatalogEnumerator(catalogClient, {
      pageSize: catalog.page_size,
      retryPolicy: catalogRetry,
      logger
    }),
    detailFetcher: new DetailFetcher(catalogClient, {
      batchSize: catalog.batch_size,
      retryPolicy: catalogRetry,
      logger
    }),
    metricsFetcher: createMetricsFetcher(context, logger),
    writer: new SnapshotWriter(context.store, logger),
    logger: context.logger,
    now: context.now
  };
}

export type PipelineRunner = (runId?: string) => Promise<RunSummary>;

/**
 * One call per trigger: new run id unless one is supplied, new collaborators every time
 */
export function createPipelineRunner(context: PipelineContext): PipelineRunner {
  return async (runId?: string) => {
    const id = runId && runId.trim().length > 0 ? runId.trim() : randomUUID();
    const orchestrator = new SnapshotOrchestrator(
      {
        playlistId: context.config.playlistId,
        lookbackDays: context.config.lookbackDays,
        timeZone: context.config.timeZone
      },
      createPipelineDependencies(context, id)
    );
    return orchestrator.run(id);
  };
}

/**
 * Collaborators for a metrics backfill; requires OAuth credentials
 */
export function createBackfillDependencies(context: PipelineContext, runId: string): BackfillDependencies {
  const logger = context.logger.forRun(runId);
  const metricsFetcher = createMetricsFetcher(context, logger);
  if (!metricsFetcher) {
    throw new ConfigurationError('Backfill requires YouTube OAuth credentials', [
      'YOUTUBE_OAUTH_CLIENT_ID',
      'YOUTUBE_OAUTH_CLIENT_SECRET',
      'YOUTUBE_OAUTH_REFRESH_TOKEN'
    ]);
  }

  return {
    store: context.store,
    metricsFetcher,
    writer: new SnapshotWriter(context.store, logger),
    logger: context.logger,
    pauseMs: context.pipeline.backfill.pause_ms,
    sleep: context.retryOverrides?.sleep
  };
}
