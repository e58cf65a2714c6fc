/**
 * SnapshotOrchestrator - Coordinates one daily snapshot run
 */

import { BULK_QUERY_ID, type MetricsFetcher, type MetricsSnapshot } from '../analytics/metrics-fetcher';
import type { CatalogEnumerator } from '../catalog/enumerator';
import type { DetailFetcher, DetailFetchResult } from '../catalog/detail-fetcher';
import {
  type SnapshotWriter,
  toAnalyticsRows,
  toMetadataRows,
  toStatsRows,
  toTrafficRows,
  type WriteOutcome
} from '../storage/snapshot-writer';
import {
  type ItemFailure,
  type RunState,
  type RunSummary,
  TABLES,
  type TableName,
  type VideoRef
} from '../types/snapshot';
import { shiftDateKey, toDateKey } from '../utils/dates';
import {
  AggregateError as WriteAggregateError,
  AnalyticsError,
  PipelineStageError,
  describeError,
  toError
} from '../utils/errors';
import type { Logger } from '../utils/logger';

export interface OrchestratorConfig {
  playlistId: string;
  /** Days between the snapshot date and the finalized day queried for metrics */
  lookbackDays: number;
  /** IANA zone that decides the calendar date of a run */
  timeZone: string;
}

export interface PipelineDependencies {
  enumerator: Pick<CatalogEnumerator, 'listVideoIds'>;
  detailFetcher: Pick<DetailFetcher, 'fetchDetails'>;
  /** Absent when metrics credentials are not configured */
  metricsFetcher?: Pick<MetricsFetcher, 'fetchAll'>;
  writer: Pick<SnapshotWriter, 'write'>;
  logger: Logger;
  now?: () => Date;
}

function emptyCounts(): Record<TableName, number> {
  return {
    [TABLES.metadata]: 0,
    [TABLES.stats]: 0,
    [TABLES.analytics]: 0,
    [TABLES.traffic]: 0
  };
}

/**
 * Mutable state of a single run; never shared between runs
 */
interface RunContext {
  runId: string;
  snapshotDate: string;
  startedAt: number;
  state: RunState;
  refs: VideoRef[];
  details?: DetailFetchResult;
  rowsInserted: Record<TableName, number>;
  errors: ItemFailure[];
}

export class SnapshotOrchestrator {
  private readonly now: () => Date;

  constructor(
    private readonly config: OrchestratorConfig,
    private readonly deps: PipelineDependencies
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run every stage once. Fatal failures come back as a FAILED summary, never as a rejection.
   */
  async run(runId: string): Promise<RunSummary> {
    const logger = this.deps.logger.forRun(runId);
    const startedAt = this.now();
    const ctx: RunContext = {
      runId,
      // Computed once; a run that straddles midnight keeps its start date
      snapshotDate: toDateKey(startedAt, this.config.timeZone),
      startedAt: startedAt.getTime(),
      state: 'START',
      refs: [],
      rowsInserted: emptyCounts(),
      errors: []
    };

    logger.info('Snapshot run started', {
      snapshotDate: ctx.snapshotDate,
      playlistId: this.config.playlistId
    });

    try {
      await this.enumerate(ctx, logger);
      await this.fetchDetails(ctx, logger);
      this.classify(ctx, logger);
      await this.writeMetadataTables(ctx, logger);
      const metrics = await this.fetchMetrics(ctx, logger);
      await this.writeMetricsTables(ctx, metrics, logger);
      this.transition(ctx, 'SUMMARIZE', logger);

      const summary = this.summarize(ctx, 'DONE');
      this.transition(ctx, 'DONE', logger);
      logger.info('Snapshot run completed', { summary });
      return summary;
    } catch (error) {
      const failedStage = ctx.state;
      const stageError = new PipelineStageError(failedStage, error);
      this.transition(ctx, 'FAILED', logger);

      const summary: RunSummary = {
        ...this.summarize(ctx, 'FAILED'),
        error: stageError.message,
        failed_stage: failedStage
      };
      logger.error('Snapshot run failed', toError(error), { stage: failedStage, summary });
      return summary;
    }
  }

  private transition(ctx: RunContext, next: RunState, logger: Logger): void {
    logger.info('Stage transition', { from: ctx.state, to: next, stage: next });
    ctx.state = next;
  }

  private async enumerate(ctx: RunContext, logger: Logger): Promise<void> {
    this.transition(ctx, 'ENUMERATE', logger);
    ctx.refs = await this.deps.enumerator.listVideoIds(this.config.playlistId);
  }

  private async fetchDetails(ctx: RunContext, logger: Logger): Promise<void> {
    this.transition(ctx, 'FETCH_DETAILS', logger);
    const details = await this.deps.detailFetcher.fetchDetails(ctx.refs, ctx.snapshotDate);
    ctx.details = details;
    ctx.errors.push(...details.malformed);
  }

  private classify(ctx: RunContext, logger: Logger): void {
    this.transition(ctx, 'CLASSIFY', logger);
    // video_type is derived while parsing durations; this stage only reports the split
    const snapshots = ctx.details?.snapshots ?? [];
    const shorts = snapshots.filter((snapshot) => snapshot.videoType === 'short').length;
    logger.info('Videos classified', { shorts, fullLength: snapshots.length - shorts });
  }

  private async writeMetadataTables(ctx: RunContext, logger: Logger): Promise<void> {
    this.transition(ctx, 'WRITE_METADATA_TABLES', logger);
    const details = ctx.details;
    if (!details) {
      throw new Error('Detail stage produced no result');
    }

    const outcomes = [
      await this.deps.writer.write(TABLES.metadata, ctx.snapshotDate, toMetadataRows(details.snapshots)),
      await this.deps.writer.write(TABLES.stats, ctx.snapshotDate, toStatsRows(details.counters))
    ];
    this.record(ctx, outcomes);

    const failures = outcomes.flatMap((outcome) =>
      outcome.ok ? [] : [new Error(`${outcome.table}: ${outcome.reason}`)]
    );
    if (failures.length > 0) {
      throw new WriteAggregateError(
        `Core tables were not written (${failures.map((failure) => failure.message).join('; ')})`,
        failures
      );
    }
  }

  private async fetchMetrics(ctx: RunContext, logger: Logger): Promise<MetricsSnapshot | undefined> {
    this.transition(ctx, 'FETCH_METRICS', logger);
    const fetcher = this.deps.metricsFetcher;
    if (!fetcher) {
      logger.warn('Metrics credentials not configured; skipping metrics tables');
      return undefined;
    }

    const day = shiftDateKey(ctx.snapshotDate, -this.config.lookbackDays);
    const refs = (ctx.details?.snapshots ?? []).map((snapshot) => ({ id: snapshot.id }));

    try {
      const metrics = await fetcher.fetchAll(refs, day, ctx.snapshotDate);
      ctx.errors.push(...metrics.failures);
      return metrics;
    } catch (error) {
      // The fetcher reports failures as values; anything thrown here is still non-fatal
      const failure = new AnalyticsError(`metrics stage aborted: ${describeError(error)}`, error);
      logger.warn(failure.message, { day });
      ctx.errors.push({ id: BULK_QUERY_ID, reason: failure.message });
      return undefined;
    }
  }

  private async writeMetricsTables(
    ctx: RunContext,
    metrics: MetricsSnapshot | undefined,
    logger: Logger
  ): Promise<void> {
    this.transition(ctx, 'WRITE_METRICS_TABLES', logger);
    if (!metrics) {
      return;
    }

    const outcomes: WriteOutcome[] = [];
    // A failed bulk query leaves the previous partition in place
    if (metrics.metrics) {
      outcomes.push(
        await this.deps.writer.write(TABLES.analytics, ctx.snapshotDate, toAnalyticsRows(metrics.metrics))
      );
    }
    outcomes.push(await this.deps.writer.write(TABLES.traffic, ctx.snapshotDate, toTrafficRows(metrics.traffic)));

    this.record(ctx, outcomes);
    for (const outcome of outcomes) {
      if (!outcome.ok) {
        ctx.errors.push({ id: outcome.table, reason: outcome.reason });
      }
    }
  }

  private record(ctx: RunContext, outcomes: WriteOutcome[]): void {
    for (const outcome of outcomes) {
      if (outcome.ok) {
        ctx.rowsInserted[outcome.table] = outcome.rowCount;
      }
    }
  }

  private summarize(ctx: RunContext, status: RunSummary['status']): RunSummary {
    const snapshots = ctx.details?.snapshots ?? [];
    const shorts = snapshots.filter((snapshot) => snapshot.videoType === 'short').length;

    return {
      snapshot_date: ctx.snapshotDate,
      run_id: ctx.runId,
      status,
      videos_processed: snapshots.length,
      shorts,
      full_length: snapshots.length - shorts,
      dropped_videos: ctx.details?.dropped.length ?? 0,
      rows_inserted: { ...ctx.rowsInserted },
      analytics_errors: [...ctx.errors],
      duration_ms: this.now().getTime() - ctx.startedAt
    };
  }
}
