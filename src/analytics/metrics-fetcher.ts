import { err, ok, type Result } from '../types/result';
import type { ItemFailure, TrafficRow, VideoMetrics, VideoRef } from '../types/snapshot';
import { describeError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import { RetryPolicy } from '../utils/retry';
import type { AnalyticsReportsClient } from './reports-client';
import { DAILY_METRICS, DailyMetricsRowSchema, TRAFFIC_METRICS, TrafficRowSchema } from './types';

/** Failure id used when the single bulk query fails */
export const BULK_QUERY_ID = '*';

const DEFAULT_MAX_RESULTS = 200;

export interface MetricsFetcherOptions {
  maxResults?: number;
  retryPolicy?: RetryPolicy;
  logger: Logger;
}

export interface DailyMetricsResult {
  metrics: VideoMetrics[];
  /** Rows for known videos that could not be read */
  failures: ItemFailure[];
}

export interface TrafficFold {
  rows: TrafficRow[];
  failures: ItemFailure[];
}

export interface MetricsSnapshot {
  /** `null` when the bulk query itself failed; the table is then left as it is */
  metrics: VideoMetrics[] | null;
  traffic: TrafficRow[];
  failures: ItemFailure[];
}

/**
 * Pure aggregation of the per-video traffic outcomes
 */
export function foldTrafficOutcomes(outcomes: Result<TrafficRow[], ItemFailure>[]): TrafficFold {
  return outcomes.reduce<TrafficFold>(
    (acc, outcome) => {
      if (outcome.ok) {
        acc.rows.push(...outcome.value);
      } else {
        acc.failures.push(outcome.error);
      }
      return acc;
    },
    { rows: [], failures: [] }
  );
}

/**
 * Day-level activity (one bulk call) and traffic-source breakdown (one call per video)
 */
export class MetricsFetcher {
  private readonly maxResults: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;

  constructor(
    private readonly reports: AnalyticsReportsClient,
    options: MetricsFetcherOptions
  ) {
    this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
    this.logger = options.logger.child({ service: 'analytics' });
    this.retryPolicy = (options.retryPolicy ?? new RetryPolicy()).withOnRetry((attempt, error, delay) => {
      this.logger.warn('Rate limited or transient failure, backing off', {
        attempt,
        delay,
        error: describeError(error)
      });
    });
  }

  async fetchDailyMetrics(
    refs: VideoRef[],
    day: string,
    snapshotDate: string
  ): Promise<Result<DailyMetricsResult, ItemFailure>> {
    const attempt = await this.retryPolicy
      .execute(() =>
        this.reports.query({
          startDate: day,
          endDate: day,
          dimensions: 'video',
          metrics: DAILY_METRICS,
          sort: '-estimatedMinutesWatched',
          maxResults: this.maxResults
        })
      )
      .then(
        (value) => ok(value),
        (error: unknown) => err(error)
      );

    if (!attempt.ok) {
      const reason = `Bulk activity query failed: ${describeError(attempt.error)}`;
      this.logger.warn(reason, { day });
      return err({ id: BULK_QUERY_ID, reason });
    }

    const response = attempt.value;
    if (response.rows.length >= this.maxResults) {
      this.logger.warn('Bulk activity query returned a full page; low-activity videos may be missing', {
        day,
        maxResults: this.maxResults
      });
    }

    const known = new Set(refs.map((ref) => ref.id));
    const metrics: VideoMetrics[] = [];
    const failures: ItemFailure[] = [];

    for (const raw of response.rows) {
      const id = typeof raw[0] === 'string' ? raw[0] : undefined;
      if (id === undefined || !known.has(id)) {
        continue;
      }

      const parsed = DailyMetricsRowSchema.safeParse(raw);
      if (!parsed.success) {
        const reason = `Unreadable activity row: ${parsed.error.issues[0]?.message ?? 'invalid row'}`;
        this.logger.warn(reason, { videoId: id, day });
        failures.push({ id, reason });
        continue;
      }

      const [, minutes, avgDuration, avgPercentage, gained, lost, shares] = parsed.data;
      metrics.push({
        snapshotDate,
        id,
        watchedMinutes: minutes,
        avgViewDurationSeconds: avgDuration,
        avgViewPercentage: avgPercentage,
        subscribersGained: gained,
        subscribersLost: lost,
        shares
      });
    }

    this.logger.info('Daily activity fetched', { day, videos: metrics.length });
    return ok({ metrics, failures });
  }

  /**
   * Traffic breakdown for one video; failures come back as values, never thrown
   */
  async fetchTrafficFor(
    ref: VideoRef,
    day: string,
    snapshotDate: string
  ): Promise<Result<TrafficRow[], ItemFailure>> {
    try {
      const response = await this.retryPolicy.execute(() =>
        this.reports.query({
          startDate: day,
          endDate: day,
          dimensions: 'insightTrafficSourceType',
          metrics: TRAFFIC_METRICS,
          filters: `video==${ref.id}`
        })
      );

      const rows: TrafficRow[] = [];
      for (const raw of response.rows) {
        const [sourceType, views, minutes] = TrafficRowSchema.parse(raw);
        if (views > 0) {
          rows.push({ snapshotDate, id: ref.id, sourceType, views, watchedMinutes: minutes });
        }
      }
      return ok(rows);
    } catch (error) {
      const reason = describeError(error);
      this.logger.warn('Traffic sources failed', { videoId: ref.id, day, reason });
      return err({ id: ref.id, reason });
    }
  }

  async fetchTraffic(refs: VideoRef[], day: string, snapshotDate: string): Promise<TrafficFold> {
    const outcomes: Result<TrafficRow[], ItemFailure>[] = [];
    for (const ref of refs) {
      outcomes.push(await this.fetchTrafficFor(ref, day, snapshotDate));
    }

    const fold = foldTrafficOutcomes(outcomes);
    this.logger.info('Traffic sources fetched', {
      day,
      videos: refs.length,
      rows: fold.rows.length,
      failed: fold.failures.length
    });
    return fold;
  }

  /**
   * Both sub-reports for `day`, rows keyed to `snapshotDate`
   */
  async fetchAll(refs: VideoRef[], day: string, snapshotDate: string): Promise<MetricsSnapshot> {
    const daily = await this.fetchDailyMetrics(refs, day, snapshotDate);
    const traffic = await this.fetchTraffic(refs, day, snapshotDate);

    if (daily.ok) {
      return {
        metrics: daily.value.metrics,
        traffic: traffic.rows,
        failures: [...daily.value.failures, ...traffic.failures]
      };
    }

    return {
      metrics: null,
      traffic: traffic.rows,
      failures: [daily.error, ...traffic.failures]
    };
  }
}
