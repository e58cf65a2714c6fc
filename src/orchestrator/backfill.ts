import { randomUUID } from 'node:crypto';
import type { MetricsFetcher } from '../analytics/metrics-fetcher';
import type { TableStore } from '../storage/sqlite-store';
import { type SnapshotWriter, toAnalyticsRows, toTrafficRows } from '../storage/snapshot-writer';
import { type ItemFailure, TABLES } from '../types/snapshot';
import { eachDateKey, isDateKey } from '../utils/dates';
import { ConfigurationError, describeError, toError } from '../utils/errors';
import type { Logger } from '../utils/logger';

export interface BackfillDay {
  date: string;
  status: 'ok' | 'failed';
  rows_inserted: { daily_video_analytics: number; daily_traffic_sources: number };
  analytics_errors: ItemFailure[];
  error?: string;
}

export interface BackfillSummary {
  run_id: string;
  start: string;
  end: string;
  /** Snapshot whose video ids were replayed */
  source_snapshot_date: string | null;
  videos: number;
  days: BackfillDay[];
  failed_days: number;
}

export interface BackfillDependencies {
  store: Pick<TableStore, 'latestSnapshotIds'>;
  metricsFetcher: Pick<MetricsFetcher, 'fetchAll'>;
  writer: Pick<SnapshotWriter, 'write'>;
  logger: Logger;
  pauseMs: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Rebuild the two metrics tables for each day in [start, end], one partition per day,
 * using the ids of the latest metadata snapshot.
 */
export async function runBackfill(
  deps: BackfillDependencies,
  start: string,
  end: string,
  runId: string = randomUUID()
): Promise<BackfillSummary> {
  if (!isDateKey(start) || !isDateKey(end)) {
    throw new ConfigurationError(`Backfill range must be YYYY-MM-DD dates, got ${start}..${end}`);
  }
  if (start > end) {
    throw new ConfigurationError(`Backfill start ${start} is after end ${end}`);
  }

  const logger = deps.logger.forRun(runId).child({ service: 'backfill' });
  const sleep = deps.sleep ?? defaultSleep;
  const latest = await deps.store.latestSnapshotIds(TABLES.metadata);
  const refs = (latest?.ids ?? []).map((id) => ({ id }));

  if (!latest) {
    logger.warn('No metadata snapshot found; nothing to backfill');
  }

  const days: BackfillDay[] = [];
  const dates = latest ? eachDateKey(start, end) : [];

  for (const [index, date] of dates.entries()) {
    if (index > 0 && deps.pauseMs > 0) {
      await sleep(deps.pauseMs);
    }
    days.push(await backfillDay(deps, refs, date, logger));
  }

  const summary: BackfillSummary = {
    run_id: runId,
    start,
    end,
    source_snapshot_date: latest?.snapshotDate ?? null,
    videos: refs.length,
    days,
    failed_days: days.filter((day) => day.status === 'failed').length
  };
  logger.info('Backfill completed', { summary });
  return summary;
}

async function backfillDay(
  deps: BackfillDependencies,
  refs: { id: string }[],
  date: string,
  logger: Logger
): Promise<BackfillDay> {
  const day: BackfillDay = {
    date,
    status: 'ok',
    rows_inserted: { daily_video_analytics: 0, daily_traffic_sources: 0 },
    analytics_errors: []
  };

  try {
    const snapshot = await deps.metricsFetcher.fetchAll(refs, date, date);
    day.analytics_errors.push(...snapshot.failures);

    if (snapshot.metrics) {
      const written = await deps.writer.write(TABLES.analytics, date, toAnalyticsRows(snapshot.metrics));
      if (written.ok) {
        day.rows_inserted.daily_video_analytics = written.rowCount;
      } else {
        day.analytics_errors.push({ id: written.table, reason: written.reason });
      }
    }

    const traffic = await deps.writer.write(TABLES.traffic, date, toTrafficRows(snapshot.traffic));
    if (traffic.ok) {
      day.rows_inserted.daily_traffic_sources = traffic.rowCount;
    } else {
      day.analytics_errors.push({ id: traffic.table, reason: traffic.reason });
    }

    // Nothing usable for the day counts as a failed day
    if (!snapshot.metrics && !traffic.ok) {
      day.status = 'failed';
      day.error = 'no metrics written';
    }
  } catch (error) {
    day.status = 'failed';
    day.error = describeError(error);
    logger.error('Backfill day failed', toError(error), { date });
  }

  logger.info('Backfill day processed', {
    date,
    status: day.status,
    rows: day.rows_inserted,
    errors: day.analytics_errors.length
  });
  return day;
}
