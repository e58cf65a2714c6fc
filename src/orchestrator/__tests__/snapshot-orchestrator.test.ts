/**
 * Tests for the run state machine with in-process collaborators
 */

import type { MetricsSnapshot } from '../../analytics/metrics-fetcher';
import type { DetailFetchResult } from '../../catalog/detail-fetcher';
import { captureLogger } from '../../__tests__/support';
import type { Row } from '../../storage/sqlite-store';
import type { WriteOutcome } from '../../storage/snapshot-writer';
import type { TableName, VideoRef, VideoSnapshot } from '../../types/snapshot';
import { DetailFetchError, EnumerationError } from '../../utils/errors';
import { type PipelineDependencies, SnapshotOrchestrator } from '../snapshot-orchestrator';

const NOW = new Date('2026-10-19T06:00:00Z');

function snapshotOf(id: string, durationSeconds: number): VideoSnapshot {
  return {
    id,
    title: id,
    publishedAt: '2026-01-01T00:00:00Z',
    durationSeconds,
    durationFormatted: '0:00',
    videoType: durationSeconds <= 180 ? 'short' : 'full_length',
    tags: [],
    categoryId: '22',
    thumbnailUrl: '',
    snapshotDate: '2026-10-19'
  };
}

function detailsOf(snapshots: VideoSnapshot[], dropped: string[] = []): DetailFetchResult {
  return {
    snapshots,
    counters: snapshots.map((snapshot) => ({
      snapshotDate: snapshot.snapshotDate,
      id: snapshot.id,
      viewCount: 1,
      likeCount: 0,
      commentCount: 0,
      favoriteCount: 0
    })),
    dropped,
    malformed: []
  };
}

class RecordingWriter {
  readonly writes: Array<{ table: TableName; snapshotDate: string; rows: Row[] }> = [];
  failing = new Set<TableName>();

  async write(table: TableName, snapshotDate: string, rows: Row[]): Promise<WriteOutcome> {
    this.writes.push({ table, snapshotDate, rows });
    if (this.failing.has(table)) {
      return { ok: false, table, reason: 'disk full' };
    }
    return { ok: true, table, rowCount: rows.length };
  }
}

function setup(overrides: Partial<PipelineDependencies> = {}) {
  const { logger, entries } = captureLogger();
  const writer = new RecordingWriter();
  const metricsCalls: Array<{ refs: VideoRef[]; day: string; snapshotDate: string }> = [];
  const metrics: MetricsSnapshot = {
    metrics: [
      {
        snapshotDate: '2026-10-19',
        id: 'a',
        watchedMinutes: 1,
        avgViewDurationSeconds: 1,
        avgViewPercentage: 1,
        subscribersGained: 0,
        subscribersLost: 0,
        shares: 0
      }
    ],
    traffic: [{ snapshotDate: '2026-10-19', id: 'a', sourceType: 'YT_SEARCH', views: 3, watchedMinutes: 1 }],
    failures: [{ id: 'b', reason: 'quota' }]
  };

  const deps: PipelineDependencies = {
    enumerator: { listVideoIds: async () => [{ id: 'a' }, { id: 'b' }, { id: 'gone' }] },
    detailFetcher: {
      fetchDetails: async () => detailsOf([snapshotOf('a', 30), snapshotOf('b', 600)], ['gone'])
    },
    metricsFetcher: {
      fetchAll: async (refs, day, snapshotDate) => {
        metricsCalls.push({ refs, day, snapshotDate });
        return metrics;
      }
    },
    writer,
    logger,
    now: () => NOW,
    ...overrides
  };

  const orchestrator = new SnapshotOrchestrator(
    { playlistId: 'UUchannel', lookbackDays: 3, timeZone: 'UTC' },
    deps
  );
  return { orchestrator, writer, entries, metricsCalls };
}

describe('SnapshotOrchestrator', () => {
  it('should produce a DONE summary with per-table counts', async () => {
    const { orchestrator, metricsCalls } = setup();

    const summary = await orchestrator.run('run-1');

    expect(summary).toEqual({
      snapshot_date: '2026-10-19',
      run_id: 'run-1',
      status: 'DONE',
      videos_processed: 2,
      shorts: 1,
      full_length: 1,
      dropped_videos: 1,
      rows_inserted: {
        video_metadata: 2,
        daily_video_stats: 2,
        daily_video_analytics: 1,
        daily_traffic_sources: 1
      },
      analytics_errors: [{ id: 'b', reason: 'quota' }],
      duration_ms: 0
    });
    expect(metricsCalls).toEqual([{ refs: [{ id: 'a' }, { id: 'b' }], day: '2026-10-16', snapshotDate: '2026-10-19' }]);
  });

  it('should walk every state in order, tagging each line with the run id', async () => {
    const { orchestrator, entries } = setup();

    await orchestrator.run('run-2');

    const transitions = entries.filter((entry) => entry.message === 'Stage transition');
    expect(transitions.map((entry) => entry.metadata?.to)).toEqual([
      'ENUMERATE',
      'FETCH_DETAILS',
      'CLASSIFY',
      'WRITE_METADATA_TABLES',
      'FETCH_METRICS',
      'WRITE_METRICS_TABLES',
      'SUMMARIZE',
      'DONE'
    ]);
    expect(entries.every((entry) => entry.runId === 'run-2')).toBe(true);
  });

  it('should write metadata tables before asking for metrics', async () => {
    const { orchestrator, writer } = setup();

    await orchestrator.run('run-3');

    expect(writer.writes.map((write) => write.table)).toEqual([
      'video_metadata',
      'daily_video_stats',
      'daily_video_analytics',
      'daily_traffic_sources'
    ]);
    expect(writer.writes.every((write) => write.snapshotDate === '2026-10-19')).toBe(true);
  });

  it('should fail without writing anything when enumeration fails', async () => {
    const { orchestrator, writer, entries } = setup({
      enumerator: {
        listVideoIds: async () => {
          throw new EnumerationError('page 1 request failed', 'UUchannel');
        }
      }
    });

    const summary = await orchestrator.run('run-4');

    expect(summary.status).toBe('FAILED');
    expect(summary.failed_stage).toBe('ENUMERATE');
    expect(summary.error).toBe('Stage ENUMERATE failed: Enumeration of UUchannel failed: page 1 request failed');
    expect(writer.writes).toEqual([]);
    expect(entries[entries.length - 1]).toMatchObject({ level: 'ERROR', message: 'Snapshot run failed' });
  });

  it('should fail without writing anything when the detail stage fails', async () => {
    const { orchestrator, writer, metricsCalls } = setup({
      detailFetcher: {
        fetchDetails: async () => {
          throw new DetailFetchError('outage', 0);
        }
      }
    });

    const summary = await orchestrator.run('run-5');

    expect(summary).toMatchObject({
      status: 'FAILED',
      failed_stage: 'FETCH_DETAILS',
      videos_processed: 0,
      rows_inserted: { video_metadata: 0, daily_video_stats: 0, daily_video_analytics: 0, daily_traffic_sources: 0 }
    });
    expect(writer.writes).toEqual([]);
    expect(metricsCalls).toEqual([]);
  });

  it('should fail when a core table cannot be written, after trying both', async () => {
    const { orchestrator, writer, metricsCalls } = setup();
    writer.failing.add('video_metadata');

    const summary = await orchestrator.run('run-6');

    expect(summary.status).toBe('FAILED');
    expect(summary.failed_stage).toBe('WRITE_METADATA_TABLES');
    expect(summary.error).toBe(
      'Stage WRITE_METADATA_TABLES failed: Core tables were not written (video_metadata: disk full)'
    );
    expect(summary.rows_inserted.daily_video_stats).toBe(2);
    expect(writer.writes.map((write) => write.table)).toEqual(['video_metadata', 'daily_video_stats']);
    expect(metricsCalls).toEqual([]);
  });

  it('should stay DONE when a metrics table write fails', async () => {
    const { orchestrator, writer } = setup();
    writer.failing.add('daily_traffic_sources');

    const summary = await orchestrator.run('run-7');

    expect(summary.status).toBe('DONE');
    expect(summary.rows_inserted.daily_traffic_sources).toBe(0);
    expect(summary.analytics_errors).toEqual([
      { id: 'b', reason: 'quota' },
      { id: 'daily_traffic_sources', reason: 'disk full' }
    ]);
  });

  it('should leave the analytics table alone when the bulk query failed', async () => {
    const { orchestrator, writer } = setup({
      metricsFetcher: {
        fetchAll: async () => ({ metrics: null, traffic: [], failures: [{ id: '*', reason: 'Bulk activity query failed' }] })
      }
    });

    const summary = await orchestrator.run('run-8');

    expect(summary.status).toBe('DONE');
    expect(writer.writes.map((write) => write.table)).toEqual([
      'video_metadata',
      'daily_video_stats',
      'daily_traffic_sources'
    ]);
    expect(summary.analytics_errors).toEqual([{ id: '*', reason: 'Bulk activity query failed' }]);
  });

  it('should skip the metrics tables when no metrics client is configured', async () => {
    const { orchestrator, writer, entries } = setup({ metricsFetcher: undefined });

    const summary = await orchestrator.run('run-9');

    expect(summary.status).toBe('DONE');
    expect(writer.writes.map((write) => write.table)).toEqual(['video_metadata', 'daily_video_stats']);
    expect(entries.some((entry) => entry.level === 'WARN' && entry.message.startsWith('Metrics credentials not configured'))).toBe(true);
  });

  it('should record an unexpected metrics crash without failing the run', async () => {
    const { orchestrator } = setup({
      metricsFetcher: {
        fetchAll: async () => {
          throw new Error('socket closed');
        }
      }
    });

    const summary = await orchestrator.run('run-10');

    expect(summary.status).toBe('DONE');
    expect(summary.analytics_errors).toEqual([
      { id: '*', reason: 'Analytics error: metrics stage aborted: socket closed' }
    ]);
  });

  it('should take the snapshot date in the configured time zone', async () => {
    const { logger } = captureLogger();
    const writer = new RecordingWriter();
    const orchestrator = new SnapshotOrchestrator(
      { playlistId: 'UUchannel', lookbackDays: 3, timeZone: 'America/Los_Angeles' },
      {
        enumerator: { listVideoIds: async () => [] },
        detailFetcher: { fetchDetails: async () => detailsOf([]) },
        writer,
        logger,
        now: () => new Date('2026-10-19T02:00:00Z')
      }
    );

    const summary = await orchestrator.run('run-11');

    expect(summary.snapshot_date).toBe('2026-10-18');
    expect(writer.writes.map((write) => write.snapshotDate)).toEqual(['2026-10-18', '2026-10-18']);
  });
});
