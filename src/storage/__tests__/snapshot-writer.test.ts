/**
 * Tests for the snapshot writer and row mapping
 */

import Database from 'better-sqlite3';
import { captureLogger } from '../../__tests__/support';
import { TABLES, type VideoSnapshot } from '../../types/snapshot';
import { TableWriteError } from '../../utils/errors';
import { SnapshotWriter, toAnalyticsRows, toMetadataRows, toStatsRows, toTrafficRows } from '../snapshot-writer';
import { type Row, SqliteTableStore, type TableStore } from '../sqlite-store';

const SNAPSHOT_DATE = '2026-10-19';

const snapshot: VideoSnapshot = {
  id: 'abc',
  title: 'How to test',
  publishedAt: '2026-01-15T12:00:00Z',
  durationSeconds: 3723,
  durationFormatted: '1:02:03',
  videoType: 'full_length',
  tags: ['howto', 'test'],
  categoryId: '22',
  thumbnailUrl: 'https://img.test/abc/hq.jpg',
  snapshotDate: SNAPSHOT_DATE
};

describe('row mappers', () => {
  it('should store tags as a JSON array', () => {
    expect(toMetadataRows([snapshot])).toEqual([
      {
        video_id: 'abc',
        title: 'How to test',
        published_at: '2026-01-15T12:00:00Z',
        duration_seconds: 3723,
        duration_formatted: '1:02:03',
        video_type: 'full_length',
        tags: '["howto","test"]',
        category_id: '22',
        thumbnail_url: 'https://img.test/abc/hq.jpg'
      }
    ]);
  });

  it('should map counters', () => {
    expect(
      toStatsRows([
        { snapshotDate: SNAPSHOT_DATE, id: 'abc', viewCount: 100, likeCount: 10, commentCount: 2, favoriteCount: 0 }
      ])
    ).toEqual([{ video_id: 'abc', view_count: 100, like_count: 10, comment_count: 2, favorite_count: 0 }]);
  });

  it('should leave unreported analytics columns null', () => {
    const [row] = toAnalyticsRows([
      {
        snapshotDate: SNAPSHOT_DATE,
        id: 'abc',
        watchedMinutes: 12.5,
        avgViewDurationSeconds: 95,
        avgViewPercentage: 41.5,
        subscribersGained: 2,
        subscribersLost: 0,
        shares: 1
      }
    ]);

    expect(row).toMatchObject({ video_id: 'abc', estimated_minutes_watched: 12.5, shares: 1 });
    expect([row.impressions, row.impression_ctr, row.annotation_click_through_rate, row.card_click_rate]).toEqual([
      null,
      null,
      null,
      null
    ]);
  });

  it('should map traffic rows', () => {
    expect(
      toTrafficRows([{ snapshotDate: SNAPSHOT_DATE, id: 'abc', sourceType: 'YT_SEARCH', views: 5, watchedMinutes: 2 }])
    ).toEqual([{ video_id: 'abc', traffic_source_type: 'YT_SEARCH', views: 5, estimated_minutes_watched: 2 }]);
  });
});

describe('SnapshotWriter', () => {
  it('should report the written row count', async () => {
    const store = new SqliteTableStore(new Database(':memory:'));
    const writer = new SnapshotWriter(store, captureLogger().logger);

    await expect(writer.write(TABLES.metadata, SNAPSHOT_DATE, toMetadataRows([snapshot]))).resolves.toEqual({
      ok: true,
      table: 'video_metadata',
      rowCount: 1
    });
    store.close();
  });

  it('should turn a store failure into a failed outcome', async () => {
    const failing: TableStore = {
      replacePartition: async (table: string, snapshotDate: string, _rows: Row[]) => {
        throw new TableWriteError(table, snapshotDate, new Error('database is locked'));
      },
      countPartition: async () => 0,
      readPartition: async () => [],
      latestSnapshotIds: async () => null,
      close: () => {}
    };
    const { logger, entries } = captureLogger();
    const writer = new SnapshotWriter(failing, logger);

    const outcome = await writer.write(TABLES.stats, SNAPSHOT_DATE, []);

    expect(outcome).toEqual({
      ok: false,
      table: 'daily_video_stats',
      reason: 'Failed to replace daily_video_stats partition 2026-10-19: database is locked'
    });
    expect(entries.find((entry) => entry.level === 'ERROR')?.metadata).toEqual({
      table: 'daily_video_stats',
      snapshotDate: SNAPSHOT_DATE
    });
  });
});
