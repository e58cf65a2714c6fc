import type {
  TableName,
  TrafficRow,
  VideoCounters,
  VideoMetrics,
  VideoSnapshot
} from '../types/snapshot';
import { describeError, toError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import type { Row, TableStore } from './sqlite-store';

export type WriteOutcome =
  | { ok: true; table: TableName; rowCount: number }
  | { ok: false; table: TableName; reason: string };

export function toMetadataRows(snapshots: VideoSnapshot[]): Row[] {
  return snapshots.map((video) => ({
    video_id: video.id,
    title: video.title,
    published_at: video.publishedAt,
    duration_seconds: video.durationSeconds,
    duration_formatted: video.durationFormatted,
    video_type: video.videoType,
    tags: JSON.stringify(video.tags),
    category_id: video.categoryId,
    thumbnail_url: video.thumbnailUrl
  }));
}

export function toStatsRows(counters: VideoCounters[]): Row[] {
  return counters.map((entry) => ({
    video_id: entry.id,
    view_count: entry.viewCount,
    like_count: entry.likeCount,
    comment_count: entry.commentCount,
    favorite_count: entry.favoriteCount
  }));
}

// impressions and click-through columns are not returned by the reports API
// for this query; they stay null until a source exists
export function toAnalyticsRows(metrics: VideoMetrics[]): Row[] {
  return metrics.map((entry) => ({
    video_id: entry.id,
    estimated_minutes_watched: entry.watchedMinutes,
    average_view_duration_seconds: entry.avgViewDurationSeconds,
    average_view_percentage: entry.avgViewPercentage,
    impressions: null,
    impression_ctr: null,
    subscribers_gained: entry.subscribersGained,
    subscribers_lost: entry.subscribersLost,
    shares: entry.shares,
    annotation_click_through_rate: null,
    card_click_rate: null
  }));
}

export function toTrafficRows(traffic: TrafficRow[]): Row[] {
  return traffic.map((entry) => ({
    video_id: entry.id,
    traffic_source_type: entry.sourceType,
    views: entry.views,
    estimated_minutes_watched: entry.watchedMinutes
  }));
}

/**
 * Replaces one partition per call and reports the outcome as a value.
 * A failed write leaves the previous partition in place.
 */
export class SnapshotWriter {
  private readonly logger: Logger;

  constructor(
    private readonly store: TableStore,
    logger: Logger
  ) {
    this.logger = logger.child({ service: 'snapshot-writer' });
  }

  async write(table: TableName, snapshotDate: string, rows: Row[]): Promise<WriteOutcome> {
    try {
      const rowCount = await this.store.replacePartition(table, snapshotDate, rows);
      this.logger.info('Partition replaced', { table, snapshotDate, rowCount });
      return { ok: true, table, rowCount };
    } catch (error) {
      const reason = describeError(error);
      this.logger.error('Partition replace failed', toError(error), { table, snapshotDate });
      return { ok: false, table, reason };
    }
  }
}
