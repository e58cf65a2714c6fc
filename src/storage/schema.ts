import type Database from 'better-sqlite3';
import type { TableName } from '../types/snapshot';

/**
 * Insert column order per destination table. `snapshot_date` is the partition key
 * and is filled from the partition being replaced, never from the row.
 */
export const TABLE_COLUMNS: Record<TableName, readonly string[]> = {
  video_metadata: [
    'video_id',
    'title',
    'published_at',
    'duration_seconds',
    'duration_formatted',
    'video_type',
    'tags',
    'category_id',
    'thumbnail_url'
  ],
  daily_video_stats: ['video_id', 'view_count', 'like_count', 'comment_count', 'favorite_count'],
  daily_video_analytics: [
    'video_id',
    'estimated_minutes_watched',
    'average_view_duration_seconds',
    'average_view_percentage',
    'impressions',
    'impression_ctr',
    'subscribers_gained',
    'subscribers_lost',
    'shares',
    'annotation_click_through_rate',
    'card_click_rate'
  ],
  daily_traffic_sources: ['video_id', 'traffic_source_type', 'views', 'estimated_minutes_watched']
};

export function applySchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS video_metadata (
      snapshot_date TEXT NOT NULL,
      video_id TEXT NOT NULL,
      title TEXT,
      published_at TEXT,
      duration_seconds INTEGER CHECK (duration_seconds IS NULL OR duration_seconds >= 0),
      duration_formatted TEXT,
      video_type TEXT CHECK (video_type IN ('short', 'full_length')),
      tags TEXT,
      category_id TEXT,
      thumbnail_url TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_video_metadata_snapshot ON video_metadata (snapshot_date);

    CREATE TABLE IF NOT EXISTS daily_video_stats (
      snapshot_date TEXT NOT NULL,
      video_id TEXT NOT NULL,
      view_count INTEGER,
      like_count INTEGER,
      comment_count INTEGER,
      favorite_count INTEGER
    );
    CREATE INDEX IF NOT EXISTS idx_daily_video_stats_snapshot ON daily_video_stats (snapshot_date);

    CREATE TABLE IF NOT EXISTS daily_video_analytics (
      snapshot_date TEXT NOT NULL,
      video_id TEXT NOT NULL,
      estimated_minutes_watched REAL,
      average_view_duration_seconds REAL,
      average_view_percentage REAL,
      impressions INTEGER,
      impression_ctr REAL,
      subscribers_gained INTEGER,
      subscribers_lost INTEGER,
      shares INTEGER,
      annotation_click_through_rate REAL,
      card_click_rate REAL
    );
    CREATE INDEX IF NOT EXISTS idx_daily_video_analytics_snapshot ON daily_video_analytics (snapshot_date);

    CREATE TABLE IF NOT EXISTS daily_traffic_sources (
      snapshot_date TEXT NOT NULL,
      video_id TEXT NOT NULL,
      traffic_source_type TEXT,
      views INTEGER,
      estimated_minutes_watched REAL
    );
    CREATE INDEX IF NOT EXISTS idx_daily_traffic_sources_snapshot ON daily_traffic_sources (snapshot_date);
  `);
}
