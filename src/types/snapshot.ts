/**
 * Entities produced by one snapshot run. All are created fresh per run.
 */

export type VideoType = 'short' | 'full_length';

export interface VideoRef {
  id: string;
}

export interface VideoSnapshot {
  id: string;
  title: string;
  publishedAt: string;
  durationSeconds: number;
  durationFormatted: string;
  videoType: VideoType;
  tags: string[];
  categoryId: string;
  thumbnailUrl: string;
  snapshotDate: string;
}

/** Cumulative public counters as of run time */
export interface VideoCounters {
  snapshotDate: string;
  id: string;
  viewCount: number;
  likeCount: number;
  commentCount: number;
  favoriteCount: number;
}

/** Day-level activity for the queried (finalized) day */
export interface VideoMetrics {
  snapshotDate: string;
  id: string;
  watchedMinutes: number;
  avgViewDurationSeconds: number;
  avgViewPercentage: number;
  subscribersGained: number;
  subscribersLost: number;
  shares: number;
}

export interface TrafficRow {
  snapshotDate: string;
  id: string;
  sourceType: string;
  views: number;
  watchedMinutes: number;
}

/** Per-item failure that does not abort the run */
export interface ItemFailure {
  id: string;
  reason: string;
}

export const TABLES = {
  metadata: 'video_metadata',
  stats: 'daily_video_stats',
  analytics: 'daily_video_analytics',
  traffic: 'daily_traffic_sources'
} as const;

export type TableName = (typeof TABLES)[keyof typeof TABLES];

export const TABLE_NAMES: readonly TableName[] = Object.values(TABLES);

export type RunState =
  | 'START'
  | 'ENUMERATE'
  | 'FETCH_DETAILS'
  | 'CLASSIFY'
  | 'WRITE_METADATA_TABLES'
  | 'FETCH_METRICS'
  | 'WRITE_METRICS_TABLES'
  | 'SUMMARIZE'
  | 'DONE'
  | 'FAILED';

/**
 * The externally visible result of a run (HTTP body, CLI summary, final log line)
 */
export interface RunSummary {
  snapshot_date: string;
  run_id: string;
  status: 'DONE' | 'FAILED';
  videos_processed: number;
  shorts: number;
  full_length: number;
  dropped_videos: number;
  rows_inserted: Record<TableName, number>;
  analytics_errors: ItemFailure[];
  duration_ms: number;
  error?: string;
  failed_stage?: RunState;
}
