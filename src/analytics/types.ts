import { z } from 'zod';

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().default(3600),
  token_type: z.string().optional()
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

export const ReportResponseSchema = z.object({
  columnHeaders: z
    .array(
      z.object({
        name: z.string(),
        columnType: z.string().optional(),
        dataType: z.string().optional()
      })
    )
    .default([]),
  // Absent when the day has no activity
  rows: z.array(z.array(z.unknown())).default([])
});

export type ReportResponse = z.infer<typeof ReportResponseSchema>;

export const DAILY_METRICS = [
  'estimatedMinutesWatched',
  'averageViewDuration',
  'averageViewPercentage',
  'subscribersGained',
  'subscribersLost',
  'shares'
] as const;

export const TRAFFIC_METRICS = ['views', 'estimatedMinutesWatched'] as const;

/** [videoId, minutes, avgDuration, avgPercentage, gained, lost, shares] */
export const DailyMetricsRowSchema = z.tuple([
  z.string().min(1),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number(),
  z.number()
]);

/** [insightTrafficSourceType, views, minutes] */
export const TrafficRowSchema = z.tuple([z.string().min(1), z.number(), z.number()]);

export interface ReportQuery {
  startDate: string;
  endDate: string;
  dimensions: string;
  metrics: readonly string[];
  filters?: string;
  sort?: string;
  maxResults?: number;
}
