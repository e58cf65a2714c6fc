import { z } from 'zod';

/**
 * Data API v3 payloads. Only the fields the snapshot uses are validated;
 * everything else passes through untouched.
 */

export const PlaylistItemSchema = z.object({
  contentDetails: z.object({ videoId: z.string().min(1) })
});

export type PlaylistItem = z.infer<typeof PlaylistItemSchema>;

/** Items are checked one by one by the enumerator */
export const PlaylistItemsPageSchema = z.object({
  items: z.array(z.unknown()).default([]),
  nextPageToken: z.string().nullish()
});

export type PlaylistItemsPage = z.infer<typeof PlaylistItemsPageSchema>;

const ThumbnailSchema = z.object({ url: z.string() }).partial();

// Counters arrive as decimal strings; hidden counters are simply absent
const CounterSchema = z.union([z.string().regex(/^\d+$/), z.number().int().nonnegative()]).optional();

export const VideoResourceSchema = z.object({
  id: z.string().min(1),
  snippet: z
    .object({
      title: z.string().default(''),
      publishedAt: z.string().default(''),
      tags: z.array(z.string()).default([]),
      categoryId: z.string().default(''),
      thumbnails: z.record(ThumbnailSchema).default({})
    })
    .default({}),
  contentDetails: z
    .object({
      duration: z.string().default('PT0S')
    })
    .default({}),
  statistics: z
    .object({
      viewCount: CounterSchema,
      likeCount: CounterSchema,
      commentCount: CounterSchema,
      favoriteCount: CounterSchema
    })
    .default({})
});

export type VideoResource = z.infer<typeof VideoResourceSchema>;

/** Items stay unparsed so one bad entry cannot sink the batch */
export const VideoListResponseSchema = z.object({
  items: z.array(z.unknown()).default([])
});

export type VideoListResponse = z.infer<typeof VideoListResponseSchema>;
