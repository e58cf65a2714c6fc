import { describeDuration } from '../classifier/duration';
import type { ItemFailure, VideoCounters, VideoRef, VideoSnapshot } from '../types/snapshot';
import { DetailFetchError, describeError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import { RetryPolicy } from '../utils/retry';
import { type CatalogApiClient, MAX_PAGE_SIZE } from './client';
import { type VideoResource, VideoResourceSchema } from './types';

const THUMBNAIL_PREFERENCE = ['maxres', 'high', 'default'] as const;

/** Failure id for an item whose own id cannot be read */
export const UNREADABLE_ID = '?';

export interface DetailFetcherOptions {
  batchSize?: number;
  retryPolicy?: RetryPolicy;
  logger: Logger;
}

export interface DetailFetchResult {
  snapshots: VideoSnapshot[];
  counters: VideoCounters[];
  /** Enumerated ids the detail endpoint no longer returns (deleted, privated) */
  dropped: string[];
  /** Items returned but unusable: bad payload or malformed duration */
  malformed: ItemFailure[];
}

interface ParsedVideo {
  snapshot: VideoSnapshot;
  counters: VideoCounters;
}

function toCount(value: string | number | undefined): number {
  if (value === undefined) {
    return 0;
  }
  const parsed = typeof value === 'number' ? value : Number.parseInt(value, 10);
  return Number.isSafeInteger(parsed) && parsed >= 0 ? parsed : 0;
}

export function pickThumbnail(thumbnails: VideoResource['snippet']['thumbnails']): string {
  for (const key of THUMBNAIL_PREFERENCE) {
    const url = thumbnails[key]?.url;
    if (url) {
      return url;
    }
  }
  return '';
}

/**
 * Shape one videos.list item into the metadata and counters rows.
 * Throws on a payload that fails validation or carries a malformed duration.
 */
export function parseVideoResource(raw: unknown, snapshotDate: string): ParsedVideo {
  const resource = VideoResourceSchema.parse(raw);
  const duration = describeDuration(resource.contentDetails.duration);
  const { snippet, statistics } = resource;

  return {
    snapshot: {
      id: resource.id,
      title: snippet.title,
      publishedAt: snippet.publishedAt,
      durationSeconds: duration.seconds,
      durationFormatted: duration.formatted,
      videoType: duration.videoType,
      tags: snippet.tags,
      categoryId: snippet.categoryId,
      thumbnailUrl: pickThumbnail(snippet.thumbnails),
      snapshotDate
    },
    counters: {
      snapshotDate,
      id: resource.id,
      viewCount: toCount(statistics.viewCount),
      likeCount: toCount(statistics.likeCount),
      commentCount: toCount(statistics.commentCount),
      favoriteCount: toCount(statistics.favoriteCount)
    }
  };
}

function readId(raw: unknown): string | undefined {
  if (typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string' && raw.id.length > 0) {
    return raw.id;
  }
  return undefined;
}

/**
 * Resolves enumerated ids to metadata + counters, one call per batch of at most 50
 */
export class DetailFetcher {
  private readonly batchSize: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;

  constructor(
    private readonly client: CatalogApiClient,
    options: DetailFetcherOptions
  ) {
    this.batchSize = Math.max(1, Math.min(options.batchSize ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE));
    this.logger = options.logger.child({ service: 'catalog-details' });
    this.retryPolicy = (options.retryPolicy ?? new RetryPolicy()).withOnRetry((attempt, error, delay) => {
      this.logger.warn('Retrying detail batch', { attempt, delay, error: String(error) });
    });
  }

  async fetchDetails(refs: VideoRef[], snapshotDate: string): Promise<DetailFetchResult> {
    const parsedById = new Map<string, ParsedVideo>();
    const malformed: ItemFailure[] = [];

    for (let start = 0, batchIndex = 0; start < refs.length; start += this.batchSize, batchIndex++) {
      const batch = refs.slice(start, start + this.batchSize).map((ref) => ref.id);
      const response = await this.fetchBatch(batch, batchIndex);

      for (const raw of response.items) {
        const id = readId(raw);
        try {
          const parsed = parseVideoResource(raw, snapshotDate);
          parsedById.set(parsed.snapshot.id, parsed);
        } catch (error) {
          // Without an id the item cannot be matched, so its video also shows up in `dropped`
          const reason =
            id === undefined
              ? `Unusable video payload without a readable id (its video is also listed as dropped): ${describeError(error)}`
              : `Unusable video payload: ${describeError(error)}`;
          this.logger.warn('Skipping malformed video', { videoId: id, reason });
          malformed.push({ id: id ?? UNREADABLE_ID, reason });
        }
      }

      this.logger.debug('Fetched detail batch', {
        batch: batchIndex + 1,
        requested: batch.length,
        returned: response.items.length
      });
    }

    const snapshots: VideoSnapshot[] = [];
    const counters: VideoCounters[] = [];
    const dropped: string[] = [];
    const malformedIds = new Set(malformed.map((failure) => failure.id));

    // Enumeration order, not response order
    for (const ref of refs) {
      const parsed = parsedById.get(ref.id);
      if (parsed) {
        snapshots.push(parsed.snapshot);
        counters.push(parsed.counters);
      } else if (!malformedIds.has(ref.id)) {
        dropped.push(ref.id);
      }
    }

    if (dropped.length > 0) {
      this.logger.info('Videos missing from detail responses', { count: dropped.length, ids: dropped });
    }

    return { snapshots, counters, dropped, malformed };
  }

  private async fetchBatch(ids: string[], batchIndex: number) {
    try {
      return await this.retryPolicy.execute(() => this.client.listVideos(ids));
    } catch (error) {
      throw new DetailFetchError(`videos.list for ${ids.length} ids failed`, batchIndex, error);
    }
  }
}
