import type { VideoRef } from '../types/snapshot';
import { EnumerationError } from '../utils/errors';
import type { Logger } from '../utils/logger';
import { RetryPolicy } from '../utils/retry';
import { type CatalogApiClient, MAX_PAGE_SIZE } from './client';
import { PlaylistItemSchema, type PlaylistItemsPage } from './types';

export interface EnumeratorOptions {
  pageSize?: number;
  retryPolicy?: RetryPolicy;
  logger: Logger;
}

/**
 * Pages through every member of an uploads playlist
 */
export class CatalogEnumerator {
  private readonly pageSize: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly logger: Logger;

  constructor(
    private readonly client: CatalogApiClient,
    options: EnumeratorOptions
  ) {
    this.pageSize = Math.min(options.pageSize ?? MAX_PAGE_SIZE, MAX_PAGE_SIZE);
    this.logger = options.logger.child({ service: 'catalog-enumerator' });
    this.retryPolicy = (options.retryPolicy ?? new RetryPolicy()).withOnRetry((attempt, error, delay) => {
      this.logger.warn('Retrying playlist page', { attempt, delay, error: String(error) });
    });
  }

  /**
   * All distinct video ids in discovery order. Either the complete list or an EnumerationError.
   */
  async listVideoIds(playlistId: string): Promise<VideoRef[]> {
    const seen = new Set<string>();
    const followedTokens = new Set<string>();
    const refs: VideoRef[] = [];
    let pageToken: string | undefined;
    let pages = 0;
    let skipped = 0;

    do {
      const page = await this.fetchPage(playlistId, pageToken, pages + 1);
      pages++;

      for (const [position, raw] of page.items.entries()) {
        const item = PlaylistItemSchema.safeParse(raw);
        if (!item.success) {
          skipped++;
          this.logger.warn('Skipping playlist item without a video id', {
            playlistId,
            page: pages,
            position,
            reason: item.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
          });
          continue;
        }

        const id = item.data.contentDetails.videoId;
        if (!seen.has(id)) {
          seen.add(id);
          refs.push({ id });
        }
      }

      pageToken = page.nextPageToken || undefined;
      if (pageToken !== undefined) {
        if (followedTokens.has(pageToken)) {
          throw new EnumerationError(`continuation token repeated after ${pages} pages`, playlistId);
        }
        followedTokens.add(pageToken);
      }
    } while (pageToken !== undefined);

    this.logger.info('Playlist enumerated', { playlistId, pages, videos: refs.length, skipped });
    return refs;
  }

  private async fetchPage(
    playlistId: string,
    pageToken: string | undefined,
    pageNumber: number
  ): Promise<PlaylistItemsPage> {
    try {
      return await this.retryPolicy.execute(() =>
        this.client.listPlaylistPage(playlistId, this.pageSize, pageToken)
      );
    } catch (error) {
      throw new EnumerationError(`page ${pageNumber} request failed`, playlistId, error);
    }
  }
}
