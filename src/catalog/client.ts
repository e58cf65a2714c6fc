import { JsonHttpClient } from '../utils/http';
import type { Logger } from '../utils/logger';
import {
  type PlaylistItemsPage,
  PlaylistItemsPageSchema,
  type VideoListResponse,
  VideoListResponseSchema
} from './types';

export const DATA_API_BASE_URL = 'https://www.googleapis.com/youtube/v3';

/** Upstream ceiling for both maxResults and ids per videos.list call */
export const MAX_PAGE_SIZE = 50;

export interface CatalogClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Key-authenticated access to the two catalog endpoints the pipeline uses
 */
export class CatalogApiClient {
  private readonly http: JsonHttpClient;
  private readonly apiKey: string;

  constructor(options: CatalogClientOptions) {
    this.apiKey = options.apiKey;
    this.http = new JsonHttpClient({
      baseURL: options.baseUrl ?? DATA_API_BASE_URL,
      timeout: options.timeoutMs,
      service: 'youtube-data',
      logger: options.logger
    });
  }

  async listPlaylistPage(
    playlistId: string,
    pageSize: number,
    pageToken?: string
  ): Promise<PlaylistItemsPage> {
    const payload = await this.http.getJson('/playlistItems', {
      query: {
        part: 'contentDetails',
        playlistId,
        maxResults: Math.min(pageSize, MAX_PAGE_SIZE),
        pageToken,
        key: this.apiKey
      }
    });
    return PlaylistItemsPageSchema.parse(payload);
  }

  async listVideos(ids: string[]): Promise<VideoListResponse> {
    const payload = await this.http.getJson('/videos', {
      query: {
        part: 'snippet,contentDetails,statistics',
        id: ids.join(','),
        key: this.apiKey
      }
    });
    return VideoListResponseSchema.parse(payload);
  }
}
