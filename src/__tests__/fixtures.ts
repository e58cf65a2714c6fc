import nock from 'nock';

export const DATA_API = 'https://catalog.test';
export const DATA_API_BASE = `${DATA_API}/youtube/v3`;
export const ANALYTICS_API = 'https://analytics.test';
export const ANALYTICS_API_BASE = `${ANALYTICS_API}/v2`;
export const OAUTH_API = 'https://oauth.test';

export interface VideoOverrides {
  duration?: string;
  title?: string;
  viewCount?: string;
}

export function videoIds(count: number, prefix = 'vid'): string[] {
  return Array.from({ length: count }, (_, index) => `${prefix}${String(index + 1).padStart(3, '0')}`);
}

export function playlistPage(ids: string[], nextPageToken?: string) {
  return {
    items: ids.map((videoId) => ({ contentDetails: { videoId } })),
    ...(nextPageToken ? { nextPageToken } : {})
  };
}

export function videoResource(id: string, overrides: VideoOverrides = {}) {
  return {
    kind: 'youtube#video',
    id,
    snippet: {
      title: overrides.title ?? `Video ${id}`,
      publishedAt: '2026-01-15T12:00:00Z',
      tags: ['howto', 'test'],
      categoryId: '22',
      thumbnails: {
        default: { url: `https://img.test/${id}/default.jpg` },
        high: { url: `https://img.test/${id}/hq.jpg` }
      }
    },
    contentDetails: { duration: overrides.duration ?? 'PT4M10S' },
    statistics: {
      viewCount: overrides.viewCount ?? '100',
      likeCount: '10',
      commentCount: '2',
      favoriteCount: '0'
    }
  };
}

/**
 * Playlist pages of at most `pageSize` ids, chained by tokens `page-2`, `page-3`, ...
 */
export function interceptPlaylist(ids: string[], pageSize = 50): nock.Scope {
  const scope = nock(DATA_API);
  const pageCount = Math.max(1, Math.ceil(ids.length / pageSize));

  for (let page = 1; page <= pageCount; page++) {
    const token = page === 1 ? undefined : `page-${page}`;
    const next = page < pageCount ? `page-${page + 1}` : undefined;
    scope
      .get('/youtube/v3/playlistItems')
      .query((query) => query.pageToken === token)
      .reply(200, playlistPage(ids.slice((page - 1) * pageSize, page * pageSize), next));
  }
  return scope;
}

/**
 * A videos.list stand-in answering from `resources`; unknown ids are left out like
 * deleted or private videos. Requested batches are recorded in order.
 */
export function interceptVideos(resources: Map<string, unknown>): { scope: nock.Scope; batches: string[][] } {
  const batches: string[][] = [];
  const scope = nock(DATA_API)
    .persist()
    .get('/youtube/v3/videos')
    .query(true)
    .reply(200, (uri) => {
      const requested = new URL(uri, DATA_API).searchParams.get('id')?.split(',') ?? [];
      batches.push(requested);
      return { items: requested.filter((id) => resources.has(id)).map((id) => resources.get(id)) };
    });
  return { scope, batches };
}

export function interceptToken(accessToken = 'test-access-token'): nock.Scope {
  return nock(OAUTH_API)
    .persist()
    .post('/token')
    .reply(200, { access_token: accessToken, expires_in: 3600, token_type: 'Bearer' });
}

export function dailyMetricsRow(id: string, minutes = 12.5): [string, number, number, number, number, number, number] {
  return [id, minutes, 95, 41.5, 2, 0, 1];
}

export type StandInReply = [number, Record<string, unknown>];

export interface ReportsStandIn {
  scope: nock.Scope;
  /** Query string of every reports call, in order */
  calls: URLSearchParams[];
}

/**
 * reports.query stand-in: bulk (`dimensions=video`) calls go to `daily`,
 * per-video traffic calls go to `traffic` with the filtered id.
 */
export function interceptReports(handlers: {
  daily: (params: URLSearchParams) => StandInReply;
  traffic: (videoId: string, params: URLSearchParams) => StandInReply;
}): ReportsStandIn {
  const calls: URLSearchParams[] = [];
  const scope = nock(ANALYTICS_API)
    .persist()
    .get('/v2/reports')
    .query(true)
    .reply((uri) => {
      const params = new URL(uri, ANALYTICS_API).searchParams;
      calls.push(params);
      if (params.get('dimensions') === 'video') {
        return handlers.daily(params);
      }
      const videoId = (params.get('filters') ?? '').replace(/^video==/, '');
      return handlers.traffic(videoId, params);
    });
  return { scope, calls };
}

export function trafficReply(rows: Array<[string, number, number]>): StandInReply {
  return [200, { kind: 'youtubeAnalytics#resultTable', rows }];
}
