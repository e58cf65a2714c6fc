/**
 * Tests for the reports client
 */

import nock from 'nock';
import { ANALYTICS_API, ANALYTICS_API_BASE } from '../../__tests__/fixtures';
import { HttpRequestError } from '../../utils/errors';
import { AnalyticsReportsClient } from '../reports-client';
import type { AccessTokenSource } from '../token-provider';

class FakeTokens implements AccessTokenSource {
  issued = 0;
  invalidated = 0;

  async getAccessToken(): Promise<string> {
    this.issued++;
    return `token-${this.issued}`;
  }

  invalidate(): void {
    this.invalidated++;
  }
}

describe('AnalyticsReportsClient', () => {
  let tokens: FakeTokens;
  let client: AnalyticsReportsClient;

  beforeEach(() => {
    tokens = new FakeTokens();
    client = new AnalyticsReportsClient(tokens, { baseUrl: ANALYTICS_API_BASE });
  });

  it('should query the authenticated channel with a bearer token', async () => {
    const scope = nock(ANALYTICS_API, { reqheaders: { authorization: 'Bearer token-1' } })
      .get('/v2/reports')
      .query({
        ids: 'channel==MINE',
        startDate: '2026-10-16',
        endDate: '2026-10-16',
        dimensions: 'insightTrafficSourceType',
        metrics: 'views,estimatedMinutesWatched',
        filters: 'video==abc'
      })
      .reply(200, { rows: [['YT_SEARCH', 10, 3.5]] });

    const response = await client.query({
      startDate: '2026-10-16',
      endDate: '2026-10-16',
      dimensions: 'insightTrafficSourceType',
      metrics: ['views', 'estimatedMinutesWatched'],
      filters: 'video==abc'
    });

    expect(response.rows).toEqual([['YT_SEARCH', 10, 3.5]]);
    expect(response.columnHeaders).toEqual([]);
    expect(scope.isDone()).toBe(true);
  });

  it('should treat a missing rows field as no activity', async () => {
    nock(ANALYTICS_API).get('/v2/reports').query(true).reply(200, { kind: 'youtubeAnalytics#resultTable' });

    const response = await client.query({ startDate: 'd', endDate: 'd', dimensions: 'video', metrics: ['views'] });

    expect(response.rows).toEqual([]);
  });

  it('should retry once with a fresh token after a 401', async () => {
    nock(ANALYTICS_API)
      .get('/v2/reports')
      .query(true)
      .reply(401, { error: { message: 'Invalid Credentials' } })
      .get('/v2/reports')
      .query(true)
      .matchHeader('authorization', 'Bearer token-2')
      .reply(200, { rows: [] });

    await expect(
      client.query({ startDate: 'd', endDate: 'd', dimensions: 'video', metrics: ['views'] })
    ).resolves.toEqual({ columnHeaders: [], rows: [] });
    expect(tokens.invalidated).toBe(1);
  });

  it('should give up after the second 401', async () => {
    nock(ANALYTICS_API).get('/v2/reports').query(true).times(2).reply(401, {});

    const failure = client.query({ startDate: 'd', endDate: 'd', dimensions: 'video', metrics: ['views'] });

    await expect(failure).rejects.toBeInstanceOf(HttpRequestError);
    expect(tokens.issued).toBe(2);
  });
});
