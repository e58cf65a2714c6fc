import { HttpRequestError } from '../utils/errors';
import { JsonHttpClient } from '../utils/http';
import type { Logger } from '../utils/logger';
import type { AccessTokenSource } from './token-provider';
import { type ReportQuery, type ReportResponse, ReportResponseSchema } from './types';

export const ANALYTICS_API_BASE_URL = 'https://youtubeanalytics.googleapis.com/v2';

export interface ReportsClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * reports.query against the authenticated channel (`channel==MINE`)
 */
export class AnalyticsReportsClient {
  private readonly http: JsonHttpClient;

  constructor(
    private readonly tokens: AccessTokenSource,
    options: ReportsClientOptions = {}
  ) {
    this.http = new JsonHttpClient({
      baseURL: options.baseUrl ?? ANALYTICS_API_BASE_URL,
      timeout: options.timeoutMs,
      service: 'youtube-analytics',
      logger: options.logger
    });
  }

  async query(query: ReportQuery): Promise<ReportResponse> {
    try {
      return await this.send(query);
    } catch (error) {
      // A revoked or expired access token gets one fresh attempt
      if (error instanceof HttpRequestError && error.status === 401) {
        this.tokens.invalidate();
        return this.send(query);
      }
      throw error;
    }
  }

  private async send(query: ReportQuery): Promise<ReportResponse> {
    const token = await this.tokens.getAccessToken();
    const payload = await this.http.getJson('/reports', {
      query: {
        ids: 'channel==MINE',
        startDate: query.startDate,
        endDate: query.endDate,
        dimensions: query.dimensions,
        metrics: query.metrics.join(','),
        filters: query.filters,
        sort: query.sort,
        maxResults: query.maxResults
      },
      headers: { authorization: `Bearer ${token}` }
    });
    return ReportResponseSchema.parse(payload);
  }
}
