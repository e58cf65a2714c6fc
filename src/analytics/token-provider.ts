import { JsonHttpClient } from '../utils/http';
import type { Logger } from '../utils/logger';
import { TokenResponseSchema } from './types';

export const OAUTH_TOKEN_BASE_URL = 'https://oauth2.googleapis.com';

// Refresh a little before the upstream expiry
const EXPIRY_MARGIN_MS = 60_000;

export interface OAuthCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface AccessTokenSource {
  getAccessToken(): Promise<string>;
  invalidate(): void;
}

export interface TokenProviderOptions {
  baseUrl?: string;
  timeoutMs?: number;
  now?: () => number;
  logger?: Logger;
}

/**
 * Exchanges a stored refresh token for short-lived access tokens
 */
export class OAuthTokenProvider implements AccessTokenSource {
  private readonly http: JsonHttpClient;
  private readonly now: () => number;
  private readonly logger?: Logger;
  private cached?: { token: string; expiresAt: number };

  constructor(
    private readonly credentials: OAuthCredentials,
    options: TokenProviderOptions = {}
  ) {
    this.http = new JsonHttpClient({
      baseURL: options.baseUrl ?? OAUTH_TOKEN_BASE_URL,
      timeout: options.timeoutMs,
      service: 'oauth-token',
      logger: options.logger
    });
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  async getAccessToken(): Promise<string> {
    if (this.cached && this.now() < this.cached.expiresAt) {
      return this.cached.token;
    }

    const payload = await this.http.postForm('/token', {
      grant_type: 'refresh_token',
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
      refresh_token: this.credentials.refreshToken
    });
    const response = TokenResponseSchema.parse(payload);

    this.cached = {
      token: response.access_token,
      expiresAt: this.now() + response.expires_in * 1000 - EXPIRY_MARGIN_MS
    };
    this.logger?.debug('Access token refreshed', { expiresIn: response.expires_in });
    return response.access_token;
  }

  invalidate(): void {
    this.cached = undefined;
  }
}
