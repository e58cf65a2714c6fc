/**
 * Configuration management with environment variable validation
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors';

// Load .env file if it exists
dotenv.config();

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

/**
 * Environment variable schema
 */
const EnvSchema = z.object({
  YOUTUBE_API_KEY: z.string().min(1),
  YOUTUBE_UPLOADS_PLAYLIST_ID: z.string().optional(),
  YOUTUBE_CHANNEL_ID: z.string().optional(),

  // Metrics credentials: all three or none
  YOUTUBE_OAUTH_CLIENT_ID: optionalSecret,
  YOUTUBE_OAUTH_CLIENT_SECRET: optionalSecret,
  YOUTUBE_OAUTH_REFRESH_TOKEN: optionalSecret,

  SNAPSHOT_DB_PATH: z.string().min(1).default('data/snapshots.db'),
  ANALYTICS_LOOKBACK_DAYS: z
    .string()
    .transform(Number)
    .pipe(z.number().int().min(0).max(30))
    .default('3'),
  SNAPSHOT_TIMEZONE: z
    .string()
    .default('UTC')
    .refine(isKnownTimeZone, { message: 'Must be an IANA time zone' }),
  PORT: z
    .string()
    .transform(Number)
    .pipe(z.number().int().min(1).max(65535))
    .default('8080'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info')
});

type EnvConfig = z.infer<typeof EnvSchema>;

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Uploads playlist of a channel: `UC…` channel ids map to `UU…`
 */
export function uploadsPlaylistFor(channelId: string): string {
  if (!channelId.startsWith('UC') || channelId.length < 3) {
    throw new ConfigurationError(`Cannot derive uploads playlist from channel id ${channelId}`);
  }
  return `UU${channelId.slice(2)}`;
}

export interface OAuthSettings {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

/**
 * Application configuration
 */
export interface AppConfig {
  apiKey: string;
  playlistId: string;
  /** Absent when metrics credentials are not configured */
  oauth?: OAuthSettings;
  dbPath: string;
  lookbackDays: number;
  timeZone: string;
  port: number;

  logLevel: 'error' | 'warn' | 'info' | 'debug';
}

export class Configuration {
  private config?: AppConfig;

  constructor(private readonly source: NodeJS.ProcessEnv = process.env) {}

  /**
   * Load and validate configuration
   */
  load(): AppConfig {
    if (this.config) {
      return this.config;
    }

    const result = EnvSchema.safeParse(this.source);

    if (!result.success) {
      const missing = result.error.errors
        .filter((issue) => issue.message === 'Required')
        .map((issue) => issue.path.join('.'));

      const invalid = result.error.errors
        .filter((issue) => issue.message !== 'Required')
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`);

      let message = 'Invalid configuration:';
      if (missing.length > 0) {
        message += `\nMissing required variables: ${missing.join(', ')}`;
      }
      if (invalid.length > 0) {
        message += `\nInvalid variables: ${invalid.join('; ')}`;
      }

      throw new ConfigurationError(message, missing);
    }

    const env = result.data;

    this.config = {
      apiKey: env.YOUTUBE_API_KEY,
      playlistId: this.resolvePlaylistId(env),
      oauth: this.resolveOAuth(env),
      dbPath: env.SNAPSHOT_DB_PATH,
      lookbackDays: env.ANALYTICS_LOOKBACK_DAYS,
      timeZone: env.SNAPSHOT_TIMEZONE,
      port: env.PORT,
      logLevel: env.LOG_LEVEL
    };

    return this.config;
  }

  /**
   * Validate configuration without throwing
   */
  validate(): { valid: boolean; errors?: string[] } {
    try {
      this.load();
      return { valid: true };
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return {
          valid: false,
          errors: [error.message, ...(error.missingFields ?? [])]
        };
      }
      return { valid: false, errors: [String(error)] };
    }
  }

  /**
   * Configuration with secrets redacted, for the startup log line
   */
  redacted(): Record<string, unknown> {
    const config = this.load();
    return {
      ...config,
      apiKey: redactSecret(config.apiKey),
      oauth: config.oauth
        ? {
            clientId: redactSecret(config.oauth.clientId),
            clientSecret: redactSecret(config.oauth.clientSecret),
            refreshToken: redactSecret(config.oauth.refreshToken)
          }
        : undefined
    };
  }

  private resolvePlaylistId(env: EnvConfig): string {
    const explicit = env.YOUTUBE_UPLOADS_PLAYLIST_ID?.trim();
    if (explicit) {
      return explicit;
    }
    const channelId = env.YOUTUBE_CHANNEL_ID?.trim();
    if (channelId) {
      return uploadsPlaylistFor(channelId);
    }
    throw new ConfigurationError(
      'YOUTUBE_UPLOADS_PLAYLIST_ID or YOUTUBE_CHANNEL_ID is required',
      ['YOUTUBE_UPLOADS_PLAYLIST_ID']
    );
  }

  private resolveOAuth(env: EnvConfig): OAuthSettings | undefined {
    const clientId = env.YOUTUBE_OAUTH_CLIENT_ID;
    const clientSecret = env.YOUTUBE_OAUTH_CLIENT_SECRET;
    const refreshToken = env.YOUTUBE_OAUTH_REFRESH_TOKEN;

    if (clientId && clientSecret && refreshToken) {
      return { clientId, clientSecret, refreshToken };
    }

    const present = [
      ['YOUTUBE_OAUTH_CLIENT_ID', clientId],
      ['YOUTUBE_OAUTH_CLIENT_SECRET', clientSecret],
      ['YOUTUBE_OAUTH_REFRESH_TOKEN', refreshToken]
    ] as const;
    const missing = present.filter(([, value]) => !value).map(([name]) => name);
    if (missing.length < present.length) {
      throw new ConfigurationError(
        `Incomplete OAuth credentials, missing: ${missing.join(', ')}`,
        [...missing]
      );
    }
    return undefined;
  }
}

export function redactSecret(secret: string): string {
  if (secret.length <= 8) {
    return '***';
  }
  return `${secret.substring(0, 4)}...${secret.substring(secret.length - 4)}`;
}

// Export singleton instance
export const config = new Configuration();
