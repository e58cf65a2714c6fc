import axios, { type AxiosInstance } from 'axios';
import { HttpRequestError } from './errors';
import type { Logger } from './logger';

export interface HttpClientOptions {
  baseURL: string;
  timeout?: number;
  headers?: Record<string, string>;
  service: string;
  logger?: Logger;
}

type QueryValue = string | number | boolean | null | undefined;

export interface HttpRequestOptions {
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
}

const DEFAULT_TIMEOUT_MS = 30000;

function stringifyBody(data: unknown): string | undefined {
  if (data === undefined || data === null) {
    return undefined;
  }
  return typeof data === 'string' ? data : JSON.stringify(data);
}

function cleanQuery(query?: Record<string, QueryValue>): Record<string, string> {
  const params: Record<string, string> = {};
  if (!query) {
    return params;
  }
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) {
      continue;
    }
    params[key] = String(value);
  }
  return params;
}

/**
 * Convert an axios failure into an HttpRequestError when a response exists.
 * Transport failures (resets, timeouts) are returned as-is so their `code` survives.
 */
export function normalizeHttpError(error: unknown, method: string, url: string): unknown {
  if (axios.isAxiosError(error) && error.response) {
    return new HttpRequestError(
      url,
      error.response.status,
      error.response.statusText ?? '',
      method,
      stringifyBody(error.response.data)
    );
  }
  return error;
}

/**
 * Thin JSON client over an axios instance
 */
export class JsonHttpClient {
  private readonly http: AxiosInstance;
  private readonly service: string;
  private readonly logger?: Logger;

  constructor(options: HttpClientOptions) {
    this.http = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
      headers: { accept: 'application/json', ...options.headers }
    });
    this.service = options.service;
    this.logger = options.logger;
  }

  async getJson<T = unknown>(path: string, options: HttpRequestOptions = {}): Promise<T> {
    const startedAt = Date.now();
    try {
      const response = await this.http.get<T>(path, {
        params: cleanQuery(options.query),
        headers: options.headers
      });
      this.logger?.logApiCall(this.service, 'GET', path, Date.now() - startedAt, response.status);
      return response.data;
    } catch (error) {
      const normalized = normalizeHttpError(error, 'GET', path);
      const status = normalized instanceof HttpRequestError ? normalized.status : undefined;
      this.logger?.logApiCall(this.service, 'GET', path, Date.now() - startedAt, status);
      throw normalized;
    }
  }

  async postForm<T = unknown>(path: string, form: Record<string, string>): Promise<T> {
    const startedAt = Date.now();
    try {
      const response = await this.http.post<T>(path, new URLSearchParams(form).toString(), {
        headers: { 'content-type': 'application/x-www-form-urlencoded' }
      });
      this.logger?.logApiCall(this.service, 'POST', path, Date.now() - startedAt, response.status);
      return response.data;
    } catch (error) {
      const normalized = normalizeHttpError(error, 'POST', path);
      const status = normalized instanceof HttpRequestError ? normalized.status : undefined;
      this.logger?.logApiCall(this.service, 'POST', path, Date.now() - startedAt, status);
      throw normalized;
    }
  }
}
