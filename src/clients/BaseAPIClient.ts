/**
 * Base API Client
 *
 * Common plumbing for the pipeline's HTTP collaborators (business registry,
 * judgment model):
 * - Rate limiting
 * - Response caching for GET requests
 * - Retries with exponential backoff
 * - Error mapping to APIError
 *
 * Responses come back as `unknown`; each client validates the shape it
 * expects.
 */

import axios from 'axios';
import { LRUCache } from 'lru-cache';
import { APIError, PipelineCancelledError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface RateLimitConfig {
  maxRequests: number;
  windowMs: number;
}

export interface APIClientConfig {
  baseUrl: string;
  apiKey?: string;
  userAgent?: string;
  /** Per-request timeout in ms */
  timeout?: number;
  rateLimit?: RateLimitConfig;
  /** Cache TTL in ms; 0 disables caching */
  cacheTTL?: number;
  cacheSize?: number;
  maxRetries?: number;
  /** Delay before the first retry; doubles on every further retry */
  retryDelayMs?: number;
}

export interface RequestOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  params?: Record<string, string | number | boolean | undefined>;
  timeout?: number;
  skipCache?: boolean;
  signal?: AbortSignal;
}

/**
 * Sliding-window rate limiter
 */
export class RateLimiter {
  private timestamps: number[] = [];

  constructor(private readonly config: RateLimitConfig) {}

  /**
   * Wait until a request fits in the window, then record it
   */
  async waitForSlot(): Promise<void> {
    const now = Date.now();
    this.timestamps = this.timestamps.filter(t => now - t < this.config.windowMs);

    const oldest = this.timestamps[0];
    if (this.timestamps.length >= this.config.maxRequests && oldest !== undefined) {
      const waitTime = this.config.windowMs - (now - oldest) + 10;
      if (waitTime > 0) {
        await sleep(waitTime);
      }
      const afterWait = Date.now();
      this.timestamps = this.timestamps.filter(t => afterWait - t < this.config.windowMs);
    }

    this.timestamps.push(Date.now());
  }

  canMakeRequest(): boolean {
    const now = Date.now();
    this.timestamps = this.timestamps.filter(t => now - t < this.config.windowMs);
    return this.timestamps.length < this.config.maxRequests;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

interface CachedResponse {
  data: unknown;
}

export abstract class BaseAPIClient {
  protected readonly baseUrl: string;
  protected readonly apiKey: string | undefined;
  protected readonly userAgent: string;
  protected readonly timeout: number;
  protected readonly maxRetries: number;
  protected readonly retryDelayMs: number;
  protected readonly rateLimiter: RateLimiter;
  protected readonly cache: LRUCache<string, CachedResponse> | null;

  abstract readonly name: string;

  constructor(config: APIClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.apiKey = config.apiKey;
    this.userAgent = config.userAgent ?? 'silent-ledger';
    this.timeout = config.timeout ?? 10000;
    this.maxRetries = config.maxRetries ?? 3;
    this.retryDelayMs = config.retryDelayMs ?? 1000;
    this.rateLimiter = new RateLimiter(config.rateLimit ?? { maxRequests: 10, windowMs: 1000 });

    const ttl = config.cacheTTL ?? 5 * 60 * 1000;
    this.cache = ttl > 0
      ? new LRUCache<string, CachedResponse>({
        max: config.cacheSize ?? 500,
        ttl,
        updateAgeOnGet: true,
        allowStale: false,
        ttlAutopurge: true,
      })
      : null;
  }

  /**
   * Join the base URL and a path, keeping any path prefix of the base URL
   */
  protected buildUrl(path: string): string {
    const cleanPath = path.startsWith('/') ? path.slice(1) : path;
    return `${this.baseUrl}/${cleanPath}`;
  }

  protected getCacheKey(path: string, params?: RequestOptions['params']): string {
    const query = params
      ? Object.entries(params)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${String(value)}`)
        .join('&')
      : '';
    return `${this.name}:${this.buildUrl(path)}?${query}`;
  }

  /**
   * One HTTP request with rate limiting and caching; no retries
   */
  protected async request(path: string, options: RequestOptions = {}): Promise<unknown> {
    const {
      method = 'GET',
      headers = {},
      body,
      params,
      timeout = this.timeout,
      skipCache = false,
      signal,
    } = options;

    const cacheKey = this.getCacheKey(path, params);
    const cacheable = method === 'GET' && !skipCache && this.cache !== null;
    if (cacheable) {
      const cached = this.cache?.get(cacheKey);
      if (cached) {
        return cached.data;
      }
    }

    await this.rateLimiter.waitForSlot();

    const requestHeaders: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/json',
      ...headers,
    };
    if (this.apiKey && !requestHeaders.Authorization) {
      requestHeaders.Authorization = `Bearer ${this.apiKey}`;
    }
    if (body !== undefined && !requestHeaders['Content-Type']) {
      requestHeaders['Content-Type'] = 'application/json';
    }

    try {
      const response = await axios.request<unknown>({
        url: this.buildUrl(path),
        method,
        headers: requestHeaders,
        data: body,
        params,
        timeout,
        signal,
      });

      if (cacheable) {
        this.cache?.set(cacheKey, { data: response.data });
      }
      return response.data;
    } catch (error) {
      throw this.toAPIError(error, timeout, signal);
    }
  }

  /**
   * Request with retries on retryable failures, backing off exponentially
   */
  protected async requestWithRetry(path: string, options: RequestOptions = {}): Promise<unknown> {
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await this.request(path, options);
      } catch (error) {
        if (!(error instanceof APIError) || !error.retryable) {
          throw error;
        }
        lastError = error;

        if (attempt < this.maxRetries) {
          const delay = this.retryDelayMs * Math.pow(2, attempt - 1);
          logger.debug(`${this.name}: attempt ${attempt} failed (${error.message}), retrying in ${delay}ms`);
          await sleep(delay);
        }
      }
    }

    throw lastError ?? new APIError(`${this.name} API request failed`, 0, this.name, false);
  }

  private toAPIError(error: unknown, timeout: number, signal?: AbortSignal): Error {
    if (signal?.aborted || axios.isCancel(error)) {
      return new PipelineCancelledError(`${this.name} request cancelled`);
    }

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      if (status !== undefined) {
        const retryable = status === 429 || status >= 500;
        return new APIError(
          `${this.name} API error: ${status} ${error.response?.statusText ?? ''}`.trim(),
          status,
          this.name,
          retryable
        );
      }
      if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
        return new APIError(`${this.name} API timeout after ${timeout}ms`, 0, this.name, true);
      }
      return new APIError(`${this.name} API error: ${error.message}`, 0, this.name, true);
    }

    if (error instanceof Error) {
      return new APIError(`${this.name} API error: ${error.message}`, 0, this.name, true);
    }
    return new APIError(`${this.name} API unknown error`, 0, this.name, true);
  }

  abstract healthCheck(): Promise<boolean>;

  clearCache(): void {
    this.cache?.clear();
  }
}
