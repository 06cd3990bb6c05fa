export { BaseAPIClient, RateLimiter } from './BaseAPIClient.js';
export type { APIClientConfig, RateLimitConfig, RequestOptions } from './BaseAPIClient.js';
