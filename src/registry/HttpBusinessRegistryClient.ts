/**
 * HTTP client for a business registry exposing `GET /enterprises/{vat}`.
 *
 * 404 means the VAT number is not registered; every other failure (timeout,
 * 5xx after retries, malformed body) is reported as `unavailable` so the
 * auditor can mark its checks incomplete.
 */

import { BaseAPIClient } from '../clients/BaseAPIClient.js';
import type { APIClientConfig } from '../clients/BaseAPIClient.js';
import type { BusinessRegistryLookup, RegistryEntity, RegistryLookupResult } from './types.js';
import { normalizeVatNumber } from './types.js';
import { APIError, PipelineCancelledError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('REGISTRY');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

/**
 * Validate a registry response body. Accepts `legalName` or `name`.
 */
export function parseRegistryEntity(body: unknown, requestedVat: string): RegistryEntity | null {
  if (!isRecord(body)) return null;

  const legalName = optionalString(body.legalName) ?? optionalString(body.name);
  if (!legalName) return null;

  const rawStatus = optionalString(body.status)?.toLowerCase();
  const status = rawStatus === 'active' || rawStatus === 'inactive' ? rawStatus : 'unknown';
  const address = optionalString(body.address);

  return {
    vatNumber: optionalString(body.vatNumber) ?? requestedVat,
    legalName,
    status,
    ...(address ? { address } : {}),
  };
}

export class HttpBusinessRegistryClient extends BaseAPIClient implements BusinessRegistryLookup {
  readonly name = 'BusinessRegistry';

  async searchByVat(vatNumber: string, signal?: AbortSignal): Promise<RegistryLookupResult> {
    const vat = normalizeVatNumber(vatNumber);
    if (vat === '') {
      return { status: 'not_found' };
    }

    try {
      const body = await this.requestWithRetry(`/enterprises/${encodeURIComponent(vat)}`, { signal });
      const entity = parseRegistryEntity(body, vat);
      if (!entity) {
        log.warn(`Malformed registry response for ${vat}`);
        return { status: 'unavailable', error: 'Malformed registry response' };
      }
      return { status: 'found', entity };
    } catch (error) {
      if (error instanceof PipelineCancelledError) {
        throw error;
      }
      if (error instanceof APIError && error.statusCode === 404) {
        return { status: 'not_found' };
      }
      const message = describeError(error);
      log.warn(`Lookup of ${vat} failed: ${message}`);
      return { status: 'unavailable', error: message };
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.request('/health', { skipCache: true });
      return true;
    } catch (error) {
      log.debug(`Health check failed: ${describeError(error)}`);
      return false;
    }
  }
}

/**
 * Client from REGISTRY_API_URL / REGISTRY_API_KEY, or null when no URL is set
 */
export function createRegistryClientFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<APIClientConfig> = {}
): HttpBusinessRegistryClient | null {
  const baseUrl = env.REGISTRY_API_URL;
  if (!baseUrl) {
    return null;
  }

  return new HttpBusinessRegistryClient({
    baseUrl,
    apiKey: env.REGISTRY_API_KEY,
    timeout: 5000,
    rateLimit: { maxRequests: 5, windowMs: 1000 },
    cacheTTL: 24 * 60 * 60 * 1000,
    ...overrides,
  });
}
