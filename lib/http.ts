/**
 * Shared axios setup for upstream news providers
 *
 * Every provider client gets its own axios instance (base URL, key param,
 * timeout) and funnels failures through toApiError so callers only ever
 * see TickerContextError subclasses.
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import {
  APINetworkError,
  APIRateLimitError,
  APIResponseError,
  APITimeoutError,
} from './errors';

export interface HttpClientOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Query parameters sent with every request (API keys) */
  params?: Record<string, string>;
  /** Replaces the network transport (tests use an in-process adapter) */
  adapter?: AxiosAdapter;
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    params: options.params,
    headers: { 'user-agent': 'ticker-context/1.0' },
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });
}

function parseRetryAfter(value: unknown): number | undefined {
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : undefined;
}

/**
 * Pull the provider's own message out of an error body
 *
 * StockData answers `{ error: { code, message } }`,
 * NewsAPI answers `{ status: 'error', code, message }`.
 */
export function extractProviderMessage(body: unknown): string | null {
  if (typeof body !== 'object' || body === null) {
    return typeof body === 'string' && body ? body.substring(0, 200) : null;
  }

  if ('error' in body && typeof body.error === 'object' && body.error !== null) {
    if ('message' in body.error && typeof body.error.message === 'string') {
      return body.error.message;
    }
  }

  if ('message' in body && typeof body.message === 'string') {
    return body.message;
  }

  return null;
}

/**
 * Read a list field from a provider body
 *
 * A missing field is an empty list; anything else that is not an array is
 * a malformed response (502).
 */
export function readList<T>(value: T[] | null | undefined, service: string, field: string): T[] {
  if (value === undefined || value === null) {
    return [];
  }

  if (!Array.isArray(value)) {
    throw new APIResponseError(service, 502, `malformed response: "${field}" is not a list`);
  }

  return value;
}

/**
 * Convert axios errors to custom error types
 *
 * Non-axios errors are returned untouched.
 */
export function toApiError(
  error: unknown,
  service: string,
  operation: string,
  timeoutMs: number
): unknown {
  if (!axios.isAxiosError(error)) {
    return error;
  }

  // Timeout error
  if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
    return new APITimeoutError(service, timeoutMs);
  }

  // HTTP error response
  if (error.response) {
    const { status, data, headers } = error.response;

    if (status === 429) {
      return new APIRateLimitError(service, parseRetryAfter(headers['retry-after']));
    }

    return new APIResponseError(
      service,
      status,
      extractProviderMessage(data) || error.message
    );
  }

  // Request went out, nothing came back
  if (error.request) {
    return new APINetworkError(service, operation, error.message);
  }

  return error;
}
