/**
 * Input Validation for Ticker Context
 *
 * Validates ticker symbols and request limits before any upstream call.
 */

import { InvalidTickerError, ValidationError } from './errors';

export const MAX_NEWS_LIMIT = 100;

const TICKER_PATTERN = /^[A-Z][A-Z.]{0,5}$/;

/**
 * Validate ticker symbol format
 *
 * Rules:
 * - 1-6 characters after trimming, upper-cased
 * - Letters and dots only (dots for share classes like BRK.B)
 * - No leading, trailing or consecutive dots
 *
 * @returns The normalized (trimmed, upper-case) ticker
 * @throws InvalidTickerError if ticker is invalid
 */
export function validateTicker(ticker: string): string {
  if (!ticker || typeof ticker !== 'string') {
    throw new InvalidTickerError(String(ticker), 'Ticker is required');
  }

  const trimmed = ticker.trim().toUpperCase();

  if (trimmed.length < 1 || trimmed.length > 6) {
    throw new InvalidTickerError(ticker, 'Ticker must be 1-6 characters');
  }

  if (!/^[A-Z.]+$/.test(trimmed)) {
    throw new InvalidTickerError(ticker, 'Ticker can only contain letters and dots');
  }

  if (trimmed.startsWith('.') || trimmed.endsWith('.')) {
    throw new InvalidTickerError(ticker, 'Ticker cannot start or end with a dot');
  }

  if (trimmed.includes('..')) {
    throw new InvalidTickerError(ticker, 'Ticker cannot have consecutive dots');
  }

  return trimmed;
}

/**
 * True when the input is already written as a ticker (upper case, 1-6 chars).
 * "AAPL" and "BRK.B" qualify, "Apple" and "aapl" do not.
 */
export function looksLikeTicker(input: string): boolean {
  const trimmed = input.trim();
  return TICKER_PATTERN.test(trimmed) && !trimmed.endsWith('.') && !trimmed.includes('..');
}

/**
 * Validate a result-count limit
 *
 * @throws ValidationError unless limit is an integer in 1..MAX_NEWS_LIMIT
 */
export function validateLimit(limit: number): number {
  if (!Number.isInteger(limit)) {
    throw new ValidationError('limit', `must be an integer, got ${limit}`);
  }

  if (limit < 1 || limit > MAX_NEWS_LIMIT) {
    throw new ValidationError('limit', `must be between 1 and ${MAX_NEWS_LIMIT}, got ${limit}`);
  }

  return limit;
}
