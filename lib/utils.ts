/**
 * Utility Functions for Ticker Context
 *
 * Common helpers for text shaping, timestamps and error responses.
 */

import { getErrorCode, getUserMessage, isTickerContextError } from './errors';

/**
 * Cut a string down to at most `max` UTF-16 code units
 *
 * Never ends on half of a surrogate pair; the cut backs off one unit instead.
 */
export function truncate(input: string, max: number): string {
  if (input.length <= max) {
    return input;
  }

  const cut = input.slice(0, max);
  const last = cut.charCodeAt(cut.length - 1);

  // High surrogate: its low half was cut off
  return last >= 0xd800 && last <= 0xdbff ? cut.slice(0, -1) : cut;
}

/**
 * Split prose into sentences on terminal punctuation followed by whitespace
 *
 * @example
 * splitSentences('Shares rose. Analysts cheered! Why?')
 * // ['Shares rose.', 'Analysts cheered!', 'Why?']
 */
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+/)
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * First `count` sentences of a text, joined with a single space
 */
export function firstSentences(text: string, count: number): string {
  return splitSentences(text).slice(0, count).join(' ');
}

/**
 * Convert a provider timestamp to ISO-8601
 *
 * Accepts date strings and epoch values (seconds or milliseconds).
 * Returns null when the value does not parse.
 */
export function toIsoTimestamp(value: unknown): string | null {
  let date: Date;

  if (typeof value === 'number') {
    // Values below 1e12 are epoch seconds
    date = new Date(value < 1e12 ? value * 1000 : value);
  } else if (typeof value === 'string' && value.trim() !== '') {
    date = new Date(value);
  } else {
    return null;
  }

  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

export interface ErrorResponse {
  success: false;
  error: {
    code: string;
    message: string;
    ticker?: string;
    timestamp: string;
    isUnexpected: boolean;
  };
}

/**
 * Format error for an API response body
 */
export function formatErrorResponse(error: unknown, ticker?: string): ErrorResponse {
  return {
    success: false,
    error: {
      code: getErrorCode(error),
      message: getUserMessage(error),
      ...(ticker ? { ticker } : {}),
      timestamp: new Date().toISOString(),
      isUnexpected: !isTickerContextError(error),
    },
  };
}
