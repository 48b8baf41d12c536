/**
 * Custom Error Classes for Ticker Context
 *
 * Provides user-friendly error messages and structured error codes
 * for every failure the news and context lookups can surface.
 *
 * Error Hierarchy:
 * - TickerContextError (base class)
 *   - APITimeoutError
 *   - APIRateLimitError
 *   - APIResponseError
 *   - APINetworkError
 *   - InvalidTickerError
 *   - ValidationError
 *   - ConfigurationError
 *   - LLMError
 */

/**
 * Base error class for all Ticker Context errors
 *
 * Provides standardized error structure with:
 * - Developer message (for logs)
 * - User message (for display by whatever backend mounts the lookups)
 * - Error code (for debugging/monitoring)
 * - HTTP status code (for API responses)
 */
export class TickerContextError extends Error {
  constructor(
    message: string,
    public code: string,
    public userMessage: string,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = this.constructor.name;
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Format error for JSON response
   */
  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.userMessage,
      statusCode: this.statusCode,
    };
  }
}

/**
 * API Timeout Error
 *
 * Thrown when an upstream news or search call exceeds its timeout.
 */
export class APITimeoutError extends TickerContextError {
  constructor(service: string, timeout: number) {
    super(
      `${service} API timeout after ${timeout}ms`,
      'API_TIMEOUT',
      `${service} is taking longer than usual. Try again in a couple of minutes.`,
      504
    );
  }
}

/**
 * API Rate Limit Error
 *
 * Thrown when an upstream provider answers 429.
 */
export class APIRateLimitError extends TickerContextError {
  public readonly retryAfter?: number;

  constructor(service: string, retryAfter?: number) {
    const retryMessage = retryAfter
      ? ` Please wait ${retryAfter} seconds before trying again.`
      : ' Please wait a moment and try again.';

    super(
      `${service} API rate limit exceeded`,
      'RATE_LIMIT',
      `Too many requests to ${service}.${retryMessage}`,
      429
    );

    this.retryAfter = retryAfter;
  }
}

/**
 * API Response Error
 *
 * Thrown when an upstream API returns an error response.
 * Captures HTTP status and the provider's own error message.
 */
export class APIResponseError extends TickerContextError {
  constructor(
    service: string,
    status: number,
    message: string
  ) {
    let userMessage: string;
    let code: string;

    switch (status) {
      case 400:
        code = 'API_BAD_REQUEST';
        userMessage = `${service} rejected the request. The ticker or parameters may be invalid.`;
        break;
      case 401:
        code = 'API_UNAUTHORIZED';
        userMessage = `${service} authentication failed. Check the configured API key.`;
        break;
      case 402:
      case 403:
        code = 'API_FORBIDDEN';
        userMessage = `${service} access denied. The plan may have expired or reached its limits.`;
        break;
      case 404:
        code = 'API_NOT_FOUND';
        userMessage = `${service} could not find the requested data.`;
        break;
      case 500:
      case 502:
      case 503:
        code = 'API_SERVER_ERROR';
        userMessage = `${service} is experiencing technical difficulties. Please try again later.`;
        break;
      default:
        code = 'API_ERROR';
        userMessage = `${service} returned an error. Please try again.`;
    }

    super(
      `${service} API error (${status}): ${message}`,
      code,
      userMessage,
      status
    );
  }
}

/**
 * API Network Error
 *
 * Thrown when a request was sent but no response ever came back
 * (DNS failure, connection refused, socket reset).
 */
export class APINetworkError extends TickerContextError {
  constructor(service: string, operation: string, details: string) {
    super(
      `${service} network error during ${operation}: ${details}`,
      'API_NETWORK_ERROR',
      `Couldn't reach ${service}. Check the connection and try again.`,
      503
    );
  }
}

/**
 * Invalid Ticker Error
 *
 * Thrown when ticker symbol fails validation.
 */
export class InvalidTickerError extends TickerContextError {
  constructor(ticker: string, reason?: string) {
    const details = reason ? ` (${reason})` : '';
    super(
      `Invalid ticker symbol: ${ticker}${details}`,
      'INVALID_TICKER',
      `Can't find "${ticker}". Stock symbols are usually 1-5 letters (like NVDA or MSFT).`,
      400
    );
  }
}

/**
 * Validation Error
 *
 * Thrown when input or configuration validation fails.
 */
export class ValidationError extends TickerContextError {
  constructor(field: string, issue: string) {
    super(
      `Validation failed for ${field}: ${issue}`,
      'VALIDATION_ERROR',
      `Invalid ${field}: ${issue}`,
      400
    );
  }
}

/**
 * Configuration Error
 *
 * Thrown when an operation needs an API key that is not configured.
 */
export class ConfigurationError extends TickerContextError {
  constructor(variable: string, feature: string) {
    super(
      `Missing ${variable}: ${feature} is unavailable`,
      'CONFIGURATION_ERROR',
      `${feature} is not configured. Set ${variable} in the environment or .env file.`,
      500
    );
  }
}

/**
 * LLM Error
 *
 * Thrown by text-generation providers when the SDK call fails.
 */
export class LLMError extends TickerContextError {
  constructor(provider: string, details: string) {
    super(
      `${provider} API error: ${details}`,
      'LLM_ERROR',
      'The summary service is unavailable right now.',
      502
    );
  }
}

/**
 * Check if an error is a Ticker Context error
 */
export function isTickerContextError(
  error: unknown
): error is TickerContextError {
  return error instanceof TickerContextError;
}

/**
 * Get user-friendly error message from any error
 */
export function getUserMessage(error: unknown): string {
  if (isTickerContextError(error)) {
    return error.userMessage;
  }

  if (error instanceof Error) {
    return 'An unexpected error occurred. Please try again.';
  }

  return 'An unknown error occurred. Please try again.';
}

/**
 * Get error code from any error
 */
export function getErrorCode(error: unknown): string {
  if (isTickerContextError(error)) {
    return error.code;
  }

  return 'UNKNOWN_ERROR';
}

/**
 * Get HTTP status code from any error
 */
export function getStatusCode(error: unknown): number {
  if (isTickerContextError(error)) {
    return error.statusCode;
  }

  return 500;
}
