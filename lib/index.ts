/**
 * ticker-context
 *
 * News, sentiment and summary context for stock tickers.
 *
 * @example
 * ```typescript
 * import { loadEnvFile, loadConfig, createContextService } from 'ticker-context';
 *
 * loadEnvFile();
 * const context = createContextService(loadConfig());
 * const result = await context.analyze('AAPL');
 * console.log(result.sentiment, result.summary);
 * ```
 */

// Configuration
export { loadConfig, loadEnvFile } from './config';
export type { AppConfig, ProviderConfig, SummaryConfig } from './config';

// Context lookup
export * from './context';

// News feed
export * from './news';

// Orchestration
export { BriefingOrchestrator, createBriefingOrchestrator } from './orchestrator';
export type { BriefingOptions, StockBriefing } from './orchestrator';

// Summary providers
export { LLMFactory } from './llm/LLMFactory';
export { LLMProvider } from './llm/LLMProvider';
export type { LLMProviderType, SummaryRequest, SummaryResult } from './llm/types';

// Errors
export {
  TickerContextError,
  APITimeoutError,
  APIRateLimitError,
  APIResponseError,
  APINetworkError,
  InvalidTickerError,
  ValidationError,
  ConfigurationError,
  LLMError,
  isTickerContextError,
  getErrorCode,
  getStatusCode,
  getUserMessage,
} from './errors';
export { formatErrorResponse } from './utils';

// Logging
export { configureLogger, LogLevel } from './logger';
