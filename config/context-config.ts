/**
 * Centralized Context Configuration
 *
 * Fixed values shared by the news fetchers, summarizer and classifier.
 * Anything an operator may want to tune lives in the environment instead
 * (see lib/config.ts).
 */

export class ContextConfig {
  // =========================================================================
  // UPSTREAM PROVIDERS
  // =========================================================================

  static readonly STOCKDATA_BASE_URL = 'https://api.stockdata.org/v1';
  static readonly NEWSAPI_BASE_URL = 'https://newsapi.org/v2';

  /** Per-request timeout when HTTP_TIMEOUT_MS is unset */
  static readonly DEFAULT_TIMEOUT_MS = 30000;

  /** Articles are requested in English only */
  static readonly NEWS_LANGUAGE = 'en';

  /** Default news feed page size */
  static readonly DEFAULT_NEWS_LIMIT = 5;

  // =========================================================================
  // ANALYSIS TEXT
  // =========================================================================

  /** Characters of concatenated headlines fed to the summarizer and classifier */
  static readonly MAX_ANALYSIS_TEXT_CHARS = 4000;

  /** Sentences kept by the extractive summary */
  static readonly EXTRACTIVE_SENTENCES = 3;

  // =========================================================================
  // SUMMARY GENERATION
  // =========================================================================

  static readonly SUMMARY_MAX_WORDS = 100;
  static readonly SUMMARY_MAX_OUTPUT_TOKENS = 150;

  // =========================================================================
  // SENTIMENT
  // AFINN comparative score = summed word valence / token count, range -5..5
  // =========================================================================

  static readonly DEFAULT_SENTIMENT_THRESHOLD = 0.1;
  static readonly MAX_SENTIMENT_THRESHOLD = 5;

  // =========================================================================
  // FIXED MESSAGES
  // =========================================================================

  static readonly NO_NEWS_SUMMARY = 'No news found.';
  static readonly NO_TEXT_SUMMARY = 'No text provided.';
  static readonly UNAVAILABLE_SUMMARY = 'Summary unavailable.';
}
