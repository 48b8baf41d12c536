/**
 * Context Module - Public API
 */

// Main entry point
export {
  ContextService,
  createContextService,
  buildDefaultContext,
  buildAnalysisText,
} from './context';
export type { ContextServiceDeps } from './context';

export { CompanyNewsFetcher } from './news-fetcher';
export type { NewsFetchOutcome } from './news-fetcher';
export { SymbolResolver } from './symbol-resolver';
export { SentimentClassifier, labelForScore } from './sentiment';
export { NewsSummarizer, extractiveSummary } from './summarizer';

// Types
export { SENTIMENT_LABELS, isSentimentLabel } from './types';
export type {
  ContextResult,
  ContextSource,
  SentimentAnalysis,
  SentimentAnalyzer,
  SentimentLabel,
  SummaryOutcome,
  SummarySource,
  NewsSummarizerLike,
} from './types';
