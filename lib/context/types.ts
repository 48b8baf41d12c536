/**
 * Context Types
 *
 * The context result returned for a ticker, plus the seams (classifier,
 * summarizer) the context service is assembled from.
 */

import { NewsProviderName } from '../news/types';

/**
 * Aggregate sentiment of recent news
 */
export const SENTIMENT_LABELS = ['positive', 'neutral', 'negative'] as const;

export type SentimentLabel = (typeof SENTIMENT_LABELS)[number];

/**
 * Narrow an unknown value to a sentiment label
 */
export function isSentimentLabel(value: unknown): value is SentimentLabel {
  return SENTIMENT_LABELS.some((label) => label === value);
}

/**
 * Where the summary text came from
 */
export type SummarySource = 'llm' | 'extractive' | 'none';

export interface ContextSource {
  title: string;
  url: string;
}

/**
 * Combined sentiment + summary record for a ticker
 */
export interface ContextResult {
  symbol: string;
  sentiment: SentimentLabel;
  summary: string;
  sources: ContextSource[];
  meta: {
    query: string;
    newsProvider: NewsProviderName | null;
    articleCount: number;
    summarySource: SummarySource;
    sentimentScore: number; // AFINN comparative score
    generatedAt: string;
  };
}

export interface SentimentAnalysis {
  label: SentimentLabel;
  score: number;
}

export interface SentimentAnalyzer {
  analyze(text: string): SentimentAnalysis;
}

export interface SummaryOutcome {
  text: string;
  source: SummarySource;
}

export interface NewsSummarizerLike {
  summarize(text: string, symbol: string): Promise<SummaryOutcome>;
}
