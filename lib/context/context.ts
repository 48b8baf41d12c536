/**
 * Context Lookup - Main Entry Point
 *
 * Flow:
 * 1. Resolve the ticker (company names go through entity search)
 * 2. Fetch recent news (StockData.org, NewsAPI as fallback)
 * 3. Summarize the headlines (LLM or extractive)
 * 4. Classify aggregate sentiment
 *
 * The lookup never throws. No news, or any failure along the way, yields
 * the neutral default record.
 */

import { AxiosAdapter } from 'axios';
import { ContextConfig } from '../../config/context-config';
import { AppConfig } from '../config';
import { getErrorCode } from '../errors';
import { LLMFactory } from '../llm/LLMFactory';
import {
  createTimer,
  logContextComplete,
  logContextFailed,
  logContextStart,
  toError,
} from '../logger';
import { NewsApiClient } from '../news/newsapi-client';
import { StockDataClient } from '../news/stockdata-client';
import { NewsItem } from '../news/types';
import { truncate } from '../utils';
import { CompanyNewsFetcher } from './news-fetcher';
import { SentimentClassifier } from './sentiment';
import { NewsSummarizer } from './summarizer';
import { SymbolResolver } from './symbol-resolver';
import { ContextResult, NewsSummarizerLike, SentimentAnalyzer } from './types';

export interface ContextServiceDeps {
  resolver: Pick<SymbolResolver, 'resolve'>;
  fetcher: Pick<CompanyNewsFetcher, 'fetch'>;
  summarizer: NewsSummarizerLike;
  classifier: SentimentAnalyzer;
}

/**
 * Neutral record returned when there is nothing to analyze
 */
export function buildDefaultContext(symbol: string, query: string = symbol): ContextResult {
  return {
    symbol,
    sentiment: 'neutral',
    summary: ContextConfig.NO_NEWS_SUMMARY,
    sources: [],
    meta: {
      query,
      newsProvider: null,
      articleCount: 0,
      summarySource: 'none',
      sentimentScore: 0,
      generatedAt: new Date().toISOString(),
    },
  };
}

/**
 * Concatenate headline + description of every article, capped for the summarizer
 */
export function buildAnalysisText(items: NewsItem[]): string {
  const joined = items
    .filter((item) => item.headline)
    .map((item) => `${item.headline} ${item.summary ?? ''}`)
    .join(' ');

  return truncate(joined, ContextConfig.MAX_ANALYSIS_TEXT_CHARS);
}

export class ContextService {
  constructor(private deps: ContextServiceDeps) {}

  async analyze(query: string): Promise<ContextResult> {
    const timer = createTimer('Context analysis', { query });
    logContextStart(query);

    let symbol = query.trim().toUpperCase();

    try {
      symbol = await this.deps.resolver.resolve(query);

      const { provider, items } = await this.deps.fetcher.fetch(symbol);

      if (items.length === 0) {
        timer.end(true, { symbol, articles: 0 });
        return buildDefaultContext(symbol, query);
      }

      const text = buildAnalysisText(items);
      const summary = await this.deps.summarizer.summarize(text, symbol);
      const sentiment = this.deps.classifier.analyze(text);

      const result: ContextResult = {
        symbol,
        sentiment: sentiment.label,
        summary: summary.text,
        sources: items.map((item) => ({ title: item.headline, url: item.url })),
        meta: {
          query,
          newsProvider: provider,
          articleCount: items.length,
          summarySource: summary.source,
          sentimentScore: sentiment.score,
          generatedAt: new Date().toISOString(),
        },
      };

      const duration = timer.end(true, { symbol, articles: items.length });
      logContextComplete(symbol, duration, sentiment.label, { provider, summarySource: summary.source });

      return result;
    } catch (err) {
      const error = toError(err);
      timer.endWithError(error, { symbol });
      logContextFailed(query, getErrorCode(err), { symbol }, error);

      return buildDefaultContext(symbol, query);
    }
  }
}

/**
 * Assemble a context service from the application config
 *
 * @param adapter - Optional axios adapter shared by both news providers
 */
export function createContextService(config: AppConfig, adapter?: AxiosAdapter): ContextService {
  const stockData = config.stockData.apiKey
    ? new StockDataClient({
        apiKey: config.stockData.apiKey,
        baseUrl: config.stockData.baseUrl,
        timeout: config.stockData.timeoutMs,
        adapter,
      })
    : null;

  const newsApi = config.newsApi.apiKey
    ? new NewsApiClient({
        apiKey: config.newsApi.apiKey,
        baseUrl: config.newsApi.baseUrl,
        timeout: config.newsApi.timeoutMs,
        adapter,
      })
    : null;

  return new ContextService({
    resolver: new SymbolResolver(stockData),
    fetcher: new CompanyNewsFetcher(stockData, newsApi),
    summarizer: new NewsSummarizer(LLMFactory.fromConfig(config.summary)),
    classifier: new SentimentClassifier(config.sentiment.threshold),
  });
}
